#!/usr/bin/env node
// src/cli/patent-fetcher.ts
import { Command, CommanderError, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import * as dotenv from 'dotenv';
import { loadConfig } from '../config/config';
import { startPatentMcpServer } from '../mcp/PatentMcpServer';
import { PatentDownloader } from '../services/PatentDownloader';
import { describeError } from '../utils/errors';
import { Logger, createLogger } from '../utils/logger';
import { ProgressReporter } from '../utils/ProgressReporter';
import { downloadCommand, infoCommand } from './commands';

dotenv.config();

function parsePort(value: string): number {
  const port = Number(value);
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new InvalidArgumentError('Port must be an integer between 1 and 65535.');
  }
  return port;
}

export async function runCli(argv: string[] = process.argv): Promise<number> {
  const program = new Command();
  let exitCode = 0;

  program
    .name('patent-fetcher')
    .description('Download patents and patent information from a patent search site')
    .version('1.0.0')
    .option('-v, --verbose', 'Enable verbose logging')
    .exitOverride()
    .addHelpText('after', `
Examples:
  patent-fetcher download WO2013078254A1
  patent-fetcher download WO2013078254A1 US20130123448A1 --output-dir ./patents
  patent-fetcher download --file patents.csv --has-header --output-dir ./patents
  patent-fetcher info WO2013078254A1
  patent-fetcher mcp-server --port 8000`);

  // Built per command so that --verbose and config errors apply before any work starts
  const setup = () => {
    const { verbose } = program.opts<{ verbose?: boolean }>();
    const config = loadConfig(verbose ? { logLevel: 'debug' } : {});
    const reporter = new ProgressReporter();
    const logger = new Logger('patent-fetcher', createLogger({
      level: config.logLevel,
      logDirectory: config.logDirectory,
      stream: reporter.stream
    }));
    const downloader = PatentDownloader.fromConfig(config, logger.child('PatentDownloader'));

    return { config, reporter, logger, downloader };
  };

  program
    .command('download')
    .description('Download patent PDF(s)')
    .argument('[patentNumbers...]', 'Patent number(s) to download')
    .option('-o, --output-dir <dir>', 'Output directory for downloaded files (default: PATENT_OUTPUT_DIR or current directory)')
    .option('-f, --file <path>', 'CSV or text file of patent numbers (first column of each row)')
    .option('--has-header', 'Skip the first row of --file')
    .action(async (patentNumbers: string[], options: { outputDir?: string; file?: string; hasHeader?: boolean }) => {
      const { config, reporter, downloader } = setup();
      exitCode = await downloadCommand(downloader, patentNumbers, {
        outputDir: options.outputDir ?? config.outputDir,
        file: options.file,
        hasHeader: options.hasHeader
      }, reporter);
    });

  program
    .command('info')
    .description('Get patent information')
    .argument('<patentNumber>', 'Patent number to get information for')
    .action(async (patentNumber: string) => {
      const { downloader } = setup();
      exitCode = await infoCommand(downloader, patentNumber);
    });

  program
    .command('mcp-server')
    .description('Start the MCP tool server (Streamable HTTP on /mcp)')
    .option('--host <host>', 'Host to bind to (default: MCP_HOST or localhost)')
    .option('--port <port>', 'Port to bind to (default: MCP_PORT or 8000)', parsePort)
    .action(async (options: { host?: string; port?: number }) => {
      const { config, logger, downloader } = setup();
      await startPatentMcpServer(downloader, logger.child('PatentMcpServer'), {
        host: options.host ?? config.mcpHost,
        port: options.port ?? config.mcpPort
      });
    });

  try {
    await program.parseAsync(argv);
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode === 0 ? 0 : 1;
    }
    console.error(chalk.red(`Error: ${describeError(error)}`));
    return 1;
  }

  return exitCode;
}

if (require.main === module) {
  runCli()
    .then(code => {
      process.exitCode = code;
    })
    .catch(error => {
      console.error(chalk.red(`Unexpected error: ${describeError(error)}`));
      process.exitCode = 1;
    });
}
