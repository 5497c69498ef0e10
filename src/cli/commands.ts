// src/cli/commands.ts
import chalk from 'chalk';
import { PatentService } from '../types/patent.types';
import { PatentDownloadError, describeError } from '../utils/errors';
import { ProgressReporter } from '../utils/ProgressReporter';
import { readPatentNumbers } from '../utils/patent-list-reader';
import { formatPatentInfo, summarizeDownloads } from '../utils/formatters';

export interface DownloadCommandOptions {
  outputDir: string;
  file?: string;
  hasHeader?: boolean;
}

function reportError(error: unknown): number {
  if (error instanceof PatentDownloadError) {
    console.error(chalk.red(`Error: ${error.message}`));
  } else {
    console.error(chalk.red(`Unexpected error: ${describeError(error)}`));
  }
  return 1;
}

/**
 * Patent numbers given on the command line followed by those read from --file.
 */
export async function collectPatentNumbers(
  args: readonly string[],
  options: Pick<DownloadCommandOptions, 'file' | 'hasHeader'>
): Promise<string[]> {
  const patentNumbers = [...args];
  if (options.file) {
    patentNumbers.push(...(await readPatentNumbers(options.file, options.hasHeader ?? false)));
  }
  return patentNumbers;
}

export async function downloadCommand(
  service: PatentService,
  args: readonly string[],
  options: DownloadCommandOptions,
  reporter: ProgressReporter = new ProgressReporter()
): Promise<number> {
  try {
    const patentNumbers = await collectPatentNumbers(args, options);

    if (patentNumbers.length === 0) {
      console.error(chalk.red('Error: no patent numbers given (pass them as arguments or with --file)'));
      return 1;
    }

    if (patentNumbers.length === 1) {
      const [patentNumber] = patentNumbers;
      const success = await service.downloadPatent(patentNumber, options.outputDir);
      if (success) {
        console.log(chalk.green(`Successfully downloaded patent ${patentNumber}`));
        return 0;
      }
      console.log(chalk.red(`Failed to download patent ${patentNumber}`));
      return 1;
    }

    reporter.start(patentNumbers.length);
    const results = await service
      .downloadPatents(patentNumbers, options.outputDir, reporter.asCallback())
      .finally(() => reporter.finish());

    const summary = summarizeDownloads(results);
    for (const line of summary.lines) {
      console.log(line);
    }

    return summary.failed.length === 0 ? 0 : 1;
  } catch (error) {
    return reportError(error);
  }
}

export async function infoCommand(service: PatentService, patentNumber: string): Promise<number> {
  try {
    const record = await service.getPatentInfo(patentNumber);
    for (const line of formatPatentInfo(record)) {
      console.log(line);
    }
    return 0;
  } catch (error) {
    return reportError(error);
  }
}
