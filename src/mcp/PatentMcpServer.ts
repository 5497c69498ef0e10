/**
 * Patent MCP Server
 *
 * Exposes download_patent, download_patents and get_patent_info as MCP tools
 * over Streamable HTTP. Each POST /mcp gets its own stateless server and
 * transport; both are closed when the response ends.
 */

import * as http from 'http';
import express from 'express';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import { McpServerOptions } from '../types/config.types';
import { PatentService } from '../types/patent.types';
import { describeError } from '../utils/errors';
import { Logger } from '../utils/logger';
import {
  PatentToolHandlers,
  downloadPatentShape,
  downloadPatentsShape,
  getPatentInfoShape
} from './patent-tools';

export const MCP_SERVER_NAME = 'patent-fetcher';
export const MCP_SERVER_VERSION = '1.0.0';

export function createPatentMcpServer(service: PatentService, logger: Logger): McpServer {
  const server = new McpServer({ name: MCP_SERVER_NAME, version: MCP_SERVER_VERSION });
  const handlers = new PatentToolHandlers(service, logger.child('PatentTools'));

  server.tool(
    'download_patent',
    'Download a single patent PDF from the patent search site',
    downloadPatentShape,
    args => handlers.downloadPatent(args)
  );

  server.tool(
    'download_patents',
    'Download multiple patent PDFs from the patent search site',
    downloadPatentsShape,
    args => handlers.downloadPatents(args)
  );

  server.tool(
    'get_patent_info',
    'Get detailed information about a patent',
    getPatentInfoShape,
    args => handlers.getPatentInfo(args)
  );

  return server;
}

export function createMcpApp(service: PatentService, logger: Logger): express.Express {
  const app = express();
  app.use(express.json({ limit: '1mb' }));

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  app.post('/mcp', async (req, res) => {
    const server = createPatentMcpServer(service, logger);
    const transport = new StreamableHTTPServerTransport({ sessionIdGenerator: undefined });

    res.on('close', () => {
      transport.close().catch(error => logger.warn(`Error closing MCP transport: ${describeError(error)}`));
      server.close().catch(error => logger.warn(`Error closing MCP server: ${describeError(error)}`));
    });

    try {
      await server.connect(transport);
      await transport.handleRequest(req, res, req.body);
    } catch (error) {
      logger.error('Error handling MCP request', error);
      if (!res.headersSent) {
        res.status(500).json({
          jsonrpc: '2.0',
          error: { code: -32603, message: 'Internal server error' },
          id: null
        });
      }
    }
  });

  app.get('/mcp', (_req, res) => {
    res.status(405).json({
      jsonrpc: '2.0',
      error: { code: -32000, message: 'Method not allowed. Use POST to send MCP messages.' },
      id: null
    });
  });

  return app;
}

export function startPatentMcpServer(
  service: PatentService,
  logger: Logger,
  options: McpServerOptions
): Promise<http.Server> {
  const app = createMcpApp(service, logger);

  return new Promise((resolve, reject) => {
    const server = app.listen(options.port, options.host, () => {
      logger.info(`MCP server listening on http://${options.host}:${options.port}/mcp`);
      resolve(server);
    });
    server.on('error', reject);
  });
}
