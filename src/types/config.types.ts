// src/types/config.types.ts

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export interface PatentFetcherConfig {
  /** Origin (optionally with a path prefix) of the patent search site, without trailing slash */
  siteUrl: string;
  timeoutMs: number;
  userAgent: string;
  outputDir: string;
  logLevel: LogLevel;
  logDirectory?: string;
  mcpHost: string;
  mcpPort: number;
}

export interface McpServerOptions {
  host: string;
  port: number;
}
