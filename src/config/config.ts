// src/config/config.ts
import { z } from 'zod';
import { LogLevel, PatentFetcherConfig } from '../types/config.types';
import { ConfigError } from '../utils/errors';

export const DEFAULT_SITE_URL = 'https://patents.google.com';
export const DEFAULT_TIMEOUT_MS = 30000;
export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) ' +
  'AppleWebKit/537.36 (KHTML, like Gecko) ' +
  'Chrome/91.0.4472.124 Safari/537.36';

const LOG_LEVELS: [LogLevel, ...LogLevel[]] = ['error', 'warn', 'info', 'debug'];

const envSchema = z.object({
  PATENT_SITE_URL: z.string().url().default(DEFAULT_SITE_URL),
  PATENT_REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_TIMEOUT_MS),
  PATENT_USER_AGENT: z.string().default(DEFAULT_USER_AGENT),
  PATENT_OUTPUT_DIR: z.string().default('.'),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  LOG_DIR: z.string().optional(),
  MCP_HOST: z.string().default('localhost'),
  MCP_PORT: z.coerce.number().int().min(1).max(65535).default(8000)
});

export function stripTrailingSlash(url: string): string {
  return url.replace(/\/+$/, '');
}

/**
 * Resolve configuration from environment variables, then apply explicit overrides.
 * Call dotenv.config() before this to pick up a .env file.
 */
export function loadConfig(
  overrides: Partial<PatentFetcherConfig> = {},
  env: NodeJS.ProcessEnv = process.env
): PatentFetcherConfig {
  // empty values count as unset
  const provided = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== '')
  );

  const parsed = envSchema.safeParse(provided);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigError(`Invalid configuration for ${issue.path.join('.')}: ${issue.message}`);
  }

  const values = parsed.data;
  const config: PatentFetcherConfig = {
    siteUrl: stripTrailingSlash(values.PATENT_SITE_URL),
    timeoutMs: values.PATENT_REQUEST_TIMEOUT_MS,
    userAgent: values.PATENT_USER_AGENT,
    outputDir: values.PATENT_OUTPUT_DIR,
    logLevel: values.LOG_LEVEL,
    logDirectory: values.LOG_DIR,
    mcpHost: values.MCP_HOST,
    mcpPort: values.MCP_PORT
  };

  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) {
      Object.assign(config, { [key]: value });
    }
  }

  if (overrides.siteUrl !== undefined) {
    config.siteUrl = stripTrailingSlash(overrides.siteUrl);
  }

  return config;
}
