// src/utils/errors.ts

/**
 * Base class for every failure raised by the download and info paths.
 */
export class PatentDownloadError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PatentDownloadError';
  }
}

/** Malformed patent number, raised before any network call. */
export class InvalidPatentNumberError extends PatentDownloadError {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidPatentNumberError';
  }
}

export class NetworkError extends PatentDownloadError {
  readonly statusCode?: number;
  readonly url?: string;

  constructor(message: string, details: { statusCode?: number; url?: string; cause?: unknown } = {}) {
    super(message, { cause: details.cause });
    this.name = 'NetworkError';
    this.statusCode = details.statusCode;
    this.url = details.url;
  }
}

export class PatentNotFoundError extends PatentDownloadError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PatentNotFoundError';
  }
}

export class DownloadFailedError extends PatentDownloadError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DownloadFailedError';
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
