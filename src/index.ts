// src/index.ts
export { PatentDownloader, type PatentDownloaderOptions } from './services/PatentDownloader';
export { PatentFetcher, type PatentFetcherOptions, isPdf } from './services/PatentFetcher';
export {
  PdfLinkResolver,
  type PageAnchor,
  type LinkStrategy,
  type ResolvedLink,
  DEFAULT_LINK_STRATEGIES,
  collectAnchors,
  findFirstMatch,
  downloadPdfHref,
  downloadText,
  downloadHref
} from './services/PdfLinkResolver';
export { extractPatentInfo } from './services/PatentInfoExtractor';
export { loadConfig } from './config/config';
export {
  PatentDownloadError,
  InvalidPatentNumberError,
  NetworkError,
  PatentNotFoundError,
  DownloadFailedError,
  ConfigError
} from './utils/errors';
export { Logger, createLogger, createSilentLogger } from './utils/logger';
export { ProgressReporter } from './utils/ProgressReporter';
export { validatePatentNumber, Validators } from './utils/validation';
export * from './types/patent.types';
export * from './types/config.types';
