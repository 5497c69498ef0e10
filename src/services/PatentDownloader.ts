/**
 * Patent Downloader
 *
 * Single-patent download and info paths, plus the sequential batch loop
 * on top of them. Files are written as {patentNumber}.pdf in the output
 * directory through a temporary file that is renamed once complete.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { AxiosInstance } from 'axios';
import { DEFAULT_SITE_URL, stripTrailingSlash } from '../config/config';
import { PatentFetcherConfig } from '../types/config.types';
import {
  BatchProgressCallback,
  DownloadResult,
  PatentRecord,
  PatentService
} from '../types/patent.types';
import {
  DownloadFailedError,
  PatentDownloadError,
  PatentNotFoundError,
  describeError
} from '../utils/errors';
import { Logger } from '../utils/logger';
import { validatePatentNumber } from '../utils/validation';
import { PatentFetcher } from './PatentFetcher';
import { extractPatentInfo } from './PatentInfoExtractor';
import { PdfLinkResolver } from './PdfLinkResolver';

export interface PatentDownloaderOptions {
  siteUrl?: string;
  timeoutMs?: number;
  userAgent?: string;
  /** Session shared by all requests of this downloader */
  http?: AxiosInstance;
  logger?: Logger;
  resolver?: PdfLinkResolver;
}

export class PatentDownloader implements PatentService {
  private readonly siteUrl: string;
  private readonly fetcher: PatentFetcher;
  private readonly resolver: PdfLinkResolver;
  private readonly logger: Logger;

  constructor(options: PatentDownloaderOptions = {}) {
    this.siteUrl = stripTrailingSlash(options.siteUrl ?? DEFAULT_SITE_URL);
    this.logger = options.logger ?? new Logger('PatentDownloader');
    this.resolver = options.resolver ?? new PdfLinkResolver(this.siteUrl);
    this.fetcher = new PatentFetcher({
      timeoutMs: options.timeoutMs,
      userAgent: options.userAgent,
      http: options.http,
      logger: this.logger.child('PatentFetcher')
    });
  }

  static fromConfig(config: PatentFetcherConfig, logger?: Logger): PatentDownloader {
    return new PatentDownloader({
      siteUrl: config.siteUrl,
      timeoutMs: config.timeoutMs,
      userAgent: config.userAgent,
      logger
    });
  }

  patentPageUrl(patentNumber: string): string {
    return `${this.siteUrl}/patent/${patentNumber}/en`;
  }

  /**
   * Download a patent PDF into outputDir.
   *
   * Resolves false when the PDF request or the file write fails.
   * Throws InvalidPatentNumberError for a malformed number and NetworkError
   * when the patent page cannot be fetched; nothing is written in either case.
   */
  async downloadPatent(patentNumber: string, outputDir = '.'): Promise<boolean> {
    validatePatentNumber(patentNumber);
    const pageUrl = this.patentPageUrl(patentNumber);

    try {
      const pdfUrl = await this.retrievePdfLink(patentNumber, pageUrl);

      let data: Buffer;
      try {
        data = await this.fetcher.fetchPdf(pdfUrl, pageUrl);
      } catch (error) {
        this.logger.error(`Error downloading PDF for patent ${patentNumber}`, error);
        return false;
      }

      return await this.savePdf(data, patentNumber, outputDir);
    } catch (error) {
      if (error instanceof PatentDownloadError) {
        throw error;
      }
      this.logger.error(`Unexpected error for patent ${patentNumber}`, error);
      throw new DownloadFailedError(`Unexpected error: ${describeError(error)}`, { cause: error });
    }
  }

  /**
   * Download a patent PDF and return its bytes without touching the filesystem.
   */
  async downloadPatentData(patentNumber: string): Promise<Buffer> {
    validatePatentNumber(patentNumber);
    const pageUrl = this.patentPageUrl(patentNumber);

    try {
      const pdfUrl = await this.retrievePdfLink(patentNumber, pageUrl);
      this.logger.info(`Downloading PDF data for patent ${patentNumber} from ${pdfUrl}`);

      const data = await this.fetcher.fetchPdf(pdfUrl, pageUrl);
      this.logger.info(`Successfully downloaded PDF data for patent ${patentNumber} (${data.length} bytes)`);
      return data;
    } catch (error) {
      this.logger.error(`Error downloading patent ${patentNumber}`, error);
      throw new DownloadFailedError(`Error downloading patent ${patentNumber}: ${describeError(error)}`, {
        cause: error
      });
    }
  }

  /**
   * Download several patents one after another.
   *
   * A failure of one patent is logged and recorded as false; it never stops
   * the batch and no error escapes this method.
   */
  async downloadPatents(
    patentNumbers: readonly string[],
    outputDir = '.',
    onProgress?: BatchProgressCallback
  ): Promise<DownloadResult> {
    const results: DownloadResult = new Map();
    const total = patentNumbers.length;
    let completed = 0;

    for (const patentNumber of patentNumbers) {
      let success = false;
      try {
        success = await this.downloadPatent(patentNumber, outputDir);
      } catch (error) {
        this.logger.error(`Failed to download patent ${patentNumber}`, error);
      }

      results.set(patentNumber, success);
      completed++;

      if (onProgress) {
        try {
          onProgress(completed, total, patentNumber, success);
        } catch (error) {
          this.logger.warn(`Progress callback failed: ${describeError(error)}`);
        }
      }
    }

    return results;
  }

  /**
   * Fetch the patent page and extract its metadata. A page fetch failure
   * surfaces as NetworkError.
   */
  async getPatentInfo(patentNumber: string): Promise<PatentRecord> {
    validatePatentNumber(patentNumber);
    const pageUrl = this.patentPageUrl(patentNumber);

    const page = await this.fetcher.fetchPage(pageUrl);

    try {
      const pdfUrl = this.resolver.resolveUrl(page, patentNumber);
      return extractPatentInfo(page, patentNumber, pageUrl, pdfUrl);
    } catch (error) {
      throw new PatentNotFoundError(`Could not retrieve patent info: ${describeError(error)}`, { cause: error });
    }
  }

  private async retrievePdfLink(patentNumber: string, pageUrl: string): Promise<string> {
    const page = await this.fetcher.fetchPage(pageUrl);
    const link = this.resolver.resolve(page, patentNumber);

    this.logger.debug(`PDF link for ${patentNumber} via ${link.strategy}: ${link.url}`);
    return link.url;
  }

  private async savePdf(data: Buffer, patentNumber: string, outputDir: string): Promise<boolean> {
    const outputFile = path.join(outputDir, `${patentNumber}.pdf`);
    const tempFile = `${outputFile}.${process.pid}-${Date.now()}.part`;

    try {
      await fs.mkdir(outputDir, { recursive: true });
      await fs.writeFile(tempFile, data);
      await fs.rename(tempFile, outputFile);
    } catch (error) {
      this.logger.error(`Error writing PDF for patent ${patentNumber}`, error);
      await fs.rm(tempFile, { force: true }).catch(cleanupError => {
        this.logger.warn(`Could not remove ${tempFile}: ${describeError(cleanupError)}`);
      });
      return false;
    }

    this.logger.info(`Successfully downloaded ${outputFile}`);
    return true;
  }
}
