/**
 * Patent Fetcher
 *
 * The two HTTP calls of the download path: the patent page, then the PDF.
 * One axios instance is reused for every call made by a fetcher.
 * Each call is a single attempt; there is no retry or backoff.
 */

import axios, { AxiosInstance, AxiosResponse } from 'axios';
import { DEFAULT_TIMEOUT_MS, DEFAULT_USER_AGENT } from '../config/config';
import { NetworkError, PatentNotFoundError, describeError } from '../utils/errors';
import { Logger } from '../utils/logger';

export interface PatentFetcherOptions {
  timeoutMs?: number;
  userAgent?: string;
  http?: AxiosInstance;
  logger?: Logger;
}

const PDF_MAGIC = Buffer.from('%PDF');

export class PatentFetcher {
  private readonly http: AxiosInstance;
  private readonly timeoutMs: number;
  private readonly headers: Record<string, string>;
  private readonly logger: Logger;

  constructor(options: PatentFetcherOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.http = options.http ?? axios.create();
    this.logger = options.logger ?? new Logger('PatentFetcher');
    this.headers = {
      'User-Agent': options.userAgent ?? DEFAULT_USER_AGENT,
      'Accept': 'application/pdf,application/octet-stream,*/*',
      'Accept-Language': 'en-US,en;q=0.9'
    };
  }

  async fetchPage(url: string): Promise<Buffer> {
    this.logger.debug(`GET ${url}`);
    const response = await this.get(url, {});
    return Buffer.from(response.data);
  }

  async fetchPdf(url: string, refererUrl: string): Promise<Buffer> {
    this.logger.debug(`GET ${url} (referer ${refererUrl})`);

    let response: AxiosResponse<ArrayBuffer>;
    try {
      response = await this.get(url, { Referer: refererUrl });
    } catch (error) {
      if (error instanceof NetworkError && error.statusCode === 404) {
        throw new PatentNotFoundError(`No PDF found at ${url}`, { cause: error });
      }
      throw error;
    }

    const data = Buffer.from(response.data);
    const contentType = String(response.headers['content-type'] ?? '').toLowerCase();

    if (!contentType.includes('pdf') && !isPdf(data)) {
      this.logger.warn(`Response doesn't appear to be a PDF (Content-Type: ${contentType}) for ${url}`);
    }

    return data;
  }

  private async get(url: string, extraHeaders: Record<string, string>): Promise<AxiosResponse<ArrayBuffer>> {
    try {
      return await this.http.get<ArrayBuffer>(url, {
        responseType: 'arraybuffer',
        timeout: this.timeoutMs,
        headers: { ...this.headers, ...extraHeaders }
      });
    } catch (error) {
      const statusCode = axios.isAxiosError(error) ? error.response?.status : undefined;
      const reason = statusCode !== undefined ? `HTTP ${statusCode}` : describeError(error);

      this.logger.warn(`Request to ${url} failed: ${reason}`);
      throw new NetworkError(`Network error: ${reason} (${url})`, { statusCode, url, cause: error });
    }
  }
}

export function isPdf(data: Buffer): boolean {
  return data.subarray(0, PDF_MAGIC.length).equals(PDF_MAGIC);
}
