// src/tests/PatentFetcher.test.ts
import { PatentFetcher, isPdf } from '../services/PatentFetcher';
import { NetworkError, PatentNotFoundError } from '../utils/errors';
import { Logger } from '../utils/logger';
import { createFakeHttp } from './helpers/fake-http';

const PAGE_URL = 'https://patents.google.com/patent/US123/en';
const PDF_URL = 'https://patents.google.com/files/US123.pdf';

describe('PatentFetcher', () => {
  let logger: Logger;

  beforeEach(() => {
    logger = new Logger('test');
  });

  describe('fetchPage', () => {
    it('should return the page bytes and send the browser headers', async () => {
      const { http, requests } = createFakeHttp({ [PAGE_URL]: { body: '<html></html>' } });
      const fetcher = new PatentFetcher({ http, logger, timeoutMs: 5000, userAgent: 'test-agent' });

      const page = await fetcher.fetchPage(PAGE_URL);

      expect(page.toString()).toBe('<html></html>');
      expect(requests).toHaveLength(1);
      expect(requests[0].headers['User-Agent']).toBe('test-agent');
      expect(requests[0].headers['Accept-Language']).toBe('en-US,en;q=0.9');
      expect(requests[0].timeout).toBe(5000);
    });

    it('should raise NetworkError with the status for an error response', async () => {
      const { http } = createFakeHttp({ [PAGE_URL]: { status: 500, body: 'oops' } });
      const fetcher = new PatentFetcher({ http, logger });

      const error = await fetcher.fetchPage(PAGE_URL).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(NetworkError);
      expect(error).toMatchObject({ statusCode: 500, url: PAGE_URL });
    });

    it('should raise NetworkError for a transport failure', async () => {
      const { http } = createFakeHttp({ [PAGE_URL]: new Error('socket hang up') });
      const fetcher = new PatentFetcher({ http, logger });

      await expect(fetcher.fetchPage(PAGE_URL)).rejects.toThrow(
        `Network error: socket hang up (${PAGE_URL})`
      );
    });
  });

  describe('fetchPdf', () => {
    it('should send the referer and return the exact bytes', async () => {
      const pdf = Buffer.from('%PDF-1.4 test content');
      const { http, requests } = createFakeHttp({
        [PDF_URL]: { body: pdf, headers: { 'content-type': 'application/pdf' } }
      });
      const fetcher = new PatentFetcher({ http, logger });

      const data = await fetcher.fetchPdf(PDF_URL, PAGE_URL);

      expect(data.equals(pdf)).toBe(true);
      expect(requests[0].headers['Referer']).toBe(PAGE_URL);
    });

    it('should warn but still return a body that does not look like a pdf', async () => {
      const { http } = createFakeHttp({
        [PDF_URL]: { body: '<html>blocked</html>', headers: { 'content-type': 'text/html' } }
      });
      const warn = jest.spyOn(logger, 'warn');
      const fetcher = new PatentFetcher({ http, logger });

      const data = await fetcher.fetchPdf(PDF_URL, PAGE_URL);

      expect(data.toString()).toBe('<html>blocked</html>');
      expect(warn).toHaveBeenCalledWith(
        `Response doesn't appear to be a PDF (Content-Type: text/html) for ${PDF_URL}`
      );
    });

    it('should accept pdf bytes served with a generic content type', async () => {
      const { http } = createFakeHttp({
        [PDF_URL]: { body: '%PDF-1.7', headers: { 'content-type': 'application/octet-stream' } }
      });
      const warn = jest.spyOn(logger, 'warn');
      const fetcher = new PatentFetcher({ http, logger });

      await fetcher.fetchPdf(PDF_URL, PAGE_URL);

      expect(warn).not.toHaveBeenCalled();
    });

    it('should report a missing pdf as PatentNotFoundError', async () => {
      const { http } = createFakeHttp({});
      const fetcher = new PatentFetcher({ http, logger });

      await expect(fetcher.fetchPdf(PDF_URL, PAGE_URL)).rejects.toThrow(PatentNotFoundError);
    });

    it('should keep other error statuses as NetworkError', async () => {
      const { http } = createFakeHttp({ [PDF_URL]: { status: 403 } });
      const fetcher = new PatentFetcher({ http, logger });

      await expect(fetcher.fetchPdf(PDF_URL, PAGE_URL)).rejects.toThrow(
        `Network error: HTTP 403 (${PDF_URL})`
      );
    });
  });
});

describe('isPdf', () => {
  it('should check the magic bytes', () => {
    expect(isPdf(Buffer.from('%PDF-1.4'))).toBe(true);
    expect(isPdf(Buffer.from('<html>'))).toBe(false);
    expect(isPdf(Buffer.alloc(0))).toBe(false);
  });
});
