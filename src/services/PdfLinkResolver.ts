/**
 * PDF Link Resolver
 *
 * Finds the PDF download link on a patent page. Anchors are normalized once
 * into { href, text } pairs, then an ordered list of strategies is tried;
 * the first strategy with a matching anchor wins. When nothing matches, a
 * download URL is guessed from the patent number.
 */

import { parse } from 'node-html-parser';
import { DEFAULT_SITE_URL, stripTrailingSlash } from '../config/config';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface PageAnchor {
  href: string;
  text: string;
}

export interface LinkStrategy {
  name: string;
  matches: (anchor: PageAnchor) => boolean;
}

export interface ResolvedLink {
  url: string;
  /** Name of the matching strategy, or 'fallback' for a guessed URL */
  strategy: string;
}

// ─────────────────────────────────────────────────────────────────────────────
// Strategies
// ─────────────────────────────────────────────────────────────────────────────

/** "download" in the href or the text, and "pdf" in the href */
export const downloadPdfHref: LinkStrategy = {
  name: 'download-pdf-href',
  matches: ({ href, text }) => {
    const lowerHref = href.toLowerCase();
    return (lowerHref.includes('download') || text.toLowerCase().includes('download')) && lowerHref.includes('pdf');
  }
};

/** Anchor text reads "Download PDF" or mentions "download" */
export const downloadText: LinkStrategy = {
  name: 'download-text',
  matches: ({ text }) => {
    const lowerText = text.trim().toLowerCase();
    return lowerText === 'download pdf' || lowerText.includes('download');
  }
};

/** Download-style path or query in the href */
export const downloadHref: LinkStrategy = {
  name: 'download-href',
  matches: ({ href }) => href.includes('/download') || href.includes('download=true')
};

export const DEFAULT_LINK_STRATEGIES: readonly LinkStrategy[] = [
  downloadPdfHref,
  downloadText,
  downloadHref
];

// ─────────────────────────────────────────────────────────────────────────────
// Anchor extraction
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Every <a> with an href attribute, in document order.
 */
export function collectAnchors(html: string | Buffer): PageAnchor[] {
  const root = parse(typeof html === 'string' ? html : html.toString('utf-8'));

  return root.querySelectorAll('a[href]').map(element => ({
    href: element.getAttribute('href') ?? '',
    text: element.text
  }));
}

export function findFirstMatch(
  anchors: readonly PageAnchor[],
  strategies: readonly LinkStrategy[] = DEFAULT_LINK_STRATEGIES
): { anchor: PageAnchor; strategy: LinkStrategy } | null {
  for (const strategy of strategies) {
    const anchor = anchors.find(strategy.matches);
    if (anchor) {
      return { anchor, strategy };
    }
  }
  return null;
}

// ─────────────────────────────────────────────────────────────────────────────
// Resolver
// ─────────────────────────────────────────────────────────────────────────────

export class PdfLinkResolver {
  private readonly siteUrl: string;
  private readonly origin: string;
  private readonly strategies: readonly LinkStrategy[];

  constructor(siteUrl: string = DEFAULT_SITE_URL, strategies: readonly LinkStrategy[] = DEFAULT_LINK_STRATEGIES) {
    this.siteUrl = stripTrailingSlash(siteUrl);
    this.origin = new URL(this.siteUrl).origin;
    this.strategies = strategies;
  }

  /**
   * Never throws and never returns an empty result; a guessed URL may 404 later.
   */
  resolve(html: string | Buffer, patentNumber: string): ResolvedLink {
    const match = findFirstMatch(collectAnchors(html), this.strategies);

    if (match) {
      return { url: this.normalize(match.anchor.href), strategy: match.strategy.name };
    }

    return { url: this.fallbackUrl(patentNumber), strategy: 'fallback' };
  }

  resolveUrl(html: string | Buffer, patentNumber: string): string {
    return this.resolve(html, patentNumber).url;
  }

  fallbackUrl(patentNumber: string): string {
    return `${this.siteUrl}/patent/${patentNumber}/en/download`;
  }

  normalize(url: string): string {
    if (url.startsWith('/')) {
      return `${this.origin}${url}`;
    }
    if (!url.startsWith('http')) {
      return `${this.origin}/${url}`;
    }
    return url;
  }
}
