// src/utils/formatters.ts
import { DownloadResult, PatentRecord } from '../types/patent.types';

export const ABSTRACT_PREVIEW_LENGTH = 200;

export interface DownloadSummary {
  successful: string[];
  failed: string[];
  lines: string[];
}

export function summarizeDownloads(results: DownloadResult): DownloadSummary {
  const successful: string[] = [];
  const failed: string[] = [];

  for (const [patentNumber, success] of results) {
    (success ? successful : failed).push(patentNumber);
  }

  const lines = [
    'Download completed:',
    `  Successful: ${successful.length} patents`,
    `  Failed: ${failed.length} patents`
  ];

  if (successful.length > 0) {
    lines.push(`  Successfully downloaded: ${successful.join(', ')}`);
  }
  if (failed.length > 0) {
    lines.push(`  Failed to download: ${failed.join(', ')}`);
  }

  return { successful, failed, lines };
}

export function formatPatentInfo(record: PatentRecord): string[] {
  const lines = [
    `Patent Information for ${record.identifier}:`,
    `  Title: ${record.title}`,
    `  Inventors: ${record.inventors.join(', ')}`,
    `  Assignee: ${record.assignee}`,
    `  Publication Date: ${record.publicationDate}`,
    `  URL: ${record.sourceUrl}`
  ];

  if (record.pdfUrl) {
    lines.push(`  PDF URL: ${record.pdfUrl}`);
  }

  lines.push(`  Abstract: ${record.abstractText.slice(0, ABSTRACT_PREVIEW_LENGTH)}...`);
  return lines;
}
