// src/services/PatentInfoExtractor.ts
import { parse, HTMLElement } from 'node-html-parser';
import { PatentRecord } from '../types/patent.types';

export const UNKNOWN_TITLE = 'Unknown Title';
export const UNKNOWN_ASSIGNEE = 'Unknown Assignee';
export const UNKNOWN_DATE = 'Unknown Date';
export const NO_ABSTRACT = 'No abstract available';

function firstText(root: HTMLElement, selector: string): string | null {
  const element = root.querySelector(selector);
  if (!element) {
    return null;
  }
  const text = element.text.trim();
  return text.length > 0 ? text : null;
}

function itemprop(name: string): string {
  return `[itemprop="${name}"]`;
}

export function parsePatentPage(html: string | Buffer): HTMLElement {
  return parse(typeof html === 'string' ? html : html.toString('utf-8'));
}

export function extractTitle(root: HTMLElement): string {
  return firstText(root, itemprop('title')) ?? firstText(root, 'h1') ?? UNKNOWN_TITLE;
}

export function extractInventors(root: HTMLElement): string[] {
  return root
    .querySelectorAll(itemprop('inventor'))
    .map(element => element.text.trim())
    .filter(name => name.length > 0);
}

export function extractAssignee(root: HTMLElement): string {
  return firstText(root, itemprop('assignee')) ?? UNKNOWN_ASSIGNEE;
}

export function extractPublicationDate(root: HTMLElement): string {
  return firstText(root, itemprop('publicationDate')) ?? UNKNOWN_DATE;
}

export function extractAbstract(root: HTMLElement): string {
  return firstText(root, itemprop('abstract')) ?? NO_ABSTRACT;
}

/**
 * Build a record from a patent page. Each field is looked up on its own and
 * falls back to its placeholder, so this never fails on missing markup.
 */
export function extractPatentInfo(
  html: string | Buffer,
  patentNumber: string,
  sourceUrl: string,
  pdfUrl?: string
): PatentRecord {
  const root = parsePatentPage(html);

  const record: PatentRecord = {
    identifier: patentNumber,
    title: extractTitle(root),
    inventors: Object.freeze(extractInventors(root)),
    assignee: extractAssignee(root),
    publicationDate: extractPublicationDate(root),
    abstractText: extractAbstract(root),
    sourceUrl,
    ...(pdfUrl !== undefined ? { pdfUrl } : {})
  };

  return Object.freeze(record);
}
