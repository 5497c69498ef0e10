// src/types/patent.types.ts

/** Opaque patent number as used by the upstream site, e.g. "WO2013078254A1" */
export type PatentIdentifier = string;

export interface PatentRecord {
  readonly identifier: PatentIdentifier;
  readonly title: string;
  readonly inventors: readonly string[];
  readonly assignee: string;
  readonly publicationDate: string;
  readonly abstractText: string;
  readonly sourceUrl: string;
  readonly pdfUrl?: string;
}

/**
 * Outcome of a batch download keyed by patent number.
 * Iteration follows the first appearance of each number in the input.
 */
export type DownloadResult = Map<PatentIdentifier, boolean>;

export type BatchProgressCallback = (
  completed: number,
  total: number,
  patentNumber: PatentIdentifier,
  success: boolean
) => void;

/**
 * The operations the CLI and the MCP tools are built on.
 */
export interface PatentService {
  downloadPatent(patentNumber: PatentIdentifier, outputDir?: string): Promise<boolean>;
  downloadPatents(
    patentNumbers: readonly PatentIdentifier[],
    outputDir?: string,
    onProgress?: BatchProgressCallback
  ): Promise<DownloadResult>;
  getPatentInfo(patentNumber: PatentIdentifier): Promise<PatentRecord>;
}
