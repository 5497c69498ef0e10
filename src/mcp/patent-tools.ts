// src/mcp/patent-tools.ts
import * as path from 'path';
import { z } from 'zod';
import { PatentService } from '../types/patent.types';
import { PatentDownloadError, describeError } from '../utils/errors';
import { Logger } from '../utils/logger';
import { formatPatentInfo, summarizeDownloads } from '../utils/formatters';

// ─────────────────────────────────────────────────────────────────────────────
// Tool input schemas
// ─────────────────────────────────────────────────────────────────────────────

export const downloadPatentShape = {
  patent_number: z.string().describe("The patent number to download (e.g., 'WO2013078254A1')"),
  output_dir: z.string().optional().describe('Directory to save the PDF file (default: current directory)')
};

export const downloadPatentsShape = {
  patent_numbers: z.array(z.string()).describe('List of patent numbers to download'),
  output_dir: z.string().optional().describe('Directory to save the PDF files (default: current directory)')
};

export const getPatentInfoShape = {
  patent_number: z.string().describe('The patent number to get information for')
};

export type ToolResult = {
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
};

function textResult(text: string, isError = false): ToolResult {
  return isError ? { content: [{ type: 'text', text }], isError } : { content: [{ type: 'text', text }] };
}

// ─────────────────────────────────────────────────────────────────────────────
// Handlers
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Tool handlers delegating to a PatentService. Each returns a text result;
 * failures are reported with isError rather than thrown.
 */
export class PatentToolHandlers {
  private readonly service: PatentService;
  private readonly logger: Logger;

  constructor(service: PatentService, logger: Logger = new Logger('PatentTools')) {
    this.service = service;
    this.logger = logger;
  }

  async downloadPatent(args: { patent_number?: string; output_dir?: string }): Promise<ToolResult> {
    const patentNumber = args.patent_number;
    const outputDir = args.output_dir || '.';

    if (!patentNumber) {
      return textResult('Error: patent_number is required', true);
    }

    try {
      const success = await this.service.downloadPatent(patentNumber, outputDir);
      if (success) {
        const outputPath = path.join(outputDir, `${patentNumber}.pdf`);
        return textResult(`Successfully downloaded patent ${patentNumber} to ${outputPath}`);
      }
      return textResult(`Failed to download patent ${patentNumber}`, true);
    } catch (error) {
      return this.failure('download_patent', 'Download error', error);
    }
  }

  async downloadPatents(args: { patent_numbers?: string[]; output_dir?: string }): Promise<ToolResult> {
    const patentNumbers = args.patent_numbers ?? [];
    const outputDir = args.output_dir || '.';

    if (patentNumbers.length === 0) {
      return textResult('Error: patent_numbers is required', true);
    }

    try {
      const results = await this.service.downloadPatents(patentNumbers, outputDir);
      const summary = summarizeDownloads(results);
      return textResult(summary.lines.join('\n'), summary.failed.length > 0);
    } catch (error) {
      return this.failure('download_patents', 'Download error', error);
    }
  }

  async getPatentInfo(args: { patent_number?: string }): Promise<ToolResult> {
    const patentNumber = args.patent_number;

    if (!patentNumber) {
      return textResult('Error: patent_number is required', true);
    }

    try {
      const record = await this.service.getPatentInfo(patentNumber);
      return textResult(formatPatentInfo(record).join('\n'));
    } catch (error) {
      return this.failure('get_patent_info', 'Error retrieving patent info', error);
    }
  }

  private failure(toolName: string, label: string, error: unknown): ToolResult {
    this.logger.error(`Error handling tool call ${toolName}`, error);
    if (error instanceof PatentDownloadError) {
      return textResult(`${label}: ${error.message}`, true);
    }
    return textResult(`Error: ${describeError(error)}`, true);
  }
}
