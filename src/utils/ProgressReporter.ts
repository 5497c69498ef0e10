// src/utils/ProgressReporter.ts
import { Writable } from 'stream';
import { BatchProgressCallback } from '../types/patent.types';

export interface ProgressReporterOptions {
  out?: NodeJS.WritableStream;
  err?: NodeJS.WritableStream;
  barLength?: number;
}

/**
 * Single-line console progress bar for batch downloads.
 *
 * Log output written through {@link ProgressReporter.stream} clears the bar first
 * and redraws it afterwards, so the two never interleave on one line.
 * Construct one per CLI run and hand it to whoever needs it.
 */
export class ProgressReporter {
  readonly stream: Writable;

  private readonly out: NodeJS.WritableStream;
  private readonly err: NodeJS.WritableStream;
  private readonly barLength: number;
  private currentLine = '';
  private active = false;

  constructor(options: ProgressReporterOptions = {}) {
    this.out = options.out ?? process.stdout;
    this.err = options.err ?? process.stderr;
    this.barLength = options.barLength ?? 40;

    this.stream = new Writable({
      write: (chunk, _encoding, callback) => {
        this.printAbove(String(chunk));
        callback();
      }
    });
  }

  get isActive(): boolean {
    return this.active;
  }

  start(total: number, current = 0): void {
    this.active = true;
    this.draw(this.formatLine(current, total));
  }

  update(current: number, total: number, patentNumber = '', success = true): void {
    if (this.active) {
      this.draw(this.formatLine(current, total, patentNumber, success));
    }
  }

  finish(): void {
    if (this.active) {
      this.clearLine();
      this.active = false;
      this.currentLine = '';
    }
  }

  /** Callback suitable for PatentDownloader.downloadPatents */
  asCallback(): BatchProgressCallback {
    return (completed, total, patentNumber, success) => this.update(completed, total, patentNumber, success);
  }

  formatLine(current: number, total: number, patentNumber = '', success = true): string {
    if (total <= 0) {
      return `\rProgress: ${current} processed`;
    }

    const percentage = Math.floor((current / total) * 100);
    const filled = Math.floor((this.barLength * current) / total);
    const bar = '█'.repeat(filled) + '░'.repeat(this.barLength - filled);

    const status = patentNumber ? (success ? ' ✅' : ' ❌') : '';
    const patentInfo = patentNumber ? ` [${patentNumber}]${status}` : '';

    return `\r▶️ ${bar} ${percentage}% (${current}/${total})${patentInfo}`;
  }

  private draw(line: string): void {
    this.currentLine = line;
    this.out.write(line);
  }

  private printAbove(text: string): void {
    if (this.active) {
      this.clearLine();
    }

    this.err.write(text.endsWith('\n') ? text : `${text}\n`);

    if (this.active) {
      this.out.write(this.currentLine);
    }
  }

  private clearLine(): void {
    // the leading \r is part of currentLine, so its length covers the whole drawn line
    this.out.write(`\r${' '.repeat(this.currentLine.length)}\r`);
  }
}
