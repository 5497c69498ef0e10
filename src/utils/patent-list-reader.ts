// src/utils/patent-list-reader.ts
import * as fs from 'fs';
import csv from 'csv-parser';

/**
 * Read patent numbers from a CSV or plain text file.
 * The first column of every row is taken; blank values are skipped.
 */
export function readPatentNumbers(filePath: string, hasHeader = false): Promise<string[]> {
  return new Promise((resolve, reject) => {
    const patentNumbers: string[] = [];

    fs.createReadStream(filePath)
      .on('error', reject)
      .pipe(csv({ headers: false, skipLines: hasHeader ? 1 : 0 }))
      .on('data', (row: Record<string, string | undefined>) => {
        const value = (row['0'] ?? '').trim();
        if (value) {
          patentNumbers.push(value);
        }
      })
      .on('end', () => resolve(patentNumbers))
      .on('error', reject);
  });
}
