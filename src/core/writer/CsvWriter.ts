// src/core/writer/CsvWriter.ts

import { promises as fs } from 'fs';
import { stringify } from 'csv-stringify';
import type { RaindropRow } from '../transformer/types';
import { RAINDROP_FIELDNAMES } from '../transformer/types';

/**
 * Render rows as CSV, header first. Fields holding the delimiter, a quote
 * or a line break are quoted with inner quotes doubled.
 */
export function renderCsv(rows: readonly RaindropRow[]): Promise<string> {
  return new Promise((resolve, reject) => {
    stringify(
      [...rows],
      {
        header: true,
        columns: [...RAINDROP_FIELDNAMES],
      },
      (error, output) => {
        if (error) {
          reject(error);
          return;
        }
        resolve(output);
      }
    );
  });
}

/**
 * Write rows to `outputPath`. The file appears only once fully written:
 * content goes to a temporary sibling that is then renamed over the target.
 */
export async function writeCsv(rows: readonly RaindropRow[], outputPath: string): Promise<void> {
  const content = await renderCsv(rows);
  const tempPath = `${outputPath}.${process.pid}.tmp`;

  try {
    await fs.writeFile(tempPath, content, 'utf-8');
    await fs.rename(tempPath, outputPath);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    throw error;
  }
}
