import { createWriteStream } from 'node:fs';
import type { WriteStream } from 'node:fs';
import Papa from 'papaparse';
import type { ReportWriter } from '../../domain/ports/ReportWriter.js';

/** Row-by-row CSV file writer. Cells are quoted by PapaParse where needed. */
export class CsvReportWriter implements ReportWriter {
  readonly path: string;
  private readonly stream: WriteStream;
  private streamError: Error | null = null;
  private closing: Promise<void> | null = null;

  constructor(path: string) {
    this.path = path;
    this.stream = createWriteStream(path, { encoding: 'utf-8' });
    this.stream.on('error', (error) => {
      this.streamError = error;
    });
  }

  writeRow(cells: readonly (string | number)[]): void {
    if (this.closing) {
      throw new Error(`CsvReportWriter: ${this.path} is already closed`);
    }
    if (this.streamError) {
      throw this.streamError;
    }
    this.stream.write(`${Papa.unparse([cells.map(String)], { newline: '\n' })}\n`);
  }

  close(): Promise<void> {
    this.closing ??= new Promise<void>((resolve, reject) => {
      const settle = (): void => {
        if (this.streamError) reject(this.streamError);
        else resolve();
      };
      if (this.stream.closed) {
        settle();
        return;
      }
      this.stream.once('close', settle);
      this.stream.end();
    });
    return this.closing;
  }
}

/** Default writer factory used by the lookup facade. */
export function openCsvReport(path: string): ReportWriter {
  return new CsvReportWriter(path);
}
