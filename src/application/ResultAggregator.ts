import type { IsolationSourceRow } from '../domain/model/IsolationSourceRow.js';
import { reportHeader, rowCells } from '../domain/model/IsolationSourceRow.js';
import type { ReportWriter } from '../domain/ports/ReportWriter.js';
import { SourceHistogram } from '../domain/services/SourceHistogram.js';

/**
 * Streams report rows as they arrive and tallies isolation sources for the histogram.
 *
 * The report is opened (and its header written) on construction. The histogram
 * artifact is only opened by `finalize()`, so an aborted run leaves none behind.
 */
export class ResultAggregator {
  private readonly histogram = new SourceHistogram();
  private rowCount = 0;
  private histogramPath: string | null = null;

  constructor(
    private readonly report: ReportWriter,
    private readonly openHistogram: () => ReportWriter,
    private readonly includeReferences: boolean,
  ) {
    this.report.writeRow(reportHeader(includeReferences));
  }

  /** Append one row and count each of its isolation sources. */
  record(row: IsolationSourceRow): void {
    this.report.writeRow(rowCells(row, this.includeReferences));
    for (const source of row.isolationSources) {
      this.histogram.add(source);
    }
    this.rowCount++;
  }

  get rows(): number {
    return this.rowCount;
  }

  get reportPath(): string {
    return this.report.path;
  }

  /** Path of the written histogram, or `null` before `finalize()`. */
  get writtenHistogramPath(): string | null {
    return this.histogramPath;
  }

  counts(): SourceHistogram {
    return this.histogram;
  }

  /** Write the histogram sorted by descending count, then close both artifacts. */
  async finalize(): Promise<void> {
    const writer = this.openHistogram();
    try {
      for (const [source, count] of this.histogram.sorted()) {
        writer.writeRow([source, count]);
      }
      this.histogramPath = writer.path;
    } finally {
      await writer.close();
      await this.report.close();
    }
  }

  /** Close the report without writing the histogram. */
  async close(): Promise<void> {
    await this.report.close();
  }
}
