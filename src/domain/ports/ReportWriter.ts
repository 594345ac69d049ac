/** Port for a row-oriented output artifact (a CSV file in production). */
export interface ReportWriter {
  /** Location of the artifact, for reporting. */
  readonly path: string;
  writeRow(cells: readonly (string | number)[]): void;
  /** Flush and release the underlying resource. Safe to call more than once. */
  close(): Promise<void>;
}

/** Opens a writer for `path`, truncating any previous content. */
export type ReportWriterFactory = (path: string) => ReportWriter;
