import type { SequenceRecord } from '../model/SequenceRecord.js';

/**
 * Port for turning the text of a sequence file into records.
 *
 * Implement this interface to support new sequence formats (FASTA, GenBank, etc.).
 */
export interface SequenceParser {
  /** Format name, used in diagnostics. */
  readonly format: string;
  /** Parse a whole file's text into records. Throws on malformed input. */
  parse(text: string): Iterable<SequenceRecord>;
}
