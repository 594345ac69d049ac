/** A literature reference attached to a sequence record. Missing parts are empty strings. */
export interface Reference {
  readonly title: string;
  readonly authors: string;
  readonly journal: string;
}

/** An annotated feature (e.g. `source`, `gene`, `CDS`) with its qualifiers. */
export interface SequenceFeature {
  readonly type: string;
  readonly location: string;
  /** Qualifier values keyed by name. A qualifier may repeat, so each key maps to a list. */
  readonly qualifiers: Readonly<Record<string, readonly string[]>>;
}

/**
 * A parsed sequence record, either read from a local file or fetched from Entrez.
 *
 * Local FASTA records carry no features or references; GenBank records carry both.
 */
export interface SequenceRecord {
  /** Record identifier (FASTA: first header token; GenBank: accession.version). */
  readonly id: string;
  /** Free-text description line. */
  readonly description: string;
  readonly features: readonly SequenceFeature[];
  readonly references: readonly Reference[];
}

/** A record returned by the remote service for one batch. */
export type RemoteRecord = SequenceRecord;

/** Create a record with no features or references. */
export function createSequenceRecord(id: string, description: string): SequenceRecord {
  return { id, description, features: [], references: [] };
}
