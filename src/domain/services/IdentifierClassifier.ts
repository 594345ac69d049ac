import type { AccessionRule, ClassifiedIdentifier, Database } from '../model/Accession.js';
import { ACCESSION_RULES, DATABASE_BY_KIND } from '../model/Accession.js';
import type { SequenceRecord } from '../model/SequenceRecord.js';

/** A sequence whose description did not yield an identifier for the target database. */
export interface SkippedSequence {
  readonly record: SequenceRecord;
  readonly reason: 'unrecognized' | 'database-mismatch';
  /** The identifier that was found but belongs to another database. */
  readonly identifier?: ClassifiedIdentifier;
}

export interface ClassificationResult {
  /** Identifiers for the target database, in input order. */
  readonly identifiers: readonly ClassifiedIdentifier[];
  readonly skipped: readonly SkippedSequence[];
}

/**
 * Domain service that finds accession numbers in free-text description lines.
 *
 * Pure logic: rules are tried in table order and the first one that matches wins.
 */
export class IdentifierClassifier {
  constructor(private readonly rules: readonly AccessionRule[] = ACCESSION_RULES) {}

  /** Find the first accession in `description`, or `null` when no rule matches. */
  classify(description: string): ClassifiedIdentifier | null {
    for (const rule of this.rules) {
      const match = rule.pattern.exec(description);
      if (match) {
        return {
          accession: match[0],
          kind: rule.kind,
          database: DATABASE_BY_KIND[rule.kind],
        };
      }
    }
    return null;
  }

  /** Classify every record and keep the identifiers that belong to `database`. */
  filter(records: Iterable<SequenceRecord>, database: Database): ClassificationResult {
    const identifiers: ClassifiedIdentifier[] = [];
    const skipped: SkippedSequence[] = [];

    for (const record of records) {
      const identifier = this.classify(record.description);
      if (!identifier) {
        skipped.push({ record, reason: 'unrecognized' });
      } else if (identifier.database !== database) {
        skipped.push({ record, reason: 'database-mismatch', identifier });
      } else {
        identifiers.push(identifier);
      }
    }

    return { identifiers, skipped };
  }

  /** Formats of the rules whose accessions belong to `database`. */
  supportedFormats(database: Database): readonly string[] {
    return this.rules.filter((rule) => DATABASE_BY_KIND[rule.kind] === database).map((rule) => rule.format);
  }
}
