import type { ExtractedSource } from '../model/IsolationSourceRow.js';
import { NO_COUNTRY, NO_ISOLATION_SOURCE } from '../model/IsolationSourceRow.js';
import type { SequenceRecord } from '../model/SequenceRecord.js';

/** Qualifiers that were missing from the `source` feature and replaced by placeholders. */
export type MissingQualifier = 'isolation_source' | 'country';

export interface Extraction {
  readonly source: ExtractedSource;
  readonly missing: readonly MissingQualifier[];
}

/** Reads the isolation source and country from the first `source` feature of a record. */
export class SourceExtractor {
  constructor(private readonly includeReferences: boolean) {}

  /** `null` when the record has no `source` feature. */
  extract(record: SequenceRecord): Extraction | null {
    const feature = record.features.find((f) => f.type === 'source');
    if (!feature) return null;

    const missing: MissingQualifier[] = [];
    let isolationSources = feature.qualifiers['isolation_source'] ?? [];
    let countries = feature.qualifiers['country'] ?? [];

    if (isolationSources.length === 0) {
      isolationSources = [NO_ISOLATION_SOURCE];
      missing.push('isolation_source');
    }
    if (countries.length === 0) {
      countries = [NO_COUNTRY];
      missing.push('country');
    }

    const source: ExtractedSource = this.includeReferences
      ? { isolationSources, countries, references: record.references }
      : { isolationSources, countries };

    return { source, missing };
  }
}
