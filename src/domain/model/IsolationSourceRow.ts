import type { Reference } from './SequenceRecord.js';

/** Placeholder written when a `source` feature has no `isolation_source` qualifier. */
export const NO_ISOLATION_SOURCE = 'NO ISOLATION SOURCE';

/** Placeholder written when a `source` feature has no `country` qualifier. */
export const NO_COUNTRY = 'NO COUNTRY';

/** Separator between multiple qualifier values in one CSV cell. */
export const VALUE_SEPARATOR = '; ';

/** Separator between the title, authors and journal of one reference. */
export const REFERENCE_PART_SEPARATOR = ' | ';

/** Separator between references. */
export const REFERENCE_SEPARATOR = ' || ';

/** What the source extractor pulls out of one remote record. */
export interface ExtractedSource {
  readonly isolationSources: readonly string[];
  readonly countries: readonly string[];
  /** Present only when references are requested. */
  readonly references?: readonly Reference[];
}

/** One report row. Order of rows follows fetch order. */
export interface IsolationSourceRow {
  readonly description: string;
  readonly accession: string;
  readonly isolationSources: readonly string[];
  readonly countries: readonly string[];
  readonly references?: readonly Reference[];
}

/** Join the non-empty parts of each reference, then join the references. */
export function formatReferences(references: readonly Reference[]): string {
  return references
    .map((ref) => [ref.title, ref.authors, ref.journal].filter((part) => part !== '').join(REFERENCE_PART_SEPARATOR))
    .filter((text) => text !== '')
    .join(REFERENCE_SEPARATOR);
}

/** Report header. `REFERENCES` is dropped when references are suppressed. */
export function reportHeader(includeReferences: boolean): readonly string[] {
  const header = ['DESCRIPTION', 'ACCESSION', 'ISOLATION SOURCE', 'COUNTRY'];
  return includeReferences ? [...header, 'REFERENCES'] : header;
}

/** Cells of one report row, aligned with `reportHeader()`. */
export function rowCells(row: IsolationSourceRow, includeReferences: boolean): readonly string[] {
  const cells = [
    row.description,
    row.accession,
    row.isolationSources.join(VALUE_SEPARATOR),
    row.countries.join(VALUE_SEPARATOR),
  ];
  return includeReferences ? [...cells, formatReferences(row.references ?? [])] : cells;
}
