/** Entrez databases an accession can be looked up in. */
export const Database = {
  NUCLEOTIDE: 'nucleotide',
  PROTEIN: 'protein',
} as const;

export type Database = (typeof Database)[keyof typeof Database];

/** Accession number families recognised in description lines. */
export const AccessionKind = {
  NUCLEOTIDE: 'nucleotide',
  PROTEIN: 'protein',
  WGS: 'wgs',
  UNIPROT: 'uniprot',
  REFSEQ_NUCLEOTIDE: 'refseq_nucleotide',
  REFSEQ_PROTEIN: 'refseq_protein',
} as const;

export type AccessionKind = (typeof AccessionKind)[keyof typeof AccessionKind];

/** One entry of the ordered classification table. */
export interface AccessionRule {
  readonly kind: AccessionKind;
  /** Human-readable shape of the accession, used in skip diagnostics. */
  readonly format: string;
  readonly pattern: RegExp;
}

/**
 * Ordered rule table. Classification walks it top to bottom and the first rule
 * that matches wins. The families are near-disjoint, but a six-character
 * accession such as `P12345` is both a GenBank and a UniProt accession and
 * resolves to `nucleotide` because that rule comes first.
 */
export const ACCESSION_RULES: readonly AccessionRule[] = [
  {
    kind: AccessionKind.NUCLEOTIDE,
    format: 'GenBank nucleotide (A12345, AB123456, AB12345678)',
    pattern: /\b(?:[A-Z]\d{5}|[A-Z]{2}\d{6}|[A-Z]{2}\d{8})\b/,
  },
  {
    kind: AccessionKind.PROTEIN,
    format: 'GenBank protein (ABC12345, ABC1234567)',
    pattern: /\b(?:[A-Z]{3}\d{5}|[A-Z]{3}\d{7})\b/,
  },
  {
    kind: AccessionKind.WGS,
    format: 'whole genome shotgun (ABCD01000001, ABCDEF010000001)',
    pattern: /\b(?:[A-Z]{4}\d{8,10}|[A-Z]{6}\d{9,11})\b/,
  },
  {
    kind: AccessionKind.UNIPROT,
    format: 'UniProt (P12345, A0A023GPI8)',
    pattern: /\b(?:[OPQ]\d[A-Z0-9]{3}\d|[A-NR-Z]\d(?:[A-Z][A-Z0-9]{2}\d){1,2})\b/,
  },
  {
    kind: AccessionKind.REFSEQ_NUCLEOTIDE,
    format: 'RefSeq nucleotide (NC_000913, NZ_CP012345)',
    pattern: /\b(?:AC|NC|NG|NT|NW|NZ|NM|NR|XM|XR)_[A-Z]{0,4}\d+\b/,
  },
  {
    kind: AccessionKind.REFSEQ_PROTEIN,
    format: 'RefSeq protein (NP_000001, WP_012345678)',
    pattern: /\b(?:AP|NP|YP|XP|WP)_\d+\b/,
  },
];

/** Database each accession family is stored in. */
export const DATABASE_BY_KIND: Readonly<Record<AccessionKind, Database>> = {
  [AccessionKind.NUCLEOTIDE]: Database.NUCLEOTIDE,
  [AccessionKind.PROTEIN]: Database.PROTEIN,
  [AccessionKind.WGS]: Database.NUCLEOTIDE,
  [AccessionKind.UNIPROT]: Database.PROTEIN,
  [AccessionKind.REFSEQ_NUCLEOTIDE]: Database.NUCLEOTIDE,
  [AccessionKind.REFSEQ_PROTEIN]: Database.PROTEIN,
};

/** An accession found in a description line, tagged with its family and database. */
export interface ClassifiedIdentifier {
  readonly accession: string;
  readonly kind: AccessionKind;
  readonly database: Database;
}

/** Type guard for user-supplied database names. */
export function isDatabase(value: string): value is Database {
  return value === Database.NUCLEOTIDE || value === Database.PROTEIN;
}
