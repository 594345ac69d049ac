import type { Database } from '../src/domain/model/Accession.js';
import type {
  ContinuationContext,
  RecordStream,
  SearchResult,
  SequenceDatabaseClient,
} from '../src/domain/ports/SequenceDatabaseClient.js';
import type { ReportWriter } from '../src/domain/ports/ReportWriter.js';

export interface GenBankFixture {
  readonly accession: string;
  readonly definition: string;
  readonly isolationSource?: readonly string[];
  readonly country?: readonly string[];
  /** Omit the `source` feature entirely. */
  readonly noSource?: boolean;
  readonly references?: readonly { title?: string; authors?: string; journal?: string }[];
}

const QUALIFIER_INDENT = ' '.repeat(21);

/** Render a minimal, column-correct GenBank flat-file record. */
export function genbankRecord(fixture: GenBankFixture): string {
  const lines = [
    `LOCUS       ${fixture.accession}               1500 bp    DNA     linear   BCT 01-JAN-2020`,
    `DEFINITION  ${fixture.definition}.`,
    `ACCESSION   ${fixture.accession}`,
    `VERSION     ${fixture.accession}.1`,
  ];

  (fixture.references ?? []).forEach((ref, i) => {
    lines.push(`REFERENCE   ${String(i + 1)}  (bases 1 to 1500)`);
    if (ref.authors !== undefined) lines.push(`  AUTHORS   ${ref.authors}`);
    if (ref.title !== undefined) lines.push(`  TITLE     ${ref.title}`);
    if (ref.journal !== undefined) lines.push(`  JOURNAL   ${ref.journal}`);
  });

  lines.push('FEATURES             Location/Qualifiers');
  if (!fixture.noSource) {
    lines.push('     source          1..1500');
    lines.push(`${QUALIFIER_INDENT}/organism="uncultured bacterium"`);
    for (const value of fixture.isolationSource ?? []) {
      lines.push(`${QUALIFIER_INDENT}/isolation_source="${value}"`);
    }
    for (const value of fixture.country ?? []) {
      lines.push(`${QUALIFIER_INDENT}/country="${value}"`);
    }
  }
  lines.push('     rRNA            1..1500');
  lines.push(`${QUALIFIER_INDENT}/product="16S ribosomal RNA"`);
  lines.push('ORIGIN      ');
  lines.push('        1 agagtttgat cctggctcag');
  lines.push('//');
  return `${lines.join('\n')}\n`;
}

/** Sequential GenBank-style accessions: `AB000000`, `AB000001`, ... */
export function accessions(count: number, offset = 0): string[] {
  return Array.from({ length: count }, (_, i) => `AB${String(i + offset).padStart(6, '0')}`);
}

/** Fake database holding one record with a `source` feature per accession. */
export function databaseOf(ids: readonly string[], isolationSource = 'soil'): FakeSequenceDatabase {
  return new FakeSequenceDatabase(
    new Map(
      ids.map((accession): [string, string] => [
        accession,
        genbankRecord({
          accession,
          definition: `Uncultured bacterium clone ${accession}`,
          isolationSource: [isolationSource],
          country: ['Chile'],
        }),
      ]),
    ),
  );
}

/** A FASTA file with one header per description and a short sequence line. */
export function fasta(descriptions: readonly string[]): string {
  return descriptions.map((d) => `>${d}\nACGTACGTACGT\n`).join('');
}

/** Stream stand-in that records whether it was closed. `failure` is thrown after the chunks. */
export class StringRecordStream implements RecordStream {
  closed = false;

  constructor(
    private readonly chunks: readonly string[],
    private readonly failure: Error | null = null,
  ) {}

  async *read(): AsyncIterable<string> {
    for (const chunk of this.chunks) {
      await Promise.resolve();
      yield chunk;
    }
    if (this.failure) throw this.failure;
  }

  close(): Promise<void> {
    this.closed = true;
    return Promise.resolve();
  }
}

/**
 * In-memory Entrez stand-in. `records` maps accessions to GenBank text; a search
 * returns the accessions of the query that have a record, and the fetch streams them.
 */
export class FakeSequenceDatabase implements SequenceDatabaseClient {
  readonly searches: string[] = [];
  readonly streams: StringRecordStream[] = [];
  private searchFailures = 0;
  private fetchFailures = 0;
  private stalledFetches = 0;
  private fetchPayload: string | null = null;
  private brokenAccession: string | null = null;

  constructor(private readonly records: ReadonlyMap<string, string> = new Map()) {}

  /** Make the next `count` searches throw. */
  failSearches(count: number): this {
    this.searchFailures = count;
    return this;
  }

  /** Make the next `count` fetches throw. */
  failFetches(count: number): this {
    this.fetchFailures = count;
    return this;
  }

  /** Make the bodies of the next `count` fetches break off after the first line. */
  stallFetches(count: number): this {
    this.stalledFetches = count;
    return this;
  }

  /** Make every search whose query names `accession` throw. */
  breakOn(accession: string): this {
    this.brokenAccession = accession;
    return this;
  }

  /** Replace every fetched payload with `payload`. */
  respondWith(payload: string): this {
    this.fetchPayload = payload;
    return this;
  }

  search(_database: Database, query: string): Promise<SearchResult> {
    this.searches.push(query);
    if (this.searchFailures > 0) {
      this.searchFailures--;
      return Promise.reject(new Error('HTTP 503 Service Unavailable'));
    }
    if (this.brokenAccession !== null && query.includes(`${this.brokenAccession}[accn]`)) {
      return Promise.reject(new Error('HTTP 500 Internal Server Error'));
    }
    const ids = [...query.matchAll(/(\S+)\[accn\]/g)]
      .map((m) => m[1] ?? '')
      .filter((accession) => this.records.has(accession));
    return Promise.resolve({
      count: ids.length,
      ids,
      context: { webEnv: 'MCID_test', queryKey: ids.join(',') },
    });
  }

  fetch(_database: Database, context: ContinuationContext): Promise<RecordStream> {
    if (this.fetchFailures > 0) {
      this.fetchFailures--;
      return Promise.reject(new Error('socket hang up'));
    }
    const payload =
      this.fetchPayload ??
      context.queryKey
        .split(',')
        .map((accession) => this.records.get(accession) ?? '')
        .join('');
    let stream = new StringRecordStream([payload]);
    if (this.stalledFetches > 0) {
      this.stalledFetches--;
      const firstLine = payload.slice(0, payload.indexOf('\n') + 1);
      stream = new StringRecordStream([firstLine], new Error('EntrezClient: efetch timed out after 50 ms'));
    }
    this.streams.push(stream);
    return Promise.resolve(stream);
  }
}

/** Report writer that keeps its rows in memory. */
export class MemoryReportWriter implements ReportWriter {
  readonly rows: (readonly (string | number)[])[] = [];
  closed = false;

  constructor(readonly path: string) {}

  writeRow(cells: readonly (string | number)[]): void {
    this.rows.push([...cells]);
  }

  close(): Promise<void> {
    this.closed = true;
    return Promise.resolve();
  }
}

/** Writer factory that remembers every writer it opened, by path. */
export function memoryWriters(): {
  readonly writers: Map<string, MemoryReportWriter>;
  readonly open: (path: string) => MemoryReportWriter;
} {
  const writers = new Map<string, MemoryReportWriter>();
  return {
    writers,
    open: (path: string) => {
      const writer = new MemoryReportWriter(path);
      writers.set(path, writer);
      return writer;
    },
  };
}
