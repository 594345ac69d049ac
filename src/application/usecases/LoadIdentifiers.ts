import type { ClassifiedIdentifier, Database } from '../../domain/model/Accession.js';
import type { SequenceRecord } from '../../domain/model/SequenceRecord.js';
import type { SequenceParser } from '../../domain/ports/SequenceParser.js';
import { IdentifierClassifier } from '../../domain/services/IdentifierClassifier.js';
import type { SequenceFormat } from '../../infrastructure/detectSequenceFormat.js';
import { detectSequenceFormat } from '../../infrastructure/detectSequenceFormat.js';
import { FastaParser } from '../../infrastructure/parsers/FastaParser.js';
import { GenBankParser } from '../../infrastructure/parsers/GenBankParser.js';
import { FilePathSource } from '../../infrastructure/sources/FilePathSource.js';
import type { RunContext } from '../RunContext.js';
import { publish } from '../RunContext.js';

export interface LoadedIdentifiers {
  /** Sequences read across all files that could be parsed. */
  readonly records: number;
  /** Identifiers for the target database, in input order. */
  readonly identifiers: readonly ClassifiedIdentifier[];
}

interface InputFormat {
  createParser(): SequenceParser;
  /** The record as classified: its description must read like a FASTA header. */
  asHeader(record: SequenceRecord): SequenceRecord;
}

const INPUT_FORMATS: Readonly<Record<SequenceFormat, InputFormat>> = {
  fasta: {
    createParser: () => new FastaParser(),
    asHeader: (record) => record,
  },
  genbank: {
    createParser: () => new GenBankParser(),
    // DEFINITION lines rarely carry the accession, so prefix the record id
    asHeader: (record) => ({ ...record, description: `${record.id} ${record.description}` }),
  },
};

/** Use case: read the sequence files and find an accession in every description. */
export class LoadIdentifiers {
  constructor(
    private readonly ctx: RunContext,
    private readonly classifier: IdentifierClassifier = new IdentifierClassifier(),
  ) {}

  async execute(paths: readonly string[], database: Database): Promise<LoadedIdentifiers> {
    const records: SequenceRecord[] = [];

    for (const path of paths) {
      const loaded = await this.loadFile(path);
      if (loaded) {
        records.push(...loaded);
        this.ctx.files++;
        publish(this.ctx, { type: 'file:loaded', path, sequences: loaded.length });
      }
    }
    this.ctx.sequences = records.length;

    const { identifiers, skipped } = this.classifier.filter(records, database);
    const supportedFormats = this.classifier.supportedFormats(database);

    for (const { record, reason, identifier } of skipped) {
      publish(this.ctx, {
        type: 'identifier:skipped',
        recordId: record.id,
        description: record.description,
        reason,
        ...(identifier ? { kind: identifier.kind } : {}),
        database,
        supportedFormats,
      });
    }

    this.ctx.identifiers = identifiers.length;
    this.ctx.skipped = skipped.length;

    return { records: records.length, identifiers };
  }

  /** `null` when the file was skipped. */
  private async loadFile(path: string): Promise<SequenceRecord[] | null> {
    const format = detectSequenceFormat(path);
    if (!format) {
      publish(this.ctx, {
        type: 'file:skipped',
        path,
        error: 'unknown sequence format (expected a FASTA or GenBank file extension)',
      });
      return null;
    }

    try {
      const text = await new FilePathSource(path).text();
      const input = INPUT_FORMATS[format];
      return [...input.createParser().parse(text)].map((record) => input.asHeader(record));
    } catch (error) {
      publish(this.ctx, {
        type: 'file:skipped',
        path,
        error: error instanceof Error ? error.message : String(error),
      });
      return null;
    }
  }
}
