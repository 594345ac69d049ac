import type { Reference, SequenceFeature, SequenceRecord } from '../../domain/model/SequenceRecord.js';
import type { SequenceParser } from '../../domain/ports/SequenceParser.js';

type Section = 'header' | 'features' | 'origin';

interface ReferenceDraft {
  title: string;
  authors: string;
  journal: string;
}

type ReferenceField = keyof ReferenceDraft;

interface FeatureDraft {
  readonly type: string;
  location: string;
  readonly qualifiers: { readonly key: string; raw: string }[];
}

interface RecordDraft {
  readonly locus: string;
  definition: string;
  accession: string;
  version: string;
  section: Section;
  /** Header field that continuation lines (12-space indent) append to. */
  field: 'definition' | 'accession' | 'version' | ReferenceField | null;
  readonly references: ReferenceDraft[];
  readonly features: FeatureDraft[];
}

const KEYWORD_LINE = /^([A-Z][A-Z0-9_]*)(?:\s+(.*))?$/;
const SUB_KEYWORD_LINE = /^ {2,3}([A-Z]+)(?:\s+(.*))?$/;
const CONTINUATION_LINE = /^ {12}\s*(.*)$/;
const FEATURE_LINE = /^ {5}(\S+)\s+(\S.*)$/;
const QUALIFIER_LINE = /^ {21}(.*)$/;
const QUALIFIER = /^\/([^=]+)(?:=(.*))?$/;

const REFERENCE_FIELDS: Readonly<Record<string, ReferenceField>> = {
  AUTHORS: 'authors',
  TITLE: 'title',
  JOURNAL: 'journal',
};

function appendText(existing: string, addition: string): string {
  if (addition === '') return existing;
  return existing === '' ? addition : `${existing} ${addition}`;
}

function countQuotes(value: string): number {
  let count = 0;
  for (const ch of value) {
    if (ch === '"') count++;
  }
  return count;
}

/** A quoted qualifier value stays open until its quotes balance. */
function isQuoteOpen(raw: string): boolean {
  return raw.startsWith('"') && countQuotes(raw) % 2 === 1;
}

function unquote(raw: string): string {
  if (raw.length >= 2 && raw.startsWith('"') && raw.endsWith('"')) {
    return raw.slice(1, -1).replace(/""/g, '"');
  }
  return raw;
}

/**
 * GenBank flat-file parser (the `rettype=gb` payload of Entrez efetch, or a local `.gb` file).
 *
 * Zero dependencies. Reads the header fields needed downstream (DEFINITION,
 * ACCESSION, VERSION, REFERENCE) and every feature with its qualifiers; the
 * sequence itself is skipped. Records end with a `//` line.
 */
export class GenBankParser implements SequenceParser {
  readonly format = 'genbank';

  *parse(text: string): Iterable<SequenceRecord> {
    let draft: RecordDraft | null = null;
    let lineNumber = 0;

    for (const line of text.split(/\r?\n/)) {
      lineNumber++;

      if (line.startsWith('//')) {
        if (draft) yield this.build(draft);
        draft = null;
        continue;
      }

      if (line.startsWith('LOCUS')) {
        if (draft) {
          throw new Error(`GenBankParser: record '${draft.locus}' is not terminated by '//' (line ${String(lineNumber)})`);
        }
        draft = this.createDraft(line);
        continue;
      }

      if (!draft) {
        if (line.trim() === '') continue;
        throw new Error(`GenBankParser: expected a LOCUS line at line ${String(lineNumber)}`);
      }

      this.consumeLine(draft, line);
    }

    if (draft) {
      throw new Error(`GenBankParser: record '${draft.locus}' is not terminated by '//'`);
    }
  }

  private createDraft(line: string): RecordDraft {
    const locus = line.slice('LOCUS'.length).trim().split(/\s+/)[0] ?? '';
    return {
      locus,
      definition: '',
      accession: '',
      version: '',
      section: 'header',
      field: null,
      references: [],
      features: [],
    };
  }

  private consumeLine(draft: RecordDraft, line: string): void {
    if (line.trim() === '') return;

    const keyword = KEYWORD_LINE.exec(line);
    if (keyword) {
      this.startKeyword(draft, keyword[1] ?? '', (keyword[2] ?? '').trim());
      return;
    }

    switch (draft.section) {
      case 'origin':
        return;
      case 'features':
        this.consumeFeatureLine(draft, line);
        return;
      case 'header':
        this.consumeHeaderLine(draft, line);
        return;
    }
  }

  private startKeyword(draft: RecordDraft, keyword: string, value: string): void {
    draft.field = null;
    switch (keyword) {
      case 'DEFINITION':
        draft.definition = value;
        draft.field = 'definition';
        break;
      case 'ACCESSION':
        draft.accession = value;
        draft.field = 'accession';
        break;
      case 'VERSION':
        draft.version = value;
        draft.field = 'version';
        break;
      case 'REFERENCE':
        draft.references.push({ title: '', authors: '', journal: '' });
        break;
      case 'FEATURES':
        draft.section = 'features';
        break;
      case 'ORIGIN':
      case 'CONTIG':
        draft.section = 'origin';
        break;
      default:
        draft.section = draft.section === 'features' ? 'header' : draft.section;
    }
  }

  private consumeHeaderLine(draft: RecordDraft, line: string): void {
    const sub = SUB_KEYWORD_LINE.exec(line);
    if (sub) {
      const field = REFERENCE_FIELDS[sub[1] ?? ''];
      const reference = draft.references[draft.references.length - 1];
      if (field && reference) {
        reference[field] = (sub[2] ?? '').trim();
        draft.field = field;
      } else {
        draft.field = null;
      }
      return;
    }

    const continuation = CONTINUATION_LINE.exec(line);
    if (!continuation || draft.field === null) return;
    const text = (continuation[1] ?? '').trim();

    switch (draft.field) {
      case 'definition':
      case 'accession':
      case 'version':
        draft[draft.field] = appendText(draft[draft.field], text);
        break;
      default: {
        const reference = draft.references[draft.references.length - 1];
        if (reference) reference[draft.field] = appendText(reference[draft.field], text);
      }
    }
  }

  private consumeFeatureLine(draft: RecordDraft, line: string): void {
    const feature = FEATURE_LINE.exec(line);
    if (feature) {
      draft.features.push({ type: feature[1] ?? '', location: feature[2] ?? '', qualifiers: [] });
      return;
    }

    const qualifierLine = QUALIFIER_LINE.exec(line);
    const current = draft.features[draft.features.length - 1];
    if (!qualifierLine || !current) {
      throw new Error(`GenBankParser: malformed feature line '${line.trim()}' in record '${draft.locus}'`);
    }

    const content = (qualifierLine[1] ?? '').trim();
    const last = current.qualifiers[current.qualifiers.length - 1];

    if (content.startsWith('/') && !(last && isQuoteOpen(last.raw))) {
      const qualifier = QUALIFIER.exec(content);
      current.qualifiers.push({ key: qualifier?.[1] ?? content.slice(1), raw: qualifier?.[2] ?? '' });
    } else if (last) {
      last.raw = appendText(last.raw, content);
    } else {
      current.location += content;
    }
  }

  private build(draft: RecordDraft): SequenceRecord {
    const accession = draft.accession.split(/\s+/)[0] ?? '';
    const version = draft.version.split(/\s+/)[0] ?? '';
    const id = version || accession || draft.locus;
    const description = draft.definition.endsWith('.') ? draft.definition.slice(0, -1) : draft.definition;

    const features: SequenceFeature[] = draft.features.map((feature) => {
      const qualifiers: Record<string, string[]> = {};
      for (const { key, raw } of feature.qualifiers) {
        (qualifiers[key] ??= []).push(unquote(raw));
      }
      return { type: feature.type, location: feature.location, qualifiers };
    });

    const references: Reference[] = draft.references.map((ref) => ({ ...ref }));

    return { id, description, features, references };
  }
}
