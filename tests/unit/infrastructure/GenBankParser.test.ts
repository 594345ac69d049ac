import { describe, it, expect } from 'vitest';
import { readFileSync } from 'node:fs';
import { GenBankParser } from '../../../src/infrastructure/parsers/GenBankParser.js';
import { genbankRecord } from '../../helpers.js';

const parser = new GenBankParser();
const fixture = readFileSync(new URL('../../fixtures/AB000001.gb', import.meta.url), 'utf-8');

describe('GenBankParser', () => {
  it('should read the identifier and the definition without its final period', () => {
    const [record] = [...parser.parse(fixture)];

    expect(record?.id).toBe('AB000001.1');
    expect(record?.description).toBe('Uncultured bacterium gene for 16S rRNA, partial sequence, clone: A1');
  });

  it('should read references with continuation lines', () => {
    const [record] = [...parser.parse(fixture)];

    expect(record?.references).toEqual([
      { title: 'Microbial diversity of a hot spring sediment', authors: 'Doe,J. and Roe,R.', journal: 'Unpublished' },
      {
        title: 'Direct Submission',
        authors: 'Doe,J.',
        journal: 'Submitted (01-JAN-2020) Dept. Biology, Example University',
      },
    ]);
  });

  it('should read features with multi-line and escaped qualifier values', () => {
    const [record] = [...parser.parse(fixture)];

    expect(record?.features).toEqual([
      {
        type: 'source',
        location: '1..1500',
        qualifiers: {
          organism: ['uncultured bacterium'],
          mol_type: ['genomic DNA'],
          isolation_source: ['hot spring sediment collected at 45 degrees'],
          country: ['Japan: Beppu'],
          note: ['called "clone A1"'],
          environmental_sample: [''],
        },
      },
      { type: 'rRNA', location: '<1..>1500', qualifiers: { product: ['16S ribosomal RNA'] } },
    ]);
  });

  it('should collect repeated qualifiers in order', () => {
    const text = genbankRecord({
      accession: 'AB000002',
      definition: 'clone B2',
      isolationSource: ['biofilm', 'pipe wall'],
      country: ['Spain'],
    });
    const [record] = [...parser.parse(text)];

    expect(record?.features[0]?.qualifiers['isolation_source']).toEqual(['biofilm', 'pipe wall']);
  });

  it('should parse consecutive records', () => {
    const text = [
      genbankRecord({ accession: 'AB000001', definition: 'clone A1' }),
      '\n',
      genbankRecord({ accession: 'AB000002', definition: 'clone A2', noSource: true }),
    ].join('');

    const records = [...parser.parse(text)];

    expect(records.map((r) => r.id)).toEqual(['AB000001.1', 'AB000002.1']);
    expect(records[1]?.features.map((f) => f.type)).toEqual(['rRNA']);
  });

  it('should fall back to the accession, then the locus name, for the identifier', () => {
    const noVersion = 'LOCUS       LOC1   10 bp    DNA\nACCESSION   AB000003 AB000004\nFEATURES             Location/Qualifiers\n//\n';
    const bare = 'LOCUS       LOC2   10 bp    DNA\n//\n';

    expect([...parser.parse(noVersion + bare)].map((r) => r.id)).toEqual(['AB000003', 'LOC2']);
  });

  it('should return nothing for empty input', () => {
    expect([...parser.parse('\n\n')]).toEqual([]);
  });

  it('should reject text that does not start with a LOCUS line', () => {
    expect(() => [...parser.parse('<html>Service unavailable</html>')]).toThrow(
      'GenBankParser: expected a LOCUS line at line 1',
    );
  });

  it('should reject a record without its // terminator', () => {
    expect(() => [...parser.parse('LOCUS       LOC1   10 bp    DNA\nDEFINITION  cut short.\n')]).toThrow(
      "GenBankParser: record 'LOC1' is not terminated by '//'",
    );
    expect(() => [...parser.parse('LOCUS       LOC1\nLOCUS       LOC2\n//\n')]).toThrow(
      "GenBankParser: record 'LOC1' is not terminated by '//' (line 2)",
    );
  });

  it('should reject a malformed feature table line', () => {
    const text = 'LOCUS       LOC1\nFEATURES             Location/Qualifiers\n   broken\n//\n';

    expect(() => [...parser.parse(text)]).toThrow("GenBankParser: malformed feature line 'broken' in record 'LOC1'");
  });
});
