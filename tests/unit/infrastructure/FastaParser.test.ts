import { describe, it, expect } from 'vitest';
import { FastaParser } from '../../../src/infrastructure/parsers/FastaParser.js';

const parser = new FastaParser();

describe('FastaParser', () => {
  it('should turn every header into a record with the header as description', () => {
    const records = [
      ...parser.parse('>AB000001.1.1500 Bacteria;Proteobacteria\nACGU\nACGU\n>X12345.1.900 Bacteria;Firmicutes\nGGCC\n'),
    ];

    expect(records).toEqual([
      { id: 'AB000001.1.1500', description: 'AB000001.1.1500 Bacteria;Proteobacteria', features: [], references: [] },
      { id: 'X12345.1.900', description: 'X12345.1.900 Bacteria;Firmicutes', features: [], references: [] },
    ]);
  });

  it('should accept CRLF line endings, blank lines and comment lines', () => {
    const records = [...parser.parse('; exported\r\n\r\n>AB000001 clone\r\nACGT\r\n')];

    expect(records.map((r) => r.description)).toEqual(['AB000001 clone']);
  });

  it('should return nothing for empty input', () => {
    expect([...parser.parse('')]).toEqual([]);
  });

  it('should reject sequence data before the first header', () => {
    expect(() => [...parser.parse('ACGT\n>AB000001 clone\n')]).toThrow(
      'FastaParser: sequence data found before the first ">" header',
    );
  });
});
