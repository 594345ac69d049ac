import type { SequenceRecord } from '../../domain/model/SequenceRecord.js';
import { createSequenceRecord } from '../../domain/model/SequenceRecord.js';
import type { SequenceParser } from '../../domain/ports/SequenceParser.js';

/**
 * FASTA parser. Only headers matter here, so sequence lines are skipped.
 *
 * The record id is the first token of the header and the description is the
 * whole header line, e.g. `AB000001.1.1500 Bacteria;Proteobacteria`.
 */
export class FastaParser implements SequenceParser {
  readonly format = 'fasta';

  *parse(text: string): Iterable<SequenceRecord> {
    let sawHeader = false;

    for (const rawLine of text.split(/\r?\n/)) {
      const line = rawLine.trim();
      if (line === '' || line.startsWith(';')) continue;

      if (line.startsWith('>')) {
        sawHeader = true;
        const description = line.slice(1).trim();
        const id = description.split(/\s+/)[0] ?? '';
        yield createSequenceRecord(id, description);
      } else if (!sawHeader) {
        throw new Error('FastaParser: sequence data found before the first ">" header');
      }
    }
  }
}
