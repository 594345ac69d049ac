export type SequenceFormat = 'fasta' | 'genbank';

/** Detect the sequence format from a file name or path based on its extension. `null` when unknown. */
export function detectSequenceFormat(fileNameOrPath: string): SequenceFormat | null {
  const ext = fileNameOrPath.split('.').pop()?.toLowerCase();
  switch (ext) {
    case 'fa':
    case 'fas':
    case 'fasta':
    case 'fna':
    case 'faa':
    case 'ffn':
    case 'fsa':
    case 'aln':
      return 'fasta';
    case 'gb':
    case 'gbk':
    case 'genbank':
      return 'genbank';
    default:
      return null;
  }
}
