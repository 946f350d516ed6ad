/**
 * @fileoverview Minimal FASTA reader: the sequence of the first record.
 * @module src/utils/parsing/fastaParser
 */
import { JsonRpcErrorCode, McpError } from '@/types-global/errors.js';

/**
 * Returns the first record's sequence, its lines concatenated, whitespace
 * removed and upper-cased. Text without a header is read as a bare sequence.
 *
 * @throws {McpError} ParseError when no sequence characters are found.
 */
export function parseFastaSequence(text: string): string {
  const chunks: string[] = [];
  let headersSeen = 0;

  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (line.length === 0 || line.startsWith(';')) continue;
    if (line.startsWith('>')) {
      headersSeen++;
      if (headersSeen > 1) break;
      continue;
    }
    chunks.push(line.replace(/\s+/g, ''));
  }

  const sequence = chunks.join('').toUpperCase();
  if (sequence.length === 0) {
    throw new McpError(
      JsonRpcErrorCode.ParseError,
      'FASTA input contains no sequence',
    );
  }
  if (!/^[A-Z]+\*?$/.test(sequence)) {
    throw new McpError(
      JsonRpcErrorCode.ParseError,
      'FASTA sequence contains characters outside A-Z',
    );
  }
  return sequence.replace(/\*$/, '');
}
