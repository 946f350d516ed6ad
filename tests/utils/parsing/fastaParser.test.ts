/**
 * @fileoverview Unit tests for the FASTA sequence reader.
 * @module tests/utils/parsing/fastaParser.test
 */
import { describe, expect, it } from 'vitest';

import { JsonRpcErrorCode } from '@/types-global/errors.js';
import { parseFastaSequence } from '@/utils/parsing/fastaParser.js';

describe('parseFastaSequence', () => {
  it('joins the lines of the first record', () => {
    expect(parseFastaSequence('>sp|P12345|TEST\nACDEF\nGHIKL\n')).toBe('ACDEFGHIKL');
  });

  it('stops at the second record', () => {
    expect(parseFastaSequence('>one\nACD\n>two\nWWW\n')).toBe('ACD');
  });

  it('upper-cases, drops comments and whitespace, and strips the terminator', () => {
    expect(parseFastaSequence(';comment\r\n>x\r\nac de\r\nfg*\r\n')).toBe('ACDEFG');
  });

  it('reads a bare sequence without header', () => {
    expect(parseFastaSequence('MKV\n')).toBe('MKV');
  });

  it.each([
    ['', 'empty input'],
    ['>header only\n', 'header without sequence'],
  ])('rejects %j (%s)', (text) => {
    expect(() => parseFastaSequence(text)).toThrow(
      expect.objectContaining({
        code: JsonRpcErrorCode.ParseError,
        message: 'FASTA input contains no sequence',
      }),
    );
  });

  it('rejects gaps and digits in the sequence', () => {
    expect(() => parseFastaSequence('>x\nAC-DE\n')).toThrow(
      'FASTA sequence contains characters outside A-Z',
    );
    expect(() => parseFastaSequence('>x\nAC1DE\n')).toThrow(
      expect.objectContaining({ code: JsonRpcErrorCode.ParseError }),
    );
  });
});
