/**
 * @fileoverview Unit tests for loop token parsing and validation.
 * @module tests/services/loop-trim/pipeline/loop-spec-parser.test
 */
import { describe, expect, it } from 'vitest';

import {
  parseLoopSet,
  summarizeLoop,
  trimmedSpan,
} from '@/services/loop-trim/pipeline/loop-spec-parser.js';
import { JsonRpcErrorCode, McpError } from '@/types-global/errors.js';

function codeOf(fn: () => unknown): JsonRpcErrorCode | undefined {
  try {
    fn();
  } catch (error) {
    if (error instanceof McpError) return error.code;
    throw error;
  }
  return undefined;
}

describe('trimmedSpan', () => {
  it('excludes the kept residues and both loop anchors', () => {
    expect(trimmedSpan({ start: 50, end: 70, keepN: 3, keepC: 3 })).toEqual({
      start: 54,
      end: 66,
      length: 13,
    });
  });

  it('trims everything between the anchors when nothing is kept', () => {
    expect(trimmedSpan({ start: 10, end: 15, keepN: 0, keepC: 0 })).toEqual({
      start: 11,
      end: 14,
      length: 4,
    });
  });
});

describe('summarizeLoop', () => {
  it('combines the loop with its trimmed span', () => {
    expect(summarizeLoop({ start: 120, end: 140, keepN: 2, keepC: 2 })).toEqual({
      start: 120,
      end: 140,
      keepN: 2,
      keepC: 2,
      trimmedStart: 123,
      trimmedEnd: 137,
      trimmedLength: 15,
    });
  });
});

describe('parseLoopSet', () => {
  it('parses parallel token lists', () => {
    const loops = parseLoopSet(['50:70'], ['3:3']);
    expect(loops).toEqual([{ start: 50, end: 70, keepN: 3, keepC: 3 }]);
  });

  it('tolerates surrounding whitespace', () => {
    const loops = parseLoopSet([' 50:70 '], ['3:3\n']);
    expect(loops[0]).toEqual({ start: 50, end: 70, keepN: 3, keepC: 3 });
  });

  it('sorts loops by start and pairs each with its own keep lengths', () => {
    const loops = parseLoopSet(['120:140', '50:70'], ['2:2', '3:3']);
    expect(loops.map((l) => [l.start, l.keepN])).toEqual([
      [50, 3],
      [120, 2],
    ]);
  });

  it('returns an immutable set', () => {
    const loops = parseLoopSet(['50:70'], ['3:3']);
    expect(Object.isFrozen(loops)).toBe(true);
    expect(Object.isFrozen(loops[0])).toBe(true);
  });

  it('rejects overlapping loops with a configuration error', () => {
    expect(codeOf(() => parseLoopSet(['50:70', '60:90'], ['3:3', '3:3']))).toBe(
      JsonRpcErrorCode.ConfigurationError,
    );
  });

  it('rejects loops that share an anchor residue', () => {
    expect(codeOf(() => parseLoopSet(['50:70', '70:90'], ['3:3', '3:3']))).toBe(
      JsonRpcErrorCode.ConfigurationError,
    );
  });

  it('accepts adjacent loops', () => {
    expect(parseLoopSet(['50:70', '71:90'], ['3:3', '3:3'])).toHaveLength(2);
  });

  it.each([
    ['50-70', '3:3'],
    ['50:', '3:3'],
    ['a:b', '3:3'],
    ['50:70', '3'],
    ['50:70:90', '3:3'],
    ['50.5:70', '3:3'],
  ])('rejects malformed tokens %s / %s with a parse error', (range, keep) => {
    expect(codeOf(() => parseLoopSet([range], [keep]))).toBe(
      JsonRpcErrorCode.ParseError,
    );
  });

  it.each([
    ['0:20', '1:1', 'start before residue 1'],
    ['-5:20', '1:1', 'negative start'],
    ['30:20', '1:1', 'end before start'],
    ['30:30', '0:0', 'empty loop'],
    ['10:20', '-1:2', 'negative keep'],
    ['10:20', '5:4', 'nothing left to trim'],
  ])('rejects %s keep %s (%s)', (range, keep) => {
    expect(codeOf(() => parseLoopSet([range], [keep]))).toBe(
      JsonRpcErrorCode.ConfigurationError,
    );
  });

  it('accepts a loop that trims exactly one residue', () => {
    const [loop] = parseLoopSet(['10:20'], ['4:4']);
    expect(loop && trimmedSpan(loop)).toEqual({ start: 15, end: 15, length: 1 });
  });

  it('rejects mismatched list lengths', () => {
    expect(codeOf(() => parseLoopSet(['50:70', '120:140'], ['3:3']))).toBe(
      JsonRpcErrorCode.ConfigurationError,
    );
  });

  it('rejects an empty loop list', () => {
    expect(codeOf(() => parseLoopSet([], []))).toBe(
      JsonRpcErrorCode.ConfigurationError,
    );
  });

  it('rejects loops running past the sequence end', () => {
    expect(
      codeOf(() => parseLoopSet(['50:70'], ['3:3'], { sequenceLength: 69 })),
    ).toBe(JsonRpcErrorCode.ConfigurationError);
    expect(parseLoopSet(['50:70'], ['3:3'], { sequenceLength: 70 })).toHaveLength(1);
  });
});
