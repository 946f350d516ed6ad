/**
 * @fileoverview Parsing and validation of `start:end` / `keepN:keepC` tokens
 * into a sorted, non-overlapping loop set.
 * @module src/services/loop-trim/pipeline/loop-spec-parser
 */

import { JsonRpcErrorCode, McpError } from '@/types-global/errors.js';
import type {
  LoopSet,
  LoopSpec,
  LoopTrimSummary,
  TrimmedSpan,
} from '../types.js';

const PAIR_PATTERN = /^([+-]?\d+):([+-]?\d+)$/;

export interface ParseLoopSetOptions {
  /** When given, every loop must end within the sequence. */
  sequenceLength?: number | undefined;
}

/**
 * Bounds of the residues removed from `loop`.
 */
export function trimmedSpan(loop: LoopSpec): TrimmedSpan {
  const start = loop.start + loop.keepN + 1;
  const end = loop.end - loop.keepC - 1;
  return { start, end, length: end - start + 1 };
}

export function summarizeLoop(loop: LoopSpec): LoopTrimSummary {
  const span = trimmedSpan(loop);
  return {
    start: loop.start,
    end: loop.end,
    keepN: loop.keepN,
    keepC: loop.keepC,
    trimmedStart: span.start,
    trimmedEnd: span.end,
    trimmedLength: span.length,
  };
}

function parsePair(token: string, label: string): [number, number] {
  const match = PAIR_PATTERN.exec(token.trim());
  const first = match?.[1];
  const second = match?.[2];
  if (first === undefined || second === undefined) {
    throw new McpError(
      JsonRpcErrorCode.ParseError,
      `Malformed ${label} token "${token}": expected two integers separated by ":"`,
      { token },
    );
  }

  const values: [number, number] = [
    Number.parseInt(first, 10),
    Number.parseInt(second, 10),
  ];
  if (!values.every(Number.isSafeInteger)) {
    throw new McpError(
      JsonRpcErrorCode.ParseError,
      `${label} token "${token}" is out of integer range`,
      { token },
    );
  }
  return values;
}

function configError(message: string, data: Record<string, unknown>): McpError {
  return new McpError(JsonRpcErrorCode.ConfigurationError, message, data);
}

function validateLoop(loop: LoopSpec, sequenceLength?: number): void {
  const label = `Loop ${loop.start}:${loop.end}`;
  if (loop.start < 1) {
    throw configError(`${label} starts before residue 1`, { loop });
  }
  if (loop.end <= loop.start) {
    throw configError(`${label} must end after it starts`, { loop });
  }
  if (loop.keepN < 0 || loop.keepC < 0) {
    throw configError(
      `${label} has a negative keep length (${loop.keepN}:${loop.keepC})`,
      { loop },
    );
  }
  const span = trimmedSpan(loop);
  if (span.length < 1) {
    throw configError(
      `${label} keeps ${loop.keepN}:${loop.keepC} residues and leaves nothing to trim`,
      { loop, trimmedSpan: span },
    );
  }
  if (sequenceLength !== undefined && loop.end > sequenceLength) {
    throw configError(
      `${label} extends beyond the sequence (length ${sequenceLength})`,
      { loop, sequenceLength },
    );
  }
}

/**
 * Parses parallel lists of loop ranges and keep lengths into a validated,
 * start-sorted loop set.
 *
 * @throws {McpError} ParseError for malformed tokens, ConfigurationError for
 * mismatched lists, invalid loops or overlapping loops.
 */
export function parseLoopSet(
  loopRanges: readonly string[],
  keepLengths: readonly string[],
  options: ParseLoopSetOptions = {},
): LoopSet {
  if (loopRanges.length !== keepLengths.length) {
    throw configError(
      `Got ${loopRanges.length} loop range(s) but ${keepLengths.length} keep length(s)`,
      { loopRanges, keepLengths },
    );
  }
  if (loopRanges.length === 0) {
    throw configError('At least one loop is required', {});
  }

  const loops: LoopSpec[] = loopRanges.map((range, i) => {
    const [start, end] = parsePair(range, 'loop range');
    const [keepN, keepC] = parsePair(keepLengths[i] ?? '', 'keep length');
    const loop: LoopSpec = Object.freeze({ start, end, keepN, keepC });
    validateLoop(loop, options.sequenceLength);
    return loop;
  });

  loops.sort((a, b) => a.start - b.start);

  for (let i = 1; i < loops.length; i++) {
    const previous = loops[i - 1];
    const current = loops[i];
    if (previous && current && previous.end >= current.start) {
      throw configError(
        `Loops ${previous.start}:${previous.end} and ${current.start}:${current.end} overlap`,
        { previous, current },
      );
    }
  }

  return Object.freeze(loops);
}
