/**
 * @fileoverview Unit tests for candidate ranking.
 * @module tests/services/loop-trim/pipeline/model-ranker.test
 */
import { afterEach, beforeEach, describe, expect, it, vi, type MockInstance } from 'vitest';

import {
  compareCandidates,
  formatTopModelSummary,
  rankCandidates,
} from '@/services/loop-trim/pipeline/model-ranker.js';
import type { CandidateModel } from '@/services/loop-trim/types.js';
import { JsonRpcErrorCode, McpError } from '@/types-global/errors.js';
import { logger } from '@/utils/index.js';

const context = {
  requestId: 'test-req-1',
  timestamp: new Date().toISOString(),
  operation: 'test',
};

function candidate(
  name: string,
  qualityScore: number,
  overrides: Partial<CandidateModel> = {},
): CandidateModel {
  return {
    name,
    path: `/tmp/${name}`,
    qualityScore,
    secondaryScore: 0.5,
    failed: false,
    ...overrides,
  };
}

describe('rankCandidates', () => {
  let loggerInfoSpy: MockInstance;
  let loggerWarningSpy: MockInstance;

  beforeEach(() => {
    loggerInfoSpy = vi.spyOn(logger, 'info').mockImplementation(() => {});
    loggerWarningSpy = vi.spyOn(logger, 'warning').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('selects the lowest quality score', () => {
    const ranking = rankCandidates(
      [candidate('m.1.pdb', 3.1), candidate('m.2.pdb', 2.0), candidate('m.3.pdb', 5.5)],
      context,
    );

    expect(ranking.top.qualityScore).toBe(2.0);
    expect(ranking.accepted.map((c) => c.name)).toEqual([
      'm.2.pdb',
      'm.1.pdb',
      'm.3.pdb',
    ]);
    expect(ranking.failedCount).toBe(0);
    expect(loggerInfoSpy).toHaveBeenCalledWith(
      'Top model selected',
      expect.objectContaining({ name: 'm.2.pdb', qualityScore: 2.0 }),
    );
    expect(loggerWarningSpy).not.toHaveBeenCalled();
  });

  it('never selects a failed candidate, however good its score', () => {
    const ranking = rankCandidates(
      [
        candidate('m.1.pdb', -9000, { failed: true, failureReason: 'optimizer diverged' }),
        candidate('m.2.pdb', -100),
      ],
      context,
    );

    expect(ranking.top.name).toBe('m.2.pdb');
    expect(ranking.accepted).toHaveLength(1);
    expect(ranking.failedCount).toBe(1);
    expect(loggerWarningSpy).toHaveBeenCalledWith(
      'Skipping failed candidate models',
      expect.objectContaining({ failedCount: 1, failed: ['m.1.pdb'] }),
    );
  });

  it('throws NoValidModel when every candidate failed', () => {
    vi.spyOn(logger, 'error').mockImplementation(() => {});
    const run = () =>
      rankCandidates(
        [
          candidate('m.1.pdb', 1, { failed: true }),
          candidate('m.2.pdb', 2, { failed: true }),
        ],
        context,
      );

    expect(run).toThrow(McpError);
    expect(run).toThrow('All 2 candidate model(s) failed');
    expect(run).toThrow(
      expect.objectContaining({ code: JsonRpcErrorCode.NoValidModel }),
    );
  });

  it('throws NoValidModel for an empty candidate list', () => {
    vi.spyOn(logger, 'error').mockImplementation(() => {});
    expect(() => rankCandidates([], context)).toThrow(
      expect.objectContaining({ code: JsonRpcErrorCode.NoValidModel }),
    );
  });

  it('does not reorder the input list', () => {
    const input = [candidate('m.1.pdb', 3), candidate('m.2.pdb', 1)];
    rankCandidates(input, context);
    expect(input.map((c) => c.name)).toEqual(['m.1.pdb', 'm.2.pdb']);
  });
});

describe('compareCandidates', () => {
  it('breaks quality ties by the higher secondary score, then by name', () => {
    const sorted = [
      candidate('b.pdb', 1, { secondaryScore: 0.7 }),
      candidate('c.pdb', 1, { secondaryScore: 0.9 }),
      candidate('a.pdb', 1, { secondaryScore: 0.7 }),
    ].sort(compareCandidates);

    expect(sorted.map((c) => c.name)).toEqual(['c.pdb', 'a.pdb', 'b.pdb']);
  });
});

describe('formatTopModelSummary', () => {
  it('prints the name and both scores with three decimals', () => {
    expect(
      formatTopModelSummary({
        name: 'P12345.2.pdb',
        qualityScore: -1234.5,
        secondaryScore: 1,
      }),
    ).toBe(
      'Top model: P12345.2.pdb (quality score: -1234.500, secondary score: 1.000)',
    );
  });
});
