/**
 * @fileoverview Unit tests for CLI argument parsing and the run report.
 * @module tests/cli/options.test
 */
import { describe, expect, it } from 'vitest';

import { formatRunReport, parseCliArgs, wantsHelp } from '@/cli/options.js';
import type { LoopTrimRunResult } from '@/services/loop-trim/types.js';
import { JsonRpcErrorCode } from '@/types-global/errors.js';

const defaults = { chainId: 'A', workDir: '/work' };

const baseArgs = [
  '--fasta',
  'tmpl.fasta',
  '--id',
  'P12345',
  '--loop',
  '50:70',
  '--keep',
  '3:3',
  '--models',
  '5',
  '--pdb',
  'tmpl.pdb',
];

describe('parseCliArgs', () => {
  it('builds run parameters with configured defaults', () => {
    expect(parseCliArgs(baseArgs, defaults)).toEqual({
      fastaPath: 'tmpl.fasta',
      templateId: 'P12345',
      loopRanges: ['50:70'],
      keepLengths: ['3:3'],
      modelCount: 5,
      pdbPath: 'tmpl.pdb',
      chainId: 'A',
      workDir: '/work',
    });
  });

  it('collects repeated loops in order and honours overrides', () => {
    const params = parseCliArgs(
      [...baseArgs, '-l', '120:140', '-k', '2:2', '--chain', 'C', '-w', '/out'],
      defaults,
    );
    expect(params.loopRanges).toEqual(['50:70', '120:140']);
    expect(params.keepLengths).toEqual(['3:3', '2:2']);
    expect(params.chainId).toBe('C');
    expect(params.workDir).toBe('/out');
  });

  it.each([
    [['--models', '0'], '--models must be a positive integer'],
    [['--models', 'many'], '--models must be a positive integer'],
    [['--chain', 'AB'], '--chain must be a single character'],
  ])('rejects %j', (extra, message) => {
    expect(() => parseCliArgs([...baseArgs, ...extra], defaults)).toThrow(
      expect.objectContaining({ code: JsonRpcErrorCode.InvalidParams, message }),
    );
  });

  it('requires the template files', () => {
    expect(() => parseCliArgs(baseArgs.slice(2), defaults)).toThrow(
      '--fasta is required',
    );
  });

  it('rejects unknown options and positional arguments', () => {
    expect(() => parseCliArgs([...baseArgs, '--verbose'], defaults)).toThrow(
      expect.objectContaining({ code: JsonRpcErrorCode.InvalidParams }),
    );
    expect(() => parseCliArgs([...baseArgs, 'extra'], defaults)).toThrow(
      expect.objectContaining({ code: JsonRpcErrorCode.InvalidParams }),
    );
  });
});

describe('wantsHelp', () => {
  it('recognises both spellings', () => {
    expect(wantsHelp(['-h'])).toBe(true);
    expect(wantsHelp(['--id', 'x', '--help'])).toBe(true);
    expect(wantsHelp(baseArgs)).toBe(false);
  });
});

describe('formatRunReport', () => {
  it('prints the top model and each renumbered file', () => {
    const top = {
      name: 'P12345.2.pdb',
      path: '/work/P12345.2.pdb',
      qualityScore: -1500.25,
      secondaryScore: 0.9876,
      failed: false,
    };
    const result: LoopTrimRunResult = {
      alignmentPath: '/work/P12345.ali',
      loops: [],
      ranking: { top, accepted: [top], failedCount: 0 },
      renumbered: [
        {
          name: 'P12345.2.pdb',
          sourcePath: '/work/P12345.2.pdb',
          outputPath: '/work/P12345.2_renum.pdb',
          residueCount: 187,
          qualityScore: -1500.25,
        },
      ],
    };

    expect(formatRunReport(result)).toEqual([
      'Top model: P12345.2.pdb (quality score: -1500.250, secondary score: 0.988)',
      'Renumbering 1 model(s) to template numbering:',
      '  P12345.2.pdb -> P12345.2_renum.pdb',
      'Renumbering complete.',
    ]);
  });
});
