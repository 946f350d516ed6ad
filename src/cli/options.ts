/**
 * @fileoverview Command-line parsing for the loop-trim CLI and the text report
 * it prints on success.
 * @module src/cli/options
 */
import path from 'node:path';
import { parseArgs } from 'node:util';

import { z } from 'zod';

import { formatTopModelSummary } from '@/services/loop-trim/pipeline/model-ranker.js';
import type {
  LoopTrimRunParams,
  LoopTrimRunResult,
} from '@/services/loop-trim/types.js';
import { JsonRpcErrorCode, McpError } from '@/types-global/errors.js';

export const USAGE = `Usage: loop-trim --fasta <file> --id <template-id> --loop <start:end> [--loop ...]
                 --keep <keepN:keepC> [--keep ...] --models <n> --pdb <file>
                 [--chain <id>] [--work-dir <dir>]

Replaces each loop interior with a gap, builds <n> candidate models, ranks them
and writes every accepted model renumbered to the template numbering.

  -f, --fasta      FASTA file with the template sequence
  -u, --id         template identifier, names <id>.ali and the model files
  -l, --loop       loop range start:end (1-based, inclusive), repeatable
  -k, --keep       residues kept at each end keepN:keepC, one per --loop
  -n, --models     number of candidate models
  -p, --pdb        template structure (PDB format)
  -c, --chain      template chain (default A)
  -w, --work-dir   output directory (default current directory)
  -h, --help       show this help
`;

const CliArgsSchema = z.object({
  fasta: z.string({ required_error: '--fasta is required' }).min(1),
  id: z
    .string({ required_error: '--id is required' })
    .regex(/^[\w.-]+$/, '--id may contain letters, digits, "_", "." and "-"'),
  loop: z
    .array(z.string(), { required_error: 'at least one --loop is required' })
    .min(1, 'at least one --loop is required'),
  keep: z
    .array(z.string(), { required_error: 'at least one --keep is required' })
    .min(1, 'at least one --keep is required'),
  models: z.coerce
    .number({ invalid_type_error: '--models must be a positive integer' })
    .int('--models must be a positive integer')
    .positive('--models must be a positive integer'),
  pdb: z.string({ required_error: '--pdb is required' }).min(1),
  chain: z
    .string()
    .regex(/^[A-Za-z0-9]$/, '--chain must be a single character')
    .optional(),
  'work-dir': z.string().min(1).optional(),
});

export interface CliDefaults {
  chainId: string;
  workDir: string;
}

export function wantsHelp(argv: readonly string[]): boolean {
  return argv.includes('--help') || argv.includes('-h');
}

/**
 * Turns command-line arguments into run parameters.
 *
 * @throws {McpError} InvalidParams for unknown options or invalid values.
 */
export function parseCliArgs(
  argv: readonly string[],
  defaults: CliDefaults,
): LoopTrimRunParams {
  let values: Record<string, unknown>;
  try {
    ({ values } = parseArgs({
      args: [...argv],
      options: {
        fasta: { type: 'string', short: 'f' },
        id: { type: 'string', short: 'u' },
        loop: { type: 'string', short: 'l', multiple: true },
        keep: { type: 'string', short: 'k', multiple: true },
        models: { type: 'string', short: 'n' },
        pdb: { type: 'string', short: 'p' },
        chain: { type: 'string', short: 'c' },
        'work-dir': { type: 'string', short: 'w' },
      },
      strict: true,
      allowPositionals: false,
    }));
  } catch (error) {
    throw new McpError(
      JsonRpcErrorCode.InvalidParams,
      error instanceof Error ? error.message : String(error),
    );
  }

  const parsed = CliArgsSchema.safeParse(values);
  if (!parsed.success) {
    throw new McpError(
      JsonRpcErrorCode.InvalidParams,
      parsed.error.issues.map((issue) => issue.message).join('; '),
      { issues: parsed.error.issues },
    );
  }

  const args = parsed.data;
  return {
    fastaPath: args.fasta,
    templateId: args.id,
    loopRanges: args.loop,
    keepLengths: args.keep,
    modelCount: args.models,
    pdbPath: args.pdb,
    chainId: args.chain ?? defaults.chainId,
    workDir: args['work-dir'] ?? defaults.workDir,
  };
}

/**
 * Lines printed to stdout after a successful run.
 */
export function formatRunReport(result: LoopTrimRunResult): string[] {
  return [
    formatTopModelSummary(result.ranking.top),
    `Renumbering ${result.renumbered.length} model(s) to template numbering:`,
    ...result.renumbered.map(
      (model) =>
        `  ${path.basename(model.sourcePath)} -> ${path.basename(model.outputPath)}`,
    ),
    'Renumbering complete.',
  ];
}
