/**
 * @fileoverview zod fragments shared by the loop-trim tools.
 * @module src/mcp-server/tools/utils/loopSchemas
 */
import { z } from 'zod';

/**
 * Loop tokens as entered by the user; parsed and validated by the service.
 */
export const LoopTokensShape = {
  loops: z
    .array(z.string().min(1))
    .min(1, 'At least one loop is required.')
    .describe('Loop ranges as "start:end", e.g. ["50:70", "120:140"].'),
  keeps: z
    .array(z.string().min(1))
    .min(1, 'At least one keep length is required.')
    .describe('Residues kept at each end as "keepN:keepC", one per loop.'),
};

/**
 * Single-character chain identifier; it is written into the colon-separated
 * alignment header.
 */
export const ChainIdSchema = z
  .string()
  .regex(/^[A-Za-z0-9]$/, 'Chain id must be a single letter or digit.');

export const LoopSummarySchema = z.object({
  start: z.number(),
  end: z.number(),
  keepN: z.number(),
  keepC: z.number(),
  trimmedStart: z.number(),
  trimmedEnd: z.number(),
  trimmedLength: z.number(),
});
