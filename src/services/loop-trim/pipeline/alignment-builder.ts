/**
 * @fileoverview Builds the template/target alignment in which every loop
 * interior of the target is replaced by a gap run of the trimmed length.
 * @module src/services/loop-trim/pipeline/alignment-builder
 */

import { JsonRpcErrorCode, McpError } from '@/types-global/errors.js';
import { logger, type RequestContext, writeTextFile } from '@/utils/index.js';
import { GAP_CHAR, type AlignmentRecord, type LoopSet } from '../types.js';
import { trimmedSpan } from './loop-spec-parser.js';

export interface AlignmentInput {
  templateSequence: string;
  templateId: string;
  structureFile: string;
  chainId: string;
  loops: LoopSet;
}

/**
 * Suffix appended to the template id to name the trimmed target.
 */
export const TARGET_ID_SUFFIX = '_trim';

/**
 * Replaces each loop's trimmed span with gaps in a single left-to-right pass.
 * Slice bounds are taken from the original sequence, so earlier replacements
 * never shift later ones.
 */
export function buildTargetSequence(
  templateSequence: string,
  loops: LoopSet,
): string {
  const parts: string[] = [];
  let cursor = 0;

  for (const loop of loops) {
    // 0-based, end-exclusive slice of the trimmed span
    const gapFrom = loop.start + loop.keepN;
    const gapTo = loop.end - loop.keepC - 1;
    parts.push(templateSequence.slice(cursor, gapFrom));
    parts.push(GAP_CHAR.repeat(gapTo - gapFrom));
    cursor = gapTo;
  }
  parts.push(templateSequence.slice(cursor));

  return parts.join('');
}

const HEADER_FIELD_BREAK = /[:\r\n]/;

/**
 * @throws {McpError} ValidationError when the structure file name or chain id
 * would break the colon-separated structure header.
 */
export function buildAlignmentRecord(input: AlignmentInput): AlignmentRecord {
  for (const [field, value] of [
    ['structureFile', input.structureFile],
    ['chainId', input.chainId],
  ] as const) {
    if (HEADER_FIELD_BREAK.test(value)) {
      throw new McpError(
        JsonRpcErrorCode.ValidationError,
        `${field} "${value}" may not contain ":" or line breaks`,
        { [field]: value },
      );
    }
  }

  return {
    templateId: input.templateId,
    targetId: `${input.templateId}${TARGET_ID_SUFFIX}`,
    structureFile: input.structureFile,
    chainId: input.chainId,
    templateSequence: input.templateSequence,
    targetSequence: buildTargetSequence(input.templateSequence, input.loops),
  };
}

/**
 * Renders the record as a two-entry PIR alignment.
 */
export function formatAlignment(record: AlignmentRecord): string {
  const chain = record.chainId;
  return [
    `>P1;${record.templateId}`,
    `structureX:${record.structureFile}:FIRST:${chain}:LAST:${chain}::::`,
    `${record.templateSequence}*`,
    `>P1;${record.targetId}`,
    'sequence:::::::::',
    `${record.targetSequence}*`,
    '',
  ].join('\n');
}

/**
 * Target residues that will exist in the model, in order.
 */
export function ungappedTarget(record: AlignmentRecord): string {
  return record.targetSequence.split(GAP_CHAR).join('');
}

/**
 * Writes the formatted alignment.
 *
 * @throws {McpError} IoError when the file cannot be written.
 */
export async function writeAlignmentFile(
  filePath: string,
  record: AlignmentRecord,
  loops: LoopSet,
  context: RequestContext,
): Promise<void> {
  await writeTextFile(filePath, formatAlignment(record), context);

  logger.info('Alignment written', {
    ...context,
    filePath,
    templateId: record.templateId,
    targetId: record.targetId,
    templateLength: record.templateSequence.length,
    gapRuns: loops.map((loop) => trimmedSpan(loop).length),
  });
}
