/**
 * @fileoverview Filters failed candidate models and ranks the rest.
 * @module src/services/loop-trim/pipeline/model-ranker
 */

import { JsonRpcErrorCode, McpError } from '@/types-global/errors.js';
import { logger, type RequestContext } from '@/utils/index.js';
import type { CandidateModel, ModelRanking } from '../types.js';

/**
 * Total order on candidates: quality score ascending, then secondary score
 * descending, then name.
 */
export function compareCandidates(a: CandidateModel, b: CandidateModel): number {
  if (a.qualityScore !== b.qualityScore) {
    return a.qualityScore - b.qualityScore;
  }
  if (a.secondaryScore !== b.secondaryScore) {
    return b.secondaryScore - a.secondaryScore;
  }
  return a.name < b.name ? -1 : a.name > b.name ? 1 : 0;
}

/**
 * Drops failed candidates and sorts the rest best first.
 *
 * @throws {McpError} NoValidModel when every candidate failed.
 */
export function rankCandidates(
  candidates: readonly CandidateModel[],
  context: RequestContext,
): ModelRanking {
  const accepted = candidates
    .filter((candidate) => !candidate.failed)
    .sort(compareCandidates);
  const failedCount = candidates.length - accepted.length;

  const top = accepted[0];
  if (!top) {
    logger.error('No candidate model was built successfully', {
      ...context,
      candidateCount: candidates.length,
      failures: candidates.map((c) => ({ name: c.name, reason: c.failureReason })),
    });
    throw new McpError(
      JsonRpcErrorCode.NoValidModel,
      `All ${candidates.length} candidate model(s) failed`,
      { requestId: context.requestId, candidateCount: candidates.length },
    );
  }

  if (failedCount > 0) {
    logger.warning('Skipping failed candidate models', {
      ...context,
      failedCount,
      failed: candidates.filter((c) => c.failed).map((c) => c.name),
    });
  }

  logger.info('Top model selected', {
    ...context,
    name: top.name,
    qualityScore: top.qualityScore,
    secondaryScore: top.secondaryScore,
    acceptedCount: accepted.length,
  });

  return { top, accepted, failedCount };
}

/**
 * One-line, human-readable report of the selected model.
 */
export function formatTopModelSummary(
  top: Pick<CandidateModel, 'name' | 'qualityScore' | 'secondaryScore'>,
): string {
  return `Top model: ${top.name} (quality score: ${top.qualityScore.toFixed(3)}, secondary score: ${top.secondaryScore.toFixed(3)})`;
}
