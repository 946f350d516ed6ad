/**
 * @fileoverview HTTP client for the remote modeling engine: job submission and
 * status polling.
 * @module src/services/loop-trim/providers/remote/job-client
 */

import { z } from 'zod';

import type { ModelingEngineConfig } from '@/config/index.js';
import { JsonRpcErrorCode, McpError } from '@/types-global/errors.js';
import {
  fetchWithTimeout,
  logger,
  type RequestContext,
} from '@/utils/index.js';
import { JOBS_PATH } from './config.js';

/**
 * Body of a job submission.
 */
export interface ModelingJobPayload {
  job_name: string;
  /** PIR alignment text. */
  alignment: string;
  alignment_file: string;
  knowns: string;
  sequence: string;
  structure_file: string;
  /** Contents of the template structure file. */
  template_pdb: string;
  model_count: number;
  selection: {
    /** Output (model) indices of residues to rebuild. */
    movable: number[];
    /** Original index, output index pairs of every retained residue. */
    retained: Array<[number, number]>;
  };
}

const JobTicketSchema = z.object({
  job_id: z.string().min(1),
});

const EngineModelSchema = z.object({
  name: z.string().optional(),
  pdb: z.string().nullish(),
  quality_score: z.number().nullish(),
  secondary_score: z.number().nullish(),
  failure: z.string().nullish(),
});

const JobStatusSchema = z.object({
  status: z.enum(['QUEUED', 'RUNNING', 'COMPLETE', 'ERROR']),
  message: z.string().nullish(),
  models: z.array(EngineModelSchema).optional(),
});

export type EngineModel = z.infer<typeof EngineModelSchema>;

async function readJson<T>(
  response: Response,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  what: string,
  context: RequestContext,
): Promise<T> {
  let body: unknown;
  try {
    body = await response.json();
  } catch (error) {
    throw new McpError(
      JsonRpcErrorCode.ServiceUnavailable,
      `Modeling engine returned a non-JSON ${what}`,
      { requestId: context.requestId, originalError: String(error) },
    );
  }

  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    logger.error('Modeling engine response failed validation', {
      ...context,
      what,
      issues: parsed.error.issues,
    });
    throw new McpError(
      JsonRpcErrorCode.ServiceUnavailable,
      `Modeling engine returned an invalid ${what}`,
      { requestId: context.requestId, issues: parsed.error.issues },
    );
  }
  return parsed.data;
}

export async function submitModelingJob(
  engine: ModelingEngineConfig,
  payload: ModelingJobPayload,
  context: RequestContext,
): Promise<string> {
  const url = `${engine.baseUrl}${JOBS_PATH}`;
  logger.debug('Submitting modeling job', {
    ...context,
    url,
    jobName: payload.job_name,
    modelCount: payload.model_count,
    movableCount: payload.selection.movable.length,
  });

  const response = await fetchWithTimeout(
    url,
    {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(payload),
      timeout: engine.timeoutMs,
    },
    context,
  );
  const ticket = await readJson(response, JobTicketSchema, 'job ticket', context);

  logger.debug('Modeling job submitted', {
    ...context,
    jobId: ticket.job_id,
  });
  return ticket.job_id;
}

/**
 * Polls a job until it completes.
 *
 * @throws {McpError} ServiceUnavailable when the engine reports an error,
 * Timeout when the job is still running after the configured attempts.
 */
export async function waitForModels(
  engine: ModelingEngineConfig,
  jobId: string,
  context: RequestContext,
): Promise<EngineModel[]> {
  const url = `${engine.baseUrl}${JOBS_PATH}/${encodeURIComponent(jobId)}`;

  for (let attempt = 1; attempt <= engine.maxPollAttempts; attempt++) {
    await new Promise((resolve) => setTimeout(resolve, engine.pollIntervalMs));

    const response = await fetchWithTimeout(
      url,
      { method: 'GET', timeout: engine.timeoutMs },
      context,
      true,
    );
    if (!response.ok) {
      logger.warning('Modeling job status request failed, retrying', {
        ...context,
        jobId,
        attempt,
        status: response.status,
      });
      // release the connection held by the unread body
      await response.body?.cancel();
      continue;
    }

    const status = await readJson(response, JobStatusSchema, 'job status', context);
    logger.debug('Polling modeling job', {
      ...context,
      jobId,
      attempt,
      status: status.status,
    });

    if (status.status === 'COMPLETE') {
      return status.models ?? [];
    }
    if (status.status === 'ERROR') {
      logger.error('Modeling job failed on the engine side', {
        ...context,
        jobId,
        message: status.message,
      });
      throw new McpError(
        JsonRpcErrorCode.ServiceUnavailable,
        `Modeling job ${jobId} failed: ${status.message ?? 'no message'}`,
        { requestId: context.requestId, jobId },
      );
    }
  }

  logger.error('Modeling job timed out after all attempts', {
    ...context,
    jobId,
    maxAttempts: engine.maxPollAttempts,
  });
  throw new McpError(
    JsonRpcErrorCode.Timeout,
    `Modeling job ${jobId} did not complete after ${engine.maxPollAttempts} status checks`,
    { requestId: context.requestId, jobId },
  );
}
