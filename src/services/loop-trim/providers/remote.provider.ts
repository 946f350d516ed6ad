/**
 * @fileoverview Modeling engine reached over HTTP. Materialises the residue
 * selector into explicit index lists, submits the job, waits for it and writes
 * the returned models into the working directory.
 * @module src/services/loop-trim/providers/remote.provider
 */

import path from 'node:path';

import { inject, injectable } from 'tsyringe';

import type { AppConfig as AppConfigType } from '@/config/index.js';
import { AppConfig } from '@/container/tokens.js';
import {
  fetchWithTimeout,
  logger,
  readTextFile,
  requestContextService,
  writeTextFile,
  type RequestContext,
} from '@/utils/index.js';
import type {
  IModelingEngine,
  ModelBuildRequest,
} from '../core/IModelingEngine.js';
import { formatAlignment } from '../pipeline/alignment-builder.js';
import type { CandidateModel } from '../types.js';
import { HEALTH_PATH, MODEL_FILE_EXTENSION } from './remote/config.js';
import {
  submitModelingJob,
  waitForModels,
  type EngineModel,
  type ModelingJobPayload,
} from './remote/job-client.js';

/**
 * Payload sent to the engine for one build request.
 */
export function toJobPayload(
  request: ModelBuildRequest,
  templatePdb: string,
): ModelingJobPayload {
  const { alignment, selector } = request;
  const selection = selector.buildSelection(alignment.templateSequence.length);
  return {
    job_name: request.jobName,
    alignment: formatAlignment(alignment),
    alignment_file: path.basename(request.alignmentPath),
    knowns: alignment.templateId,
    sequence: alignment.targetId,
    structure_file: alignment.structureFile,
    template_pdb: templatePdb,
    model_count: request.modelCount,
    selection: {
      movable: selection.movable,
      retained: selection.retained.map(
        (r): [number, number] => [r.originalIndex, r.outputIndex],
      ),
    },
  };
}

/**
 * HTTP modeling engine provider.
 */
@injectable()
export class RemoteModelingEngine implements IModelingEngine {
  public readonly name = 'Remote modeling engine';

  constructor(@inject(AppConfig) private readonly appConfig: AppConfigType) {}

  async buildModels(
    request: ModelBuildRequest,
    context: RequestContext,
  ): Promise<CandidateModel[]> {
    const engine = this.appConfig.modelingEngine;
    logger.info('Submitting modeling run', {
      ...context,
      engine: engine.baseUrl,
      jobName: request.jobName,
      modelCount: request.modelCount,
    });

    const templatePdb = await readTextFile(request.templatePath, context);
    const payload = toJobPayload(request, templatePdb);
    const jobId = await submitModelingJob(engine, payload, context);
    const models = await waitForModels(engine, jobId, context);

    if (models.length === 0) {
      logger.warning('Modeling engine returned no models', { ...context, jobId });
    }

    const candidates: CandidateModel[] = [];
    for (const [index, model] of models.entries()) {
      candidates.push(await this.storeModel(request, index + 1, model, context));
    }
    return candidates;
  }

  async healthCheck(): Promise<boolean> {
    const context = requestContextService.createRequestContext({
      operation: 'RemoteModelingEngine.healthCheck',
    });
    const engine = this.appConfig.modelingEngine;
    try {
      const response = await fetchWithTimeout(
        `${engine.baseUrl}${HEALTH_PATH}`,
        { method: 'GET', timeout: engine.timeoutMs },
        context,
        true,
      );
      return response.ok;
    } catch (error) {
      logger.warning('Modeling engine health check failed', { ...context, error });
      return false;
    }
  }

  private async storeModel(
    request: ModelBuildRequest,
    ordinal: number,
    model: EngineModel,
    context: RequestContext,
  ): Promise<CandidateModel> {
    const name = `${request.jobName}.${ordinal}${MODEL_FILE_EXTENSION}`;
    const qualityScore = model.quality_score ?? Number.NaN;
    const secondaryScore = model.secondary_score ?? Number.NaN;

    let failureReason = model.failure ?? undefined;
    if (!failureReason && !model.pdb) {
      failureReason = 'engine returned no coordinates';
    } else if (!failureReason && Number.isNaN(qualityScore)) {
      failureReason = 'engine returned no quality score';
    }

    if (failureReason || !model.pdb) {
      logger.warning('Candidate model failed', {
        ...context,
        name,
        engineName: model.name,
        failureReason,
      });
      return {
        name,
        path: '',
        qualityScore,
        secondaryScore,
        failed: true,
        failureReason,
      };
    }

    const modelPath = path.join(request.workDir, name);
    await writeTextFile(modelPath, model.pdb, context);
    return {
      name,
      path: modelPath,
      qualityScore,
      secondaryScore: Number.isNaN(secondaryScore) ? 0 : secondaryScore,
      failed: false,
    };
  }
}
