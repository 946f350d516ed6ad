/**
 * @fileoverview In-process modeling engine for service tests. Writes one model
 * per requested build, each holding the ungapped target residues numbered from
 * 1, and reports the scores it was given.
 * @module tests/helpers/fakeEngine
 */
import { writeFile } from 'node:fs/promises';
import path from 'node:path';

import type {
  IModelingEngine,
  ModelBuildRequest,
} from '@/services/loop-trim/core/IModelingEngine.js';
import { ungappedTarget } from '@/services/loop-trim/pipeline/alignment-builder.js';
import type { CandidateModel } from '@/services/loop-trim/types.js';
import type { RequestContext } from '@/utils/index.js';
import { pdbFromSequence } from './pdb.js';

export interface FakeBuild {
  qualityScore: number;
  secondaryScore?: number;
  failed?: boolean;
}

export class FakeModelingEngine implements IModelingEngine {
  public readonly name = 'Fake modeling engine';
  public readonly requests: ModelBuildRequest[] = [];

  constructor(
    private readonly builds: FakeBuild[],
    private readonly healthy = true,
  ) {}

  async buildModels(
    request: ModelBuildRequest,
    _context: RequestContext,
  ): Promise<CandidateModel[]> {
    this.requests.push(request);
    const modelPdb = pdbFromSequence(ungappedTarget(request.alignment), {
      chainId: 'A',
      firstResSeq: 1,
    });

    const candidates: CandidateModel[] = [];
    for (const [index, build] of this.builds.slice(0, request.modelCount).entries()) {
      const name = `${request.jobName}.${index + 1}.pdb`;
      if (build.failed) {
        candidates.push({
          name,
          path: '',
          qualityScore: build.qualityScore,
          secondaryScore: 0,
          failed: true,
          failureReason: 'fake failure',
        });
        continue;
      }
      const modelPath = path.join(request.workDir, name);
      await writeFile(modelPath, modelPdb, 'utf8');
      candidates.push({
        name,
        path: modelPath,
        qualityScore: build.qualityScore,
        secondaryScore: build.secondaryScore ?? 1,
        failed: false,
      });
    }
    return candidates;
  }

  async healthCheck(): Promise<boolean> {
    return this.healthy;
  }
}
