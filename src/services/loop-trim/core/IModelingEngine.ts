/**
 * @fileoverview Contract of the external modeling engine that builds candidate
 * models from an alignment and a residue selection.
 * @module src/services/loop-trim/core/IModelingEngine
 */

import type { RequestContext } from '@/utils/index.js';
import type {
  AlignmentRecord,
  CandidateModel,
  ResidueSelector,
} from '../types.js';

/**
 * Everything the engine needs for one modeling run.
 */
export interface ModelBuildRequest {
  /** Stem of the model file names (`<jobName>.<n>.pdb`). */
  jobName: string;
  alignment: AlignmentRecord;
  alignmentPath: string;
  /** Template structure file named by the alignment. */
  templatePath: string;
  /** Decides per original residue whether it is kept and where it lands. */
  selector: ResidueSelector;
  modelCount: number;
  /** Directory receiving the raw model files. */
  workDir: string;
}

/**
 * Modeling engine integration. Implements the Strategy pattern so the service
 * does not depend on how or where models are built.
 */
export interface IModelingEngine {
  /**
   * Human-readable engine name
   */
  readonly name: string;

  /**
   * Builds `modelCount` candidate models
   * @returns one entry per build attempt, failed attempts flagged
   * @throws {McpError} ServiceUnavailable or Timeout when the engine cannot be reached
   */
  buildModels(
    request: ModelBuildRequest,
    context: RequestContext,
  ): Promise<CandidateModel[]>;

  /**
   * @returns true if the engine is reachable
   */
  healthCheck(): Promise<boolean>;
}
