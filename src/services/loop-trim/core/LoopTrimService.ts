/**
 * @fileoverview Orchestrates a loop-trim modeling run: loop parsing, alignment,
 * residue selection, the engine call, ranking and renumbering.
 * @module src/services/loop-trim/core/LoopTrimService
 */

import path from 'node:path';

import { inject, injectable } from 'tsyringe';

import { ModelingEngine } from '@/container/tokens.js';
import { JsonRpcErrorCode, McpError } from '@/types-global/errors.js';
import {
  logger,
  parseFastaSequence,
  readTextFile,
  type RequestContext,
} from '@/utils/index.js';
import type { IModelingEngine } from './IModelingEngine.js';
import {
  buildAlignmentRecord,
  formatAlignment,
  ungappedTarget,
  writeAlignmentFile,
} from '../pipeline/alignment-builder.js';
import { parseLoopSet, summarizeLoop } from '../pipeline/loop-spec-parser.js';
import { rankCandidates } from '../pipeline/model-ranker.js';
import { ResidueIndexMapper } from '../pipeline/residue-index-mapper.js';
import { renumberModels } from '../pipeline/residue-renumberer.js';
import type {
  BuildAlignmentParams,
  BuildAlignmentResult,
  CandidateModel,
  LoopTrimRunParams,
  LoopTrimRunResult,
  MapResiduesParams,
  MapResiduesResult,
  PreparedRun,
  ResidueMappingEntry,
} from '../types.js';

/**
 * Loop-trim pipeline service.
 */
@injectable()
export class LoopTrimService {
  constructor(@inject(ModelingEngine) private engine: IModelingEngine) {}

  /**
   * Builds the gapped alignment for a sequence without touching the disk
   */
  buildAlignment(
    params: BuildAlignmentParams,
    context: RequestContext,
  ): BuildAlignmentResult {
    logger.debug('LoopTrimService: Building alignment', {
      ...context,
      templateId: params.templateId,
      loopRanges: params.loopRanges,
      keepLengths: params.keepLengths,
    });

    const loops = parseLoopSet(params.loopRanges, params.keepLengths, {
      sequenceLength: params.templateSequence.length,
    });
    const record = buildAlignmentRecord({ ...params, loops });
    const summaries = loops.map(summarizeLoop);

    return {
      record,
      alignmentText: formatAlignment(record),
      loops: summaries,
      totalTrimmed: summaries.reduce((sum, s) => sum + s.trimmedLength, 0),
      builtLength: ungappedTarget(record).length,
    };
  }

  /**
   * Reports where residues land in the trimmed numbering
   */
  mapResidues(
    params: MapResiduesParams,
    context: RequestContext,
  ): MapResiduesResult {
    logger.debug('LoopTrimService: Mapping residues', {
      ...context,
      sequenceLength: params.sequenceLength,
      loopRanges: params.loopRanges,
    });

    const loops = parseLoopSet(params.loopRanges, params.keepLengths, {
      sequenceLength: params.sequenceLength,
    });
    const mapper = new ResidueIndexMapper(loops, {
      sequenceLength: params.sequenceLength,
      context,
    });
    const selection = mapper.buildSelection(params.sequenceLength);

    const requested =
      params.residues ??
      Array.from({ length: params.sequenceLength }, (_, i) => i + 1);
    const mappings = requested.map((originalIndex): ResidueMappingEntry => {
      const mapped = mapper.select(originalIndex);
      return mapped
        ? { originalIndex, outputIndex: mapped.outputIndex, role: mapped.role }
        : { originalIndex, outputIndex: null, role: 'trimmed' };
    });

    return {
      loops: loops.map(summarizeLoop),
      mappings,
      excludedCount: selection.excluded.length,
      movable: selection.movable,
    };
  }

  /**
   * Reads the template sequence, validates the loops against it and writes
   * `<templateId>.ali` into the working directory
   */
  async prepareRun(
    params: LoopTrimRunParams,
    context: RequestContext,
  ): Promise<PreparedRun> {
    const templateSequence = parseFastaSequence(
      await readTextFile(params.fastaPath, context),
    );
    logger.debug('Template sequence read', {
      ...context,
      fastaPath: params.fastaPath,
      sequenceLength: templateSequence.length,
    });

    const loops = parseLoopSet(params.loopRanges, params.keepLengths, {
      sequenceLength: templateSequence.length,
    });
    const record = buildAlignmentRecord({
      templateSequence,
      templateId: params.templateId,
      structureFile: path.basename(params.pdbPath),
      chainId: params.chainId,
      loops,
    });

    const alignmentPath = path.join(params.workDir, `${params.templateId}.ali`);
    await writeAlignmentFile(alignmentPath, record, loops, context);

    return {
      record,
      alignmentPath,
      loops,
      summaries: loops.map(summarizeLoop),
    };
  }

  /**
   * Runs the whole pipeline
   * @throws {McpError} ParseError, ConfigurationError, IoError, NoValidModel,
   * StructureMismatch, or the engine's ServiceUnavailable / Timeout
   */
  async run(
    params: LoopTrimRunParams,
    context: RequestContext,
  ): Promise<LoopTrimRunResult> {
    logger.info('LoopTrimService: Starting run', {
      ...context,
      templateId: params.templateId,
      modelCount: params.modelCount,
      engine: this.engine.name,
    });

    const prepared = await this.prepareRun(params, context);
    const selector = new ResidueIndexMapper(prepared.loops, {
      sequenceLength: prepared.record.templateSequence.length,
      context,
    });

    let candidates: CandidateModel[];
    try {
      candidates = await this.engine.buildModels(
        {
          jobName: params.templateId,
          alignment: prepared.record,
          alignmentPath: prepared.alignmentPath,
          templatePath: params.pdbPath,
          selector,
          modelCount: params.modelCount,
          workDir: params.workDir,
        },
        context,
      );
    } catch (error) {
      if (error instanceof McpError) throw error;

      throw new McpError(
        JsonRpcErrorCode.ServiceUnavailable,
        `Modeling engine ${this.engine.name} failed: ${error instanceof Error ? error.message : String(error)}`,
        { requestId: context.requestId },
      );
    }

    const ranking = rankCandidates(candidates, context);
    const renumbered = await renumberModels(
      ranking.accepted,
      { templatePath: params.pdbPath, alignment: prepared.record },
      context,
    );

    logger.info('LoopTrimService: Run completed', {
      ...context,
      topModel: ranking.top.name,
      acceptedCount: ranking.accepted.length,
      failedCount: ranking.failedCount,
    });

    return {
      alignmentPath: prepared.alignmentPath,
      loops: prepared.summaries,
      ranking,
      renumbered,
    };
  }

  /**
   * Engine connectivity
   */
  async healthCheck(): Promise<{ engine: string; healthy: boolean }> {
    const healthy = await this.engine.healthCheck().catch(() => false);
    return { engine: this.engine.name, healthy };
  }
}
