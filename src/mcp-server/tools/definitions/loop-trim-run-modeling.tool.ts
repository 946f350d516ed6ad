/**
 * @fileoverview Tool definition for a full loop-trim modeling run.
 * @module src/mcp-server/tools/definitions/loop-trim-run-modeling.tool
 */
import type { ContentBlock } from '@modelcontextprotocol/sdk/types.js';
import { container } from 'tsyringe';
import { z } from 'zod';

import type { AppConfig as AppConfigType } from '@/config/index.js';
import { AppConfig, LoopTrimService } from '@/container/tokens.js';
import {
  ChainIdSchema,
  LoopSummarySchema,
  LoopTokensShape,
} from '@/mcp-server/tools/utils/loopSchemas.js';
import type {
  SdkContext,
  ToolAnnotations,
  ToolDefinition,
} from '@/mcp-server/tools/utils/toolDefinition.js';
import type { LoopTrimService as LoopTrimServiceClass } from '@/services/loop-trim/core/LoopTrimService.js';
import { formatTopModelSummary } from '@/services/loop-trim/pipeline/model-ranker.js';
import { type RequestContext, logger } from '@/utils/index.js';

const TOOL_NAME = 'loop_trim_run_modeling';
const TOOL_TITLE = 'Run Loop-Trim Modeling';
const TOOL_DESCRIPTION =
  'Shorten loops of a template structure: write the gapped alignment, build candidate models with the modeling engine, rank them and write each accepted model renumbered to the template numbering.';

const TOOL_ANNOTATIONS: ToolAnnotations = {
  readOnlyHint: false,
  destructiveHint: false,
  idempotentHint: false,
  openWorldHint: true,
};

const CandidateSchema = z.object({
  name: z.string(),
  path: z.string(),
  qualityScore: z.number(),
  secondaryScore: z.number(),
});

const InputSchema = z
  .object({
    fastaPath: z.string().min(1).describe('FASTA file with the template sequence.'),
    templateId: z
      .string()
      .min(1)
      .regex(/^[\w.-]+$/, 'Identifier may contain letters, digits, "_", "." and "-".')
      .describe('Template identifier; names the alignment and model files.'),
    pdbPath: z.string().min(1).describe('Template structure (PDB format).'),
    chainId: ChainIdSchema.optional()
      .describe('Template chain (default from configuration, usually A).'),
    ...LoopTokensShape,
    modelCount: z
      .number()
      .int()
      .positive()
      .max(500)
      .describe('Number of candidate models to build.'),
    workDir: z
      .string()
      .min(1)
      .optional()
      .describe('Directory for alignment and model files (default from configuration).'),
  })
  .describe('Parameters for a loop-trim modeling run.');

const OutputSchema = z
  .object({
    alignmentPath: z.string(),
    loops: z.array(LoopSummarySchema),
    topModel: CandidateSchema,
    acceptedModels: z.array(CandidateSchema),
    failedCount: z.number(),
    renumbered: z.array(
      z.object({
        name: z.string(),
        sourcePath: z.string(),
        outputPath: z.string(),
        residueCount: z.number(),
      }),
    ),
  })
  .describe('Loop-trim modeling run result.');

type RunModelingInput = z.infer<typeof InputSchema>;
type RunModelingOutput = z.infer<typeof OutputSchema>;

function toCandidate(model: z.infer<typeof CandidateSchema>): z.infer<typeof CandidateSchema> {
  return {
    name: model.name,
    path: model.path,
    qualityScore: model.qualityScore,
    secondaryScore: model.secondaryScore,
  };
}

class LoopTrimRunModelingLogic {
  constructor(
    private loopTrimService: LoopTrimServiceClass,
    private appConfig: AppConfigType,
  ) {}

  async execute(
    input: RunModelingInput,
    appContext: RequestContext,
    _sdkContext: SdkContext,
  ): Promise<RunModelingOutput> {
    logger.debug('Starting loop-trim modeling run', {
      ...appContext,
      toolInput: input,
    });

    const result = await this.loopTrimService.run(
      {
        fastaPath: input.fastaPath,
        templateId: input.templateId,
        pdbPath: input.pdbPath,
        chainId: input.chainId ?? this.appConfig.defaultChainId,
        loopRanges: input.loops,
        keepLengths: input.keeps,
        modelCount: input.modelCount,
        workDir: input.workDir ?? this.appConfig.workDir,
      },
      appContext,
    );

    logger.info('Loop-trim modeling run completed', {
      ...appContext,
      templateId: input.templateId,
      topModel: result.ranking.top.name,
      renumberedCount: result.renumbered.length,
    });

    return {
      alignmentPath: result.alignmentPath,
      loops: result.loops,
      topModel: toCandidate(result.ranking.top),
      acceptedModels: result.ranking.accepted.map(toCandidate),
      failedCount: result.ranking.failedCount,
      renumbered: result.renumbered.map((model) => ({
        name: model.name,
        sourcePath: model.sourcePath,
        outputPath: model.outputPath,
        residueCount: model.residueCount,
      })),
    };
  }
}

function responseFormatter(result: RunModelingOutput): ContentBlock[] {
  const summary = formatTopModelSummary(result.topModel);
  const renumbered = result.renumbered
    .map((model) => `  ${model.sourcePath} -> ${model.outputPath}`)
    .join('\n');

  return [
    {
      type: 'text',
      text: [
        summary,
        `Accepted: ${result.acceptedModels.length} | Failed: ${result.failedCount}`,
        `Alignment: ${result.alignmentPath}`,
        '',
        'Renumbered models:',
        renumbered,
      ].join('\n'),
    },
  ];
}

export const loopTrimRunModelingTool: ToolDefinition<
  typeof InputSchema,
  typeof OutputSchema
> = {
  name: TOOL_NAME,
  title: TOOL_TITLE,
  description: TOOL_DESCRIPTION,
  inputSchema: InputSchema,
  outputSchema: OutputSchema,
  annotations: TOOL_ANNOTATIONS,
  logic: async (input, appContext, sdkContext) => {
    const logic = new LoopTrimRunModelingLogic(
      container.resolve<LoopTrimServiceClass>(LoopTrimService),
      container.resolve<AppConfigType>(AppConfig),
    );
    return logic.execute(input, appContext, sdkContext);
  },
  responseFormatter,
};
