/**
 * @fileoverview Tool definition for previewing the trimmed-loop alignment.
 * @module src/mcp-server/tools/definitions/loop-trim-build-alignment.tool
 */
import type { ContentBlock } from '@modelcontextprotocol/sdk/types.js';
import { container } from 'tsyringe';
import { z } from 'zod';

import { LoopTrimService } from '@/container/tokens.js';
import type {
  SdkContext,
  ToolAnnotations,
  ToolDefinition,
} from '@/mcp-server/tools/utils/toolDefinition.js';
import {
  ChainIdSchema,
  LoopSummarySchema,
  LoopTokensShape,
} from '@/mcp-server/tools/utils/loopSchemas.js';
import type { LoopTrimService as LoopTrimServiceClass } from '@/services/loop-trim/core/LoopTrimService.js';
import { type RequestContext, logger } from '@/utils/index.js';

const TOOL_NAME = 'loop_trim_build_alignment';
const TOOL_TITLE = 'Build Loop-Trim Alignment';
const TOOL_DESCRIPTION =
  'Build the template/target PIR alignment in which each loop interior is replaced by gaps. Loops are "start:end" (1-based, inclusive) with matching "keepN:keepC" residue counts retained at each end.';

const TOOL_ANNOTATIONS: ToolAnnotations = {
  readOnlyHint: true,
  idempotentHint: true,
  openWorldHint: false,
};

const InputSchema = z
  .object({
    templateSequence: z
      .string()
      .min(1)
      .regex(/^[A-Za-z]+$/, 'Sequence must contain one-letter residue codes only.')
      .describe('Template sequence as one-letter codes.'),
    templateId: z
      .string()
      .min(1)
      .regex(/^[\w.-]+$/, 'Identifier may contain letters, digits, "_", "." and "-".')
      .describe('Template identifier (e.g. a UniProt accession).'),
    structureFile: z
      .string()
      .min(1)
      .regex(/^[^:\r\n]+$/, 'Structure file name may not contain ":" or line breaks.')
      .describe('Template structure file name written into the alignment.'),
    chainId: ChainIdSchema.default('A')
      .describe('Template chain identifier.'),
    ...LoopTokensShape,
  })
  .describe('Parameters for building a loop-trim alignment.');

const OutputSchema = z
  .object({
    alignment: z.string().describe('PIR alignment text.'),
    targetSequence: z.string().describe('Gapped target sequence.'),
    loops: z.array(LoopSummarySchema),
    totalTrimmed: z.number().describe('Residues removed by all loops.'),
    builtLength: z.number().describe('Residue count of the model to be built.'),
  })
  .describe('Loop-trim alignment.');

type BuildAlignmentInput = z.infer<typeof InputSchema>;
type BuildAlignmentOutput = z.infer<typeof OutputSchema>;

class LoopTrimBuildAlignmentLogic {
  constructor(private loopTrimService: LoopTrimServiceClass) {}

  async execute(
    input: BuildAlignmentInput,
    appContext: RequestContext,
    _sdkContext: SdkContext,
  ): Promise<BuildAlignmentOutput> {
    logger.debug('Building loop-trim alignment', {
      ...appContext,
      toolInput: { ...input, templateSequence: `${input.templateSequence.length} residues` },
    });

    const result = this.loopTrimService.buildAlignment(
      {
        templateSequence: input.templateSequence.toUpperCase(),
        templateId: input.templateId,
        structureFile: input.structureFile,
        chainId: input.chainId,
        loopRanges: input.loops,
        keepLengths: input.keeps,
      },
      appContext,
    );

    logger.info('Loop-trim alignment built', {
      ...appContext,
      templateId: input.templateId,
      loopCount: result.loops.length,
      totalTrimmed: result.totalTrimmed,
    });

    return {
      alignment: result.alignmentText,
      targetSequence: result.record.targetSequence,
      loops: result.loops,
      totalTrimmed: result.totalTrimmed,
      builtLength: result.builtLength,
    };
  }
}

function responseFormatter(result: BuildAlignmentOutput): ContentBlock[] {
  const loopLines = result.loops.map(
    (loop) =>
      `Loop ${loop.start}-${loop.end}: keep ${loop.keepN}+${loop.keepC}, trim ${loop.trimmedStart}-${loop.trimmedEnd} (${loop.trimmedLength} residues)`,
  );

  return [
    {
      type: 'text',
      text: [
        ...loopLines,
        `Total trimmed: ${result.totalTrimmed} | Model length: ${result.builtLength}`,
        '',
        result.alignment,
      ].join('\n'),
    },
  ];
}

export const loopTrimBuildAlignmentTool: ToolDefinition<
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
    const logic = new LoopTrimBuildAlignmentLogic(
      container.resolve<LoopTrimServiceClass>(LoopTrimService),
    );
    return logic.execute(input, appContext, sdkContext);
  },
  responseFormatter,
};
