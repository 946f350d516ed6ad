/**
 * @fileoverview Tool definition for mapping original residue numbers onto the
 * numbering of the trimmed model.
 * @module src/mcp-server/tools/definitions/loop-trim-map-residues.tool
 */
import type { ContentBlock } from '@modelcontextprotocol/sdk/types.js';
import { container } from 'tsyringe';
import { z } from 'zod';

import { LoopTrimService } from '@/container/tokens.js';
import {
  LoopSummarySchema,
  LoopTokensShape,
} from '@/mcp-server/tools/utils/loopSchemas.js';
import type {
  SdkContext,
  ToolAnnotations,
  ToolDefinition,
} from '@/mcp-server/tools/utils/toolDefinition.js';
import type { LoopTrimService as LoopTrimServiceClass } from '@/services/loop-trim/core/LoopTrimService.js';
import { JsonRpcErrorCode, McpError } from '@/types-global/errors.js';
import { type RequestContext, logger } from '@/utils/index.js';

const TOOL_NAME = 'loop_trim_map_residues';
const TOOL_TITLE = 'Map Residues Through Loop Trimming';
const TOOL_DESCRIPTION =
  'Map original (pre-trim) residue numbers to their index in the trimmed model. Trimmed residues map to null; offsets accumulate across loops. Also lists the model indices rebuilt as linker.';

const TOOL_ANNOTATIONS: ToolAnnotations = {
  readOnlyHint: true,
  idempotentHint: true,
  openWorldHint: false,
};

const MAX_LISTED_MAPPINGS = 40;

const InputSchema = z
  .object({
    sequenceLength: z
      .number()
      .int()
      .positive()
      .max(100000)
      .describe('Length of the original sequence.'),
    ...LoopTokensShape,
    residues: z
      .array(z.number().int().positive())
      .max(1000)
      .optional()
      .describe('Original residue numbers to map (default: every residue).'),
  })
  .describe('Parameters for residue mapping.');

const OutputSchema = z
  .object({
    loops: z.array(LoopSummarySchema),
    mappings: z.array(
      z.object({
        originalIndex: z.number(),
        outputIndex: z.number().nullable(),
        role: z.string().describe('frame, linker-n, linker-c or trimmed.'),
      }),
    ),
    excludedCount: z.number().describe('Residues removed by trimming.'),
    movable: z
      .array(z.number())
      .describe('Model indices of linker residues rebuilt by the engine.'),
  })
  .describe('Residue mapping through loop trimming.');

type MapResiduesInput = z.infer<typeof InputSchema>;
type MapResiduesOutput = z.infer<typeof OutputSchema>;

class LoopTrimMapResiduesLogic {
  constructor(private loopTrimService: LoopTrimServiceClass) {}

  async execute(
    input: MapResiduesInput,
    appContext: RequestContext,
    _sdkContext: SdkContext,
  ): Promise<MapResiduesOutput> {
    logger.debug('Mapping residues through loop trimming', {
      ...appContext,
      toolInput: input,
    });

    const outOfRange = input.residues?.find((r) => r > input.sequenceLength);
    if (outOfRange !== undefined) {
      throw new McpError(
        JsonRpcErrorCode.ValidationError,
        `Residue ${outOfRange} is beyond the sequence length ${input.sequenceLength}`,
        { requestId: appContext.requestId },
      );
    }

    const result = this.loopTrimService.mapResidues(
      {
        sequenceLength: input.sequenceLength,
        loopRanges: input.loops,
        keepLengths: input.keeps,
        residues: input.residues,
      },
      appContext,
    );

    logger.info('Residue mapping computed', {
      ...appContext,
      loopCount: result.loops.length,
      excludedCount: result.excludedCount,
      mappedCount: result.mappings.length,
    });

    return result;
  }
}

function responseFormatter(result: MapResiduesOutput): ContentBlock[] {
  const listed = result.mappings
    .slice(0, MAX_LISTED_MAPPINGS)
    .map(
      (m) =>
        `${m.originalIndex} -> ${m.outputIndex === null ? 'trimmed' : `${m.outputIndex} (${m.role})`}`,
    );
  const more =
    result.mappings.length > MAX_LISTED_MAPPINGS
      ? [`... and ${result.mappings.length - MAX_LISTED_MAPPINGS} more`]
      : [];

  return [
    {
      type: 'text',
      text: [
        `Loops: ${result.loops.map((l) => `${l.start}-${l.end}`).join(', ')}`,
        `Trimmed residues: ${result.excludedCount}`,
        `Linker residues (model numbering): ${result.movable.join(', ') || 'none'}`,
        '',
        ...listed,
        ...more,
      ].join('\n'),
    },
  ];
}

export const loopTrimMapResiduesTool: ToolDefinition<
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
    const logic = new LoopTrimMapResiduesLogic(
      container.resolve<LoopTrimServiceClass>(LoopTrimService),
    );
    return logic.execute(input, appContext, sdkContext);
  },
  responseFormatter,
};
