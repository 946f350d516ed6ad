/**
 * @fileoverview Shape of a tool definition: metadata, zod schemas, the logic
 * function and an optional formatter turning results into content blocks.
 * @module src/mcp-server/tools/utils/toolDefinition
 */
import type { ContentBlock } from '@modelcontextprotocol/sdk/types.js';
import type { z } from 'zod';

import type { RequestContext } from '@/utils/index.js';

/**
 * Behavioural hints advertised to MCP clients.
 */
export interface ToolAnnotations {
  readOnlyHint?: boolean;
  destructiveHint?: boolean;
  idempotentHint?: boolean;
  openWorldHint?: boolean;
}

/**
 * The parts of the SDK's per-request context the tools use.
 */
export interface SdkContext {
  signal: AbortSignal;
  requestId: string | number;
}

export interface ToolDefinition<
  TInputSchema extends z.AnyZodObject,
  TOutputSchema extends z.AnyZodObject,
> {
  name: string;
  title: string;
  description: string;
  inputSchema: TInputSchema;
  outputSchema: TOutputSchema;
  annotations?: ToolAnnotations;
  logic(
    input: z.infer<TInputSchema>,
    appContext: RequestContext,
    sdkContext: SdkContext,
  ): Promise<z.infer<TOutputSchema>>;
  responseFormatter?(result: z.infer<TOutputSchema>): ContentBlock[];
}
