/**
 * @fileoverview Creates the MCP server and registers every tool definition,
 * wrapping each tool's logic with input validation, context creation and
 * error reporting.
 * @module src/mcp-server/server
 */
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { ZodError, type z } from 'zod';

import type { AppConfig } from '@/config/index.js';
import {
  JsonRpcErrorCode,
  McpError,
  errorCodeName,
} from '@/types-global/errors.js';
import { logger, requestContextService } from '@/utils/index.js';
import { allToolDefinitions } from './tools/definitions/index.js';
import type {
  SdkContext,
  ToolDefinition,
} from './tools/utils/toolDefinition.js';

type AnyToolDefinition = ToolDefinition<z.AnyZodObject, z.AnyZodObject>;

function toMcpError(error: unknown): McpError {
  if (error instanceof McpError) return error;
  if (error instanceof ZodError) {
    return new McpError(
      JsonRpcErrorCode.ValidationError,
      `Invalid tool input: ${error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')}`,
      { issues: error.issues },
    );
  }
  return new McpError(
    JsonRpcErrorCode.InternalError,
    error instanceof Error ? error.message : String(error),
  );
}

/**
 * Wraps a tool definition into an SDK tool callback.
 */
export function createToolHandler(tool: AnyToolDefinition) {
  return async (args: unknown, extra: SdkContext): Promise<CallToolResult> => {
    const appContext = requestContextService.createRequestContext({
      operation: 'HandleToolRequest',
      toolName: tool.name,
      sdkRequestId: extra.requestId,
    });

    try {
      const input = await tool.inputSchema.parseAsync(args);
      const result = await tool.logic(input, appContext, extra);
      const structuredContent = tool.outputSchema.parse(result);
      const content = tool.responseFormatter
        ? tool.responseFormatter(result)
        : [{ type: 'text' as const, text: JSON.stringify(result, null, 2) }];
      return { structuredContent, content };
    } catch (error) {
      const mcpError = toMcpError(error);
      logger.error('Tool execution failed', {
        ...appContext,
        code: mcpError.code,
        error: mcpError,
      });
      return {
        isError: true,
        content: [
          {
            type: 'text',
            text: `Error [${errorCodeName(mcpError.code)}]: ${mcpError.message}`,
          },
        ],
      };
    }
  };
}

function registerTool(server: McpServer, tool: AnyToolDefinition): void {
  server.registerTool(
    tool.name,
    {
      title: tool.title,
      description: tool.description,
      inputSchema: tool.inputSchema.shape,
      outputSchema: tool.outputSchema.shape,
      annotations: tool.annotations,
    },
    createToolHandler(tool),
  );
  logger.debug('Tool registered', { toolName: tool.name });
}

export function createMcpServer(appConfig: AppConfig): McpServer {
  const server = new McpServer(
    { name: appConfig.pkg.name, version: appConfig.pkg.version },
    { capabilities: { tools: {}, logging: {} } },
  );
  for (const tool of allToolDefinitions) {
    registerTool(server, tool);
  }
  return server;
}
