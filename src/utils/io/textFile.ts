/**
 * @fileoverview Text file helpers that report failures as IoError.
 * @module src/utils/io/textFile
 */
import { readFile, writeFile } from 'node:fs/promises';

import { JsonRpcErrorCode, McpError } from '@/types-global/errors.js';
import { logger } from '@/utils/internal/logger.js';
import type { RequestContext } from '@/utils/internal/requestContext.js';

export async function readTextFile(
  filePath: string,
  context: RequestContext,
): Promise<string> {
  try {
    return await readFile(filePath, 'utf8');
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : String(error);
    logger.error('Failed to read file', { ...context, filePath, error });
    throw new McpError(
      JsonRpcErrorCode.IoError,
      `Cannot read ${filePath}: ${errorMessage}`,
      { requestId: context.requestId, filePath },
    );
  }
}

export async function writeTextFile(
  filePath: string,
  content: string,
  context: RequestContext,
): Promise<void> {
  try {
    await writeFile(filePath, content, 'utf8');
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : String(error);
    logger.error('Failed to write file', { ...context, filePath, error });
    throw new McpError(
      JsonRpcErrorCode.IoError,
      `Cannot write ${filePath}: ${errorMessage}`,
      { requestId: context.requestId, filePath },
    );
  }
  logger.debug('File written', { ...context, filePath, bytes: content.length });
}
