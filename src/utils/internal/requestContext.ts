/**
 * @fileoverview Creation of the per-operation context that is threaded through
 * service calls and spread into every log line.
 * @module src/utils/internal/requestContext
 */
import { randomUUID } from 'node:crypto';

/**
 * Context of one logical operation (a CLI run, a tool call).
 */
export interface RequestContext {
  requestId: string;
  timestamp: string;
  operation?: string;
  [key: string]: unknown;
}

export const requestContextService = {
  /**
   * Creates a fresh context. Extra fields are copied onto it; a
   * `parentRequestId` links a child operation to its caller.
   */
  createRequestContext(
    additional: { operation?: string; [key: string]: unknown } = {},
  ): RequestContext {
    return {
      ...additional,
      requestId: randomUUID(),
      timestamp: new Date().toISOString(),
    };
  },
};
