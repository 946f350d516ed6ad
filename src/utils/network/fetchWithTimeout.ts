/**
 * @fileoverview fetch wrapper that aborts after a timeout and converts
 * transport failures into McpError.
 * @module src/utils/network/fetchWithTimeout
 */
import { JsonRpcErrorCode, McpError } from '@/types-global/errors.js';
import { logger } from '@/utils/internal/logger.js';
import type { RequestContext } from '@/utils/internal/requestContext.js';

/**
 * Standard fetch options plus a timeout in milliseconds.
 */
export interface FetchWithTimeoutOptions extends Omit<RequestInit, 'signal'> {
  timeout: number;
}

/**
 * Fetches a resource, aborting after `options.timeout` milliseconds.
 *
 * Non-2xx responses are returned unchanged when `allowHttpErrors` is set,
 * otherwise they raise ServiceUnavailable.
 *
 * @throws {McpError} Timeout when the request is aborted, ServiceUnavailable on
 * network or HTTP errors.
 */
export async function fetchWithTimeout(
  url: string | URL,
  options: FetchWithTimeoutOptions,
  context: RequestContext,
  allowHttpErrors = false,
): Promise<Response> {
  const { timeout, ...fetchOptions } = options;
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeout);

  const urlString = url.toString();
  const operationDescription = `fetch ${fetchOptions.method ?? 'GET'} ${urlString}`;

  logger.debug(`Attempting ${operationDescription} with ${timeout}ms timeout.`, {
    ...context,
  });

  let response: Response;
  try {
    response = await fetch(url, {
      ...fetchOptions,
      signal: controller.signal,
    });
  } catch (error) {
    if (error instanceof Error && error.name === 'AbortError') {
      logger.error(`${operationDescription} timed out after ${timeout}ms.`, {
        ...context,
        errorSource: 'FetchTimeout',
      });
      throw new McpError(
        JsonRpcErrorCode.Timeout,
        `${operationDescription} timed out.`,
        { requestId: context.requestId, errorSource: 'FetchTimeout' },
      );
    }

    const errorMessage = error instanceof Error ? error.message : String(error);
    logger.error(`Network error during ${operationDescription}: ${errorMessage}`, {
      ...context,
      originalErrorName: error instanceof Error ? error.name : 'UnknownError',
      errorSource: 'FetchNetworkError',
    });
    throw new McpError(
      JsonRpcErrorCode.ServiceUnavailable,
      `Network error during ${operationDescription}: ${errorMessage}`,
      { requestId: context.requestId, errorSource: 'FetchNetworkError' },
    );
  } finally {
    clearTimeout(timeoutId);
  }

  if (!response.ok && !allowHttpErrors) {
    logger.error(`Fetch failed for ${urlString} with status ${response.status}.`, {
      ...context,
      errorSource: 'FetchHttpError',
      statusCode: response.status,
      statusText: response.statusText,
    });
    throw new McpError(
      JsonRpcErrorCode.ServiceUnavailable,
      `HTTP error! Status: ${response.status} ${response.statusText}`,
      {
        requestId: context.requestId,
        errorSource: 'FetchHttpError',
        statusCode: response.status,
      },
    );
  }

  logger.debug(`Fetched ${urlString}. Status: ${response.status}`, {
    ...context,
  });
  return response;
}
