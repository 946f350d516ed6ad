/**
 * @fileoverview Shared fixtures for tests that need a request context or an
 * application configuration.
 * @module tests/helpers/context
 */
import type { AppConfig } from '@/config/index.js';
import type { RequestContext } from '@/utils/index.js';

export function testContext(): RequestContext {
  return {
    requestId: 'test-req-1',
    timestamp: new Date().toISOString(),
    operation: 'test',
  };
}

export function testConfig(overrides: Partial<AppConfig> = {}): AppConfig {
  return {
    pkg: { name: 'loop-trim-modeling', version: '0.0.0-test' },
    logLevel: 'crit',
    workDir: '.',
    defaultChainId: 'A',
    modelingEngine: {
      baseUrl: 'http://engine.test',
      timeoutMs: 1000,
      pollIntervalMs: 1,
      maxPollAttempts: 5,
    },
    ...overrides,
  };
}

/**
 * Response factory; a Response body can be read only once.
 */
export function jsonResponse(body: unknown, status = 200): () => Response {
  return () =>
    new Response(JSON.stringify(body), {
      status,
      headers: { 'Content-Type': 'application/json' },
    });
}
