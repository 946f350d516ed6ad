/**
 * @fileoverview Application configuration, loaded from the environment (and an
 * optional `.env` file) and validated with zod.
 * @module src/config/index
 */
import { readFileSync } from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

import dotenv from 'dotenv';
import { z } from 'zod';

import { JsonRpcErrorCode, McpError } from '@/types-global/errors.js';
import { mcpLogLevels } from '@/utils/internal/logger.js';

dotenv.config();

const PackageJsonSchema = z.object({
  name: z.string(),
  version: z.string(),
});

const EnvSchema = z.object({
  LOG_LEVEL: z.enum(mcpLogLevels).default('info'),
  LOOP_TRIM_WORK_DIR: z.string().min(1).default('.'),
  LOOP_TRIM_DEFAULT_CHAIN: z
    .string()
    .regex(/^[A-Za-z0-9]$/, 'Chain id must be a single character')
    .default('A'),
  MODELING_ENGINE_URL: z.string().url().default('http://localhost:8765'),
  MODELING_ENGINE_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  MODELING_POLL_INTERVAL_MS: z.coerce.number().int().positive().default(2000),
  MODELING_MAX_POLL_ATTEMPTS: z.coerce.number().int().positive().default(900),
});

/**
 * Connection settings of the external modeling engine.
 */
export interface ModelingEngineConfig {
  baseUrl: string;
  timeoutMs: number;
  pollIntervalMs: number;
  maxPollAttempts: number;
}

export interface AppConfig {
  pkg: { name: string; version: string };
  logLevel: z.infer<typeof EnvSchema>['LOG_LEVEL'];
  workDir: string;
  defaultChainId: string;
  modelingEngine: ModelingEngineConfig;
}

function readPackageJson(): { name: string; version: string } {
  const rootDir = path.resolve(
    path.dirname(fileURLToPath(import.meta.url)),
    '../..',
  );
  try {
    const raw: unknown = JSON.parse(
      readFileSync(path.join(rootDir, 'package.json'), 'utf8'),
    );
    return PackageJsonSchema.parse(raw);
  } catch {
    return { name: 'loop-trim-modeling', version: '0.0.0' };
  }
}

/**
 * Builds the configuration from an environment map.
 *
 * @throws {McpError} ConfigurationError when a variable fails validation.
 */
export function parseConfig(env: NodeJS.ProcessEnv): AppConfig {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new McpError(
      JsonRpcErrorCode.ConfigurationError,
      `Invalid environment configuration: ${details}`,
      { issues: result.error.issues },
    );
  }

  const parsed = result.data;
  return {
    pkg: readPackageJson(),
    logLevel: parsed.LOG_LEVEL,
    workDir: parsed.LOOP_TRIM_WORK_DIR,
    defaultChainId: parsed.LOOP_TRIM_DEFAULT_CHAIN,
    modelingEngine: {
      baseUrl: parsed.MODELING_ENGINE_URL.replace(/\/+$/, ''),
      timeoutMs: parsed.MODELING_ENGINE_TIMEOUT_MS,
      pollIntervalMs: parsed.MODELING_POLL_INTERVAL_MS,
      maxPollAttempts: parsed.MODELING_MAX_POLL_ATTEMPTS,
    },
  };
}

/**
 * Configuration of the running process. Parsed on each call so that callers
 * decide where a `ConfigurationError` is reported.
 */
export function loadConfig(): AppConfig {
  return parseConfig(process.env);
}
