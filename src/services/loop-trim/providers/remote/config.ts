/**
 * @fileoverview Endpoint paths of the remote modeling engine API.
 * @module src/services/loop-trim/providers/remote/config
 */

/**
 * Job submission endpoint, relative to the engine base URL
 */
export const JOBS_PATH = '/jobs';

/**
 * Health endpoint, relative to the engine base URL
 */
export const HEALTH_PATH = '/health';

/**
 * Extension of the raw model files written to the working directory
 */
export const MODEL_FILE_EXTENSION = '.pdb';
