/**
 * @fileoverview Barrel export for shared utilities.
 * @module src/utils/index
 */
export * from './internal/logger.js';
export * from './internal/requestContext.js';
export * from './io/textFile.js';
export * from './network/fetchWithTimeout.js';
export * from './parsing/fastaParser.js';
export * from './parsing/pdbParser.js';
