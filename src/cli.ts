#!/usr/bin/env node
/**
 * @fileoverview Command-line entry point for a loop-trim modeling run.
 * @module src/cli
 */
import 'reflect-metadata';

import { runCli } from '@/cli/run.js';
import { logger } from '@/utils/index.js';

runCli(process.argv.slice(2)).then(
  (exitCode) => {
    process.exitCode = exitCode;
  },
  (error: unknown) => {
    logger.crit('Unexpected CLI failure', { error });
    process.exitCode = 1;
  },
);
