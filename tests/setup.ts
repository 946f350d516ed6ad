/**
 * @fileoverview Loaded before every test file: decorator metadata polyfill and
 * a quiet logger.
 * @module tests/setup
 */
import 'reflect-metadata';

import { logger } from '@/utils/internal/logger.js';

logger.setLevel('crit');
