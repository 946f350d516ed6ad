/**
 * @fileoverview Composition root: registers configuration, the modeling engine
 * and the loop-trim service with the tsyringe container.
 * @module src/container/index
 */
import 'reflect-metadata';

import { container, Lifecycle } from 'tsyringe';

import type { AppConfig as AppConfigType } from '@/config/index.js';
import {
  LoopTrimService as LoopTrimServiceClass,
  RemoteModelingEngine,
  type IModelingEngine,
} from '@/services/loop-trim/index.js';
import { logger } from '@/utils/index.js';
import { AppConfig, LoopTrimService, ModelingEngine } from './tokens.js';

let composed = false;

/**
 * Registers every injectable. Safe to call more than once.
 */
export function composeContainer(appConfig: AppConfigType): void {
  if (composed) return;

  logger.setLevel(appConfig.logLevel);
  container.register(AppConfig, { useValue: appConfig });
  container.register<IModelingEngine>(
    ModelingEngine,
    { useClass: RemoteModelingEngine },
    { lifecycle: Lifecycle.Singleton },
  );
  container.register(
    LoopTrimService,
    { useClass: LoopTrimServiceClass },
    { lifecycle: Lifecycle.Singleton },
  );

  composed = true;
  logger.debug('Container composed', {
    engine: appConfig.modelingEngine.baseUrl,
  });
}

export { container };
