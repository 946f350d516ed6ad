/**
 * @fileoverview Injection tokens for the tsyringe container.
 * @module src/container/tokens
 */

export const AppConfig = Symbol('AppConfig');
export const ModelingEngine = Symbol('IModelingEngine');
export const LoopTrimService = Symbol('LoopTrimService');
