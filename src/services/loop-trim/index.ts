/**
 * @fileoverview Barrel export for the loop-trim service domain.
 * @module src/services/loop-trim/index
 */

// Core
export type {
  IModelingEngine,
  ModelBuildRequest,
} from './core/IModelingEngine.js';
export { LoopTrimService } from './core/LoopTrimService.js';

// Pipeline
export {
  parseLoopSet,
  summarizeLoop,
  trimmedSpan,
} from './pipeline/loop-spec-parser.js';
export {
  buildAlignmentRecord,
  buildTargetSequence,
  formatAlignment,
  ungappedTarget,
  writeAlignmentFile,
} from './pipeline/alignment-builder.js';
export { ResidueIndexMapper } from './pipeline/residue-index-mapper.js';
export {
  formatTopModelSummary,
  rankCandidates,
} from './pipeline/model-ranker.js';
export {
  alignmentCorrespondence,
  renumberModels,
  renumberStructure,
} from './pipeline/residue-renumberer.js';

// Providers
export { RemoteModelingEngine } from './providers/remote.provider.js';

// Types
export * from './types.js';
