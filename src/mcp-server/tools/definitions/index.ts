/**
 * @fileoverview Barrel file for all tool definitions.
 * Exports an array of all definitions for automated registration.
 * @module src/mcp-server/tools/definitions
 */

import { loopTrimBuildAlignmentTool } from './loop-trim-build-alignment.tool.js';
import { loopTrimMapResiduesTool } from './loop-trim-map-residues.tool.js';
import { loopTrimRunModelingTool } from './loop-trim-run-modeling.tool.js';

/**
 * An array containing all tool definitions for easy iteration.
 */
export const allToolDefinitions = [
  loopTrimBuildAlignmentTool,
  loopTrimMapResiduesTool,
  loopTrimRunModelingTool,
];
