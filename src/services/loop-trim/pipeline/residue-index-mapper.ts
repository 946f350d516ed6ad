/**
 * @fileoverview Maps original residue positions onto the numbering of the
 * trimmed model. Each loop removes its trimmed span, so every residue after it
 * shifts down by that span's length, and the shifts add up across loops.
 * @module src/services/loop-trim/pipeline/residue-index-mapper
 */

import { JsonRpcErrorCode, McpError } from '@/types-global/errors.js';
import { logger, type RequestContext } from '@/utils/index.js';
import {
  ResidueRole,
  type LoopSet,
  type LoopSpec,
  type MappedResidue,
  type ResidueSelection,
  type ResidueSelector,
} from '../types.js';
import { trimmedSpan } from './loop-spec-parser.js';

/**
 * A loop together with the offset accumulated from every loop before it.
 */
interface LoopOffsetEntry {
  loopIndex: number;
  loop: LoopSpec;
  trimmedStart: number;
  trimmedEnd: number;
  trimmedLength: number;
  /** Residues removed by loops 0..loopIndex-1. */
  offsetBefore: number;
}

export interface ResidueIndexMapperOptions {
  /** Upper bound for queries; unbounded when omitted. */
  sequenceLength?: number | undefined;
  /** Context for the per-loop debug events emitted at construction. */
  context?: RequestContext | undefined;
}

/**
 * Original-to-output residue index mapping for a loop set.
 *
 * The offset table is computed once in the constructor; queries are pure
 * lookups and safe to share between concurrent model builds.
 */
export class ResidueIndexMapper implements ResidueSelector {
  private readonly entries: readonly LoopOffsetEntry[];
  private readonly sequenceLength: number | undefined;

  /**
   * @param loops - sorted by `start` (as returned by `parseLoopSet`)
   */
  constructor(loops: LoopSet, options: ResidueIndexMapperOptions = {}) {
    this.sequenceLength = options.sequenceLength;

    for (let i = 1; i < loops.length; i++) {
      const previous = loops[i - 1];
      const current = loops[i];
      if (previous && current && previous.end >= current.start) {
        throw new McpError(
          JsonRpcErrorCode.ConfigurationError,
          'Residue mapping requires loops sorted by start and non-overlapping',
          { previous, current },
        );
      }
    }

    const entries: LoopOffsetEntry[] = [];
    let runningOffset = 0;
    loops.forEach((loop, loopIndex) => {
      const span = trimmedSpan(loop);
      const entry: LoopOffsetEntry = {
        loopIndex,
        loop,
        trimmedStart: span.start,
        trimmedEnd: span.end,
        trimmedLength: span.length,
        offsetBefore: runningOffset,
      };
      entries.push(entry);
      if (options.context) {
        this.logLoop(entry, options.context);
      }
      runningOffset += span.length;
    });
    this.entries = entries;
  }

  /**
   * Total residues removed by all loops.
   */
  get totalTrimmed(): number {
    const last = this.entries[this.entries.length - 1];
    return last ? last.offsetBefore + last.trimmedLength : 0;
  }

  select(originalIndex: number): MappedResidue | null {
    this.assertInRange(originalIndex);

    for (const entry of this.entries) {
      const { loop, loopIndex, offsetBefore } = entry;

      if (originalIndex < entry.trimmedStart) {
        const isLinker = originalIndex > loop.start;
        return {
          originalIndex,
          outputIndex: originalIndex - offsetBefore,
          role: isLinker ? ResidueRole.LINKER_N : ResidueRole.FRAME,
          loopIndex: isLinker ? loopIndex : undefined,
        };
      }

      if (originalIndex <= entry.trimmedEnd) {
        return null;
      }

      if (originalIndex < loop.end) {
        return {
          originalIndex,
          outputIndex: originalIndex - offsetBefore - entry.trimmedLength,
          role: ResidueRole.LINKER_C,
          loopIndex,
        };
      }
    }

    return {
      originalIndex,
      outputIndex: originalIndex - this.totalTrimmed,
      role: ResidueRole.FRAME,
    };
  }

  /**
   * @throws {McpError} ResidueNotMapped when the residue is trimmed or out of
   * range.
   */
  outputIndexOf(originalIndex: number): number {
    const mapped = this.select(originalIndex);
    if (!mapped) {
      throw new McpError(
        JsonRpcErrorCode.ResidueNotMapped,
        `Residue ${originalIndex} lies in a trimmed span and has no output index`,
        { originalIndex },
      );
    }
    return mapped.outputIndex;
  }

  buildSelection(sequenceLength: number): ResidueSelection {
    const selection: ResidueSelection = {
      retained: [],
      excluded: [],
      movable: [],
    };

    for (let i = 1; i <= sequenceLength; i++) {
      const mapped = this.select(i);
      if (!mapped) {
        selection.excluded.push(i);
        continue;
      }
      selection.retained.push(mapped);
      if (mapped.role !== ResidueRole.FRAME) {
        selection.movable.push(mapped.outputIndex);
      }
    }

    return selection;
  }

  private assertInRange(originalIndex: number): void {
    const upper = this.sequenceLength ?? Number.MAX_SAFE_INTEGER;
    if (
      !Number.isInteger(originalIndex) ||
      originalIndex < 1 ||
      originalIndex > upper
    ) {
      throw new McpError(
        JsonRpcErrorCode.ResidueNotMapped,
        `Residue ${originalIndex} is outside the sequence`,
        { originalIndex, sequenceLength: this.sequenceLength },
      );
    }
  }

  private logLoop(entry: LoopOffsetEntry, context: RequestContext): void {
    const { loop, loopIndex } = entry;
    logger.debug('Residue mapping', {
      ...context,
      loopIndex,
      phase: 'pre-trim',
      keptRange: [loop.start + 1, entry.trimmedStart - 1],
      runningOffset: entry.offsetBefore,
    });
    logger.debug('Residue mapping', {
      ...context,
      loopIndex,
      phase: 'trim',
      trimmedRange: [entry.trimmedStart, entry.trimmedEnd],
      trimmedLength: entry.trimmedLength,
    });
    logger.debug('Residue mapping', {
      ...context,
      loopIndex,
      phase: 'post-trim',
      keptRange: [entry.trimmedEnd + 1, loop.end - 1],
      runningOffset: entry.offsetBefore + entry.trimmedLength,
    });
  }
}
