/**
 * @fileoverview Type definitions for the loop-trim domain.
 * Covers loop specifications, the alignment record, residue mappings and the
 * candidate models exchanged with the modeling engine.
 * @module src/services/loop-trim/types
 */

/**
 * One loop to shorten. Positions are 1-based and inclusive in the original
 * (untrimmed) numbering.
 */
export interface LoopSpec {
  readonly start: number;
  readonly end: number;
  /** Residues kept after `start` at the N-terminal end. */
  readonly keepN: number;
  /** Residues kept before `end` at the C-terminal end. */
  readonly keepC: number;
}

/**
 * Validated loops, sorted by `start`, pairwise non-overlapping.
 */
export type LoopSet = ReadonlyArray<LoopSpec>;

/**
 * Original-numbering bounds of the residues removed from a loop.
 */
export interface TrimmedSpan {
  start: number;
  end: number;
  length: number;
}

/**
 * Per-loop summary reported by the tools and the run result.
 */
export interface LoopTrimSummary extends LoopSpec {
  trimmedStart: number;
  trimmedEnd: number;
  trimmedLength: number;
}

/**
 * Gap character written into the target sequence.
 */
export const GAP_CHAR = '-';

/**
 * Two-record alignment handed to the modeling engine: the template as found in
 * the structure and the target with each loop interior replaced by gaps.
 */
export interface AlignmentRecord {
  templateId: string;
  targetId: string;
  structureFile: string;
  chainId: string;
  templateSequence: string;
  targetSequence: string;
}

/**
 * Role of a retained residue in the model being built.
 */
export enum ResidueRole {
  /** Outside every loop interior; frozen during building. */
  FRAME = 'frame',
  /** Kept N-terminal stretch of a loop; rebuilt as part of the linker. */
  LINKER_N = 'linker-n',
  /** Kept C-terminal stretch of a loop; rebuilt as part of the linker. */
  LINKER_C = 'linker-c',
}

/**
 * A retained residue and its 1-based index in the trimmed (model) numbering.
 */
export interface MappedResidue {
  originalIndex: number;
  outputIndex: number;
  role: ResidueRole;
  /** Index into the loop set for linker residues. */
  loopIndex?: number | undefined;
}

/**
 * Strategy consulted while the engine assembles its frozen/rebuild atom sets.
 * Implementations must be pure: the same index always yields the same answer.
 */
export interface ResidueSelector {
  /** Mapping of a retained residue, `null` for a trimmed one. */
  select(originalIndex: number): MappedResidue | null;
  /** Output index of a retained residue; throws for a trimmed one. */
  outputIndexOf(originalIndex: number): number;
  buildSelection(sequenceLength: number): ResidueSelection;
}

/**
 * A selector evaluated over a whole sequence.
 */
export interface ResidueSelection {
  retained: MappedResidue[];
  /** Original indices of trimmed residues. */
  excluded: number[];
  /** Output indices of linker residues, the atoms the engine rebuilds. */
  movable: number[];
}

/**
 * One model returned by the engine.
 */
export interface CandidateModel {
  name: string;
  /** Path of the raw model file; empty when the build failed. */
  path: string;
  /** Primary ranking key (DOPE-like statistical potential), lower is better. */
  qualityScore: number;
  /** Secondary assessment score (GA341-like), higher is better. */
  secondaryScore: number;
  failed: boolean;
  failureReason?: string | undefined;
}

/**
 * Outcome of ranking: accepted candidates best first.
 */
export interface ModelRanking {
  top: CandidateModel;
  accepted: CandidateModel[];
  failedCount: number;
}

/**
 * A candidate written back in template numbering.
 */
export interface RenumberedModel {
  name: string;
  sourcePath: string;
  outputPath: string;
  residueCount: number;
  qualityScore: number;
}

/**
 * Loop tokens as entered by the user, e.g. `["50:70"]` and `["3:3"]`.
 */
export interface LoopTokens {
  loopRanges: string[];
  keepLengths: string[];
}

export interface BuildAlignmentParams extends LoopTokens {
  templateSequence: string;
  templateId: string;
  structureFile: string;
  chainId: string;
}

export interface BuildAlignmentResult {
  record: AlignmentRecord;
  alignmentText: string;
  loops: LoopTrimSummary[];
  totalTrimmed: number;
  /** Residue count of the model that will be built. */
  builtLength: number;
}

export interface MapResiduesParams extends LoopTokens {
  sequenceLength: number;
  /** Residues to report; all residues when omitted. */
  residues?: number[] | undefined;
}

export interface ResidueMappingEntry {
  originalIndex: number;
  outputIndex: number | null;
  role: ResidueRole | 'trimmed';
}

export interface MapResiduesResult {
  loops: LoopTrimSummary[];
  mappings: ResidueMappingEntry[];
  excludedCount: number;
  movable: number[];
}

export interface LoopTrimRunParams extends LoopTokens {
  fastaPath: string;
  templateId: string;
  pdbPath: string;
  chainId: string;
  modelCount: number;
  workDir: string;
}

export interface PreparedRun {
  record: AlignmentRecord;
  alignmentPath: string;
  loops: LoopSet;
  summaries: LoopTrimSummary[];
}

export interface LoopTrimRunResult {
  alignmentPath: string;
  loops: LoopTrimSummary[];
  ranking: ModelRanking;
  renumbered: RenumberedModel[];
}
