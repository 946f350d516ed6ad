/**
 * @fileoverview Transfers template residue numbering and chain ids onto
 * candidate models built in trimmed numbering.
 * @module src/services/loop-trim/pipeline/residue-renumberer
 */

import { JsonRpcErrorCode, McpError } from '@/types-global/errors.js';
import {
  logger,
  readResidues,
  readTextFile,
  residueKey,
  rewriteResidueIds,
  toOneLetter,
  writeTextFile,
  type PdbResidue,
  type RequestContext,
  type ResidueId,
} from '@/utils/index.js';
import {
  GAP_CHAR,
  type AlignmentRecord,
  type CandidateModel,
  type RenumberedModel,
} from '../types.js';
import { ungappedTarget } from './alignment-builder.js';

/**
 * Model residue paired with the template residue whose identity it takes.
 */
export interface ResiduePair {
  model: PdbResidue;
  template: PdbResidue;
}

/**
 * Residue-correspondence primitive: pairs model residues with template
 * residues for one alignment.
 */
export type ResidueCorrespondence = (
  templateResidues: readonly PdbResidue[],
  modelResidues: readonly PdbResidue[],
  alignment: AlignmentRecord,
) => ResiduePair[];

export const RENUMBERED_SUFFIX = '_renum.pdb';

function mismatch(message: string, data: Record<string, unknown>): McpError {
  return new McpError(JsonRpcErrorCode.StructureMismatch, message, data);
}

function codesAgree(a: string, b: string): boolean {
  return a === 'X' || b === 'X' || a === b;
}

/**
 * Pairs residues column by column: every non-gap target column consumes the
 * next model residue and takes the template residue of the same column.
 *
 * @throws {McpError} StructureMismatch when counts or residue identities
 * disagree with the alignment.
 */
export const alignmentCorrespondence: ResidueCorrespondence = (
  templateResidues,
  modelResidues,
  alignment,
) => {
  const { templateSequence, targetSequence } = alignment;

  if (templateResidues.length !== templateSequence.length) {
    throw mismatch(
      `Template chain ${alignment.chainId} has ${templateResidues.length} residues but the alignment template has ${templateSequence.length}`,
      { templateResidues: templateResidues.length, alignmentLength: templateSequence.length },
    );
  }
  const expectedModelLength = ungappedTarget(alignment).length;
  if (modelResidues.length !== expectedModelLength) {
    throw mismatch(
      `Model has ${modelResidues.length} residues but the alignment target has ${expectedModelLength}`,
      { modelResidues: modelResidues.length, targetLength: expectedModelLength },
    );
  }

  const pairs: ResiduePair[] = [];
  let modelCursor = 0;
  for (let column = 0; column < targetSequence.length; column++) {
    const targetCode = targetSequence.charAt(column);
    if (targetCode === GAP_CHAR) continue;

    const template = templateResidues[column];
    const model = modelResidues[modelCursor];
    modelCursor++;
    if (!template || !model) {
      throw mismatch(`Alignment column ${column + 1} has no residue`, { column });
    }

    const templateCode = toOneLetter(template.resName);
    const modelCode = toOneLetter(model.resName);
    if (
      !codesAgree(templateCode, templateSequence.charAt(column)) ||
      !codesAgree(modelCode, targetCode)
    ) {
      throw mismatch(
        `Residue identity mismatch at alignment column ${column + 1}: template ${template.resName} ${template.resSeq}, model ${model.resName} ${model.resSeq}, alignment ${targetCode}`,
        { column, template, model },
      );
    }
    pairs.push({ model, template });
  }

  return pairs;
};

/**
 * Rewrites a model's residue ids to those of the paired template residues.
 */
export function renumberStructure(
  modelPdb: string,
  pairs: readonly ResiduePair[],
): string {
  const mapping = new Map<string, ResidueId>();
  for (const { model, template } of pairs) {
    mapping.set(residueKey(model), {
      chainId: template.chainId,
      resSeq: template.resSeq,
      iCode: template.iCode,
    });
  }
  return rewriteResidueIds(modelPdb, mapping);
}

export function renumberedPath(modelPath: string): string {
  return modelPath.replace(/\.pdb$/i, '') + RENUMBERED_SUFFIX;
}

export interface RenumberOptions {
  templatePath: string;
  alignment: AlignmentRecord;
  correspondence?: ResidueCorrespondence | undefined;
}

/**
 * Renumbers each model against the template and writes `<model>_renum.pdb`.
 *
 * @throws {McpError} IoError on file failures, StructureMismatch when a model
 * cannot be put in correspondence with the template.
 */
export async function renumberModels(
  models: readonly CandidateModel[],
  options: RenumberOptions,
  context: RequestContext,
): Promise<RenumberedModel[]> {
  const correspond = options.correspondence ?? alignmentCorrespondence;
  const templatePdb = await readTextFile(options.templatePath, context);
  const templateResidues = readResidues(templatePdb, options.alignment.chainId);

  const renumbered: RenumberedModel[] = [];
  for (const model of models) {
    const modelPdb = await readTextFile(model.path, context);
    const pairs = correspond(templateResidues, readResidues(modelPdb), options.alignment);
    const outputPath = renumberedPath(model.path);
    await writeTextFile(outputPath, renumberStructure(modelPdb, pairs), context);

    logger.info('Model renumbered to template numbering', {
      ...context,
      model: model.name,
      outputPath,
      residueCount: pairs.length,
    });
    renumbered.push({
      name: model.name,
      sourcePath: model.path,
      outputPath,
      residueCount: pairs.length,
      qualityScore: model.qualityScore,
    });
  }

  return renumbered;
}
