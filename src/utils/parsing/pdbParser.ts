/**
 * @fileoverview Residue-level reading and rewriting of PDB coordinate records.
 * Only the fixed columns needed for numbering are touched (chain id, residue
 * sequence number, insertion code); coordinates pass through untouched.
 * @module src/utils/parsing/pdbParser
 */
import { JsonRpcErrorCode, McpError } from '@/types-global/errors.js';

/**
 * Identity of one residue in a PDB file.
 */
export interface ResidueId {
  chainId: string;
  resSeq: number;
  iCode: string;
}

export interface PdbResidue extends ResidueId {
  resName: string;
}

const COORDINATE_RECORDS = ['ATOM  ', 'HETATM'];
const RENUMBERED_RECORDS = ['ATOM  ', 'HETATM', 'ANISOU', 'TER   '];

const THREE_TO_ONE: Record<string, string> = {
  ALA: 'A',
  ARG: 'R',
  ASN: 'N',
  ASP: 'D',
  CYS: 'C',
  GLN: 'Q',
  GLU: 'E',
  GLY: 'G',
  HIS: 'H',
  ILE: 'I',
  LEU: 'L',
  LYS: 'K',
  MET: 'M',
  PHE: 'F',
  PRO: 'P',
  SER: 'S',
  THR: 'T',
  TRP: 'W',
  TYR: 'Y',
  VAL: 'V',
  MSE: 'M',
  SEC: 'U',
  PYL: 'O',
  HSD: 'H',
  HSE: 'H',
  HIE: 'H',
};

/**
 * One-letter code of a residue name, `X` when unknown.
 */
export function toOneLetter(resName: string): string {
  return THREE_TO_ONE[resName.trim().toUpperCase()] ?? 'X';
}

export function residueKey(id: ResidueId): string {
  return `${id.chainId}|${id.resSeq}|${id.iCode}`;
}

function recordName(line: string): string {
  return line.slice(0, 6).padEnd(6, ' ');
}

function readResidueId(line: string): ResidueId | null {
  if (line.length < 27) return null;
  const resSeq = Number.parseInt(line.slice(22, 26).trim(), 10);
  if (Number.isNaN(resSeq)) return null;
  return {
    chainId: line.charAt(21).trim(),
    resSeq,
    iCode: line.charAt(26).trim(),
  };
}

/**
 * Lists the residues of the first model in file order. HETATM records count
 * only when they carry a residue with a one-letter code (e.g. MSE), so waters
 * and ligands stay out of the sequence.
 *
 * @param chainId - restrict to one chain; omit for all chains
 */
export function readResidues(pdbText: string, chainId?: string): PdbResidue[] {
  const residues: PdbResidue[] = [];
  let lastKey: string | undefined;

  for (const line of pdbText.split(/\r?\n/)) {
    const record = recordName(line);
    if (record === 'ENDMDL') break;
    if (!COORDINATE_RECORDS.includes(record)) continue;

    const resName = line.slice(17, 20).trim();
    if (record === 'HETATM' && toOneLetter(resName) === 'X') continue;

    const id = readResidueId(line);
    if (!id) continue;
    if (chainId !== undefined && id.chainId !== chainId) continue;

    const key = residueKey(id);
    if (key === lastKey) continue;
    lastKey = key;
    residues.push({ ...id, resName });
  }

  return residues;
}

/**
 * The 4-column residue sequence number field (columns 23-26).
 *
 * @throws {McpError} StructureMismatch when the number needs more columns.
 */
function formatResSeq(resSeq: number): string {
  const field = String(resSeq).padStart(4, ' ');
  if (!Number.isInteger(resSeq) || field.length > 4) {
    throw new McpError(
      JsonRpcErrorCode.StructureMismatch,
      `Residue number ${resSeq} does not fit the 4-column PDB residue field`,
      { resSeq },
    );
  }
  return field;
}

/**
 * Rewrites residue identifiers on coordinate and TER records according to
 * `mapping` (keyed by {@link residueKey} of the current identifier). Records of
 * residues absent from the mapping are left as they are.
 *
 * @throws {McpError} StructureMismatch when a target residue number does not
 * fit the PDB column.
 */
export function rewriteResidueIds(
  pdbText: string,
  mapping: ReadonlyMap<string, ResidueId>,
): string {
  return pdbText
    .split('\n')
    .map((line) => {
      if (!RENUMBERED_RECORDS.includes(recordName(line))) return line;
      const id = readResidueId(line);
      if (!id) return line;
      const target = mapping.get(residueKey(id));
      if (!target) return line;
      return (
        line.slice(0, 21) +
        (target.chainId || ' ').charAt(0) +
        formatResSeq(target.resSeq) +
        (target.iCode || ' ').charAt(0) +
        line.slice(27)
      );
    })
    .join('\n');
}
