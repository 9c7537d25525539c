import type { Atom, Bond, Molecule, Point2D } from 'types';
import { StereoType } from 'types';
import type { AromaticRingClassifier, AromaticityLookup } from 'src/utils/aromatic-rings';
import { atomFlagClassifier, createAromaticityLookup } from 'src/utils/aromatic-rings';
import { bondKey, buildAdjacency, buildBondIndex } from 'src/utils/bond-utils';
import { resolveRanks } from 'src/utils/canonical-labeler';
import type { IsotopeTable } from 'src/utils/isotopes';
import { defaultIsotopeTable } from 'src/utils/isotopes';
import { computeMorganNumbers } from 'src/utils/morgan-numbers';

export interface SmilesGeneratorOptions {
  /** Write tetrahedral, square-planar and bipyramidal descriptors. Needs 2-D coordinates on every atom. */
  chiral?: boolean;
  /** Write '/' and '\\' for configurable double bonds. */
  doubleBondStereo?: boolean;
  /** Throw on bonds SMILES cannot write instead of warning and writing nothing. */
  strictBondOrders?: boolean;
  /** Ring list (atom IDs); defaults to `molecule.rings`. */
  rings?: number[][];
  aromaticRingClassifier?: AromaticRingClassifier;
  /** Graph-invariant numbers per atom id; defaults to Morgan numbers. */
  graphInvariants?: Map<number, number>;
  isotopes?: IsotopeTable;
}

/**
 * Read-only view of one molecule plus the oracles a single generation call
 * consults. Built fresh per call; nothing here is written back to the input.
 */
export interface GenerationContext {
  molecule: Molecule;
  atoms: Map<number, Atom>;
  adjacency: Map<number, [number, Bond][]>;
  bonds: Map<string, Bond>;
  ranks: Map<number, number>;
  rings: readonly (readonly number[])[];
  aromaticity: AromaticityLookup;
  isotopes: IsotopeTable;
  graphInvariants: () => Map<number, number>;
  chiral: boolean;
  doubleBondStereo: boolean;
  strictBondOrders: boolean;
}

export function createGenerationContext(molecule: Molecule, options: SmilesGeneratorOptions = {}): GenerationContext {
  const rings = options.rings ?? molecule.rings ?? [];
  let invariants: Map<number, number> | undefined = options.graphInvariants;

  return {
    molecule,
    atoms: new Map(molecule.atoms.map(atom => [atom.id, atom])),
    adjacency: buildAdjacency(molecule),
    bonds: buildBondIndex(molecule),
    ranks: resolveRanks(molecule),
    rings,
    aromaticity: createAromaticityLookup(molecule, rings, options.aromaticRingClassifier ?? atomFlagClassifier),
    isotopes: options.isotopes ?? defaultIsotopeTable,
    graphInvariants: () => {
      invariants ??= computeMorganNumbers(molecule);
      return invariants;
    },
    chiral: options.chiral ?? false,
    doubleBondStereo: options.doubleBondStereo ?? false,
    strictBondOrders: options.strictBondOrders ?? false,
  };
}

export function neighborsOf(ctx: GenerationContext, atomId: number): number[] {
  return (ctx.adjacency.get(atomId) ?? []).map(([nid]) => nid);
}

export function degreeOf(ctx: GenerationContext, atomId: number): number {
  return ctx.adjacency.get(atomId)?.length ?? 0;
}

export function bondBetween(ctx: GenerationContext, atom1: number, atom2: number): Bond | undefined {
  return ctx.bonds.get(bondKey(atom1, atom2));
}

export function stereoBetween(ctx: GenerationContext, atom1: number, atom2: number): StereoType {
  return bondBetween(ctx, atom1, atom2)?.stereo ?? StereoType.NONE;
}

export function symbolOf(ctx: GenerationContext, atomId: number): string {
  return ctx.atoms.get(atomId)?.symbol ?? '';
}

export function pointOf(ctx: GenerationContext, atomId: number): Point2D | undefined {
  return ctx.atoms.get(atomId)?.coordinates;
}

/**
 * Neighbors sorted by ascending canonical rank.
 */
export function canonicalNeighbors(ctx: GenerationContext, atomId: number): number[] {
  return neighborsOf(ctx, atomId).sort((a, b) => (ctx.ranks.get(a) ?? 0) - (ctx.ranks.get(b) ?? 0));
}
