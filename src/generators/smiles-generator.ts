import type { Molecule } from 'types';
import { minBy } from 'es-toolkit';
import { MissingCoordinatesError } from 'src/errors';
import { findConnectedComponents } from 'src/utils/bond-utils';
import { ChainRenderer } from './smiles-generator/chain-renderer';
import type { SmilesGeneratorOptions } from './smiles-generator/context';
import { createGenerationContext } from './smiles-generator/context';
import { RingClosureTable, buildSpanningTree } from './smiles-generator/spanning-tree';
import { EMPTY_LAYOUT, resolveStereoLayout } from './smiles-generator/stereo-resolver';

// SMILES generation strategy:
// - canonical ranks fix the start atom and the order neighbors are visited in
// - a DFS spanning tree gives the chain/branch layout; back edges become ring closures
// - with `chiral`, stereocenters reorder their unwritten substituents so that a
//   single '@' encodes the configuration read off the 2-D depiction
// - the resolved layout is rendered token by token

export type { SmilesGeneratorOptions };

export function generateSMILES(input: Molecule | Molecule[], options: SmilesGeneratorOptions = {}): string {
  if (Array.isArray(input)) {
    return input
      .map(mol => generateSMILES(mol, options))
      .filter(smiles => smiles !== '')
      .join('.');
  }

  const molecule = input;
  if (molecule.atoms.length === 0) return '';

  const chiral = options.chiral ?? false;
  if (chiral) {
    molecule.atoms.forEach((atom, index) => {
      if (!atom.coordinates) throw new MissingCoordinatesError(index);
    });
  }

  const ctx = createGenerationContext(molecule, options);
  const closures = new RingClosureTable();
  const visited = new Set<number>();

  const roots = findConnectedComponents(molecule, ctx.adjacency)
    .map(component => minBy(component, atomId => ctx.ranks.get(atomId) ?? Infinity))
    .filter((atomId): atomId is number => atomId !== undefined)
    .sort((a, b) => (ctx.ranks.get(a) ?? 0) - (ctx.ranks.get(b) ?? 0));

  if (process.env.VERBOSE) {
    console.log(`[smiles-generator] ${molecule.atoms.length} atoms, ${roots.length} component(s), chiral=${chiral}, doubleBondStereo=${ctx.doubleBondStereo}`);
  }

  return roots
    .map(root => {
      const tree = buildSpanningTree(root, ctx, closures, visited);
      const layout = chiral ? resolveStereoLayout(tree, ctx, closures) : EMPTY_LAYOUT;
      return new ChainRenderer(ctx, closures, layout).render(tree);
    })
    .join('.');
}

/**
 * Chiral SMILES with optional double-bond configuration.
 */
export function generateChiralSMILES(molecule: Molecule, doubleBondStereo = false): string {
  return generateSMILES(molecule, { chiral: true, doubleBondStereo });
}
