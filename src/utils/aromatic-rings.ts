import type { Molecule } from 'types';

/**
 * Decides whether one externally supplied ring is aromatic.
 */
export type AromaticRingClassifier = (ring: readonly number[], molecule: Molecule) => boolean;

export interface AromaticityLookup {
  aromaticRings: number[][];
  isAromatic: (atomId: number) => boolean;
  isAromaticPair: (atom1: number, atom2: number) => boolean;
}

/**
 * Flags a ring aromatic when every member atom was perceived aromatic upstream.
 */
export const atomFlagClassifier: AromaticRingClassifier = (ring, molecule) => {
  if (ring.length === 0) return false;
  const aromaticAtoms = new Set(molecule.atoms.filter(a => a.aromatic).map(a => a.id));
  return ring.every(atomId => aromaticAtoms.has(atomId));
};

export function createAromaticityLookup(
  molecule: Molecule,
  rings: readonly (readonly number[])[],
  classifier: AromaticRingClassifier = atomFlagClassifier,
): AromaticityLookup {
  const aromaticRings: number[][] = [];
  const aromaticAtomSet = new Set<number>();

  for (const ring of rings) {
    if (!classifier(ring, molecule)) continue;
    aromaticRings.push([...ring]);
    for (const atomId of ring) {
      aromaticAtomSet.add(atomId);
    }
  }

  const isAromatic = (atomId: number) => aromaticAtomSet.has(atomId);

  return {
    aromaticRings,
    isAromatic,
    isAromaticPair: (atom1: number, atom2: number) => isAromatic(atom1) && isAromatic(atom2),
  };
}
