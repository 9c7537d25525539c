// Core types for SMILES generation

export enum BondType {
  SINGLE = 'single',
  DOUBLE = 'double',
  TRIPLE = 'triple',
  QUADRUPLE = 'quadruple',
  AROMATIC = 'aromatic',
}

export enum StereoType {
  NONE = 'none',
  UP = 'up', // wedge
  DOWN = 'down', // hash
  EITHER = 'either', // wavy, configuration undefined
}

export interface Point2D {
  x: number;
  y: number;
}

/**
 * Atom in a molecule.
 * The generator treats atoms as read-only; all per-call scratch state lives
 * in side tables keyed by atom id.
 */
export interface Atom {
  id: number; // unique identifier
  symbol: string; // e.g., 'C', 'N', 'Fe'
  charge: number; // formal charge
  hydrogens: number; // implicit + explicit hydrogens
  isotope: number | null; // mass number, null for natural abundance
  aromatic: boolean; // set by an upstream aromaticity perception
  coordinates?: Point2D; // 2-D depiction coordinates
  canonicalRank?: number; // 1-based, unique (pre-computed by a canonical labeler)
}

/**
 * Bond between two atoms.
 * Stereo markers are read relative to whichever end is the centre being examined.
 */
export interface Bond {
  atom1: number; // atom id
  atom2: number; // atom id
  type: BondType;
  stereo: StereoType;
}

/**
 * Molecule representation.
 * Molecules are never mutated by the generator.
 */
export interface Molecule {
  atoms: Atom[];
  bonds: Bond[];
  rings?: number[][]; // smallest set of smallest rings (atom IDs), supplied externally
}
