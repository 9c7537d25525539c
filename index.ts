export { generateSMILES, generateChiralSMILES } from 'src/generators/smiles-generator';
export type { SmilesGeneratorOptions } from 'src/generators/smiles-generator';
export {
  MissingCoordinatesError,
  UnrepresentableBondOrderError,
  NoStartAtomError,
  InvalidCanonicalRankError,
} from 'src/errors';
export { createAromaticityLookup, atomFlagClassifier } from 'src/utils/aromatic-rings';
export type { AromaticRingClassifier, AromaticityLookup } from 'src/utils/aromatic-rings';
export { computeCanonicalRanks, resolveRanks } from 'src/utils/canonical-labeler';
export { computeMorganNumbers } from 'src/utils/morgan-numbers';
export { defaultIsotopeTable, createIsotopeTable } from 'src/utils/isotopes';
export type { IsotopeTable } from 'src/utils/isotopes';
export { BondType, StereoType } from 'types';
export type { Atom, Bond, Molecule, Point2D } from 'types';
