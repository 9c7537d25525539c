import type { Atom, Bond } from 'types';
import { BondType } from 'types';
import { UnrepresentableBondOrderError } from 'src/errors';
import { isOrganicAtom } from 'src/utils/atom-utils';
import type { IsotopeTable } from 'src/utils/isotopes';
import type { StereoGeometry } from './stereo-resolver';

export interface AtomTokenOptions {
  aromatic: boolean;
  stereo?: StereoGeometry;
  isotopes: IsotopeTable;
}

export function chargeToken(charge: number): string {
  if (charge > 0) return charge > 1 ? `+${charge}` : '+';
  if (charge < 0) return charge < -1 ? `-${-charge}` : '-';
  return '';
}

/**
 * Mass number, written only when it differs from the element's major isotope.
 */
export function massToken(atom: Atom, isotopes: IsotopeTable): string {
  if (atom.isotope === null) return '';
  if (isotopes.majorIsotope(atom.symbol) === atom.isotope) return '';
  return String(atom.isotope);
}

export function stereoToken(stereo: StereoGeometry | undefined): string {
  if (!stereo) return '';
  return stereo.kind === 'square-planar' ? '@SP1' : '@';
}

export function atomToken(atom: Atom, options: AtomTokenOptions): string {
  const mass = massToken(atom, options.isotopes);
  const charge = chargeToken(atom.charge);
  const stereo = stereoToken(options.stereo);
  const symbol = options.aromatic ? atom.symbol.toLowerCase() : atom.symbol;

  const needsBracket = !isOrganicAtom(atom.symbol) || mass !== '' || charge !== '' || stereo !== '';
  if (!needsBracket) return symbol;
  return `[${mass}${symbol}${stereo}${charge}]`;
}

/**
 * Bond symbol between two rendered atoms. Returns null for a bond type that
 * SMILES cannot write between non-aromatic atoms.
 */
export function bondSymbol(bond: Bond, aromaticPair: boolean): string | null {
  if (aromaticPair) return '';
  switch (bond.type) {
    case BondType.SINGLE:
      return '';
    case BondType.DOUBLE:
      return '=';
    case BondType.TRIPLE:
      return '#';
    default:
      return null;
  }
}

/**
 * Bond symbol with the unrepresentable case either thrown or reported and
 * written as nothing.
 */
export function bondToken(bond: Bond, aromaticPair: boolean, strict: boolean): string {
  const symbol = bondSymbol(bond, aromaticPair);
  if (symbol !== null) return symbol;

  const error = new UnrepresentableBondOrderError(bond.type, bond.atom1, bond.atom2);
  if (strict) throw error;
  console.warn(`[smiles-generator] ${error.message}`);
  return '';
}

export function ringMarkerToken(marker: number): string {
  return marker < 10 ? String(marker) : `%${String(marker).padStart(2, '0')}`;
}
