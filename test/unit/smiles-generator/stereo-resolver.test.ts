import { describe, expect, it } from 'vitest';
import { BondType, StereoType } from 'types';
import type { Molecule } from 'types';
import { createGenerationContext } from 'src/generators/smiles-generator/context';
import {
  classifyGeometry,
  findDoubleBondEnd,
  isDoubleBondBegin,
  isDoubleBondEnd,
  isStereoCenter,
} from 'src/generators/smiles-generator/stereo-resolver';
import { at, atom, bond, ranked } from '../../helpers/build-molecule';

// Bromo-fluoro centre (atom 2) with two carbon neighbors; `extraCarbon`
// turns the second carbon into an ethyl group.
function centre(extraCarbon: boolean): Molecule {
  const atoms = [atom(1, 'Br'), atom(2, 'C'), atom(3, 'C'), atom(4, 'C'), atom(5, 'F')];
  const bonds = [bond(1, 2), bond(2, 3), bond(2, 4), bond(2, 5, BondType.SINGLE, StereoType.UP)];
  if (extraCarbon) {
    atoms.push(atom(6, 'C'));
    bonds.push(bond(4, 6));
  }
  return ranked(atoms, bonds);
}

describe('isStereoCenter', () => {
  it('needs at least one marked bond', () => {
    const mol = ranked(
      [atom(1, 'Br'), atom(2, 'C'), atom(3, 'Cl'), atom(4, 'F'), atom(5, 'I')],
      [bond(1, 2), bond(2, 3), bond(2, 4), bond(2, 5)],
    );
    expect(isStereoCenter(createGenerationContext(mol), 2)).toBe(false);
  });

  it('needs three to six neighbors', () => {
    const mol = ranked(
      [atom(1, 'Br'), atom(2, 'C'), atom(3, 'Cl')],
      [bond(1, 2, BondType.SINGLE, StereoType.UP), bond(2, 3)],
    );
    expect(isStereoCenter(createGenerationContext(mol), 2)).toBe(false);
  });

  it('rejects two neighbors that are graph-equivalent', () => {
    expect(isStereoCenter(createGenerationContext(centre(false)), 2)).toBe(false);
  });

  it('accepts same-symbol neighbors with different invariants', () => {
    expect(isStereoCenter(createGenerationContext(centre(true)), 2)).toBe(true);
  });

  it('uses supplied invariants instead of computing them', () => {
    const invariants = new Map([[1, 1], [2, 2], [3, 3], [4, 4], [5, 5]]);
    expect(isStereoCenter(createGenerationContext(centre(false), { graphInvariants: invariants }), 2)).toBe(true);
  });

  it('accepts a single wedge on a ring-fusion atom', () => {
    const ctx = createGenerationContext(centre(false), { rings: [[2, 3, 4], [2, 3, 5]] });
    expect(isStereoCenter(ctx, 2)).toBe(true);
  });
});

describe('classifyGeometry', () => {
  function tetrahedral(stereos: StereoType[]): Molecule {
    const [s1, s2, s3, s4] = stereos;
    return ranked(
      [atom(1, 'Br'), atom(2, 'C'), atom(3, 'Cl'), atom(4, 'F'), atom(5, 'I')],
      [
        bond(1, 2, BondType.SINGLE, s1),
        bond(2, 3, BondType.SINGLE, s2),
        bond(2, 4, BondType.SINGLE, s3),
        bond(2, 5, BondType.SINGLE, s4),
      ],
    );
  }

  it('tells the tetrahedral variants apart by marker count', () => {
    const { NONE, UP, DOWN } = StereoType;
    const classify = (stereos: StereoType[]) => classifyGeometry(createGenerationContext(tetrahedral(stereos)), 2);
    expect(classify([NONE, NONE, UP, DOWN])).toEqual({ kind: 'tetrahedral', variant: 1 });
    expect(classify([NONE, NONE, UP, NONE])).toEqual({ kind: 'tetrahedral', variant: 3 });
    expect(classify([DOWN, NONE, NONE, NONE])).toEqual({ kind: 'tetrahedral', variant: 4 });
    expect(classify([UP, UP, UP, NONE])).toBeUndefined();
  });

  it('gives a three-neighbor candidate no geometry', () => {
    const mol = ranked(
      [atom(1, 'Br'), atom(2, 'N'), atom(3, 'Cl'), atom(4, 'F')],
      [bond(1, 2, BondType.SINGLE, StereoType.UP), bond(2, 3), bond(2, 4)],
    );
    const ctx = createGenerationContext(mol);
    expect(isStereoCenter(ctx, 2)).toBe(true);
    expect(classifyGeometry(ctx, 2)).toBeUndefined();
  });

  it('splits two up and two down markers by their layout', () => {
    const { UP, DOWN } = StereoType;
    const planar = tetrahedral([UP, UP, DOWN, DOWN]);
    const coords = [at(0, 1), at(0, 0), at(1, 0), at(0, -1), at(-1, 0)];
    planar.atoms = planar.atoms.map((a, idx) => ({ ...a, coordinates: coords[idx] }));
    expect(classifyGeometry(createGenerationContext(planar), 2)).toEqual({ kind: 'square-planar' });

    const crossed = tetrahedral([UP, DOWN, UP, DOWN]);
    crossed.atoms = crossed.atoms.map((a, idx) => ({ ...a, coordinates: coords[idx] }));
    expect(classifyGeometry(createGenerationContext(crossed), 2)).toEqual({ kind: 'tetrahedral', variant: 2 });
  });
});

describe('double-bond ends', () => {
  const mol = ranked(
    [atom(1, 'F'), atom(2, 'C', { hydrogens: 1 }), atom(3, 'C', { hydrogens: 1 }), atom(4, 'F')],
    [bond(1, 2), bond(2, 3, BondType.DOUBLE), bond(3, 4)],
  );
  const ctx = createGenerationContext(mol);

  it('recognises the end reached over the double bond', () => {
    expect(isDoubleBondEnd(ctx, 3, 2)).toBe(true);
    expect(isDoubleBondEnd(ctx, 2, 1)).toBe(false);
  });

  it('recognises the begin atom before the double bond', () => {
    expect(isDoubleBondBegin(ctx, 2, 1)).toBe(true);
    expect(isDoubleBondBegin(ctx, 1, null)).toBe(false);
    expect(isDoubleBondBegin(ctx, 3, 2)).toBe(false);
  });

  it('finds the far end only away from the parent', () => {
    expect(findDoubleBondEnd(ctx, 2, 1)).toBe(3);
    expect(findDoubleBondEnd(ctx, 2, 3)).toBeUndefined();
    expect(findDoubleBondEnd(ctx, 1, null)).toBeUndefined();
  });

  it('needs three substituents on each end', () => {
    const bare = ranked(
      [atom(1, 'F'), atom(2, 'C'), atom(3, 'C', { hydrogens: 1 }), atom(4, 'F')],
      [bond(1, 2), bond(2, 3, BondType.DOUBLE), bond(3, 4)],
    );
    expect(isDoubleBondEnd(createGenerationContext(bare), 3, 2)).toBe(false);
  });
});
