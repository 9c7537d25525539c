import { describe, expect, it, vi } from 'vitest';
import { BondType } from 'types';
import { UnrepresentableBondOrderError } from 'src/errors';
import { defaultIsotopeTable } from 'src/utils/isotopes';
import {
  atomToken,
  bondSymbol,
  bondToken,
  chargeToken,
  ringMarkerToken,
} from 'src/generators/smiles-generator/tokens';
import { atom, bond } from '../../helpers/build-molecule';

describe('chargeToken', () => {
  it('writes single charges without a count', () => {
    expect(chargeToken(1)).toBe('+');
    expect(chargeToken(-1)).toBe('-');
  });

  it('writes larger charges with a count', () => {
    expect(chargeToken(3)).toBe('+3');
    expect(chargeToken(-2)).toBe('-2');
  });

  it('writes nothing for neutral atoms', () => {
    expect(chargeToken(0)).toBe('');
  });
});

describe('atomToken', () => {
  const isotopes = defaultIsotopeTable;

  it('leaves organic-subset atoms bare', () => {
    expect(atomToken(atom(1, 'Cl'), { aromatic: false, isotopes })).toBe('Cl');
  });

  it('lower-cases aromatic atoms', () => {
    expect(atomToken(atom(1, 'N'), { aromatic: true, isotopes })).toBe('n');
  });

  it('orders mass, symbol, stereo and charge inside the bracket', () => {
    const token = atomToken(atom(1, 'N', { isotope: 15, charge: 1 }), {
      aromatic: false,
      stereo: { kind: 'tetrahedral', variant: 1 },
      isotopes,
    });
    expect(token).toBe('[15N@+]');
  });

  it('writes @SP1 for square-planar centres', () => {
    expect(atomToken(atom(1, 'Pt'), { aromatic: false, stereo: { kind: 'square-planar' }, isotopes })).toBe('[Pt@SP1]');
  });

  it('writes an isotope of an element missing from the table', () => {
    expect(atomToken(atom(1, 'Xx', { isotope: 300 }), { aromatic: false, isotopes })).toBe('[300Xx]');
  });
});

describe('bondSymbol', () => {
  it('maps bond orders to symbols', () => {
    expect(bondSymbol(bond(1, 2), false)).toBe('');
    expect(bondSymbol(bond(1, 2, BondType.DOUBLE), false)).toBe('=');
    expect(bondSymbol(bond(1, 2, BondType.TRIPLE), false)).toBe('#');
  });

  it('writes nothing between aromatic atoms', () => {
    expect(bondSymbol(bond(1, 2, BondType.DOUBLE), true)).toBe('');
    expect(bondSymbol(bond(1, 2, BondType.AROMATIC), true)).toBe('');
  });

  it('has no symbol for aromatic or quadruple bonds between other atoms', () => {
    expect(bondSymbol(bond(1, 2, BondType.AROMATIC), false)).toBeNull();
    expect(bondSymbol(bond(1, 2, BondType.QUADRUPLE), false)).toBeNull();
  });
});

describe('bondToken', () => {
  it('throws in strict mode', () => {
    expect(() => bondToken(bond(3, 4, BondType.QUADRUPLE), false, true)).toThrow(UnrepresentableBondOrderError);
  });

  it('warns and writes nothing otherwise', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    expect(bondToken(bond(3, 4, BondType.AROMATIC), false, false)).toBe('');
    expect(warn).toHaveBeenCalledWith("[smiles-generator] Bond 3-4 of type 'aromatic' has no SMILES bond symbol");
    warn.mockRestore();
  });
});

describe('ringMarkerToken', () => {
  it('writes single digits bare and two digits with a percent sign', () => {
    expect(ringMarkerToken(1)).toBe('1');
    expect(ringMarkerToken(9)).toBe('9');
    expect(ringMarkerToken(10)).toBe('%10');
    expect(ringMarkerToken(42)).toBe('%42');
  });
});
