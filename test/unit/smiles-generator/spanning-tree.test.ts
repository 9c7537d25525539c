import { describe, expect, it } from 'vitest';
import { createGenerationContext } from 'src/generators/smiles-generator/context';
import {
  RingClosureTable,
  atomNode,
  branchNode,
  buildSpanningTree,
  headAtom,
} from 'src/generators/smiles-generator/spanning-tree';
import { atom, bond, ranked } from '../../helpers/build-molecule';

describe('RingClosureTable', () => {
  it('numbers closures from 1 in discovery order', () => {
    const table = new RingClosureTable();
    expect(table.add(5, 1)).toBe(true);
    expect(table.add(7, 2)).toBe(true);
    expect(table.all().map(c => c.marker)).toEqual([1, 2]);
  });

  it('ignores a pair seen in the other direction', () => {
    const table = new RingClosureTable();
    table.add(5, 1);
    expect(table.add(1, 5)).toBe(false);
    expect(table.all()).toHaveLength(1);
  });

  it('answers membership for both atoms of a closure', () => {
    const table = new RingClosureTable();
    table.add(4, 1);
    table.add(3, 1);
    expect(table.markersOf(1)).toEqual([1, 2]);
    expect(table.markersOf(3)).toEqual([2]);
    expect(table.isBroken(1, 4)).toBe(true);
    expect(table.isBroken(3, 4)).toBe(false);
    expect(table.isRingOpening(4)).toBe(true);
    expect(table.isRingOpening(2)).toBe(false);
  });
});

describe('headAtom', () => {
  it('finds the first atom of nested branches', () => {
    expect(headAtom(branchNode([branchNode([atomNode(7), atomNode(8)])]))).toBe(7);
    expect(headAtom(branchNode([]))).toBeUndefined();
    expect(headAtom(null)).toBeUndefined();
  });
});

describe('buildSpanningTree', () => {
  it('continues the chain with the last neighbor and branches the rest', () => {
    const mol = ranked(
      [atom(1, 'C'), atom(2, 'C'), atom(3, 'C'), atom(4, 'C')],
      [bond(1, 2), bond(2, 3), bond(2, 4)],
    );
    const ctx = createGenerationContext(mol);
    const tree = buildSpanningTree(1, ctx, new RingClosureTable(), new Set());
    expect(tree).toEqual(branchNode([atomNode(1), atomNode(2), branchNode([atomNode(3)]), atomNode(4)]));
  });

  it('records each ring bond once', () => {
    const mol = ranked(
      [atom(1, 'C'), atom(2, 'C'), atom(3, 'C'), atom(4, 'C')],
      [bond(1, 2), bond(2, 3), bond(3, 4), bond(4, 1), bond(1, 3)],
    );
    const ctx = createGenerationContext(mol);
    const closures = new RingClosureTable();
    const tree = buildSpanningTree(1, ctx, closures, new Set());

    expect(tree).toEqual(branchNode([atomNode(1), branchNode([atomNode(2), atomNode(3), atomNode(4)])]));
    expect(closures.all()).toEqual([
      { atoms: [3, 1], marker: 1 },
      { atoms: [4, 1], marker: 2 },
    ]);
  });

  it('marks every atom of the component visited', () => {
    const mol = ranked([atom(1, 'C'), atom(2, 'O'), atom(3, 'N')], [bond(1, 2)]);
    const visited = new Set<number>();
    buildSpanningTree(1, createGenerationContext(mol), new RingClosureTable(), visited);
    expect([...visited].sort()).toEqual([1, 2]);
  });
});
