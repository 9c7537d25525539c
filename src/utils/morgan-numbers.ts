import type { Molecule } from 'types';
import { uniq } from 'es-toolkit';
import { buildAdjacency } from './bond-utils';

// Morgan extended connectivity: start from the heavy-atom degree, then
// repeatedly replace each value by the sum of the neighbours' values until
// the number of distinct values stops growing.

function normalize(values: Map<number, number>): Map<number, number> {
  const distinct = uniq([...values.values()]).sort((a, b) => a - b);
  const classOf = new Map<number, number>();
  distinct.forEach((value, idx) => classOf.set(value, idx + 1));
  const normalized = new Map<number, number>();
  for (const [atomId, value] of values) {
    normalized.set(atomId, classOf.get(value) ?? 0);
  }
  return normalized;
}

function countClasses(values: Map<number, number>): number {
  return new Set(values.values()).size;
}

/**
 * Graph-invariant numbers per atom id. Atoms related by a symmetry of the
 * graph always receive equal numbers.
 */
export function computeMorganNumbers(molecule: Molecule): Map<number, number> {
  const adjacency = buildAdjacency(molecule);

  const initial = new Map<number, number>();
  for (const atom of molecule.atoms) {
    initial.set(atom.id, adjacency.get(atom.id)?.length ?? 0);
  }

  let values = normalize(initial);
  let classes = countClasses(values);

  for (let iter = 0; iter < molecule.atoms.length; iter++) {
    const next = new Map<number, number>();
    for (const atom of molecule.atoms) {
      let sum = 0;
      for (const [neighbor] of adjacency.get(atom.id) ?? []) {
        sum += values.get(neighbor) ?? 0;
      }
      next.set(atom.id, sum);
    }

    const normalized = normalize(next);
    const nextClasses = countClasses(normalized);
    if (nextClasses <= classes) break;
    values = normalized;
    classes = nextClasses;
  }

  return values;
}
