import type { Molecule } from 'types';
import { sortBy, uniq } from 'es-toolkit';
import { InvalidCanonicalRankError, NoStartAtomError } from 'src/errors';
import { buildAdjacency } from './bond-utils';

const MAX_ITERATIONS = 8;

/**
 * Canonical ranks (1..n) per atom id from iterative invariant refinement.
 *
 * Initial labels combine degree, symbol, aromaticity, isotope, absolute
 * charge and hydrogen count; each round appends the sorted bond-typed labels
 * of the neighbours and renumbers. Atoms left in the same class are ordered
 * by id, so the ranks are unique but only canonical up to symmetry.
 */
export function computeCanonicalRanks(molecule: Molecule): Map<number, number> {
  const adjacency = buildAdjacency(molecule);
  const labels = new Map<number, number>();

  const initial = new Map<number, string>();
  for (const a of molecule.atoms) {
    const deg = adjacency.get(a.id)?.length ?? 0;
    const lbl = [
      String(deg).padStart(3, '0'),
      a.symbol.padStart(3, ' '),
      a.aromatic ? 'ar' : 'al',
      String(a.isotope ?? 0).padStart(3, '0'),
      String(Math.abs(a.charge)).padStart(3, '0'),
      String(a.hydrogens).padStart(3, '0'),
    ].join('|');
    initial.set(a.id, lbl);
  }
  renumber(initial, labels);

  for (let iter = 0; iter < MAX_ITERATIONS; iter++) {
    const combined = new Map<number, string>();
    for (const a of molecule.atoms) {
      const neigh = (adjacency.get(a.id) ?? [])
        .map(([nid, b]) => `${b.type}:${String(labels.get(nid) ?? 0).padStart(4, '0')}`)
        .sort();
      combined.set(a.id, `${String(labels.get(a.id) ?? 0).padStart(4, '0')}|${neigh.join(',')}`);
    }

    const before = new Set(labels.values()).size;
    renumber(combined, labels);
    if (new Set(labels.values()).size === before) break;
  }

  const ordered = sortBy(molecule.atoms, [a => labels.get(a.id) ?? 0, a => a.id]);
  const ranks = new Map<number, number>();
  ordered.forEach((atom, idx) => ranks.set(atom.id, idx + 1));
  return ranks;
}

/**
 * Canonical ranks from the atoms when every atom carries one, otherwise
 * computed. Supplied ranks must be unique positive integers including 1.
 */
export function resolveRanks(molecule: Molecule): Map<number, number> {
  const ranked = molecule.atoms.filter(atom => atom.canonicalRank !== undefined);
  if (ranked.length === 0) return computeCanonicalRanks(molecule);

  const ranks = new Map<number, number>();
  const seen = new Set<number>();
  for (const atom of molecule.atoms) {
    const rank = atom.canonicalRank;
    if (rank === undefined) {
      throw new InvalidCanonicalRankError(atom.id, undefined, 'ranks must be given for all atoms or none');
    }
    if (!Number.isInteger(rank) || rank < 1) {
      throw new InvalidCanonicalRankError(atom.id, rank, 'ranks are positive integers');
    }
    if (seen.has(rank)) {
      throw new InvalidCanonicalRankError(atom.id, rank, 'ranks must be unique');
    }
    seen.add(rank);
    ranks.set(atom.id, rank);
  }
  if (!seen.has(1)) throw new NoStartAtomError();
  return ranks;
}

function renumber(raw: Map<number, string>, target: Map<number, number>): void {
  const uniqueLabels = uniq([...raw.values()]).sort();
  const labelMap = new Map<string, number>();
  uniqueLabels.forEach((lbl, idx) => labelMap.set(lbl, idx + 1));
  target.clear();
  for (const [atomId, lbl] of raw) {
    target.set(atomId, labelMap.get(lbl) ?? 0);
  }
}
