import type { Bond, Molecule } from 'types';

export function bondKey(atom1: number, atom2: number): string {
  return `${Math.min(atom1, atom2)}-${Math.max(atom1, atom2)}`;
}

/**
 * Adjacency lists in bond-list order: atom id -> [neighbor id, bond][]
 */
export function buildAdjacency(molecule: Molecule): Map<number, [number, Bond][]> {
  const adjacency = new Map<number, [number, Bond][]>();
  for (const atom of molecule.atoms) {
    adjacency.set(atom.id, []);
  }
  for (const bond of molecule.bonds) {
    adjacency.get(bond.atom1)?.push([bond.atom2, bond]);
    adjacency.get(bond.atom2)?.push([bond.atom1, bond]);
  }
  return adjacency;
}

export function buildBondIndex(molecule: Molecule): Map<string, Bond> {
  const index = new Map<string, Bond>();
  for (const bond of molecule.bonds) {
    index.set(bondKey(bond.atom1, bond.atom2), bond);
  }
  return index;
}

// Treat the molecule as a graph: use BFS to find disconnected components
export function findConnectedComponents(molecule: Molecule, adjacency: Map<number, [number, Bond][]>): number[][] {
  const visited = new Set<number>();
  const components: number[][] = [];

  for (const atom of molecule.atoms) {
    if (visited.has(atom.id)) continue;
    const component: number[] = [];
    const queue = [atom.id];
    visited.add(atom.id);
    while (queue.length > 0) {
      const current = queue.shift();
      if (current === undefined) break;
      component.push(current);
      for (const [neighbor] of adjacency.get(current) ?? []) {
        if (!visited.has(neighbor)) {
          visited.add(neighbor);
          queue.push(neighbor);
        }
      }
    }
    components.push(component);
  }

  return components;
}
