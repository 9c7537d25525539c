import { bondKey } from 'src/utils/bond-utils';
import type { GenerationContext } from './context';
import { canonicalNeighbors } from './context';

export interface AtomNode {
  readonly kind: 'atom';
  readonly atomId: number;
}

export interface BranchNode {
  readonly kind: 'branch';
  readonly nodes: readonly TreeNode[];
}

export type TreeNode = AtomNode | BranchNode;

export interface RingClosure {
  atoms: [number, number];
  marker: number;
}

/**
 * Ring closures (DFS back edges) in discovery order. Markers start at 1 and
 * keep counting for the lifetime of one generation call.
 */
export class RingClosureTable {
  private closures: RingClosure[] = [];
  private byPair = new Map<string, RingClosure>();
  private byAtom = new Map<number, RingClosure[]>();

  /**
   * Record a back edge. Returns false when the unordered pair is already known.
   */
  add(atom1: number, atom2: number): boolean {
    const key = bondKey(atom1, atom2);
    if (this.byPair.has(key)) return false;

    const closure: RingClosure = { atoms: [atom1, atom2], marker: this.closures.length + 1 };
    this.closures.push(closure);
    this.byPair.set(key, closure);
    for (const atomId of closure.atoms) {
      const list = this.byAtom.get(atomId) ?? [];
      list.push(closure);
      this.byAtom.set(atomId, list);
    }
    return true;
  }

  all(): readonly RingClosure[] {
    return this.closures;
  }

  /** Closures owned by an atom, ascending by marker. */
  closuresOf(atomId: number): RingClosure[] {
    return [...(this.byAtom.get(atomId) ?? [])].sort((a, b) => a.marker - b.marker);
  }

  markersOf(atomId: number): number[] {
    return this.closuresOf(atomId).map(c => c.marker);
  }

  isBroken(atom1: number, atom2: number): boolean {
    return this.byPair.has(bondKey(atom1, atom2));
  }

  isRingOpening(atomId: number): boolean {
    return (this.byAtom.get(atomId)?.length ?? 0) > 0;
  }
}

export function atomNode(atomId: number): AtomNode {
  return { kind: 'atom', atomId };
}

export function branchNode(nodes: readonly TreeNode[]): BranchNode {
  return { kind: 'branch', nodes };
}

/**
 * The atom a node starts with: the atom itself, or the first atom of a branch.
 */
export function headAtom(node: TreeNode | null | undefined): number | undefined {
  if (!node) return undefined;
  if (node.kind === 'atom') return node.atomId;
  return headAtom(node.nodes[0]);
}

/**
 * Depth-first spanning tree from `rootId`. Neighbors are taken in ascending
 * canonical rank; the last one continues the current sequence, every earlier
 * unvisited one opens a branch. Already-visited neighbors become ring closures.
 */
export function buildSpanningTree(
  rootId: number,
  ctx: GenerationContext,
  closures: RingClosureTable,
  visited: Set<number>,
): BranchNode {
  const root: TreeNode[] = [];

  const visit = (atomId: number, parentId: number | null, sequence: TreeNode[]) => {
    sequence.push(atomNode(atomId));
    const neighbors = canonicalNeighbors(ctx, atomId).filter(nid => nid !== parentId);
    visited.add(atomId);

    neighbors.forEach((next, x) => {
      if (visited.has(next)) {
        closures.add(atomId, next);
        return;
      }
      if (x === neighbors.length - 1) {
        visit(next, atomId, sequence);
      } else {
        const branch: TreeNode[] = [];
        sequence.push(branchNode(branch));
        visit(next, atomId, branch);
      }
    });
  };

  visit(rootId, null, root);

  if (process.env.VERBOSE) {
    console.log(`[smiles-generator] tree rooted at ${rootId}, ${closures.all().length} ring closure(s) so far`);
  }

  return branchNode(root);
}
