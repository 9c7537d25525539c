import type { Point2D } from 'types';
import { BondType, StereoType } from 'types';
import { uniq } from 'es-toolkit';
import { MissingCoordinatesError } from 'src/errors';
import type { GenerationContext } from './context';
import { bondBetween, degreeOf, neighborsOf, pointOf, stereoBetween, symbolOf } from './context';
import { angleBetween, isLeft, sweepByAngle } from './geometry';
import type { BranchNode, RingClosureTable, TreeNode } from './spanning-tree';
import { branchNode, headAtom } from './spanning-tree';

export type StereoGeometry =
  | { kind: 'tetrahedral'; variant: 1 | 2 | 3 | 4 }
  | { kind: 'square-planar' }
  | { kind: 'trigonal-bipyramidal' }
  | { kind: 'octahedral' };

/**
 * Result of the stereo pass: the order in which each sequence must be
 * rendered, and the centres whose order could be honoured. The spanning
 * tree itself is left untouched.
 */
export interface StereoLayout {
  sequenceOf(branch: BranchNode): readonly TreeNode[];
  descriptorOf(atomId: number): StereoGeometry | undefined;
}

export const EMPTY_LAYOUT: StereoLayout = {
  sequenceOf: branch => branch.nodes,
  descriptorOf: () => undefined,
};

type Slot = TreeNode | null;

// ---------------------------------------------------------------------------
// Stereocenter detection

function isMarked(stereo: StereoType): boolean {
  return stereo !== StereoType.NONE;
}

function sharesMoreThanOneRing(ctx: GenerationContext, atom1: number, atom2: number): boolean {
  const shared = ctx.rings.filter(ring => ring.includes(atom1) && ring.includes(atom2));
  return shared.length > 1;
}

/**
 * Whether an atom is a stereocenter candidate: 3-6 neighbors, at least one
 * marked bond, and neighbors that can be told apart by symbol or, failing
 * that, by graph invariant. Only 4-6 neighbor centres get a geometry from
 * `classifyGeometry`; a three-neighbor candidate is written without a descriptor.
 */
export function isStereoCenter(ctx: GenerationContext, atomId: number): boolean {
  const neighbors = neighborsOf(ctx, atomId);
  if (neighbors.length < 3 || neighbors.length > 6) return false;

  const markedBonds = neighbors.filter(nid => isMarked(stereoBetween(ctx, atomId, nid))).length;
  if (markedBonds === 0) return false;

  const symbols = neighbors.map(nid => symbolOf(ctx, nid));
  const differentSymbols = uniq(symbols);
  if (differentSymbols.length === neighbors.length) return true;

  const invariants = ctx.graphInvariants();
  let symbolsWithDifferentInvariants = differentSymbols.length;
  for (const symbol of differentSymbols) {
    let first: number | undefined;
    for (const nid of neighbors) {
      if (symbolOf(ctx, nid) !== symbol) continue;
      const invariant = invariants.get(nid);
      if (first === undefined) {
        first = invariant;
      } else if (invariant === first) {
        symbolsWithDifferentInvariants--;
      }
    }
  }
  if (symbolsWithDifferentInvariants === differentSymbols.length) return true;

  // cis/trans ring fusion
  if (markedBonds === 1 && neighbors.length === 4) {
    if (neighbors.some(nid => sharesMoreThanOneRing(ctx, atomId, nid))) return true;
  }
  if ((neighbors.length === 5 || neighbors.length === 6) && symbolsWithDifferentInvariants + differentSymbols.length > 1) {
    return true;
  }
  return false;
}

function countMarkers(ctx: GenerationContext, atomId: number): { up: number; down: number } {
  let up = 0;
  let down = 0;
  for (const nid of neighborsOf(ctx, atomId)) {
    const stereo = stereoBetween(ctx, atomId, nid);
    if (stereo === StereoType.UP) up++;
    if (stereo === StereoType.DOWN) down++;
  }
  return { up, down };
}

/**
 * For four neighbors with two up and two down markers: whether the neighbor
 * drawn opposite the first one carries the same marker.
 */
function stereosAreOpposite(ctx: GenerationContext, atomId: number): boolean | undefined {
  const neighbors = neighborsOf(ctx, atomId);
  const first = neighbors[0];
  if (first === undefined) return undefined;

  const center = requirePoint(ctx, atomId);
  const firstPoint = requirePoint(ctx, first);
  const swept = sweepByAngle(
    neighbors.slice(1).map((nid): [number, number] => [angleBetween(center, firstPoint, requirePoint(ctx, nid)), nid]),
  );
  const opposite = swept[1];
  if (opposite === undefined) return undefined;
  return stereoBetween(ctx, atomId, opposite) === stereoBetween(ctx, atomId, first);
}

export function classifyGeometry(ctx: GenerationContext, atomId: number): StereoGeometry | undefined {
  const degree = degreeOf(ctx, atomId);
  const { up, down } = countMarkers(ctx, atomId);

  if (degree === 4) {
    if (up === 1 && down === 1) return { kind: 'tetrahedral', variant: 1 };
    if (up === 2 && down === 2) {
      const opposite = stereosAreOpposite(ctx, atomId);
      if (opposite === undefined) return undefined;
      return opposite ? { kind: 'tetrahedral', variant: 2 } : { kind: 'square-planar' };
    }
    if (up === 1 && down === 0) return { kind: 'tetrahedral', variant: 3 };
    if (up === 0 && down === 1) return { kind: 'tetrahedral', variant: 4 };
    return undefined;
  }

  if ((degree === 5 || degree === 6) && up === 1 && down === 1) {
    return degree === 5 ? { kind: 'trigonal-bipyramidal' } : { kind: 'octahedral' };
  }
  return undefined;
}

// ---------------------------------------------------------------------------
// Required neighbor order

function requirePoint(ctx: GenerationContext, atomId: number): Point2D {
  const point = pointOf(ctx, atomId);
  if (!point) {
    throw new MissingCoordinatesError(ctx.molecule.atoms.findIndex(a => a.id === atomId));
  }
  return point;
}

interface CenterView {
  ctx: GenerationContext;
  closures: RingClosureTable;
  atomId: number;
  parentId: number;
}

function others(view: CenterView): number[] {
  return neighborsOf(view.ctx, view.atomId).filter(nid => nid !== view.parentId);
}

function stereoTo(view: CenterView, nid: number): StereoType {
  return stereoBetween(view.ctx, view.atomId, nid);
}

function leftOfParent(view: CenterView, nid: number): boolean {
  return isLeft(requirePoint(view.ctx, nid), requirePoint(view.ctx, view.parentId), requirePoint(view.ctx, view.atomId));
}

function broken(view: CenterView, nid: number): boolean {
  return view.closures.isBroken(nid, view.atomId);
}

function angleFromParent(view: CenterView, nid: number, fullTurn = true): number {
  return angleBetween(
    requirePoint(view.ctx, view.atomId),
    requirePoint(view.ctx, view.parentId),
    requirePoint(view.ctx, nid),
    fullTurn,
  );
}

/**
 * Unbroken neighbors other than the parent, swept by angle from the parent.
 */
function sweepFromParent(view: CenterView): number[] {
  return sweepByAngle(
    others(view)
      .filter(nid => !broken(view, nid))
      .map((nid): [number, number] => [angleFromParent(view, nid), nid]),
  );
}

type Order = (number | null)[];

/**
 * Assign the unmarked neighbors by side and the marked one to a fixed slot.
 */
function assignBySide(
  view: CenterView,
  slots: { left: number; right: number },
  marked: { stereo: StereoType; slot: number },
): Order {
  const sorted: Order = [null, null, null];
  for (const nid of others(view)) {
    if (broken(view, nid)) continue;
    const stereo = stereoTo(view, nid);
    if (stereo === StereoType.NONE) {
      sorted[leftOfParent(view, nid) ? slots.left : slots.right] = nid;
    }
    if (stereo === marked.stereo) sorted[marked.slot] = nid;
  }
  return sorted;
}

function tetrahedralOrder(view: CenterView, variant: 1 | 2 | 3 | 4): Order {
  const parentStereo = stereoTo(view, view.parentId);
  const sorted: Order = [null, null, null];

  switch (variant) {
    case 1: {
      if (parentStereo === StereoType.DOWN) {
        return assignBySide(view, { left: 0, right: 2 }, { stereo: StereoType.UP, slot: 1 });
      }
      if (parentStereo === StereoType.UP) {
        return assignBySide(view, { left: 2, right: 1 }, { stereo: StereoType.DOWN, slot: 0 });
      }
      // Parent bond unmarked: both marked bonds hang off the other neighbors.
      const normalBondIsLeft = others(view).some(
        nid => stereoTo(view, nid) === StereoType.NONE && leftOfParent(view, nid),
      );
      for (const nid of others(view)) {
        const stereo = stereoTo(view, nid);
        if (stereo === StereoType.NONE) sorted[0] = nid;
        if (stereo === StereoType.UP) sorted[normalBondIsLeft ? 2 : 1] = nid;
        if (stereo === StereoType.DOWN) sorted[normalBondIsLeft ? 1 : 2] = nid;
      }
      return sorted;
    }
    case 2: {
      for (const nid of others(view)) {
        if (broken(view, nid)) continue;
        const stereo = stereoTo(view, nid);
        if (parentStereo === StereoType.UP) {
          if (stereo === StereoType.DOWN) sorted[leftOfParent(view, nid) ? 1 : 2] = nid;
          if (stereo === StereoType.UP) sorted[0] = nid;
        }
        if (parentStereo === StereoType.DOWN) {
          if (stereo === StereoType.UP) sorted[leftOfParent(view, nid) ? 0 : 2] = nid;
          if (stereo === StereoType.DOWN) sorted[1] = nid;
        }
      }
      return sorted;
    }
    case 3:
    case 4: {
      const marker = variant === 3 ? StereoType.UP : StereoType.DOWN;
      if (parentStereo === marker) {
        sweepFromParent(view).forEach((nid, idx) => {
          sorted[idx] = nid;
        });
        return sorted;
      }
      if (parentStereo === StereoType.NONE) {
        return assignBySide(view, { left: 2, right: 1 }, { stereo: marker, slot: 0 });
      }
      return sorted;
    }
  }
}

function squarePlanarOrder(view: CenterView): Order {
  const sorted: Order = [null, null, null];
  sweepFromParent(view).forEach((nid, idx) => {
    sorted[idx] = nid;
  });
  return sorted;
}

/**
 * Trigonal-bipyramidal and octahedral centres: one up and one down bond,
 * the rest unmarked.
 */
function bipyramidalOrder(view: CenterView): Order {
  const { ctx, atomId, parentId } = view;
  const length = degreeOf(ctx, atomId) - 1;
  const sorted: Order = new Array<number | null>(length).fill(null);
  const parentStereo = stereoTo(view, parentId);

  if (parentStereo === StereoType.UP || parentStereo === StereoType.DOWN) {
    const opposite = parentStereo === StereoType.UP ? StereoType.DOWN : StereoType.UP;
    const entries: [number, number][] = [];
    for (const nid of neighborsOf(ctx, atomId)) {
      const stereo = stereoTo(view, nid);
      if (stereo === StereoType.NONE) entries.push([angleFromParent(view, nid), nid]);
      if (stereo === opposite) sorted[length - 1] = nid;
    }
    sweepByAngle(entries).forEach((nid, idx) => {
      sorted[idx] = nid;
    });
    return sorted;
  }

  if (parentStereo !== StereoType.NONE) return sorted;

  const entries: [number, number][] = [];
  for (const nid of others(view)) {
    const stereo = stereoTo(view, nid);
    if (stereo === StereoType.NONE) entries.push([angleFromParent(view, nid, false), nid]);
    if (stereo === StereoType.UP) sorted[0] = nid;
    if (stereo === StereoType.DOWN) sorted[length - 2] = nid;
  }
  const swept = sweepByAngle(entries);
  const last = swept[swept.length - 1];
  if (last === undefined) return new Array<number | null>(length).fill(null);
  sorted[length - 1] = last;

  if (swept.length === 2) {
    const [firstSwept, secondSwept] = swept;
    sorted[length - 3] = firstSwept ?? null;
    if (secondSwept !== undefined && angleFromParent(view, secondSwept, false) < 0) {
      const dummy = sorted[length - 2] ?? null;
      sorted[length - 2] = sorted[0] ?? null;
      sorted[0] = dummy;
    }
  }
  if (swept.length === 3) {
    sorted[length - 3] = sorted[length - 2] ?? null;
    sorted[length - 2] = swept[1] ?? null;
    sorted[length - 4] = swept[0] ?? null;
  }
  return sorted;
}

export function requiredOrder(view: CenterView, geometry: StereoGeometry): Order {
  switch (geometry.kind) {
    case 'tetrahedral':
      return tetrahedralOrder(view, geometry.variant);
    case 'square-planar':
      return squarePlanarOrder(view);
    case 'trigonal-bipyramidal':
    case 'octahedral':
      return bipyramidalOrder(view);
  }
}

// ---------------------------------------------------------------------------
// Applying the order to the sequence

function rotateRight(slots: Slot[]): void {
  const last = slots.pop();
  slots.unshift(last ?? null);
}

function isAtomSlot(slot: Slot | undefined): boolean {
  return slot !== null && slot !== undefined && slot.kind === 'atom';
}

/**
 * Match the required order against the child entries that follow the centre
 * at `position`. Ring-closure neighbors take the leading empty slots.
 */
function matchSlots(sequence: readonly TreeNode[], position: number, order: Order, slotCount: number, ringMarkers: number): Slot[] {
  const children: Slot[] = new Array<Slot>(slotCount).fill(null);
  for (let k = ringMarkers; k < slotCount; k++) {
    children[k] = sequence[position + 1 + k - ringMarkers] ?? null;
  }

  return order.map(wanted => {
    if (wanted === null) return null;
    return children.find(child => child !== null && headAtom(child) === wanted) ?? null;
  });
}

function allDistinct(slots: readonly TreeNode[]): boolean {
  return new Set(slots).size === slots.length;
}

function permuteTetrahedral(
  sequence: readonly TreeNode[],
  position: number,
  matched: Slot[],
  childCount: number,
  parentIsRingOpening: boolean,
): TreeNode[] | undefined {
  const slots = [...matched];
  const slotCount = slots.length;

  let k = 0;
  while (!isAtomSlot(slots[slotCount - 1])) {
    rotateRight(slots);
    k++;
    if (k > slotCount) break;
  }
  if (parentIsRingOpening) {
    k = 0;
    while (slots[0] !== null) {
      rotateRight(slots);
      k++;
      if (k > slotCount) break;
    }
  }

  const permuted = slots.filter((slot): slot is TreeNode => slot !== null);
  if (permuted.length !== childCount || !allDistinct(permuted)) return undefined;

  const children = sequence.slice(position + 1, position + 1 + childCount);
  const hadContinuation = children.some(child => child.kind === 'atom');
  if (hadContinuation && !isAtomSlot(permuted[permuted.length - 1])) return undefined;

  return [...sequence.slice(0, position + 1), ...permuted, ...sequence.slice(position + 1 + childCount)];
}

/**
 * Square-planar and bipyramidal centres: the chain continuation moves into a
 * branch at its required slot and the last required branch becomes the chain.
 */
function restructure(
  sequence: readonly TreeNode[],
  position: number,
  matched: Slot[],
  ringMarkers: number,
): TreeNode[] | undefined {
  if (ringMarkers !== 0) return undefined;
  const slots = matched.filter((slot): slot is TreeNode => slot !== null);
  if (slots.length !== matched.length || !allDistinct(slots)) return undefined;

  const slotCount = slots.length;
  const continuationAt = slots.findIndex(slot => slot.kind === 'atom');
  if (continuationAt === -1) return undefined;

  const tail = sequence.slice(position + 1 + slotCount);
  if (continuationAt === slotCount - 1) {
    return [...sequence.slice(0, position + 1), ...slots, ...tail];
  }

  const lastSlot = slots[slotCount - 1];
  const continuation = slots[continuationAt];
  if (!lastSlot || lastSlot.kind !== 'branch' || !continuation) return undefined;

  const moved = slots.slice(0, slotCount - 1).map((slot, idx) =>
    idx === continuationAt ? branchNode([continuation, ...tail]) : slot,
  );
  return [...sequence.slice(0, position + 1), ...moved, ...lastSlot.nodes];
}

function applyOrder(
  view: CenterView,
  geometry: StereoGeometry,
  sequence: readonly TreeNode[],
  position: number,
  order: Order,
): TreeNode[] | undefined {
  const slotCount = geometry.kind === 'trigonal-bipyramidal' || geometry.kind === 'octahedral'
    ? degreeOf(view.ctx, view.atomId) - 1
    : 3;
  const ringMarkers = view.closures.markersOf(view.atomId).length;
  const childCount = slotCount - ringMarkers;
  if (childCount < 0 || position + childCount >= sequence.length) return undefined;

  const matched = matchSlots(sequence, position, order, slotCount, ringMarkers);

  if (geometry.kind === 'tetrahedral') {
    return permuteTetrahedral(sequence, position, matched, childCount, view.closures.isRingOpening(view.parentId));
  }
  return restructure(sequence, position, matched, ringMarkers);
}

// ---------------------------------------------------------------------------
// Layout pass

/**
 * Walk the tree in render order and compute, for every stereocenter, the
 * sequence order that encodes its configuration with a single `@`.
 * Centres whose order cannot be applied are rendered without a descriptor.
 */
export function resolveStereoLayout(tree: BranchNode, ctx: GenerationContext, closures: RingClosureTable): StereoLayout {
  const sequences = new Map<BranchNode, readonly TreeNode[]>();
  const descriptors = new Map<number, StereoGeometry>();

  const resolveSequence = (branch: BranchNode, parentId: number | null) => {
    let working: readonly TreeNode[] = branch.nodes;
    let current = parentId;

    for (let h = 0; h < working.length; h++) {
      const node = working[h];
      if (!node) continue;

      if (node.kind === 'branch') {
        resolveSequence(node, current);
        continue;
      }

      const atomId = node.atomId;
      if (current !== null && isStereoCenter(ctx, atomId)) {
        const geometry = classifyGeometry(ctx, atomId);
        if (geometry) {
          const view: CenterView = { ctx, closures, atomId, parentId: current };
          const resolved = applyOrder(view, geometry, working, h, requiredOrder(view, geometry));
          if (resolved) {
            working = resolved;
            descriptors.set(atomId, geometry);
          } else if (process.env.VERBOSE) {
            console.log(`[smiles-generator] stereocenter ${atomId} (${geometry.kind}) has no consistent order; writing it without a descriptor`);
          }
        }
      }
      current = atomId;
    }

    if (working !== branch.nodes) sequences.set(branch, working);
  };

  resolveSequence(tree, null);

  return {
    sequenceOf: branch => sequences.get(branch) ?? branch.nodes,
    descriptorOf: atomId => descriptors.get(atomId),
  };
}

// ---------------------------------------------------------------------------
// Double-bond configuration

function substituentCount(ctx: GenerationContext, atomId: number): number {
  return degreeOf(ctx, atomId) + (ctx.atoms.get(atomId)?.hydrogens ?? 0);
}

/**
 * Whether `atomId`, reached from `parentId` over a double bond, ends a
 * configurable double bond: three substituents on both ends and two
 * distinguishable substituents on this end.
 */
export function isDoubleBondEnd(ctx: GenerationContext, atomId: number, parentId: number): boolean {
  if (bondBetween(ctx, atomId, parentId)?.type !== BondType.DOUBLE) return false;
  if (substituentCount(ctx, atomId) !== 3 || substituentCount(ctx, parentId) !== 3) return false;

  const [one, two] = neighborsOf(ctx, atomId).filter(nid => nid !== parentId);
  if (one !== undefined && two !== undefined && symbolOf(ctx, one) === symbolOf(ctx, two)) return false;
  return true;
}

/**
 * The far end of a configurable double bond that starts at `atomId` when it
 * is entered from `parentId`.
 */
export function findDoubleBondEnd(ctx: GenerationContext, atomId: number, parentId: number | null): number | undefined {
  if (substituentCount(ctx, atomId) !== 3) return undefined;
  return neighborsOf(ctx, atomId).find(
    nid => nid !== parentId
      && bondBetween(ctx, nid, atomId)?.type === BondType.DOUBLE
      && isDoubleBondEnd(ctx, nid, atomId),
  );
}

/**
 * Whether `atomId` starts a configurable double bond when entered from `parentId`.
 */
export function isDoubleBondBegin(ctx: GenerationContext, atomId: number, parentId: number | null): boolean {
  return findDoubleBondEnd(ctx, atomId, parentId) !== undefined;
}
