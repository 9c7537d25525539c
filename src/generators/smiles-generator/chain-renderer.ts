import { BondType } from 'types';
import type { GenerationContext } from './context';
import { bondBetween, degreeOf, pointOf } from './context';
import { isLeft } from './geometry';
import type { BranchNode, RingClosureTable, TreeNode } from './spanning-tree';
import type { StereoLayout } from './stereo-resolver';
import { findDoubleBondEnd } from './stereo-resolver';
import { atomToken, bondToken, ringMarkerToken } from './tokens';

type DirectionMarker = '/' | '\\';

/**
 * End marker of a double bond whose begin marker is already written. It is
 * emitted on the bond into `target` once that atom is reached, which may be
 * after any number of branches on the far end have closed.
 */
interface PendingMarker {
  viewFrom: number;
  target: number;
  marker: DirectionMarker;
}

interface RenderState {
  out: string[];
  pending: PendingMarker[];
  openedMarkers: Set<number>;
  // marker a later-written single bond from a double-bond end must carry
  directions: Map<number, DirectionMarker>;
}

function flip(marker: DirectionMarker): DirectionMarker {
  return marker === '/' ? '\\' : '/';
}

/**
 * Whether `viewFrom` (on the begin side) and `target` (on the end side) lie on
 * the same side of the double bond, or undefined without coordinates.
 */
function sameSide(ctx: GenerationContext, viewFrom: number, begin: number, end: number, target: number): boolean | undefined {
  const [v, b, e, t] = [viewFrom, begin, end, target].map(id => pointOf(ctx, id));
  if (!v || !b || !e || !t) return undefined;
  return isLeft(v, e, b) === isLeft(t, b, e);
}

export class ChainRenderer {
  constructor(
    private readonly ctx: GenerationContext,
    private readonly closures: RingClosureTable,
    private readonly layout: StereoLayout,
  ) {}

  render(tree: BranchNode): string {
    const state: RenderState = { out: [], pending: [], openedMarkers: new Set(), directions: new Map() };
    this.renderSequence(tree, null, state);
    return state.out.join('');
  }

  private renderSequence(branch: BranchNode, parentId: number | null, state: RenderState): void {
    const { ctx } = this;
    const sequence = this.layout.sequenceOf(branch);
    let current = parentId;

    for (let h = 0; h < sequence.length; h++) {
      const node = sequence[h];
      if (!node) continue;

      if (node.kind === 'atom') {
        const atomId = node.atomId;
        if (current !== null) {
          this.writeBond(current, atomId, state);
          if (ctx.doubleBondStereo) this.writeDirection(sequence, h, atomId, current, state);
        }
        this.writeAtom(atomId, state);
        current = atomId;
        continue;
      }

      const omitParens = current !== null
        && this.closures.isRingOpening(current)
        && degreeOf(ctx, current) < 4
        && h === sequence.length - 1;
      if (!omitParens) state.out.push('(');
      this.renderSequence(node, current, state);
      if (!omitParens) state.out.push(')');
    }
  }

  private writeBond(fromId: number, toId: number, state: RenderState): void {
    const bond = bondBetween(this.ctx, fromId, toId);
    if (!bond) return;
    state.out.push(bondToken(bond, this.ctx.aromaticity.isAromaticPair(fromId, toId), this.ctx.strictBondOrders));
  }

  private writeAtom(atomId: number, state: RenderState): void {
    const { ctx } = this;
    const atom = ctx.atoms.get(atomId);
    if (!atom) return;

    state.out.push(atomToken(atom, {
      aromatic: ctx.aromaticity.isAromatic(atomId),
      stereo: ctx.chiral ? this.layout.descriptorOf(atomId) : undefined,
      isotopes: ctx.isotopes,
    }));

    for (const closure of this.closures.closuresOf(atomId)) {
      if (!state.openedMarkers.has(closure.marker)) {
        state.openedMarkers.add(closure.marker);
        const [a, b] = closure.atoms;
        const bond = bondBetween(ctx, a, b);
        if (bond) {
          state.out.push(bondToken(bond, ctx.aromaticity.isAromaticPair(a, b), ctx.strictBondOrders));
        }
      }
      state.out.push(ringMarkerToken(closure.marker));
    }
  }

  /**
   * Direction markers on the bond from `parentId` into `atomId`: the end
   * marker of a double bond written earlier, then the begin marker of a
   * double bond starting here. A bond carries at most one marker; when both
   * fall on it the end marker serves as the begin marker too.
   */
  private writeDirection(sequence: readonly TreeNode[], h: number, atomId: number, parentId: number, state: RenderState): void {
    let written: DirectionMarker | undefined;
    const top = state.pending.pop();
    if (top) {
      if (top.target === atomId) {
        written = top.marker;
        state.out.push(written);
      } else {
        state.pending.push(top);
      }
    }

    const plan = this.planDoubleBond(sequence, h, atomId, parentId);
    if (!plan) return;

    const beginMarker = written ?? state.directions.get(parentId) ?? '/';
    if (written === undefined) state.out.push(beginMarker);

    const marker = plan.sameSide ? flip(beginMarker) : beginMarker;
    state.pending.push({ viewFrom: parentId, target: plan.target, marker });
    state.directions.set(atomId, beginMarker);
    state.directions.set(plan.end, flip(marker));
  }

  /**
   * The end atom and the end-side substituent whose bond will carry the end
   * marker, for a configurable double bond starting at `atomId`. Undefined
   * when either marker has no single bond to sit on, or positions are missing.
   */
  private planDoubleBond(
    sequence: readonly TreeNode[],
    h: number,
    atomId: number,
    parentId: number,
  ): { end: number; target: number; sameSide: boolean } | undefined {
    const { ctx } = this;
    if (bondBetween(ctx, parentId, atomId)?.type !== BondType.SINGLE) return undefined;

    const end = findDoubleBondEnd(ctx, atomId, parentId);
    if (end === undefined || this.closures.isBroken(atomId, end)) return undefined;

    const located = this.locateChild(sequence, h, end);
    if (!located) return undefined;
    const [endSequence, endIndex] = located;

    const after = endSequence[endIndex + 1];
    const targetNode = after?.kind === 'branch' ? endSequence[endIndex + 2] : after;
    if (targetNode?.kind !== 'atom') return undefined;
    const target = targetNode.atomId;
    if (bondBetween(ctx, end, target)?.type !== BondType.SINGLE) return undefined;

    const same = sameSide(ctx, parentId, atomId, end, target);
    if (same === undefined) return undefined;
    return { end, target, sameSide: same };
  }

  /**
   * Where tree child `childId` of the atom at `h` is written: the chain
   * continuation in the same sequence, or the head of one of its branches.
   */
  private locateChild(sequence: readonly TreeNode[], h: number, childId: number): [readonly TreeNode[], number] | undefined {
    for (let k = h + 1; k < sequence.length; k++) {
      const node = sequence[k];
      if (!node) continue;
      if (node.kind === 'atom') {
        return node.atomId === childId ? [sequence, k] : undefined;
      }
      const nodes = this.layout.sequenceOf(node);
      const first = nodes[0];
      if (first?.kind === 'atom' && first.atomId === childId) return [nodes, 0];
    }
    return undefined;
  }
}
