import type { Point2D } from 'types';

/**
 * Angle between the lines from -> to1 and from -> to2.
 * With `fullTurn` the result is in [0, 2π); otherwise it is signed, in (-2π, 2π).
 */
export function angleBetween(from: Point2D, to1: Point2D, to2: Point2D, fullTurn = true): number {
  let angle = Math.atan2(from.y - to1.y, from.x - to1.x) - Math.atan2(from.y - to2.y, from.x - to2.x);
  if (angle < 0 && fullTurn) angle = 2 * Math.PI + angle;
  return angle;
}

/**
 * Whether `whereIs` lies left of the line through `viewFrom` and `viewTo`,
 * judged where that line crosses the horizontal through `whereIs`.
 */
export function isLeft(whereIs: Point2D, viewFrom: Point2D, viewTo: Point2D): boolean {
  const a = viewFrom;
  const b = viewTo;
  const c = whereIs;
  const d = { x: whereIs.x - 1, y: whereIs.y };

  const d0 = a.x * b.y - a.y * b.x;
  const d1 = c.x * d.y - c.y * d.x;
  const den = (b.y - a.y) * (c.x - d.x) - (a.x - b.x) * (d.y - c.y);
  const x = (d0 * (c.x - d.x) - d1 * (a.x - b.x)) / den;
  const y = (d1 * (b.y - a.y) - d0 * (d.y - c.y)) / den;

  if (y > c.y) {
    return !(x > c.x);
  }
  return x > c.x;
}

/**
 * Order values by ascending angle. Later entries replace earlier ones that
 * share the same angle.
 */
export function sweepByAngle<T>(entries: readonly [number, T][]): T[] {
  const byAngle = new Map<number, T>();
  for (const [angle, value] of entries) {
    byAngle.set(angle, value);
  }
  return [...byAngle.entries()].sort((p, q) => p[0] - q[0]).map(([, value]) => value);
}
