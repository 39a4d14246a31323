/**
 * packages/core/src/layout/geometry.ts — Rect helpers and constraint resolution.
 */

import type { Anchor, Constraint, Point, Rect, Size } from "./types.js";

/**
 * Dimension substituted for an unbounded axis when a layout must report a
 * concrete size for an unspecified proposal.
 */
export const UNSPECIFIED_DIMENSION = 10;

/** Fully unbounded proposal: "report your natural size". */
export const UNSPECIFIED: Constraint = Object.freeze({ width: null, height: null });

export function rect(x: number, y: number, width: number, height: number): Rect {
  return { origin: { x, y }, size: { width, height } };
}

export function minX(r: Rect): number {
  return r.origin.x;
}

export function minY(r: Rect): number {
  return r.origin.y;
}

export function maxX(r: Rect): number {
  return r.origin.x + r.size.width;
}

export function maxY(r: Rect): number {
  return r.origin.y + r.size.height;
}

export function midX(r: Rect): number {
  return r.origin.x + r.size.width / 2;
}

export function midY(r: Rect): number {
  return r.origin.y + r.size.height / 2;
}

export function rectCenter(r: Rect): Point {
  return { x: midX(r), y: midY(r) };
}

/** Proposal that asks for exactly `size`. */
export function constraintOf(size: Size): Constraint {
  return { width: size.width, height: size.height };
}

/** Replace unbounded axes with `UNSPECIFIED_DIMENSION`. */
export function resolveConstraint(constraint: Constraint): Size {
  return {
    width: constraint.width ?? UNSPECIFIED_DIMENSION,
    height: constraint.height ?? UNSPECIFIED_DIMENSION,
  };
}

/** Point of `frame` that a placement with `anchor` is committed at. */
export function anchorPoint(frame: Rect, anchor: Anchor): Point {
  return anchor === "center" ? rectCenter(frame) : frame.origin;
}
