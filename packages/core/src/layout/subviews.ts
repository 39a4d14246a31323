/**
 * packages/core/src/layout/subviews.ts — Host view adapter.
 *
 * Why: Engines work on opaque boxes plus a measurer. Hosts with a retained
 * view tree usually already have a proxy per child that can report a size for
 * a proposal and accept a final position; this module lets such proxies be
 * laid out directly.
 *
 * Commit order follows placement order, i.e. input order.
 */

import { type EngineResult, fail, ok } from "../errors.js";
import type { LayoutEngine } from "./engine/registry.js";
import { anchorPoint } from "./geometry.js";
import type {
  Anchor,
  ConfigInput,
  Constraint,
  LayoutResult,
  Point,
  Rect,
  Size,
} from "./types.js";

/** Capability pair a host supplies for each child view. */
export interface LayoutSubview {
  measure(constraint: Constraint): Size;
  place(at: Point, anchor: Anchor, proposal: Constraint): void;
}

export function subviewMeasurer(subview: LayoutSubview, constraint: Constraint): Size {
  return subview.measure(constraint);
}

/**
 * Apply `result` onto `subviews`. Nothing is placed unless every placement
 * refers to a distinct existing subview. Returns the number of subviews placed.
 */
export function commitPlacements(
  subviews: readonly LayoutSubview[],
  result: LayoutResult,
): EngineResult<number> {
  const { placements } = result;
  if (placements.length !== subviews.length) {
    return fail(
      "TESSERA_INVALID_ARGUMENT",
      `commitPlacements: ${String(placements.length)} placements for ${String(subviews.length)} subviews`,
    );
  }

  const seen = new Set<number>();
  for (const placement of placements) {
    const index = placement.boxIndex;
    if (!Number.isInteger(index) || index < 0 || index >= subviews.length || seen.has(index)) {
      return fail(
        "TESSERA_INVALID_ARGUMENT",
        `commitPlacements: placement boxIndex ${String(index)} does not address a unique subview`,
      );
    }
    seen.add(index);
  }

  for (const placement of placements) {
    const subview = subviews[placement.boxIndex];
    if (!subview) continue;
    const at = anchorPoint(placement.frame, placement.anchor);
    subview.place(at, placement.anchor, placement.proposal);
  }
  return ok(placements.length);
}

/** Size-that-fits pass over host subviews. */
export function sizeSubviews<C>(
  engine: LayoutEngine<C>,
  subviews: readonly LayoutSubview[],
  proposal: Constraint,
  config?: ConfigInput<C>,
): EngineResult<Size> {
  return engine.measure(subviews, subviewMeasurer, proposal, config);
}

/** Place pass over host subviews: computes the layout, then commits it. */
export function placeSubviews<C>(
  engine: LayoutEngine<C>,
  subviews: readonly LayoutSubview[],
  bounds: Rect,
  config?: ConfigInput<C>,
): EngineResult<LayoutResult> {
  const res = engine.place(subviews, subviewMeasurer, bounds, config);
  if (!res.ok) return res;
  const committed = commitPlacements(subviews, res.value);
  if (!committed.ok) return committed;
  return res;
}
