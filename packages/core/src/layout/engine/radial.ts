/**
 * packages/core/src/layout/engine/radial.ts — Circular layout.
 *
 * Boxes are spread evenly around the circle inscribed in the bounds, starting
 * at the top and going clockwise (+y points down). Each box is centered on its
 * point, pulled inward by half its own width along x and half its own height
 * along y. That keeps boxes inside the circle without computing true tangent
 * packing, so large boxes sit slightly closer to the center than small ones.
 */

import { type EngineResult, ok } from "../../errors.js";
import { emitLayoutAudit } from "../../perf/layoutAudit.js";
import { UNSPECIFIED, midX, midY, rect, resolveConstraint } from "../geometry.js";
import type {
  ConfigInput,
  Constraint,
  LayoutResult,
  Measurer,
  Placement,
  RadialConfig,
  Rect,
  Size,
} from "../types.js";
import { resolveRadialConfig, validateLayoutInputs } from "../validateConfig.js";

/**
 * A radial layout always fills what it is offered: the proposal with unbounded
 * axes resolved. Boxes are not measured.
 */
export function measureRadial<B>(
  boxes: readonly B[],
  measurer: Measurer<B>,
  available: Constraint,
  config?: ConfigInput<RadialConfig>,
): EngineResult<Size> {
  const inputs = validateLayoutInputs("radial", boxes, measurer);
  if (!inputs.ok) return inputs;
  const resolved = resolveRadialConfig(config);
  if (!resolved.ok) return resolved;

  const size = resolveConstraint(available);
  emitLayoutAudit("radial", "measure", {
    boxes: boxes.length,
    width: size.width,
    height: size.height,
  });
  return ok(size);
}

export function placeRadial<B>(
  boxes: readonly B[],
  measurer: Measurer<B>,
  bounds: Rect,
  config?: ConfigInput<RadialConfig>,
): EngineResult<LayoutResult> {
  const inputs = validateLayoutInputs("radial", boxes, measurer);
  if (!inputs.ok) return inputs;
  const resolved = resolveRadialConfig(config);
  if (!resolved.ok) return resolved;

  const placements: Placement[] = [];
  const count = boxes.length;
  if (count > 0) {
    const radius = Math.min(bounds.size.width, bounds.size.height) / 2;
    const angleStep = (2 * Math.PI) / count;
    const cx = midX(bounds);
    const cy = midY(bounds);

    for (const [i, box] of boxes.entries()) {
      const size = measurer(box, UNSPECIFIED);
      const angle = angleStep * i - Math.PI / 2;
      const x = cx + Math.cos(angle) * (radius - size.width / 2);
      const y = cy + Math.sin(angle) * (radius - size.height / 2);

      placements.push({
        boxIndex: i,
        frame: rect(x - size.width / 2, y - size.height / 2, size.width, size.height),
        anchor: "center",
        proposal: UNSPECIFIED,
      });
    }
  }

  const totalSize: Size = { width: bounds.size.width, height: bounds.size.height };
  emitLayoutAudit("radial", "place", {
    boxes: count,
    width: totalSize.width,
    height: totalSize.height,
  });
  return ok({ totalSize, placements: Object.freeze(placements) });
}
