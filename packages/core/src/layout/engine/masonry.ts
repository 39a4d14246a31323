/**
 * packages/core/src/layout/engine/masonry.ts — Shortest-column packing.
 *
 * The available width is split into `columns` equal columns. Each box, in
 * input order, is measured against the column width and dropped into the
 * column whose occupied height is currently smallest.
 *
 * Invariants:
 *   - column choice scans from index 0 with a strict `<`, so ties go to the
 *     lowest column index and identical inputs always pack identically
 *   - a negative column width (narrow bounds, many columns) is passed through
 *     to the measurer and the frames unchanged
 *   - greedy and online: earlier boxes are never moved to balance later ones
 */

import { warnDevOnce } from "../../devWarnings.js";
import { type EngineResult, ok } from "../../errors.js";
import { emitLayoutAudit } from "../../perf/layoutAudit.js";
import { constraintOf, maxY, minX, minY, rect, resolveConstraint } from "../geometry.js";
import type {
  ConfigInput,
  Constraint,
  LayoutResult,
  MasonryConfig,
  Measurer,
  Placement,
  Rect,
  Size,
} from "../types.js";
import { resolveMasonryConfig, validateLayoutInputs } from "../validateConfig.js";

/** Width of one column once the gaps between columns are taken out. */
export function masonryColumnWidth(totalWidth: number, columns: number, spacing: number): number {
  if (columns === 1) return totalWidth;
  return (totalWidth - spacing * (columns - 1)) / columns;
}

function shortestColumn(columnHeights: readonly number[]): number {
  let selectedColumn = 0;
  let selectedHeight = Number.POSITIVE_INFINITY;
  for (let col = 0; col < columnHeights.length; col++) {
    const height = columnHeights[col] ?? 0;
    if (height < selectedHeight) {
      selectedColumn = col;
      selectedHeight = height;
    }
  }
  return selectedColumn;
}

/**
 * Frames for every box relative to a (0, 0) origin, in input order.
 *
 * Each frame takes the size the measurer reports for a
 * `{ width: columnWidth, height: unbounded }` proposal, so a box may be
 * narrower (or wider) than its column.
 */
export function computeFrames<B>(
  boxes: readonly B[],
  measurer: Measurer<B>,
  totalWidth: number,
  columns: number,
  spacing: number,
): Rect[] {
  const columnWidth = masonryColumnWidth(totalWidth, columns, spacing);
  if (columnWidth < 0) {
    warnDevOnce(
      `masonry:${String(totalWidth)}:${String(columns)}:${String(spacing)}`,
      `[tessera] masonry: column width is negative (${String(columnWidth)}) for width ${String(totalWidth)}, ${String(columns)} columns and spacing ${String(spacing)}`,
    );
  }

  const proposal: Constraint = { width: columnWidth, height: null };
  const columnHeights = new Array<number>(columns).fill(0);
  const frames: Rect[] = [];

  for (const box of boxes) {
    const col = shortestColumn(columnHeights);
    const x = col * (columnWidth + spacing);
    const y = columnHeights[col] ?? 0;
    const size = measurer(box, proposal);

    frames.push(rect(x, y, size.width, size.height));
    columnHeights[col] = y + size.height + spacing;
  }

  return frames;
}

function framesHeight(frames: readonly Rect[]): number {
  let height = 0;
  for (const frame of frames) {
    const bottom = maxY(frame);
    if (bottom > height) height = bottom;
  }
  return height;
}

/**
 * Size needed to pack `boxes`. An unbounded width resolves to the
 * unspecified-dimension default before the columns are computed.
 */
export function measureMasonry<B>(
  boxes: readonly B[],
  measurer: Measurer<B>,
  available: Constraint,
  config?: ConfigInput<MasonryConfig>,
): EngineResult<Size> {
  const inputs = validateLayoutInputs("masonry", boxes, measurer);
  if (!inputs.ok) return inputs;
  const resolved = resolveMasonryConfig(config);
  if (!resolved.ok) return resolved;
  const { columns, spacing } = resolved.value;

  const width = resolveConstraint(available).width;
  const frames = computeFrames(boxes, measurer, width, columns, spacing);
  const size: Size = { width, height: framesHeight(frames) };

  emitLayoutAudit("masonry", "measure", {
    boxes: boxes.length,
    columns,
    width: size.width,
    height: size.height,
  });
  return ok(size);
}

export function placeMasonry<B>(
  boxes: readonly B[],
  measurer: Measurer<B>,
  bounds: Rect,
  config?: ConfigInput<MasonryConfig>,
): EngineResult<LayoutResult> {
  const inputs = validateLayoutInputs("masonry", boxes, measurer);
  if (!inputs.ok) return inputs;
  const resolved = resolveMasonryConfig(config);
  if (!resolved.ok) return resolved;
  const { columns, spacing } = resolved.value;

  const frames = computeFrames(boxes, measurer, bounds.size.width, columns, spacing);
  const originX = minX(bounds);
  const originY = minY(bounds);

  const placements: Placement[] = frames.map((frame, boxIndex): Placement => ({
    boxIndex,
    frame: rect(
      originX + frame.origin.x,
      originY + frame.origin.y,
      frame.size.width,
      frame.size.height,
    ),
    anchor: "topLeading",
    proposal: constraintOf(frame.size),
  }));

  const totalSize: Size = { width: bounds.size.width, height: framesHeight(frames) };
  emitLayoutAudit("masonry", "place", {
    boxes: boxes.length,
    columns,
    width: totalSize.width,
    height: totalSize.height,
  });
  return ok({ totalSize, placements: Object.freeze(placements) });
}
