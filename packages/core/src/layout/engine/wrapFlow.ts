/**
 * packages/core/src/layout/engine/wrapFlow.ts — Wrapping row layout.
 *
 * Boxes flow left to right at their natural size. A box starts a new row when
 * appending it (plus spacing) would push the row past the available width; a
 * box wider than the available width still gets a row of its own and is never
 * shrunk.
 *
 * Row rules:
 *   - row width accumulates `width + spacing` per box, trailing spacing included
 *   - row height is the tallest box in the row
 *   - rows are separated by `spacing`, none after the last row
 *   - every box in a row shares the row's top edge (no vertical centering)
 *
 * measure() and place() run the same row builder so their heights agree.
 */

import { type EngineResult, ok } from "../../errors.js";
import { emitLayoutAudit } from "../../perf/layoutAudit.js";
import { UNSPECIFIED, maxX, minX, minY, rect } from "../geometry.js";
import type {
  ConfigInput,
  Constraint,
  LayoutResult,
  Measurer,
  Placement,
  Rect,
  Size,
  WrapFlowConfig,
} from "../types.js";
import { resolveWrapFlowConfig, validateLayoutInputs } from "../validateConfig.js";

/** Boxes `[start, end)` of the input sequence. */
type WrapRow = Readonly<{ start: number; end: number; width: number; height: number }>;

type WrapLines = Readonly<{
  sizes: readonly Size[];
  rows: readonly WrapRow[];
}>;

function buildRows<B>(
  boxes: readonly B[],
  measurer: Measurer<B>,
  availableWidth: number,
  spacing: number,
): WrapLines {
  const sizes: Size[] = [];
  const rows: WrapRow[] = [];

  let rowStart = 0;
  let currentRowWidth = 0;
  let currentRowHeight = 0;

  for (const [i, box] of boxes.entries()) {
    const size = measurer(box, UNSPECIFIED);
    sizes.push(size);

    const rowHasBoxes = i > rowStart;
    if (rowHasBoxes && currentRowWidth + size.width + spacing > availableWidth) {
      rows.push({ start: rowStart, end: i, width: currentRowWidth, height: currentRowHeight });
      rowStart = i;
      currentRowWidth = size.width + spacing;
      currentRowHeight = size.height;
    } else {
      currentRowWidth += size.width + spacing;
      currentRowHeight = Math.max(currentRowHeight, size.height);
    }
  }

  if (boxes.length > rowStart) {
    rows.push({
      start: rowStart,
      end: boxes.length,
      width: currentRowWidth,
      height: currentRowHeight,
    });
  }

  return { sizes, rows };
}

function stackedHeight(rows: readonly WrapRow[], spacing: number): number {
  let height = 0;
  for (let i = 0; i < rows.length; i++) {
    if (i > 0) height += spacing;
    height += rows[i]?.height ?? 0;
  }
  return height;
}

function rowStartX(
  config: WrapFlowConfig,
  bounds: Rect,
  availableWidth: number,
  rowWidth: number,
): number {
  switch (config.alignment) {
    case "leading":
      return minX(bounds);
    case "center":
      return minX(bounds) + (availableWidth - rowWidth) / 2;
    case "trailing":
      return maxX(bounds) - rowWidth;
  }
}

/**
 * Size needed to flow `boxes` within `available.width`.
 *
 * An unbounded width never wraps and is reported back as unbounded
 * (`Infinity`), or 0 without boxes.
 */
export function measureWrapFlow<B>(
  boxes: readonly B[],
  measurer: Measurer<B>,
  available: Constraint,
  config?: ConfigInput<WrapFlowConfig>,
): EngineResult<Size> {
  const inputs = validateLayoutInputs("wrapFlow", boxes, measurer);
  if (!inputs.ok) return inputs;
  const resolved = resolveWrapFlowConfig(config);
  if (!resolved.ok) return resolved;
  const { spacing } = resolved.value;

  const availableWidth = available.width ?? Number.POSITIVE_INFINITY;
  const { rows } = buildRows(boxes, measurer, availableWidth, spacing);

  const width = available.width ?? (boxes.length > 0 ? Number.POSITIVE_INFINITY : 0);
  const size: Size = { width, height: stackedHeight(rows, spacing) };
  emitLayoutAudit("wrapFlow", "measure", {
    boxes: boxes.length,
    rows: rows.length,
    width: size.width,
    height: size.height,
  });
  return ok(size);
}

export function placeWrapFlow<B>(
  boxes: readonly B[],
  measurer: Measurer<B>,
  bounds: Rect,
  config?: ConfigInput<WrapFlowConfig>,
): EngineResult<LayoutResult> {
  const inputs = validateLayoutInputs("wrapFlow", boxes, measurer);
  if (!inputs.ok) return inputs;
  const resolved = resolveWrapFlowConfig(config);
  if (!resolved.ok) return resolved;
  const cfg = resolved.value;

  const availableWidth = bounds.size.width;
  const { sizes, rows } = buildRows(boxes, measurer, availableWidth, cfg.spacing);

  const placements: Placement[] = [];
  let y = minY(bounds);
  for (const row of rows) {
    let x = rowStartX(cfg, bounds, availableWidth, row.width);
    for (let i = row.start; i < row.end; i++) {
      const size = sizes[i];
      if (!size) continue;
      placements.push({
        boxIndex: i,
        frame: rect(x, y, size.width, size.height),
        anchor: "topLeading",
        proposal: UNSPECIFIED,
      });
      x += size.width + cfg.spacing;
    }
    y += row.height + cfg.spacing;
  }

  const totalSize: Size = { width: availableWidth, height: stackedHeight(rows, cfg.spacing) };
  emitLayoutAudit("wrapFlow", "place", {
    boxes: boxes.length,
    rows: rows.length,
    width: totalSize.width,
    height: totalSize.height,
  });
  return ok({ totalSize, placements: Object.freeze(placements) });
}
