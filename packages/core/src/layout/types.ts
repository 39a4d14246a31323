/**
 * packages/core/src/layout/types.ts — Layout primitive type definitions.
 *
 * Why: Defines the geometric vocabulary shared by every engine. Coordinates are
 * host units (points, pixels, cells); the core never rounds them.
 */

/** Width/height pair. Engines expect measured sizes to be >= 0. */
export type Size = Readonly<{ width: number; height: number }>;

export type Point = Readonly<{ x: number; y: number }>;

/** Rectangle anchored at its top-left origin. */
export type Rect = Readonly<{ origin: Point; size: Size }>;

/**
 * Proposed measurement bounds. `null` on an axis means unbounded: the box may
 * report whatever it naturally wants along that axis.
 */
export type Constraint = Readonly<{ width: number | null; height: number | null }>;

/** Which point of a placed frame the committed position refers to. */
export type Anchor = "topLeading" | "center";

/**
 * Host-supplied measurement callback. Called synchronously during a layout
 * pass; results are never cached by the core.
 */
export type Measurer<B> = (box: B, constraint: Constraint) => Size;

/**
 * Final frame of one input box.
 *
 * - `boxIndex` is the box's position in the input sequence.
 * - `anchor` and `proposal` tell the host how to commit the frame onto its own
 *   view (see `commitPlacements`).
 */
export type Placement = Readonly<{
  boxIndex: number;
  frame: Rect;
  anchor: Anchor;
  proposal: Constraint;
}>;

/** Output of a place pass. `placements.length` always equals the box count. */
export type LayoutResult = Readonly<{
  totalSize: Size;
  placements: readonly Placement[];
}>;

export type WrapAlignment = "leading" | "center" | "trailing";

export type WrapFlowConfig = Readonly<{
  alignment: WrapAlignment;
  spacing: number;
}>;

export type MasonryConfig = Readonly<{
  columns: number;
  spacing: number;
}>;

export type RadialConfig = Readonly<Record<string, never>>;

/** Call-site config: every field optional, filled from the engine defaults. */
export type ConfigInput<C> = Readonly<Partial<C>>;
