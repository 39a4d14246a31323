/**
 * @tessera/core
 *
 * Pure geometry core for wrap, masonry and radial layouts.
 * This package MUST NOT use Node-specific APIs (Buffer, worker_threads, node:* imports).
 */

// =============================================================================
// Errors
// =============================================================================

export {
  type EngineFatal,
  type EngineResult,
  TesseraError,
  type TesseraErrorCode,
  fail,
  ok,
  unwrap,
} from "./errors.js";

// =============================================================================
// Geometry
// =============================================================================

export type {
  Anchor,
  ConfigInput,
  Constraint,
  LayoutResult,
  MasonryConfig,
  Measurer,
  Placement,
  Point,
  RadialConfig,
  Rect,
  Size,
  WrapAlignment,
  WrapFlowConfig,
} from "./layout/types.js";

export {
  UNSPECIFIED,
  UNSPECIFIED_DIMENSION,
  anchorPoint,
  constraintOf,
  maxX,
  maxY,
  midX,
  midY,
  minX,
  minY,
  rect,
  rectCenter,
  resolveConstraint,
} from "./layout/geometry.js";

// =============================================================================
// Configuration
// =============================================================================

export {
  DEFAULT_MASONRY_CONFIG,
  DEFAULT_RADIAL_CONFIG,
  DEFAULT_WRAP_FLOW_CONFIG,
  resolveMasonryConfig,
  resolveRadialConfig,
  resolveWrapFlowConfig,
} from "./layout/validateConfig.js";

// =============================================================================
// Engines
// =============================================================================

export { measureWrapFlow, placeWrapFlow } from "./layout/engine/wrapFlow.js";
export {
  computeFrames,
  masonryColumnWidth,
  measureMasonry,
  placeMasonry,
} from "./layout/engine/masonry.js";
export { measureRadial, placeRadial } from "./layout/engine/radial.js";
export {
  LAYOUT_ENGINE_KINDS,
  type LayoutEngine,
  type LayoutEngineConfigs,
  type LayoutEngineKind,
  getLayoutEngine,
  isLayoutEngineKind,
  masonryEngine,
  radialEngine,
  wrapFlowEngine,
} from "./layout/engine/registry.js";

// =============================================================================
// Host adapter
// =============================================================================

export {
  type LayoutSubview,
  commitPlacements,
  placeSubviews,
  sizeSubviews,
  subviewMeasurer,
} from "./layout/subviews.js";

// =============================================================================
// Diagnostics
// =============================================================================

export {
  emitLayoutAudit,
  isLayoutAuditEnabled,
  setLayoutAuditEnabled,
} from "./perf/layoutAudit.js";
