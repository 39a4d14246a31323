/**
 * packages/core/src/layout/engine/registry.ts — Engines behind one interface.
 *
 * Each engine is a frozen value: a kind, its defaults and two pure
 * operations. Nothing is cached between calls.
 */

import { type EngineResult, TesseraError } from "../../errors.js";
import type {
  ConfigInput,
  Constraint,
  LayoutResult,
  MasonryConfig,
  Measurer,
  RadialConfig,
  Rect,
  Size,
  WrapFlowConfig,
} from "../types.js";
import {
  DEFAULT_MASONRY_CONFIG,
  DEFAULT_RADIAL_CONFIG,
  DEFAULT_WRAP_FLOW_CONFIG,
} from "../validateConfig.js";
import { measureMasonry, placeMasonry } from "./masonry.js";
import { measureRadial, placeRadial } from "./radial.js";
import { measureWrapFlow, placeWrapFlow } from "./wrapFlow.js";

export type LayoutEngineConfigs = {
  wrapFlow: WrapFlowConfig;
  masonry: MasonryConfig;
  radial: RadialConfig;
};

export type LayoutEngineKind = keyof LayoutEngineConfigs;

export interface LayoutEngine<C> {
  readonly kind: LayoutEngineKind;
  readonly defaults: C;
  /** Size the layout needs for `available`; a `null` axis is unbounded. */
  measure<B>(
    boxes: readonly B[],
    measurer: Measurer<B>,
    available: Constraint,
    config?: ConfigInput<C>,
  ): EngineResult<Size>;
  /** Total size and one placement per box, positioned inside `bounds`. */
  place<B>(
    boxes: readonly B[],
    measurer: Measurer<B>,
    bounds: Rect,
    config?: ConfigInput<C>,
  ): EngineResult<LayoutResult>;
}

export const wrapFlowEngine: LayoutEngine<WrapFlowConfig> = Object.freeze({
  kind: "wrapFlow",
  defaults: DEFAULT_WRAP_FLOW_CONFIG,
  measure: measureWrapFlow,
  place: placeWrapFlow,
});

export const masonryEngine: LayoutEngine<MasonryConfig> = Object.freeze({
  kind: "masonry",
  defaults: DEFAULT_MASONRY_CONFIG,
  measure: measureMasonry,
  place: placeMasonry,
});

export const radialEngine: LayoutEngine<RadialConfig> = Object.freeze({
  kind: "radial",
  defaults: DEFAULT_RADIAL_CONFIG,
  measure: measureRadial,
  place: placeRadial,
});

const ENGINES: { readonly [K in LayoutEngineKind]: LayoutEngine<LayoutEngineConfigs[K]> } =
  Object.freeze({
    wrapFlow: wrapFlowEngine,
    masonry: masonryEngine,
    radial: radialEngine,
  });

export const LAYOUT_ENGINE_KINDS: readonly LayoutEngineKind[] = Object.freeze([
  "wrapFlow",
  "masonry",
  "radial",
]);

export function isLayoutEngineKind(value: unknown): value is LayoutEngineKind {
  return value === "wrapFlow" || value === "masonry" || value === "radial";
}

/** Look up an engine by kind. Throws `TESSERA_INVALID_ARGUMENT` for unknown kinds. */
export function getLayoutEngine<K extends LayoutEngineKind>(
  kind: K,
): LayoutEngine<LayoutEngineConfigs[K]> {
  if (!isLayoutEngineKind(kind)) {
    throw new TesseraError(
      "TESSERA_INVALID_ARGUMENT",
      `Unknown layout engine "${String(kind)}". Expected one of: ${LAYOUT_ENGINE_KINDS.join(", ")}`,
    );
  }
  return ENGINES[kind];
}
