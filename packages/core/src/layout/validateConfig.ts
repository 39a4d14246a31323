/**
 * packages/core/src/layout/validateConfig.ts — Engine config validation.
 *
 * Why: Invalid configuration is a host bug. It is reported as a structured
 * fatal before any box is measured, never clamped into something that happens
 * to lay out.
 *
 * Validation rules:
 *   - spacing must be a finite number >= 0
 *   - columns must be an integer >= 1
 *   - alignment must be "leading", "center" or "trailing"
 *   - omitted fields take the engine default
 */

import { type EngineResult, fail, ok } from "../errors.js";
import type {
  MasonryConfig,
  Measurer,
  RadialConfig,
  WrapAlignment,
  WrapFlowConfig,
} from "./types.js";

export const DEFAULT_WRAP_FLOW_CONFIG: WrapFlowConfig = Object.freeze({
  alignment: "center",
  spacing: 10,
});

export const DEFAULT_MASONRY_CONFIG: MasonryConfig = Object.freeze({
  columns: 3,
  spacing: 10,
});

export const DEFAULT_RADIAL_CONFIG: RadialConfig = Object.freeze({});

const WRAP_ALIGNMENTS: readonly WrapAlignment[] = Object.freeze(["leading", "center", "trailing"]);

type ConfigBag = Readonly<{
  alignment?: unknown;
  spacing?: unknown;
  columns?: unknown;
}>;

function invalid(detail: string): EngineResult<never> {
  return fail("TESSERA_INVALID_CONFIG", detail);
}

function describeReceived(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  return `${typeof value} (${String(value)})`;
}

function isWrapAlignment(value: unknown): value is WrapAlignment {
  return value === "leading" || value === "center" || value === "trailing";
}

function readField(bag: object, key: keyof ConfigBag): unknown {
  return key in bag ? Reflect.get(bag, key) : undefined;
}

function readConfigBag(kind: string, raw: unknown): EngineResult<ConfigBag> {
  if (raw === undefined) return ok({});
  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
    return invalid(`${kind} config must be an object, got ${describeReceived(raw)}`);
  }
  return ok({
    alignment: readField(raw, "alignment"),
    spacing: readField(raw, "spacing"),
    columns: readField(raw, "columns"),
  });
}

function requireSpacing(kind: string, v: unknown, def: number): EngineResult<number> {
  const value = v === undefined ? def : v;
  if (typeof value !== "number" || !Number.isFinite(value) || value < 0) {
    return invalid(`${kind}.spacing must be a finite number >= 0, got ${describeReceived(value)}`);
  }
  return ok(value);
}

function requireColumns(v: unknown, def: number): EngineResult<number> {
  const value = v === undefined ? def : v;
  if (typeof value !== "number" || !Number.isInteger(value) || value < 1) {
    return invalid(`masonry.columns must be an integer >= 1, got ${describeReceived(value)}`);
  }
  return ok(value);
}

export function resolveWrapFlowConfig(raw: unknown): EngineResult<WrapFlowConfig> {
  const bag = readConfigBag("wrapFlow", raw);
  if (!bag.ok) return bag;

  const alignment = bag.value.alignment ?? DEFAULT_WRAP_FLOW_CONFIG.alignment;
  if (!isWrapAlignment(alignment)) {
    return invalid(
      `wrapFlow.alignment must be one of ${WRAP_ALIGNMENTS.join(", ")}, got ${describeReceived(alignment)}`,
    );
  }

  const spacing = requireSpacing("wrapFlow", bag.value.spacing, DEFAULT_WRAP_FLOW_CONFIG.spacing);
  if (!spacing.ok) return spacing;

  return ok({ alignment, spacing: spacing.value });
}

export function resolveMasonryConfig(raw: unknown): EngineResult<MasonryConfig> {
  const bag = readConfigBag("masonry", raw);
  if (!bag.ok) return bag;

  const columns = requireColumns(bag.value.columns, DEFAULT_MASONRY_CONFIG.columns);
  if (!columns.ok) return columns;

  const spacing = requireSpacing("masonry", bag.value.spacing, DEFAULT_MASONRY_CONFIG.spacing);
  if (!spacing.ok) return spacing;

  return ok({ columns: columns.value, spacing: spacing.value });
}

export function resolveRadialConfig(raw: unknown): EngineResult<RadialConfig> {
  const bag = readConfigBag("radial", raw);
  if (!bag.ok) return bag;
  return ok(DEFAULT_RADIAL_CONFIG);
}

/** Structural checks shared by every engine entry point. */
export function validateLayoutInputs<B>(
  kind: string,
  boxes: readonly B[],
  measurer: Measurer<B>,
): EngineResult<null> {
  if (!Array.isArray(boxes)) {
    return fail("TESSERA_INVALID_ARGUMENT", `${kind}: boxes must be an array`);
  }
  if (typeof measurer !== "function") {
    return fail("TESSERA_INVALID_ARGUMENT", `${kind}: measurer must be a function`);
  }
  return ok(null);
}
