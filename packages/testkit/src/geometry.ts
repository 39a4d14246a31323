import { strict as assert } from "node:assert";

/** Absolute tolerance for float geometry comparisons. */
export const DEFAULT_TOLERANCE = 1e-9;

type RectLike = Readonly<{
  origin: Readonly<{ x: number; y: number }>;
  size: Readonly<{ width: number; height: number }>;
}>;

export function assertClose(
  actual: number,
  expected: number,
  message?: string,
  tolerance: number = DEFAULT_TOLERANCE,
): void {
  if (Math.abs(actual - expected) <= tolerance) return;
  assert.fail(
    `${message ? `${message}: ` : ""}expected ${String(actual)} to be within ${String(tolerance)} of ${String(expected)}`,
  );
}

export function assertRectClose(
  actual: RectLike,
  expected: RectLike,
  message?: string,
  tolerance: number = DEFAULT_TOLERANCE,
): void {
  const prefix = message ? `${message} ` : "";
  assertClose(actual.origin.x, expected.origin.x, `${prefix}x`, tolerance);
  assertClose(actual.origin.y, expected.origin.y, `${prefix}y`, tolerance);
  assertClose(actual.size.width, expected.size.width, `${prefix}width`, tolerance);
  assertClose(actual.size.height, expected.size.height, `${prefix}height`, tolerance);
}
