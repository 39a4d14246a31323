/**
 * packages/core/src/errors.ts — Error codes and result values.
 *
 * Engine operations never throw: they return an `EngineResult` whose failure
 * branch carries a deterministic code and a human-readable detail. Hosts that
 * prefer exceptions go through `unwrap`, which raises a `TesseraError`.
 */

/**
 * Deterministic error codes.
 *
 *   - TESSERA_INVALID_CONFIG: engine config violates a precondition
 *   - TESSERA_INVALID_ARGUMENT: boxes, measurer or subviews are malformed
 */
export type TesseraErrorCode = "TESSERA_INVALID_CONFIG" | "TESSERA_INVALID_ARGUMENT";

export type EngineFatal = Readonly<{ code: TesseraErrorCode; detail: string }>;

/** Success with value, or failure with a fatal error and no side effects performed. */
export type EngineResult<T> =
  | Readonly<{ ok: true; value: T }>
  | Readonly<{ ok: false; fatal: EngineFatal }>;

export class TesseraError extends Error {
  override readonly name = "TesseraError";
  readonly code: TesseraErrorCode;

  constructor(code: TesseraErrorCode, message?: string) {
    super(message ?? code);
    this.code = code;

    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, TesseraError);
    }
  }
}

export function ok<T>(value: T): EngineResult<T> {
  return { ok: true, value };
}

export function fail(code: TesseraErrorCode, detail: string): EngineResult<never> {
  return { ok: false, fatal: { code, detail } };
}

/** Return the value of a successful result, or throw its fatal as a `TesseraError`. */
export function unwrap<T>(result: EngineResult<T>): T {
  if (!result.ok) {
    throw new TesseraError(result.fatal.code, `${result.fatal.code}: ${result.fatal.detail}`);
  }
  return result.value;
}
