/**
 * packages/core/src/errors.ts — Deterministic error surface.
 *
 * Layout itself never throws: degenerate input yields zero sizes and no
 * placements. Errors are reserved for configuration that cannot be
 * interpreted at all (wrong type, non-integer caps, unknown policy).
 */

export type UniformGridErrorCode = "UGRID_INVALID_PROPS";

/**
 * Error class for configuration violations.
 * The `code` property identifies the specific violation.
 */
export class UniformGridError extends Error {
  override readonly name = "UniformGridError";
  readonly code: UniformGridErrorCode;

  constructor(code: UniformGridErrorCode, message?: string) {
    super(message ?? code);
    this.code = code;

    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, UniformGridError);
    }
  }
}
