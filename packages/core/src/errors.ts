/**
 * Error types for Droidlet.
 * @see docs/guide/lifecycle.md
 */

// =============================================================================
// DroidletErrorCode Union
// =============================================================================

/**
 * Deterministic error codes for all core violations.
 * These are surfaced as DroidletError instances.
 */
export type DroidletErrorCode = "DL_INVALID_STATE" | "DL_ACTIVITY_NOT_FOUND" | "DL_INVALID_PROPS";

export type DroidletErrorDetails = Readonly<Record<string, unknown>>;

// =============================================================================
// DroidletError Class
// =============================================================================

/**
 * Error class for all deterministic core violations.
 * The `code` property identifies the specific violation; `details` carries
 * structured diagnostics (e.g. the registered activity names).
 */
export class DroidletError extends Error {
  override readonly name = "DroidletError";
  readonly code: DroidletErrorCode;
  readonly details: DroidletErrorDetails;

  constructor(code: DroidletErrorCode, message?: string, details?: DroidletErrorDetails) {
    super(message ?? code);
    this.code = code;
    this.details = Object.freeze({ ...(details ?? {}) });

    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, DroidletError);
    }
  }
}

export function isDroidletError(value: unknown, code?: DroidletErrorCode): value is DroidletError {
  if (!(value instanceof DroidletError)) return false;
  return code === undefined || value.code === code;
}

export function invalidProps(detail: string): never {
  throw new DroidletError("DL_INVALID_PROPS", detail);
}
