/**
 * packages/core/src/abi.ts — Wire limits and error types.
 *
 * Why: Both sides of the widget protocol agree on these constants and on the
 * error codes raised when either side observes a violation.
 */

// =============================================================================
// Wire limits
// =============================================================================

/** Maximum number of bytes a base-128 varint may occupy. */
export const RRUI_MAX_VARINT_BYTES = 10;

/** Largest value a uint32 wire field may carry. */
export const RRUI_UINT32_MAX = 0xffff_ffff;

// =============================================================================
// RerunUiErrorCode Union
// =============================================================================

/**
 * Deterministic error codes for all protocol violations.
 * These are surfaced as RerunUiError instances.
 */
export type RerunUiErrorCode =
  | "RRUI_CONFIGURATION_ERROR"
  | "RRUI_CONTRACT_VIOLATION"
  | "RRUI_NOT_FOUND"
  | "RRUI_DUPLICATE_ID"
  | "RRUI_INVALID_PROPS"
  | "RRUI_INVALID_STATE"
  | "RRUI_PROTOCOL_ERROR";

// =============================================================================
// RerunUiError Class
// =============================================================================

/**
 * Error class for all deterministic protocol violations.
 * The `code` property identifies the specific violation.
 */
export class RerunUiError extends Error {
  override readonly name: string = "RerunUiError";
  readonly code: RerunUiErrorCode;

  constructor(code: RerunUiErrorCode, message?: string) {
    super(message ?? code);
    this.code = code;

    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

/**
 * Invalid widget call made by a script author (bad default, bad mode combination).
 * Aborts that widget for the current run.
 */
export class ConfigurationError extends RerunUiError {
  override readonly name: string = "ConfigurationError";

  constructor(message: string) {
    super("RRUI_CONFIGURATION_ERROR", message);
  }
}

/**
 * A collaborator broke the protocol contract (out-of-range click, corrupted descriptor).
 * Not recoverable for the widget instance involved.
 */
export class ContractViolation extends RerunUiError {
  override readonly name: string = "ContractViolation";

  constructor(message: string) {
    super("RRUI_CONTRACT_VIOLATION", message);
  }
}

/** Registry lookup for a key nobody registered. */
export class NotFoundError extends RerunUiError {
  override readonly name: string = "NotFoundError";
  readonly key: string;

  constructor(key: string, message?: string) {
    super("RRUI_NOT_FOUND", message ?? `not found: ${key}`);
    this.key = key;
  }
}

export function isRerunUiError(error: unknown, code?: RerunUiErrorCode): error is RerunUiError {
  if (!(error instanceof RerunUiError)) return false;
  return code === undefined || error.code === code;
}
