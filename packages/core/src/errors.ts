/**
 * Error types for panelkit.
 *
 * Every failure the runtime reports is a programming error in the host or an
 * unusable pixel buffer; none of them is retryable.
 */

/**
 * Deterministic error codes for all runtime violations.
 * These are surfaced as PanelError instances.
 */
export type PanelErrorCode =
  | "PANEL_INVALID_ARGUMENT"
  | "PANEL_INVALID_STATE"
  | "PANEL_RESOURCE_ERROR"
  | "PANEL_UNSUPPORTED";

/**
 * Error class for all deterministic runtime violations.
 * The `code` property identifies the specific violation.
 */
export class PanelError extends Error {
  override readonly name = "PanelError";
  readonly code: PanelErrorCode;

  constructor(code: PanelErrorCode, message?: string) {
    super(message ?? code);
    this.code = code;

    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, PanelError);
    }
  }
}

export function invalidArgument(detail: string): never {
  throw new PanelError("PANEL_INVALID_ARGUMENT", detail);
}

export function invalidState(detail: string): never {
  throw new PanelError("PANEL_INVALID_STATE", detail);
}
