/**
 * Error codes and error type for barkit.
 */

export type BarkitErrorCode = "BARKIT_INVALID_PROPS" | "BARKIT_INVALID_MARGIN";

/**
 * Error class for configuration mistakes caught at registration time.
 * The `code` property identifies the specific violation.
 */
export class BarkitError extends Error {
  override readonly name = "BarkitError";
  readonly code: BarkitErrorCode;

  constructor(code: BarkitErrorCode, message?: string) {
    super(message ?? code);
    this.code = code;

    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, BarkitError);
    }
  }
}
