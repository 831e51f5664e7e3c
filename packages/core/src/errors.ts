/**
 * Completers — Error utilities
 *
 * Nearly every failure inside the engine is absorbed where it happens
 * (a failing source yields zero candidates, a closed channel ends a worker).
 * What remains are argument and configuration mistakes, which surface as
 * a CompletersError carrying a machine-readable code.
 */

export type ErrorCode =
  | "INVALID_ARGUMENT"   // bad CLI argument or API misuse
  | "INVALID_CONFIG"     // config value out of range
  | "SOURCE_FAILED"      // a completion source could not produce candidates
  | "NOT_A_TTY"          // interactive session without a terminal
  | "INTERNAL_ERROR";    // unexpected failure

export class CompletersError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string) {
    super(message);
    this.name = "CompletersError";
    this.code = code;
  }
}

/**
 * Create an error with the given code.
 */
export function createError(code: ErrorCode, message: string): CompletersError {
  return new CompletersError(code, message);
}

/**
 * Type guard: is this a CompletersError?
 */
export function isCompletersError(err: unknown): err is CompletersError {
  return err instanceof CompletersError;
}

/**
 * Render any thrown value as a single log-friendly line.
 */
export function describeError(err: unknown): string {
  if (err instanceof CompletersError) return `[${err.code}] ${err.message}`;
  if (err instanceof Error) return err.message;
  return String(err);
}
