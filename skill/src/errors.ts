/**
 * Error types raised inside the tool layer.
 *
 * Everything except {@link UnsupportedOperationError} is caught at the tool
 * boundary and reported as an error {@link ToolResult}; the code travels with
 * the error instead of being guessed afterwards.
 */

/** Codes produced by the tool layer itself. Kit errors may carry their own. */
export type ToolErrorCode =
  | 'INVALID_JSON'
  | 'INVALID_INPUT'
  | 'INVALID_ARGUMENT'
  | 'INVALID_ADDRESS'
  | 'NOT_SUPPORTED'
  | 'UNKNOWN_ERROR';

export const UNKNOWN_ERROR: ToolErrorCode = 'UNKNOWN_ERROR';

/** An error with an explicit, machine-readable code. */
export class ToolError extends Error {
  readonly code: string;

  constructor(message: string, code: ToolErrorCode | (string & {}) = UNKNOWN_ERROR) {
    super(message);
    this.name = 'ToolError';
    this.code = code;
  }
}

/** A payload that does not satisfy a tool's schema. */
export class ValidationError extends ToolError {
  constructor(message: string) {
    super(message, 'INVALID_INPUT');
    this.name = 'ValidationError';
  }
}

/** Raised by the synchronous entry point, which tools do not support. */
export class UnsupportedOperationError extends Error {
  constructor(message = 'This tool only supports async execution. Please use the async interface.') {
    super(message);
    this.name = 'UnsupportedOperationError';
  }
}

export interface Failure {
  message: string;
  code: string;
}

/**
 * Normalise a thrown value into a message and a code.
 *
 * A {@link ToolError} supplies its own code; other errors may carry a string
 * `code` (SDK and Node.js errors do), anything else is `UNKNOWN_ERROR`.
 */
export function toFailure(err: unknown): Failure {
  if (err instanceof ToolError) {
    return { message: err.message, code: err.code };
  }
  const message = err instanceof Error ? err.message : String(err);
  if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string' && err.code) {
    return { message, code: err.code };
  }
  return { message, code: UNKNOWN_ERROR };
}
