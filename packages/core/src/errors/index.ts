import { IncgraphErrorCode } from './codes.js';

// Re-export for consumers
export { IncgraphErrorCode } from './codes.js';

/**
 * Base error class for all incgraph-specific errors
 */
export class IncgraphError extends Error {
  constructor(
    message: string,
    public readonly code: IncgraphErrorCode,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'IncgraphError';

    // Maintains proper stack trace for where our error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Invalid user configuration (bad root, unsupported format, malformed options).
 */
export class ConfigError extends IncgraphError {
  constructor(
    message: string,
    context?: Record<string, unknown>,
    code: IncgraphErrorCode = IncgraphErrorCode.CONFIG_INVALID
  ) {
    super(message, code, context);
    this.name = 'ConfigError';
  }
}

/**
 * Filesystem failure while walking the tree or reading a file.
 * Always fatal for the run: no partial graph is produced.
 */
export class ScanError extends IncgraphError {
  constructor(
    message: string,
    public readonly path: string,
    code: IncgraphErrorCode = IncgraphErrorCode.SCAN_FAILED,
    context?: Record<string, unknown>
  ) {
    super(message, code, { ...context, path });
    this.name = 'ScanError';
  }
}

/**
 * Failure of the external rendering step.
 */
export class RenderError extends IncgraphError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, IncgraphErrorCode.RENDER_FAILED, context);
    this.name = 'RenderError';
  }
}

/**
 * Turns a failure that is not an IncgraphError into one (INTERNAL_ERROR),
 * keeping the original stack under "Caused by:".
 */
export function wrapError(
  error: unknown,
  context: string,
  additionalContext?: Record<string, unknown>
): IncgraphError {
  const message = getErrorMessage(error);
  const stack = error instanceof Error ? error.stack : undefined;

  const wrappedError = new IncgraphError(
    `${context}: ${message}`,
    IncgraphErrorCode.INTERNAL_ERROR,
    additionalContext
  );

  if (stack) {
    wrappedError.stack = `${wrappedError.stack}\n\nCaused by:\n${stack}`;
  }

  return wrappedError;
}

/**
 * Type guard to check if an error is an IncgraphError
 */
export function isIncgraphError(error: unknown): error is IncgraphError {
  return error instanceof IncgraphError;
}

/**
 * Extract error message from unknown error type
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
