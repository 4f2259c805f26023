/**
 * Base error classes for Threadtree
 *
 * Every error raised by the library carries the module it came from, the
 * operation that was running and a free-form context bag, so callers can
 * log or serialize failures uniformly.
 */

/**
 * Base error class for all Threadtree errors
 */
export abstract class ThreadtreeError extends Error {
  /**
   * Module where the error originated
   */
  public readonly module: string;

  /**
   * Operation being performed when error occurred
   */
  public readonly operation?: string | undefined;

  /**
   * Additional context information
   */
  public readonly context?: Record<string, unknown> | undefined;

  public readonly timestamp: Date;

  constructor(
    message: string,
    module: string,
    operation?: string,
    context?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = this.constructor.name;
    this.module = module;
    this.operation = operation;
    this.context = context;
    this.timestamp = new Date();

    // Ensure proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Create a copy of this error with extra context merged in
   */
  withContext(additionalContext: Record<string, unknown>): ThreadtreeError {
    return new ContextualError(
      this.message,
      this.module,
      this.operation,
      { ...this.context, ...additionalContext },
      { cause: this }
    );
  }

  /**
   * Convert error to a structured object for logging/serialization
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      module: this.module,
      operation: this.operation,
      context: this.context,
      timestamp: this.timestamp,
      stack: this.stack,
    };
  }
}

/**
 * Generic error for wrapping unknown errors
 */
class GenericError extends ThreadtreeError {}

/**
 * Error produced by `withContext`, keeps the original as its cause
 */
class ContextualError extends ThreadtreeError {}

/**
 * Helper function to wrap unknown errors with module context
 */
export function wrapError(
  error: unknown,
  module: string,
  operation: string,
  context?: Record<string, unknown>
): ThreadtreeError {
  if (error instanceof ThreadtreeError) {
    return context ? error.withContext(context) : error;
  }

  const message = error instanceof Error ? error.message : String(error);

  return new GenericError(message, module, operation, context, { cause: error });
}

/**
 * Type guard to check if an error is a ThreadtreeError
 */
export function isThreadtreeError(error: unknown): error is ThreadtreeError {
  return error instanceof ThreadtreeError;
}

/**
 * Extract error details for logging
 */
export function extractErrorDetails(error: unknown): {
  message: string;
  module?: string | undefined;
  operation?: string | undefined;
  context?: Record<string, unknown> | undefined;
  stack?: string | undefined;
} {
  if (error instanceof ThreadtreeError) {
    return {
      message: error.message,
      module: error.module,
      operation: error.operation,
      context: error.context,
      stack: error.stack,
    };
  }

  if (error instanceof Error) {
    return {
      message: error.message,
      stack: error.stack,
    };
  }

  return {
    message: String(error),
  };
}
