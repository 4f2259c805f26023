/**
 * Comment tree error classes
 *
 * Errors raised by CommentTree mutations, lookups and (de)serialization.
 */

import { ThreadtreeError } from './base.js';

/**
 * Base class for errors raised by tree operations
 */
export abstract class CommentTreeOperationError extends ThreadtreeError {
  constructor(
    message: string,
    area: string,
    operation?: string,
    context?: Record<string, unknown>
  ) {
    super(message, `tree.${area}`, operation, context);
  }
}

/**
 * Error thrown when a comment is added with an id the tree already holds
 */
export class DuplicateIdError extends CommentTreeOperationError {
  constructor(
    public readonly commentId: number,
    context?: Record<string, unknown>
  ) {
    super(`Comment ${commentId} already exists`, 'mutation', 'addComment', {
      ...context,
      commentId,
    });
  }
}

/**
 * Error thrown when a comment references a parent that is not in the tree
 */
export class ParentNotFoundError extends CommentTreeOperationError {
  constructor(
    public readonly parentId: number,
    public readonly commentId: number,
    context?: Record<string, unknown>
  ) {
    super(`Parent comment ${parentId} not found`, 'mutation', 'addComment', {
      ...context,
      parentId,
      commentId,
    });
  }
}

/**
 * Error thrown when an operation targets a comment id that is not in the tree
 */
export class CommentNotFoundError extends CommentTreeOperationError {
  constructor(
    public readonly commentId: number,
    operation?: string,
    context?: Record<string, unknown>
  ) {
    super(`Comment ${commentId} not found`, 'lookup', operation, { ...context, commentId });
  }
}

/**
 * Error thrown when arguments to a mutation fail validation
 */
export class CommentValidationError extends CommentTreeOperationError {
  constructor(
    message: string,
    operation: string,
    public readonly issues: string[],
    context?: Record<string, unknown>
  ) {
    super(message, 'validation', operation, { ...context, issues });
  }
}

export type DocumentFormat = 'json' | 'xml' | 'structured';

/**
 * Error thrown when a JSON or XML document, or a structured value, cannot be
 * turned back into comments. `field` names the offending field or path.
 */
export class DeserializationError extends ThreadtreeError {
  constructor(
    public readonly format: DocumentFormat,
    public readonly field: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(
      `Invalid ${format} comment document at "${field}": ${message}`,
      `serialization.${format}`,
      'deserialize',
      { field },
      options
    );
  }
}

/**
 * Error thrown when the file sink or source fails (permissions, missing file)
 */
export class CommentStorageError extends ThreadtreeError {
  constructor(
    public readonly filename: string,
    operation: 'read' | 'write',
    cause: unknown
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(
      `Failed to ${operation} ${filename}: ${reason}`,
      'storage.file',
      operation,
      { filename },
      { cause }
    );
  }
}
