/**
 * Centralized error handling for Threadtree
 */

// Base error classes and utilities
export {
  ThreadtreeError,
  wrapError,
  isThreadtreeError,
  extractErrorDetails,
} from './base.js';

// Tree errors
export {
  CommentTreeOperationError,
  DuplicateIdError,
  ParentNotFoundError,
  CommentNotFoundError,
  CommentValidationError,
  DeserializationError,
  CommentStorageError,
  type DocumentFormat,
} from './tree.js';
