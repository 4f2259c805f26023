/**
 * Threadtree Core - hierarchical comment discussions
 *
 * Build a tree of comments, walk it depth- or breadth-first, and move it to
 * and from JSON and XML documents.
 */

// Tree and nodes
export {
  CommentTree,
  type CommentTreeOptions,
  type CommentVisitor,
  type LineWriter,
} from './entities/CommentTree.js';
export { CommentNode, type FromDataOptions } from './entities/CommentNode.js';
export { XML_NAMES, JSON_KEYS, RENDER_SYMBOLS } from './entities/CommentTreeConstants.js';

// Rendering
export {
  describeComment,
  formatCommentLine,
  renderCommentNode,
  renderCommentTree,
} from './entities/tree-rendering.js';

// Schemas
export {
  commentNodeDataSchema,
  commentDocumentSchema,
  commentPatchSchema,
  createCommentSchema,
  type CommentNodeData,
  type CommentDocument,
  type CommentPatch,
  type CreateComment,
} from './schemas/index.js';

// Errors
export * from './errors/index.js';

// File sink/source
export { readTextFile, writeTextFile } from './utils/file-sink.js';

// Configuration and logging
export { cfg, configSchema, type AppConfig } from './utils/config.js';
export {
  logger,
  createModuleLogger,
  createLoggerFactory,
  LoggerFactory,
  logError,
} from './utils/logger.js';
