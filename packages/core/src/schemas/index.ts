export {
  commentId,
  commentText,
  commentAuthor,
  commentNodeDataSchema,
  commentDocumentSchema,
  createCommentSchema,
  commentPatchSchema,
  formatIssues,
  firstIssuePath,
  type CommentNodeData,
  type CommentDocument,
  type CreateComment,
  type CommentPatch,
} from './comment.js';
