import { z } from 'zod';

// Comment ids are caller-assigned integers
export const commentId = z
  .number({ invalid_type_error: 'Comment id must be a number' })
  .int('Comment id must be an integer')
  .refine(Number.isSafeInteger, 'Comment id is out of range');

export const commentText = z.string({ invalid_type_error: 'Comment text must be a string' });
export const commentAuthor = z.string({ invalid_type_error: 'Comment author must be a string' });

/**
 * Wire shape of a comment and its subtree, as written to JSON documents.
 * Field names follow the document format (`parent_id`), not the class.
 */
export type CommentNodeData = {
  id: number;
  text: string;
  author: string;
  parent_id: number | null;
  children: CommentNodeData[];
};

// Input side of the schema: `parent_id` and `children` may be left out
type CommentNodeDataInput = {
  id: number;
  text: string;
  author: string;
  parent_id?: number | null | undefined;
  children?: CommentNodeDataInput[] | undefined;
};

/*
 * Recursive comment schema, validates a whole subtree in one pass
 */
export const commentNodeDataSchema: z.ZodType<CommentNodeData, z.ZodTypeDef, CommentNodeDataInput> =
  z.lazy(() =>
    z.object({
      id: commentId,
      text: commentText,
      author: commentAuthor,
      parent_id: commentId.nullable().default(null),
      children: z.array(commentNodeDataSchema).default([]),
    })
  );

export const commentDocumentSchema = z.object({
  comments: z.array(commentNodeDataSchema),
});

export type CommentDocument = z.infer<typeof commentDocumentSchema>;

// Arguments of addComment
export const createCommentSchema = z.object({
  id: commentId,
  text: commentText,
  author: commentAuthor,
  parentId: commentId.nullable(),
});

export type CreateComment = z.infer<typeof createCommentSchema>;

// Partial update: a slot left out keeps the current value
export const commentPatchSchema = z
  .object({
    text: commentText.optional(),
    author: commentAuthor.optional(),
  })
  .strict();

export type CommentPatch = z.infer<typeof commentPatchSchema>;

/**
 * Render zod issues as `path: message` strings, the path joined with dots
 */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
  );
}

/**
 * Dotted path of the first failing field, or `fallback` for top-level issues
 */
export function firstIssuePath(error: z.ZodError, fallback: string): string {
  const [issue] = error.issues;
  if (!issue || issue.path.length === 0) return fallback;
  return issue.path.join('.');
}
