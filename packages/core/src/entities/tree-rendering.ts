/**
 * Plain-text rendering of comments
 *
 * Pure functions: they take nodes and return lines, the caller decides where
 * the lines go.
 */

import type { CommentNode } from './CommentNode.js';
import { RENDER_SYMBOLS } from './CommentTreeConstants.js';

export function describeComment(node: CommentNode): string {
  return `${node.text} (by ${node.author})`;
}

/**
 * One traversal line: `depth * indent` spaces, a dash, text and author
 */
export function formatCommentLine(node: CommentNode, depth: number, indent: number): string {
  return `${' '.repeat(depth * indent)}${RENDER_SYMBOLS.MARKER} ${describeComment(node)}`;
}

/**
 * Draws a comment and its replies with box connectors.
 *
 * @param guide - Prefix placed before this node's children connectors
 */
export function renderCommentNode(node: CommentNode, guide: string = RENDER_SYMBOLS.BRANCH_INDENT): string[] {
  const lines: string[] = [];

  node.children.forEach((child, index) => {
    const isLast = index === node.children.length - 1;
    const connector = isLast ? RENDER_SYMBOLS.LAST_BRANCH : RENDER_SYMBOLS.BRANCH;
    lines.push(`${guide}${connector}${describeComment(child)}`);
    const childGuide = guide + (isLast ? RENDER_SYMBOLS.BRANCH_INDENT : RENDER_SYMBOLS.CONTINUATION);
    lines.push(...renderCommentNode(child, childGuide));
  });

  return lines;
}

/**
 * Every root followed by its drawn subtree, roots in the given order
 */
export function renderCommentTree(roots: readonly CommentNode[]): string[] {
  return roots.flatMap((root) => [describeComment(root), ...renderCommentNode(root)]);
}
