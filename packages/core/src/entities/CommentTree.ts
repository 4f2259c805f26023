import type { Logger } from 'pino';
import { type Element, js2xml, xml2js } from 'xml-js';
import {
  CommentNotFoundError,
  CommentValidationError,
  DeserializationError,
  DuplicateIdError,
  ParentNotFoundError,
} from '../errors/tree.js';
import {
  type CommentPatch,
  commentDocumentSchema,
  commentPatchSchema,
  createCommentSchema,
  firstIssuePath,
  formatIssues,
} from '../schemas/comment.js';
import { cfg } from '../utils/config.js';
import { readTextFile, writeTextFile } from '../utils/file-sink.js';
import { createModuleLogger } from '../utils/logger.js';
import { CommentNode, childXmlElements, describeXmlNode } from './CommentNode.js';
import { JSON_KEYS, XML_NAMES } from './CommentTreeConstants.js';
import { formatCommentLine, renderCommentTree } from './tree-rendering.js';

/**
 * Called once per visited node. `depth` counts levels below the node the
 * walk started from (0 for the start node, or for each root).
 */
export type CommentVisitor = (node: CommentNode, depth: number) => void;

/**
 * Receives rendered lines from the print helpers
 */
export type LineWriter = (line: string) => void;

export interface CommentTreeOptions {
  /** Spaces used to indent JSON output */
  jsonIndent?: number;
  /** Spaces used to indent XML output */
  xmlIndent?: number;
  /** Spaces per depth level in printed traversals */
  printIndent?: number;
  logger?: Logger;
}

const writeToStdout: LineWriter = (line) => {
  process.stdout.write(`${line}\n`);
};

/**
 * Mutable tree of comments keyed by id.
 *
 * The `nodes` map is the single source of truth; roots are the nodes without
 * a parent, in insertion order. Every mutation checks all of its
 * preconditions before touching the map, so a rejected call leaves the tree
 * as it was. Not safe for concurrent mutation during a traversal.
 */
export class CommentTree {
  private _nodes = new Map<number, CommentNode>();
  private readonly jsonIndent: number;
  private readonly xmlIndent: number;
  private readonly printIndent: number;
  private readonly logger: Logger;

  constructor(options: CommentTreeOptions = {}) {
    this.jsonIndent = options.jsonIndent ?? cfg.JSON_INDENT;
    this.xmlIndent = options.xmlIndent ?? cfg.XML_INDENT;
    this.printIndent = options.printIndent ?? cfg.PRINT_INDENT;
    this.logger = options.logger ?? createModuleLogger('CommentTree');
  }

  // ===== LOOKUP =====

  get nodes(): ReadonlyMap<number, CommentNode> {
    return this._nodes;
  }

  get size(): number {
    return this._nodes.size;
  }

  hasComment(id: number): boolean {
    return this._nodes.has(id);
  }

  getComment(id: number): CommentNode | undefined {
    return this._nodes.get(id);
  }

  /**
   * @throws {CommentNotFoundError} when the id is not in the tree
   */
  requireComment(id: number, operation = 'requireComment'): CommentNode {
    const node = this._nodes.get(id);
    if (!node) {
      throw new CommentNotFoundError(id, operation);
    }
    return node;
  }

  getRoots(): CommentNode[] {
    return [...this._nodes.values()].filter((node) => node.parentId === null);
  }

  /**
   * Number of parent links between the comment and its root
   */
  getDepth(id: number): number {
    return this.getPath(id).length - 1;
  }

  /**
   * Comments from the root down to `id`, inclusive
   */
  getPath(id: number): CommentNode[] {
    const path: CommentNode[] = [];
    let current: CommentNode | undefined = this.requireComment(id, 'getPath');

    while (current) {
      path.push(current);
      current = current.parentId === null ? undefined : this._nodes.get(current.parentId);
    }

    return path.reverse();
  }

  // ===== MUTATION =====

  /**
   * Creates a comment and links it under its parent, or as a new root.
   *
   * @throws {CommentValidationError} when the arguments are not well-typed
   * @throws {DuplicateIdError} when `id` is already used
   * @throws {ParentNotFoundError} when `parentId` is given but not in the tree
   */
  addComment(id: number, text: string, author: string, parentId: number | null = null): CommentNode {
    const parsed = createCommentSchema.safeParse({ id, text, author, parentId });
    if (!parsed.success) {
      throw new CommentValidationError(
        `Invalid comment ${String(id)}`,
        'addComment',
        formatIssues(parsed.error)
      );
    }

    if (this._nodes.has(id)) {
      throw new DuplicateIdError(id);
    }

    const parent = parentId === null ? undefined : this._nodes.get(parentId);
    if (parentId !== null && !parent) {
      throw new ParentNotFoundError(parentId, id);
    }

    const node = new CommentNode(id, text, author, parentId);
    this._nodes.set(id, node);
    parent?.attachChild(node);

    this.logger.debug({ commentId: id, parentId }, 'Comment added');
    return node;
  }

  /**
   * Overwrites only the fields present in `patch`. An empty string is a value
   * and replaces the current one.
   *
   * @throws {CommentNotFoundError} when the id is not in the tree
   * @throws {CommentValidationError} when the patch has unknown or mistyped slots
   */
  updateComment(id: number, patch: CommentPatch): CommentNode {
    const node = this.requireComment(id, 'updateComment');

    const parsed = commentPatchSchema.safeParse(patch);
    if (!parsed.success) {
      throw new CommentValidationError(
        `Invalid update for comment ${id}`,
        'updateComment',
        formatIssues(parsed.error),
        { commentId: id }
      );
    }

    const { text, author } = parsed.data;
    if (text !== undefined) node.text = text;
    if (author !== undefined) node.author = author;

    this.logger.debug({ commentId: id, fields: Object.keys(parsed.data) }, 'Comment updated');
    return node;
  }

  /**
   * Removes the comment and its whole subtree. Replies are deleted with their
   * parent, never re-attached elsewhere.
   *
   * @returns Ids that were removed, in pre-order
   * @throws {CommentNotFoundError} when the id is not in the tree
   */
  deleteComment(id: number): number[] {
    const node = this.requireComment(id, 'deleteComment');

    const removed: number[] = [];
    walkDepthFirst(node, (visited) => {
      removed.push(visited.id);
    });

    if (node.parentId !== null) {
      this._nodes.get(node.parentId)?.detachChild(node);
    }
    for (const removedId of removed) {
      this._nodes.delete(removedId);
    }

    this.logger.debug({ commentId: id, removed: removed.length }, 'Comment subtree deleted');
    return removed;
  }

  clear(): void {
    this._nodes = new Map();
  }

  // ===== TRAVERSAL =====

  /**
   * Pre-order walk: a comment before its replies, replies left to right.
   * Without `startId` every root is walked in insertion order.
   *
   * @throws {CommentNotFoundError} when `startId` is given but not in the tree
   */
  traverseDepthFirst(visitor: CommentVisitor, startId?: number): void {
    for (const start of this.resolveStart(startId, 'traverseDepthFirst')) {
      walkDepthFirst(start, visitor);
    }
  }

  /**
   * Level-order walk with a FIFO queue seeded with the start comment, or with
   * every root in insertion order.
   *
   * @throws {CommentNotFoundError} when `startId` is given but not in the tree
   */
  traverseBreadthFirst(visitor: CommentVisitor, startId?: number): void {
    const queue: Array<{ node: CommentNode; depth: number }> = this.resolveStart(
      startId,
      'traverseBreadthFirst'
    ).map((node) => ({ node, depth: 0 }));

    let head = 0;
    while (head < queue.length) {
      const entry = queue[head++];
      if (!entry) break;
      visitor(entry.node, entry.depth);
      for (const child of entry.node.children) {
        queue.push({ node: child, depth: entry.depth + 1 });
      }
    }
  }

  private resolveStart(startId: number | undefined, operation: string): CommentNode[] {
    return startId === undefined ? this.getRoots() : [this.requireComment(startId, operation)];
  }

  // ===== PRINTING =====

  /**
   * Depth-first lines, each indented by the comment's depth below its root
   */
  formatDepthFirst(startId?: number): string[] {
    const baseDepth = this.startDepth(startId, 'formatDepthFirst');
    const lines: string[] = [];
    this.traverseDepthFirst((node, depth) => {
      lines.push(formatCommentLine(node, baseDepth + depth, this.printIndent));
    }, startId);
    return lines;
  }

  /**
   * Breadth-first lines, each indented by the comment's depth below its root
   */
  formatBreadthFirst(startId?: number): string[] {
    const baseDepth = this.startDepth(startId, 'formatBreadthFirst');
    const lines: string[] = [];
    this.traverseBreadthFirst((node, depth) => {
      lines.push(formatCommentLine(node, baseDepth + depth, this.printIndent));
    }, startId);
    return lines;
  }

  /**
   * Absolute depth of the walk's start; roots sit at 0
   */
  private startDepth(startId: number | undefined, operation: string): number {
    if (startId === undefined) return 0;
    this.requireComment(startId, operation);
    return this.getDepth(startId);
  }

  printDepthFirst(startId?: number, write: LineWriter = writeToStdout): string[] {
    const lines = this.formatDepthFirst(startId);
    lines.forEach((line) => write(line));
    return lines;
  }

  printBreadthFirst(startId?: number, write: LineWriter = writeToStdout): string[] {
    const lines = this.formatBreadthFirst(startId);
    lines.forEach((line) => write(line));
    return lines;
  }

  /**
   * Every root with its replies drawn using box connectors
   */
  render(): string[] {
    return renderCommentTree(this.getRoots());
  }

  // ===== JSON =====

  /**
   * Serializes every root, in insertion order, as `{"comments": [...]}`.
   * When `filename` is given the text is also written there.
   */
  toJson(filename?: string): string {
    const document = { [JSON_KEYS.DOCUMENT]: this.getRoots().map((root) => root.toStructured()) };
    const text = JSON.stringify(document, null, this.jsonIndent);
    if (filename !== undefined) {
      writeTextFile(filename, text);
    }
    return text;
  }

  /**
   * Replaces the whole tree with the comments of a JSON document. Nothing
   * changes unless the entire document is valid.
   *
   * @throws {DeserializationError} on malformed JSON, a schema mismatch or a repeated id
   */
  fromJson(data: string): this {
    let parsed: unknown;
    try {
      parsed = JSON.parse(data);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new DeserializationError('json', JSON_KEYS.DOCUMENT, `not valid JSON (${reason})`, {
        cause: error,
      });
    }

    const result = commentDocumentSchema.safeParse(parsed);
    if (!result.success) {
      throw new DeserializationError(
        'json',
        firstIssuePath(result.error, JSON_KEYS.DOCUMENT),
        formatIssues(result.error).join('; ')
      );
    }

    const roots = result.data.comments.map((rootData, index) =>
      CommentNode.fromData(rootData, null, { format: 'json', path: `${JSON_KEYS.DOCUMENT}.${index}` })
    );
    this.replaceWith(roots, 'json');
    return this;
  }

  // ===== XML =====

  /**
   * Serializes every root, in insertion order, under a `<comments>` element.
   * When `filename` is given the text is also written there.
   */
  toXml(filename?: string): string {
    const document: Element = {
      declaration: { attributes: { version: '1.0', encoding: 'utf-8' } },
      elements: [
        {
          type: 'element',
          name: XML_NAMES.DOCUMENT,
          elements: this.getRoots().map((root) => root.toXmlElement()),
        },
      ],
    };
    const text = js2xml(document, { spaces: this.xmlIndent });
    if (filename !== undefined) {
      writeTextFile(filename, text);
    }
    return text;
  }

  /**
   * Replaces the whole tree with the comments of an XML document. Nothing
   * changes unless the entire document is valid.
   *
   * @throws {DeserializationError} on malformed XML, unexpected elements or a repeated id
   */
  fromXml(xmlText: string): this {
    let parsed: unknown;
    try {
      // whitespace-only text and author values are text nodes too
      parsed = xml2js(xmlText, { compact: false, captureSpacesBetweenElements: true });
    } catch (error) {
      const reason = error instanceof Error ? error.message.split('\n')[0] : String(error);
      throw new DeserializationError('xml', XML_NAMES.DOCUMENT, `not well-formed XML (${reason})`, {
        cause: error,
      });
    }

    const documentRoot = isXmlElement(parsed) ? childXmlElements(parsed)[0] : undefined;
    if (!documentRoot || documentRoot.name !== XML_NAMES.DOCUMENT) {
      throw new DeserializationError(
        'xml',
        XML_NAMES.DOCUMENT,
        documentRoot
          ? `expected root <${XML_NAMES.DOCUMENT}>, found ${describeXmlNode(documentRoot)}`
          : 'document has no root element'
      );
    }

    const roots = childXmlElements(documentRoot).map((element, index) =>
      CommentNode.fromXmlElement(
        element,
        null,
        `${XML_NAMES.DOCUMENT}/${XML_NAMES.COMMENT}[${index + 1}]`
      )
    );
    this.replaceWith(roots, 'xml');
    return this;
  }

  // ===== FILES =====

  static fromJsonFile(filename: string, options?: CommentTreeOptions): CommentTree {
    return new CommentTree(options).fromJson(readTextFile(filename));
  }

  static fromXmlFile(filename: string, options?: CommentTreeOptions): CommentTree {
    return new CommentTree(options).fromXml(readTextFile(filename));
  }

  /**
   * Indexes rebuilt subtrees into a fresh map and swaps it in only once
   * every id has been checked for uniqueness.
   */
  private replaceWith(roots: CommentNode[], format: 'json' | 'xml'): void {
    const next = new Map<number, CommentNode>();

    for (const root of roots) {
      walkDepthFirst(root, (node) => {
        if (next.has(node.id)) {
          throw new DeserializationError(format, 'id', `comment id ${node.id} appears more than once`);
        }
        next.set(node.id, node);
      });
    }

    this._nodes = next;
    this.logger.debug({ format, roots: roots.length, comments: next.size }, 'Comment tree replaced');
  }
}

/**
 * Pre-order walk on an explicit stack, so reply chains deeper than the call
 * stack still work. Children are pushed last-first to keep them in order.
 */
function walkDepthFirst(start: CommentNode, visitor: CommentVisitor): void {
  const stack: Array<{ node: CommentNode; depth: number }> = [{ node: start, depth: 0 }];

  while (stack.length > 0) {
    const entry = stack.pop();
    if (!entry) break;
    visitor(entry.node, entry.depth);

    const { children } = entry.node;
    for (let index = children.length - 1; index >= 0; index--) {
      const child = children[index];
      if (child) stack.push({ node: child, depth: entry.depth + 1 });
    }
  }
}

function isXmlElement(value: unknown): value is Element {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
