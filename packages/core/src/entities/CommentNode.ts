import type { Element } from 'xml-js';
import { CommentValidationError, DeserializationError, type DocumentFormat } from '../errors/tree.js';
import {
  type CommentNodeData,
  commentNodeDataSchema,
  firstIssuePath,
  formatIssues,
} from '../schemas/comment.js';
import { XML_NAMES } from './CommentTreeConstants.js';

const INTEGER_PATTERN = /^-?\d+$/;

/**
 * Options for rebuilding a node from an already validated structure
 */
export interface FromDataOptions {
  /** Format reported in errors */
  format?: DocumentFormat;
  /** Dotted path of this node inside the enclosing document */
  path?: string;
}

/**
 * A single comment plus ownership of its direct replies.
 *
 * The node knows how to convert itself and its subtree to and from the JSON
 * wire shape and an xml-js element. Linking into a tree (uniqueness of ids,
 * parent existence) is the job of CommentTree.
 */
export class CommentNode {
  readonly id: number;
  text: string;
  author: string;
  readonly parentId: number | null;
  private readonly _children: CommentNode[] = [];

  constructor(id: number, text: string, author: string, parentId: number | null = null) {
    this.id = id;
    this.text = text;
    this.author = author;
    this.parentId = parentId;
  }

  /**
   * Direct replies in insertion order. Read-only; replies are linked through
   * CommentTree, or by fromData/fromXmlElement when a subtree is rebuilt.
   */
  get children(): readonly CommentNode[] {
    return this._children;
  }

  /**
   * Appends a reply. The reply must already name this node as its parent.
   *
   * @internal
   * @throws {CommentValidationError} when `child.parentId` is not this node's id
   */
  attachChild(child: CommentNode): void {
    if (child.parentId !== this.id) {
      throw new CommentValidationError(
        `Comment ${child.id} cannot be attached under ${this.id}`,
        'attachChild',
        [`parentId: expected ${this.id}, received ${String(child.parentId)}`],
        { commentId: child.id, parentId: this.id }
      );
    }
    this._children.push(child);
  }

  /**
   * Unlinks a direct reply; returns false when it is not one
   *
   * @internal
   */
  detachChild(child: CommentNode): boolean {
    const index = this._children.indexOf(child);
    if (index < 0) return false;
    this._children.splice(index, 1);
    return true;
  }

  isRoot(): boolean {
    return this.parentId === null;
  }

  isLeaf(): boolean {
    return this.children.length === 0;
  }

  findChild(id: number): CommentNode | undefined {
    return this.children.find((child) => child.id === id);
  }

  /**
   * Wire representation of this node and its subtree, children in order
   */
  toStructured(): CommentNodeData {
    const root = shallowData(this);
    // explicit stack: reply chains can be deeper than the call stack
    const pending: Array<{ node: CommentNode; data: CommentNodeData }> = [{ node: this, data: root }];

    while (pending.length > 0) {
      const entry = pending.pop();
      if (!entry) break;
      for (const child of entry.node._children) {
        const childData = shallowData(child);
        entry.data.children.push(childData);
        pending.push({ node: child, data: childData });
      }
    }
    return root;
  }

  /**
   * Validates an untrusted structured value and rebuilds the subtree.
   *
   * Each child's parent is taken from where it sits in the structure. An
   * embedded `parent_id` is accepted when it is null, absent or agrees with
   * that position; anything else is rejected.
   *
   * @param parentId - Parent the rebuilt node will hang under, null for a root
   * @throws {DeserializationError} on a missing or mistyped field
   */
  static fromStructured(value: unknown, parentId: number | null = null): CommentNode {
    const result = commentNodeDataSchema.safeParse(value);
    if (!result.success) {
      throw new DeserializationError(
        'structured',
        firstIssuePath(result.error, 'comment'),
        formatIssues(result.error).join('; ')
      );
    }
    return CommentNode.fromData(result.data, parentId, { format: 'structured' });
  }

  /**
   * Rebuilds a subtree from data that already passed schema validation
   */
  static fromData(
    data: CommentNodeData,
    parentId: number | null = null,
    options: FromDataOptions = {}
  ): CommentNode {
    const format = options.format ?? 'structured';
    const path = options.path ?? 'comment';

    if (data.parent_id !== null && data.parent_id !== parentId) {
      throw new DeserializationError(
        format,
        `${path}.parent_id`,
        `comment ${data.id} claims parent ${data.parent_id} but is nested under ${parentId ?? 'the document root'}`
      );
    }

    const node = new CommentNode(data.id, data.text, data.author, parentId);
    data.children.forEach((childData, index) => {
      node.attachChild(
        CommentNode.fromData(childData, node.id, { format, path: `${path}.children.${index}` })
      );
    });
    return node;
  }

  /**
   * `<comment id=".." parent_id="..">` with `<text>`, `<author>` and a
   * `<children>` container. `parent_id` is left out for roots.
   */
  toXmlElement(): Element {
    const attributes: Record<string, number> = { [XML_NAMES.ID_ATTRIBUTE]: this.id };
    if (this.parentId !== null) {
      attributes[XML_NAMES.PARENT_ID_ATTRIBUTE] = this.parentId;
    }

    return {
      type: 'element',
      name: XML_NAMES.COMMENT,
      attributes,
      elements: [
        textElement(XML_NAMES.TEXT, this.text),
        textElement(XML_NAMES.AUTHOR, this.author),
        {
          type: 'element',
          name: XML_NAMES.CHILDREN,
          elements: this.children.map((child) => child.toXmlElement()),
        },
      ],
    };
  }

  /**
   * Inverse of toXmlElement. A missing `<children>` container means the
   * comment has no replies; `parent_id` is checked the same way as in
   * fromStructured.
   *
   * @param path - Location of the element, used in error messages
   * @throws {DeserializationError} naming the missing or malformed field
   */
  static fromXmlElement(
    element: Element,
    parentId: number | null = null,
    path: string = XML_NAMES.COMMENT
  ): CommentNode {
    if (element.type !== 'element' || element.name !== XML_NAMES.COMMENT) {
      throw new DeserializationError(
        'xml',
        path,
        `expected <${XML_NAMES.COMMENT}>, found ${describeXmlNode(element)}`
      );
    }

    const rawId = element.attributes?.[XML_NAMES.ID_ATTRIBUTE];
    if (rawId === undefined) {
      throw new DeserializationError('xml', `${path}/@${XML_NAMES.ID_ATTRIBUTE}`, 'attribute is missing');
    }
    const id = parseInteger(rawId, `${path}/@${XML_NAMES.ID_ATTRIBUTE}`);

    const rawParentId = element.attributes?.[XML_NAMES.PARENT_ID_ATTRIBUTE];
    if (rawParentId !== undefined && rawParentId !== '') {
      const declaredParentId = parseInteger(rawParentId, `${path}/@${XML_NAMES.PARENT_ID_ATTRIBUTE}`);
      if (declaredParentId !== parentId) {
        throw new DeserializationError(
          'xml',
          `${path}/@${XML_NAMES.PARENT_ID_ATTRIBUTE}`,
          `comment ${id} claims parent ${declaredParentId} but is nested under ${parentId ?? 'the document root'}`
        );
      }
    }

    const text = readTextField(element, XML_NAMES.TEXT, path);
    const author = readTextField(element, XML_NAMES.AUTHOR, path);
    const node = new CommentNode(id, text, author, parentId);

    const container = findXmlChild(element, XML_NAMES.CHILDREN);
    if (container) {
      childXmlElements(container).forEach((childElement, index) => {
        node.attachChild(
          CommentNode.fromXmlElement(
            childElement,
            id,
            `${path}/${XML_NAMES.CHILDREN}/${XML_NAMES.COMMENT}[${index + 1}]`
          )
        );
      });
    }

    return node;
  }
}

function shallowData(node: CommentNode): CommentNodeData {
  return { id: node.id, text: node.text, author: node.author, parent_id: node.parentId, children: [] };
}

// ===== XML HELPERS =====

function textElement(name: string, value: string): Element {
  if (value === '') {
    return { type: 'element', name };
  }
  return { type: 'element', name, elements: [{ type: 'text', text: value }] };
}

/**
 * Element children of a node, skipping text, comments and instructions
 */
export function childXmlElements(element: Element): Element[] {
  return (element.elements ?? []).filter((child) => child.type === 'element');
}

export function findXmlChild(element: Element, name: string): Element | undefined {
  return childXmlElements(element).find((child) => child.name === name);
}

export function describeXmlNode(element: Element): string {
  return element.type === 'element' ? `<${element.name ?? '?'}>` : `${element.type ?? 'unknown'} node`;
}

function readTextField(element: Element, name: string, path: string): string {
  const field = findXmlChild(element, name);
  if (!field) {
    throw new DeserializationError('xml', `${path}/${name}`, 'element is missing');
  }
  return (field.elements ?? [])
    .map((part) => {
      if (part.type === 'text') return String(part.text ?? '');
      if (part.type === 'cdata') return part.cdata ?? '';
      return '';
    })
    .join('');
}

function parseInteger(raw: string | number, field: string): number {
  const value = typeof raw === 'number' ? raw : INTEGER_PATTERN.test(raw.trim()) ? Number(raw) : Number.NaN;
  if (!Number.isSafeInteger(value)) {
    throw new DeserializationError('xml', field, `"${raw}" is not an integer`);
  }
  return value;
}
