import type { Element } from 'xml-js';
import { describe, expect, it } from 'vitest';
import { CommentNode } from '../src/entities/CommentNode.js';
import { CommentValidationError, DeserializationError } from '../src/errors/tree.js';

function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('expected function to throw');
}

describe('CommentNode', () => {
  const buildThread = (): CommentNode => {
    const root = new CommentNode(1, 'first', 'Alice');
    const reply = new CommentNode(2, 'reply', 'Bob', 1);
    reply.attachChild(new CommentNode(3, 'nested', 'Charlie', 2));
    root.attachChild(reply);
    return root;
  };

  describe('Construction', () => {
    it('starts without children and as a root by default', () => {
      const node = new CommentNode(7, 'hello', 'Alice');

      expect(node.id).toBe(7);
      expect(node.parentId).toBeNull();
      expect(node.children).toEqual([]);
      expect(node.isRoot()).toBe(true);
      expect(node.isLeaf()).toBe(true);
    });

    it('finds direct children by id', () => {
      const root = buildThread();

      expect(root.findChild(2)?.text).toBe('reply');
      expect(root.findChild(3)).toBeUndefined();
    });

    it('refuses to attach a reply that names another parent', () => {
      const root = buildThread();
      const stray = new CommentNode(9, 'stray', 'Mallory', 5);

      expect(() => root.attachChild(stray)).toThrow(CommentValidationError);
      expect(() => root.attachChild(new CommentNode(10, 'orphan', 'Mallory'))).toThrow(
        'Comment 10 cannot be attached under 1'
      );
      expect(root.children.map((child) => child.id)).toEqual([2]);
    });

    it('detaches only its own replies', () => {
      const root = buildThread();
      const reply = root.findChild(2);
      const nested = reply?.findChild(3);

      expect(nested && root.detachChild(nested)).toBe(false);
      expect(reply && root.detachChild(reply)).toBe(true);
      expect(root.isLeaf()).toBe(true);
    });

    it('serializes a reply chain deeper than the call stack', () => {
      const root = new CommentNode(1, 'start', 'Alice');
      let tail = root;
      for (let id = 2; id <= 20000; id++) {
        const next = new CommentNode(id, `reply ${id}`, 'Bob', tail.id);
        tail.attachChild(next);
        tail = next;
      }

      let data = root.toStructured();
      let depth = 0;
      for (let child = data.children[0]; child; child = data.children[0]) {
        data = child;
        depth++;
      }

      expect(depth).toBe(19999);
      expect(data).toEqual({ id: 20000, text: 'reply 20000', author: 'Bob', parent_id: 19999, children: [] });
    });
  });

  describe('Structured conversion', () => {
    it('produces the nested wire shape', () => {
      expect(buildThread().toStructured()).toEqual({
        id: 1,
        text: 'first',
        author: 'Alice',
        parent_id: null,
        children: [
          {
            id: 2,
            text: 'reply',
            author: 'Bob',
            parent_id: 1,
            children: [{ id: 3, text: 'nested', author: 'Charlie', parent_id: 2, children: [] }],
          },
        ],
      });
    });

    it('rebuilds a subtree from its structured form', () => {
      const rebuilt = CommentNode.fromStructured(buildThread().toStructured());

      expect(rebuilt.toStructured()).toEqual(buildThread().toStructured());
      expect(rebuilt.children[0]?.children[0]?.parentId).toBe(2);
    });

    it('derives parent ids from nesting when they are left out', () => {
      const node = CommentNode.fromStructured({
        id: 10,
        text: 'top',
        author: 'Dana',
        children: [{ id: 11, text: 'under', author: 'Eli' }],
      });

      expect(node.parentId).toBeNull();
      expect(node.children[0]?.parentId).toBe(10);
      expect(node.children[0]?.children).toEqual([]);
    });

    it('hangs the rebuilt node under the given parent', () => {
      const node = CommentNode.fromStructured({ id: 4, text: 'x', author: 'y', parent_id: 3 }, 3);

      expect(node.parentId).toBe(3);
    });

    it('rejects an embedded parent id that disagrees with the nesting', () => {
      const error = catchError(() =>
        CommentNode.fromStructured({
          id: 1,
          text: 'a',
          author: 'b',
          children: [{ id: 2, text: 'c', author: 'd', parent_id: 99, children: [] }],
        })
      );

      expect(error).toBeInstanceOf(DeserializationError);
      expect(error).toMatchObject({ format: 'structured', field: 'comment.children.0.parent_id' });
    });

    it('names the missing field', () => {
      const error = catchError(() => CommentNode.fromStructured({ id: 1, text: 'a', children: [] }));

      expect(error).toBeInstanceOf(DeserializationError);
      expect(error).toMatchObject({ field: 'author' });
    });

    it('names a missing field deep in the subtree', () => {
      const error = catchError(() =>
        CommentNode.fromStructured({
          id: 1,
          text: 'a',
          author: 'b',
          children: [{ id: 2, text: 'c' }],
        })
      );

      expect(error).toMatchObject({ field: 'children.0.author' });
    });

    it('rejects non-integer ids', () => {
      expect(() => CommentNode.fromStructured({ id: 1.5, text: 'a', author: 'b' })).toThrow(
        DeserializationError
      );
      expect(() => CommentNode.fromStructured({ id: '1', text: 'a', author: 'b' })).toThrow(
        DeserializationError
      );
    });
  });

  describe('XML conversion', () => {
    it('produces a comment element with text, author and children', () => {
      const node = new CommentNode(1, 'hello', 'Alice');

      expect(node.toXmlElement()).toEqual({
        type: 'element',
        name: 'comment',
        attributes: { id: 1 },
        elements: [
          { type: 'element', name: 'text', elements: [{ type: 'text', text: 'hello' }] },
          { type: 'element', name: 'author', elements: [{ type: 'text', text: 'Alice' }] },
          { type: 'element', name: 'children', elements: [] },
        ],
      });
    });

    it('writes parent_id only for replies', () => {
      const reply = buildThread().children[0];

      expect(reply?.toXmlElement().attributes).toEqual({ id: 2, parent_id: 1 });
    });

    it('leaves empty text elements without content', () => {
      const element = new CommentNode(1, '', 'Alice').toXmlElement();

      expect(element.elements?.[0]).toEqual({ type: 'element', name: 'text' });
      expect(CommentNode.fromXmlElement(element).text).toBe('');
    });

    it('round-trips a subtree through its element', () => {
      const root = buildThread();
      const rebuilt = CommentNode.fromXmlElement(root.toXmlElement());

      expect(rebuilt.toStructured()).toEqual(root.toStructured());
    });

    it('reads string attributes and a missing children container', () => {
      const element: Element = {
        type: 'element',
        name: 'comment',
        attributes: { id: '5' },
        elements: [
          { type: 'element', name: 'text', elements: [{ type: 'cdata', cdata: 'raw <b>' }] },
          { type: 'element', name: 'author', elements: [{ type: 'text', text: 'Fay' }] },
        ],
      };

      const node = CommentNode.fromXmlElement(element);

      expect(node.id).toBe(5);
      expect(node.text).toBe('raw <b>');
      expect(node.author).toBe('Fay');
      expect(node.children).toEqual([]);
    });

    it('names the missing text element', () => {
      const element: Element = {
        type: 'element',
        name: 'comment',
        attributes: { id: '1' },
        elements: [{ type: 'element', name: 'author', elements: [{ type: 'text', text: 'Alice' }] }],
      };

      expect(catchError(() => CommentNode.fromXmlElement(element))).toMatchObject({
        format: 'xml',
        field: 'comment/text',
      });
    });

    it('names the missing id attribute', () => {
      const element: Element = { type: 'element', name: 'comment', elements: [] };

      expect(catchError(() => CommentNode.fromXmlElement(element))).toMatchObject({
        field: 'comment/@id',
      });
    });

    it('rejects an id that is not an integer', () => {
      const element: Element = { type: 'element', name: 'comment', attributes: { id: 'abc' } };

      const error = catchError(() => CommentNode.fromXmlElement(element));

      expect(error).toBeInstanceOf(DeserializationError);
      expect(error).toMatchObject({ field: 'comment/@id' });
    });

    it('rejects a nested comment whose parent_id disagrees with its position', () => {
      const child = new CommentNode(2, 'c', 'd', 7).toXmlElement();
      const root = new CommentNode(1, 'a', 'b').toXmlElement();
      root.elements?.[2]?.elements?.push(child);

      expect(catchError(() => CommentNode.fromXmlElement(root))).toMatchObject({
        field: 'comment/children/comment[1]/@parent_id',
      });
    });

    it('rejects elements that are not comments', () => {
      const element: Element = { type: 'element', name: 'note' };

      expect(catchError(() => CommentNode.fromXmlElement(element))).toMatchObject({
        field: 'comment',
        message: 'Invalid xml comment document at "comment": expected <comment>, found <note>',
      });
    });
  });
});
