import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { CommentNode } from '../src/entities/CommentNode.js';
import { CommentTree } from '../src/entities/CommentTree.js';
import { formatCommentLine, renderCommentTree } from '../src/entities/tree-rendering.js';
import { CommentNotFoundError } from '../src/errors/tree.js';

describe('Rendering', () => {
  let tree: CommentTree;

  beforeEach(() => {
    tree = new CommentTree({ printIndent: 4 });
    tree.addComment(1, 'first', 'Alice');
    tree.addComment(2, 'reply', 'Bob', 1);
    tree.addComment(3, 'nested', 'Charlie', 2);
    tree.addComment(4, 'other', 'Dave', 1);
    tree.addComment(5, 'second root', 'Eve');
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('formatCommentLine', () => {
    it('indents by depth times the indent width', () => {
      const node = new CommentNode(1, 'hello', 'Alice');

      expect(formatCommentLine(node, 0, 4)).toBe('- hello (by Alice)');
      expect(formatCommentLine(node, 2, 3)).toBe('      - hello (by Alice)');
    });
  });

  describe('Traversal output', () => {
    it('formats every root depth-first', () => {
      expect(tree.formatDepthFirst()).toEqual([
        '- first (by Alice)',
        '    - reply (by Bob)',
        '        - nested (by Charlie)',
        '    - other (by Dave)',
        '- second root (by Eve)',
      ]);
    });

    it('formats every root breadth-first', () => {
      expect(tree.formatBreadthFirst()).toEqual([
        '- first (by Alice)',
        '- second root (by Eve)',
        '    - reply (by Bob)',
        '    - other (by Dave)',
        '        - nested (by Charlie)',
      ]);
    });

    it('keeps the depth below the root when starting mid-tree', () => {
      const written: string[] = [];

      const lines = tree.printDepthFirst(2, (line) => written.push(line));

      expect(lines).toEqual(['    - reply (by Bob)', '        - nested (by Charlie)']);
      expect(written).toEqual(lines);
    });

    it('looks up the absolute depth once per walk', () => {
      const getDepth = vi.spyOn(tree, 'getDepth');

      expect(tree.formatBreadthFirst(2)).toEqual(['    - reply (by Bob)', '        - nested (by Charlie)']);
      expect(tree.formatDepthFirst()).toHaveLength(5);
      expect(getDepth).toHaveBeenCalledTimes(1);
      expect(getDepth).toHaveBeenCalledWith(2);
    });

    it('uses the configured indent width', () => {
      const narrow = new CommentTree({ printIndent: 2 });
      narrow.addComment(1, 'a', 'x');
      narrow.addComment(2, 'b', 'y', 1);

      expect(narrow.printBreadthFirst(1, () => undefined)).toEqual(['- a (by x)', '  - b (by y)']);
    });

    it('writes to stdout by default', () => {
      const write = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);

      tree.printBreadthFirst(4);

      expect(write).toHaveBeenCalledTimes(1);
      expect(write).toHaveBeenCalledWith('    - other (by Dave)\n');
    });

    it('prints nothing for an unknown start', () => {
      const written: string[] = [];

      expect(() => tree.printDepthFirst(42, (line) => written.push(line))).toThrow(CommentNotFoundError);
      expect(written).toEqual([]);
    });
  });

  describe('Box rendering', () => {
    it('draws every root with connectors', () => {
      expect(tree.render()).toEqual([
        'first (by Alice)',
        '    ├── reply (by Bob)',
        '    │   └── nested (by Charlie)',
        '    └── other (by Dave)',
        'second root (by Eve)',
      ]);
    });

    it('renders nothing for no roots', () => {
      expect(renderCommentTree([])).toEqual([]);
    });
  });
});
