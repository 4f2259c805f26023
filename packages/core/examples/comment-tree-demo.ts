#!/usr/bin/env tsx

import { mkdtempSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { CommentTree } from '../src/entities/CommentTree.js';
import { createModuleLogger, logError } from '../src/utils/logger.js';

const log = createModuleLogger('demo');

// Sample discussion: three root threads of varying depth
const seed: Array<[id: number, text: string, author: string, parentId?: number]> = [
  [1, 'Root comment', 'Alice'],
  [2, 'Reply to root', 'Bob', 1],
  [3, 'Another reply', 'Charlie', 1],
  [4, 'Nested reply', 'Dave', 2],
  [5, 'Further nested reply', 'Eve', 4],
  [6, 'Sibling reply to nested', 'Frank', 2],
  [7, 'Deeply nested reply', 'Grace', 5],
  [8, 'Another root-level comment', 'Hank'],
  [9, 'Reply to another root-level comment', 'Ivy', 8],
  [10, 'Nested under Ivy', 'Jack', 9],
  [11, 'Another reply to Ivy', 'Ken', 9],
  [12, 'Reply to Charlie', 'Liam', 3],
  [13, 'Further nesting under Ken', 'Mia', 11],
  [14, 'Another deeply nested reply', 'Nina', 13],
  [15, 'Sibling to deeply nested', 'Oscar', 13],
  [16, 'Independent root-level comment', 'Pam'],
  [17, 'Reply to Pam', 'Quincy', 16],
];

function main(outputDir: string): void {
  const tree = new CommentTree();
  for (const [id, text, author, parentId] of seed) {
    tree.addComment(id, text, author, parentId ?? null);
  }

  console.log('🌳 Depth-first from comment 1:');
  tree.printDepthFirst(1);

  console.log('\n📶 Breadth-first from comment 1:');
  tree.printBreadthFirst(1);

  const removed = tree.deleteComment(4);
  console.log(`\n🗑️  Deleted comment 4 and its replies: ${removed.join(', ')}`);

  const json = tree.toJson(join(outputDir, 'comments.json'));
  const xml = tree.toXml(join(outputDir, 'comments.xml'));

  console.log('\n📥 Reloaded from JSON:');
  console.log(new CommentTree().fromJson(json).render().join('\n'));

  console.log('\n📥 Reloaded from XML:');
  console.log(new CommentTree().fromXml(xml).render().join('\n'));

  console.log(`\n💾 Documents written to ${outputDir}`);
}

try {
  main(process.argv[2] ?? mkdtempSync(join(tmpdir(), 'threadtree-demo-')));
} catch (error) {
  logError(log, error instanceof Error ? error : String(error), { phase: 'demo' });
  process.exitCode = 1;
}
