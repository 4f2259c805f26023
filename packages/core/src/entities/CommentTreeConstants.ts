/**
 * Element, attribute and key names of the comment document formats
 */

export const XML_NAMES = {
  /** Root element of a whole-tree document */
  DOCUMENT: 'comments',
  COMMENT: 'comment',
  /** Container holding a comment's replies */
  CHILDREN: 'children',
  TEXT: 'text',
  AUTHOR: 'author',
  ID_ATTRIBUTE: 'id',
  PARENT_ID_ATTRIBUTE: 'parent_id',
} as const;

export const JSON_KEYS = {
  /** Top-level key holding the root comments */
  DOCUMENT: 'comments',
} as const;

export const RENDER_SYMBOLS = {
  /** Leading marker of a printed traversal line */
  MARKER: '-',
  BRANCH: '├── ',
  LAST_BRANCH: '└── ',
  /** Guide drawn under a branch that has later siblings */
  CONTINUATION: '│   ',
  /** Indentation placed before each connector in the box rendering */
  BRANCH_INDENT: '    ',
} as const;
