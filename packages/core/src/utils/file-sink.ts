import { closeSync, openSync, readFileSync, writeSync } from 'node:fs';
import { resolve } from 'node:path';
import { CommentStorageError } from '../errors/tree.js';
import { createModuleLogger, logError } from './logger.js';

const log = createModuleLogger('file-sink');

/**
 * Write `text` to `filename` as UTF-8, replacing any existing content.
 * The descriptor is closed on every path, including a failed write.
 *
 * @returns Absolute path that was written
 * @throws {CommentStorageError} when the file cannot be opened or written
 */
export function writeTextFile(filename: string, text: string): string {
  const filepath = resolve(filename);
  try {
    const fd = openSync(filepath, 'w');
    try {
      writeSync(fd, text, null, 'utf8');
    } finally {
      closeSync(fd);
    }
  } catch (error) {
    const storageError = new CommentStorageError(filename, 'write', error);
    logError(log, storageError, { filepath });
    throw storageError;
  }

  log.info({ filepath, bytes: Buffer.byteLength(text, 'utf8') }, 'Comment document saved');
  return filepath;
}

/**
 * Read the whole of `filename` as UTF-8 text
 *
 * @throws {CommentStorageError} when the file is missing or unreadable
 */
export function readTextFile(filename: string): string {
  const filepath = resolve(filename);
  try {
    const text = readFileSync(filepath, 'utf8');
    log.info({ filepath }, 'Comment document loaded');
    return text;
  } catch (error) {
    const storageError = new CommentStorageError(filename, 'read', error);
    logError(log, storageError, { filepath });
    throw storageError;
  }
}
