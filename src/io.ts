/**
 * Reading and writing `.toon` files (UTF-8).
 */

import { readFile, writeFile } from 'node:fs/promises';
import createDebug from 'debug';
import type { ToonDocument } from './ast.js';
import { ToonIoError } from './errors.js';
import { parse, type ParseOptions } from './parser.js';
import { DEFAULT_NEWLINE, serialize, type SerializeOptions } from './stringify.js';

const log = createDebug('toon:io');

export async function readToon(path: string, options: ParseOptions = {}): Promise<ToonDocument> {
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (err) {
    throw new ToonIoError('Cannot read file', { path, cause: err });
  }
  log('read %s (%d chars)', path, text.length);
  return parse(text, options);
}

/** Write `serialize(doc)` followed by a newline. */
export async function writeToon(
  path: string,
  doc: ToonDocument,
  options: SerializeOptions = {}
): Promise<void> {
  const text = serialize(doc, options) + (options.newline ?? DEFAULT_NEWLINE);
  try {
    await writeFile(path, text, 'utf-8');
  } catch (err) {
    throw new ToonIoError('Cannot write file', { path, cause: err });
  }
  log('wrote %s (%d rows)', path, doc.rows.length);
}
