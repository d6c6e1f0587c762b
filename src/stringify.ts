/**
 * TOON document to text (.toon). Output is deterministic: name line, header,
 * separator, one line per row.
 */

import createDebug from 'debug';
import type { ToonDocument } from './ast.js';
import { ToonSerializeError } from './errors.js';
import { renderValue } from './infer.js';
import { FIELD_DELIMITER, NAME_MARKER, SEPARATOR } from './lexer.js';

const log = createDebug('toon:stringify');

export interface SerializeOptions {
  /** Newline (default "\n") */
  newline?: string;
}

export const DEFAULT_NEWLINE = '\n';

function unsafeForField(s: string): boolean {
  return s.includes(FIELD_DELIMITER) || s.includes('\n') || s.includes('\r');
}

/**
 * Serialize a document to TOON text. Every row must have exactly
 * `columns.length` cells. Strings are written verbatim; a string holding the
 * delimiter or a line break will not read back as the same row. In a
 * single-column table a null or empty cell yields a blank line, which the
 * parser skips, so that row is lost on the way back.
 */
export function serialize(doc: ToonDocument, options: SerializeOptions = {}): string {
  const newline = options.newline ?? DEFAULT_NEWLINE;
  const lines: string[] = [];

  if (doc.tableName) lines.push(`${NAME_MARKER}${doc.tableName}`);
  lines.push(doc.columns.join(FIELD_DELIMITER));
  lines.push(SEPARATOR);

  doc.rows.forEach((row, r) => {
    if (row.length !== doc.columns.length) {
      throw new ToonSerializeError(
        'RowArity',
        `Row ${r} has ${row.length} values, expected ${doc.columns.length}`,
        r
      );
    }
    const fields = row.map((value, c) => {
      const text = renderValue(value);
      if (value.kind === 'string' && unsafeForField(text)) {
        log('row %d column %s: string contains a delimiter or line break', r, doc.columns[c]);
      }
      return text;
    });
    const line = fields.join(FIELD_DELIMITER);
    if (line.trim().length === 0 && doc.columns.length === 1) {
      log('row %d: single empty cell writes a blank line', r);
    }
    lines.push(line);
  });

  return lines.join(newline);
}
