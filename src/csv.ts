/**
 * CSV <-> TOON. The first CSV row is the header; cells go through the same
 * inference as TOON fields, so "42" reads back as an integer either way.
 */

import Papa from 'papaparse';
import type { ToonDocument } from './ast.js';
import { ToonInputError, ToonParseError } from './errors.js';
import { inferValue, renderValue } from './infer.js';

export interface FromCsvOptions {
  tableName?: string;
  /** Field delimiter (default ","). */
  delimiter?: string;
}

export function fromCsv(text: string, options: FromCsvOptions = {}): ToonDocument {
  const result = Papa.parse<string[]>(text, {
    header: false,
    skipEmptyLines: true,
    dynamicTyping: false,
    delimiter: options.delimiter ?? ',',
  });

  const firstError = result.errors[0];
  if (firstError) {
    throw new ToonInputError(`CSV parse error at row ${firstError.row ?? 0}: ${firstError.message}`);
  }

  const [header, ...body] = result.data;
  if (header === undefined) {
    throw new ToonParseError('EmptyContent', 'Empty CSV content', {
      position: { line: 1, column: 1, offset: 0 },
    });
  }

  const columns = header.map((name) => name.trim());
  const rows = body.map((cells) => cells.map(inferValue));
  return options.tableName === undefined ? { columns, rows } : { tableName: options.tableName, columns, rows };
}

export function toCsv(doc: ToonDocument): string {
  return Papa.unparse(
    {
      fields: [...doc.columns],
      data: doc.rows.map((row) => row.map(renderValue)),
    },
    {
      delimiter: ',',
      newline: '\n',
      quoteChar: '"',
      escapeChar: '"',
    }
  );
}
