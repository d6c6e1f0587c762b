/**
 * Conversion between TOON documents and arrays of plain records, the shape
 * most JavaScript table code already works with.
 */

import {
  assertNever,
  toonBool,
  toonFloat,
  toonInt,
  toonNull,
  toonString,
  type ToonDocument,
  type ToonValue,
} from './ast.js';
import { ToonInputError } from './errors.js';

export type PlainValue = string | number | bigint | boolean | null;

export type PlainRecord = Record<string, PlainValue>;

export interface FromRecordsOptions {
  /** Column order. Defaults to every key seen, in first-seen order. */
  columns?: readonly string[];
  tableName?: string;
}

/** Map a host value onto a cell. Integral numbers become `int`. */
export function fromPlain(value: unknown): ToonValue {
  if (value === null || value === undefined) return toonNull();
  switch (typeof value) {
    case 'boolean':
      return toonBool(value);
    case 'bigint':
      return toonInt(value);
    case 'number':
      return Number.isSafeInteger(value) ? toonInt(value) : toonFloat(value);
    case 'string':
      return toonString(value);
    default:
      break;
  }
  if (value instanceof Date) return toonString(value.toISOString());
  throw new ToonInputError(`Cannot represent ${describe(value)} as a TOON value`);
}

/** Inverse of `fromPlain`. Integers outside the safe range stay bigint. */
export function toPlain(value: ToonValue): PlainValue {
  switch (value.kind) {
    case 'null':
      return null;
    case 'bool':
    case 'float':
    case 'string':
      return value.value;
    case 'int': {
      const n = value.value;
      return n >= BigInt(Number.MIN_SAFE_INTEGER) && n <= BigInt(Number.MAX_SAFE_INTEGER)
        ? Number(n)
        : n;
    }
    default:
      return assertNever(value);
  }
}

function describe(value: unknown): string {
  if (Array.isArray(value)) return 'an array';
  if (typeof value === 'object') return 'a nested object';
  return `a ${typeof value}`;
}

function collectColumns(records: readonly Record<string, unknown>[]): string[] {
  const seen = new Set<string>();
  for (const record of records) {
    for (const key of Object.keys(record)) seen.add(key);
  }
  return [...seen];
}

export function fromRecords(
  records: readonly Record<string, unknown>[],
  options: FromRecordsOptions = {}
): ToonDocument {
  const columns = options.columns ? [...options.columns] : collectColumns(records);
  const rows = records.map((record, i) =>
    columns.map((column) => {
      try {
        return fromPlain(Object.prototype.hasOwnProperty.call(record, column) ? record[column] : null);
      } catch (err) {
        if (err instanceof ToonInputError) {
          throw new ToonInputError(`Record ${i}, column ${JSON.stringify(column)}: ${err.message}`, {
            cause: err,
          });
        }
        throw err;
      }
    })
  );
  return options.tableName === undefined ? { columns, rows } : { tableName: options.tableName, columns, rows };
}

/**
 * One record per row. With duplicate column names the later column wins;
 * cells past the header are dropped and missing cells read as null.
 */
export function toRecords(doc: ToonDocument): PlainRecord[] {
  return doc.rows.map((row) => {
    const record: PlainRecord = {};
    doc.columns.forEach((column, c) => {
      const cell = row[c];
      record[column] = cell === undefined ? null : toPlain(cell);
    });
    return record;
  });
}
