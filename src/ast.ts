/**
 * TOON table model — scalar values, documents and source positions.
 * Documents are plain immutable values; nothing here mutates its input.
 */

export interface SourcePosition {
  line: number;
  column: number;
  offset: number;
}

export interface ToonNull {
  readonly kind: 'null';
}

export interface ToonBool {
  readonly kind: 'bool';
  readonly value: boolean;
}

export interface ToonInt {
  readonly kind: 'int';
  readonly value: bigint;
}

export interface ToonFloat {
  readonly kind: 'float';
  readonly value: number;
}

export interface ToonString {
  readonly kind: 'string';
  readonly value: string;
}

/** One table cell. */
export type ToonValue = ToonNull | ToonBool | ToonInt | ToonFloat | ToonString;

export type ToonValueKind = ToonValue['kind'];

export type ToonRow = readonly ToonValue[];

export interface ToonDocument {
  /** Present only when the text carried an `@name` line. */
  readonly tableName?: string;
  readonly columns: readonly string[];
  readonly rows: readonly ToonRow[];
}

const NULL: ToonNull = Object.freeze({ kind: 'null' });

export function toonNull(): ToonNull {
  return NULL;
}

export function toonBool(value: boolean): ToonBool {
  return { kind: 'bool', value };
}

export function toonInt(value: bigint | number): ToonInt {
  return { kind: 'int', value: typeof value === 'bigint' ? value : BigInt(value) };
}

export function toonFloat(value: number): ToonFloat {
  return { kind: 'float', value };
}

export function toonString(value: string): ToonString {
  return { kind: 'string', value };
}

export function isToonNull(v: ToonValue): v is ToonNull {
  return v.kind === 'null';
}

export function isToonBool(v: ToonValue): v is ToonBool {
  return v.kind === 'bool';
}

export function isToonInt(v: ToonValue): v is ToonInt {
  return v.kind === 'int';
}

export function isToonFloat(v: ToonValue): v is ToonFloat {
  return v.kind === 'float';
}

export function isToonString(v: ToonValue): v is ToonString {
  return v.kind === 'string';
}

/** Exhaustiveness guard for switches over `ToonValue['kind']`. */
export function assertNever(value: never): never {
  throw new TypeError(`Unexpected value: ${JSON.stringify(value)}`);
}

/**
 * Structural equality. Floats compare with `Object.is`, so NaN equals NaN
 * and 0 differs from -0.
 */
export function valuesEqual(a: ToonValue, b: ToonValue): boolean {
  switch (a.kind) {
    case 'null':
      return b.kind === 'null';
    case 'bool':
      return b.kind === 'bool' && a.value === b.value;
    case 'int':
      return b.kind === 'int' && a.value === b.value;
    case 'float':
      return b.kind === 'float' && Object.is(a.value, b.value);
    case 'string':
      return b.kind === 'string' && a.value === b.value;
    default:
      return assertNever(a);
  }
}

export function documentsEqual(a: ToonDocument, b: ToonDocument): boolean {
  if (a.tableName !== b.tableName) return false;
  if (a.columns.length !== b.columns.length) return false;
  for (let i = 0; i < a.columns.length; i++) {
    if (a.columns[i] !== b.columns[i]) return false;
  }
  if (a.rows.length !== b.rows.length) return false;
  for (let r = 0; r < a.rows.length; r++) {
    const ra = a.rows[r]!;
    const rb = b.rows[r]!;
    if (ra.length !== rb.length) return false;
    for (let c = 0; c < ra.length; c++) {
      if (!valuesEqual(ra[c]!, rb[c]!)) return false;
    }
  }
  return true;
}
