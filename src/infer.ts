/**
 * Value-type inference for untyped TOON tokens, and its inverse.
 * `inferValue(renderValue(v))` gives back `v` for every non-string value
 * except infinite floats, which render as `inf`/`-inf` and read back as text.
 */

import {
  assertNever,
  toonBool,
  toonFloat,
  toonInt,
  toonNull,
  toonString,
  type ToonValue,
} from './ast.js';

const NULL_KEYWORDS: ReadonlySet<string> = new Set(['', 'null', 'none', 'na', 'nan']);

const INTEGER = /^[+-]?\d+$/;
const FLOAT = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

function parseInteger(token: string): bigint | undefined {
  if (!INTEGER.test(token)) return undefined;
  return BigInt(token);
}

function parseFloatToken(token: string): number | undefined {
  return FLOAT.test(token) ? Number(token) : undefined;
}

/**
 * Infer a typed value from one field. Never throws: anything that is not a
 * null keyword, boolean or number comes back as a string.
 */
export function inferValue(token: string): ToonValue {
  const text = token.trim();
  const lower = text.toLowerCase();

  if (NULL_KEYWORDS.has(lower)) return toonNull();
  if (lower === 'true') return toonBool(true);
  if (lower === 'false') return toonBool(false);

  // Tokens without a decimal point or exponent marker are integers when
  // they parse as one; "1e5" and "30.0" go straight to the float grammar.
  if (!/[.eE]/.test(text)) {
    const int = parseInteger(text);
    if (int !== undefined) return toonInt(int);
  }
  const float = parseFloatToken(text);
  if (float !== undefined) return toonFloat(float);

  return toonString(text);
}

function renderFloat(n: number): string {
  if (Number.isNaN(n)) return '';
  if (n === Infinity) return 'inf';
  if (n === -Infinity) return '-inf';
  if (Object.is(n, -0)) return '-0.0';
  const text = String(n);
  return /[.e]/.test(text) ? text : `${text}.0`;
}

/** Render a value as a field. Null and NaN render empty. */
export function renderValue(value: ToonValue): string {
  switch (value.kind) {
    case 'null':
      return '';
    case 'bool':
      return value.value ? 'true' : 'false';
    case 'int':
      return value.value.toString();
    case 'float':
      return renderFloat(value.value);
    case 'string':
      return value.value;
    default:
      return assertNever(value);
  }
}
