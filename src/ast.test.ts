import { describe, expect, it } from 'vitest';
import {
  documentsEqual,
  isToonBool,
  isToonFloat,
  isToonInt,
  isToonNull,
  isToonString,
  toonBool,
  toonFloat,
  toonInt,
  toonNull,
  toonString,
  valuesEqual,
  type ToonDocument,
} from './ast.js';

describe('value constructors and guards', () => {
  it('tag each variant', () => {
    expect(isToonNull(toonNull())).toBe(true);
    expect(isToonBool(toonBool(false))).toBe(true);
    expect(isToonInt(toonInt(3))).toBe(true);
    expect(isToonFloat(toonFloat(3))).toBe(true);
    expect(isToonString(toonString('3'))).toBe(true);
    expect(isToonInt(toonFloat(3))).toBe(false);
  });

  it('stores integers as bigint', () => {
    expect(toonInt(3).value).toBe(3n);
  });
});

describe('valuesEqual', () => {
  it('distinguishes int from float of the same magnitude', () => {
    expect(valuesEqual(toonInt(30), toonFloat(30))).toBe(false);
    expect(valuesEqual(toonInt(30), toonInt(30n))).toBe(true);
  });

  it('compares floats with Object.is', () => {
    expect(valuesEqual(toonFloat(NaN), toonFloat(NaN))).toBe(true);
    expect(valuesEqual(toonFloat(0), toonFloat(-0))).toBe(false);
  });
});

describe('documentsEqual', () => {
  const base: ToonDocument = {
    tableName: 't',
    columns: ['a', 'b'],
    rows: [[toonString('x'), toonNull()]],
  };

  it('matches identical content', () => {
    expect(documentsEqual(base, { tableName: 't', columns: ['a', 'b'], rows: [[toonString('x'), toonNull()]] })).toBe(true);
  });

  it('notices differences in name, columns and cells', () => {
    expect(documentsEqual(base, { ...base, tableName: undefined })).toBe(false);
    expect(documentsEqual(base, { ...base, columns: ['a', 'c'] })).toBe(false);
    expect(documentsEqual(base, { ...base, rows: [[toonString('x'), toonString('')]] })).toBe(false);
    expect(documentsEqual(base, { ...base, rows: [] })).toBe(false);
  });
});
