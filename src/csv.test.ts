import { describe, expect, it } from 'vitest';
import { toonFloat, toonInt, toonNull, toonString, type ToonDocument } from './ast.js';
import { fromCsv, toCsv } from './csv.js';
import { serialize } from './stringify.js';

describe('fromCsv', () => {
  it('reads the header and infers cell types', () => {
    const doc = fromCsv('name,age,score\nAlice,30,9.5\n"Smith, J",,7\n', { tableName: 'people' });
    expect(doc).toEqual({
      tableName: 'people',
      columns: ['name', 'age', 'score'],
      rows: [
        [toonString('Alice'), toonInt(30n), toonFloat(9.5)],
        [toonString('Smith, J'), toonNull(), toonInt(7n)],
      ],
    });
  });

  it('converts to TOON text', () => {
    expect(serialize(fromCsv('id,price\n1,9.99\n2,10.0'))).toBe('id|price\n---\n1|9.99\n2|10.0');
  });

  it('honours a custom delimiter', () => {
    expect(fromCsv('a;b\n1;x', { delimiter: ';' }).rows).toEqual([[toonInt(1n), toonString('x')]]);
  });
});

describe('toCsv', () => {
  it('writes header and rows, quoting where needed', () => {
    const doc: ToonDocument = {
      tableName: 'ignored',
      columns: ['name', 'city', 'age'],
      rows: [
        [toonString('Alice'), toonString('New York, NY'), toonInt(30)],
        [toonString('Bob'), toonNull(), toonFloat(25)],
      ],
    };
    expect(toCsv(doc)).toBe('name,city,age\nAlice,"New York, NY",30\nBob,,25.0');
  });
});
