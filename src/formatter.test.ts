import { describe, expect, it } from 'vitest';
import { toonFloat, toonString, type ToonDocument } from './ast.js';
import { ToonRegistryError } from './errors.js';
import {
  createToonFormatter,
  FormatterRegistry,
  registerToonFormatter,
  ToonFormatter,
} from './formatter.js';

const DOC: ToonDocument = {
  tableName: 'prices',
  columns: ['item', 'price'],
  rows: [[toonString('Mouse'), toonFloat(29.99)]],
};

describe('ToonFormatter', () => {
  it('encodes to UTF-8 TOON text and decodes it back', () => {
    const bytes = ToonFormatter.encode(DOC);
    expect(new TextDecoder().decode(bytes)).toBe('@prices\nitem|price\n---\nMouse|29.99');
    expect(ToonFormatter.decode(bytes)).toEqual(DOC);
    expect(ToonFormatter.contentType).toBe('text/plain; charset=utf-8');
  });

  it('applies its parse and serialize options', () => {
    const formatter = createToonFormatter({ parse: { arity: 'strict' }, serialize: { newline: '\r\n' } });
    expect(new TextDecoder().decode(formatter.encode(DOC))).toBe('@prices\r\nitem|price\r\n---\r\nMouse|29.99');
    expect(() => formatter.decode(new TextEncoder().encode('a|b\n---\n1'))).toThrow('Row has 1 fields, header has 2');
  });
});

describe('FormatterRegistry', () => {
  it('registers the TOON formatter under "toon" on request', () => {
    const registry = new FormatterRegistry();
    expect(registry.has('toon')).toBe(false);

    const handle = registerToonFormatter(registry);
    expect(handle.name).toBe('toon');
    expect(registry.get('toon')).toBe(ToonFormatter);
    expect(registry.names()).toEqual(['toon']);
  });

  it('unregisters through the handle exactly once', () => {
    const registry = new FormatterRegistry();
    const handle = registerToonFormatter(registry, { name: 'tbl' });
    expect(handle.unregister()).toBe(true);
    expect(handle.unregister()).toBe(false);
    expect(registry.get('tbl')).toBeNull();
  });

  it('rejects a second registration unless replacing', () => {
    const registry = new FormatterRegistry();
    const first = registerToonFormatter(registry);
    expect(() => registerToonFormatter(registry)).toThrow(ToonRegistryError);

    const other = createToonFormatter();
    const second = registerToonFormatter(registry, { formatter: other, replace: true });
    expect(registry.get('toon')).toBe(other);
    expect(first.unregister()).toBe(false);
    expect(registry.has('toon')).toBe(true);
    expect(second.unregister()).toBe(true);
    expect(registry.has('toon')).toBe(false);
  });
});
