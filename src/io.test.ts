import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { toonBool, toonFloat, toonInt, toonNull, toonString, type ToonDocument } from './ast.js';
import { ToonIoError, ToonParseError } from './errors.js';
import { readToon, writeToon } from './io.js';

describe('readToon / writeToon', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'toon-io-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('writes the serialized table with a trailing newline and reads it back', async () => {
    const doc: ToonDocument = {
      tableName: 'sample_data',
      columns: ['id', 'value', 'ok', 'label'],
      rows: [
        [toonInt(1), toonFloat(10.5), toonBool(true), toonString('first')],
        [toonInt(2), toonFloat(20.0), toonBool(false), toonNull()],
      ],
    };
    const path = join(dir, 'sample.toon');
    await writeToon(path, doc);

    expect(await readFile(path, 'utf-8')).toBe(
      '@sample_data\nid|value|ok|label\n---\n1|10.5|true|first\n2|20.0|false|\n'
    );
    expect(await readToon(path)).toEqual(doc);
  });

  it('passes parse options through', async () => {
    const path = join(dir, 'ragged.toon');
    await writeFile(path, 'a|b\n---\n1\n', 'utf-8');
    await expect(readToon(path)).resolves.toEqual({ columns: ['a', 'b'], rows: [[toonInt(1)]] });
    await expect(readToon(path, { arity: 'strict' })).rejects.toBeInstanceOf(ToonParseError);
  });

  it('wraps a missing file in ToonIoError', async () => {
    const path = join(dir, 'missing.toon');
    const err = await readToon(path).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ToonIoError);
    if (err instanceof ToonIoError) {
      expect(err.path).toBe(path);
      expect(err.message).toBe('Cannot read file');
      expect(err.toString()).toBe(`Cannot read file (${path})`);
    }
  });
});
