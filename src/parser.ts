/**
 * TOON text parser. Single pass over the lines: optional `@name`, the header,
 * an optional `---` separator, then data rows.
 */

import createDebug from 'debug';
import type { ToonDocument, ToonValue } from './ast.js';
import { ToonParseError } from './errors.js';
import { inferValue } from './infer.js';
import {
  classifyLine,
  LineKind,
  NAME_MARKER,
  scanLines,
  splitFields,
  type Line,
} from './lexer.js';

const log = createDebug('toon:parser');

/**
 * `lenient` passes rows through with whatever field count they have;
 * `strict` rejects a row whose field count differs from the header's.
 */
export type ArityMode = 'lenient' | 'strict';

export interface ParseOptions {
  /** Max input length in characters. Passed to the line scanner. */
  maxInputLength?: number;
  /** Row arity handling (default `lenient`). */
  arity?: ArityMode;
}

export function parse(text: string, options: ParseOptions = {}): ToonDocument {
  const lines = scanLines(text, { maxInputLength: options.maxInputLength });
  const p = new Parser(lines, options.arity ?? 'lenient');
  return p.parseDocument();
}

class Parser {
  private index = 0;
  constructor(
    private readonly lines: Line[],
    private readonly arity: ArityMode
  ) {}

  private get current(): Line | undefined {
    return this.lines[this.index];
  }

  private advance(): Line | undefined {
    const line = this.current;
    if (line) this.index++;
    return line;
  }

  parseDocument(): ToonDocument {
    const first = this.current;
    if (first === undefined) {
      throw new ToonParseError('EmptyContent', 'Empty TOON content', {
        position: { line: 1, column: 1, offset: 0 },
      });
    }

    let tableName: string | undefined;
    if (classifyLine(first.text) === LineKind.Name) {
      tableName = first.text.slice(NAME_MARKER.length).trim();
      this.advance();
    }

    const header = this.advance();
    if (header === undefined) {
      throw new ToonParseError('MissingHeader', 'Missing column headers', {
        position: { line: first.start.line + 1, column: 1, offset: endOffset(this.lines) },
      });
    }
    const columns = splitFields(header.text);

    const next = this.current;
    if (next && classifyLine(next.text) === LineKind.Separator) this.advance();

    const rows: ToonValue[][] = [];
    for (let line = this.advance(); line !== undefined; line = this.advance()) {
      if (line.text.length === 0) continue;
      const row = splitFields(line.text).map(inferValue);
      if (row.length !== columns.length) this.checkArity(line, row.length, columns.length);
      rows.push(row);
    }

    log('parsed %d columns, %d rows%s', columns.length, rows.length, tableName ? ` (${tableName})` : '');
    return tableName === undefined ? { columns, rows } : { tableName, columns, rows };
  }

  private checkArity(line: Line, actual: number, expected: number): void {
    const message = `Row has ${actual} fields, header has ${expected}`;
    if (this.arity === 'strict') {
      throw new ToonParseError('RowArity', message, { position: line.start });
    }
    log('%s at line %d (kept)', message, line.start.line);
  }
}

/** Offset just past the last scanned line. */
function endOffset(lines: Line[]): number {
  const last = lines[lines.length - 1];
  return last ? last.start.offset + last.text.length : 0;
}
