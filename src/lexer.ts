/**
 * TOON line scanner. Produces trimmed lines with source positions and splits
 * header/data lines into fields.
 */

import type { SourcePosition } from './ast.js';
import { ToonParseError } from './errors.js';

export const NAME_MARKER = '@';
export const FIELD_DELIMITER = '|';
export const SEPARATOR = '---';

export const enum LineKind {
  Name = 'Name',
  Separator = 'Separator',
  Blank = 'Blank',
  Fields = 'Fields',
}

export interface Line {
  /** Line content with surrounding whitespace removed. */
  text: string;
  start: SourcePosition;
}

function pos(line: number, column: number, offset: number): SourcePosition {
  return { line, column, offset };
}

export interface LexerOptions {
  /** Max input length in characters (default 1_000_000) */
  maxInputLength?: number;
}

export const DEFAULT_MAX_INPUT_LENGTH = 1_000_000;

/**
 * Split the input into trimmed lines. Leading and trailing whitespace of the
 * whole input is dropped first, so the first line returned is the first
 * non-blank one. Positions refer to the untrimmed input.
 */
export function scanLines(input: string, options: LexerOptions = {}): Line[] {
  const maxLen = options.maxInputLength ?? DEFAULT_MAX_INPUT_LENGTH;
  if (input.length > maxLen) {
    throw new ToonParseError(
      'InputTooLarge',
      `Input exceeds maximum length (${input.length} > ${maxLen})`,
      { position: pos(1, 1, 0) }
    );
  }

  const lead = input.length - input.trimStart().length;
  const body = input.trim();
  if (body.length === 0) return [];

  let line = 1;
  for (let i = 0; i < lead; i++) {
    if (input[i] === '\n') line++;
  }
  let column = 1;
  for (let i = lead - 1; i >= 0 && input[i] !== '\n'; i--) column++;

  const lines: Line[] = [];
  let offset = lead;
  for (const raw of body.split('\n')) {
    const indent = raw.length - raw.trimStart().length;
    lines.push({
      text: raw.trim(),
      start: pos(line, column + indent, offset + indent),
    });
    offset += raw.length + 1;
    line++;
    column = 1;
  }
  return lines;
}

export function classifyLine(text: string): LineKind {
  if (text.length === 0) return LineKind.Blank;
  if (text.startsWith(NAME_MARKER)) return LineKind.Name;
  if (text.startsWith(SEPARATOR)) return LineKind.Separator;
  return LineKind.Fields;
}

/** Split a header or data line on the delimiter; each field is trimmed. */
export function splitFields(text: string): string[] {
  return text.split(FIELD_DELIMITER).map((field) => field.trim());
}
