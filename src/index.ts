/**
 * TOON tables: a compact, line-based text notation for tabular data.
 *
 *   @employees
 *   name|department|salary
 *   ---
 *   Alice|Engineering|95000.0
 */

export * from './ast.js';
export * from './errors.js';
export { inferValue, renderValue } from './infer.js';
export { FIELD_DELIMITER, NAME_MARKER, SEPARATOR, DEFAULT_MAX_INPUT_LENGTH } from './lexer.js';
export { parse, type ArityMode, type ParseOptions } from './parser.js';
export { serialize, DEFAULT_NEWLINE, type SerializeOptions } from './stringify.js';
export {
  fromPlain,
  fromRecords,
  toPlain,
  toRecords,
  type FromRecordsOptions,
  type PlainRecord,
  type PlainValue,
} from './records.js';
export { fromCsv, toCsv, type FromCsvOptions } from './csv.js';
export { readToon, writeToon } from './io.js';
export {
  createToonFormatter,
  FormatterRegistry,
  registerToonFormatter,
  ToonFormatter,
  type Formatter,
  type FormatterHandle,
  type RegisterOptions,
  type RegisterToonOptions,
  type ToonFormatterOptions,
} from './formatter.js';
