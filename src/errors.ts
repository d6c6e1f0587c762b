/**
 * TOON parse/serialize errors with line/column or file path.
 */

import type { SourcePosition } from './ast.js';

type ConstructorOptions = { position?: SourcePosition; path?: string; cause?: unknown };

export class ToonError extends Error {
  override readonly name: string = 'ToonError';
  readonly position?: SourcePosition;
  readonly path?: string;

  constructor(message: string, options?: ConstructorOptions) {
    super(message);
    this.position = options?.position;
    this.path = options?.path;
    if (options?.cause !== undefined) this.cause = options.cause;
    Object.setPrototypeOf(this, ToonError.prototype);
  }

  /** Human-readable location string */
  get location(): string {
    const parts: string[] = [];
    if (this.path) parts.push(this.path);
    if (this.position) {
      parts.push(`line ${this.position.line}, column ${this.position.column}`);
    }
    return parts.join(': ');
  }

  override toString(): string {
    const loc = this.location;
    return loc ? `${this.message} (${loc})` : this.message;
  }
}

export type ToonParseErrorKind = 'EmptyContent' | 'MissingHeader' | 'RowArity' | 'InputTooLarge';

export class ToonParseError extends ToonError {
  override readonly name = 'ToonParseError';
  readonly kind: ToonParseErrorKind;

  constructor(kind: ToonParseErrorKind, message: string, options?: ConstructorOptions) {
    super(message, options);
    this.kind = kind;
    Object.setPrototypeOf(this, ToonParseError.prototype);
  }
}

export type ToonSerializeErrorKind = 'RowArity';

export class ToonSerializeError extends ToonError {
  override readonly name = 'ToonSerializeError';
  readonly kind: ToonSerializeErrorKind;
  /** Zero-based index of the offending row. */
  readonly rowIndex: number;

  constructor(kind: ToonSerializeErrorKind, message: string, rowIndex: number) {
    super(message);
    this.kind = kind;
    this.rowIndex = rowIndex;
    Object.setPrototypeOf(this, ToonSerializeError.prototype);
  }
}

/** A host value the records adapter cannot represent as a cell. */
export class ToonInputError extends ToonError {
  override readonly name = 'ToonInputError';
  constructor(message: string, options?: ConstructorOptions) {
    super(message, options);
    Object.setPrototypeOf(this, ToonInputError.prototype);
  }
}

export class ToonIoError extends ToonError {
  override readonly name = 'ToonIoError';
  constructor(message: string, options?: ConstructorOptions) {
    super(message, options);
    Object.setPrototypeOf(this, ToonIoError.prototype);
  }
}

export class ToonRegistryError extends ToonError {
  override readonly name = 'ToonRegistryError';
  constructor(message: string) {
    super(message);
    Object.setPrototypeOf(this, ToonRegistryError.prototype);
  }
}
