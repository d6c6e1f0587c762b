/**
 * Format registry. Hosts that dispatch on a format name (HTTP content
 * negotiation, export menus) register the TOON codec explicitly and keep the
 * returned handle to undo it.
 *
 * Usage:
 *   const registry = new FormatterRegistry();
 *   const handle = registerToonFormatter(registry);
 *   const bytes = registry.get('toon')?.encode(doc);
 *   handle.unregister();
 */

import createDebug from 'debug';
import type { ToonDocument } from './ast.js';
import { ToonRegistryError } from './errors.js';
import { parse, type ParseOptions } from './parser.js';
import { serialize, type SerializeOptions } from './stringify.js';

const log = createDebug('toon:formatter');

const textEncoder = new TextEncoder();
const textDecoder = new TextDecoder();

/**
 * Byte-level codec for one format. Works with Uint8Array so text and binary
 * formats share the interface.
 */
export interface Formatter {
  encode(doc: ToonDocument): Uint8Array;
  decode(data: Uint8Array): ToonDocument;
  /** MIME content type, used in Content-Type headers */
  contentType: string;
}

export interface FormatterHandle {
  readonly name: string;
  /** Remove this registration. Returns false if it was already removed or replaced. */
  unregister(): boolean;
}

export interface RegisterOptions {
  /** Overwrite an existing registration under the same name. */
  replace?: boolean;
}

export class FormatterRegistry {
  private readonly formatters = new Map<string, Formatter>();

  register(name: string, formatter: Formatter, options: RegisterOptions = {}): FormatterHandle {
    if (this.formatters.has(name) && !options.replace) {
      throw new ToonRegistryError(`Formatter already registered: ${JSON.stringify(name)}`);
    }
    this.formatters.set(name, formatter);
    log('registered %s', name);

    const formatters = this.formatters;
    return {
      name,
      unregister(): boolean {
        if (formatters.get(name) !== formatter) return false;
        formatters.delete(name);
        log('unregistered %s', name);
        return true;
      },
    };
  }

  get(name: string): Formatter | null {
    return this.formatters.get(name) ?? null;
  }

  has(name: string): boolean {
    return this.formatters.has(name);
  }

  names(): string[] {
    return Array.from(this.formatters.keys());
  }
}

export interface ToonFormatterOptions {
  parse?: ParseOptions;
  serialize?: SerializeOptions;
}

export function createToonFormatter(options: ToonFormatterOptions = {}): Formatter {
  return {
    encode(doc: ToonDocument): Uint8Array {
      return textEncoder.encode(serialize(doc, options.serialize));
    },

    decode(data: Uint8Array): ToonDocument {
      return parse(textDecoder.decode(data), options.parse);
    },

    contentType: 'text/plain; charset=utf-8',
  };
}

export const ToonFormatter: Formatter = createToonFormatter();

export interface RegisterToonOptions extends RegisterOptions {
  /** Registry key (default "toon") */
  name?: string;
  formatter?: Formatter;
}

export function registerToonFormatter(
  registry: FormatterRegistry,
  options: RegisterToonOptions = {}
): FormatterHandle {
  return registry.register(options.name ?? 'toon', options.formatter ?? ToonFormatter, {
    replace: options.replace,
  });
}
