/**
 * @bytemold/core — StructRegistry
 *
 * Declarations written with defineStruct() reference nested structures by
 * object. Declarations that arrive as plain data (a parsed JSON file, a
 * config object) can only reference them by name; the registry resolves
 * those names into declaration objects before compilation.
 *
 * Document format:
 *
 *   {
 *     "structs": {
 *       "Transaction": [
 *         { "name": "amount",   "type": "f32" },
 *         { "name": "sender",   "type": "u64" },
 *         { "name": "receiver", "type": "u64" }
 *       ],
 *       "Account": [
 *         { "name": "id",     "type": "u64" },
 *         { "name": "owner",  "type": "text", "length": 16 },
 *         { "name": "recent", "type": "Transaction", "count": 3 }
 *       ]
 *     }
 *   }
 *
 * Names resolve lazily: a structure may reference one defined later in the
 * same document, or in a later load(). Resolution happens on get() or
 * compile(), and the resolved declaration is cached, so every compile of
 * the same name shares one compiled layout.
 */

import { isPlainRecord } from './construct';
import { RESERVED_FIELD_NAMES, TEXT_ENCODINGS } from './constants';
import { isPrimitiveKind } from './primitives';
import { ConfigurationError, compileSchema, defineStruct } from './schema';
import type {
  CompileOptions,
  CompiledSchema,
  DefaultValue,
  FieldDeclaration,
  StructDeclaration,
  TextEncodingName,
} from './types';

// ─── Public types ─────────────────────────────────────────────────────────────

/** A field whose `type` may name a registered structure. */
export interface FieldDocument {
  readonly name:      string;
  readonly type:      string;
  readonly length?:   number;
  readonly count?:    number;
  readonly encoding?: TextEncodingName;
  readonly default?:  DefaultValue;
}

export interface DeclarationDocument {
  readonly structs: Readonly<Record<string, readonly FieldDocument[]>>;
}

type Entry =
  | { readonly kind: 'declared'; readonly declaration: StructDeclaration }
  | { readonly kind: 'document'; readonly fields: readonly FieldDocument[] };

// ─── StructRegistry ───────────────────────────────────────────────────────────

export class StructRegistry {
  private readonly _entries  = new Map<string, Entry>();
  private readonly _resolved = new Map<string, StructDeclaration>();

  /** Register a declaration built with defineStruct() under its own name. */
  register(declaration: StructDeclaration): void {
    this._add(declaration.name, { kind: 'declared', declaration });
  }

  /** Register a structure whose nested types are given by name. */
  define(name: string, fields: readonly FieldDocument[]): void {
    this._add(name, { kind: 'document', fields });
  }

  /**
   * Validate and register every structure in a document. Nothing is
   * registered if any part of the document is malformed.
   *
   * @throws ConfigurationError on a malformed document or a duplicate name.
   */
  load(document: unknown): void {
    const parsed = parseDocument(document);
    for (const name of Object.keys(parsed.structs)) {
      if (this._entries.has(name)) {
        throw new ConfigurationError(`Structure '${name}' is already registered.`, name);
      }
    }
    for (const [name, fields] of Object.entries(parsed.structs)) {
      this.define(name, fields);
    }
  }

  has(name: string): boolean {
    return this._entries.has(name);
  }

  names(): string[] {
    return [...this._entries.keys()];
  }

  /**
   * Resolve `name` to a declaration, resolving nested names recursively.
   *
   * @throws ConfigurationError for an unknown name or a reference cycle.
   */
  get(name: string): StructDeclaration {
    return this._resolve(name, []);
  }

  compile(name: string, options?: CompileOptions): CompiledSchema {
    return compileSchema(this.get(name), options);
  }

  // ── Internals ─────────────────────────────────────────────────────────────

  private _add(name: string, entry: Entry): void {
    if (typeof name !== 'string' || name.length === 0) {
      throw new ConfigurationError('Structure name must be a non-empty string.');
    }
    if (isPrimitiveKind(name) || name === 'bytes' || name === 'text') {
      throw new ConfigurationError(`Structure name '${name}' collides with a built-in type.`, name);
    }
    if (this._entries.has(name)) {
      throw new ConfigurationError(`Structure '${name}' is already registered.`, name);
    }
    this._entries.set(name, entry);
  }

  private _resolve(name: string, stack: readonly string[]): StructDeclaration {
    const cached = this._resolved.get(name);
    if (cached !== undefined) return cached;

    const where = [...stack, name].join(' → ');
    if (stack.includes(name)) {
      throw new ConfigurationError(
        `Structure '${name}' references itself (${where}). A recursive structure has no fixed size.`,
        name,
      );
    }

    const entry = this._entries.get(name);
    if (entry === undefined) {
      throw new ConfigurationError(
        stack.length === 0
          ? `Unknown structure '${name}'.`
          : `Unknown structure '${name}' referenced from ${stack.join(' → ')}.`,
        name,
      );
    }

    let declaration: StructDeclaration;
    if (entry.kind === 'declared') {
      declaration = entry.declaration;
    } else {
      const inner  = [...stack, name];
      const fields = entry.fields.map((field): FieldDeclaration => {
        const { type, ...rest } = field;
        if (isPrimitiveKind(type) || type === 'bytes' || type === 'text') {
          return { ...rest, type };
        }
        return { ...rest, type: this._resolve(type, inner) };
      });
      declaration = defineStruct(name, fields);
    }

    this._resolved.set(name, declaration);
    return declaration;
  }
}

// ─── Document Validation ──────────────────────────────────────────────────────

function parseDocument(document: unknown): DeclarationDocument {
  const raw = isPlainRecord(document) ? document['structs'] : undefined;
  if (!isPlainRecord(raw)) {
    throw new ConfigurationError(`Declaration document must be an object with a 'structs' object.`);
  }

  const structs: Record<string, readonly FieldDocument[]> = {};
  for (const [name, fields] of Object.entries(raw)) {
    if (RESERVED_FIELD_NAMES.has(name)) {
      throw new ConfigurationError(`Structure name '${name}' is reserved.`, name);
    }
    if (!Array.isArray(fields)) {
      throw new ConfigurationError(`Structure '${name}' must be an array of fields.`, name);
    }
    structs[name] = fields.map((field: unknown, i: number) => parseField(field, `${name}[${i}]`));
  }
  return { structs };
}

function parseField(field: unknown, where: string): FieldDocument {
  if (!isPlainRecord(field)) {
    throw new ConfigurationError(`Field ${where} must be an object.`, where);
  }

  const { name, type, length, count, encoding } = field;
  const fallback = field['default'];

  if (typeof name !== 'string') {
    throw new ConfigurationError(`Field ${where} needs a string 'name'.`, where);
  }
  if (typeof type !== 'string') {
    throw new ConfigurationError(`Field ${where} ('${name}') needs a string 'type'.`, where);
  }
  if (length !== undefined && typeof length !== 'number') {
    throw new ConfigurationError(`Field ${where} ('${name}') has a non-numeric 'length'.`, where);
  }
  if (count !== undefined && typeof count !== 'number') {
    throw new ConfigurationError(`Field ${where} ('${name}') has a non-numeric 'count'.`, where);
  }
  if (encoding !== undefined && !isTextEncoding(encoding)) {
    throw new ConfigurationError(
      `Field ${where} ('${name}') has encoding ${JSON.stringify(encoding)}; ` +
      `expected one of ${TEXT_ENCODINGS.join(', ')}.`,
      where,
    );
  }
  if (fallback !== undefined && typeof fallback !== 'number' && typeof fallback !== 'string') {
    throw new ConfigurationError(`Field ${where} ('${name}') has a default that is neither number nor string.`, where);
  }

  return {
    name,
    type,
    ...(length   !== undefined ? { length }            : {}),
    ...(count    !== undefined ? { count }             : {}),
    ...(encoding !== undefined ? { encoding }          : {}),
    ...(fallback !== undefined ? { default: fallback } : {}),
  };
}

function isTextEncoding(value: unknown): value is TextEncodingName {
  return TEXT_ENCODINGS.some(encoding => encoding === value);
}
