/**
 * @bytemold/core — structure declarations, schema compiler, layout fingerprint
 *
 * compileSchema() walks a declaration depth-first, pre-order, and produces:
 *
 *   root       — the immutable Schema Node tree
 *   leaves     — every leaf / blob / text node in traversal order, lists
 *                unrolled, each with its byte offset from the record start
 *   totalSize  — root.size, fixed for the lifetime of the schema
 *
 * Each composite is first compiled in its own coordinate space (offsets
 * from its own first byte); a parent shifts the child's leaves by the
 * running offset at which the child field starts.
 *
 * Compiled layouts are cached per declaration object and byte order, for
 * declarations that are frozen throughout. defineStruct() freezes
 * declarations; a hand-built declaration is recompiled on every call.
 */

import { match } from 'ts-pattern';

import {
  BLOB_CODE,
  BYTE_ORDER_PREFIX,
  DEFAULT_BYTE_ORDER,
  DEFAULT_TEXT_ENCODING,
  RESERVED_FIELD_NAMES,
  TEXT_CODE,
  TEXT_ENCODINGS,
} from './constants';
import {
  PRIMITIVES,
  encodeText,
  endsInNul,
  isPrimitiveKind,
  normalizePrimitive,
} from './primitives';
import type {
  ByteOrder,
  CompileOptions,
  CompiledLayout,
  CompiledSchema,
  CompositeField,
  CompositeNode,
  DefaultValue,
  FieldDeclaration,
  FlatLeaf,
  ListNode,
  SchemaNode,
  StructDeclaration,
  TerminalNode,
} from './types';

// ─── Errors ───────────────────────────────────────────────────────────────────

/**
 * Thrown when a declaration cannot be compiled. Always fatal for that
 * declaration: no partially compiled schema is returned or cached.
 *
 * `path` is the dotted location of the offending field, starting at the
 * root structure name (`Account.recent.amount`).
 */
export class ConfigurationError extends Error {
  readonly path: string;

  constructor(message: string, path = '') {
    super(message);
    this.name = 'ConfigurationError';
    this.path = path;
  }
}

// ─── Declarations ─────────────────────────────────────────────────────────────

/**
 * Declare a structure. Field order is wire order.
 *
 *   const Transaction = defineStruct('Transaction', [
 *     { name: 'amount',   type: 'f32' },
 *     { name: 'sender',   type: 'u64' },
 *     { name: 'receiver', type: 'u64' },
 *   ]);
 *
 *   const Account = defineStruct('Account', [
 *     { name: 'id',      type: 'u64' },
 *     { name: 'balance', type: 'f32' },
 *     { name: 'owner',   type: 'text', length: 16 },
 *     { name: 'recent',  type: Transaction, count: 3 },
 *   ]);
 *
 * The declaration is frozen; validation happens in compileSchema().
 */
export function defineStruct<const F extends readonly FieldDeclaration[]>(
  name:   string,
  fields: F,
): StructDeclaration<F> {
  for (const field of fields) Object.freeze(field);
  Object.freeze(fields);
  const declaration: StructDeclaration<F> = { name, fields };
  Object.freeze(declaration);
  return declaration;
}

// ─── Compiler ─────────────────────────────────────────────────────────────────

interface Compiled {
  readonly node:   SchemaNode;
  /** Offsets local to `node`; paths relative to it ('' for a terminal). */
  readonly leaves: readonly FlatLeaf[];
}

interface CompiledComposite extends Compiled {
  readonly node: CompositeNode;
}

const layoutCache = new WeakMap<StructDeclaration, Map<ByteOrder, CompiledLayout>>();

/**
 * Compile a structure declaration.
 *
 * @throws ConfigurationError on the first invalid field; see compileField()
 *         for the full list of checks.
 */
export function compileSchema<F extends readonly FieldDeclaration[]>(
  declaration: StructDeclaration<F>,
  options:     CompileOptions = {},
): CompiledSchema<F> {
  const byteOrder = options.byteOrder ?? DEFAULT_BYTE_ORDER;
  if (byteOrder !== 'little' && byteOrder !== 'big') {
    throw new ConfigurationError(
      `compileSchema: unknown byte order '${String(byteOrder)}'; expected 'little' or 'big'.`,
    );
  }

  let byOrder = layoutCache.get(declaration);
  let layout  = byOrder?.get(byteOrder);

  if (layout === undefined) {
    const compiled = compileStruct(declaration, new Set(), declarationName(declaration));
    layout = Object.freeze({
      root:      compiled.node,
      leaves:    Object.freeze(compiled.leaves.slice()),
      totalSize: compiled.node.size,
      byteOrder,
    });
    if (isFrozenDeclaration(declaration)) {
      if (byOrder === undefined) {
        byOrder = new Map();
        layoutCache.set(declaration, byOrder);
      }
      byOrder.set(byteOrder, layout);
    }
  }

  return Object.freeze({ ...layout, declaration });
}

/**
 * Only declarations frozen all the way down are cached; anything else can
 * change under a cached layout. Called after a successful compile, so the
 * nesting is known to be acyclic.
 */
function isFrozenDeclaration(declaration: StructDeclaration): boolean {
  return (
    Object.isFrozen(declaration) &&
    Object.isFrozen(declaration.fields) &&
    declaration.fields.every(field =>
      Object.isFrozen(field) &&
      (typeof field.type === 'string' || isFrozenDeclaration(field.type)))
  );
}

function declarationName(declaration: StructDeclaration): string {
  return typeof declaration.name === 'string' && declaration.name.length > 0
    ? declaration.name
    : '<anonymous>';
}

function compileStruct(
  declaration: StructDeclaration,
  visiting:    Set<StructDeclaration>,
  where:       string,
): CompiledComposite {
  if (visiting.has(declaration)) {
    throw new ConfigurationError(
      `Structure '${declarationName(declaration)}' contains itself (at ${where}). ` +
      `A recursive structure has no fixed size.`,
      where,
    );
  }
  if (!Array.isArray(declaration.fields)) {
    throw new ConfigurationError(
      `Structure '${declarationName(declaration)}' has no fields array (at ${where}).`,
      where,
    );
  }
  if (declaration.fields.length === 0) {
    throw new ConfigurationError(
      `Structure '${declarationName(declaration)}' declares no fields (at ${where}). ` +
      `A zero-size record would complete before any byte arrives.`,
      where,
    );
  }

  visiting.add(declaration);

  const seen   = new Set<string>();
  const fields: CompositeField[] = [];
  const leaves: FlatLeaf[] = [];
  let   offset = 0;

  for (const field of declaration.fields) {
    const fieldWhere = `${where}.${describeName(field)}`;
    if (typeof field.name !== 'string' || field.name.length === 0) {
      throw new ConfigurationError(`Field name must be a non-empty string (at ${fieldWhere}).`, fieldWhere);
    }
    if (RESERVED_FIELD_NAMES.has(field.name)) {
      throw new ConfigurationError(`Field name '${field.name}' is reserved (at ${fieldWhere}).`, fieldWhere);
    }
    if (seen.has(field.name)) {
      throw new ConfigurationError(
        `Duplicate field name '${field.name}' in structure '${declarationName(declaration)}'.`,
        fieldWhere,
      );
    }
    seen.add(field.name);

    const compiled = compileField(field, visiting, fieldWhere);
    const entry: CompositeField = field.default === undefined
      ? { name: field.name, node: compiled.node }
      : { name: field.name, node: compiled.node, default: field.default };
    fields.push(Object.freeze(entry));

    for (const leaf of compiled.leaves) {
      leaves.push(Object.freeze({
        path:       joinPath(field.name, leaf.path),
        byteOffset: offset + leaf.byteOffset,
        node:       leaf.node,
      }));
    }
    offset += compiled.node.size;
  }

  visiting.delete(declaration);

  const node: CompositeNode = Object.freeze({
    kind:   'composite',
    name:   declarationName(declaration),
    fields: Object.freeze(fields),
    size:   offset,
  });
  return { node, leaves };
}

/**
 * Compile one field. Fails when:
 *   - the type is not a primitive kind, 'bytes', 'text' or a structure
 *   - bytes/text has no length, or length is given for another type
 *   - length or count is not a positive integer
 *   - encoding is given for a non-text field or is unknown
 *   - default is given on a list or structure field, or does not fit
 */
function compileField(
  field:    FieldDeclaration,
  visiting: Set<StructDeclaration>,
  where:    string,
): Compiled {
  const { type, length, count, encoding } = field;
  const isBlob = type === 'bytes' || type === 'text';

  if (length !== undefined && !isBlob) {
    throw new ConfigurationError(
      `Field '${where}' declares length ${String(length)}, but only bytes and text fields take a length.`,
      where,
    );
  }
  if (encoding !== undefined && type !== 'text') {
    throw new ConfigurationError(`Field '${where}' declares an encoding, but it is not a text field.`, where);
  }

  let element: Compiled;
  if (isPrimitiveKind(type)) {
    element = terminal(Object.freeze({ kind: 'leaf', primitive: type, size: PRIMITIVES[type].byteWidth }));
  } else if (type === 'bytes') {
    element = terminal(Object.freeze({ kind: 'blob', size: requirePositive(length, 'length', where) }));
  } else if (type === 'text') {
    const resolved = encoding ?? DEFAULT_TEXT_ENCODING;
    if (!TEXT_ENCODINGS.includes(resolved)) {
      throw new ConfigurationError(
        `Field '${where}' has unknown encoding '${String(resolved)}'; ` +
        `expected one of ${TEXT_ENCODINGS.join(', ')}.`,
        where,
      );
    }
    element = terminal(Object.freeze({
      kind:     'text',
      size:     requirePositive(length, 'length', where),
      encoding: resolved,
    }));
  } else if (isStructDeclaration(type)) {
    element = compileStruct(type, visiting, where);
  } else {
    throw new ConfigurationError(
      `Field '${where}' has unsupported type ${describeType(type)}. ` +
      `Expected a primitive kind (${Object.keys(PRIMITIVES).join(', ')}), 'bytes', 'text' ` +
      `or a structure declared with defineStruct().`,
      where,
    );
  }

  if (field.default !== undefined) {
    validateDefault(element.node, field.default, count, where);
  }

  if (count === undefined) return element;

  const n    = requirePositive(count, 'count', where);
  const list: ListNode = Object.freeze({ kind: 'list', element: element.node, count: n, size: n * element.node.size });

  // Unroll: `count` consecutive copies of the element's leaves.
  const leaves: FlatLeaf[] = [];
  for (let i = 0; i < n; i++) {
    for (const leaf of element.leaves) {
      leaves.push({
        path:       joinPath(`[${i}]`, leaf.path),
        byteOffset: i * element.node.size + leaf.byteOffset,
        node:       leaf.node,
      });
    }
  }
  return { node: list, leaves };
}

function terminal(node: TerminalNode): Compiled {
  return { node, leaves: [{ path: '', byteOffset: 0, node }] };
}

function requirePositive(value: number | undefined, what: 'length' | 'count', where: string): number {
  if (value === undefined) {
    throw new ConfigurationError(`Field '${where}' requires a ${what}.`, where);
  }
  if (typeof value !== 'number' || !Number.isInteger(value) || value <= 0) {
    throw new ConfigurationError(
      `Field '${where}' has ${what} ${String(value)}; ${what} must be a positive integer.`,
      where,
    );
  }
  return value;
}

function validateDefault(
  node:  SchemaNode,
  value: DefaultValue,
  count: number | undefined,
  where: string,
): void {
  if (count !== undefined) {
    throw new ConfigurationError(`Field '${where}' is a list; list fields cannot declare a default.`, where);
  }
  try {
    match<SchemaNode, void>(node)
      .with({ kind: 'leaf' }, (leaf) => {
        normalizePrimitive(PRIMITIVES[leaf.primitive], value, where);
      })
      .with({ kind: 'blob' }, (blob) => {
        if (!(value instanceof Uint8Array)) {
          throw new TypeError(`default must be a Uint8Array, got ${typeof value}.`);
        }
        if (value.length > blob.size) {
          throw new RangeError(`default is ${value.length} bytes; field holds ${blob.size}.`);
        }
      })
      .with({ kind: 'text' }, (text) => {
        if (typeof value !== 'string') {
          throw new TypeError(`default must be a string, got ${typeof value}.`);
        }
        const encoded = encodeText(value, text.encoding);
        if (encoded === null || encoded.length > text.size) {
          throw new RangeError(`default does not fit ${text.size} bytes of ${text.encoding}.`);
        }
        if (endsInNul(encoded)) {
          throw new RangeError(`default ends in U+0000, which would decode as padding.`);
        }
      })
      .with({ kind: 'composite' }, { kind: 'list' }, () => {
        throw new ConfigurationError(`Field '${where}' is a structure; structure fields cannot declare a default.`, where);
      })
      .exhaustive();
  } catch (err) {
    if (err instanceof ConfigurationError) throw err;
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigurationError(`Field '${where}' has an invalid default: ${reason}`, where);
  }
}

function isStructDeclaration(value: unknown): value is StructDeclaration {
  return (
    typeof value === 'object' && value !== null &&
    'fields' in value && Array.isArray(value.fields)
  );
}

function describeName(field: FieldDeclaration): string {
  return typeof field.name === 'string' && field.name.length > 0 ? field.name : '?';
}

function describeType(type: unknown): string {
  if (typeof type === 'string') return `'${type}'`;
  if (type === null) return 'null';
  return typeof type;
}

/** `recent` + `[2]` → `recent[2]`; `recent[2]` + `amount` → `recent[2].amount`. */
function joinPath(prefix: string, rest: string): string {
  if (rest === '') return prefix;
  if (rest.startsWith('[')) return prefix + rest;
  return `${prefix}.${rest}`;
}

// ─── Layout Pattern ───────────────────────────────────────────────────────────

/**
 * Render a compiled layout as a compact format string: the byte order
 * prefix, then one code per flattened leaf.
 *
 *   { id: u64, balance: f32 }       → '<Qf'
 *   { tag: bytes(4), name: text(8) } → '<4p8s'
 */
export function layoutPattern(layout: CompiledLayout): string {
  let pattern = BYTE_ORDER_PREFIX[layout.byteOrder];
  for (const leaf of layout.leaves) {
    pattern += match(leaf.node)
      .with({ kind: 'leaf' }, (node) => PRIMITIVES[node.primitive].code)
      .with({ kind: 'blob' }, (node) => `${node.size}${BLOB_CODE}`)
      .with({ kind: 'text' }, (node) => `${node.size}${TEXT_CODE}`)
      .exhaustive();
  }
  return pattern;
}

// ─── Fingerprint ──────────────────────────────────────────────────────────────

const patternEncoder = new TextEncoder();

/**
 * FNV-1a 32-bit hash.
 * Math.imul() is a native 32-bit integer multiply — avoids float precision loss
 * that would occur with the plain * operator on large numbers.
 */
function fnv1a32(bytes: Uint8Array): number {
  let hash = 0x811c9dc5; // FNV offset basis
  for (const byte of bytes) {
    hash ^= byte;
    hash  = Math.imul(hash, 0x01000193); // FNV prime
  }
  return hash >>> 0; // coerce to u32
}

/**
 * FNV-1a 32-bit fingerprint of layoutPattern(layout).
 *
 * Covers byte order, leaf kinds, widths and order — not names. Two
 * declarations that put the same bytes in the same places share a
 * fingerprint.
 */
export function schemaFingerprint(layout: CompiledLayout): number {
  return fnv1a32(patternEncoder.encode(layoutPattern(layout)));
}
