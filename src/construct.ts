/**
 * @bytemold/core — leaf decoding and value construction
 *
 * Decoding happens in two passes over a complete record:
 *
 *   1. decodeLeaves()   — read every flattened leaf at its recorded offset
 *   2. constructValue() — retrace the Schema Node tree depth-first and hand
 *                         each terminal node the next decoded leaf
 *
 * Both passes use the same traversal order the compiler used to flatten
 * the tree, so leaf i always lands in the field that produced leaf i. A
 * count mismatch between the two means the schema and the decoder
 * disagree; that is a bug, not a data error, and throws a plain Error.
 */

import { match } from 'ts-pattern';

import { PRIMITIVES, decodeText, readPrimitive } from './primitives';
import type {
  CompiledLayout,
  CompiledSchema,
  CompositeNode,
  DecodedRecord,
  DecodedValue,
  FieldDeclaration,
  FlatLeaf,
  SchemaNode,
  StructValue,
  TerminalNode,
} from './types';

// ─── Errors ───────────────────────────────────────────────────────────────────

/**
 * Thrown when a text field's bytes are not valid under its encoding.
 * The record's bytes are left as they were.
 */
export class DecodeError extends Error {
  readonly path:       string;
  readonly byteOffset: number;

  constructor(message: string, path: string, byteOffset: number) {
    super(message);
    this.name       = 'DecodeError';
    this.path       = path;
    this.byteOffset = byteOffset;
  }
}

// ─── Leaf Decoding ────────────────────────────────────────────────────────────

/**
 * Decode every flattened leaf of `layout` from `bytes`.
 *
 * `bytes` must hold at least layout.totalSize bytes starting at index 0.
 * Blob values are copies, so they stay valid after the source buffer is
 * reset or reused.
 *
 * @throws DecodeError if a text leaf is not decodable.
 */
export function decodeLeaves(layout: CompiledLayout, bytes: Uint8Array): DecodedValue[] {
  if (bytes.length < layout.totalSize) {
    throw new RangeError(
      `decodeLeaves: need ${layout.totalSize} bytes, got ${bytes.length}.`,
    );
  }
  const view         = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const littleEndian = layout.byteOrder === 'little';
  return layout.leaves.map(leaf => decodeLeaf(leaf, bytes, view, littleEndian));
}

function decodeLeaf(
  leaf:         FlatLeaf,
  bytes:        Uint8Array,
  view:         DataView,
  littleEndian: boolean,
): DecodedValue {
  const start = leaf.byteOffset;
  return match<TerminalNode, DecodedValue>(leaf.node)
    .with({ kind: 'leaf' }, (node) =>
      readPrimitive(PRIMITIVES[node.primitive], view, start, littleEndian))
    .with({ kind: 'blob' }, (node) => bytes.slice(start, start + node.size))
    .with({ kind: 'text' }, (node) => {
      const text = decodeText(bytes.subarray(start, start + node.size), node.encoding);
      if (text === null) {
        throw new DecodeError(
          `Field '${leaf.path}' at byte ${start} is not valid ${node.encoding} ` +
          `(${node.size}-byte text field).`,
          leaf.path,
          start,
        );
      }
      return text;
    })
    .exhaustive();
}

// ─── Value Construction ───────────────────────────────────────────────────────

/**
 * Rebuild the nested value for `root` from decoded leaves in flattened
 * order: composites become objects with fields in declared order, lists
 * become arrays of exactly `count` elements, and every leaf / blob / text
 * node consumes one value.
 */
export function constructValue(root: CompositeNode, values: readonly DecodedValue[]): DecodedRecord {
  let next = 0;

  const take = (): DecodedValue => {
    const value = values[next];
    if (value === undefined) {
      throw new Error(
        `constructValue: ran out of leaf values at index ${next}; ` +
        `the schema tree and the flattened leaves disagree.`,
      );
    }
    next++;
    return value;
  };

  const buildComposite = (node: CompositeNode): DecodedRecord => {
    const record: DecodedRecord = {};
    for (const field of node.fields) {
      record[field.name] = build(field.node);
    }
    return record;
  };

  const build = (node: SchemaNode): DecodedValue =>
    match<SchemaNode, DecodedValue>(node)
      .with({ kind: 'composite' }, (composite) => buildComposite(composite))
      .with({ kind: 'list' }, (list) => {
        const items: DecodedValue[] = [];
        for (let i = 0; i < list.count; i++) items.push(build(list.element));
        return items;
      })
      .with({ kind: 'leaf' }, { kind: 'blob' }, { kind: 'text' }, () => take())
      .exhaustive();

  const record = buildComposite(root);
  if (next !== values.length) {
    throw new Error(
      `constructValue: consumed ${next} of ${values.length} leaf values; ` +
      `the schema tree and the flattened leaves disagree.`,
    );
  }
  return record;
}

// ─── Shape Check ──────────────────────────────────────────────────────────────

/**
 * True when `value` has exactly the shape `schema` decodes to: every
 * declared field present with the right JavaScript type, lists of the
 * declared length, blobs of the declared width.
 */
export function isStructValue<F extends readonly FieldDeclaration[]>(
  schema: CompiledSchema<F>,
  value:  unknown,
): value is StructValue<F> {
  return conforms(schema.root, value);
}

function conforms(node: SchemaNode, value: unknown): boolean {
  return match<SchemaNode, boolean>(node)
    .with({ kind: 'leaf' }, (leaf) =>
      PRIMITIVES[leaf.primitive].repr === 'bigint'
        ? typeof value === 'bigint'
        : typeof value === 'number')
    .with({ kind: 'blob' }, (blob) => value instanceof Uint8Array && value.length === blob.size)
    .with({ kind: 'text' }, () => typeof value === 'string')
    .with({ kind: 'list' }, (list) =>
      Array.isArray(value) &&
      value.length === list.count &&
      value.every((item: unknown) => conforms(list.element, item)))
    .with({ kind: 'composite' }, (composite) => {
      if (!isPlainRecord(value)) return false;
      const record = value;
      return composite.fields.every(field => conforms(field.node, record[field.name]));
    })
    .exhaustive();
}

export function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === 'object' && value !== null &&
    !Array.isArray(value) && !ArrayBuffer.isView(value)
  );
}
