/**
 * @bytemold/core — record encoder
 *
 * The inverse of StructReader.build(): a value shaped like the declaration
 * goes in, exactly schema.totalSize bytes come out.
 *
 * Encoding mirrors decoding pass for pass:
 *
 *   1. flatten  — walk the Schema Node tree depth-first over the value,
 *                 filling in declared defaults, and collect one input per
 *                 flattened leaf
 *   2. validate — check each input against its leaf (type, range, width)
 *   3. write    — store each leaf at its compiled byte offset
 *
 * Steps 1–3 run against a scratch buffer. The caller's buffer is only
 * touched once the whole record has been encoded, so a TypeError or
 * RangeError never leaves a half-written record behind.
 *
 * Coercion rules (no silent truncation):
 *   u8…u32, i8…i32  integral number within range
 *   u64, i64        bigint, or a safe-integer number, within range
 *   f32, f64        any number (f32 rounds to single precision)
 *   bytes           Uint8Array of at most `length` bytes, zero-padded
 *   text            string whose encoding fits `length` bytes, zero-padded;
 *                   must not end in U+0000, which decodes as padding
 *   lists           array of exactly `count` elements
 */

import { match } from 'ts-pattern';

import { isPlainRecord } from './construct';
import {
  PRIMITIVES,
  encodeText,
  endsInNul,
  normalizePrimitive,
  writePrimitive,
} from './primitives';
import type {
  CompiledLayout,
  CompiledSchema,
  FieldDeclaration,
  SchemaNode,
  StructInput,
  TerminalNode,
} from './types';

// ─── Public API ───────────────────────────────────────────────────────────────

/** Encode one record into a new buffer of schema.totalSize bytes. */
export function encodeRecord<F extends readonly FieldDeclaration[]>(
  schema: CompiledSchema<F>,
  value:  StructInput<F>,
): Uint8Array {
  const out = new Uint8Array(schema.totalSize);
  writeLeaves(schema, flattenValue(schema, value), out);
  return out;
}

/**
 * Encode one record into `target` at `offset`. Returns the number of bytes
 * written, always schema.totalSize.
 *
 * @throws RangeError if target has fewer than offset + totalSize bytes.
 * @throws TypeError / RangeError if the value does not fit the schema;
 *         target is not modified in that case.
 */
export function encodeRecordInto<F extends readonly FieldDeclaration[]>(
  schema: CompiledSchema<F>,
  value:  StructInput<F>,
  target: Uint8Array,
  offset = 0,
): number {
  if (!Number.isInteger(offset) || offset < 0 || offset + schema.totalSize > target.length) {
    throw new RangeError(
      `encodeRecordInto: a ${schema.totalSize}-byte record does not fit ` +
      `at offset ${offset} of a ${target.length}-byte buffer.`,
    );
  }
  target.set(encodeRecord(schema, value), offset);
  return schema.totalSize;
}

/** Encode records back to back, as they would arrive on a stream. */
export function encodeRecords<F extends readonly FieldDeclaration[]>(
  schema: CompiledSchema<F>,
  values: readonly StructInput<F>[],
): Uint8Array {
  const out = new Uint8Array(schema.totalSize * values.length);
  values.forEach((value, i) => {
    encodeRecordInto(schema, value, out, i * schema.totalSize);
  });
  return out;
}

// ─── Flatten ──────────────────────────────────────────────────────────────────

function flattenValue(layout: CompiledLayout, value: unknown): unknown[] {
  const out: unknown[] = [];
  collect(layout.root, value, '', out);
  return out;
}

function collect(node: SchemaNode, value: unknown, path: string, out: unknown[]): void {
  match<SchemaNode, void>(node)
    .with({ kind: 'composite' }, (composite) => {
      if (!isPlainRecord(value)) {
        throw new TypeError(
          `${path === '' ? 'Record' : `Field '${path}'`} must be an object ` +
          `for structure '${composite.name}', got ${describe(value)}.`,
        );
      }
      const record = value;
      for (const field of composite.fields) {
        const fieldPath  = path === '' ? field.name : `${path}.${field.name}`;
        const fieldValue = record[field.name] ?? field.default;
        if (fieldValue === undefined) {
          throw new TypeError(`Field '${fieldPath}' is missing and declares no default.`);
        }
        collect(field.node, fieldValue, fieldPath, out);
      }
    })
    .with({ kind: 'list' }, (list) => {
      if (!Array.isArray(value)) {
        throw new TypeError(`Field '${path}' must be an array of ${list.count}, got ${describe(value)}.`);
      }
      if (value.length !== list.count) {
        throw new RangeError(`Field '${path}' has ${value.length} elements; the list holds exactly ${list.count}.`);
      }
      value.forEach((item: unknown, i: number) => collect(list.element, item, `${path}[${i}]`, out));
    })
    .with({ kind: 'leaf' }, { kind: 'blob' }, { kind: 'text' }, () => {
      out.push(value);
    })
    .exhaustive();
}

// ─── Write ────────────────────────────────────────────────────────────────────

function writeLeaves(layout: CompiledLayout, values: readonly unknown[], bytes: Uint8Array): void {
  if (values.length !== layout.leaves.length) {
    throw new Error(
      `writeLeaves: collected ${values.length} values for ${layout.leaves.length} leaves; ` +
      `the schema tree and the flattened leaves disagree.`,
    );
  }

  const view         = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const littleEndian = layout.byteOrder === 'little';

  layout.leaves.forEach((leaf, i) => {
    const value  = values[i];
    const offset = leaf.byteOffset;

    match<TerminalNode, void>(leaf.node)
      .with({ kind: 'leaf' }, (node) => {
        const desc = PRIMITIVES[node.primitive];
        writePrimitive(desc, view, offset, normalizePrimitive(desc, value, leaf.path), littleEndian);
      })
      .with({ kind: 'blob' }, (node) => {
        if (!(value instanceof Uint8Array)) {
          throw new TypeError(`Field '${leaf.path}' (bytes) received ${describe(value)}; expected Uint8Array.`);
        }
        if (value.length > node.size) {
          throw new RangeError(`Field '${leaf.path}' received ${value.length} bytes; the field holds ${node.size}.`);
        }
        bytes.set(value, offset);
      })
      .with({ kind: 'text' }, (node) => {
        if (typeof value !== 'string') {
          throw new TypeError(`Field '${leaf.path}' (text) received ${describe(value)}; expected string.`);
        }
        const encoded = encodeText(value, node.encoding);
        if (encoded === null) {
          throw new RangeError(`Field '${leaf.path}' contains characters outside ${node.encoding}.`);
        }
        if (encoded.length > node.size) {
          throw new RangeError(
            `Field '${leaf.path}' encodes to ${encoded.length} bytes of ${node.encoding}; ` +
            `the field holds ${node.size}.`,
          );
        }
        if (endsInNul(encoded)) {
          throw new RangeError(`Field '${leaf.path}' ends in U+0000, which would decode as padding.`);
        }
        bytes.set(encoded, offset);
      })
      .exhaustive();
  });
}

function describe(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  if (value instanceof Uint8Array) return 'Uint8Array';
  return typeof value;
}
