/**
 * @bytemold/core — primitive type table and text codec
 *
 * Every numeric kind maps to one descriptor: byte width, layout code and a
 * DataView read / write pair. The table is constant; nothing mutates it.
 *
 * Descriptors fall into two representations:
 *
 *   number — u8…u32, i8…i32, f32, f64
 *   bigint — u64, i64
 *
 * so that read() and write() stay monomorphic per kind and a 64-bit value
 * never passes through a double.
 */

import type { PrimitiveKind, TextEncodingName } from './types';

// ─── Descriptors ──────────────────────────────────────────────────────────────

interface NumberDescriptor {
  readonly kind:      PrimitiveKind;
  readonly byteWidth: number;
  readonly code:      string;
  readonly repr:      'int' | 'float';
  readonly min:       number;
  readonly max:       number;
  read(view: DataView, offset: number, littleEndian: boolean): number;
  write(view: DataView, offset: number, value: number, littleEndian: boolean): void;
}

interface BigIntDescriptor {
  readonly kind:      PrimitiveKind;
  readonly byteWidth: number;
  readonly code:      string;
  readonly repr:      'bigint';
  readonly min:       bigint;
  readonly max:       bigint;
  read(view: DataView, offset: number, littleEndian: boolean): bigint;
  write(view: DataView, offset: number, value: bigint, littleEndian: boolean): void;
}

export type PrimitiveDescriptor = NumberDescriptor | BigIntDescriptor;

export const PRIMITIVES: Readonly<Record<PrimitiveKind, PrimitiveDescriptor>> = {
  u8: {
    kind: 'u8', byteWidth: 1, code: 'B', repr: 'int', min: 0, max: 0xff,
    read:  (view, offset) => view.getUint8(offset),
    write: (view, offset, value) => view.setUint8(offset, value),
  },
  i8: {
    kind: 'i8', byteWidth: 1, code: 'b', repr: 'int', min: -0x80, max: 0x7f,
    read:  (view, offset) => view.getInt8(offset),
    write: (view, offset, value) => view.setInt8(offset, value),
  },
  u16: {
    kind: 'u16', byteWidth: 2, code: 'H', repr: 'int', min: 0, max: 0xffff,
    read:  (view, offset, le) => view.getUint16(offset, le),
    write: (view, offset, value, le) => view.setUint16(offset, value, le),
  },
  i16: {
    kind: 'i16', byteWidth: 2, code: 'h', repr: 'int', min: -0x8000, max: 0x7fff,
    read:  (view, offset, le) => view.getInt16(offset, le),
    write: (view, offset, value, le) => view.setInt16(offset, value, le),
  },
  u32: {
    kind: 'u32', byteWidth: 4, code: 'I', repr: 'int', min: 0, max: 0xffffffff,
    read:  (view, offset, le) => view.getUint32(offset, le),
    write: (view, offset, value, le) => view.setUint32(offset, value, le),
  },
  i32: {
    kind: 'i32', byteWidth: 4, code: 'i', repr: 'int', min: -0x80000000, max: 0x7fffffff,
    read:  (view, offset, le) => view.getInt32(offset, le),
    write: (view, offset, value, le) => view.setInt32(offset, value, le),
  },
  u64: {
    kind: 'u64', byteWidth: 8, code: 'Q', repr: 'bigint', min: 0n, max: (1n << 64n) - 1n,
    read:  (view, offset, le) => view.getBigUint64(offset, le),
    write: (view, offset, value, le) => view.setBigUint64(offset, value, le),
  },
  i64: {
    kind: 'i64', byteWidth: 8, code: 'q', repr: 'bigint', min: -(1n << 63n), max: (1n << 63n) - 1n,
    read:  (view, offset, le) => view.getBigInt64(offset, le),
    write: (view, offset, value, le) => view.setBigInt64(offset, value, le),
  },
  f32: {
    kind: 'f32', byteWidth: 4, code: 'f', repr: 'float', min: -Infinity, max: Infinity,
    read:  (view, offset, le) => view.getFloat32(offset, le),
    write: (view, offset, value, le) => view.setFloat32(offset, value, le),
  },
  f64: {
    kind: 'f64', byteWidth: 8, code: 'd', repr: 'float', min: -Infinity, max: Infinity,
    read:  (view, offset, le) => view.getFloat64(offset, le),
    write: (view, offset, value, le) => view.setFloat64(offset, value, le),
  },
};

export function isPrimitiveKind(value: unknown): value is PrimitiveKind {
  return typeof value === 'string' && Object.hasOwn(PRIMITIVES, value);
}

// ─── Read / Write ─────────────────────────────────────────────────────────────

export function readPrimitive(
  desc:         PrimitiveDescriptor,
  view:         DataView,
  offset:       number,
  littleEndian: boolean,
): number | bigint {
  return desc.read(view, offset, littleEndian);
}

/** Write a value already checked by normalizePrimitive(). */
export function writePrimitive(
  desc:         PrimitiveDescriptor,
  view:         DataView,
  offset:       number,
  value:        number | bigint,
  littleEndian: boolean,
): void {
  if (desc.repr === 'bigint') {
    desc.write(view, offset, typeof value === 'bigint' ? value : BigInt(value), littleEndian);
  } else {
    desc.write(view, offset, typeof value === 'number' ? value : Number(value), littleEndian);
  }
}

/**
 * Check that `value` is representable by `desc` without loss.
 *
 * Integer kinds take integral numbers inside [min, max]. 64-bit kinds take
 * a bigint, or a number that is a safe integer. Float kinds take any number;
 * f32 rounds to single precision on write, but a finite number that would
 * round to ±Infinity is rejected.
 *
 * @throws TypeError  when the JavaScript type is wrong.
 * @throws RangeError when the value is out of range or not integral.
 */
export function normalizePrimitive(
  desc:  PrimitiveDescriptor,
  value: unknown,
  path:  string,
): number | bigint {
  if (desc.repr === 'bigint') {
    let big: bigint;
    if (typeof value === 'bigint') {
      big = value;
    } else if (typeof value === 'number') {
      if (!Number.isSafeInteger(value)) {
        throw new RangeError(
          `Field '${path}' (${desc.kind}) received ${value}; ` +
          `numbers must be safe integers, pass a bigint for larger values.`,
        );
      }
      big = BigInt(value);
    } else {
      throw new TypeError(`Field '${path}' (${desc.kind}) received ${typeof value}; expected bigint.`);
    }
    if (big < desc.min || big > desc.max) {
      throw new RangeError(
        `Field '${path}' (${desc.kind}) value ${big} is outside [${desc.min}, ${desc.max}].`,
      );
    }
    return big;
  }

  if (typeof value !== 'number') {
    throw new TypeError(`Field '${path}' (${desc.kind}) received ${typeof value}; expected number.`);
  }
  if (desc.repr === 'float') {
    if (desc.kind === 'f32' && Number.isFinite(value) && !Number.isFinite(Math.fround(value))) {
      throw new RangeError(
        `Field '${path}' (f32) value ${value} is outside the single-precision range.`,
      );
    }
    return value;
  }

  if (!Number.isInteger(value) || value < desc.min || value > desc.max) {
    throw new RangeError(
      `Field '${path}' (${desc.kind}) value ${value} is not an integer in [${desc.min}, ${desc.max}].`,
    );
  }
  return value;
}

// ─── Text ─────────────────────────────────────────────────────────────────────

// fatal: malformed sequences throw instead of decoding to U+FFFD.
// ignoreBOM: a leading U+FEFF is content, not a marker to strip.
const utf8Decoder = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });
const utf8Encoder = new TextEncoder();

/**
 * Decode a fixed-length text field. Trailing NUL bytes are padding and are
 * dropped before decoding.
 *
 * Returns null when the bytes are not valid under `encoding`.
 */
export function decodeText(bytes: Uint8Array, encoding: TextEncodingName): string | null {
  let end = bytes.length;
  while (end > 0 && bytes[end - 1] === 0) end--;
  const content = bytes.subarray(0, end);

  if (encoding === 'ascii') {
    let text = '';
    for (const byte of content) {
      if (byte > 0x7f) return null;
      text += String.fromCharCode(byte);
    }
    return text;
  }

  try {
    return utf8Decoder.decode(content);
  } catch {
    return null; // malformed UTF-8
  }
}

/**
 * True when encoded text ends in a zero byte. decodeText() would strip it
 * as padding, so such text cannot be stored in a fixed-length field.
 */
export function endsInNul(encoded: Uint8Array): boolean {
  return encoded.length > 0 && encoded[encoded.length - 1] === 0;
}

/**
 * Encode a text value. Returns null when a character has no representation
 * under `encoding` (anything above U+007F for ascii).
 */
export function encodeText(text: string, encoding: TextEncodingName): Uint8Array | null {
  if (encoding === 'ascii') {
    const out = new Uint8Array(text.length);
    for (let i = 0; i < text.length; i++) {
      const code = text.charCodeAt(i);
      if (code > 0x7f) return null;
      out[i] = code;
    }
    return out;
  }
  return utf8Encoder.encode(text);
}
