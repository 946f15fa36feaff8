/**
 * @bytemold/core — layout constants
 *
 * The wire format has no header and no padding: a record is its fields
 * packed back to back in depth-first declared order. The only layout
 * choices are the byte order and the text encoding, whose defaults live
 * here together with the codes used by layoutPattern().
 *
 * Changing a pattern code changes every schemaFingerprint() — treat it as
 * a breaking change.
 */

import type { ByteOrder, TextEncodingName } from './types';

// ─── Defaults ─────────────────────────────────────────────────────────────────

export const DEFAULT_BYTE_ORDER: ByteOrder = 'little';

export const DEFAULT_TEXT_ENCODING: TextEncodingName = 'utf-8';

export const TEXT_ENCODINGS: readonly TextEncodingName[] = ['utf-8', 'ascii'];

// ─── Layout Pattern Codes ─────────────────────────────────────────────────────

/**
 * Prefix of a layout pattern, one per byte order.
 */
export const BYTE_ORDER_PREFIX: Readonly<Record<ByteOrder, string>> = {
  little: '<',
  big:    '>',
};

export const BLOB_CODE = 'p'; // `${length}p`
export const TEXT_CODE = 's'; // `${length}s`

// ─── Reserved Names ───────────────────────────────────────────────────────────

/**
 * Field names that cannot be assigned as plain own properties of a
 * decoded record.
 */
export const RESERVED_FIELD_NAMES: ReadonlySet<string> = new Set(['__proto__']);
