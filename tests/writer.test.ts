/**
 * @bytemold/core — record encoder
 *
 * encodeRecord() is the inverse of StructReader.build(). Tests check the
 * exact bytes for small records, defaults, every rejection path, and a
 * round trip through a schema that uses every field kind.
 */

import { describe, it, expect } from 'vitest';
import {
  defineStruct,
  compileSchema,
  encodeRecord,
  encodeRecordInto,
  encodeRecords,
  StructReader,
} from '../src/index';
import type { StructInput } from '../src/index';

// ─── Fixtures ─────────────────────────────────────────────────────────────────

const Balance = defineStruct('Balance', [
  { name: 'id',      type: 'u64' },
  { name: 'balance', type: 'f32' },
]);

const Transaction = defineStruct('Transaction', [
  { name: 'amount',   type: 'f32' },
  { name: 'sender',   type: 'u64' },
  { name: 'receiver', type: 'u64' },
]);

const Account = defineStruct('Account', [
  { name: 'id',      type: 'u64' },
  { name: 'balance', type: 'f32' },
  { name: 'recent',  type: Transaction, count: 3 },
]);

const BALANCE_BYTES = [1, 0, 0, 0, 0, 0, 0, 0, 0x00, 0x00, 0x80, 0x3f];

const balanceSchema = compileSchema(Balance);

// ─── Exact bytes ──────────────────────────────────────────────────────────────

describe('encodeRecord', () => {
  it('writes each leaf at its offset in the schema byte order', () => {
    expect([...encodeRecord(balanceSchema, { id: 1n, balance: 1 })]).toEqual(BALANCE_BYTES);
  });

  it('accepts a safe-integer number for a u64 field', () => {
    expect([...encodeRecord(balanceSchema, { id: 1, balance: 1 })]).toEqual(BALANCE_BYTES);
  });

  it('writes big-endian when the schema says so', () => {
    const Word = defineStruct('Word', [{ name: 'v', type: 'u32' }]);

    expect([...encodeRecord(compileSchema(Word, { byteOrder: 'big' }), { v: 256 })]).toEqual([0, 0, 1, 0]);
  });

  it('follows declared field order, not object key order', () => {
    const Pair    = defineStruct('Pair',    [{ name: 'a', type: 'u16' }, { name: 'b', type: 'u16' }]);
    const Swapped = defineStruct('Swapped', [{ name: 'b', type: 'u16' }, { name: 'a', type: 'u16' }]);

    expect([...encodeRecord(compileSchema(Pair),    { b: 2, a: 1 })]).toEqual([1, 0, 2, 0]);
    expect([...encodeRecord(compileSchema(Swapped), { a: 1, b: 2 })]).toEqual([2, 0, 1, 0]);
  });

  it('ignores keys the declaration does not name', () => {
    const withExtra = { id: 1n, balance: 1, note: 'unused' };

    expect([...encodeRecord(balanceSchema, withExtra)]).toEqual(BALANCE_BYTES);
  });

  it('zero-pads short bytes and text', () => {
    const Tagged = defineStruct('Tagged', [
      { name: 'tag',  type: 'bytes', length: 4 },
      { name: 'name', type: 'text',  length: 4, encoding: 'ascii' },
    ]);

    expect([...encodeRecord(compileSchema(Tagged), { tag: new Uint8Array([1, 2]), name: 'Hi' })])
      .toEqual([1, 2, 0, 0, 0x48, 0x69, 0, 0]);
  });

  it('writes lists element by element', () => {
    const Samples = defineStruct('Samples', [{ name: 'vals', type: 'u16', count: 3 }]);

    expect([...encodeRecord(compileSchema(Samples), { vals: [1, 2, 3] })]).toEqual([1, 0, 2, 0, 3, 0]);
  });
});

// ─── Defaults ─────────────────────────────────────────────────────────────────

describe('encodeRecord — defaults', () => {
  const Config = defineStruct('Config', [
    { name: 'level', type: 'u8',   default: 7 },
    { name: 'label', type: 'text', length: 4, default: 'abc' },
  ]);
  const schema = compileSchema(Config);

  it('fills omitted fields from their declared default', () => {
    expect([...encodeRecord(schema, {})]).toEqual([7, 0x61, 0x62, 0x63, 0]);
  });

  it('prefers a supplied value over the default', () => {
    expect([...encodeRecord(schema, { level: 1, label: 'z' })]).toEqual([1, 0x7a, 0, 0, 0]);
  });

  it('rejects an omitted field without a default', () => {
    const partial: StructInput<typeof Balance.fields> = JSON.parse('{ "balance": 1 }');

    expect(() => encodeRecord(balanceSchema, partial))
      .toThrow(new TypeError("Field 'id' is missing and declares no default."));
  });
});

// ─── Rejections ───────────────────────────────────────────────────────────────

describe('encodeRecord — rejections', () => {
  it('rejects a value of the wrong JavaScript type', () => {
    const wrong: StructInput<typeof Balance.fields> = JSON.parse('{ "id": "1", "balance": 1 }');

    expect(() => encodeRecord(balanceSchema, wrong)).toThrow(TypeError);
  });

  it('rejects a record that is not an object', () => {
    const notRecord: StructInput<typeof Balance.fields> = JSON.parse('null');

    expect(() => encodeRecord(balanceSchema, notRecord))
      .toThrow("Record must be an object for structure 'Balance', got null.");
  });

  it('rejects out-of-range integers instead of truncating', () => {
    const Small = defineStruct('Small', [{ name: 'n', type: 'u8' }]);

    expect(() => encodeRecord(compileSchema(Small), { n: 256 })).toThrow(RangeError);
    expect(() => encodeRecord(compileSchema(Small), { n: -1 })).toThrow(RangeError);
  });

  it('names the nested leaf that failed', () => {
    const schema = compileSchema(Account);
    const value  = {
      id:      1n,
      balance: 0,
      recent: [
        { amount: 0, sender: 0n,  receiver: 0n },
        { amount: 0, sender: -1n, receiver: 0n },
        { amount: 0, sender: 0n,  receiver: 0n },
      ],
    };

    expect(() => encodeRecord(schema, value)).toThrow(/Field 'recent\[1\]\.sender' \(u64\)/);
  });

  it('rejects a list element that is not an object', () => {
    const value: StructInput<typeof Account.fields> = JSON.parse('{ "id": 1, "balance": 0, "recent": [1, 2, 3] }');

    expect(() => encodeRecord(compileSchema(Account), value))
      .toThrow("Field 'recent[0]' must be an object for structure 'Transaction', got number.");
  });

  it('rejects a list of the wrong length', () => {
    const Samples = defineStruct('Samples', [{ name: 'vals', type: 'u16', count: 3 }]);

    expect(() => encodeRecord(compileSchema(Samples), { vals: [1, 2] }))
      .toThrow(new RangeError("Field 'vals' has 2 elements; the list holds exactly 3."));
  });

  it('rejects bytes longer than the field', () => {
    const Blob = defineStruct('Blob', [{ name: 'data', type: 'bytes', length: 4 }]);

    expect(() => encodeRecord(compileSchema(Blob), { data: new Uint8Array(5) }))
      .toThrow(new RangeError("Field 'data' received 5 bytes; the field holds 4."));
  });

  it('rejects text that does not fit or is outside its encoding', () => {
    const Named  = defineStruct('Named', [{ name: 'name', type: 'text', length: 4, encoding: 'ascii' }]);
    const schema = compileSchema(Named);

    expect(() => encodeRecord(schema, { name: 'abcde' }))
      .toThrow("Field 'name' encodes to 5 bytes of ascii; the field holds 4.");
    expect(() => encodeRecord(schema, { name: 'é' }))
      .toThrow(new RangeError("Field 'name' contains characters outside ascii."));
  });

  it('rejects text ending in U+0000, which would read back as padding', () => {
    const Named  = defineStruct('Named', [{ name: 'name', type: 'text', length: 4 }]);
    const schema = compileSchema(Named);

    expect(() => encodeRecord(schema, { name: 'a\u0000' }))
      .toThrow(new RangeError("Field 'name' ends in U+0000, which would decode as padding."));
    expect([...encodeRecord(schema, { name: 'a\u0000b' })]).toEqual([0x61, 0, 0x62, 0]);
  });

  it('rejects finite numbers beyond the f32 range', () => {
    const Single = defineStruct('Single', [{ name: 'x', type: 'f32' }]);
    const schema = compileSchema(Single);

    expect(() => encodeRecord(schema, { x: 1e40 }))
      .toThrow(new RangeError("Field 'x' (f32) value 1e+40 is outside the single-precision range."));
    expect(() => encodeRecord(schema, { x: -1e40 })).toThrow(RangeError);
    expect([...encodeRecord(schema, { x: Infinity })]).toEqual([0, 0, 0x80, 0x7f]);
  });

  it('counts utf-8 bytes, not characters, against the width', () => {
    const Named  = defineStruct('Named', [{ name: 'name', type: 'text', length: 5 }]);
    const schema = compileSchema(Named);

    expect(() => encodeRecord(schema, { name: 'héllo' })).toThrow(RangeError);
    expect(encodeRecord(schema, { name: 'héll' })).toHaveLength(5);
  });
});

// ─── Into / many ──────────────────────────────────────────────────────────────

describe('encodeRecordInto', () => {
  it('writes at an offset and returns totalSize', () => {
    const target = new Uint8Array(16).fill(0xaa);

    expect(encodeRecordInto(balanceSchema, { id: 1n, balance: 1 }, target, 2)).toBe(12);
    expect([...target]).toEqual([0xaa, 0xaa, ...BALANCE_BYTES, 0xaa, 0xaa]);
  });

  it('rejects a record that would run past the end of the target', () => {
    const target = new Uint8Array(16);

    expect(() => encodeRecordInto(balanceSchema, { id: 1n, balance: 1 }, target, 5)).toThrow(RangeError);
    expect(() => encodeRecordInto(balanceSchema, { id: 1n, balance: 1 }, target, 1.5)).toThrow(RangeError);
  });

  it('leaves the target untouched when the value is rejected', () => {
    const target = new Uint8Array(12).fill(0xaa);

    expect(() => encodeRecordInto(balanceSchema, { id: -1n, balance: 1 }, target)).toThrow(RangeError);
    expect(target.every(byte => byte === 0xaa)).toBe(true);
  });
});

describe('encodeRecords', () => {
  it('concatenates records in order', () => {
    const out = encodeRecords(balanceSchema, [{ id: 1n, balance: 1 }, { id: 2n, balance: 1 }]);

    expect(out).toHaveLength(24);
    expect([...out.subarray(0, 12)]).toEqual(BALANCE_BYTES);
    expect(out[12]).toBe(2);
  });

  it('returns an empty buffer for no records', () => {
    expect(encodeRecords(balanceSchema, [])).toHaveLength(0);
  });
});

// ─── Round trip ───────────────────────────────────────────────────────────────

describe('encode → read', () => {
  it('reproduces every field kind', () => {
    const Point = defineStruct('Point', [
      { name: 'x', type: 'u16' },
      { name: 'y', type: 'u32' },
    ]);
    const Everything = defineStruct('Everything', [
      { name: 'u8',    type: 'u8' },
      { name: 'i8',    type: 'i8' },
      { name: 'u16',   type: 'u16' },
      { name: 'i16',   type: 'i16' },
      { name: 'u32',   type: 'u32' },
      { name: 'i32',   type: 'i32' },
      { name: 'u64',   type: 'u64' },
      { name: 'i64',   type: 'i64' },
      { name: 'f32',   type: 'f32' },
      { name: 'f64',   type: 'f64' },
      { name: 'tag',   type: 'bytes', length: 3 },
      { name: 'note',  type: 'text',  length: 8 },
      { name: 'pair',  type: 'i16',   count: 2 },
      { name: 'point', type: Point },
    ]);
    const value = {
      u8:    255,
      i8:    -5,
      u16:   65535,
      i16:   -300,
      u32:   4000000000,
      i32:   -70000,
      u64:   (1n << 63n) + 5n,
      i64:   -(1n << 40n),
      f32:   0.5,
      f64:   Math.PI,
      tag:   new Uint8Array([9, 8, 7]),
      note:  'héllo',
      pair:  [-1, 1],
      point: { x: 10, y: 70000 },
    };

    for (const byteOrder of ['little', 'big'] as const) {
      const schema = compileSchema(Everything, { byteOrder });
      const reader = new StructReader(schema);
      reader.feed(encodeRecord(schema, value));

      expect(reader.build()).toEqual(value);
    }
  });

  it('keeps text with interior U+0000', () => {
    const Named  = defineStruct('Named', [{ name: 'name', type: 'text', length: 4 }]);
    const schema = compileSchema(Named);
    const reader = new StructReader(schema);
    reader.feed(encodeRecord(schema, { name: 'a\u0000b' }));

    expect(reader.build()).toEqual({ name: 'a\u0000b' });
  });

  it('rounds f32 fields to single precision', () => {
    const reader = new StructReader(balanceSchema);
    reader.feed(encodeRecord(balanceSchema, { id: 0n, balance: 0.1 }));

    expect(reader.build().balance).toBe(Math.fround(0.1));
  });
});
