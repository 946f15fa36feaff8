/**
 * @bytemold/core — StructReader
 *
 * Incremental assembler for one compiled schema. Bytes arrive in chunks of
 * any size; the reader copies them into a buffer of exactly
 * schema.totalSize bytes and reports completion once that buffer is full.
 *
 *   empty ──feed──▶ filling ──feed──▶ complete ──reset──▶ empty
 *
 * Record boundaries belong to the caller. feed() never consumes more than
 * the current record still needs and returns how many bytes it took; the
 * rest of the chunk belongs to the next record and must be fed again after
 * reset(). readRecords() does that loop for a continuous stream.
 *
 * build() does NOT reset. It can be called any number of times on a
 * complete reader and always leaves the buffer as it was, so a failed
 * build can be inspected via bytes() before reset().
 *
 * The compiled schema is shared and read-only; the buffer is private to
 * this instance and is allocated once. A reader is single-owner state —
 * do not feed one instance from several logical streams.
 *
 * Consumer pattern:
 *
 *   const reader = new StructReader(compileSchema(Account));
 *   socket.on('data', (chunk) => {
 *     for (const account of reader.readRecords(chunk)) handle(account);
 *   });
 */

import { DecodeError, constructValue, decodeLeaves, isStructValue } from './construct';
import { compileSchema } from './schema';
import type {
  CompileOptions,
  CompiledSchema,
  DecodedRecord,
  FieldDeclaration,
  StructDeclaration,
  StructValue,
} from './types';

// ─── Errors ───────────────────────────────────────────────────────────────────

/**
 * Thrown by build() before the record is complete. Recoverable: the bytes
 * received so far stay buffered; keep feeding and build again.
 */
export class IncompleteDataError extends Error {
  readonly received: number;
  readonly expected: number;

  constructor(received: number, expected: number) {
    super(
      `Cannot build a record from ${received} of ${expected} bytes; ` +
      `feed ${expected - received} more.`,
    );
    this.name     = 'IncompleteDataError';
    this.received = received;
    this.expected = expected;
  }
}

/**
 * Thrown by feed() on a complete reader. The buffered record has not been
 * released yet; build() it if needed, then reset().
 */
export class ReaderStateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ReaderStateError';
  }
}

/**
 * Thrown by readRecords() when a record fails to decode partway through a
 * chunk. `records` holds the values decoded earlier in the same call and
 * `consumed` the number of chunk bytes taken, up to and including the
 * failing record, which stays buffered. `cause` is its DecodeError.
 *
 * To resume: handle `records`, reset() the reader, then pass
 * `chunk.subarray(consumed)` to readRecords() again.
 */
export class RecordStreamError<T = DecodedRecord> extends Error {
  readonly records:  readonly T[];
  readonly consumed: number;

  constructor(records: readonly T[], consumed: number, cause: DecodeError) {
    super(
      `readRecords: ${cause.message} ${records.length} earlier record(s) decoded; ` +
      `${consumed} byte(s) of the chunk consumed.`,
      { cause },
    );
    this.name     = 'RecordStreamError';
    this.records  = records;
    this.consumed = consumed;
  }
}

// ─── Public types ─────────────────────────────────────────────────────────────

export type ReaderState = 'empty' | 'filling' | 'complete';

// ─── StructReader ─────────────────────────────────────────────────────────────

export class StructReader<F extends readonly FieldDeclaration[] = readonly FieldDeclaration[]> {
  readonly schema: CompiledSchema<F>;

  private readonly _buffer: Uint8Array;
  private _received = 0;

  constructor(schema: CompiledSchema<F>) {
    this.schema  = schema;
    this._buffer = new Uint8Array(schema.totalSize);
  }

  /** Compile (or fetch the cached layout for) `declaration` and wrap it. */
  static forStruct<F extends readonly FieldDeclaration[]>(
    declaration: StructDeclaration<F>,
    options?:    CompileOptions,
  ): StructReader<F> {
    return new StructReader(compileSchema(declaration, options));
  }

  // ── State ─────────────────────────────────────────────────────────────────

  get totalSize(): number {
    return this.schema.totalSize;
  }

  /** Bytes buffered for the current record. */
  get received(): number {
    return this._received;
  }

  /** Bytes still needed to complete the current record. */
  get remaining(): number {
    return this.schema.totalSize - this._received;
  }

  get state(): ReaderState {
    if (this._received === 0) return 'empty';
    return this.isComplete() ? 'complete' : 'filling';
  }

  isComplete(): boolean {
    return this._received === this.schema.totalSize;
  }

  /** A copy of the bytes buffered so far. */
  bytes(): Uint8Array {
    return this._buffer.slice(0, this._received);
  }

  // ── Assembly ──────────────────────────────────────────────────────────────

  /**
   * Append bytes from the start of `chunk`, up to what the current record
   * still needs. Returns the number of bytes consumed; bytes past that
   * count were not read and belong to the next record.
   *
   * An empty chunk is a no-op.
   *
   * @throws ReaderStateError if the reader is already complete.
   */
  feed(chunk: Uint8Array): number {
    if (chunk.length === 0) return 0;
    if (this.isComplete()) {
      throw new ReaderStateError(
        `feed() on a complete ${this.schema.root.name} record ` +
        `(${this.schema.totalSize} bytes buffered). Call reset() before feeding the next record.`,
      );
    }

    const take = Math.min(chunk.length, this.remaining);
    this._buffer.set(chunk.subarray(0, take), this._received);
    this._received += take;
    return take;
  }

  /**
   * Decode the buffered record.
   *
   * @throws IncompleteDataError before the record is complete.
   * @throws DecodeError         if a text field is not decodable.
   */
  build(): StructValue<F> {
    if (!this.isComplete()) {
      throw new IncompleteDataError(this._received, this.schema.totalSize);
    }

    const value = constructValue(this.schema.root, decodeLeaves(this.schema, this._buffer));
    if (!isStructValue(this.schema, value)) {
      throw new Error(
        `StructReader.build: decoded ${this.schema.root.name} does not match its compiled layout.`,
      );
    }
    return value;
  }

  /** Return to 'empty'. The buffer is zeroed and kept for the next record. */
  reset(): void {
    this._buffer.fill(0);
    this._received = 0;
  }

  /**
   * Feed a chunk from a continuous stream and return every record it
   * completes, in order. After each record the reader resets and carries on
   * with the rest of the chunk; a trailing partial record stays buffered for
   * the next call. A reader that was already complete yields its record
   * first.
   *
   * @throws RecordStreamError if a record fails to decode. It carries the
   *         records decoded before it and the number of chunk bytes
   *         consumed; the failing record stays buffered.
   */
  readRecords(chunk: Uint8Array): StructValue<F>[] {
    const records: StructValue<F>[] = [];
    let offset = 0;

    for (;;) {
      if (this.isComplete()) {
        let record: StructValue<F>;
        try {
          record = this.build();
        } catch (err) {
          if (err instanceof DecodeError) throw new RecordStreamError(records, offset, err);
          throw err;
        }
        records.push(record);
        this.reset();
      }
      if (offset >= chunk.length) break;
      offset += this.feed(chunk.subarray(offset));
    }

    return records;
  }
}
