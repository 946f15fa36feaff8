/**
 * @bytemold/core — type definitions
 *
 * Three families of types live here:
 *
 *   Declarations — what a caller writes: an ordered list of named fields,
 *                  each with a logical type and optional length / count.
 *   Schema nodes — what the compiler produces: a closed, immutable tree
 *                  whose every node knows its byte size.
 *   Values       — what a reader builds, inferred at the type level from
 *                  the declaration that produced the schema.
 */

// ─── Primitive Kinds ──────────────────────────────────────────────────────────

/**
 * Fixed-width numeric kinds.
 *
 * The 64-bit integer kinds decode to bigint; everything else decodes to
 * number. f32 values are widened to double on decode.
 */
export type PrimitiveKind =
  | 'u8'
  | 'u16'
  | 'u32'
  | 'u64'
  | 'i8'
  | 'i16'
  | 'i32'
  | 'i64'
  | 'f32'
  | 'f64';

/** Fixed-length blob kinds. Both require an explicit `length` in bytes. */
export type BlobKind = 'bytes' | 'text';

/** One byte order applies to every multi-byte field of a compiled schema. */
export type ByteOrder = 'little' | 'big';

export type TextEncodingName = 'utf-8' | 'ascii';

/** Values a declaration may supply as a field default. */
export type DefaultValue = number | bigint | string | Uint8Array;

// ─── Declarations ─────────────────────────────────────────────────────────────

/**
 * One field of a structure declaration.
 *
 * `length` is the byte width of a bytes/text field and is required for
 * those kinds only. `count` turns any field into a fixed-count list of
 * that element type. `encoding` applies to text fields (default utf-8).
 * `default` is used by the encoder when a value omits the field; it is
 * accepted on single primitive, bytes and text fields.
 */
export interface FieldDeclaration {
  readonly name:      string;
  readonly type:      PrimitiveKind | BlobKind | StructDeclaration;
  readonly length?:   number;
  readonly count?:    number;
  readonly encoding?: TextEncodingName;
  readonly default?:  DefaultValue;
}

/**
 * A named, ordered product of fields. Build with defineStruct(), which
 * freezes the declaration so compiled layouts can be cached against it.
 */
export interface StructDeclaration<
  F extends readonly FieldDeclaration[] = readonly FieldDeclaration[],
> {
  readonly name:   string;
  readonly fields: F;
}

export interface CompileOptions {
  /** Defaults to 'little'. */
  readonly byteOrder?: ByteOrder;
}

// ─── Schema Nodes ─────────────────────────────────────────────────────────────

export interface LeafNode {
  readonly kind:      'leaf';
  readonly primitive: PrimitiveKind;
  readonly size:      number;
}

export interface BlobNode {
  readonly kind: 'blob';
  readonly size: number;
}

export interface TextNode {
  readonly kind:     'text';
  readonly size:     number;
  readonly encoding: TextEncodingName;
}

export interface ListNode {
  readonly kind:    'list';
  readonly element: SchemaNode;
  readonly count:   number;
  /** count × element.size */
  readonly size:    number;
}

export interface CompositeField {
  readonly name:     string;
  readonly node:     SchemaNode;
  readonly default?: DefaultValue;
}

export interface CompositeNode {
  readonly kind:   'composite';
  readonly name:   string;
  readonly fields: readonly CompositeField[];
  /** Sum of the field sizes in declared order. */
  readonly size:   number;
}

/** Nodes that occupy exactly one slot of the flattened leaf list. */
export type TerminalNode = LeafNode | BlobNode | TextNode;

export type SchemaNode = TerminalNode | ListNode | CompositeNode;

/**
 * One entry of the flattened leaf list.
 *
 * byteOffset is measured from the start of the root record. path names
 * the leaf the way a caller would reach it: `recent[2].amount`.
 */
export interface FlatLeaf {
  readonly path:       string;
  readonly byteOffset: number;
  readonly node:       TerminalNode;
}

/** The declaration-independent part of a compiled schema. */
export interface CompiledLayout {
  readonly root:      CompositeNode;
  readonly leaves:    readonly FlatLeaf[];
  readonly totalSize: number;
  readonly byteOrder: ByteOrder;
}

export interface CompiledSchema<
  F extends readonly FieldDeclaration[] = readonly FieldDeclaration[],
> extends CompiledLayout {
  readonly declaration: StructDeclaration<F>;
}

// ─── Values ───────────────────────────────────────────────────────────────────

/** Runtime shape of anything a reader decodes. */
export type DecodedValue =
  | number
  | bigint
  | string
  | Uint8Array
  | DecodedValue[]
  | DecodedRecord;

export interface DecodedRecord {
  [field: string]: DecodedValue;
}

type ElementValue<T> =
  T extends 'u64' | 'i64' ? bigint
  : T extends PrimitiveKind ? number
  : T extends 'bytes' ? Uint8Array
  : T extends 'text' ? string
  : T extends StructDeclaration<infer F extends readonly FieldDeclaration[]> ? StructValue<F>
  : never;

type FieldValue<D extends FieldDeclaration> =
  D extends { readonly count: number } ? ElementValue<D['type']>[]
  : 'count' extends keyof D ? ElementValue<D['type']> | ElementValue<D['type']>[]
  : ElementValue<D['type']>;

/**
 * The value a reader builds for a declaration.
 *
 *   defineStruct('Account', [
 *     { name: 'id',      type: 'u64' },
 *     { name: 'balance', type: 'f32' },
 *   ])
 *
 * builds `{ id: bigint; balance: number }`.
 */
export type StructValue<F extends readonly FieldDeclaration[]> = {
  [D in F[number] as D['name']]: FieldValue<D>;
};

type ElementInput<T> =
  T extends 'u64' | 'i64' ? bigint | number
  : T extends PrimitiveKind ? number
  : T extends 'bytes' ? Uint8Array
  : T extends 'text' ? string
  : T extends StructDeclaration<infer F extends readonly FieldDeclaration[]> ? StructInput<F>
  : never;

type FieldInput<D extends FieldDeclaration> =
  D extends { readonly count: number } ? readonly ElementInput<D['type']>[]
  : 'count' extends keyof D ? ElementInput<D['type']> | readonly ElementInput<D['type']>[]
  : ElementInput<D['type']>;

/**
 * The value the encoder accepts for a declaration. Same shape as
 * StructValue, except that fields declaring a default may be omitted and
 * 64-bit integers may be given as safe-integer numbers.
 */
export type StructInput<F extends readonly FieldDeclaration[]> = {
  [D in F[number] as D extends { readonly default: DefaultValue } ? never : D['name']]: FieldInput<D>;
} & {
  [D in F[number] as D extends { readonly default: DefaultValue } ? D['name'] : never]?: FieldInput<D>;
};
