// ─── Types ────────────────────────────────────────────────────────────────────
export type {
  PrimitiveKind,
  BlobKind,
  ByteOrder,
  TextEncodingName,
  DefaultValue,
  FieldDeclaration,
  StructDeclaration,
  CompileOptions,
  LeafNode,
  BlobNode,
  TextNode,
  ListNode,
  CompositeField,
  CompositeNode,
  TerminalNode,
  SchemaNode,
  FlatLeaf,
  CompiledLayout,
  CompiledSchema,
  DecodedValue,
  DecodedRecord,
  StructValue,
  StructInput,
} from './types';

// ─── Constants ────────────────────────────────────────────────────────────────
export {
  DEFAULT_BYTE_ORDER,
  DEFAULT_TEXT_ENCODING,
  TEXT_ENCODINGS,
  BYTE_ORDER_PREFIX,
  BLOB_CODE,
  TEXT_CODE,
} from './constants';

// ─── Primitives ───────────────────────────────────────────────────────────────
export {
  PRIMITIVES,
  isPrimitiveKind,
  decodeText,
  encodeText,
} from './primitives';
export type { PrimitiveDescriptor } from './primitives';

// ─── Schema ───────────────────────────────────────────────────────────────────
export {
  defineStruct,
  compileSchema,
  layoutPattern,
  schemaFingerprint,
  ConfigurationError,
} from './schema';

// ─── Registry ─────────────────────────────────────────────────────────────────
export { StructRegistry } from './registry';
export type { FieldDocument, DeclarationDocument } from './registry';

// ─── Construction ─────────────────────────────────────────────────────────────
export {
  decodeLeaves,
  constructValue,
  isStructValue,
  DecodeError,
} from './construct';

// ─── Reader ───────────────────────────────────────────────────────────────────
export {
  StructReader,
  IncompleteDataError,
  ReaderStateError,
  RecordStreamError,
} from './reader';
export type { ReaderState } from './reader';

// ─── Writer ───────────────────────────────────────────────────────────────────
export { encodeRecord, encodeRecordInto, encodeRecords } from './writer';
