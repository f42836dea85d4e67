/**
 * Asset container decoder - Main entry point
 *
 * Decodes RMAN release manifests and WAD archives into immutable document trees.
 */

// Format decoders
export { RmanBinary, type ChunkLocation } from './rman-binary.js';
export { WadBinary } from './wad-binary.js';
export { decodeAsset, detectAssetFormat, type AssetFormat, type DecodedAsset } from './asset-format.js';

// Errors
export {
  AssetDecodeError,
  DecompressionFailedError,
  InvalidEnumError,
  InvalidMagicError,
  MissingFieldError,
  TruncatedError,
  UnsupportedVersionError,
  type AssetDecodeErrorKind,
} from './errors.js';

// Document types
export type { Bundle, Chunk, Directory, FileEntry, Language, RmanBody, RmanFile, RmanHeader, RmanOffsetMap } from './types/rman-file.js';
export {
  COMPRESSION_TYPES,
  type CompressionType,
  type WadContent,
  type WadContentVersion,
  type WadFile,
  type WadHeader,
  type WadHeaderVersion,
} from './types/wad-file.js';

// Decoding primitives
export { readBytes, readI32, readTag, readU16, readU32, readU64, readU8 } from './utils/byte-cursor.js';
export {
  decodeIndirectString,
  decodeLongVector,
  decodeTableVector,
  defineTableSchema,
  resolveTable,
  ResolvedTable,
  type TableSchema,
} from './utils/flat-table.js';
export { zstdDecompress, type Decompressor } from './utils/zstd.js';
export { stringifyDocument, toJsonDocument, type JsonValue } from './utils/json-document.js';
