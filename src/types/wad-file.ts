/**
 * Decoded WAD archive: a version-tagged header and its content table in on-disk order.
 */

export const COMPRESSION_TYPES = ['NONE', 'GZIP', 'REFERENCE', 'ZSTD'] as const;

export type CompressionType = (typeof COMPRESSION_TYPES)[number];

export type WadHeaderVersion =
  | { readonly kind: 'v1'; readonly entryOffset: number; readonly entrySize: number }
  | {
      readonly kind: 'v2';
      readonly ecdsa: Buffer;
      readonly fileChecksum: bigint;
      readonly entryOffset: number;
      readonly entrySize: number;
    }
  | { readonly kind: 'v3'; readonly ecdsa: Buffer; readonly fileChecksum: bigint };

export interface WadHeader {
  readonly major: number;
  readonly minor: number;
  readonly fileCount: number;
  readonly version: WadHeaderVersion;
}

export type WadContentVersion =
  | { readonly kind: 'v1' }
  /** Only the low 64 bits of the payload's SHA-256 are stored. */
  | { readonly kind: 'v2'; readonly isDuplicate: boolean; readonly sha256: bigint };

export interface WadContent {
  readonly hash: bigint;
  /** Absolute payload position in the WAD file. */
  readonly dataOffset: number;
  readonly compressedSize: number;
  readonly uncompressedSize: number;
  readonly compressionType: CompressionType;
  readonly version: WadContentVersion;
}

export interface WadFile {
  readonly header: WadHeader;
  readonly content: readonly WadContent[];
}
