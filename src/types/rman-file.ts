/**
 * Decoded RMAN release manifest.
 */

export interface RmanHeader {
  readonly magic: string;
  readonly major: number;
  readonly minor: number;
  readonly unknown: number;
  readonly signatureType: number;
  /** Position of the compressed body in the manifest file. */
  readonly offset: number;
  /** Length of the compressed body. */
  readonly length: number;
  readonly manifestId: bigint;
  /** Declared body size after decompression. Informational only. */
  readonly decompressedLength: number;
}

export interface Chunk {
  readonly chunkId: bigint;
  readonly compressedSize: number;
  readonly uncompressedSize: number;
}

/**
 * A downloadable blob; chunk order is the reassembly order.
 */
export interface Bundle {
  readonly bundleId: bigint;
  readonly chunks: readonly Chunk[];
}

export interface Language {
  readonly id: number;
  readonly name: string;
}

export interface Directory {
  readonly id: bigint;
  /** 0n marks a root directory. */
  readonly parentId: bigint;
  readonly name: string;
}

export interface FileEntry {
  readonly id: bigint;
  readonly name: string;
  /** Empty when the entry is not a symlink. */
  readonly symlink: string;
  readonly directoryId: bigint;
  readonly size: number;
  /** Bitmask over Language ids. */
  readonly language: number;
  /** Chunk ids in content assembly order. */
  readonly chunkIds: readonly bigint[];
}

export interface RmanBody {
  readonly bundles: readonly Bundle[];
  readonly languages: readonly Language[];
  readonly files: readonly FileEntry[];
  readonly directories: readonly Directory[];
}

export interface RmanFile {
  readonly header: RmanHeader;
  readonly body: RmanBody;
}

/**
 * Absolute section start positions inside the decompressed body.
 */
export interface RmanOffsetMap {
  readonly bundles: number;
  readonly languages: number;
  readonly files: number;
  readonly directories: number;
}
