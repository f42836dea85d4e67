/**
 * Fixed byte layout of WAD headers and content records, per major version.
 */

export const WAD_MAGIC = 'RW';

/** Region reserved for the length-prefixed ECDSA signature in v2 headers. */
export const WAD_V2_ECDSA_REGION = 83;
/** Fixed ECDSA signature size in v3 headers. */
export const WAD_V3_ECDSA_SIZE = 256;

export interface ContentLayout {
  /** Absolute position of the first content record. */
  readonly dataStart: number;
  /** Size of one content record. */
  readonly entrySize: number;
}

export const WAD_CONTENT_LAYOUTS: Readonly<Record<1 | 2 | 3, ContentLayout>> = {
  1: { dataStart: 4 + 2 + 2 + 4, entrySize: 24 },
  2: { dataStart: 4 + 1 + WAD_V2_ECDSA_REGION + 8 + 2 + 2 + 4, entrySize: 32 },
  3: { dataStart: 4 + WAD_V3_ECDSA_SIZE + 8 + 4, entrySize: 32 },
};

export const CONTENT_HASH = 0;
export const CONTENT_DATA_OFFSET = 8;
export const CONTENT_COMPRESSED_SIZE = 12;
export const CONTENT_UNCOMPRESSED_SIZE = 16;
export const CONTENT_COMPRESSION_TYPE = 20;
export const CONTENT_IS_DUPLICATE = 21;
export const CONTENT_SHA256 = 24;
