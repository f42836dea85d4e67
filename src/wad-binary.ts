/**
 * WAD archive decoding.
 */
import { readFile } from 'node:fs/promises';
import { InvalidEnumError, UnsupportedVersionError } from './errors.js';
import {
  CONTENT_COMPRESSED_SIZE,
  CONTENT_COMPRESSION_TYPE,
  CONTENT_DATA_OFFSET,
  CONTENT_HASH,
  CONTENT_IS_DUPLICATE,
  CONTENT_SHA256,
  CONTENT_UNCOMPRESSED_SIZE,
  type ContentLayout,
  WAD_CONTENT_LAYOUTS,
  WAD_MAGIC,
  WAD_V2_ECDSA_REGION,
  WAD_V3_ECDSA_SIZE,
} from './constants/wad-layout.js';
import { COMPRESSION_TYPES, type CompressionType, type WadContent, type WadContentVersion, type WadFile, type WadHeader } from './types/wad-file.js';
import { readBytes, readTag, readU16, readU32, readU64, readU8 } from './utils/byte-cursor.js';

type WadMajor = keyof typeof WAD_CONTENT_LAYOUTS;

function isSupportedMajor(major: number): major is WadMajor {
  return major === 1 || major === 2 || major === 3;
}

function toMajor(major: number): WadMajor {
  if (!isSupportedMajor(major)) {
    throw new UnsupportedVersionError('WAD major version', major);
  }
  return major;
}

/**
 * Decodes one of the three header shapes, selected by the major version byte.
 * @throws {InvalidMagicError} If the buffer does not start with "RW"
 * @throws {UnsupportedVersionError} For a major version other than 1, 2 or 3
 */
function decodeHeader(buffer: Buffer): WadHeader {
  readTag(buffer, 0, WAD_MAGIC);
  const major: WadMajor = toMajor(readU8(buffer, 2));
  const minor: number = readU8(buffer, 3);

  switch (major) {
    case 1:
      return {
        major,
        minor,
        fileCount: readU32(buffer, 8),
        version: { kind: 'v1', entryOffset: readU16(buffer, 4), entrySize: readU16(buffer, 6) },
      };
    case 2: {
      const ecdsaLength: number = readU8(buffer, 4);
      // Signature is a prefix of the padded region; the rest is ignored.
      const ecdsa: Buffer = Buffer.from(readBytes(buffer, 5, ecdsaLength, 5 + WAD_V2_ECDSA_REGION));
      const fieldsStart = 5 + WAD_V2_ECDSA_REGION;
      return {
        major,
        minor,
        fileCount: readU32(buffer, fieldsStart + 12),
        version: {
          kind: 'v2',
          ecdsa,
          fileChecksum: readU64(buffer, fieldsStart),
          entryOffset: readU16(buffer, fieldsStart + 8),
          entrySize: readU16(buffer, fieldsStart + 10),
        },
      };
    }
    case 3: {
      const ecdsa: Buffer = Buffer.from(readBytes(buffer, 4, WAD_V3_ECDSA_SIZE));
      const fieldsStart = 4 + WAD_V3_ECDSA_SIZE;
      return {
        major,
        minor,
        fileCount: readU32(buffer, fieldsStart + 8),
        version: { kind: 'v3', ecdsa, fileChecksum: readU64(buffer, fieldsStart) },
      };
    }
  }
}

/**
 * Maps a compression tag to its name.
 * @throws {InvalidEnumError} If the value is outside 0..3
 */
function toCompressionType(value: number, position: number): CompressionType {
  const compressionType: CompressionType | undefined = COMPRESSION_TYPES[value];
  if (compressionType === undefined) {
    throw new InvalidEnumError('compression type', value, position);
  }
  return compressionType;
}

function decodeContentEntry(buffer: Buffer, major: WadMajor, entryOffset: number): WadContent {
  const compressionPosition = entryOffset + CONTENT_COMPRESSION_TYPE;
  // v1 stores the tag as a u32 of which only the low byte is meaningful; later versions
  // store a single byte followed by the duplicate flag.
  const compressionValue: number = major === 1 ? readU32(buffer, compressionPosition) & 0xff : readU8(buffer, compressionPosition);
  const version: WadContentVersion =
    major === 1
      ? { kind: 'v1' }
      : {
          kind: 'v2',
          isDuplicate: readU8(buffer, entryOffset + CONTENT_IS_DUPLICATE) > 0,
          sha256: readU64(buffer, entryOffset + CONTENT_SHA256),
        };

  return {
    hash: readU64(buffer, entryOffset + CONTENT_HASH),
    dataOffset: readU32(buffer, entryOffset + CONTENT_DATA_OFFSET),
    compressedSize: readU32(buffer, entryOffset + CONTENT_COMPRESSED_SIZE),
    uncompressedSize: readU32(buffer, entryOffset + CONTENT_UNCOMPRESSED_SIZE),
    compressionType: toCompressionType(compressionValue, compressionPosition),
    version,
  };
}

function decodeContent(buffer: Buffer, header: WadHeader): WadContent[] {
  const major: WadMajor = toMajor(header.major);
  const layout: ContentLayout = WAD_CONTENT_LAYOUTS[major];
  // The whole table must fit before any record is read.
  readBytes(buffer, layout.dataStart, header.fileCount * layout.entrySize);
  const content: WadContent[] = [];
  for (let index = 0; index < header.fileCount; index++) {
    content.push(decodeContentEntry(buffer, major, layout.dataStart + index * layout.entrySize));
  }
  return content;
}

/**
 * WAD archive decoding utilities.
 */
export class WadBinary {
  /**
   * Decodes the header and every content record. Payloads are not resolved.
   *
   * @throws {AssetDecodeError} On any malformed input
   */
  static decode({ buffer }: { readonly buffer: Buffer }): WadFile {
    const header: WadHeader = decodeHeader(buffer);
    return { header, content: decodeContent(buffer, header) };
  }

  static decodeHeader({ buffer }: { readonly buffer: Buffer }): WadHeader {
    return decodeHeader(buffer);
  }

  /**
   * Content table placement for a header's major version.
   */
  static contentLayout({ header }: { readonly header: WadHeader }): ContentLayout {
    return WAD_CONTENT_LAYOUTS[toMajor(header.major)];
  }

  static async read({ filePath }: { readonly filePath: string }): Promise<WadFile> {
    const buffer: Buffer = await readFile(filePath);
    return WadBinary.decode({ buffer });
  }

  /**
   * Finds the content record for a path hash.
   */
  static findContent({ file, hash }: { readonly file: WadFile; readonly hash: bigint }): WadContent | null {
    return file.content.find((entry: WadContent) => entry.hash === hash) ?? null;
  }
}
