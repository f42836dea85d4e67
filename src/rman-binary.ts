/**
 * RMAN release manifest decoding.
 */
import { readFile } from 'node:fs/promises';
import { DecompressionFailedError } from './errors.js';
import {
  BUNDLE_SCHEMA,
  CHUNK_SCHEMA,
  DIRECTORY_SCHEMA,
  FILE_SCHEMA,
  LANGUAGE_SCHEMA,
  RMAN_MAGIC,
  ROOT_SECTION_FIELDS,
} from './constants/rman-schemas.js';
import type { Bundle, Chunk, Directory, FileEntry, Language, RmanBody, RmanFile, RmanHeader, RmanOffsetMap } from './types/rman-file.js';
import { readBytes, readTag, readU32, readU64, readU8 } from './utils/byte-cursor.js';
import { decodeLongVector, decodeTableVector, ResolvedTable } from './utils/flat-table.js';
import { type Decompressor, zstdDecompress } from './utils/zstd.js';

/**
 * Decodes the fixed 28-byte header. Does not touch the body.
 * @throws {InvalidMagicError} If the buffer does not start with "RMAN"
 */
function decodeHeader(buffer: Buffer): RmanHeader {
  return {
    magic: readTag(buffer, 0, RMAN_MAGIC),
    major: readU8(buffer, 4),
    minor: readU8(buffer, 5),
    unknown: readU8(buffer, 6),
    signatureType: readU8(buffer, 7),
    offset: readU32(buffer, 8),
    length: readU32(buffer, 12),
    manifestId: readU64(buffer, 16),
    decompressedLength: readU32(buffer, 24),
  };
}

function decompressBody(buffer: Buffer, header: RmanHeader, decompress: Decompressor): Buffer {
  const compressed: Buffer = readBytes(buffer, header.offset, header.length);
  let body: Buffer;
  try {
    body = decompress(compressed);
  } catch (error) {
    throw new DecompressionFailedError(header.offset, header.length, error);
  }
  if (body.length !== header.decompressedLength) {
    console.warn(`RMAN body decompressed to ${body.length} bytes, header declares ${header.decompressedLength}`);
  }
  return body;
}

function decodeOffsetMap(body: Buffer): RmanOffsetMap {
  const headerOffset: number = readU32(body, 0);
  const section = (fieldPosition: number): number => headerOffset + readU32(body, headerOffset + fieldPosition) + fieldPosition;
  return {
    bundles: section(ROOT_SECTION_FIELDS.bundles),
    languages: section(ROOT_SECTION_FIELDS.languages),
    files: section(ROOT_SECTION_FIELDS.files),
    directories: section(ROOT_SECTION_FIELDS.directories),
  };
}

function decodeChunk(table: ResolvedTable<keyof typeof CHUNK_SCHEMA.slots>): Chunk {
  return {
    chunkId: table.readU64('chunkId'),
    compressedSize: table.readU32('compressedSize'),
    uncompressedSize: table.readU32('uncompressedSize'),
  };
}

function decodeBundle(table: ResolvedTable<keyof typeof BUNDLE_SCHEMA.slots>): Bundle {
  const bundleId: bigint = table.readU64('bundleId');
  // The chunk vector is laid out in place at the field position.
  const chunks: Chunk[] = decodeTableVector(table.buffer, table.requireField('chunks'), CHUNK_SCHEMA, decodeChunk);
  return { bundleId, chunks };
}

function decodeLanguage(table: ResolvedTable<keyof typeof LANGUAGE_SCHEMA.slots>): Language {
  return {
    id: table.readU8('languageId'),
    name: table.readString('nameOffset'),
  };
}

function decodeDirectory(table: ResolvedTable<keyof typeof DIRECTORY_SCHEMA.slots>): Directory {
  return {
    id: table.readU64Or('directoryId', 0n),
    parentId: table.readU64Or('parentId', 0n),
    name: table.readString('nameOffset'),
  };
}

function decodeFile(table: ResolvedTable<keyof typeof FILE_SCHEMA.slots>): FileEntry {
  return {
    id: table.readU64('fileId'),
    name: table.readString('nameOffset'),
    symlink: table.readStringOr('symlinkOffset', ''),
    directoryId: table.readU64Or('directoryId', 0n),
    size: table.readU32('fileSize'),
    language: table.readU32Or('languageMask', 0),
    chunkIds: decodeLongVector(table.buffer, table.requireField('chunks')),
  };
}

/**
 * Decodes the four sections of a decompressed RMAN body.
 */
function decodeBody(body: Buffer): RmanBody {
  const offsets: RmanOffsetMap = decodeOffsetMap(body);
  return {
    bundles: decodeTableVector(body, offsets.bundles, BUNDLE_SCHEMA, decodeBundle),
    languages: decodeTableVector(body, offsets.languages, LANGUAGE_SCHEMA, decodeLanguage),
    files: decodeTableVector(body, offsets.files, FILE_SCHEMA, decodeFile),
    directories: decodeTableVector(body, offsets.directories, DIRECTORY_SCHEMA, decodeDirectory),
  };
}

/**
 * Locates a chunk inside the bundle list.
 */
export interface ChunkLocation {
  readonly bundle: Bundle;
  readonly chunk: Chunk;
  /** Position of the chunk inside its bundle. */
  readonly index: number;
}

/**
 * RMAN (release manifest) decoding utilities.
 * Decoding is synchronous over an in-memory buffer; `read` only adds the file load.
 */
export class RmanBinary {
  /**
   * Decodes a complete manifest.
   *
   * @param buffer - Entire manifest file
   * @param decompress - Body decompressor, zstd by default
   * @throws {AssetDecodeError} On any malformed input; no partial manifest is returned
   */
  static decode({ buffer, decompress = zstdDecompress }: { readonly buffer: Buffer; readonly decompress?: Decompressor }): RmanFile {
    const header: RmanHeader = decodeHeader(buffer);
    const body: RmanBody = decodeBody(decompressBody(buffer, header, decompress));
    return { header, body };
  }

  static decodeHeader({ buffer }: { readonly buffer: Buffer }): RmanHeader {
    return decodeHeader(buffer);
  }

  /**
   * Decodes an already decompressed body.
   */
  static decodeBody({ body }: { readonly body: Buffer }): RmanBody {
    return decodeBody(body);
  }

  static async read({ filePath, decompress }: { readonly filePath: string; readonly decompress?: Decompressor }): Promise<RmanFile> {
    const buffer: Buffer = await readFile(filePath);
    return RmanBinary.decode({ buffer, decompress });
  }

  /**
   * Joins directory names from the root down to `directoryId` with "/".
   * Unknown ids end the walk; so does a repeated id.
   */
  static directoryPath({ file, directoryId }: { readonly file: RmanFile; readonly directoryId: bigint }): string {
    const byId = new Map<bigint, Directory>(file.body.directories.map((directory: Directory) => [directory.id, directory]));
    const names: string[] = [];
    const visited = new Set<bigint>();
    let current: Directory | undefined = directoryId === 0n ? undefined : byId.get(directoryId);
    while (current && !visited.has(current.id)) {
      visited.add(current.id);
      if (current.name !== '') {
        names.unshift(current.name);
      }
      current = current.parentId === 0n ? undefined : byId.get(current.parentId);
    }
    return names.join('/');
  }

  static filePath({ file, entry }: { readonly file: RmanFile; readonly entry: FileEntry }): string {
    const directory: string = RmanBinary.directoryPath({ file, directoryId: entry.directoryId });
    return directory === '' ? entry.name : `${directory}/${entry.name}`;
  }

  static findChunk({ file, chunkId }: { readonly file: RmanFile; readonly chunkId: bigint }): ChunkLocation | null {
    for (const bundle of file.body.bundles) {
      const index: number = bundle.chunks.findIndex((chunk: Chunk) => chunk.chunkId === chunkId);
      if (index !== -1) {
        return { bundle, chunk: bundle.chunks[index], index };
      }
    }
    return null;
  }
}
