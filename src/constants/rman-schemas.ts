/**
 * Vtable slot layouts of the RMAN body records.
 */
import { defineTableSchema } from '../utils/flat-table.js';

export const RMAN_MAGIC = 'RMAN';
export const RMAN_HEADER_SIZE = 28;

/**
 * Byte positions of the section fields inside the root record, which opens with its soffset.
 * Each section starts at `headerOffset + rawField + position`.
 */
export const ROOT_SECTION_FIELDS = {
  bundles: 4,
  languages: 8,
  files: 12,
  directories: 16,
} as const;

export const BUNDLE_SCHEMA = defineTableSchema('Bundle', {
  bundleId: 0,
  chunks: 1,
  unknown: 2,
  headerSize: 3,
});

export const CHUNK_SCHEMA = defineTableSchema('Chunk', {
  unknown1: 0,
  unknown2: 1,
  chunkId: 2,
  compressedSize: 3,
  uncompressedSize: 4,
});

export const LANGUAGE_SCHEMA = defineTableSchema('Language', {
  nameOffset: 0,
  unknown1: 1,
  languageId: 2,
});

export const DIRECTORY_SCHEMA = defineTableSchema('Directory', {
  unknown1: 0,
  unknown2: 1,
  directoryId: 2,
  parentId: 3,
  nameOffset: 4,
});

export const FILE_SCHEMA = defineTableSchema('File', {
  unknown1: 0,
  chunks: 1,
  fileId: 2,
  directoryId: 3,
  fileSize: 4,
  nameOffset: 5,
  languageMask: 6,
  unknown2: 7,
  unknown3: 8,
  unknown4: 9,
  unknown5: 10,
  symlinkOffset: 11,
  unknown6: 12,
  unknown7: 13,
  unknown8: 14,
});
