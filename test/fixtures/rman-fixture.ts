/**
 * Assembles RMAN bodies and manifests from plain records for the decoder tests.
 */
import { ByteWriter, longVectorField, stringField, writeTable, writeTableVector, type FieldWriter } from './byte-writer.js';

export interface ChunkRecord {
  readonly chunkId: bigint;
  readonly compressedSize: number;
  readonly uncompressedSize: number;
}

export interface BundleRecord {
  readonly bundleId: bigint;
  readonly chunks: readonly ChunkRecord[];
}

export interface LanguageRecord {
  readonly id: number;
  readonly name: string;
}

export interface DirectoryRecord {
  readonly id?: bigint;
  readonly parentId?: bigint;
  readonly name: string;
}

export interface FileRecord {
  readonly id: bigint;
  readonly name: string | Uint8Array;
  readonly symlink?: string;
  readonly directoryId?: bigint;
  readonly size: number;
  readonly language?: number;
  readonly chunkIds: readonly bigint[];
}

export interface BodyRecords {
  readonly bundles?: readonly BundleRecord[];
  readonly languages?: readonly LanguageRecord[];
  readonly files?: readonly FileRecord[];
  readonly directories?: readonly DirectoryRecord[];
}

function writeChunk(writer: ByteWriter, chunk: ChunkRecord): number {
  return writeTable(writer, 5, [
    [2, (w) => w.u64(chunk.chunkId)],
    [3, (w) => w.u32(chunk.compressedSize)],
    [4, (w) => w.u32(chunk.uncompressedSize)],
  ]);
}

function writeBundle(writer: ByteWriter, bundle: BundleRecord): number {
  return writeTable(writer, 4, [
    [0, (w) => w.u64(bundle.bundleId)],
    [1, (w) => writeTableVector(w, bundle.chunks, writeChunk)],
  ]);
}

function writeLanguage(writer: ByteWriter, language: LanguageRecord): number {
  return writeTable(writer, 3, [
    [2, (w) => w.u8(language.id)],
    [0, stringField(language.name)],
  ]);
}

function writeDirectory(writer: ByteWriter, directory: DirectoryRecord): number {
  const fields: Array<readonly [number, FieldWriter]> = [];
  if (directory.id !== undefined) {
    const id = directory.id;
    fields.push([2, (w) => w.u64(id)]);
  }
  if (directory.parentId !== undefined) {
    const parentId = directory.parentId;
    fields.push([3, (w) => w.u64(parentId)]);
  }
  fields.push([4, stringField(directory.name)]);
  return writeTable(writer, 5, fields);
}

function writeFile(writer: ByteWriter, file: FileRecord): number {
  const fields: Array<readonly [number, FieldWriter]> = [
    [2, (w) => w.u64(file.id)],
    [4, (w) => w.u32(file.size)],
  ];
  if (file.directoryId !== undefined) {
    const directoryId = file.directoryId;
    fields.push([3, (w) => w.u64(directoryId)]);
  }
  if (file.language !== undefined) {
    const language = file.language;
    fields.push([6, (w) => w.u32(language)]);
  }
  fields.push([5, stringField(file.name)]);
  if (file.symlink !== undefined) {
    fields.push([11, stringField(file.symlink)]);
  }
  fields.push([1, longVectorField(file.chunkIds)]);
  return writeTable(writer, 15, fields);
}

/**
 * Root record at 4: soffset, then the four raw section fields at 8/12/16/20.
 */
export function buildRmanBody(records: BodyRecords): Buffer {
  const writer = new ByteWriter();
  const root = 4;
  writer.u32(root);
  writer.i32(0);
  writer.zeros(16);

  const sections: ReadonlyArray<readonly [number, (w: ByteWriter) => number]> = [
    [4, (w) => writeTableVector(w, records.bundles ?? [], writeBundle)],
    [8, (w) => writeTableVector(w, records.languages ?? [], writeLanguage)],
    [12, (w) => writeTableVector(w, records.files ?? [], writeFile)],
    [16, (w) => writeTableVector(w, records.directories ?? [], writeDirectory)],
  ];
  for (const [fieldPosition, write] of sections) {
    const start = write(writer);
    writer.patchU32(root + fieldPosition, start - root - fieldPosition);
  }
  return writer.toBuffer();
}

export interface ManifestOptions {
  readonly major?: number;
  readonly minor?: number;
  readonly signatureType?: number;
  readonly manifestId?: bigint;
  readonly decompressedLength?: number;
  /** Bytes placed between the header and the body. */
  readonly gap?: number;
}

/**
 * A 28-byte header followed by `compressed` as the body.
 */
export function buildRmanManifest(compressed: Buffer, decompressedLength: number, options: ManifestOptions = {}): Buffer {
  const writer = new ByteWriter();
  const offset = 28 + (options.gap ?? 0);
  writer
    .ascii('RMAN')
    .u8(options.major ?? 2)
    .u8(options.minor ?? 0)
    .u8(0)
    .u8(options.signatureType ?? 0)
    .u32(offset)
    .u32(compressed.length)
    .u64(options.manifestId ?? 0x1122334455667788n)
    .u32(options.decompressedLength ?? decompressedLength)
    .zeros(options.gap ?? 0)
    .raw(compressed);
  return writer.toBuffer();
}
