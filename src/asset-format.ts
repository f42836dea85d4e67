/**
 * Format sniffing and dispatch across the supported containers.
 */
import { InvalidMagicError } from './errors.js';
import { RMAN_MAGIC } from './constants/rman-schemas.js';
import { WAD_MAGIC } from './constants/wad-layout.js';
import { RmanBinary } from './rman-binary.js';
import { WadBinary } from './wad-binary.js';
import type { RmanFile } from './types/rman-file.js';
import type { WadFile } from './types/wad-file.js';
import type { Decompressor } from './utils/zstd.js';

export type AssetFormat = 'rman' | 'wad';

export type DecodedAsset = { readonly format: 'rman'; readonly file: RmanFile } | { readonly format: 'wad'; readonly file: WadFile };

function startsWith(buffer: Buffer, tag: string): boolean {
  return buffer.length >= tag.length && buffer.toString('latin1', 0, tag.length) === tag;
}

export function detectAssetFormat(buffer: Buffer): AssetFormat | 'unknown' {
  if (startsWith(buffer, RMAN_MAGIC)) {
    return 'rman';
  }
  if (startsWith(buffer, WAD_MAGIC)) {
    return 'wad';
  }
  return 'unknown';
}

/**
 * Decodes a buffer as the given format, or as whatever its leading tag says.
 *
 * @throws {InvalidMagicError} If no format is given and the tag is not recognized
 */
export function decodeAsset({
  buffer,
  format,
  decompress,
}: {
  readonly buffer: Buffer;
  readonly format?: AssetFormat;
  readonly decompress?: Decompressor;
}): DecodedAsset {
  const resolved: AssetFormat | 'unknown' = format ?? detectAssetFormat(buffer);
  switch (resolved) {
    case 'rman':
      return { format: 'rman', file: RmanBinary.decode({ buffer, decompress }) };
    case 'wad':
      return { format: 'wad', file: WadBinary.decode({ buffer }) };
    case 'unknown':
      throw new InvalidMagicError(0, `${RMAN_MAGIC}|${WAD_MAGIC}`, buffer.toString('latin1', 0, Math.min(buffer.length, 4)));
  }
}
