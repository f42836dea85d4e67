import { decompress } from 'fzstd';

/**
 * Turns a compressed byte range into the decompressed bytes, throwing on corrupt input.
 */
export type Decompressor = (compressed: Buffer) => Buffer;

/**
 * Default RMAN body decompressor.
 */
export const zstdDecompress: Decompressor = (compressed: Buffer): Buffer => {
  const output: Uint8Array = decompress(compressed);
  return Buffer.from(output.buffer, output.byteOffset, output.byteLength);
};
