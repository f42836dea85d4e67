/**
 * Bounds-checked little-endian reads at explicit positions.
 */
import { InvalidMagicError, TruncatedError } from '../errors.js';

/**
 * Throws a TruncatedError unless `width` bytes starting at `position` lie inside both
 * `limit` and the buffer.
 */
export function ensureReadable(buffer: Buffer, position: number, width: number, limit: number = buffer.length): void {
  const bound: number = Math.min(limit, buffer.length);
  if (!Number.isSafeInteger(position) || position < 0 || position + width > bound) {
    throw new TruncatedError(position, width, bound);
  }
}

export function readU8(buffer: Buffer, position: number): number {
  ensureReadable(buffer, position, 1);
  return buffer.readUInt8(position);
}

export function readU16(buffer: Buffer, position: number): number {
  ensureReadable(buffer, position, 2);
  return buffer.readUInt16LE(position);
}

export function readU32(buffer: Buffer, position: number): number {
  ensureReadable(buffer, position, 4);
  return buffer.readUInt32LE(position);
}

export function readI32(buffer: Buffer, position: number): number {
  ensureReadable(buffer, position, 4);
  return buffer.readInt32LE(position);
}

export function readU64(buffer: Buffer, position: number): bigint {
  ensureReadable(buffer, position, 8);
  return buffer.readBigUInt64LE(position);
}

/**
 * Returns a view of `length` bytes at `position`. The view shares memory with `buffer`.
 */
export function readBytes(buffer: Buffer, position: number, length: number, limit: number = buffer.length): Buffer {
  ensureReadable(buffer, position, length, limit);
  return buffer.subarray(position, position + length);
}

/**
 * Validates an ASCII tag at `position` and returns it.
 * @throws {InvalidMagicError} If the bytes differ from `literal` or are missing
 */
export function readTag(buffer: Buffer, position: number, literal: string): string {
  const end = Math.min(buffer.length, position + literal.length);
  const found: string = position < buffer.length ? buffer.toString('latin1', position, end) : '';
  if (found !== literal) {
    throw new InvalidMagicError(position, literal, found);
  }
  return found;
}
