/**
 * Typed failures raised while decoding RMAN manifests and WAD archives.
 *
 * Every failure is terminal for the decode call that raised it; callers branch on `kind`.
 */

export type AssetDecodeErrorKind =
  | 'InvalidMagic'
  | 'Truncated'
  | 'UnsupportedVersion'
  | 'DecompressionFailed'
  | 'MissingField';

/**
 * Base class for all decoder errors.
 */
export class AssetDecodeError extends Error {
  constructor(public readonly kind: AssetDecodeErrorKind, message: string, public readonly cause?: unknown) {
    super(message);
    this.name = 'AssetDecodeError';
  }
}

export class InvalidMagicError extends AssetDecodeError {
  constructor(public readonly position: number, public readonly expected: string, public readonly found: string) {
    super('InvalidMagic', `Invalid magic at ${position}: expected "${expected}", found "${found}"`);
    this.name = 'InvalidMagicError';
  }
}

/**
 * A read of `width` bytes at `position` would run past `limit`
 * (the buffer length, or the end of a bounded region inside it).
 */
export class TruncatedError extends AssetDecodeError {
  constructor(public readonly position: number, public readonly width: number, public readonly limit: number) {
    super('Truncated', `Read of ${width} byte(s) at ${position} exceeds bound ${limit}`);
    this.name = 'TruncatedError';
  }
}

export class UnsupportedVersionError extends AssetDecodeError {
  constructor(public readonly subject: string, public readonly value: number, message?: string) {
    super('UnsupportedVersion', message ?? `Unsupported ${subject}: ${value}`);
    this.name = 'UnsupportedVersionError';
  }
}

/**
 * An enum-coded byte outside the known range.
 */
export class InvalidEnumError extends UnsupportedVersionError {
  constructor(enumName: string, value: number, public readonly position: number) {
    super(enumName, value, `Invalid ${enumName} value ${value} at ${position}`);
    this.name = 'InvalidEnumError';
  }
}

export class DecompressionFailedError extends AssetDecodeError {
  constructor(public readonly offset: number, public readonly length: number, cause: unknown) {
    super(
      'DecompressionFailed',
      `Failed to decompress body at ${offset} (${length} bytes): ${cause instanceof Error ? cause.message : String(cause)}`,
      cause
    );
    this.name = 'DecompressionFailedError';
  }
}

export class MissingFieldError extends AssetDecodeError {
  constructor(public readonly schema: string, public readonly field: string, public readonly tablePosition: number) {
    super('MissingField', `Required field ${schema}.${field} is absent in table at ${tablePosition}`);
    this.name = 'MissingFieldError';
  }
}
