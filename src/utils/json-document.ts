/**
 * JSON rendering of decoded documents.
 * BigInt values become decimal strings and byte blobs base64, so the output survives JSON.parse.
 */

export type JsonValue = string | number | boolean | null | readonly JsonValue[] | { readonly [key: string]: JsonValue };

/**
 * Converts a decoded tree into plain JSON values.
 */
export function toJsonDocument(value: unknown): JsonValue {
  if (typeof value === 'bigint') {
    return value.toString();
  }
  if (Buffer.isBuffer(value)) {
    return value.toString('base64');
  }
  if (value === null || typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  if (Array.isArray(value)) {
    return value.map((item: unknown) => toJsonDocument(item));
  }
  if (typeof value === 'object') {
    const result: { [key: string]: JsonValue } = {};
    for (const [key, item] of Object.entries(value)) {
      if (item !== undefined) {
        result[key] = toJsonDocument(item);
      }
    }
    return result;
  }
  return null;
}

export function stringifyDocument(value: unknown, { compact = false }: { readonly compact?: boolean } = {}): string {
  return JSON.stringify(toJsonDocument(value), null, compact ? undefined : 2);
}
