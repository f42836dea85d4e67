/**
 * Offset-indexed record tables, flatbuffer style.
 *
 * A table starts with a signed 32-bit offset to its vtable; the vtable holds one u16 field
 * offset per schema slot, where 0 marks an absent field. Vectors and strings are reached
 * through relative u32 offsets.
 */
import { MissingFieldError } from '../errors.js';
import { readBytes, readI32, readU16, readU32, readU64, readU8 } from './byte-cursor.js';

/**
 * Fixed slot layout of one record type. Slot `i` lives at `vtable + 2 * i`; slots that are
 * never read still take their place in the vtable.
 */
export interface TableSchema<K extends string> {
  readonly name: string;
  readonly slots: Readonly<Record<K, number>>;
  readonly slotCount: number;
}

export function defineTableSchema<K extends string>(name: string, slots: Readonly<Record<K, number>>): TableSchema<K> {
  return { name, slots, slotCount: Object.keys(slots).length };
}

/**
 * A table whose vtable has been read once; field lookups index into `offsets`.
 */
export class ResolvedTable<K extends string> {
  constructor(
    readonly buffer: Buffer,
    readonly schema: TableSchema<K>,
    readonly position: number,
    readonly vtablePosition: number,
    private readonly offsets: readonly number[]
  ) {}

  /**
   * Absolute position of a field's value, or undefined when the vtable marks it absent.
   */
  fieldPosition(field: K): number | undefined {
    const offset = this.offsets[this.schema.slots[field]];
    return offset === 0 ? undefined : this.position + offset;
  }

  /**
   * @throws {MissingFieldError} If the field is absent
   */
  requireField(field: K): number {
    const position = this.fieldPosition(field);
    if (position === undefined) {
      throw new MissingFieldError(this.schema.name, field, this.position);
    }
    return position;
  }

  readU8(field: K): number {
    return readU8(this.buffer, this.requireField(field));
  }

  readU32(field: K): number {
    return readU32(this.buffer, this.requireField(field));
  }

  readU64(field: K): bigint {
    return readU64(this.buffer, this.requireField(field));
  }

  /**
   * Reads an optional u64, substituting `fallback` when the field is absent.
   */
  readU64Or(field: K, fallback: bigint): bigint {
    const position = this.fieldPosition(field);
    return position === undefined ? fallback : readU64(this.buffer, position);
  }

  readU32Or(field: K, fallback: number): number {
    const position = this.fieldPosition(field);
    return position === undefined ? fallback : readU32(this.buffer, position);
  }

  readString(field: K): string {
    return decodeIndirectString(this.buffer, this.requireField(field));
  }

  readStringOr(field: K, fallback: string): string {
    const position = this.fieldPosition(field);
    return position === undefined ? fallback : decodeIndirectString(this.buffer, position);
  }
}

/**
 * Locates a table's vtable and reads one field offset per schema slot.
 * The vtable sits at `tablePosition - soffset`; soffset may have either sign.
 */
export function resolveTable<K extends string>(buffer: Buffer, tablePosition: number, schema: TableSchema<K>): ResolvedTable<K> {
  const soffset: number = readI32(buffer, tablePosition);
  const vtablePosition: number = tablePosition - soffset;
  const offsets: number[] = new Array<number>(schema.slotCount);
  for (let slot = 0; slot < schema.slotCount; slot++) {
    offsets[slot] = readU16(buffer, vtablePosition + slot * 2);
  }
  return new ResolvedTable(buffer, schema, tablePosition, vtablePosition, offsets);
}

/**
 * Decodes a length-prefixed vector of relative table references, in index order.
 *
 * @param vectorStart - Absolute position of the u32 element count
 * @param decodeElement - Builds one record from a resolved element table
 */
export function decodeTableVector<K extends string, T>(
  buffer: Buffer,
  vectorStart: number,
  schema: TableSchema<K>,
  decodeElement: (table: ResolvedTable<K>) => T
): T[] {
  const count: number = readU32(buffer, vectorStart);
  const elements: T[] = [];
  for (let index = 0; index < count; index++) {
    const entryPosition = vectorStart + 4 + index * 4;
    const tablePosition = entryPosition + readU32(buffer, entryPosition);
    elements.push(decodeElement(resolveTable(buffer, tablePosition, schema)));
  }
  return elements;
}

/**
 * Decodes a length-prefixed vector of inline u64 values.
 */
export function decodeLongVector(buffer: Buffer, start: number): bigint[] {
  const count: number = readU32(buffer, start);
  // The whole run must fit before any element is read.
  readBytes(buffer, start + 4, count * 8);
  const values: bigint[] = [];
  for (let index = 0; index < count; index++) {
    values.push(buffer.readBigUInt64LE(start + 4 + index * 8));
  }
  return values;
}

/**
 * Follows the relative offset stored at `fieldPosition` to a length-prefixed UTF-8 blob.
 * Invalid UTF-8 is replaced with U+FFFD rather than rejected.
 */
export function decodeIndirectString(buffer: Buffer, fieldPosition: number): string {
  const lengthPosition: number = fieldPosition + readU32(buffer, fieldPosition);
  const length: number = readU32(buffer, lengthPosition);
  return readBytes(buffer, lengthPosition + 4, length).toString('utf8');
}
