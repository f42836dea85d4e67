/**
 * Test-only little-endian writer for assembling RMAN bodies and WAD archives.
 */

export class ByteWriter {
  private readonly bytes: number[] = [];

  get position(): number {
    return this.bytes.length;
  }

  u8(value: number): this {
    this.bytes.push(value & 0xff);
    return this;
  }

  u16(value: number): this {
    return this.u8(value).u8(value >>> 8);
  }

  u32(value: number): this {
    return this.u16(value & 0xffff).u16(value >>> 16);
  }

  i32(value: number): this {
    return this.u32(value >>> 0);
  }

  u64(value: bigint): this {
    for (let index = 0n; index < 8n; index++) {
      this.u8(Number((value >> (index * 8n)) & 0xffn));
    }
    return this;
  }

  raw(data: Uint8Array | readonly number[]): this {
    for (const byte of data) {
      this.u8(byte);
    }
    return this;
  }

  ascii(text: string): this {
    return this.raw(Buffer.from(text, 'latin1'));
  }

  zeros(count: number): this {
    for (let index = 0; index < count; index++) {
      this.u8(0);
    }
    return this;
  }

  patchU16(position: number, value: number): void {
    this.bytes[position] = value & 0xff;
    this.bytes[position + 1] = (value >>> 8) & 0xff;
  }

  patchU32(position: number, value: number): void {
    this.patchU16(position, value & 0xffff);
    this.patchU16(position + 2, value >>> 16);
  }

  toBuffer(): Buffer {
    return Buffer.from(this.bytes);
  }
}

export type FieldWriter = (writer: ByteWriter) => void;

/**
 * Writes a vtable of `slotCount` entries followed by its table. Fields are written in the
 * given order and their slots patched with the offset from the table start.
 *
 * @returns Absolute table position
 */
export function writeTable(writer: ByteWriter, slotCount: number, fields: ReadonlyArray<readonly [slot: number, write: FieldWriter]>): number {
  const vtable = writer.position;
  writer.zeros(slotCount * 2);
  const table = writer.position;
  writer.i32(table - vtable);
  for (const [slot, write] of fields) {
    writer.patchU16(vtable + slot * 2, writer.position - table);
    write(writer);
  }
  return table;
}

/**
 * Writes a count, one relative offset per element, then the element tables.
 *
 * @returns Absolute vector position
 */
export function writeTableVector<T>(writer: ByteWriter, elements: readonly T[], writeElement: (writer: ByteWriter, element: T) => number): number {
  const start = writer.position;
  writer.u32(elements.length);
  const entries: number[] = elements.map(() => {
    const entry = writer.position;
    writer.u32(0);
    return entry;
  });
  elements.forEach((element: T, index: number) => {
    const table = writeElement(writer, element);
    writer.patchU32(entries[index], table - entries[index]);
  });
  return start;
}

/**
 * Field value for an indirect string: a relative offset of 4, then the length-prefixed bytes.
 */
export function stringField(value: string | Uint8Array): FieldWriter {
  const bytes: Uint8Array = typeof value === 'string' ? Buffer.from(value, 'utf8') : value;
  return (writer: ByteWriter) => {
    writer.u32(4).u32(bytes.length).raw(bytes);
  };
}

export function longVectorField(values: readonly bigint[]): FieldWriter {
  return (writer: ByteWriter) => {
    writer.u32(values.length);
    values.forEach((value: bigint) => writer.u64(value));
  };
}

/**
 * Wraps `content` in a single-segment zstd frame holding one raw (stored) block.
 */
export function rawZstdFrame(content: Buffer): Buffer {
  const writer = new ByteWriter();
  writer.u32(0xfd2fb528);
  // Frame header descriptor: 4-byte content size, single segment, no checksum, no dictionary.
  writer.u8(0xa0);
  writer.u32(content.length);
  const blockHeader = 1 | (content.length << 3);
  writer.u8(blockHeader).u8(blockHeader >>> 8).u8(blockHeader >>> 16);
  writer.raw(content);
  return writer.toBuffer();
}
