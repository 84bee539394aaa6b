/**
 * sdfkit Core: Struct Writer
 *
 * Lays out little-endian C structs with natural alignment. Every scalar is
 * aligned to its own size; struct() aligns the start and pads the end to
 * the struct's alignment, as a C compiler would for the target.
 */

export class StructWriter {
  private buf = Buffer.alloc(256);
  private offset = 0;

  get length(): number {
    return this.offset;
  }

  private reserve(bytes: number): void {
    const needed = this.offset + bytes;
    if (needed <= this.buf.length) return;
    let size = this.buf.length * 2;
    while (size < needed) size *= 2;
    const next = Buffer.alloc(size);
    this.buf.copy(next, 0, 0, this.offset);
    this.buf = next;
  }

  /** Zero-pad until the offset is a multiple of `alignment`. */
  align(alignment: number): this {
    const pad = (alignment - (this.offset % alignment)) % alignment;
    this.reserve(pad);
    this.offset += pad;
    return this;
  }

  u8(value: number): this {
    this.reserve(1);
    this.buf.writeUInt8(value, this.offset);
    this.offset += 1;
    return this;
  }

  u16(value: number): this {
    this.align(2).reserve(2);
    this.buf.writeUInt16LE(value, this.offset);
    this.offset += 2;
    return this;
  }

  u32(value: number): this {
    this.align(4).reserve(4);
    this.buf.writeUInt32LE(value, this.offset);
    this.offset += 4;
    return this;
  }

  u64(value: number): this {
    this.align(8).reserve(8);
    this.buf.writeBigUInt64LE(BigInt(value), this.offset);
    this.offset += 8;
    return this;
  }

  bool(value: boolean): this {
    return this.u8(value ? 1 : 0);
  }

  /** `length` bytes: `data` followed by zeros. Throws when data does not fit. */
  bytes(data: Uint8Array, length: number): this {
    if (data.length > length) {
      throw new RangeError(`${data.length} bytes do not fit in a ${length}-byte field`);
    }
    this.reserve(length);
    this.buf.set(data, this.offset);
    this.offset += length;
    return this;
  }

  /** NUL-terminated string in a fixed `length`-byte field. */
  cstring(value: string, length: number): this {
    const encoded = Buffer.from(value, 'utf8');
    if (encoded.length >= length) {
      throw new RangeError(`"${value}" does not fit in a ${length}-byte string field`);
    }
    return this.bytes(encoded, length);
  }

  struct(alignment: number, body: (w: this) => void): this {
    this.align(alignment);
    body(this);
    return this.align(alignment);
  }

  /**
   * Fixed-length array: the given items, then `empty` until `length`
   * entries are written.
   */
  array<T>(items: ReadonlyArray<T>, length: number, empty: T, write: (w: this, item: T) => void): this {
    if (items.length > length) {
      throw new RangeError(`${items.length} entries exceed a ${length}-entry table`);
    }
    for (let i = 0; i < length; i++) {
      write(this, i < items.length ? items[i] ?? empty : empty);
    }
    return this;
  }

  finish(): Uint8Array {
    this.align(8);
    return Uint8Array.from(this.buf.subarray(0, this.offset));
  }
}
