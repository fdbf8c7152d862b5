import type { IntFieldType } from '../signatures/types.js';

/** Raised by {@link ByteReader} when a read runs past the end of its buffer. */
export class EndOfDataError extends Error {
  constructor(
    readonly offset: number,
    readonly wanted: number,
  ) {
    super(`unexpected end of data at offset ${offset} (wanted ${wanted} bytes)`);
    this.name = 'EndOfDataError';
  }
}

/**
 * Growable little-endian byte buffer.
 */
export class ByteWriter {
  private buf = new Uint8Array(64);
  private view = new DataView(this.buf.buffer);
  private len = 0;

  get length(): number {
    return this.len;
  }

  private reserve(extra: number): number {
    const at = this.len;
    if (at + extra > this.buf.length) {
      let size = this.buf.length * 2;
      while (size < at + extra) size *= 2;
      const next = new Uint8Array(size);
      next.set(this.buf.subarray(0, this.len));
      this.buf = next;
      this.view = new DataView(next.buffer);
    }
    this.len += extra;
    return at;
  }

  /** Write an integer; values are wrapped to the field width. */
  writeInt(type: IntFieldType, value: number): void {
    switch (type) {
      case 'i8':
        this.view.setInt8(this.reserve(1), value);
        return;
      case 'u8':
        this.view.setUint8(this.reserve(1), value);
        return;
      case 'i16':
        this.view.setInt16(this.reserve(2), value, true);
        return;
      case 'u16':
        this.view.setUint16(this.reserve(2), value, true);
        return;
      case 'i32':
        this.view.setInt32(this.reserve(4), value, true);
        return;
      case 'u32':
        this.view.setUint32(this.reserve(4), value, true);
        return;
    }
  }

  writeF32(value: number): void {
    this.view.setFloat32(this.reserve(4), value, true);
  }

  writeBytes(bytes: Uint8Array): void {
    const at = this.reserve(bytes.length);
    this.buf.set(bytes, at);
  }

  /** Overwrite a previously written field. */
  patchInt(offset: number, type: IntFieldType, value: number): void {
    const saved = this.len;
    this.len = offset;
    this.writeInt(type, value);
    this.len = saved;
  }

  toBytes(): Uint8Array {
    return this.buf.slice(0, this.len);
  }
}

/**
 * Little-endian cursor over a byte array.
 */
export class ByteReader {
  private readonly view: DataView;
  private pos = 0;

  constructor(private readonly bytes: Uint8Array) {
    this.view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  }

  get offset(): number {
    return this.pos;
  }

  get remaining(): number {
    return this.bytes.length - this.pos;
  }

  private advance(n: number): number {
    if (this.pos + n > this.bytes.length) throw new EndOfDataError(this.pos, n);
    const at = this.pos;
    this.pos += n;
    return at;
  }

  readInt(type: IntFieldType): number {
    switch (type) {
      case 'i8':
        return this.view.getInt8(this.advance(1));
      case 'u8':
        return this.view.getUint8(this.advance(1));
      case 'i16':
        return this.view.getInt16(this.advance(2), true);
      case 'u16':
        return this.view.getUint16(this.advance(2), true);
      case 'i32':
        return this.view.getInt32(this.advance(4), true);
      case 'u32':
        return this.view.getUint32(this.advance(4), true);
    }
  }

  readF32(): number {
    return this.view.getFloat32(this.advance(4), true);
  }

  readBytes(n: number): Uint8Array {
    const at = this.advance(n);
    return this.bytes.slice(at, at + n);
  }
}

export function bytesToHex(bytes: Uint8Array): string {
  return Array.from(bytes, (b) => b.toString(16).padStart(2, '0')).join('');
}

export function hexToBytes(hex: string): Uint8Array {
  const out = new Uint8Array(hex.length >> 1);
  for (let i = 0; i < out.length; i++) {
    out[i] = Number.parseInt(hex.slice(i * 2, i * 2 + 2), 16);
  }
  return out;
}
