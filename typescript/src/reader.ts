import { BufferUnderflowError } from "./errors";

/**
 * Reader is a bounds-checked big-endian cursor over a byte buffer.
 *
 * The buffer is never copied or modified. Several readers may share one
 * buffer; `fork()` creates an independent cursor at the same position.
 */
export class Reader {
  private buffer: Uint8Array;
  private view: DataView;
  private pos: number;
  private end: number;

  constructor(data: Uint8Array, position: number = 0) {
    this.buffer = data;
    this.view = new DataView(data.buffer, data.byteOffset, data.byteLength);
    this.pos = position;
    this.end = data.length;
  }

  /**
   * Returns the current position in the buffer.
   */
  get position(): number {
    return this.pos;
  }

  /**
   * Returns the number of bytes remaining.
   */
  get remaining(): number {
    return this.end - this.pos;
  }

  /**
   * Returns true if there is more data to read.
   */
  get hasMore(): boolean {
    return this.pos < this.end;
  }

  /**
   * Returns a reader over the same buffer positioned where this one is.
   */
  fork(): Reader {
    return new Reader(this.buffer, this.pos);
  }

  /**
   * Checks if there are enough bytes available.
   */
  private checkAvailable(needed: number): void {
    if (this.pos + needed > this.end) {
      throw new BufferUnderflowError(needed, this.remaining);
    }
  }

  /**
   * Reads an unsigned byte.
   */
  readUint8(): number {
    this.checkAvailable(1);
    return this.buffer[this.pos++];
  }

  /**
   * Reads a two's-complement signed byte.
   */
  readInt8(): number {
    this.checkAvailable(1);
    const value = this.view.getInt8(this.pos);
    this.pos += 1;
    return value;
  }

  readUint16(): number {
    this.checkAvailable(2);
    const value = this.view.getUint16(this.pos); // Big-endian
    this.pos += 2;
    return value;
  }

  readInt16(): number {
    this.checkAvailable(2);
    const value = this.view.getInt16(this.pos);
    this.pos += 2;
    return value;
  }

  readUint32(): number {
    this.checkAvailable(4);
    const value = this.view.getUint32(this.pos);
    this.pos += 4;
    return value;
  }

  readInt32(): number {
    this.checkAvailable(4);
    const value = this.view.getInt32(this.pos);
    this.pos += 4;
    return value;
  }

  readUint64(): bigint {
    this.checkAvailable(8);
    const value = this.view.getBigUint64(this.pos);
    this.pos += 8;
    return value;
  }

  readInt64(): bigint {
    this.checkAvailable(8);
    const value = this.view.getBigInt64(this.pos);
    this.pos += 8;
    return value;
  }

  /**
   * Reads a 32-bit float (IEEE 754).
   */
  readFloat32(): number {
    this.checkAvailable(4);
    const value = this.view.getFloat32(this.pos);
    this.pos += 4;
    return value;
  }

  /**
   * Reads a 64-bit float (IEEE 754).
   */
  readFloat64(): number {
    this.checkAvailable(8);
    const value = this.view.getFloat64(this.pos);
    this.pos += 8;
    return value;
  }
}
