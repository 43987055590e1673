import { describe, it, expect } from 'vitest';
import { Writer } from './writer';
import { Reader } from './reader';
import { BufferUnderflowError } from './errors';

describe('Writer', () => {
  describe('integers', () => {
    it('writes uint16 big-endian', () => {
      const writer = new Writer();
      writer.writeUint16(42);
      expect(writer.bytes()).toEqual(new Uint8Array([0x00, 0x2a]));
    });

    it('writes int16 two\'s complement', () => {
      const writer = new Writer();
      writer.writeInt16(-42);
      expect(writer.bytes()).toEqual(new Uint8Array([0xff, 0xd6]));
    });

    it('writes int32 two\'s complement', () => {
      const writer = new Writer();
      writer.writeInt32(-12345);
      expect(writer.bytes()).toEqual(new Uint8Array([0xff, 0xff, 0xcf, 0xc7]));
    });

    it('writes uint64 big-endian', () => {
      const writer = new Writer();
      writer.writeUint64(12345n);
      expect(writer.bytes()).toEqual(new Uint8Array([0, 0, 0, 0, 0, 0, 0x30, 0x39]));
    });

    it('writes int8', () => {
      const writer = new Writer();
      writer.writeInt8(-1);
      writer.writeUint8(0x1ff);
      expect(writer.bytes()).toEqual(new Uint8Array([0xff, 0xff]));
    });
  });

  describe('floats', () => {
    it('writes float32', () => {
      const writer = new Writer();
      writer.writeFloat32(0.125);
      expect(writer.bytes()).toEqual(new Uint8Array([0x3e, 0x00, 0x00, 0x00]));
    });

    it('writes float64', () => {
      const writer = new Writer();
      writer.writeFloat64(0.125);
      expect(writer.bytes()).toEqual(new Uint8Array([0x3f, 0xc0, 0, 0, 0, 0, 0, 0]));
    });
  });

  describe('capacity', () => {
    it('grows past its initial capacity', () => {
      const writer = new Writer(1);
      for (let i = 0; i < 10; i++) {
        writer.writeUint32(i);
      }
      expect(writer.position).toBe(40);

      const reader = new Reader(writer.bytes());
      for (let i = 0; i < 10; i++) {
        expect(reader.readUint32()).toBe(i);
      }
      expect(reader.hasMore).toBe(false);
    });

    it('accepts a zero initial capacity', () => {
      const writer = new Writer(0);
      writer.writeInt64(-2n);
      expect(writer.bytes()).toEqual(new Uint8Array([0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xfe]));
    });
  });
});

describe('Reader', () => {
  it('reads big-endian values written by Writer', () => {
    const writer = new Writer();
    writer.writeInt8(-5);
    writer.writeUint16(65535);
    writer.writeInt64(-12345n);
    writer.writeFloat64(Math.PI);

    const reader = new Reader(writer.bytes());
    expect(reader.readInt8()).toBe(-5);
    expect(reader.readUint16()).toBe(65535);
    expect(reader.readInt64()).toBe(-12345n);
    expect(reader.readFloat64()).toBe(Math.PI);
    expect(reader.remaining).toBe(0);
  });

  it('throws on underflow without moving', () => {
    const reader = new Reader(new Uint8Array([1, 2]));
    expect(() => reader.readUint32()).toThrow(BufferUnderflowError);
    expect(() => reader.readUint32()).toThrow('Buffer underflow: needed 4 bytes, only 2 available');
    expect(reader.position).toBe(0);
  });

  it('forks an independent cursor', () => {
    const reader = new Reader(new Uint8Array([1, 2, 3]));
    reader.readUint8();
    const fork = reader.fork();
    expect(fork.readUint8()).toBe(2);
    expect(fork.position).toBe(2);
    expect(reader.position).toBe(1);
  });

  it('respects the byte offset of a subarray', () => {
    const data = new Uint8Array([0xaa, 0x00, 0x2a, 0xbb]).subarray(1, 3);
    const reader = new Reader(data);
    expect(reader.readUint16()).toBe(42);
    expect(reader.hasMore).toBe(false);
  });
});
