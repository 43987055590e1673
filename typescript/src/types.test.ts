import { describe, it, expect } from 'vitest';
import {
  TypeTag,
  ALL_TYPE_TAGS,
  PAYLOAD_WIDTH,
  MaxULong,
  MinLong,
  MaxLong,
  tagName,
  bool,
  ubyte,
  byte,
  ushort,
  short,
  uint,
  int,
  ulong,
  long,
  float,
  double,
  checkScalar,
} from './types';

describe('scalar constructors', () => {
  it('tags each native value with its wire type', () => {
    expect(bool(true)).toEqual({ tag: TypeTag.Bool, value: true });
    expect(ubyte(42)).toEqual({ tag: TypeTag.UByte, value: 42 });
    expect(byte(-42)).toEqual({ tag: TypeTag.Byte, value: -42 });
    expect(ushort(42)).toEqual({ tag: TypeTag.UShort, value: 42 });
    expect(short(-42)).toEqual({ tag: TypeTag.Short, value: -42 });
    expect(uint(12345)).toEqual({ tag: TypeTag.UInt, value: 12345 });
    expect(int(-12345)).toEqual({ tag: TypeTag.Int, value: -12345 });
    expect(ulong(12345n)).toEqual({ tag: TypeTag.ULong, value: 12345n });
    expect(long(-12345n)).toEqual({ tag: TypeTag.Long, value: -12345n });
    expect(float(0.125)).toEqual({ tag: TypeTag.Float, value: 0.125 });
    expect(double(0.125)).toEqual({ tag: TypeTag.Double, value: 0.125 });
  });

  it('accepts the bounds of each integer type', () => {
    expect(ubyte(255).value).toBe(255);
    expect(byte(-128).value).toBe(-128);
    expect(byte(127).value).toBe(127);
    expect(ushort(65535).value).toBe(65535);
    expect(short(-32768).value).toBe(-32768);
    expect(uint(4294967295).value).toBe(4294967295);
    expect(int(-2147483648).value).toBe(-2147483648);
    expect(int(2147483647).value).toBe(2147483647);
    expect(ulong(MaxULong).value).toBe(18446744073709551615n);
    expect(long(MinLong).value).toBe(-9223372036854775808n);
    expect(long(MaxLong).value).toBe(9223372036854775807n);
  });

  it('rejects out-of-range integers', () => {
    expect(() => ubyte(256)).toThrow(RangeError);
    expect(() => ubyte(-1)).toThrow(RangeError);
    expect(() => byte(128)).toThrow(RangeError);
    expect(() => ushort(65536)).toThrow(RangeError);
    expect(() => short(-32769)).toThrow(RangeError);
    expect(() => uint(4294967296)).toThrow(RangeError);
    expect(() => int(2147483648)).toThrow(RangeError);
    expect(() => ulong(-1n)).toThrow(RangeError);
    expect(() => ulong(MaxULong + 1n)).toThrow(RangeError);
    expect(() => long(MaxLong + 1n)).toThrow(RangeError);
  });

  it('rejects non-integers for integer types', () => {
    expect(() => int(1.5)).toThrow(RangeError);
    expect(() => ubyte(Number.NaN)).toThrow(RangeError);
  });

  it('reports the offending value', () => {
    expect(() => ubyte(300)).toThrow('ubyte value 300 is outside valid range [0, 255]');
  });

  it('rounds floats to single precision', () => {
    expect(float(0.1).value).toBe(Math.fround(0.1));
    expect(float(0.1).value).not.toBe(0.1);
    expect(double(0.1).value).toBe(0.1);
  });
});

describe('TypeTag', () => {
  it('lists every tag once', () => {
    expect(ALL_TYPE_TAGS).toHaveLength(11);
    expect(new Set(ALL_TYPE_TAGS).size).toBe(11);
  });

  it('names tags', () => {
    expect(tagName(TypeTag.UShort)).toBe('UShort');
    expect(tagName(TypeTag.Double)).toBe('Double');
  });

  it('has fixed payload widths', () => {
    expect(PAYLOAD_WIDTH[TypeTag.Bool]).toBe(0);
    expect(PAYLOAD_WIDTH[TypeTag.Byte]).toBe(1);
    expect(PAYLOAD_WIDTH[TypeTag.Short]).toBe(2);
    expect(PAYLOAD_WIDTH[TypeTag.Float]).toBe(4);
    expect(PAYLOAD_WIDTH[TypeTag.ULong]).toBe(8);
  });
});

describe('checkScalar', () => {
  it('returns scalars that fit their tag', () => {
    expect(checkScalar({ tag: TypeTag.UInt, value: 12345 })).toEqual(uint(12345));
    expect(checkScalar({ tag: TypeTag.Long, value: MinLong })).toEqual(long(MinLong));
    expect(checkScalar({ tag: TypeTag.Bool, value: false })).toEqual(bool(false));
  });

  it('rejects values outside their tag', () => {
    expect(() => checkScalar({ tag: TypeTag.UByte, value: 300 })).toThrow(RangeError);
    expect(() => checkScalar({ tag: TypeTag.ULong, value: -1n })).toThrow(RangeError);
    expect(() => checkScalar({ tag: TypeTag.Int, value: 1.5 })).toThrow(RangeError);
    expect(() => checkScalar({ tag: TypeTag.Short, value: 40000 })).toThrow('short value 40000 is outside valid range [-32768, 32767]');
  });

  it('rounds hand-built floats to single precision', () => {
    expect(checkScalar({ tag: TypeTag.Float, value: 0.1 }).value).toBe(Math.fround(0.1));
  });
});
