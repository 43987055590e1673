/**
 * Primitive types of the AMQP 1.0 type system supported by this codec.
 *
 * The set is closed: composite types (lists, maps, arrays, described
 * types) and variable-width types (strings, binary, symbols) are not
 * represented.
 */
export enum TypeTag {
  Bool,
  UByte,
  Byte,
  UShort,
  Short,
  UInt,
  Int,
  ULong,
  Long,
  Float,
  Double,
}

/**
 * Every member of TypeTag, in declaration order.
 */
export const ALL_TYPE_TAGS: readonly TypeTag[] = [
  TypeTag.Bool,
  TypeTag.UByte,
  TypeTag.Byte,
  TypeTag.UShort,
  TypeTag.Short,
  TypeTag.UInt,
  TypeTag.Int,
  TypeTag.ULong,
  TypeTag.Long,
  TypeTag.Float,
  TypeTag.Double,
];

/**
 * AMQP 1.0 format codes.
 *
 * The fixed-width codes are what the encoder writes by default. The
 * compact codes (boolean with payload, uint0, smalluint, ulong0,
 * smallulong, smallint, smalllong) are always accepted by the decoder
 * and written by the encoder only in compact mode.
 */
export const WireCode = {
  True: 0x41,
  False: 0x42,
  Boolean: 0x56,
  UByte: 0x50,
  Byte: 0x51,
  UShort: 0x60,
  Short: 0x61,
  UInt: 0x70,
  UInt0: 0x43,
  SmallUInt: 0x52,
  Int: 0x71,
  SmallInt: 0x54,
  ULong: 0x80,
  ULong0: 0x44,
  SmallULong: 0x53,
  Long: 0x81,
  SmallLong: 0x55,
  Float: 0x72,
  Double: 0x82,
} as const;

/**
 * Payload width in bytes of a tag's fixed-width encoding.
 * Booleans carry their value in the code byte and have no payload.
 */
export const PAYLOAD_WIDTH: Readonly<Record<TypeTag, number>> = {
  [TypeTag.Bool]: 0,
  [TypeTag.UByte]: 1,
  [TypeTag.Byte]: 1,
  [TypeTag.UShort]: 2,
  [TypeTag.Short]: 2,
  [TypeTag.UInt]: 4,
  [TypeTag.Int]: 4,
  [TypeTag.ULong]: 8,
  [TypeTag.Long]: 8,
  [TypeTag.Float]: 4,
  [TypeTag.Double]: 8,
};

/**
 * Native TypeScript representation of a tag's values.
 */
export type NativeType<T extends TypeTag> = T extends TypeTag.Bool
  ? boolean
  : T extends TypeTag.ULong | TypeTag.Long
    ? bigint
    : number;

/**
 * One primitive paired with its wire type.
 */
export type Scalar = {
  [T in TypeTag]: { readonly tag: T; readonly value: NativeType<T> };
}[TypeTag];

/**
 * Returns the tag's name, e.g. "UShort".
 */
export function tagName(tag: TypeTag): string {
  return TypeTag[tag];
}

function checkInteger(name: string, value: number, min: number, max: number): number {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new RangeError(`${name} value ${value} is outside valid range [${min}, ${max}]`);
  }
  return value;
}

function checkBigInt(name: string, value: bigint, min: bigint, max: bigint): bigint {
  if (value < min || value > max) {
    throw new RangeError(`${name} value ${value} is outside valid range [${min}, ${max}]`);
  }
  return value;
}

/**
 * Unsigned and signed 64-bit integer bounds.
 */
export const MaxULong = BigInt("0xffffffffffffffff");
export const MinLong = BigInt("-9223372036854775808"); // -2^63
export const MaxLong = BigInt("9223372036854775807"); // 2^63 - 1

export function bool(value: boolean): Scalar {
  return { tag: TypeTag.Bool, value };
}

export function ubyte(value: number): Scalar {
  return { tag: TypeTag.UByte, value: checkInteger("ubyte", value, 0, 0xff) };
}

export function byte(value: number): Scalar {
  return { tag: TypeTag.Byte, value: checkInteger("byte", value, -0x80, 0x7f) };
}

export function ushort(value: number): Scalar {
  return { tag: TypeTag.UShort, value: checkInteger("ushort", value, 0, 0xffff) };
}

export function short(value: number): Scalar {
  return { tag: TypeTag.Short, value: checkInteger("short", value, -0x8000, 0x7fff) };
}

export function uint(value: number): Scalar {
  return { tag: TypeTag.UInt, value: checkInteger("uint", value, 0, 0xffffffff) };
}

export function int(value: number): Scalar {
  return { tag: TypeTag.Int, value: checkInteger("int", value, -0x80000000, 0x7fffffff) };
}

export function ulong(value: bigint): Scalar {
  return { tag: TypeTag.ULong, value: checkBigInt("ulong", value, 0n, MaxULong) };
}

export function long(value: bigint): Scalar {
  return { tag: TypeTag.Long, value: checkBigInt("long", value, MinLong, MaxLong) };
}

/**
 * Builds a 32-bit float scalar. The value is rounded to single precision.
 */
export function float(value: number): Scalar {
  return { tag: TypeTag.Float, value: Math.fround(value) };
}

export function double(value: number): Scalar {
  return { tag: TypeTag.Double, value };
}

/**
 * Checks a primitive built without the constructors above against its
 * tag's range.
 * @throws RangeError if the value does not fit its tag
 */
export function checkScalar(scalar: Scalar): Scalar {
  switch (scalar.tag) {
    case TypeTag.UByte:
      return ubyte(scalar.value);
    case TypeTag.Byte:
      return byte(scalar.value);
    case TypeTag.UShort:
      return ushort(scalar.value);
    case TypeTag.Short:
      return short(scalar.value);
    case TypeTag.UInt:
      return uint(scalar.value);
    case TypeTag.Int:
      return int(scalar.value);
    case TypeTag.ULong:
      return ulong(scalar.value);
    case TypeTag.Long:
      return long(scalar.value);
    case TypeTag.Float:
      return float(scalar.value);
    case TypeTag.Bool:
    case TypeTag.Double:
      return scalar;
  }
}
