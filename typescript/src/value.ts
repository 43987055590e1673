import { DecodeResult, EmptyValueError, TypeMismatchError, attempt } from "./errors";
import { Reader } from "./reader";
import { formatScalar } from "./render";
import { NativeType, Scalar, TypeTag, checkScalar, tagName } from "./types";
import { Writer } from "./writer";

/**
 * Held tags each conversion target accepts.
 *
 * Integers widen only within their signedness; Float and Double are
 * distinct; booleans never convert to or from numbers.
 */
export const CONVERSIONS: Readonly<Record<TypeTag, readonly TypeTag[]>> = {
  [TypeTag.Bool]: [TypeTag.Bool],
  [TypeTag.UByte]: [TypeTag.UByte],
  [TypeTag.Byte]: [TypeTag.Byte],
  [TypeTag.UShort]: [TypeTag.UByte, TypeTag.UShort],
  [TypeTag.Short]: [TypeTag.Byte, TypeTag.Short],
  [TypeTag.UInt]: [TypeTag.UByte, TypeTag.UShort, TypeTag.UInt],
  [TypeTag.Int]: [TypeTag.Byte, TypeTag.Short, TypeTag.Int],
  [TypeTag.ULong]: [TypeTag.UByte, TypeTag.UShort, TypeTag.UInt, TypeTag.ULong],
  [TypeTag.Long]: [TypeTag.Byte, TypeTag.Short, TypeTag.Int, TypeTag.Long],
  [TypeTag.Float]: [TypeTag.Float],
  [TypeTag.Double]: [TypeTag.Double],
};

/**
 * Returns true if a value holding `held` may be read as `target`.
 */
export function canConvert(held: TypeTag, target: TypeTag): boolean {
  return CONVERSIONS[target].includes(held);
}

function toNumber(held: Scalar, target: TypeTag): number | undefined {
  if (!canConvert(held.tag, target) || typeof held.value !== "number") {
    return undefined;
  }
  return held.value;
}

function toBigInt(held: Scalar, target: TypeTag): bigint | undefined {
  if (!canConvert(held.tag, target) || typeof held.value === "boolean") {
    return undefined;
  }
  return typeof held.value === "bigint" ? held.value : BigInt(held.value);
}

type Converters = { [T in TypeTag]: (held: Scalar) => NativeType<T> | undefined };

const CONVERTERS: Converters = {
  [TypeTag.Bool]: (held) => (held.tag === TypeTag.Bool ? held.value : undefined),
  [TypeTag.UByte]: (held) => toNumber(held, TypeTag.UByte),
  [TypeTag.Byte]: (held) => toNumber(held, TypeTag.Byte),
  [TypeTag.UShort]: (held) => toNumber(held, TypeTag.UShort),
  [TypeTag.Short]: (held) => toNumber(held, TypeTag.Short),
  [TypeTag.UInt]: (held) => toNumber(held, TypeTag.UInt),
  [TypeTag.Int]: (held) => toNumber(held, TypeTag.Int),
  [TypeTag.ULong]: (held) => toBigInt(held, TypeTag.ULong),
  [TypeTag.Long]: (held) => toBigInt(held, TypeTag.Long),
  [TypeTag.Float]: (held) => toNumber(held, TypeTag.Float),
  [TypeTag.Double]: (held) => toNumber(held, TypeTag.Double),
};

/**
 * Encodes a primitive's fixed-width payload in wire byte order.
 */
export function encodePayload(scalar: Scalar): Uint8Array {
  const writer = new Writer(8);
  switch (scalar.tag) {
    case TypeTag.Bool:
      writer.writeUint8(scalar.value ? 1 : 0);
      break;
    case TypeTag.UByte:
      writer.writeUint8(scalar.value);
      break;
    case TypeTag.Byte:
      writer.writeInt8(scalar.value);
      break;
    case TypeTag.UShort:
      writer.writeUint16(scalar.value);
      break;
    case TypeTag.Short:
      writer.writeInt16(scalar.value);
      break;
    case TypeTag.UInt:
      writer.writeUint32(scalar.value);
      break;
    case TypeTag.Int:
      writer.writeInt32(scalar.value);
      break;
    case TypeTag.ULong:
      writer.writeUint64(scalar.value);
      break;
    case TypeTag.Long:
      writer.writeInt64(scalar.value);
      break;
    case TypeTag.Float:
      writer.writeFloat32(scalar.value);
      break;
    case TypeTag.Double:
      writer.writeFloat64(scalar.value);
      break;
  }
  return writer.bytes();
}

/**
 * Reads a primitive of the given tag from its fixed-width payload.
 */
export function decodePayload(tag: TypeTag, payload: Uint8Array): Scalar {
  const reader = new Reader(payload);
  switch (tag) {
    case TypeTag.Bool:
      return { tag, value: reader.readUint8() !== 0 };
    case TypeTag.UByte:
      return { tag, value: reader.readUint8() };
    case TypeTag.Byte:
      return { tag, value: reader.readInt8() };
    case TypeTag.UShort:
      return { tag, value: reader.readUint16() };
    case TypeTag.Short:
      return { tag, value: reader.readInt16() };
    case TypeTag.UInt:
      return { tag, value: reader.readUint32() };
    case TypeTag.Int:
      return { tag, value: reader.readInt32() };
    case TypeTag.ULong:
      return { tag, value: reader.readUint64() };
    case TypeTag.Long:
      return { tag, value: reader.readInt64() };
    case TypeTag.Float:
      return { tag, value: reader.readFloat32() };
    case TypeTag.Double:
      return { tag, value: reader.readFloat64() };
  }
}

function warnPrecisionLoss(kind: string, value: bigint): void {
  console.warn(
    `amqp-primitives: ${kind} value ${value} exceeds safe integer range ` +
      `(${Number.MIN_SAFE_INTEGER} to ${Number.MAX_SAFE_INTEGER}), ` +
      `precision may be lost. Use the bigint accessor for full precision.`
  );
}

function isSafe(value: bigint): boolean {
  return value <= BigInt(Number.MAX_SAFE_INTEGER) && value >= BigInt(Number.MIN_SAFE_INTEGER);
}

/**
 * Value holds at most one primitive together with its wire type.
 *
 * The primitive is kept as its wire payload; conversions read it back and
 * check the requested type against {@link CONVERSIONS}.
 *
 * @example
 * ```typescript
 * const v = Value.of(byte(3));
 * v.asLong();  // 3n
 * v.asBool();  // throws TypeMismatchError
 * ```
 */
export class Value {
  private held: { tag: TypeTag; payload: Uint8Array } | undefined;

  constructor(scalar?: Scalar) {
    this.held = undefined;
    if (scalar !== undefined) {
      this.assign(scalar);
    }
  }

  static of(scalar: Scalar): Value {
    return new Value(scalar);
  }

  /**
   * Returns the held wire type, or undefined when empty.
   */
  get tag(): TypeTag | undefined {
    return this.held?.tag;
  }

  get isEmpty(): boolean {
    return this.held === undefined;
  }

  /**
   * Replaces the held primitive. Returns this value for chaining.
   * @throws RangeError if the value does not fit its tag; the held primitive is kept
   */
  assign(scalar: Scalar): this {
    const checked = checkScalar(scalar);
    this.held = { tag: checked.tag, payload: encodePayload(checked) };
    return this;
  }

  clear(): void {
    this.held = undefined;
  }

  /**
   * Returns the held primitive exactly as stored.
   * @throws EmptyValueError if nothing is held
   */
  toScalar(): Scalar {
    if (this.held === undefined) {
      throw new EmptyValueError();
    }
    return decodePayload(this.held.tag, this.held.payload);
  }

  /**
   * Returns the held primitive converted to `target`'s native type.
   * @throws EmptyValueError if nothing is held
   * @throws TypeMismatchError if the held tag does not convert to `target`
   */
  get<T extends TypeTag>(target: T): NativeType<T> {
    const held = this.toScalar();
    const converted = CONVERTERS[target](held);
    if (converted === undefined) {
      throw new TypeMismatchError(tagName(target), tagName(held.tag));
    }
    return converted;
  }

  /**
   * Same as {@link get}, returning the failure instead of throwing it.
   */
  tryGet<T extends TypeTag>(target: T): DecodeResult<NativeType<T>> {
    return attempt(() => this.get(target));
  }

  asBool(): boolean {
    return this.get(TypeTag.Bool);
  }

  asUByte(): number {
    return this.get(TypeTag.UByte);
  }

  asByte(): number {
    return this.get(TypeTag.Byte);
  }

  asUShort(): number {
    return this.get(TypeTag.UShort);
  }

  asShort(): number {
    return this.get(TypeTag.Short);
  }

  asUInt(): number {
    return this.get(TypeTag.UInt);
  }

  asInt(): number {
    return this.get(TypeTag.Int);
  }

  asULong(): bigint {
    return this.get(TypeTag.ULong);
  }

  asLong(): bigint {
    return this.get(TypeTag.Long);
  }

  asFloat(): number {
    return this.get(TypeTag.Float);
  }

  asDouble(): number {
    return this.get(TypeTag.Double);
  }

  /**
   * Reads a signed 64-bit value as a JavaScript number.
   *
   * WARNING: values beyond Number.MAX_SAFE_INTEGER lose precision.
   *
   * @param warnOnPrecisionLoss - If true (default), logs a warning when
   *                              precision loss occurs
   */
  asLongNumber(warnOnPrecisionLoss: boolean = true): number {
    const value = this.asLong();
    if (warnOnPrecisionLoss && !isSafe(value)) {
      warnPrecisionLoss("long", value);
    }
    return Number(value);
  }

  /**
   * Reads an unsigned 64-bit value as a JavaScript number.
   *
   * @param warnOnPrecisionLoss - If true (default), logs a warning when
   *                              precision loss occurs
   */
  asULongNumber(warnOnPrecisionLoss: boolean = true): number {
    const value = this.asULong();
    if (warnOnPrecisionLoss && !isSafe(value)) {
      warnPrecisionLoss("ulong", value);
    }
    return Number(value);
  }

  /**
   * Returns the fixed-width wire payload, or undefined when empty.
   */
  payload(): Uint8Array | undefined {
    return this.held?.payload.slice();
  }

  /**
   * True if both values are empty, or hold the same tag and payload.
   */
  equals(other: Value): boolean {
    if (this.held === undefined || other.held === undefined) {
      return this.held === other.held;
    }
    if (this.held.tag !== other.held.tag) {
      return false;
    }
    const a = this.held.payload;
    const b = other.held.payload;
    return a.length === b.length && a.every((byte, i) => byte === b[i]);
  }

  /**
   * Canonical printed form of the held primitive; empty string when empty.
   */
  toString(): string {
    return this.held === undefined ? "" : formatScalar(this.toScalar());
  }
}
