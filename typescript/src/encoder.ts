import { EncodeError } from "./errors";
import { RenderOptions, renderScalars } from "./render";
import {
  PAYLOAD_WIDTH,
  Scalar,
  TypeTag,
  WireCode,
  bool,
  byte,
  double,
  float,
  int,
  long,
  short,
  ubyte,
  uint,
  ulong,
  ushort,
} from "./types";
import { Value } from "./value";
import { Writer } from "./writer";

/**
 * Options for Encoder configuration.
 */
export interface EncoderOptions {
  /**
   * Use AMQP's compact encodings (uint0, smalluint, ulong0, smallulong,
   * smallint, smalllong) for values that fit them. Default: false
   */
  compact?: boolean;
}

function isSmallUnsigned(scalar: Scalar): boolean {
  switch (scalar.tag) {
    case TypeTag.UInt:
      return scalar.value <= 0xff;
    case TypeTag.ULong:
      return scalar.value <= 0xffn;
    default:
      return false;
  }
}

function isSmallSigned(scalar: Scalar): boolean {
  switch (scalar.tag) {
    case TypeTag.Int:
      return scalar.value >= -0x80 && scalar.value <= 0x7f;
    case TypeTag.Long:
      return scalar.value >= -0x80n && scalar.value <= 0x7fn;
    default:
      return false;
  }
}

function isZero(scalar: Scalar): boolean {
  return (scalar.tag === TypeTag.UInt && scalar.value === 0) || (scalar.tag === TypeTag.ULong && scalar.value === 0n);
}

/**
 * Number of bytes one element occupies on the wire, code byte included.
 */
function elementLength(scalar: Scalar, compact: boolean): number {
  if (compact && isZero(scalar)) {
    return 1;
  }
  if (compact && (isSmallUnsigned(scalar) || isSmallSigned(scalar))) {
    return 2;
  }
  return 1 + PAYLOAD_WIDTH[scalar.tag];
}

function writeElement(writer: Writer, scalar: Scalar, compact: boolean): void {
  switch (scalar.tag) {
    case TypeTag.Bool:
      writer.writeUint8(scalar.value ? WireCode.True : WireCode.False);
      break;
    case TypeTag.UByte:
      writer.writeUint8(WireCode.UByte);
      writer.writeUint8(scalar.value);
      break;
    case TypeTag.Byte:
      writer.writeUint8(WireCode.Byte);
      writer.writeInt8(scalar.value);
      break;
    case TypeTag.UShort:
      writer.writeUint8(WireCode.UShort);
      writer.writeUint16(scalar.value);
      break;
    case TypeTag.Short:
      writer.writeUint8(WireCode.Short);
      writer.writeInt16(scalar.value);
      break;
    case TypeTag.UInt:
      if (compact && scalar.value === 0) {
        writer.writeUint8(WireCode.UInt0);
      } else if (compact && scalar.value <= 0xff) {
        writer.writeUint8(WireCode.SmallUInt);
        writer.writeUint8(scalar.value);
      } else {
        writer.writeUint8(WireCode.UInt);
        writer.writeUint32(scalar.value);
      }
      break;
    case TypeTag.Int:
      if (compact && isSmallSigned(scalar)) {
        writer.writeUint8(WireCode.SmallInt);
        writer.writeInt8(scalar.value);
      } else {
        writer.writeUint8(WireCode.Int);
        writer.writeInt32(scalar.value);
      }
      break;
    case TypeTag.ULong:
      if (compact && scalar.value === 0n) {
        writer.writeUint8(WireCode.ULong0);
      } else if (compact && scalar.value <= 0xffn) {
        writer.writeUint8(WireCode.SmallULong);
        writer.writeUint8(Number(scalar.value));
      } else {
        writer.writeUint8(WireCode.ULong);
        writer.writeUint64(scalar.value);
      }
      break;
    case TypeTag.Long:
      if (compact && isSmallSigned(scalar)) {
        writer.writeUint8(WireCode.SmallLong);
        writer.writeInt8(Number(scalar.value));
      } else {
        writer.writeUint8(WireCode.Long);
        writer.writeInt64(scalar.value);
      }
      break;
    case TypeTag.Float:
      writer.writeUint8(WireCode.Float);
      writer.writeFloat32(scalar.value);
      break;
    case TypeTag.Double:
      writer.writeUint8(WireCode.Double);
      writer.writeFloat64(scalar.value);
      break;
  }
}

/**
 * Encoder collects typed primitives and serializes them as AMQP.
 *
 * Values are kept in insertion order; the bytes are rebuilt from them on
 * every call to {@link encode}.
 *
 * @example
 * ```typescript
 * const encoder = new Encoder();
 * encoder.writeBool(true).writeUShort(42).writeDouble(0.125);
 * const data = encoder.encode();
 * ```
 */
export class Encoder {
  private readonly items: Value[] = [];
  private readonly compact: boolean;

  constructor(options: EncoderOptions = {}) {
    this.compact = options.compact ?? false;
  }

  /**
   * Returns the number of stored values.
   */
  get size(): number {
    return this.items.length;
  }

  /**
   * Appends a primitive.
   */
  write(scalar: Scalar): this {
    this.items.push(Value.of(scalar));
    return this;
  }

  /**
   * Appends each primitive in order.
   */
  writeAll(scalars: Iterable<Scalar>): this {
    for (const scalar of scalars) {
      this.write(scalar);
    }
    return this;
  }

  /**
   * Appends a copy of the primitive a Value holds.
   * @throws EncodeError if the value is empty
   */
  writeValue(value: Value): this {
    if (value.isEmpty) {
      throw new EncodeError("Cannot encode an empty value");
    }
    return this.write(value.toScalar());
  }

  writeBool(value: boolean): this {
    return this.write(bool(value));
  }

  writeUByte(value: number): this {
    return this.write(ubyte(value));
  }

  writeByte(value: number): this {
    return this.write(byte(value));
  }

  writeUShort(value: number): this {
    return this.write(ushort(value));
  }

  writeShort(value: number): this {
    return this.write(short(value));
  }

  writeUInt(value: number): this {
    return this.write(uint(value));
  }

  writeInt(value: number): this {
    return this.write(int(value));
  }

  writeULong(value: bigint): this {
    return this.write(ulong(value));
  }

  writeLong(value: bigint): this {
    return this.write(long(value));
  }

  writeFloat(value: number): this {
    return this.write(float(value));
  }

  writeDouble(value: number): this {
    return this.write(double(value));
  }

  /**
   * Returns copies of the stored values in insertion order.
   */
  values(): Value[] {
    return this.items.map((item) => Value.of(item.toScalar()));
  }

  /**
   * Removes every stored value.
   */
  clear(): void {
    this.items.length = 0;
  }

  /**
   * Returns the number of bytes {@link encode} produces.
   */
  encodedLength(): number {
    let length = 0;
    for (const item of this.items) {
      length += elementLength(item.toScalar(), this.compact);
    }
    return length;
  }

  /**
   * Serializes the stored values. Each call returns a new buffer.
   */
  encode(): Uint8Array {
    const writer = new Writer(this.encodedLength());
    for (const item of this.items) {
      writeElement(writer, item.toScalar(), this.compact);
    }
    return writer.bytes();
  }

  /**
   * Canonical rendering of the stored values, e.g. `true, 42, 0.125`.
   */
  render(options: RenderOptions = {}): string {
    return renderScalars(
      this.items.map((item) => item.toScalar()),
      options
    );
  }

  toString(): string {
    return this.render();
  }
}
