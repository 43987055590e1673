import { DecodeError, DecodeResult, TypeMismatchError, UnknownTypeCodeError, attempt } from "./errors";
import { Reader } from "./reader";
import { RenderOptions, renderScalars } from "./render";
import { NativeType, Scalar, TypeTag, WireCode, tagName } from "./types";
import { Value } from "./value";

/**
 * Reads one element (code byte and payload) at the reader's position.
 * Compact AMQP encodings decode to the same tag as their fixed-width forms.
 */
function readElement(reader: Reader): Scalar {
  const offset = reader.position;
  const code = reader.readUint8();
  switch (code) {
    case WireCode.True:
      return { tag: TypeTag.Bool, value: true };
    case WireCode.False:
      return { tag: TypeTag.Bool, value: false };
    case WireCode.Boolean: {
      const b = reader.readUint8();
      if (b > 1) {
        throw new DecodeError(`Invalid boolean payload 0x${b.toString(16)} at offset ${offset + 1}`);
      }
      return { tag: TypeTag.Bool, value: b === 1 };
    }
    case WireCode.UByte:
      return { tag: TypeTag.UByte, value: reader.readUint8() };
    case WireCode.Byte:
      return { tag: TypeTag.Byte, value: reader.readInt8() };
    case WireCode.UShort:
      return { tag: TypeTag.UShort, value: reader.readUint16() };
    case WireCode.Short:
      return { tag: TypeTag.Short, value: reader.readInt16() };
    case WireCode.UInt:
      return { tag: TypeTag.UInt, value: reader.readUint32() };
    case WireCode.UInt0:
      return { tag: TypeTag.UInt, value: 0 };
    case WireCode.SmallUInt:
      return { tag: TypeTag.UInt, value: reader.readUint8() };
    case WireCode.Int:
      return { tag: TypeTag.Int, value: reader.readInt32() };
    case WireCode.SmallInt:
      return { tag: TypeTag.Int, value: reader.readInt8() };
    case WireCode.ULong:
      return { tag: TypeTag.ULong, value: reader.readUint64() };
    case WireCode.ULong0:
      return { tag: TypeTag.ULong, value: 0n };
    case WireCode.SmallULong:
      return { tag: TypeTag.ULong, value: BigInt(reader.readUint8()) };
    case WireCode.Long:
      return { tag: TypeTag.Long, value: reader.readInt64() };
    case WireCode.SmallLong:
      return { tag: TypeTag.Long, value: BigInt(reader.readInt8()) };
    case WireCode.Float:
      return { tag: TypeTag.Float, value: reader.readFloat32() };
    case WireCode.Double:
      return { tag: TypeTag.Double, value: reader.readFloat64() };
    default:
      throw new UnknownTypeCodeError(code, offset);
  }
}

/**
 * Options for rendering a decoder's elements.
 */
export interface DecoderRenderOptions extends RenderOptions {
  /** Render from offset 0 instead of the cursor. Default: false */
  fromStart?: boolean;
}

/**
 * Decoder extracts typed primitives from an AMQP-encoded buffer.
 *
 * Every read works on a fork of the cursor and commits only on success,
 * so a failed read leaves the decoder where it was and the caller may
 * retry with another type.
 *
 * @example
 * ```typescript
 * const decoder = new Decoder(data);
 * while (decoder.more()) {
 *   console.log(decoder.readValue().toString());
 * }
 * ```
 */
export class Decoder {
  private readonly data: Uint8Array;
  private cursor: Reader;

  constructor(data: Uint8Array) {
    this.data = data;
    this.cursor = new Reader(data);
  }

  /**
   * Returns the current position in the buffer.
   */
  get position(): number {
    return this.cursor.position;
  }

  /**
   * Returns the number of bytes remaining.
   */
  get remaining(): number {
    return this.cursor.remaining;
  }

  /**
   * Returns true if there is more data to read.
   */
  more(): boolean {
    return this.cursor.hasMore;
  }

  /**
   * Moves the cursor back to the start of the buffer.
   */
  rewind(): void {
    this.cursor = new Reader(this.data);
  }

  /**
   * Returns the tag of the next element without consuming it.
   */
  peekTag(): TypeTag {
    return readElement(this.cursor.fork()).tag;
  }

  /**
   * Reads the next element whatever its type.
   */
  readValue(): Value {
    const next = this.cursor.fork();
    const value = Value.of(readElement(next));
    this.cursor = next;
    return value;
  }

  /**
   * Consumes the next element.
   */
  skip(): void {
    const next = this.cursor.fork();
    readElement(next);
    this.cursor = next;
  }

  /**
   * Reads the next element, which must be encoded with exactly `tag`.
   * @throws TypeMismatchError if the encoded tag differs
   * @throws BufferUnderflowError if the buffer is exhausted or truncated
   * @throws UnknownTypeCodeError if the code byte is not a supported primitive
   */
  getAs<T extends TypeTag>(tag: T): NativeType<T> {
    return this.readExact(tag).get(tag);
  }

  /**
   * Same as {@link getAs}, returning the failure instead of throwing it.
   */
  tryGetAs<T extends TypeTag>(tag: T): DecodeResult<NativeType<T>> {
    return attempt(() => this.getAs(tag));
  }

  readBool(): boolean {
    return this.getAs(TypeTag.Bool);
  }

  readUByte(): number {
    return this.getAs(TypeTag.UByte);
  }

  readByte(): number {
    return this.getAs(TypeTag.Byte);
  }

  readUShort(): number {
    return this.getAs(TypeTag.UShort);
  }

  readShort(): number {
    return this.getAs(TypeTag.Short);
  }

  readUInt(): number {
    return this.getAs(TypeTag.UInt);
  }

  readInt(): number {
    return this.getAs(TypeTag.Int);
  }

  readULong(): bigint {
    return this.getAs(TypeTag.ULong);
  }

  readLong(): bigint {
    return this.getAs(TypeTag.Long);
  }

  readFloat(): number {
    return this.getAs(TypeTag.Float);
  }

  readDouble(): number {
    return this.getAs(TypeTag.Double);
  }

  /**
   * Reads a long as a JavaScript number.
   *
   * WARNING: values beyond Number.MAX_SAFE_INTEGER lose precision.
   * Use readLong() for full 64-bit precision.
   *
   * @param warnOnPrecisionLoss - If true (default), logs a warning when
   *                              precision loss occurs
   */
  readLongAsNumber(warnOnPrecisionLoss: boolean = true): number {
    return this.readExact(TypeTag.Long).asLongNumber(warnOnPrecisionLoss);
  }

  /**
   * Reads a ulong as a JavaScript number.
   *
   * @param warnOnPrecisionLoss - If true (default), logs a warning when
   *                              precision loss occurs
   */
  readULongAsNumber(warnOnPrecisionLoss: boolean = true): number {
    return this.readExact(TypeTag.ULong).asULongNumber(warnOnPrecisionLoss);
  }

  private readExact(tag: TypeTag): Value {
    const next = this.cursor.fork();
    const scalar = readElement(next);
    if (scalar.tag !== tag) {
      throw new TypeMismatchError(tagName(tag), tagName(scalar.tag));
    }
    this.cursor = next;
    return Value.of(scalar);
  }

  /**
   * Decodes every unread element (or every element, with `fromStart`)
   * without moving the cursor.
   */
  *peekAll(fromStart: boolean = false): Generator<Scalar> {
    const reader = fromStart ? new Reader(this.data) : this.cursor.fork();
    while (reader.hasMore) {
      yield readElement(reader);
    }
  }

  /**
   * Canonical rendering of the unread elements, e.g.
   * `true, false, 42`. The cursor does not move.
   */
  render(options: DecoderRenderOptions = {}): string {
    return renderScalars(this.peekAll(options.fromStart ?? false), options);
  }

  toString(): string {
    return this.render();
  }
}
