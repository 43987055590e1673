/**
 * amqp-primitives - AMQP 1.0 primitive type codec for TypeScript
 *
 * Encodes and decodes booleans, 8- to 64-bit integers and IEEE-754
 * floats with strict, exact-type reads.
 *
 * @example
 * ```typescript
 * import { Encoder, Decoder, TypeTag } from 'amqp-primitives';
 *
 * // Encoding
 * const encoder = new Encoder();
 * encoder.writeBool(true).writeUShort(42);
 * const data = encoder.encode();
 *
 * // Decoding
 * const decoder = new Decoder(data);
 * decoder.getAs(TypeTag.Bool);   // true
 * decoder.getAs(TypeTag.Short);  // throws TypeMismatchError
 * decoder.getAs(TypeTag.UShort); // 42
 * ```
 */

// Core types
export {
  TypeTag,
  ALL_TYPE_TAGS,
  WireCode,
  PAYLOAD_WIDTH,
  MaxULong,
  MinLong,
  MaxLong,
  tagName,
  checkScalar,
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
} from "./types";
export type { NativeType, Scalar } from "./types";

// Errors
export {
  CodecError,
  EncodeError,
  DecodeError,
  BufferUnderflowError,
  UnknownTypeCodeError,
  TypeMismatchError,
  EmptyValueError,
} from "./errors";
export type { DecodeResult } from "./errors";

// Value
export { Value, CONVERSIONS, canConvert } from "./value";

// Rendering
export { formatScalar, renderScalars, DEFAULT_SEPARATOR } from "./render";
export type { RenderOptions } from "./render";

// Decoder
import { Decoder } from "./decoder";
export { Decoder };
export type { DecoderRenderOptions } from "./decoder";

// Encoder
import { Encoder } from "./encoder";
import type { EncoderOptions } from "./encoder";
import type { Scalar } from "./types";
export { Encoder };
export type { EncoderOptions };

/**
 * Library version.
 */
export const VERSION = "0.3.0";

/**
 * Encodes a sequence of primitives in one call.
 */
export function encodeAll(scalars: Iterable<Scalar>, options: EncoderOptions = {}): Uint8Array {
  return new Encoder(options).writeAll(scalars).encode();
}

/**
 * Decodes every element of a buffer, whatever its type.
 */
export function decodeAll(data: Uint8Array): Scalar[] {
  return [...new Decoder(data).peekAll()];
}
