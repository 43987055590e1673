/**
 * Base error class for codec errors.
 */
export class CodecError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CodecError";
  }
}

/**
 * Error thrown when encoding fails.
 */
export class EncodeError extends CodecError {
  constructor(message: string) {
    super(message);
    this.name = "EncodeError";
  }
}

/**
 * Error thrown when decoding or converting a value fails.
 */
export class DecodeError extends CodecError {
  constructor(message: string) {
    super(message);
    this.name = "DecodeError";
  }
}

/**
 * Error thrown when buffer is exhausted during decoding.
 */
export class BufferUnderflowError extends DecodeError {
  constructor(needed: number, available: number) {
    super(`Buffer underflow: needed ${needed} bytes, only ${available} available`);
    this.name = "BufferUnderflowError";
  }
}

/**
 * Error thrown when an unknown format code is encountered.
 */
export class UnknownTypeCodeError extends DecodeError {
  readonly code: number;

  constructor(code: number, offset: number) {
    super(`Unknown type code 0x${code.toString(16).padStart(2, "0")} at offset ${offset}`);
    this.name = "UnknownTypeCodeError";
    this.code = code;
  }
}

/**
 * Error thrown when the requested type does not match the encoded or held type.
 */
export class TypeMismatchError extends DecodeError {
  constructor(expected: string, actual: string) {
    super(`Type mismatch: expected ${expected}, got ${actual}`);
    this.name = "TypeMismatchError";
  }
}

/**
 * Error thrown when reading from a Value that holds nothing.
 */
export class EmptyValueError extends DecodeError {
  constructor() {
    super("Value is empty");
    this.name = "EmptyValueError";
  }
}

/**
 * Outcome of a non-throwing read.
 */
export type DecodeResult<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: DecodeError };

/**
 * Runs a read, turning a thrown DecodeError into a failed result.
 * Errors outside the DecodeError family are rethrown.
 */
export function attempt<T>(read: () => T): DecodeResult<T> {
  try {
    return { ok: true, value: read() };
  } catch (err) {
    if (err instanceof DecodeError) {
      return { ok: false, error: err };
    }
    throw err;
  }
}
