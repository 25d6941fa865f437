/**
 * Typed error classes for the byte-string engine.
 *
 * Only caller-contract violations throw. Validation failures come back as
 * `{ ok: false }` results carrying the canonical empty value.
 */

/** Base class for all byte-string errors. */
export class ByteStringError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ByteStringError';
  }
}

/** An index outside `[0, length)` was read. */
export class ByteIndexOutOfRangeError extends ByteStringError {
  constructor(
    public readonly index: number,
    public readonly length: number,
  ) {
    super(`Byte index ${index} is out of range for a string of length ${length}`);
    this.name = 'ByteIndexOutOfRangeError';
  }
}
