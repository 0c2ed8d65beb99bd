/**
 * Error codes raised by the MicroShard codec.
 *
 * Every fallible operation maps its failure to exactly one of these codes so
 * callers can branch on `err.code` instead of parsing messages.
 */
export type MicroShardErrorCode =
  | "MS_INVALID_INPUT"      // required argument missing, or not an integer
  | "MS_BUFFER_TOO_SMALL"   // destination buffer cannot hold 16 bytes
  | "MS_INVALID_HEX"        // non-hex, non-dash character in identifier text
  | "MS_BAD_LENGTH"         // wrong digit/byte count, or ISO text too short
  | "MS_ISO_FORMAT"         // ISO-8601 text does not match the fixed pattern
  | "MS_ISO_RANGE"          // impossible calendar value, or pre-1970 instant
  | "MS_SHARD_OUT_OF_RANGE" // shard id outside 0 – 2^32-1
  | "MS_TIME_OVERFLOW"      // timestamp outside 0 – 2^54-1 microseconds
  | "MS_NOT_MICROSHARD"     // well-formed UUID without version 8 / variant 2

/**
 * Typed error for every MicroShard failure.
 */
export class MicroShardError extends Error {
  readonly code: MicroShardErrorCode

  constructor(code: MicroShardErrorCode, message: string) {
    super(message)
    this.name = "MicroShardError"
    this.code = code
    Object.setPrototypeOf(this, MicroShardError.prototype)
  }

  static isMicroShardError(value: unknown): value is MicroShardError {
    return value instanceof MicroShardError
  }
}

/**
 * Outcome of a fallible codec operation.
 *
 * The codec layers never throw on bad input; they return a failure carrying
 * the error. The facade unwraps and throws.
 */
export type MicroShardResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: MicroShardError }

export function ok<T>(value: T): MicroShardResult<T> {
  return { ok: true, value }
}

export function fail<T>(code: MicroShardErrorCode, message: string): MicroShardResult<T> {
  return { ok: false, error: new MicroShardError(code, message) }
}

/**
 * Returns the success value or throws the carried MicroShardError.
 */
export function unwrap<T>(result: MicroShardResult<T>): T {
  if (!result.ok) {
    throw result.error
  }

  return result.value
}
