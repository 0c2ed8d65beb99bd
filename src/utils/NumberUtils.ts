import { MicroShardResult, fail, ok } from "../errors/MicroShardError"

/**
 * Numeric argument accepted by public APIs: a safe integer number or a bigint.
 */
export type IntegerInput = number | bigint

/**
 * Converts a public integer argument to bigint.
 *
 * Range checks are left to the caller so that each field reports its own
 * error code (shard vs. timestamp). Only the shape is checked here.
 *
 * Failures:
 *   MS_INVALID_INPUT → null/undefined, wrong type, NaN, fraction, or an
 *                      unsafe integer number (which may already be rounded)
 */
export function toBigInt(value: IntegerInput, name: string): MicroShardResult<bigint> {
  if (typeof value === "bigint") {
    return ok(value)
  }

  if (typeof value === "number" && Number.isSafeInteger(value)) {
    return ok(BigInt(value))
  }

  return fail(
    "MS_INVALID_INPUT",
    `${name} must be a safe integer number or a bigint. ` +
    `Received: ${value === null ? "null" : value === undefined ? "undefined" : `${typeof value} ${String(value)}`}`
  )
}
