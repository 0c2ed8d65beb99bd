import { MicroShardResult, fail, ok } from "../errors/MicroShardError"
import type { MicroShardInput } from "../types"
import { IdentifierCodec, RawIdentifier } from "./IdentifierCodec"
import { MicroShardUUID } from "./MicroShardUUID"

/**
 * Normalizes any accepted representation to a MicroShardUUID.
 *
 * Input handling:
 *   MicroShardUUID → returned as-is (immutable)
 *   string         → permissive hex decode (`-` anywhere)
 *   Buffer         → viewed over its exact byte range, no copy
 *   Uint8Array     → decoded directly
 *   ArrayBuffer    → wrapped in a Uint8Array view
 *   null/undefined → MS_INVALID_INPUT
 *   anything else  → MS_INVALID_INPUT
 *
 * Does not check version or variant.
 */
export function normalizeInput(input: MicroShardInput): MicroShardResult<MicroShardUUID> {
  if (input === null || input === undefined) {
    return fail(
      "MS_INVALID_INPUT",
      `MicroShard input is required. Received: ${input === null ? "null" : "undefined"}`
    )
  }

  if (input instanceof MicroShardUUID) {
    return ok(input)
  }

  let decoded: MicroShardResult<RawIdentifier>
  if (typeof input === "string") {
    decoded = IdentifierCodec.fromString(input)
  } else if (Buffer.isBuffer(input)) {
    decoded = IdentifierCodec.fromBytesBE(new Uint8Array(input.buffer, input.byteOffset, input.byteLength))
  } else if (input instanceof Uint8Array) {
    decoded = IdentifierCodec.fromBytesBE(input)
  } else if (input instanceof ArrayBuffer) {
    decoded = IdentifierCodec.fromBytesBE(new Uint8Array(input))
  } else {
    return fail(
      "MS_INVALID_INPUT",
      `Unsupported MicroShard input type "${typeof input}". ` +
      `Accepted: string, Uint8Array, Buffer, ArrayBuffer, MicroShardUUID.`
    )
  }

  if (!decoded.ok) {
    return decoded
  }

  return ok(MicroShardUUID.fromRaw(decoded.value))
}
