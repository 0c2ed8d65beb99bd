import type { MicroShardErrorCode } from "../errors/MicroShardError"
import type { MicroShardInput } from "../types"
import { normalizeInput } from "./InputNormalizer"
import { VARIANT, VERSION } from "./Layout"

/**
 * Detailed result from MicroShardVerifier.verifyDetailed().
 *
 * Prefer verify() where only valid/invalid matters. Use verifyDetailed() in
 * request validation or logging where the failure reason matters.
 */
export type VerifyResult =
  | { valid: true }
  | { valid: false; reason: VerifyFailureReason }

/**
 * All possible reasons a MicroShard verification can fail.
 */
export type VerifyFailureReason =
  | "NULL_INPUT"            // input is null or undefined
  | "UNSUPPORTED_TYPE"      // not a string, Uint8Array, Buffer, ArrayBuffer or MicroShardUUID
  | "INVALID_HEX"           // string contains a character other than hex digits and "-"
  | "INVALID_STRING_LENGTH" // string is not 32 hex digits once "-" is removed
  | "INVALID_BINARY_LENGTH" // binary is not exactly 16 bytes
  | "INVALID_VERSION"       // version field is not 8
  | "INVALID_VARIANT"       // variant field is not 2

/**
 * Stateless structural verifier for MicroShard UUIDs.
 *
 * A MicroShard UUID is structurally valid when it decodes to 128 bits whose
 * version field is 8 and whose variant field is 2. Any 54-bit timestamp,
 * 32-bit shard and 36-bit random value is acceptable.
 *
 * Verification never throws on bad input: every failure becomes `false`
 * (verify) or a typed reason (verifyDetailed).
 */
export class MicroShardVerifier {
  /**
   * @example
   * ```ts
   * MicroShardVerifier.verify("0179a4f1-2c00-8000-8000-0040000000ff") // true
   * MicroShardVerifier.verify("not-a-uuid")                           // false
   * ```
   */
  static verify(input: MicroShardInput): boolean {
    return MicroShardVerifier.verifyDetailed(input).valid
  }

  /**
   * Verifies an identifier and returns a typed result with a failure reason.
   *
   * @example
   * ```ts
   * const result = MicroShardVerifier.verifyDetailed(req.params.id)
   * if (!result.valid) {
   *   logger.warn({ reason: result.reason }, "rejected identifier")
   *   return res.status(400).json({ error: "Invalid ID" })
   * }
   * ```
   */
  static verifyDetailed(input: MicroShardInput): VerifyResult {
    const normalized = normalizeInput(input)

    if (!normalized.ok) {
      return {
        valid: false,
        reason: MicroShardVerifier.reasonFor(normalized.error.code, input),
      }
    }

    const id = normalized.value

    if (id.getVersion() !== Number(VERSION)) {
      return { valid: false, reason: "INVALID_VERSION" }
    }

    if (id.getVariant() !== Number(VARIANT)) {
      return { valid: false, reason: "INVALID_VARIANT" }
    }

    return { valid: true }
  }

  /**
   * Maps a normalization error code to a verification failure reason.
   */
  private static reasonFor(code: MicroShardErrorCode, input: MicroShardInput): VerifyFailureReason {
    if (input === null || input === undefined) {
      return "NULL_INPUT"
    }

    switch (code) {
      case "MS_INVALID_HEX":
        return "INVALID_HEX"
      case "MS_BAD_LENGTH":
        return typeof input === "string" ? "INVALID_STRING_LENGTH" : "INVALID_BINARY_LENGTH"
      default:
        return "UNSUPPORTED_TYPE"
    }
  }
}
