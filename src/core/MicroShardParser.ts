import { CalendarCodec } from "../encoding/CalendarCodec"
import { unwrap } from "../errors/MicroShardError"
import type { MicroShardInput, MicroShardMetadata } from "../types"
import { normalizeInput } from "./InputNormalizer"

/**
 * Parses a MicroShard UUID into its structured metadata fields.
 *
 * A pure structural decode: the version and variant fields are reported,
 * not enforced. Call MicroShardVerifier.verify() first (or use the engine's
 * parse(), which does) when the input comes from an untrusted source and
 * must be a MicroShard UUID.
 *
 * Accepted input types:
 *   - string         → 36-char canonical form, or 32 digits with "-" anywhere
 *   - Uint8Array     → raw 16-byte binary
 *   - Buffer         → Node.js Buffer (subclass of Uint8Array)
 *   - ArrayBuffer    → raw ArrayBuffer
 *   - MicroShardUUID → value object
 */
export class MicroShardParser {
  /**
   * @returns Frozen MicroShardMetadata.
   *
   * @throws {MicroShardError} MS_INVALID_INPUT  null, undefined or unsupported type.
   * @throws {MicroShardError} MS_INVALID_HEX    string contains a non-hex character.
   * @throws {MicroShardError} MS_BAD_LENGTH     wrong digit or byte count.
   *
   * @example
   * ```ts
   * const meta = MicroShardParser.parse(id)
   *
   * console.log(meta.shardId)   // 42
   * console.log(meta.timestamp) // 1672531200000000n
   * console.log(meta.iso)       // "2023-01-01T00:00:00.000000Z"
   * ```
   */
  static parse(input: MicroShardInput): MicroShardMetadata {
    const id = unwrap(normalizeInput(input))
    const timestamp = id.getTimestampMicros()

    return Object.freeze({
      shardId: id.getShardId(),
      timestamp,
      date: new Date(Number(timestamp / 1000n)),
      iso: CalendarCodec.formatIso(timestamp),
      random: id.getRandom(),
      version: id.getVersion(),
      variant: id.getVariant(),
    })
  }
}
