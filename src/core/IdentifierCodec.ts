import { HexEncoder } from "../encoding/HexEncoder"
import { MicroShardResult, fail, ok } from "../errors/MicroShardError"
import { ByteUtils } from "../utils/ByteUtils"
import {
  BYTE_LENGTH,
  LAYOUT,
  MAX_SHARD_ID,
  MAX_TIME_MICROS,
  UINT64_MASK,
  VARIANT,
  VERSION,
  extractField,
  placeField,
} from "./Layout"

/**
 * The two unsigned 64-bit halves of a 128-bit identifier.
 * Both are always in 0 – 2^64-1.
 */
export interface RawIdentifier {
  readonly high: bigint
  readonly low: bigint
}

/**
 * Pure bit-level codec for MicroShard identifiers.
 *
 * Operates on RawIdentifier pairs and never throws on bad input: every
 * fallible operation returns a MicroShardResult. Extractors are total and
 * work on any bit pattern, including ones pack() would never produce.
 */
export class IdentifierCodec {
  /**
   * Packs a (timestamp, shard, random) triple into the 128-bit layout.
   *
   * `random` is masked to 36 bits whatever its width.
   *
   * Failures:
   *   MS_TIME_OVERFLOW      → micros outside 0 – 2^54-1
   *   MS_SHARD_OUT_OF_RANGE → shard outside 0 – 2^32-1
   */
  static pack(micros: bigint, shard: bigint, random: bigint): MicroShardResult<RawIdentifier> {
    if (micros < 0n || micros > MAX_TIME_MICROS) {
      return fail(
        "MS_TIME_OVERFLOW",
        `IdentifierCodec.pack: timestamp ${micros}µs is outside 0–${MAX_TIME_MICROS} ` +
        `(1970-01-01 to 2540-11-07).`
      )
    }

    if (shard < 0n || shard > MAX_SHARD_ID) {
      return fail(
        "MS_SHARD_OUT_OF_RANGE",
        `IdentifierCodec.pack: shard id ${shard} is outside 0–${MAX_SHARD_ID}.`
      )
    }

    const high =
      placeField(micros >> LAYOUT.timeLow.width, LAYOUT.timeHigh) |
      placeField(VERSION, LAYOUT.version) |
      placeField(micros, LAYOUT.timeLow) |
      placeField(shard >> LAYOUT.shardLow.width, LAYOUT.shardHigh)

    const low =
      placeField(VARIANT, LAYOUT.variant) |
      placeField(shard, LAYOUT.shardLow) |
      placeField(random, LAYOUT.random)

    return ok({ high, low })
  }

  // ─── Extractors ──────────────────────────────────────────────────────────

  /** 54-bit timestamp in microseconds: (time_high << 6) | time_low. */
  static unpackTime(id: RawIdentifier): bigint {
    return (
      (extractField(id.high, LAYOUT.timeHigh) << LAYOUT.timeLow.width) |
      extractField(id.high, LAYOUT.timeLow)
    )
  }

  /** 32-bit shard id: (shard_high << 26) | shard_low. */
  static unpackShard(id: RawIdentifier): number {
    return Number(
      (extractField(id.high, LAYOUT.shardHigh) << LAYOUT.shardLow.width) |
      extractField(id.low, LAYOUT.shardLow)
    )
  }

  static unpackRandom(id: RawIdentifier): bigint {
    return extractField(id.low, LAYOUT.random)
  }

  static unpackVersion(id: RawIdentifier): number {
    return Number(extractField(id.high, LAYOUT.version))
  }

  static unpackVariant(id: RawIdentifier): number {
    return Number(extractField(id.low, LAYOUT.variant))
  }

  /**
   * True when the version field is 8 and the variant field is 2.
   */
  static isMicroShard(id: RawIdentifier): boolean {
    return (
      extractField(id.high, LAYOUT.version) === VERSION &&
      extractField(id.low, LAYOUT.variant) === VARIANT
    )
  }

  /**
   * Unsigned 128-bit comparison: high half first, then low half.
   * Matches byte-wise comparison of the big-endian binary form.
   */
  static compare(a: RawIdentifier, b: RawIdentifier): -1 | 0 | 1 {
    if (a.high !== b.high) {
      return a.high < b.high ? -1 : 1
    }

    if (a.low !== b.low) {
      return a.low < b.low ? -1 : 1
    }

    return 0
  }

  // ─── Binary ──────────────────────────────────────────────────────────────

  /**
   * Returns the 16-byte big-endian form: `high` then `low`.
   */
  static toBytesBE(id: RawIdentifier): Uint8Array {
    const out = new Uint8Array(BYTE_LENGTH)
    ByteUtils.writeUint64BE(out, 0, id.high)
    ByteUtils.writeUint64BE(out, 8, id.low)
    return out
  }

  /**
   * Writes the 16-byte big-endian form into a caller-supplied buffer.
   * Nothing is written on failure.
   *
   * @returns the offset just past the written bytes.
   *
   * Failures:
   *   MS_BUFFER_TOO_SMALL → fewer than 16 bytes available at `offset`
   */
  static writeBytesBE(id: RawIdentifier, dest: Uint8Array, offset = 0): MicroShardResult<number> {
    if (!Number.isInteger(offset) || offset < 0 || dest.length - offset < BYTE_LENGTH) {
      return fail(
        "MS_BUFFER_TOO_SMALL",
        `IdentifierCodec.writeBytesBE: need ${BYTE_LENGTH} bytes at offset ${offset}, ` +
        `destination holds ${dest.length}.`
      )
    }

    ByteUtils.writeUint64BE(dest, offset, id.high)
    ByteUtils.writeUint64BE(dest, offset + 8, id.low)
    return ok(offset + BYTE_LENGTH)
  }

  /**
   * Reads the 16-byte big-endian form.
   *
   * Failures:
   *   MS_BAD_LENGTH → input is not exactly 16 bytes
   */
  static fromBytesBE(bytes: Uint8Array): MicroShardResult<RawIdentifier> {
    if (bytes.length !== BYTE_LENGTH) {
      return fail(
        "MS_BAD_LENGTH",
        `IdentifierCodec.fromBytesBE: expected ${BYTE_LENGTH} bytes. Received ${bytes.length}.`
      )
    }

    return ok({
      high: ByteUtils.readUint64BE(bytes, 0),
      low: ByteUtils.readUint64BE(bytes, 8),
    })
  }

  // ─── Text ────────────────────────────────────────────────────────────────

  /**
   * Canonical lowercase `xxxxxxxx-xxxx-xxxx-xxxx-xxxxxxxxxxxx`.
   */
  static toString(id: RawIdentifier): string {
    return HexEncoder.encode(IdentifierCodec.toBytesBE(id))
  }

  /**
   * Parses 32 hex digits with `-` allowed anywhere.
   * Does not check the version or variant fields.
   *
   * Failures:
   *   MS_INVALID_INPUT → not a string
   *   MS_INVALID_HEX   → character other than a hex digit or `-`
   *   MS_BAD_LENGTH    → not 32 digits once `-` is discarded
   */
  static fromString(text: string): MicroShardResult<RawIdentifier> {
    if (typeof text !== "string") {
      return fail(
        "MS_INVALID_INPUT",
        `IdentifierCodec.fromString: expected a string. Received: ${text === null ? "null" : typeof text}`
      )
    }

    const decoded = HexEncoder.decode(text)
    if (!decoded.ok) {
      return decoded
    }

    return IdentifierCodec.fromBytesBE(decoded.value)
  }

  /**
   * True when both halves are integers in the unsigned 64-bit range.
   */
  static isRawIdentifier(high: bigint, low: bigint): boolean {
    return high >= 0n && high <= UINT64_MASK && low >= 0n && low <= UINT64_MASK
  }
}
