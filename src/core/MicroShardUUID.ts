import { CalendarCodec } from "../encoding/CalendarCodec"
import { MicroShardError, unwrap } from "../errors/MicroShardError"
import { IdentifierCodec, RawIdentifier } from "./IdentifierCodec"

/**
 * Immutable value object for a 128-bit MicroShard UUID.
 *
 * Responsibilities:
 *   - Holds the two unsigned 64-bit halves (`high`, `low`)
 *   - Canonical string output via toString() / toJSON()
 *   - Binary output (16 bytes, big-endian) via toBytes()
 *   - Field accessors: shard id, timestamp, random bits, version, variant
 *   - Value equality and unsigned ordering
 *
 * Ordering:
 *   compare() orders by the raw 128-bit unsigned value, which puts the
 *   timestamp first. Identifiers with strictly increasing timestamps sort
 *   strictly increasing whatever their shard and random bits, and so do
 *   their canonical strings.
 *
 * Usage:
 *   Instances come from the generator, MicroShardUUID.fromString(),
 *   MicroShardUUID.parse() or MicroShardUUID.fromBytes(). Constructing one
 *   directly from two halves is supported for interop with other codecs.
 */
export class MicroShardUUID implements RawIdentifier {
  /** Time high, version, time low, shard high. */
  readonly high: bigint

  /** Variant, shard low, random. */
  readonly low: bigint

  /** Computed on first toString() call. */
  private cachedString?: string

  // ─── Constructor ────────────────────────────────────────────────────────

  /**
   * @throws {TypeError}  high or low is not a bigint.
   * @throws {RangeError} high or low is outside 0 – 2^64-1.
   */
  constructor(high: bigint, low: bigint) {
    if (typeof high !== "bigint" || typeof low !== "bigint") {
      throw new TypeError(
        `MicroShardUUID: high and low must be bigints. ` +
        `Received: ${typeof high}, ${typeof low}`
      )
    }

    if (!IdentifierCodec.isRawIdentifier(high, low)) {
      throw new RangeError(
        `MicroShardUUID: high and low must each be in 0–2^64-1. ` +
        `Received: ${high}, ${low}`
      )
    }

    this.high = high
    this.low = low
  }

  // ─── Output ─────────────────────────────────────────────────────────────

  /**
   * Canonical lowercase `xxxxxxxx-xxxx-xxxx-xxxx-xxxxxxxxxxxx`.
   * Cached after the first call.
   */
  toString(): string {
    if (this.cachedString === undefined) {
      this.cachedString = IdentifierCodec.toString(this)
    }

    return this.cachedString
  }

  /** JSON.stringify() writes the canonical string. */
  toJSON(): string {
    return this.toString()
  }

  /**
   * The 16-byte big-endian binary form, freshly allocated on every call.
   *
   * Use cases: PostgreSQL BYTEA, MongoDB Binary, binary wire protocols.
   */
  toBytes(): Uint8Array {
    return IdentifierCodec.toBytesBE(this)
  }

  // ─── Fields ─────────────────────────────────────────────────────────────

  getShardId(): number {
    return IdentifierCodec.unpackShard(this)
  }

  /** Creation time in microseconds since the Unix epoch. */
  getTimestampMicros(): bigint {
    return IdentifierCodec.unpackTime(this)
  }

  getRandom(): bigint {
    return IdentifierCodec.unpackRandom(this)
  }

  getVersion(): number {
    return IdentifierCodec.unpackVersion(this)
  }

  getVariant(): number {
    return IdentifierCodec.unpackVariant(this)
  }

  /**
   * Creation time as a Date. Truncates microseconds to milliseconds.
   */
  getDate(): Date {
    return new Date(Number(this.getTimestampMicros() / 1000n))
  }

  /**
   * Creation time as `YYYY-MM-DDTHH:MM:SS.ffffffZ`, microsecond precision.
   */
  getIsoTimestamp(): string {
    return CalendarCodec.formatIso(this.getTimestampMicros())
  }

  /** True when the version field is 8 and the variant field is 2. */
  isMicroShard(): boolean {
    return IdentifierCodec.isMicroShard(this)
  }

  // ─── Comparison ─────────────────────────────────────────────────────────

  equals(other: RawIdentifier): boolean {
    return this.high === other.high && this.low === other.low
  }

  /** @returns -1, 0 or 1 by unsigned 128-bit value. */
  compare(other: RawIdentifier): -1 | 0 | 1 {
    return IdentifierCodec.compare(this, other)
  }

  lt(other: RawIdentifier): boolean {
    return this.compare(other) < 0
  }

  gt(other: RawIdentifier): boolean {
    return this.compare(other) > 0
  }

  lte(other: RawIdentifier): boolean {
    return this.compare(other) <= 0
  }

  gte(other: RawIdentifier): boolean {
    return this.compare(other) >= 0
  }

  // ─── Static Factories ───────────────────────────────────────────────────

  /**
   * Parses identifier text: 32 hex digits, `-` allowed anywhere.
   *
   * Permissive: any UUID parses, including ones without the MicroShard
   * version and variant. Use parse() to insist on a MicroShard UUID.
   *
   * @throws {MicroShardError} MS_INVALID_INPUT, MS_INVALID_HEX, MS_BAD_LENGTH.
   *
   * @example
   * ```ts
   * const id = MicroShardUUID.fromString("018e65c9-3a10-0400-8000-a4f1d3b8e1a1")
   * ```
   */
  static fromString(text: string): MicroShardUUID {
    return MicroShardUUID.fromRaw(unwrap(IdentifierCodec.fromString(text)))
  }

  /**
   * Strict parse: like fromString(), and the result must carry version 8
   * and variant 2.
   *
   * @throws {MicroShardError} as fromString(), plus MS_NOT_MICROSHARD.
   */
  static parse(text: string): MicroShardUUID {
    const id = MicroShardUUID.fromString(text)

    if (!id.isMicroShard()) {
      throw new MicroShardError(
        "MS_NOT_MICROSHARD",
        `MicroShardUUID.parse: "${text}" is not a MicroShard UUID ` +
        `(version ${id.getVersion()}, variant ${id.getVariant()}; expected 8 and 2).`
      )
    }

    return id
  }

  /**
   * Reads the 16-byte big-endian form. Accepts Uint8Array or Buffer.
   *
   * @throws {MicroShardError} MS_BAD_LENGTH if not exactly 16 bytes.
   */
  static fromBytes(bytes: Uint8Array): MicroShardUUID {
    if (!(bytes instanceof Uint8Array)) {
      throw new MicroShardError(
        "MS_INVALID_INPUT",
        `MicroShardUUID.fromBytes: expected a Uint8Array or Buffer. ` +
        `Received: ${bytes === null ? "null" : typeof bytes}`
      )
    }

    return MicroShardUUID.fromRaw(unwrap(IdentifierCodec.fromBytesBE(bytes)))
  }

  static fromRaw(raw: RawIdentifier): MicroShardUUID {
    return raw instanceof MicroShardUUID ? raw : new MicroShardUUID(raw.high, raw.low)
  }

  /**
   * Comparator for Array.prototype.sort().
   *
   * @example
   * ```ts
   * ids.sort(MicroShardUUID.compare)
   * ```
   */
  static compare(a: RawIdentifier, b: RawIdentifier): -1 | 0 | 1 {
    return IdentifierCodec.compare(a, b)
  }

  static isMicroShardUUID(value: unknown): value is MicroShardUUID {
    return value instanceof MicroShardUUID
  }
}
