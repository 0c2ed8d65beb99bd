import { MicroShardGenerator } from "./core/MicroShardGenerator"
import { MicroShardUUID } from "./core/MicroShardUUID"
import { CalendarCodec } from "./encoding/CalendarCodec"
import { unwrap } from "./errors/MicroShardError"
import type { TimestampInput } from "./types"
import { IntegerInput, toBigInt } from "./utils/NumberUtils"

export { MicroShard } from "./core/MicroShard"
export type { MicroShardInitOptions, ParseOptions } from "./core/MicroShard"
export { MicroShardGenerator, ShardIdResolver } from "./core/MicroShardGenerator"
export type { MicroShardGeneratorOptions, ShardIdResolution, ShardIdSource } from "./core/MicroShardGenerator"
export { MicroShardUUID } from "./core/MicroShardUUID"
export { MicroShardVerifier } from "./core/MicroShardVerifier"
export type { VerifyResult, VerifyFailureReason } from "./core/MicroShardVerifier"
export { MicroShardParser } from "./core/MicroShardParser"
export { IdentifierCodec } from "./core/IdentifierCodec"
export type { RawIdentifier } from "./core/IdentifierCodec"
export { MAX_SHARD_ID, MAX_TIME_MICROS, MAX_RANDOM, VERSION, VARIANT } from "./core/Layout"
export { CalendarCodec } from "./encoding/CalendarCodec"
export type { CivilDateTime } from "./encoding/CalendarCodec"
export { HexEncoder } from "./encoding/HexEncoder"
export { MicroShardError } from "./errors/MicroShardError"
export type { MicroShardErrorCode, MicroShardResult } from "./errors/MicroShardError"
export { Xoshiro256StarStar, sharedEntropySource } from "./random/EntropySource"
export type { EntropySource } from "./random/EntropySource"
export { SystemTimeSource } from "./utils/TimeSource"
export type { TimeSource } from "./utils/TimeSource"
export type { IntegerInput } from "./utils/NumberUtils"
export type { MicroShardInput, MicroShardMetadata, TimestampInput } from "./types"
export { MicroShardPostgresAdapter } from "./adapters/postgres/MicroShardPostgresAdapter"
export { MicroShardMongoAdapter } from "./adapters/mongo/MicroShardMongoAdapter"

// ─── Stateless API ─────────────────────────────────────────────────────────

let generator: MicroShardGenerator | undefined

/**
 * System clock and the thread's shared entropy. Every stateless call names
 * its shard, so the default shard is never used.
 */
function defaultGenerator(): MicroShardGenerator {
  if (generator === undefined) {
    generator = new MicroShardGenerator({ shardId: 0 })
  }

  return generator
}

/**
 * New identifier for `shardId` at the current time.
 *
 * @example
 * ```ts
 * const id = generate(42)
 * id.toString() // "0185e8c3-f8c0-8000-8000-00a0e2bb2c11"
 * ```
 */
export function generate(shardId: IntegerInput): MicroShardUUID {
  return defaultGenerator().generate(shardId)
}

/**
 * Deterministic identifier; `randomBits` is masked to 36 bits.
 */
export function build(micros: IntegerInput, shardId: IntegerInput, randomBits: IntegerInput): MicroShardUUID {
  return MicroShardGenerator.build(micros, shardId, randomBits)
}

/**
 * Identifier for an ISO-8601 UTC instant with fresh entropy.
 */
export function fromIso(text: string, shardId: IntegerInput): MicroShardUUID {
  return defaultGenerator().fromIso(text, shardId)
}

/**
 * Identifier for a Date, ISO string, millisecond number or microsecond bigint.
 */
export function fromTimestamp(timestamp: TimestampInput, shardId: IntegerInput): MicroShardUUID {
  return defaultGenerator().fromTimestamp(timestamp, shardId)
}

/** Permissive text decode; `-` allowed anywhere, version not checked. */
export function fromString(text: string): MicroShardUUID {
  return MicroShardUUID.fromString(text)
}

export function fromBytes(bytes: Uint8Array): MicroShardUUID {
  return MicroShardUUID.fromBytes(bytes)
}

export function toString(id: MicroShardUUID): string {
  return id.toString()
}

export function toBytes(id: MicroShardUUID): Uint8Array {
  return id.toBytes()
}

/**
 * Shard id of a value object or identifier text.
 */
export function getShardId(id: MicroShardUUID | string): number {
  return toIdentifier(id).getShardId()
}

export function getTimestampMicros(id: MicroShardUUID | string): bigint {
  return toIdentifier(id).getTimestampMicros()
}

/** Creation time truncated to milliseconds. */
export function getDate(id: MicroShardUUID | string): Date {
  return toIdentifier(id).getDate()
}

/** Creation time with microsecond precision: "2023-01-01T00:00:00.000000Z". */
export function getIsoTimestamp(id: MicroShardUUID | string): string {
  return toIdentifier(id).getIsoTimestamp()
}

export function validateIso(text: string): boolean {
  return CalendarCodec.isValidIso(text)
}

/**
 * ISO-8601 UTC text to microseconds since the epoch.
 *
 * @throws {MicroShardError} MS_BAD_LENGTH, MS_ISO_FORMAT or MS_ISO_RANGE.
 */
export function parseIso(text: string): bigint {
  return unwrap(CalendarCodec.parseIso(text))
}

/**
 * Microseconds since the epoch to "YYYY-MM-DDTHH:MM:SS.ffffffZ".
 *
 * @throws {MicroShardError} MS_INVALID_INPUT for a non-integer; MS_ISO_RANGE when negative.
 */
export function formatIso(micros: IntegerInput): string {
  return CalendarCodec.formatIso(unwrap(toBigInt(micros, "timestamp")))
}

function toIdentifier(id: MicroShardUUID | string): MicroShardUUID {
  return typeof id === "string" ? MicroShardUUID.fromString(id) : id
}
