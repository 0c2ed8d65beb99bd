import * as crypto from "crypto"
import { config, MicroShardConfig } from "../config"
import { CalendarCodec } from "../encoding/CalendarCodec"
import { MicroShardError, unwrap } from "../errors/MicroShardError"
import { EntropySource, sharedEntropySource } from "../random/EntropySource"
import type { TimestampInput } from "../types"
import { IntegerInput, toBigInt } from "../utils/NumberUtils"
import { SystemTimeSource, TimeSource } from "../utils/TimeSource"
import { IdentifierCodec } from "./IdentifierCodec"
import { MAX_SHARD_ID } from "./Layout"
import { MicroShardUUID } from "./MicroShardUUID"

/** Decimal integer, as accepted in MICROSHARD_SHARD_ID. */
const DECIMAL_REGEX = /^\d+$/

/**
 * Where a resolved shard id came from.
 */
export type ShardIdSource =
  | "explicit_number"
  | "explicit_string"
  | "env"
  | "pod_ip"
  | "hostname"
  | "random"

export interface ShardIdResolution {
  /** Resolved uint32 embedded in every identifier the generator issues. */
  shardId: number
  /** Where the value came from, for startup diagnostics. */
  source: ShardIdSource
  /** Set when source is "random"; the caller should log it prominently. */
  warning?: string
}

/**
 * Resolves a default 32-bit shard id from config or environment, in
 * priority order:
 *
 *   1. Explicit number / bigint  → range-checked, used directly
 *   2. Explicit string           → SHA-256 hashed to a stable uint32
 *   3. MICROSHARD_SHARD_ID       → decimal integer, range-checked
 *   4. POD_IP                    → hashed; unique per pod in Kubernetes
 *   5. HOSTNAME                  → hashed; unique per container in Docker / ECS
 *   6. Random fallback           → warns; safe only for single-instance use
 *
 * A shard id is usually a tenant or partition key chosen by the caller per
 * record (pass it to generate()). The resolved value is only the default
 * for callers that issue identifiers per node.
 */
export class ShardIdResolver {
  /**
   * @param explicitShardId - Optional value from MicroShard.initialize().
   * @param env             - Environment settings; defaults to the process config.
   *
   * @throws {MicroShardError} MS_SHARD_OUT_OF_RANGE explicit or env value outside 0–2^32-1.
   * @throws {MicroShardError} MS_INVALID_INPUT      non-integer number, or non-decimal env value.
   * @throws {TypeError}       explicit string is empty.
   */
  static resolve(
    explicitShardId?: IntegerInput | string,
    env: MicroShardConfig["shard"] = config.shard
  ): ShardIdResolution {
    if (typeof explicitShardId === "number" || typeof explicitShardId === "bigint") {
      return {
        shardId: ShardIdResolver.checkShard(explicitShardId, "explicit shard id"),
        source: "explicit_number",
      }
    }

    if (typeof explicitShardId === "string") {
      if (explicitShardId.trim().length === 0) {
        throw new TypeError(
          `MicroShard: shardId string must not be empty. ` +
          `Provide a non-empty string or a numeric value 0–${MAX_SHARD_ID}.`
        )
      }
      return {
        shardId: ShardIdResolver.hashToUint32(explicitShardId.trim()),
        source: "explicit_string",
      }
    }

    if (env.id !== undefined) {
      if (!DECIMAL_REGEX.test(env.id)) {
        throw new MicroShardError(
          "MS_INVALID_INPUT",
          `MicroShard: MICROSHARD_SHARD_ID must be a decimal integer. Received: "${env.id}"`
        )
      }
      return {
        shardId: ShardIdResolver.checkShard(BigInt(env.id), "MICROSHARD_SHARD_ID"),
        source: "env",
      }
    }

    if (env.podIp !== undefined) {
      return { shardId: ShardIdResolver.hashToUint32(env.podIp), source: "pod_ip" }
    }

    if (env.hostname !== undefined) {
      return { shardId: ShardIdResolver.hashToUint32(env.hostname), source: "hostname" }
    }

    const randomShardId = crypto.randomInt(0, Number(MAX_SHARD_ID) + 1)
    return {
      shardId: randomShardId,
      source: "random",
      warning:
        `MicroShard: default shard id randomly assigned (shardId=${randomShardId}). ` +
        `Identifiers from different processes will carry unrelated shard ids. ` +
        `Pass shardId to MicroShard.initialize(), set MICROSHARD_SHARD_ID, ` +
        `or pass a shard id to every generate() call.`,
    }
  }

  /**
   * Hashes an arbitrary string to a stable uint32.
   * SHA-256, first 4 bytes read as a big-endian unsigned integer.
   */
  static hashToUint32(input: string): number {
    return crypto.createHash("sha256").update(input, "utf8").digest().readUInt32BE(0)
  }

  /**
   * Converts and range-checks a shard id.
   *
   * @throws {MicroShardError} MS_INVALID_INPUT or MS_SHARD_OUT_OF_RANGE.
   */
  static checkShard(shardId: IntegerInput, name = "shard id"): number {
    const shard = unwrap(toBigInt(shardId, name))

    if (shard < 0n || shard > MAX_SHARD_ID) {
      throw new MicroShardError(
        "MS_SHARD_OUT_OF_RANGE",
        `MicroShard: ${name} must be between 0 and ${MAX_SHARD_ID}. Received: ${shard}`
      )
    }

    return Number(shard)
  }
}

export interface MicroShardGeneratorOptions {
  /** Default shard id for newId() and for calls that omit one. */
  shardId: IntegerInput
  /** Clock; defaults to a SystemTimeSource. */
  timeSource?: TimeSource
  /** Entropy; defaults to this thread's shared xoshiro256** instance. */
  entropySource?: EntropySource
}

/**
 * Stateful MicroShard UUID generator bound to a default shard id, a clock
 * and an entropy source.
 *
 * Binary layout (16 bytes, big-endian):
 *
 *   high 64: time[53..6] (48) │ version (4) │ time[5..0] (6) │ shard[31..26] (6)
 *   low  64: variant (2) │ shard[25..0] (26) │ random (36)
 *
 * Uniqueness:
 *   Identifiers sharing a microsecond and a shard differ only by their 36
 *   random bits. The collision probability of such a pair is about 1/2^36;
 *   nothing serializes generation to rule it out.
 *
 * Thread safety:
 *   Safe within one event loop. Each Worker thread gets its own shared
 *   entropy source; an injected source must not be shared across Workers.
 */
export class MicroShardGenerator {
  private readonly shardId: number
  private readonly timeSource: TimeSource
  private readonly entropySource: EntropySource

  /**
   * @throws {MicroShardError} MS_INVALID_INPUT or MS_SHARD_OUT_OF_RANGE for shardId.
   */
  constructor(options: MicroShardGeneratorOptions) {
    this.shardId = ShardIdResolver.checkShard(options.shardId, "default shard id")
    this.timeSource = options.timeSource ?? new SystemTimeSource()
    this.entropySource = options.entropySource ?? sharedEntropySource()
  }

  /**
   * New identifier for the default shard at the current time.
   *
   * @throws {MicroShardError} MS_TIME_OVERFLOW after 2540-11-07.
   */
  newId(): MicroShardUUID {
    return this.generate()
  }

  /**
   * New identifier for `shardId` (or the default shard) at the current time.
   *
   * @throws {MicroShardError} MS_INVALID_INPUT, MS_SHARD_OUT_OF_RANGE, MS_TIME_OVERFLOW.
   *
   * @example
   * ```ts
   * const generator = new MicroShardGenerator({ shardId: 7 })
   * generator.generate()      // shard 7
   * generator.generate(1042)  // shard 1042
   * ```
   */
  generate(shardId?: IntegerInput): MicroShardUUID {
    return MicroShardGenerator.pack(
      this.timeSource.nowMicros(),
      shardId ?? this.shardId,
      this.entropySource.next36()
    )
  }

  /**
   * Identifier for an ISO-8601 UTC instant, with fresh entropy.
   * For backfilling records whose creation time is known.
   *
   * @throws {MicroShardError} MS_BAD_LENGTH, MS_ISO_FORMAT, MS_ISO_RANGE from
   *                           the ISO parser; shard and time errors as generate().
   *
   * @example
   * ```ts
   * generator.fromIso("2025-01-01T12:00:00.123456Z", 55)
   * ```
   */
  fromIso(text: string, shardId?: IntegerInput): MicroShardUUID {
    const micros = unwrap(CalendarCodec.parseIso(text))
    return MicroShardGenerator.pack(micros, shardId ?? this.shardId, this.entropySource.next36())
  }

  /**
   * Identifier for a Date, ISO string, millisecond number or microsecond
   * bigint, with fresh entropy.
   *
   * @throws {MicroShardError} MS_INVALID_INPUT for an invalid Date or a
   *                           non-integer number; otherwise as fromIso().
   */
  fromTimestamp(timestamp: TimestampInput, shardId?: IntegerInput): MicroShardUUID {
    const micros = MicroShardGenerator.toMicros(timestamp)
    return MicroShardGenerator.pack(micros, shardId ?? this.shardId, this.entropySource.next36())
  }

  /** The default shard id embedded by newId(). */
  getShardId(): number {
    return this.shardId
  }

  // ─── Static ──────────────────────────────────────────────────────────────

  /**
   * Deterministic identifier from caller-supplied parts.
   * `randomBits` is masked to its low 36 bits.
   *
   * For backfills with known entropy and for reproducible tests.
   *
   * @throws {MicroShardError} MS_INVALID_INPUT, MS_SHARD_OUT_OF_RANGE, MS_TIME_OVERFLOW.
   *
   * @example
   * ```ts
   * MicroShardGenerator.build(1672531200000000n, 42, 0xabcn)
   * ```
   */
  static build(micros: IntegerInput, shardId: IntegerInput, randomBits: IntegerInput): MicroShardUUID {
    return MicroShardGenerator.pack(
      unwrap(toBigInt(micros, "timestamp")),
      shardId,
      unwrap(toBigInt(randomBits, "random bits"))
    )
  }

  /**
   * Converts any TimestampInput to microseconds since the epoch.
   *
   * @throws {MicroShardError} MS_INVALID_INPUT, or the ISO parser's errors.
   */
  static toMicros(timestamp: TimestampInput): bigint {
    if (timestamp instanceof Date) {
      const millis = timestamp.getTime()

      if (Number.isNaN(millis)) {
        throw new MicroShardError("MS_INVALID_INPUT", `MicroShard: timestamp is an invalid Date.`)
      }

      return BigInt(millis) * 1000n
    }

    if (typeof timestamp === "string") {
      return unwrap(CalendarCodec.parseIso(timestamp))
    }

    if (typeof timestamp === "bigint") {
      return timestamp
    }

    return unwrap(toBigInt(timestamp, "timestamp (milliseconds)")) * 1000n
  }

  private static pack(micros: bigint, shardId: IntegerInput, random: bigint): MicroShardUUID {
    const shard = unwrap(toBigInt(shardId, "shard id"))
    return MicroShardUUID.fromRaw(unwrap(IdentifierCodec.pack(micros, shard, random)))
  }
}
