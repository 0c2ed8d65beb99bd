import { CalendarCodec } from "../encoding/CalendarCodec"
import { MicroShardError } from "../errors/MicroShardError"
import { logger } from "../logging/logger"
import type { EntropySource } from "../random/EntropySource"
import type { MicroShardInput, MicroShardMetadata, TimestampInput } from "../types"
import type { IntegerInput } from "../utils/NumberUtils"
import type { TimeSource } from "../utils/TimeSource"
import { MicroShardGenerator, ShardIdResolver } from "./MicroShardGenerator"
import { MicroShardParser } from "./MicroShardParser"
import type { MicroShardUUID } from "./MicroShardUUID"
import { MicroShardVerifier, VerifyResult } from "./MicroShardVerifier"

/**
 * Input shape for MicroShard.initialize().
 *
 * shardId (optional):
 *   Default shard id for generate() calls that omit one. Accepts a number or
 *   bigint (0–2^32-1) or a string (hashed to a stable uint32). If omitted,
 *   resolved from the environment in priority order:
 *   MICROSHARD_SHARD_ID → POD_IP → HOSTNAME → random (with warning).
 *
 * timeSource / entropySource (optional):
 *   Replace the system clock and the thread's shared xoshiro256** instance.
 *   Inject fixed sources in tests and reproducible backfills.
 *
 * See also: ShardIdResolver for resolution details.
 */
export interface MicroShardInitOptions {
  shardId?: IntegerInput | string
  timeSource?: TimeSource
  entropySource?: EntropySource
}

/**
 * Options for parse().
 */
export interface ParseOptions {
  /**
   * Whether to check version 8 / variant 2 before parsing.
   * Defaults to true. Set to false to inspect foreign 128-bit UUIDs.
   */
  verify?: boolean
}

/**
 * MicroShard: configured identifier engine.
 *
 * The single entry point for generating, verifying and parsing MicroShard
 * UUIDs with a fixed default shard. Create one instance per application (or
 * per shard) and reuse it.
 *
 * Usage:
 * const ids = MicroShard.initialize({ shardId: 42 })
 *
 * const id   = ids.generate()
 * const ok   = ids.verify(id)
 * const meta = ids.parse(id)
 */
export class MicroShard {
  private readonly generator: MicroShardGenerator

  private constructor(options: MicroShardInitOptions) {
    MicroShard.validateOptions(options)

    const resolution = ShardIdResolver.resolve(options.shardId)

    if (resolution.warning) {
      logger.warn({ shardId: resolution.shardId, source: resolution.source }, resolution.warning)
    } else {
      logger.debug({ shardId: resolution.shardId, source: resolution.source }, "default shard id resolved")
    }

    this.generator = new MicroShardGenerator({
      shardId: resolution.shardId,
      timeSource: options.timeSource,
      entropySource: options.entropySource,
    })
  }

  /**
   * Creates and returns a configured engine.
   *
   * @throws {TypeError}       options is not an object, or a source lacks its method.
   * @throws {MicroShardError} MS_SHARD_OUT_OF_RANGE / MS_INVALID_INPUT for shardId.
   *
   * @example
   * ```ts
   * const ids = MicroShard.initialize({ shardId: "tenant-acme" })
   * ```
   */
  static initialize(options: MicroShardInitOptions = {}): MicroShard {
    return new MicroShard(options)
  }

  /**
   * New identifier at the current time for `shardId`, or the default shard.
   *
   * @throws {MicroShardError} MS_SHARD_OUT_OF_RANGE, MS_INVALID_INPUT, MS_TIME_OVERFLOW.
   *
   * @example
   * ```ts
   * const id = ids.generate()
   * console.log(id.toString()) // "0185e8c3-f8c0-8000-8000-00a0e2bb2c11"
   * ```
   */
  generate(shardId?: IntegerInput): MicroShardUUID {
    return this.generator.generate(shardId)
  }

  /**
   * Deterministic identifier from explicit parts; random bits masked to 36.
   */
  build(micros: IntegerInput, shardId: IntegerInput, randomBits: IntegerInput): MicroShardUUID {
    return MicroShardGenerator.build(micros, shardId, randomBits)
  }

  /**
   * Identifier for an ISO-8601 UTC instant with fresh entropy.
   */
  fromIso(text: string, shardId?: IntegerInput): MicroShardUUID {
    return this.generator.fromIso(text, shardId)
  }

  /**
   * Identifier for a Date, ISO string, millisecond number or microsecond bigint.
   */
  fromTimestamp(timestamp: TimestampInput, shardId?: IntegerInput): MicroShardUUID {
    return this.generator.fromTimestamp(timestamp, shardId)
  }

  /**
   * Whether `text` parses as a strict ISO-8601 UTC instant. Parsing is
   * the only check: a valid instant after 2540-11-07 still returns true
   * and fails fromIso() with MS_TIME_OVERFLOW. Never throws.
   */
  validateIso(text: string): boolean {
    return CalendarCodec.isValidIso(text)
  }

  /**
   * Structural check: version 8 and variant 2. Never throws.
   */
  verify(input: MicroShardInput): boolean {
    return MicroShardVerifier.verify(input)
  }

  /**
   * Structural check with a failure reason. Never throws.
   *
   * @example
   * ```ts
   * const result = ids.verifyDetailed(input)
   * if (!result.valid) {
   *   logger.warn({ reason: result.reason, path: req.path }, "rejected identifier")
   *   return res.status(400).json({ error: "Invalid ID" })
   * }
   * ```
   */
  verifyDetailed(input: MicroShardInput): VerifyResult {
    return MicroShardVerifier.verifyDetailed(input)
  }

  /**
   * Parses an identifier into its metadata.
   *
   * By default the input must be a MicroShard UUID (version 8, variant 2).
   * Pass { verify: false } to decode any 128-bit UUID; the shard, time and
   * random fields are then whatever bits sit in those positions.
   *
   * @throws {MicroShardError} MS_NOT_MICROSHARD when verification fails on a
   *                           well-formed UUID; MS_INVALID_INPUT,
   *                           MS_INVALID_HEX or MS_BAD_LENGTH when the input
   *                           cannot be decoded.
   *
   * @example
   * ```ts
   * const meta = ids.parse(req.params.id)
   * console.log(meta.shardId) // 42
   * console.log(meta.iso)     // "2023-01-01T00:00:00.000000Z"
   * ```
   */
  parse(input: MicroShardInput, options?: ParseOptions): MicroShardMetadata {
    const shouldVerify = options?.verify !== false

    if (shouldVerify) {
      const result = MicroShardVerifier.verifyDetailed(input)

      if (!result.valid && (result.reason === "INVALID_VERSION" || result.reason === "INVALID_VARIANT")) {
        throw new MicroShardError(
          "MS_NOT_MICROSHARD",
          `MicroShard.parse: verification failed before parsing. Reason: ${result.reason}.`
        )
      }
    }

    return MicroShardParser.parse(input)
  }

  // ─── Diagnostics ─────────────────────────────────────────────────────────

  /**
   * Returns the resolved default shard id.
   *
   * @example
   * ```ts
   * logger.info({ shardId: ids.getShardId() }, "identifier engine ready")
   * ```
   */
  getShardId(): number {
    return this.generator.getShardId()
  }

  // ─── Private Helpers ─────────────────────────────────────────────────────

  /**
   * Validates the options object before any state is built.
   *
   * @throws {TypeError} Wrong-typed fields.
   */
  private static validateOptions(options: MicroShardInitOptions): void {
    if (options === null || typeof options !== "object" || Array.isArray(options)) {
      throw new TypeError(
        `MicroShard.initialize: options must be a plain object. ` +
        `Received: ${options === null ? "null" : typeof options}`
      )
    }

    const { shardId, timeSource, entropySource } = options

    if (
      shardId !== undefined &&
      typeof shardId !== "number" &&
      typeof shardId !== "bigint" &&
      typeof shardId !== "string"
    ) {
      throw new TypeError(
        `MicroShard.initialize: shardId must be a number, bigint or string. ` +
        `Received: ${typeof shardId}`
      )
    }

    if (timeSource !== undefined && typeof timeSource.nowMicros !== "function") {
      throw new TypeError(`MicroShard.initialize: timeSource must implement nowMicros().`)
    }

    if (entropySource !== undefined && typeof entropySource.next36 !== "function") {
      throw new TypeError(`MicroShard.initialize: entropySource must implement next36().`)
    }
  }
}
