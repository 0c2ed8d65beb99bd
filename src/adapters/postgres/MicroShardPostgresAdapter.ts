import { MicroShardGenerator } from "../../core/MicroShardGenerator"
import { MAX_RANDOM, MAX_SHARD_ID } from "../../core/Layout"
import { MicroShardUUID } from "../../core/MicroShardUUID"
import { MicroShardError } from "../../errors/MicroShardError"
import type { TimestampInput } from "../../types"
import { ByteUtils } from "../../utils/ByteUtils"

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Inclusive bounds of a keyset time-range query, as canonical uuid text.
 */
export interface MicroShardTimeRange {
  /** Smallest identifier at `from`: shard 0, random 0. */
  lower: string
  /** Largest identifier at `to`: shard 2^32-1, random 2^36-1. */
  upper: string
}

// ─────────────────────────────────────────────────────────────────────────────
// MicroShardPostgresAdapter
// ─────────────────────────────────────────────────────────────────────────────

/**
 * PostgreSQL adapter for MicroShard UUIDs: converts between the value object
 * and what the pg / postgres.js drivers send and return.
 *
 * Column types:
 *
 *   UUID (preferred):
 *     16 bytes on disk. The driver returns the canonical lowercase string.
 *     PostgreSQL compares uuid values byte by byte, and the timestamp leads
 *     the layout, so ORDER BY id sorts chronologically and time ranges are
 *     index range scans.
 *
 *   BYTEA:
 *     Also 16 bytes, same byte-order comparison. The driver returns a Buffer.
 *     Use toBytea() for parameters.
 *
 * Schema:
 *   ```sql
 *   CREATE TABLE events (
 *     id       UUID PRIMARY KEY,
 *     payload  JSONB NOT NULL
 *   );
 *   ```
 *
 * Range query pattern:
 *   ```sql
 *   SELECT * FROM events
 *   WHERE id BETWEEN $1 AND $2
 *   ORDER BY id ASC;
 *   ```
 *   Pass timeRange(from, to).lower and .upper as $1 and $2.
 */
export class MicroShardPostgresAdapter {

  // ─── toDatabase ───────────────────────────────────────────────────────────

  /**
   * Converts a value object to canonical text for a UUID parameter.
   *
   * @throws {TypeError} input is not a MicroShardUUID.
   *
   * @example
   * ```ts
   * const id = ids.generate()
   * await db.query(
   *   "INSERT INTO events (id, payload) VALUES ($1, $2)",
   *   [MicroShardPostgresAdapter.toDatabase(id), payload]
   * )
   * ```
   */
  static toDatabase(input: MicroShardUUID): string {
    return MicroShardPostgresAdapter.assertIdentifier(input, "toDatabase").toString()
  }

  /**
   * Converts a value object to a Buffer for a BYTEA parameter.
   *
   * @throws {TypeError} input is not a MicroShardUUID.
   */
  static toBytea(input: MicroShardUUID): Buffer {
    const bytes = MicroShardPostgresAdapter.assertIdentifier(input, "toBytea").toBytes()
    return ByteUtils.toBuffer(bytes)
  }

  // ─── fromDatabase ─────────────────────────────────────────────────────────

  /**
   * Converts a column value back to a value object.
   *
   * What the drivers return:
   *   UUID  → string, canonical lowercase
   *   BYTEA → Buffer (or a plain Uint8Array with some ORMs)
   *
   * Binary values are copied; the driver may pool and reuse its buffers.
   *
   * @throws {TypeError}       value is neither a string nor a Uint8Array.
   * @throws {MicroShardError} MS_INVALID_HEX / MS_BAD_LENGTH for a malformed value.
   *
   * @example
   * ```ts
   * const { rows } = await db.query("SELECT id FROM events WHERE payload->>'kind' = $1", [kind])
   * const id = MicroShardPostgresAdapter.fromDatabase(rows[0].id)
   * console.log(id.getShardId())
   * ```
   */
  static fromDatabase(value: string | Buffer | Uint8Array): MicroShardUUID {
    if (typeof value === "string") {
      return MicroShardUUID.fromString(value)
    }

    if (value instanceof Uint8Array) {
      return MicroShardUUID.fromBytes(ByteUtils.copy(value))
    }

    throw new TypeError(
      `MicroShardPostgresAdapter.fromDatabase: expected a string or Buffer. ` +
      `Received: ${value === null ? "null" : value === undefined ? "undefined" : typeof value}. ` +
      `Ensure the column is defined as UUID or BYTEA.`
    )
  }

  // ─── fromString ───────────────────────────────────────────────────────────

  /**
   * Normalizes identifier text from an API request to the canonical form
   * for a UUID parameter. Rejects malformed text before it reaches the
   * database.
   *
   * Structure only: foreign UUIDs pass. Use MicroShardUUID.parse() or the
   * engine's verify() where only MicroShard UUIDs are acceptable.
   *
   * @throws {MicroShardError} MS_INVALID_INPUT, MS_INVALID_HEX, MS_BAD_LENGTH.
   *
   * @example
   * ```ts
   * const { rows } = await db.query(
   *   "SELECT * FROM events WHERE id = $1",
   *   [MicroShardPostgresAdapter.fromString(req.params.id)]
   * )
   * ```
   */
  static fromString(text: string): string {
    return MicroShardUUID.fromString(text).toString()
  }

  // ─── Keyset pagination ────────────────────────────────────────────────────

  /**
   * Builds the cursor for keyset pagination from the last identifier the
   * client saw.
   *
   * @example
   * ```ts
   * // GET /events?after=0185e8c3-f8c0-8000-8000-00a0e2bb2c11
   * const { rows } = await db.query(
   *   `SELECT id, payload FROM events
   *    WHERE id > $1
   *    ORDER BY id ASC
   *    LIMIT 50`,
   *   [MicroShardPostgresAdapter.toCursor(req.query.after)]
   * )
   * ```
   */
  static toCursor(lastSeenId: string): string {
    return MicroShardPostgresAdapter.fromString(lastSeenId)
  }

  /**
   * Inclusive identifier bounds covering every shard and every random value
   * created between `from` and `to`.
   *
   * @throws {MicroShardError} MS_INVALID_INPUT when `from` is after `to`;
   *                           timestamp errors as MicroShardGenerator.toMicros().
   *
   * @example
   * ```ts
   * const { lower, upper } = MicroShardPostgresAdapter.timeRange(
   *   "2025-01-01T00:00:00Z",
   *   "2025-01-31T23:59:59.999999Z"
   * )
   * await db.query("SELECT * FROM events WHERE id BETWEEN $1 AND $2", [lower, upper])
   * ```
   */
  static timeRange(from: TimestampInput, to: TimestampInput): MicroShardTimeRange {
    const fromMicros = MicroShardGenerator.toMicros(from)
    const toMicros = MicroShardGenerator.toMicros(to)

    if (fromMicros > toMicros) {
      throw new MicroShardError(
        "MS_INVALID_INPUT",
        `MicroShardPostgresAdapter.timeRange: from (${fromMicros}) is after to (${toMicros}).`
      )
    }

    return {
      lower: MicroShardGenerator.build(fromMicros, 0, 0).toString(),
      upper: MicroShardGenerator.build(toMicros, MAX_SHARD_ID, MAX_RANDOM).toString(),
    }
  }

  // ─── Private Helpers ──────────────────────────────────────────────────────

  private static assertIdentifier(input: MicroShardUUID, callerName: string): MicroShardUUID {
    if (!(input instanceof MicroShardUUID)) {
      throw new TypeError(
        `MicroShardPostgresAdapter.${callerName}: input must be a MicroShardUUID. ` +
        `Received: ${input === null ? "null" : input === undefined ? "undefined" : typeof input}`
      )
    }

    return input
  }
}
