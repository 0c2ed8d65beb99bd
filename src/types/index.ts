import type { MicroShardUUID } from "../core/MicroShardUUID"

/**
 * Every representation a MicroShard UUID can arrive in.
 */
export type MicroShardInput = string | Uint8Array | Buffer | ArrayBuffer | MicroShardUUID

/**
 * Timestamp forms accepted when building an identifier for a given time.
 *
 *   Date   → JavaScript Date (millisecond precision)
 *   string → ISO-8601 UTC text, microsecond precision
 *   number → milliseconds since the Unix epoch
 *   bigint → microseconds since the Unix epoch
 */
export type TimestampInput = Date | string | number | bigint

/**
 * Parsed metadata extracted from a MicroShard UUID.
 */
export interface MicroShardMetadata {
  /**
   * Embedded 32-bit shard (tenant / partition) id.
   */
  shardId: number

  /**
   * Creation timestamp in microseconds since Unix epoch.
   * Stored internally as a 54-bit integer.
   */
  timestamp: bigint

  /**
   * JavaScript Date representation of timestamp (millisecond precision).
   */
  date: Date

  /**
   * ISO-8601 string representation of timestamp, microsecond precision.
   */
  iso: string

  /**
   * The 36 entropy bits.
   */
  random: bigint

  version: number

  variant: number
}
