/**
 * Bit layout of a MicroShard UUID.
 *
 * The 128-bit value is held as two unsigned 64-bit halves. Every field below
 * lives entirely inside one half; `shift` is the position of the field's
 * least-significant bit within that half.
 *
 *   high: ┌──────────────┬─────────┬────────────┬─────────────┐
 *         │ time_high 48 │ ver  4  │ time_low 6 │ shard_high 6│
 *         │   [63:16]    │ [15:12] │   [11:6]   │    [5:0]    │
 *         └──────────────┴─────────┴────────────┴─────────────┘
 *
 *   low:  ┌─────────┬──────────────┬────────────┐
 *         │ var  2  │ shard_low 26 │ random 36  │
 *         │ [63:62] │   [61:36]    │   [35:0]   │
 *         └─────────┴──────────────┴────────────┘
 *
 * Every pack, unpack and extract operation reads widths and offsets from
 * this table.
 */

export interface BitField {
  readonly half: "high" | "low"
  readonly width: bigint
  readonly shift: bigint
}

export const LAYOUT = {
  timeHigh: { half: "high", width: 48n, shift: 16n },
  version: { half: "high", width: 4n, shift: 12n },
  timeLow: { half: "high", width: 6n, shift: 6n },
  shardHigh: { half: "high", width: 6n, shift: 0n },
  variant: { half: "low", width: 2n, shift: 62n },
  shardLow: { half: "low", width: 26n, shift: 36n },
  random: { half: "low", width: 36n, shift: 0n },
} as const satisfies Record<string, BitField>

/** Value of the version field on every MicroShard UUID (UUIDv8). */
export const VERSION = 8n

/** Value of the variant field on every MicroShard UUID (binary 10). */
export const VARIANT = 2n

/** Width of the full timestamp: time_high + time_low. */
export const TIME_BITS = LAYOUT.timeHigh.width + LAYOUT.timeLow.width // 54

/** Width of the full shard id: shard_high + shard_low. */
export const SHARD_BITS = LAYOUT.shardHigh.width + LAYOUT.shardLow.width // 32

/** 2^54 - 1 microseconds: 2540-11-07T23:35:09.481983Z. */
export const MAX_TIME_MICROS = (1n << TIME_BITS) - 1n

/** 2^32 - 1. */
export const MAX_SHARD_ID = (1n << SHARD_BITS) - 1n

/** 2^36 - 1. */
export const MAX_RANDOM = (1n << LAYOUT.random.width) - 1n

/** Mask of one unsigned 64-bit half. */
export const UINT64_MASK = (1n << 64n) - 1n

/** Byte length of the binary form. */
export const BYTE_LENGTH = 16

/** Hex digit count of the textual form, separators excluded. */
export const HEX_DIGITS = 32

export function fieldMask(field: BitField): bigint {
  return (1n << field.width) - 1n
}

/**
 * Reads a field out of the half it lives in.
 */
export function extractField(word: bigint, field: BitField): bigint {
  return (word >> field.shift) & fieldMask(field)
}

/**
 * Truncates a value to the field width and moves it into position.
 */
export function placeField(value: bigint, field: BitField): bigint {
  return (value & fieldMask(field)) << field.shift
}
