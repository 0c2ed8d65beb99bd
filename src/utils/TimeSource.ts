/**
 * Microsecond clock capability used for MicroShard timestamps.
 *
 * Generators take a TimeSource instead of reading the clock themselves, so
 * tests and backfills can inject a fixed or scripted clock.
 */
export interface TimeSource {
  /** Current Unix time in microseconds (UTC). */
  nowMicros(): bigint
}

/**
 * System clock with microsecond resolution.
 *
 * Date.now() only has millisecond resolution, so the wall clock is read once
 * at construction and the monotonic high-resolution timer supplies the
 * elapsed microseconds since then:
 *
 *   now = anchorMillis × 1000 + (hrtime − anchorHrtime) / 1000
 *
 * The returned value never goes backward within one instance, even when
 * the wall clock is stepped by NTP after construction.
 */
export class SystemTimeSource implements TimeSource {
  private readonly anchorMicros: bigint
  private readonly anchorHrtime: bigint

  constructor() {
    this.anchorMicros = BigInt(Date.now()) * 1000n
    this.anchorHrtime = process.hrtime.bigint()
  }

  nowMicros(): bigint {
    return this.anchorMicros + (process.hrtime.bigint() - this.anchorHrtime) / 1000n
  }
}
