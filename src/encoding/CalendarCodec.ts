import { MicroShardError, MicroShardResult, fail, ok } from "../errors/MicroShardError"

// ─────────────────────────────────────────────────────────────────────────────
// Constants
// ─────────────────────────────────────────────────────────────────────────────

/** Length of `YYYY-MM-DDTHH:MM:SS`, the shortest accepted input. */
const MIN_ISO_LENGTH = 19

/**
 * Fixed separator positions in `YYYY-MM-DDTHH:MM:SS`.
 */
const SEPARATORS: ReadonlyArray<readonly [number, string]> = [
  [4, "-"],
  [7, "-"],
  [10, "T"],
  [13, ":"],
  [16, ":"],
]

/**
 * [start, end) offsets of the six numeric fields:
 * year, month, day, hour, minute, second.
 */
const FIELD_SPANS: ReadonlyArray<readonly [number, number]> = [
  [0, 4],
  [5, 7],
  [8, 10],
  [11, 13],
  [14, 16],
  [17, 19],
]

/** Fraction digits read after the `.`; further digits are ignored. */
const FRACTION_DIGITS = 6

/**
 * Cumulative day counts before each month in a non-leap year.
 */
const DAYS_BEFORE_MONTH = [0, 31, 59, 90, 120, 151, 181, 212, 243, 273, 304, 334] as const

/** Days from 0001-01-01 to 1970-01-01 in the proleptic Gregorian calendar. */
const DAYS_TO_UNIX_EPOCH = 719162

const MICROS_PER_SECOND = 1_000_000n
const MICROS_PER_MINUTE = 60_000_000n
const MICROS_PER_HOUR = 3_600_000_000n
const MICROS_PER_DAY = 86_400_000_000n
const SECONDS_PER_DAY = 86_400n

/**
 * Civil date/time fields of a UTC instant.
 */
export interface CivilDateTime {
  year: number
  month: number
  day: number
  hour: number
  minute: number
  second: number
  micros: number
}

// ─────────────────────────────────────────────────────────────────────────────
// CalendarCodec
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Converts between ISO-8601 UTC text and epoch microseconds.
 *
 * Neither direction goes through Date: it has millisecond resolution and
 * Date.parse() rolls impossible dates such as Feb 30 over into March.
 *
 * Accepted input:
 *   YYYY-MM-DDTHH:MM:SS[.f{1,}][Z]
 *
 *   - At most 6 fraction digits are significant; the rest are ignored.
 *   - Fewer than 6 fraction digits are right-padded with zeros.
 *   - Second 60 is accepted for leap-second notation.
 *   - Instants before 1970-01-01T00:00:00 are rejected.
 *
 * Output of formatIso():
 *   YYYY-MM-DDTHH:MM:SS.ffffffZ (always 6 fraction digits)
 */
export class CalendarCodec {
  /**
   * Parses ISO-8601 UTC text to microseconds since the Unix epoch.
   *
   * Validation order:
   *   1. length ≥ 19                                  → MS_BAD_LENGTH
   *   2. separators at 4, 7, 10, 13, 16               → MS_ISO_FORMAT
   *   3. six all-digit numeric fields                 → MS_ISO_FORMAT
   *   4. month, day, hour, minute, second in range    → MS_ISO_RANGE
   *   5. optional fraction and `Z`, nothing after     → MS_ISO_FORMAT
   *   6. instant not before the epoch                 → MS_ISO_RANGE
   *
   * @example
   * ```ts
   * CalendarCodec.parseIso("2023-01-01T00:00:00.000000")
   * // { ok: true, value: 1672531200000000n }
   * ```
   */
  static parseIso(text: string): MicroShardResult<bigint> {
    if (typeof text !== "string") {
      return fail(
        "MS_INVALID_INPUT",
        `CalendarCodec.parseIso: expected a string. Received: ${text === null ? "null" : typeof text}`
      )
    }

    if (text.length < MIN_ISO_LENGTH) {
      return fail(
        "MS_BAD_LENGTH",
        `CalendarCodec.parseIso: input must be at least ${MIN_ISO_LENGTH} characters ` +
        `(YYYY-MM-DDTHH:MM:SS). Received ${text.length}.`
      )
    }

    for (const [position, expected] of SEPARATORS) {
      if (text[position] !== expected) {
        return fail(
          "MS_ISO_FORMAT",
          `CalendarCodec.parseIso: expected "${expected}" at position ${position}, ` +
          `found "${text[position]}" in "${text}".`
        )
      }
    }

    const fields: number[] = []

    for (const [start, end] of FIELD_SPANS) {
      const value = CalendarCodec.readDigits(text, start, end)

      if (value === undefined) {
        return fail(
          "MS_ISO_FORMAT",
          `CalendarCodec.parseIso: non-digit in numeric field "${text.slice(start, end)}" of "${text}".`
        )
      }

      fields.push(value)
    }

    const [year, month, day, hour, minute, second] = fields

    if (month < 1 || month > 12) {
      return fail("MS_ISO_RANGE", `CalendarCodec.parseIso: month ${month} is outside 1–12.`)
    }

    const maxDay = CalendarCodec.daysInMonth(year, month)

    if (day < 1 || day > maxDay) {
      return fail(
        "MS_ISO_RANGE",
        `CalendarCodec.parseIso: day ${day} is outside 1–${maxDay} for ${year}-${CalendarCodec.pad(month, 2)}.`
      )
    }

    if (hour > 23 || minute > 59 || second > 60) {
      return fail(
        "MS_ISO_RANGE",
        `CalendarCodec.parseIso: time ${CalendarCodec.pad(hour, 2)}:${CalendarCodec.pad(minute, 2)}:` +
        `${CalendarCodec.pad(second, 2)} is out of range.`
      )
    }

    // ── fraction and zone designator ──────────────────────────────────────
    let position = MIN_ISO_LENGTH
    let fraction = 0
    let weight = 100_000

    if (text[position] === ".") {
      position++

      while (position < text.length && CalendarCodec.isDigit(text.charCodeAt(position))) {
        if (weight >= 1) {
          fraction += (text.charCodeAt(position) - 48) * weight
          weight = Math.floor(weight / 10)
        }
        position++
      }
    }

    if (text[position] === "Z") {
      position++
    }

    if (position !== text.length) {
      return fail(
        "MS_ISO_FORMAT",
        `CalendarCodec.parseIso: unexpected trailing text "${text.slice(position)}" in "${text}".`
      )
    }

    const days = CalendarCodec.daysFromCivil(year, month, day)

    if (days < 0) {
      return fail(
        "MS_ISO_RANGE",
        `CalendarCodec.parseIso: ${text} is before 1970-01-01T00:00:00Z.`
      )
    }

    return ok(
      BigInt(days) * MICROS_PER_DAY +
      BigInt(hour) * MICROS_PER_HOUR +
      BigInt(minute) * MICROS_PER_MINUTE +
      BigInt(second) * MICROS_PER_SECOND +
      BigInt(fraction)
    )
  }

  /**
   * Returns whether parseIso() would accept the text. Never throws.
   */
  static isValidIso(text: string): boolean {
    return CalendarCodec.parseIso(text).ok
  }

  /**
   * Formats epoch microseconds as `YYYY-MM-DDTHH:MM:SS.ffffffZ`.
   *
   * @throws {MicroShardError} MS_ISO_RANGE for negative input.
   *
   * @example
   * ```ts
   * CalendarCodec.formatIso(1672531200000000n) // "2023-01-01T00:00:00.000000Z"
   * ```
   */
  static formatIso(micros: bigint): string {
    const t = CalendarCodec.toCivil(micros)

    return (
      `${CalendarCodec.pad(t.year, 4)}-${CalendarCodec.pad(t.month, 2)}-${CalendarCodec.pad(t.day, 2)}` +
      `T${CalendarCodec.pad(t.hour, 2)}:${CalendarCodec.pad(t.minute, 2)}:${CalendarCodec.pad(t.second, 2)}` +
      `.${CalendarCodec.pad(t.micros, FRACTION_DIGITS)}Z`
    )
  }

  /**
   * Breaks epoch microseconds down into UTC calendar fields.
   *
   * @throws {MicroShardError} MS_ISO_RANGE for negative input.
   */
  static toCivil(micros: bigint): CivilDateTime {
    if (micros < 0n) {
      throw new MicroShardError(
        "MS_ISO_RANGE",
        `CalendarCodec.toCivil: ${micros} is before the Unix epoch.`
      )
    }

    const totalSeconds = micros / MICROS_PER_SECOND
    const days = Number(totalSeconds / SECONDS_PER_DAY)
    const secondOfDay = Number(totalSeconds % SECONDS_PER_DAY)
    const { year, month, day } = CalendarCodec.civilFromDays(days)

    return {
      year,
      month,
      day,
      hour: Math.floor(secondOfDay / 3600),
      minute: Math.floor((secondOfDay % 3600) / 60),
      second: secondOfDay % 60,
      micros: Number(micros % MICROS_PER_SECOND),
    }
  }

  // ─── Calendar arithmetic ─────────────────────────────────────────────────

  /**
   * Gregorian leap rule: divisible by 4, except centuries not divisible by 400.
   */
  static isLeapYear(year: number): boolean {
    return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0
  }

  static daysInMonth(year: number, month: number): number {
    if (month === 2) {
      return CalendarCodec.isLeapYear(year) ? 29 : 28
    }

    return month === 4 || month === 6 || month === 9 || month === 11 ? 30 : 31
  }

  /**
   * Days from 1970-01-01 to the given civil date. Negative before the epoch.
   * `month` must already be validated to 1–12.
   */
  static daysFromCivil(year: number, month: number, day: number): number {
    const y = year - 1
    let days = y * 365 + Math.floor(y / 4) - Math.floor(y / 100) + Math.floor(y / 400)

    days -= DAYS_TO_UNIX_EPOCH
    days += DAYS_BEFORE_MONTH[month - 1]

    if (month > 2 && CalendarCodec.isLeapYear(year)) {
      days++
    }

    return days + (day - 1)
  }

  /**
   * Inverse of daysFromCivil() for days ≥ 0.
   * Era-based decomposition over 400-year cycles of 146097 days, with the
   * year starting in March so the leap day falls at the end.
   */
  static civilFromDays(days: number): { year: number; month: number; day: number } {
    const z = days + 719468
    const era = Math.floor(z / 146097)
    const doe = z - era * 146097
    const yoe = Math.floor(
      (doe - Math.floor(doe / 1460) + Math.floor(doe / 36524) - Math.floor(doe / 146096)) / 365
    )
    const doy = doe - (365 * yoe + Math.floor(yoe / 4) - Math.floor(yoe / 100))
    const mp = Math.floor((5 * doy + 2) / 153)
    const day = doy - Math.floor((153 * mp + 2) / 5) + 1
    const month = mp < 10 ? mp + 3 : mp - 9
    const year = yoe + era * 400 + (month <= 2 ? 1 : 0)

    return { year, month, day }
  }

  // ─── Private Helpers ─────────────────────────────────────────────────────

  private static readDigits(text: string, start: number, end: number): number | undefined {
    let value = 0

    for (let i = start; i < end; i++) {
      const code = text.charCodeAt(i)

      if (!CalendarCodec.isDigit(code)) {
        return undefined
      }

      value = value * 10 + (code - 48)
    }

    return value
  }

  private static isDigit(code: number): boolean {
    return code >= 48 && code <= 57
  }

  private static pad(value: number, width: number): string {
    return String(value).padStart(width, "0")
  }
}
