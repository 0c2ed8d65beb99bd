import { BYTE_LENGTH, HEX_DIGITS } from "../core/Layout"
import { MicroShardResult, fail, ok } from "../errors/MicroShardError"

/**
 * Lowercase hex alphabet used for the canonical textual form.
 */
const ALPHABET = "0123456789abcdef"

/** Separator between the canonical 8-4-4-4-12 groups. */
const SEPARATOR = "-"

/**
 * Byte counts of the five canonical groups.
 * 4 + 2 + 2 + 2 + 6 = 16 bytes → 8-4-4-4-12 hex digits.
 */
const GROUP_BYTES = [4, 2, 2, 2, 6] as const

/** Character length of the canonical hyphenated form. */
export const CANONICAL_LENGTH = HEX_DIGITS + GROUP_BYTES.length - 1 // 36

/**
 * Maximum ASCII code point covered by the decode lookup table.
 */
const MAX_ASCII = 127

/**
 * Hex encoder and decoder for the 16-byte MicroShard binary.
 *
 * Encoding always produces the canonical lowercase hyphenated form
 * `xxxxxxxx-xxxx-xxxx-xxxx-xxxxxxxxxxxx`.
 *
 * Decoding discards `-` wherever it appears, so the 36-character canonical
 * form and the bare 32-digit form decode to the same bytes. Upper- and
 * lower-case digits are both accepted.
 */
export class HexEncoder {
  /**
   * Decode lookup table: ASCII char code → nibble value (0–15), -1 otherwise.
   * Built once at class load time.
   */
  private static readonly DECODE_LOOKUP: Int8Array = (() => {
    const table = new Int8Array(MAX_ASCII + 1).fill(-1)

    for (let i = 0; i < ALPHABET.length; i++) {
      table[ALPHABET.charCodeAt(i)] = i
      table[ALPHABET.toUpperCase().charCodeAt(i)] = i
    }

    return table
  })()

  /**
   * Encodes 16 bytes to the canonical 36-character form.
   *
   * @throws {RangeError} input is not exactly 16 bytes.
   */
  static encode(input: Uint8Array): string {
    if (input.length !== BYTE_LENGTH) {
      throw new RangeError(
        `HexEncoder.encode: input must be exactly ${BYTE_LENGTH} bytes. ` +
        `Received ${input.length} bytes.`
      )
    }

    let output = ""
    let index = 0

    for (let group = 0; group < GROUP_BYTES.length; group++) {
      if (group > 0) {
        output += SEPARATOR
      }

      for (let i = 0; i < GROUP_BYTES[group]; i++) {
        const byte = input[index++]
        output += ALPHABET[byte >>> 4] + ALPHABET[byte & 0x0f]
      }
    }

    return output
  }

  /**
   * Decodes identifier text to 16 bytes.
   *
   * The whole input is scanned first, so a bad character is reported as
   * MS_INVALID_HEX even when the digit count is also wrong. Only then is the
   * digit count checked.
   *
   * Failures:
   *   MS_INVALID_HEX → a character that is neither a hex digit nor `-`
   *   MS_BAD_LENGTH  → digit count after discarding `-` is not 32
   */
  static decode(input: string): MicroShardResult<Uint8Array> {
    const output = new Uint8Array(BYTE_LENGTH)
    let digits = 0

    for (let i = 0; i < input.length; i++) {
      const charCode = input.charCodeAt(i)

      if (input[i] === SEPARATOR) {
        continue
      }

      const nibble = charCode > MAX_ASCII ? -1 : HexEncoder.DECODE_LOOKUP[charCode]

      if (nibble === -1) {
        return fail(
          "MS_INVALID_HEX",
          `HexEncoder.decode: invalid character at position ${i}: "${input[i]}". ` +
          `Only hex digits (0–9, a–f) and "-" are allowed.`
        )
      }

      // Digits past the 32nd are counted but not stored.
      if (digits < HEX_DIGITS) {
        const byteIndex = digits >>> 1
        output[byteIndex] = digits % 2 === 0 ? nibble << 4 : output[byteIndex] | nibble
      }

      digits++
    }

    if (digits !== HEX_DIGITS) {
      return fail(
        "MS_BAD_LENGTH",
        `HexEncoder.decode: expected ${HEX_DIGITS} hex digits after removing "-". ` +
        `Received ${digits}.`
      )
    }

    return ok(output)
  }
}
