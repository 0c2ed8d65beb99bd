/**
 * Low-level byte manipulation utilities for MicroShard binary operations.
 */
export class ByteUtils {
  /**
   * Writes an unsigned 64-bit value at `offset`, most-significant byte first.
   *
   * The caller guarantees `offset + 8 <= out.length`.
   */
  static writeUint64BE(out: Uint8Array, offset: number, value: bigint): void {
    const view = new DataView(out.buffer, out.byteOffset, out.byteLength)
    view.setBigUint64(offset, BigInt.asUintN(64, value), false)
  }

  /**
   * Reads an unsigned 64-bit value at `offset`, most-significant byte first.
   *
   * The caller guarantees `offset + 8 <= input.length`.
   */
  static readUint64BE(input: Uint8Array, offset: number): bigint {
    const view = new DataView(input.buffer, input.byteOffset, input.byteLength)
    return view.getBigUint64(offset, false)
  }

  /**
   * Returns a fresh, independent copy of the given Uint8Array.
   *
   * Correctly handles subarray views by copying only the view's byte range,
   * never the whole backing ArrayBuffer.
   *
   * @throws {TypeError} If src is not a Uint8Array (or Buffer).
   */
  static copy(src: Uint8Array): Uint8Array {
    ByteUtils.assertUint8Array(src, "src")

    const out = new Uint8Array(src.length)
    out.set(src, 0)
    return out
  }

  /**
   * Wraps the exact byte range of a Uint8Array view in a Buffer, without
   * copying.
   */
  static toBuffer(bytes: Uint8Array): Buffer {
    return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength)
  }

  private static assertUint8Array(value: unknown, paramName: string): void {
    if (!(value instanceof Uint8Array)) {
      throw new TypeError(
        `ByteUtils: "${paramName}" must be a Uint8Array or Buffer. ` +
        `Received: ${value === null ? "null" : value === undefined ? "undefined" : typeof value}`
      )
    }
  }
}
