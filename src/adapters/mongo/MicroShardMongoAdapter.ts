import { Binary } from "bson"
import { BYTE_LENGTH } from "../../core/Layout"
import { MicroShardUUID } from "../../core/MicroShardUUID"
import { MicroShardError } from "../../errors/MicroShardError"
import { ByteUtils } from "../../utils/ByteUtils"

/**
 * BSON Binary subtype 4: RFC 9562 UUID.
 *
 * MongoDB shells and drivers render subtype 4 values as UUID("...") and
 * compare them byte by byte, so time-prefixed identifiers index in
 * creation order.
 */
const BSON_UUID_SUBTYPE = Binary.SUBTYPE_UUID

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Shape of a MongoDB document field storing a MicroShard UUID.
 *
 * @example
 * ```ts
 * interface EventDocument {
 *   _id: MicroShardDocument
 *   kind: string
 * }
 * ```
 */
export type MicroShardDocument = Binary

// ─────────────────────────────────────────────────────────────────────────────
// MicroShardMongoAdapter
// ─────────────────────────────────────────────────────────────────────────────

/**
 * MongoDB adapter for MicroShard UUIDs: converts between the value object
 * and BSON Binary.
 *
 * A Binary _id takes 16 bytes against 36 for the text form, and new
 * documents append near the end of the _id index instead of scattering
 * across it.
 *
 * Setup:
 *   ```ts
 *   await collection.insertOne({
 *     _id: MicroShardMongoAdapter.toDatabase(ids.generate(tenantShard)),
 *     kind: "signup",
 *   })
 *   ```
 *
 * Query pattern:
 *   ```ts
 *   const doc = await collection.findOne({ _id: MicroShardMongoAdapter.fromString(req.params.id) })
 *   ```
 */
export class MicroShardMongoAdapter {

  // ─── toDatabase ───────────────────────────────────────────────────────────

  /**
   * Converts a value object to a BSON Binary of subtype 4.
   *
   * @throws {TypeError} input is not a MicroShardUUID.
   *
   * @example
   * ```ts
   * const doc = { _id: MicroShardMongoAdapter.toDatabase(ids.generate()), kind: "signup" }
   * await collection.insertOne(doc)
   * ```
   */
  static toDatabase(input: MicroShardUUID): Binary {
    if (!(input instanceof MicroShardUUID)) {
      throw new TypeError(
        `MicroShardMongoAdapter.toDatabase: input must be a MicroShardUUID. ` +
        `Received: ${input === null ? "null" : input === undefined ? "undefined" : typeof input}`
      )
    }

    return new Binary(input.toBytes(), BSON_UUID_SUBTYPE)
  }

  // ─── fromDatabase ─────────────────────────────────────────────────────────

  /**
   * Converts a BSON Binary read from MongoDB back to a value object.
   *
   * @throws {TypeError}       value is not a BSON Binary.
   * @throws {MicroShardError} MS_BAD_LENGTH when the Binary is not 16 bytes.
   *
   * @example
   * ```ts
   * const doc = await collection.findOne({ kind: "signup" })
   * const id  = MicroShardMongoAdapter.fromDatabase(doc._id)
   * console.log(id.getIsoTimestamp())
   * ```
   */
  static fromDatabase(value: Binary): MicroShardUUID {
    if (!(value instanceof Binary)) {
      throw new TypeError(
        `MicroShardMongoAdapter.fromDatabase: expected a BSON Binary instance. ` +
        `Received: ${value === null ? "null" : value === undefined ? "undefined" : typeof value}. ` +
        `Ensure the field was stored using MicroShardMongoAdapter.toDatabase().`
      )
    }

    // Binary.buffer may be larger than the stored value; position is its length.
    const bytes = value.buffer.subarray(0, value.position)

    if (bytes.length !== BYTE_LENGTH) {
      throw new MicroShardError(
        "MS_BAD_LENGTH",
        `MicroShardMongoAdapter.fromDatabase: BSON Binary must be exactly ${BYTE_LENGTH} bytes. ` +
        `Received ${bytes.length} bytes.`
      )
    }

    return MicroShardUUID.fromBytes(ByteUtils.copy(bytes))
  }

  // ─── fromString ───────────────────────────────────────────────────────────

  /**
   * Converts identifier text from a request straight to a BSON Binary for a
   * query filter. Structure only; the version is not checked.
   *
   * @throws {MicroShardError} MS_INVALID_INPUT, MS_INVALID_HEX, MS_BAD_LENGTH.
   */
  static fromString(text: string): Binary {
    return MicroShardMongoAdapter.toDatabase(MicroShardUUID.fromString(text))
  }
}
