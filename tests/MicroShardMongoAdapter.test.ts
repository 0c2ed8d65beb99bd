import { describe, it, expect } from "vitest"
import { Binary } from "bson"
import { MicroShardMongoAdapter } from "../src/adapters/mongo/MicroShardMongoAdapter"
import { MicroShardUUID } from "../src/core/MicroShardUUID"
import { codeOf } from "./helpers"

const CANONICAL = "17c4a210-3500-8000-8000-02a000000abc"

describe("MicroShardMongoAdapter", () => {
  const id = MicroShardUUID.fromString(CANONICAL)

  it("stores identifiers as UUID-subtype Binary", () => {
    const binary = MicroShardMongoAdapter.toDatabase(id)

    expect(binary.sub_type).toBe(4)
    expect(Buffer.from(binary.buffer.subarray(0, binary.position)).toString("hex")).toBe(
      "17c4a21035008000800002a000000abc"
    )
  })

  it("reads back what it stored", () => {
    expect(MicroShardMongoAdapter.fromDatabase(MicroShardMongoAdapter.toDatabase(id)).equals(id)).toBe(true)
  })

  it("builds query values from request text", () => {
    const binary = MicroShardMongoAdapter.fromString(CANONICAL.toUpperCase())

    expect(MicroShardMongoAdapter.fromDatabase(binary).toString()).toBe(CANONICAL)
  })

  it("rejects Binary values of the wrong length", () => {
    expect(codeOf(() => MicroShardMongoAdapter.fromDatabase(new Binary(new Uint8Array(8), 4)))).toBe("MS_BAD_LENGTH")
  })

  it("rejects values that are not Binary", () => {
    const raw: Binary = JSON.parse("{}")

    expect(() => MicroShardMongoAdapter.fromDatabase(raw)).toThrow(TypeError)
  })
})
