import { describe, it, expect } from "vitest"
import { MicroShardUUID } from "../src/core/MicroShardUUID"
import { codeOf } from "./helpers"

const CANONICAL = "17c4a210-3500-8000-8000-02a000000abc"
const FOREIGN = "018e65c9-3a10-0400-8000-a4f1d3b8e1a1"

describe("MicroShardUUID", () => {
  describe("fields", () => {
    const id = MicroShardUUID.fromString(CANONICAL)

    it("exposes shard, timestamp, random, version and variant", () => {
      expect(id.getShardId()).toBe(42)
      expect(id.getTimestampMicros()).toBe(1672531200000000n)
      expect(id.getRandom()).toBe(0xabcn)
      expect(id.getVersion()).toBe(8)
      expect(id.getVariant()).toBe(2)
      expect(id.isMicroShard()).toBe(true)
    })

    it("truncates getDate to milliseconds and keeps microseconds in ISO text", () => {
      const precise = new MicroShardUUID(0x17c4a2103c898000n, 0x8000007123456789n)

      expect(precise.getTimestampMicros()).toBe(1672531200123456n)
      expect(precise.getDate().getTime()).toBe(1672531200123)
      expect(precise.getIsoTimestamp()).toBe("2023-01-01T00:00:00.123456Z")
    })
  })

  describe("output", () => {
    it("writes the canonical string, also from JSON.stringify", () => {
      const id = new MicroShardUUID(0x17c4a21035008000n, 0x800002a000000abcn)

      expect(id.toString()).toBe(CANONICAL)
      expect(JSON.stringify({ id })).toBe(`{"id":"${CANONICAL}"}`)
    })

    it("returns a fresh 16-byte copy from toBytes", () => {
      const id = MicroShardUUID.fromString(CANONICAL)
      const first = id.toBytes()
      first[0] = 0

      expect(id.toBytes()[0]).toBe(0x17)
      expect(MicroShardUUID.fromBytes(id.toBytes()).equals(id)).toBe(true)
    })
  })

  describe("construction", () => {
    it("rejects halves outside 64 bits", () => {
      expect(() => new MicroShardUUID(1n << 64n, 0n)).toThrow(RangeError)
      expect(() => new MicroShardUUID(0n, -1n)).toThrow(RangeError)
    })

    it("fromString accepts foreign UUIDs", () => {
      expect(MicroShardUUID.fromString(FOREIGN).getVersion()).toBe(0)
    })

    it("parse insists on version 8 and variant 2", () => {
      expect(MicroShardUUID.parse(CANONICAL).toString()).toBe(CANONICAL)
      expect(codeOf(() => MicroShardUUID.parse(FOREIGN))).toBe("MS_NOT_MICROSHARD")
    })

    it("passes codec errors through", () => {
      expect(codeOf(() => MicroShardUUID.fromString("018e65c9"))).toBe("MS_BAD_LENGTH")
      expect(codeOf(() => MicroShardUUID.fromBytes(new Uint8Array(8)))).toBe("MS_BAD_LENGTH")
    })

    it("reads Buffers", () => {
      const id = MicroShardUUID.fromBytes(Buffer.from(CANONICAL.replace(/-/g, ""), "hex"))

      expect(id.toString()).toBe(CANONICAL)
    })
  })

  describe("comparison", () => {
    const earlier = MicroShardUUID.fromString("00000000-000f-8a3f-bfff-fff000000000")
    const later = MicroShardUUID.fromString("00000000-001f-8400-8000-000000000000")

    it("orders by unsigned 128-bit value", () => {
      expect(earlier.compare(later)).toBe(-1)
      expect(earlier.lt(later)).toBe(true)
      expect(later.gt(earlier)).toBe(true)
      expect(earlier.lte(earlier)).toBe(true)
      expect(later.gte(earlier)).toBe(true)
      expect(earlier.equals(later)).toBe(false)
    })

    it("sorts with the static comparator", () => {
      const sorted = [later, earlier].sort(MicroShardUUID.compare)

      expect(sorted.map(String)).toEqual([earlier.toString(), later.toString()])
    })
  })

  describe("isMicroShardUUID", () => {
    it("accepts value objects only", () => {
      expect(MicroShardUUID.isMicroShardUUID(MicroShardUUID.fromString(CANONICAL))).toBe(true)
      expect(MicroShardUUID.isMicroShardUUID(CANONICAL)).toBe(false)
      expect(MicroShardUUID.isMicroShardUUID(null)).toBe(false)
    })
  })
})
