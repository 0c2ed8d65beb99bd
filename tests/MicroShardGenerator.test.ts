import { describe, it, expect } from "vitest"
import { MicroShardGenerator, ShardIdResolver } from "../src/core/MicroShardGenerator"
import { MicroShardError } from "../src/errors/MicroShardError"
import { FixedTimeSource, SequenceEntropySource, codeOf } from "./helpers"

const JAN_1_2023 = 1672531200000000n
const CANONICAL = "17c4a210-3500-8000-8000-02a000000abc"

const NO_ENV = { id: undefined, podIp: undefined, hostname: undefined }

function fixedGenerator(shardId = 42, micros = JAN_1_2023): MicroShardGenerator {
  return new MicroShardGenerator({
    shardId,
    timeSource: new FixedTimeSource(micros),
    entropySource: new SequenceEntropySource([0xabcn]),
  })
}

describe("ShardIdResolver", () => {
  it("uses an explicit number as is", () => {
    expect(ShardIdResolver.resolve(42, NO_ENV)).toEqual({ shardId: 42, source: "explicit_number" })
    expect(ShardIdResolver.resolve(4294967295n, NO_ENV)).toEqual({
      shardId: 4294967295,
      source: "explicit_number",
    })
  })

  it("hashes an explicit string to a stable uint32", () => {
    expect(ShardIdResolver.resolve("tenant-acme", NO_ENV)).toEqual({
      shardId: 2469579839,
      source: "explicit_string",
    })
    expect(ShardIdResolver.resolve("  tenant-acme  ", NO_ENV).shardId).toBe(2469579839)
  })

  it("rejects an empty string", () => {
    expect(() => ShardIdResolver.resolve("   ", NO_ENV)).toThrow(TypeError)
  })

  it("rejects explicit numbers outside 32 bits", () => {
    expect(codeOf(() => ShardIdResolver.resolve(4294967296, NO_ENV))).toBe("MS_SHARD_OUT_OF_RANGE")
    expect(codeOf(() => ShardIdResolver.resolve(-1, NO_ENV))).toBe("MS_SHARD_OUT_OF_RANGE")
    expect(codeOf(() => ShardIdResolver.resolve(1.5, NO_ENV))).toBe("MS_INVALID_INPUT")
  })

  it("prefers MICROSHARD_SHARD_ID over pod IP and hostname", () => {
    const env = { id: "1042", podIp: "10.0.0.7", hostname: "web-1" }

    expect(ShardIdResolver.resolve(undefined, env)).toEqual({ shardId: 1042, source: "env" })
  })

  it("rejects a non-decimal or out-of-range MICROSHARD_SHARD_ID", () => {
    expect(codeOf(() => ShardIdResolver.resolve(undefined, { ...NO_ENV, id: "0x10" }))).toBe("MS_INVALID_INPUT")
    expect(codeOf(() => ShardIdResolver.resolve(undefined, { ...NO_ENV, id: "4294967296" }))).toBe(
      "MS_SHARD_OUT_OF_RANGE"
    )
  })

  it("falls back to the pod IP, then the hostname", () => {
    expect(ShardIdResolver.resolve(undefined, { ...NO_ENV, podIp: "10.0.0.7", hostname: "web-1" })).toEqual({
      shardId: 319704491,
      source: "pod_ip",
    })
    expect(ShardIdResolver.resolve(undefined, { ...NO_ENV, hostname: "web-1" })).toEqual({
      shardId: 3295779578,
      source: "hostname",
    })
  })

  it("assigns a random shard with a warning when nothing is configured", () => {
    const resolution = ShardIdResolver.resolve(undefined, NO_ENV)

    expect(resolution.source).toBe("random")
    expect(resolution.shardId).toBeGreaterThanOrEqual(0)
    expect(resolution.shardId).toBeLessThanOrEqual(4294967295)
    expect(resolution.warning).toContain(`shardId=${resolution.shardId}`)
  })
})

describe("MicroShardGenerator", () => {
  describe("generate", () => {
    it("packs clock, default shard and entropy", () => {
      expect(fixedGenerator().generate().toString()).toBe(CANONICAL)
      expect(fixedGenerator().newId().toString()).toBe(CANONICAL)
    })

    it("uses a per-call shard over the default", () => {
      const generator = new MicroShardGenerator({
        shardId: 42,
        timeSource: new FixedTimeSource(1672531200123456n),
        entropySource: new SequenceEntropySource([0x123456789n]),
      })

      expect(generator.generate(7).toString()).toBe("17c4a210-3c89-8000-8000-007123456789")
      expect(generator.getShardId()).toBe(42)
    })

    it("issues strictly increasing identifiers for strictly increasing time", () => {
      const clock = new FixedTimeSource(JAN_1_2023)
      const generator = new MicroShardGenerator({
        shardId: 0,
        timeSource: clock,
        entropySource: new SequenceEntropySource([0xfffffffffn, 0n]),
      })

      const first = generator.generate(0xffffffff)
      clock.advance(1n)
      const second = generator.generate(0)

      expect(first.lt(second)).toBe(true)
      expect(first.toString() < second.toString()).toBe(true)
    })

    it("rejects shards outside 32 bits", () => {
      expect(codeOf(() => fixedGenerator().generate(4294967296))).toBe("MS_SHARD_OUT_OF_RANGE")
      expect(codeOf(() => new MicroShardGenerator({ shardId: -1 }))).toBe("MS_SHARD_OUT_OF_RANGE")
    })

    it("rejects a clock past the 54-bit range", () => {
      expect(codeOf(() => fixedGenerator(0, 1n << 54n).generate())).toBe("MS_TIME_OVERFLOW")
    })

    it("defaults to the system clock", () => {
      const before = BigInt(Date.now()) * 1000n
      const id = new MicroShardGenerator({ shardId: 9 }).generate()
      const after = BigInt(Date.now() + 1) * 1000n

      expect(id.getShardId()).toBe(9)
      expect(id.getTimestampMicros()).toBeGreaterThanOrEqual(before)
      expect(id.getTimestampMicros()).toBeLessThanOrEqual(after)
      expect(id.isMicroShard()).toBe(true)
    })
  })

  describe("fromIso", () => {
    it("backfills at the parsed instant with fresh entropy", () => {
      expect(fixedGenerator(0).fromIso("2023-01-01T00:00:00Z", 42).toString()).toBe(CANONICAL)
    })

    it("propagates parse errors", () => {
      expect(codeOf(() => fixedGenerator().fromIso("2023-02-29T12:00:00"))).toBe("MS_ISO_RANGE")
      expect(codeOf(() => fixedGenerator().fromIso("2023/01/01"))).toBe("MS_BAD_LENGTH")
    })
  })

  describe("fromTimestamp", () => {
    it("accepts a Date, milliseconds, microseconds and ISO text", () => {
      expect(fixedGenerator().fromTimestamp(new Date(1672531200000)).toString()).toBe(CANONICAL)
      expect(fixedGenerator().fromTimestamp(1672531200000).toString()).toBe(CANONICAL)
      expect(fixedGenerator().fromTimestamp(JAN_1_2023).toString()).toBe(CANONICAL)
      expect(fixedGenerator().fromTimestamp("2023-01-01T00:00:00.000000").toString()).toBe(CANONICAL)
    })

    it("rejects an invalid Date and fractional milliseconds", () => {
      expect(codeOf(() => fixedGenerator().fromTimestamp(new Date(Number.NaN)))).toBe("MS_INVALID_INPUT")
      expect(codeOf(() => fixedGenerator().fromTimestamp(1.5))).toBe("MS_INVALID_INPUT")
    })

    it("rejects instants before the epoch", () => {
      expect(codeOf(() => fixedGenerator().fromTimestamp(new Date(-1)))).toBe("MS_TIME_OVERFLOW")
    })
  })

  describe("build", () => {
    it("is deterministic", () => {
      expect(MicroShardGenerator.build(JAN_1_2023, 42, 0xabcn).toString()).toBe(CANONICAL)
      expect(MicroShardGenerator.build(1672531200000000, 42, 2748).toString()).toBe(CANONICAL)
    })

    it("masks random bits to 36", () => {
      expect(MicroShardGenerator.build(0, 0, (1n << 40n) | 1n).getRandom()).toBe(1n)
    })

    it("orders earlier timestamps first even with the highest shard", () => {
      expect(MicroShardGenerator.build(1000, 0xffffffff, 0).lt(MicroShardGenerator.build(2000, 0, 0))).toBe(true)
    })

    it("throws typed errors", () => {
      let caught: unknown
      try {
        MicroShardGenerator.build(1n << 54n, 0, 0)
      } catch (err) {
        caught = err
      }

      expect(caught).toBeInstanceOf(MicroShardError)
      expect(MicroShardError.isMicroShardError(caught)).toBe(true)
      expect(MicroShardError.isMicroShardError(new Error("plain"))).toBe(false)
      expect(codeOf(() => MicroShardGenerator.build(0, 1n << 32n, 0))).toBe("MS_SHARD_OUT_OF_RANGE")
    })
  })
})
