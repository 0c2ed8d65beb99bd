import { describe, it, expect } from "vitest"
import { MAX_RANDOM } from "../src/core/Layout"
import { Xoshiro256StarStar, ZERO_SEED_SUBSTITUTE, sharedEntropySource } from "../src/random/EntropySource"

describe("Xoshiro256StarStar", () => {
  it("produces the reference sequence for a fixed seed", () => {
    const rng = new Xoshiro256StarStar(1n)

    expect(rng.next64()).toBe(0xb3f2af6d0fc710c5n)
    expect(rng.next64()).toBe(0x853b559647364cean)
    expect(rng.next64()).toBe(0x92f89756082a4514n)
  })

  it("repeats the sequence for equal seeds", () => {
    const a = new Xoshiro256StarStar(42n)
    const b = new Xoshiro256StarStar(42n)

    for (let i = 0; i < 10; i++) {
      expect(a.next64()).toBe(b.next64())
    }
  })

  it("replaces a zero seed with the fixed substitute", () => {
    const zero = new Xoshiro256StarStar(0n)
    const substitute = new Xoshiro256StarStar(ZERO_SEED_SUBSTITUTE)

    expect(zero.next64()).toBe(0x422ea740d0977210n)
    expect(substitute.next64()).toBe(0x422ea740d0977210n)
  })

  it("next36 keeps the low 36 bits of the next 64-bit value", () => {
    const rng = new Xoshiro256StarStar(42n)

    expect(rng.next36()).toBe(60333934358n)
    expect(rng.next36()).toBe(27599649406n)
  })

  it("seeds itself lazily, once", () => {
    const rng = new Xoshiro256StarStar(1n)

    rng.ensureInitialized()
    rng.ensureInitialized()

    expect(rng.next64()).toBe(0xb3f2af6d0fc710c5n)
  })

  it("clock-seeded instances stay in range and diverge", () => {
    const a = new Xoshiro256StarStar()
    const b = new Xoshiro256StarStar()
    const fromA = [a.next36(), a.next36(), a.next36()]
    const fromB = [b.next36(), b.next36(), b.next36()]

    for (const value of [...fromA, ...fromB]) {
      expect(value >= 0n && value <= MAX_RANDOM).toBe(true)
    }
    expect(fromA).not.toEqual(fromB)
  })
})

describe("sharedEntropySource", () => {
  it("returns one instance per thread", () => {
    expect(sharedEntropySource()).toBe(sharedEntropySource())
  })
})
