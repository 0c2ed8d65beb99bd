import { threadId } from "worker_threads"
import { MAX_RANDOM, UINT64_MASK } from "../core/Layout"
import { logger } from "../logging/logger"

/**
 * Seed substituted when the mixed seed comes out as zero.
 * (The golden-ratio increment of SplitMix64.)
 */
export const ZERO_SEED_SUBSTITUTE = 0x9e3779b97f4a7c15n

/**
 * Source of the 36 random bits in every generated identifier.
 */
export interface EntropySource {
  /** Next 64-bit value as an unsigned bigint. */
  next64(): bigint
  /** Next value truncated to the 36-bit random field. */
  next36(): bigint
}

/** Instances created in this process (this thread's module graph). */
let instanceCounter = 0n

function rotl(x: bigint, k: bigint): bigint {
  return ((x << k) | (x >> (64n - k))) & UINT64_MASK
}

/**
 * xoshiro256** pseudo-random generator.
 *
 * 256 bits of state, 64-bit output, passes BigCrush. Seeded through
 * SplitMix64 so a single 64-bit seed expands to a well-mixed state.
 *
 * NOT cryptographically secure: the output is predictable from a few
 * observed values. It only spreads identifiers that share a microsecond and
 * a shard; never use it for tokens, keys or anything an attacker must not
 * guess.
 *
 * Lazy seeding:
 *   The state is filled on the first draw, by ensureInitialized(), guarded
 *   by the `initialized` flag. Without an explicit seed the seed mixes the
 *   nanosecond wall clock with a diversifier built from the process id, the
 *   worker thread id and a per-process instance counter, so generators
 *   started at the same instant in different processes or threads still
 *   diverge.
 *
 * Thread model:
 *   One instance is never shared across worker threads. sharedEntropySource()
 *   keeps its instance in module scope, and each Worker loads its own copy
 *   of this module.
 */
export class Xoshiro256StarStar implements EntropySource {
  private readonly state: [bigint, bigint, bigint, bigint] = [0n, 0n, 0n, 0n]
  private initialized = false
  private readonly seed: bigint | undefined

  /**
   * @param seed - Optional 64-bit seed for a reproducible sequence. Omit it
   *               to seed from the clock on first use.
   */
  constructor(seed?: bigint) {
    this.seed = seed === undefined ? undefined : BigInt.asUintN(64, seed)
  }

  /**
   * Seeds the state if this is the first draw. Safe to call repeatedly.
   */
  ensureInitialized(): void {
    if (this.initialized) {
      return
    }

    let seed = this.seed ?? Xoshiro256StarStar.clockSeed()

    if (seed === 0n) {
      logger.debug("entropy seed mixed to zero; using fixed substitute")
      seed = ZERO_SEED_SUBSTITUTE
    }

    let splitState = seed
    for (let i = 0; i < 4; i++) {
      splitState = (splitState + 0x9e3779b97f4a7c15n) & UINT64_MASK
      let z = splitState
      z = ((z ^ (z >> 30n)) * 0xbf58476d1ce4e5b9n) & UINT64_MASK
      z = ((z ^ (z >> 27n)) * 0x94d049bb133111ebn) & UINT64_MASK
      this.state[i] = z ^ (z >> 31n)
    }

    this.initialized = true
  }

  next64(): bigint {
    this.ensureInitialized()

    const s = this.state
    const result = (rotl((s[1] * 5n) & UINT64_MASK, 7n) * 9n) & UINT64_MASK
    const t = (s[1] << 17n) & UINT64_MASK

    s[2] ^= s[0]
    s[3] ^= s[1]
    s[1] ^= s[2]
    s[0] ^= s[3]

    s[2] ^= t
    s[3] = rotl(s[3], 45n)

    return result
  }

  next36(): bigint {
    return this.next64() & MAX_RANDOM
  }

  /**
   * Millisecond wall clock plus a high-resolution sub-millisecond jitter,
   * XOR a per-instance diversifier.
   */
  private static clockSeed(): bigint {
    const nanos = BigInt(Date.now()) * 1_000_000n + (process.hrtime.bigint() % 1_000_000n)
    const diversifier =
      (BigInt(process.pid) << 40n) ^
      (BigInt(threadId) << 24n) ^
      ++instanceCounter

    return (nanos ^ diversifier) & UINT64_MASK
  }
}

let shared: Xoshiro256StarStar | undefined

/**
 * This thread's entropy source, created on first use.
 */
export function sharedEntropySource(): EntropySource {
  if (shared === undefined) {
    shared = new Xoshiro256StarStar()
  }

  return shared
}
