import { MAX_RANDOM } from "../src/core/Layout"
import type { EntropySource } from "../src/random/EntropySource"
import type { TimeSource } from "../src/utils/TimeSource"

/**
 * Clock that only moves when told to.
 */
export class FixedTimeSource implements TimeSource {
  private micros: bigint

  constructor(micros: bigint) {
    this.micros = micros
  }

  nowMicros(): bigint {
    return this.micros
  }

  advance(deltaMicros: bigint): void {
    this.micros += deltaMicros
  }
}

/**
 * Entropy that replays a fixed list, cycling at the end.
 */
export class SequenceEntropySource implements EntropySource {
  private readonly values: readonly bigint[]
  private index = 0

  constructor(values: readonly bigint[]) {
    this.values = values
  }

  next64(): bigint {
    const value = this.values[this.index % this.values.length]
    this.index++
    return value
  }

  next36(): bigint {
    return this.next64() & MAX_RANDOM
  }
}

/**
 * Runs `fn` and returns the MicroShardError code it throws.
 */
export function codeOf(fn: () => unknown): string | undefined {
  try {
    fn()
  } catch (err) {
    if (err instanceof Error && "code" in err && typeof err.code === "string") {
      return err.code
    }
    throw err
  }
  return undefined
}
