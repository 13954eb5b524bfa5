import { createHash } from "node:crypto"

const MASK_64 = (1n << 64n) - 1n
const FNV_OFFSET_BASIS = 0xcbf29ce484222325n
const FNV_PRIME = 0x100000001b3n
const GOLDEN_GAMMA = 0x9e3779b97f4a7c15n

/**
 * Computes the SHA-256 hash of a string and returns it as a hexadecimal string.
 * @param input - The string to hash.
 * @returns Hexadecimal representation of the SHA-256 hash.
 */
export function sha256Hex(input: string): string {
  return createHash("sha256").update(input, "utf8").digest("hex")
}

/**
 * 64-bit FNV-1a over the UTF-8 bytes of `input`.
 */
export function fnv1a64(input: string): bigint {
  let hash = FNV_OFFSET_BASIS
  for (const byte of new TextEncoder().encode(input)) {
    hash ^= BigInt(byte)
    hash = (hash * FNV_PRIME) & MASK_64
  }
  return hash
}

/**
 * Seed for the generator of one variant.
 *
 * The key is the UTF-8 string `<recordId> NUL <variantIndex> NUL <seed>` (decimal
 * integers), hashed with 64-bit FNV-1a. Any implementation that follows this
 * recipe and SplitMix64 below reproduces the same variants.
 */
export function variantSeed(recordId: string, variantIndex: number, seed: number): bigint {
  return fnv1a64(`${recordId}\u0000${variantIndex}\u0000${seed}`)
}

/**
 * SplitMix64 pseudo-random generator (Steele, Lea & Flood 2014).
 */
export class SplitMix64 {
  private state: bigint

  constructor(seed: bigint) {
    this.state = seed & MASK_64
  }

  nextU64(): bigint {
    this.state = (this.state + GOLDEN_GAMMA) & MASK_64
    let z = this.state
    z = ((z ^ (z >> 30n)) * 0xbf58476d1ce4e5b9n) & MASK_64
    z = ((z ^ (z >> 27n)) * 0x94d049bb133111ebn) & MASK_64
    return z ^ (z >> 31n)
  }

  /**
   * Uniform integer in [0, bound) by rejection sampling.
   */
  nextInt(bound: number): number {
    if (!Number.isInteger(bound) || bound < 1) {
      throw new Error(`bound must be a positive integer, got ${bound}`)
    }
    const b = BigInt(bound)
    const limit = (1n << 64n) - ((1n << 64n) % b)
    for (;;) {
      const x = this.nextU64()
      if (x < limit) return Number(x % b)
    }
  }

  /**
   * Uniform float in [0, 1) from the top 53 bits.
   */
  nextFloat(): number {
    return Number(this.nextU64() >> 11n) / 2 ** 53
  }

  pick<T>(items: readonly T[]): T {
    if (items.length === 0) throw new Error("cannot pick from an empty list")
    return items[this.nextInt(items.length)]
  }

  /**
   * Fisher-Yates permutation of `0..n-1`, drawing indices from the top down.
   */
  permutation(n: number): number[] {
    const out = Array.from({ length: n }, (_, i) => i)
    for (let i = n - 1; i > 0; i--) {
      const j = this.nextInt(i + 1)
      const tmp = out[i]
      out[i] = out[j]
      out[j] = tmp
    }
    return out
  }
}
