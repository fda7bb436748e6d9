import type { RngState } from "./types.js"

/**
 * Create a counter-based RNG. Integer seeds are normalised to their decimal
 * string so `42` and `"42"` produce the same world.
 */
export function createRng(seed: number | string): RngState {
  return {
    seed: String(seed),
    counter: 0,
  }
}

/**
 * Fresh seed for runs that did not ask for reproducibility. The result is
 * still reported back so an interesting world can be replayed.
 */
export function generateSeed(): string {
  return `sim-${Date.now()}-${Math.random().toString(36).slice(2, 8)}`
}

// Simple deterministic hash function (cyrb53)
function hash(str: string): number {
  let h1 = 0xdeadbeef
  let h2 = 0x41c6ce57
  for (let i = 0; i < str.length; i++) {
    const ch = str.charCodeAt(i)
    h1 = Math.imul(h1 ^ ch, 2654435761)
    h2 = Math.imul(h2 ^ ch, 1597334677)
  }
  h1 = Math.imul(h1 ^ (h1 >>> 16), 2246822507)
  h1 ^= Math.imul(h2 ^ (h2 >>> 13), 3266489909)
  h2 = Math.imul(h2 ^ (h2 >>> 16), 2246822507)
  h2 ^= Math.imul(h1 ^ (h1 >>> 13), 3266489909)
  return 4294967296 * (2097151 & h2) + (h1 >>> 0)
}

const TWO_POW_53 = 9007199254740992

function nextValue(rng: RngState): number {
  const value = hash(`${rng.seed}:${rng.counter}`) / TWO_POW_53
  rng.counter++
  return value
}

/**
 * Uniform float in [min, max).
 */
export function rollFloat(rng: RngState, min: number, max: number): number {
  return min + nextValue(rng) * (max - min)
}

/**
 * Uniform integer in [min, max], both ends inclusive.
 */
export function rollInt(rng: RngState, min: number, max: number): number {
  if (!Number.isInteger(min) || !Number.isInteger(max) || max < min) {
    throw new Error(`Invalid integer range [${min}, ${max}]`)
  }
  return min + Math.floor(nextValue(rng) * (max - min + 1))
}

/**
 * Pick one element uniformly at random.
 */
export function pickOne<T>(rng: RngState, items: readonly T[]): T {
  if (items.length === 0) {
    throw new Error("Cannot pick from an empty list")
  }
  return items[rollInt(rng, 0, items.length - 1)]
}
