import { createRng, generateSeed, pickOne, rollFloat, rollInt } from "./rng.js"
import type { RngState } from "./types.js"

describe("RNG", () => {
  describe("createRng", () => {
    it("should create RNG state with seed and counter at 0", () => {
      const rng = createRng("test-seed")
      expect(rng.seed).toBe("test-seed")
      expect(rng.counter).toBe(0)
    })

    it("should treat integer and string seeds alike", () => {
      expect(createRng(42)).toEqual(createRng("42"))
    })
  })

  describe("generateSeed", () => {
    it("should produce a non-empty sim- seed", () => {
      const seed = generateSeed()
      expect(seed.startsWith("sim-")).toBe(true)
      expect(seed.length).toBeGreaterThan(4)
    })
  })

  describe("rollFloat", () => {
    it("should stay within [min, max) and advance the counter", () => {
      const rng = createRng("float-test")
      for (let i = 0; i < 200; i++) {
        const value = rollFloat(rng, 5, 10)
        expect(value).toBeGreaterThanOrEqual(5)
        expect(value).toBeLessThan(10)
      }
      expect(rng.counter).toBe(200)
    })
  })

  describe("rollInt", () => {
    it("should be deterministic with same seed and counter", () => {
      const rng1: RngState = { seed: "determinism-test", counter: 3 }
      const rng2: RngState = { seed: "determinism-test", counter: 3 }
      const values1 = Array.from({ length: 10 }, () => rollInt(rng1, 1, 2000))
      const values2 = Array.from({ length: 10 }, () => rollInt(rng2, 1, 2000))
      expect(values1).toEqual(values2)
    })

    it("should produce different sequences for different seeds", () => {
      const rngA = createRng("seed-A")
      const rngB = createRng("seed-B")
      const valuesA = Array.from({ length: 20 }, () => rollInt(rngA, 1, 2000))
      const valuesB = Array.from({ length: 20 }, () => rollInt(rngB, 1, 2000))
      expect(valuesA).not.toEqual(valuesB)
    })

    it("should include both ends of the range", () => {
      const rng = createRng("range-ends")
      const seen = new Set<number>()
      for (let i = 0; i < 500; i++) {
        const value = rollInt(rng, 1, 3)
        expect([1, 2, 3]).toContain(value)
        seen.add(value)
      }
      expect(seen).toEqual(new Set([1, 2, 3]))
    })

    it("should return min when the range is a single value", () => {
      const rng = createRng("single")
      expect(rollInt(rng, 7, 7)).toBe(7)
    })

    it("should reject inverted or fractional ranges", () => {
      const rng = createRng("bad-range")
      expect(() => rollInt(rng, 5, 4)).toThrow("Invalid integer range [5, 4]")
      expect(() => rollInt(rng, 0.5, 4)).toThrow("Invalid integer range")
    })
  })

  describe("pickOne", () => {
    it("should pick an element of the list", () => {
      const rng = createRng("pick")
      const items = ["a", "b", "c"]
      for (let i = 0; i < 50; i++) {
        expect(items).toContain(pickOne(rng, items))
      }
    })

    it("should throw on an empty list", () => {
      expect(() => pickOne(createRng("empty"), [])).toThrow("Cannot pick from an empty list")
    })
  })
})
