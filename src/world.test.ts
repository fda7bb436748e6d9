/**
 * Tests for World Factory
 *
 * Tests for world creation with:
 * - Seeded contamination and start location
 * - Battery and backup configuration
 */

import { createWorld } from "./world.js"
import { DEFAULT_INITIAL_BATTERY, setEngineConfig } from "./config.js"
import { gridGraph } from "./testWorlds.js"

function dirtyKeys(world: ReturnType<typeof createWorld>): string[] {
  return world.network
    .edges()
    .filter((e) => e.cleanliness === "dirty")
    .map((e) => `${e.from}->${e.to}`)
}

describe("World Factory", () => {
  afterEach(() => {
    setEngineConfig({})
  })

  describe("createWorld", () => {
    it("should create a valid world state", () => {
      const world = createWorld(gridGraph(10, 10), { seed: "test-seed" })

      expect(world.seed).toBe("test-seed")
      expect(world.place).toBe("Grid Town")
      expect(world.network.hasNode(world.agent.location)).toBe(true)
      expect(world.agent.route).toEqual([world.agent.location])
      expect(world.agent.metersCleaned).toBe(0)
      expect(world.backupCost).toBe("charge")
    })

    it("should start with 20 hours of battery by default", () => {
      const world = createWorld(gridGraph(4, 4), { seed: 1 })
      expect(world.agent.batteryLife).toBe(DEFAULT_INITIAL_BATTERY)
      expect(DEFAULT_INITIAL_BATTERY).toBe(72000)
    })

    it("should honour per-world options over engine config", () => {
      setEngineConfig({ initialBattery: 500, backupCost: "free" })
      const fromConfig = createWorld(gridGraph(4, 4), { seed: 1 })
      expect(fromConfig.agent.batteryLife).toBe(500)
      expect(fromConfig.backupCost).toBe("free")

      const overridden = createWorld(gridGraph(4, 4), {
        seed: 1,
        initialBattery: 1234,
        backupCost: "charge",
        place: "Elsewhere",
      })
      expect(overridden.agent.batteryLife).toBe(1234)
      expect(overridden.backupCost).toBe("charge")
      expect(overridden.place).toBe("Elsewhere")
    })

    it("should record at least one contamination region", () => {
      const world = createWorld(gridGraph(3, 3), { seed: "tiny" })
      expect(world.regions).toHaveLength(1)
      expect(world.network.isSealed()).toBe(true)
    })

    it("should reproduce the same world for the same seed", () => {
      const a = createWorld(gridGraph(30, 30), { seed: 2024 })
      const b = createWorld(gridGraph(30, 30), { seed: "2024" })

      expect(a.regions).toEqual(b.regions)
      expect(a.agent.location).toBe(b.agent.location)
      expect(dirtyKeys(a)).toEqual(dirtyKeys(b))
    })

    it("should produce different worlds for different seeds", () => {
      const worlds = ["alpha", "beta", "gamma"].map((seed) =>
        createWorld(gridGraph(30, 30), { seed })
      )
      const fingerprints = new Set(
        worlds.map((w) => JSON.stringify([w.regions, w.agent.location]))
      )
      expect(fingerprints.size).toBeGreaterThan(1)
    })

    it("should generate a seed when none is given", () => {
      const world = createWorld(gridGraph(4, 4))
      expect(world.seed.startsWith("sim-")).toBe(true)
    })
  })
})
