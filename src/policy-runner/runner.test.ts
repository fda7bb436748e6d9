/**
 * Tests for runner.ts - Single-run executor
 */

import { applyAction, runSimulation } from "./runner.js"
import { greedySweeper } from "./policies/greedy.js"
import { explorer } from "./policies/explorer.js"
import { createPartialView } from "../observability.js"
import { buildTestWorld, edge, graphOf, gridGraph, scenarioGraph } from "../testWorlds.js"
import type { Policy } from "./types.js"

/** Two intersections joined both ways by a 100 m, 10 s street. */
const pairGraph = () => graphOf(["A", "B"], [edge("A", "B", 100, 10), edge("B", "A", 100, 10)])

describe("runner", () => {
  describe("applyAction", () => {
    it("routes each action type to the partial view", () => {
      const view = createPartialView(buildTestWorld(scenarioGraph(), { start: "O" }))

      expect(applyAction(view, { type: "Move", to: "A" })).toBe("A")
      expect(applyAction(view, { type: "CleanAndMove", to: "B" })).toBe("B")
      expect(applyAction(view, { type: "Backup", steps: 2 })).toBe("O")
      expect(applyAction(view, { type: "Move", to: "B" })).toBeNull()
    })
  })

  describe("runSimulation", () => {
    it("stops once the battery is spent", () => {
      const result = runSimulation({
        seed: "battery",
        policy: explorer,
        graph: pairGraph(),
        maxActions: 100,
        initialBattery: 25,
      })

      expect(result.terminationReason).toBe("battery_depleted")
      expect(result.actionCount).toBe(3)
      expect(result.batteryRemaining).toBe(-5)
      expect(result.batterySpent).toEqual({ moving: 30, cleaning: 0, backingUp: 0 })
      expect(result.metersCleaned).toBe(0)
    })

    it("bills clean-and-move at three times the travel time", () => {
      const alwaysClean: Policy = {
        id: "always-clean",
        name: "Always Clean",
        decide: (obs) => ({ type: "CleanAndMove", to: obs.outgoing[0].to }),
      }

      const result = runSimulation({
        seed: "clean",
        policy: alwaysClean,
        graph: pairGraph(),
        maxActions: 100,
        initialBattery: 100,
      })

      expect(result.terminationReason).toBe("battery_depleted")
      expect(result.actionCount).toBe(4)
      expect(result.batterySpent.cleaning).toBe(120)
      expect(result.metersCleaned).toBeLessThanOrEqual(200)
    })

    it("stops at the action limit", () => {
      const result = runSimulation({
        seed: "limit",
        policy: explorer,
        graph: gridGraph(6, 6),
        maxActions: 7,
        stallWindowSize: 1000,
      })

      expect(result.terminationReason).toBe("max_actions")
      expect(result.actionCount).toBe(7)
      expect(result.batteryUsed).toBe(70)
    })

    it("detects a stall and records invalid actions", () => {
      const lost: Policy = {
        id: "lost",
        name: "Lost",
        decide: () => ({ type: "Move", to: "nowhere" }),
      }

      const result = runSimulation({
        seed: "stall",
        policy: lost,
        graph: pairGraph(),
        maxActions: 100,
        stallWindowSize: 4,
        initialBattery: 500,
      })

      expect(result.terminationReason).toBe("stall")
      expect(result.invalidActions).toBe(4)
      expect(result.batteryUsed).toBe(0)
      expect(result.efficiency).toBe(0)
      expect(result.stallSnapshot).toMatchObject({
        actionCount: 4,
        batteryLife: 500,
        metersCleaned: 0,
        lastAction: { type: "Move", to: "nowhere" },
      })
    })

    it("reports a stuck agent on an isolated intersection", () => {
      const result = runSimulation({
        seed: "island",
        policy: greedySweeper,
        graph: graphOf(["A"], []),
        maxActions: 100,
      })

      expect(result.terminationReason).toBe("stuck")
      expect(result.actionCount).toBe(0)
    })

    it("keeps the action log consistent with the totals", () => {
      const result = runSimulation({
        seed: "logged",
        policy: greedySweeper,
        graph: gridGraph(15, 15),
        maxActions: 200,
        initialBattery: 5000,
        recordActions: true,
      })

      const log = result.actionLog ?? []
      expect(log).toHaveLength(result.actionCount)
      expect(log.reduce((sum, r) => sum + r.metersCleaned, 0)).toBe(result.metersCleaned)
      expect(log.reduce((sum, r) => sum + r.batterySpent, 0)).toBe(result.batteryUsed)
      expect(5000 - result.batteryUsed).toBe(result.batteryRemaining)
    })

    it("streams actions to onAction without keeping a log", () => {
      const seen: number[] = []
      const result = runSimulation({
        seed: "stream",
        policy: explorer,
        graph: gridGraph(4, 4),
        maxActions: 5,
        onAction: (record) => seen.push(record.index),
      })

      expect(seen).toEqual([1, 2, 3, 4, 5])
      expect(result.actionLog).toBeUndefined()
    })

    it("is deterministic for a seed and policy", () => {
      const config = {
        seed: "repeat",
        policy: greedySweeper,
        graph: gridGraph(20, 20),
        maxActions: 300,
        initialBattery: 8000,
      }

      expect(runSimulation(config)).toEqual(runSimulation(config))
    })
  })
})
