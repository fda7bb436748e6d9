/**
 * Tests for stall-detection.ts - Rolling window stall detection
 */

import {
  createStallDetector,
  createStallSnapshot,
  DEFAULT_STALL_WINDOW_SIZE,
} from "./stall-detection.js"
import { createPartialView } from "../observability.js"
import { buildTestWorld, scenarioGraph } from "../testWorlds.js"

describe("stall-detection", () => {
  describe("createStallDetector", () => {
    it("is not stalled initially", () => {
      const detector = createStallDetector(100)
      expect(detector.isStalled()).toBe(false)
    })

    it("cleaning resets the counter", () => {
      const detector = createStallDetector(10)

      for (let i = 0; i < 9; i++) {
        detector.recordAction(0)
      }
      expect(detector.isStalled()).toBe(false)

      detector.recordAction(50)

      for (let i = 0; i < 9; i++) {
        detector.recordAction(0)
      }
      expect(detector.isStalled()).toBe(false)
    })

    it("stalls after a full window without cleaning", () => {
      const detector = createStallDetector(5)
      for (let i = 0; i < 5; i++) {
        detector.recordAction(0)
      }
      expect(detector.isStalled()).toBe(true)
    })

    it("reset clears the counter", () => {
      const detector = createStallDetector(2)
      detector.recordAction(0)
      detector.recordAction(0)
      expect(detector.isStalled()).toBe(true)

      detector.reset()
      expect(detector.isStalled()).toBe(false)
    })

    it("uses the default window size", () => {
      const detector = createStallDetector()
      for (let i = 0; i < DEFAULT_STALL_WINDOW_SIZE - 1; i++) {
        detector.recordAction(0)
      }
      expect(detector.isStalled()).toBe(false)
      detector.recordAction(0)
      expect(detector.isStalled()).toBe(true)
    })
  })

  describe("createStallSnapshot", () => {
    it("captures the agent's position and progress", () => {
      const state = buildTestWorld(scenarioGraph(), { start: "O", dirty: [["O", "A"]] })
      const view = createPartialView(state)
      view.cleanAndMoveTo("A")

      expect(createStallSnapshot(view, 12, { type: "Move", to: "B" })).toEqual({
        actionCount: 12,
        location: "A",
        batteryLife: 970,
        metersCleaned: 100,
        lastAction: { type: "Move", to: "B" },
      })
    })
  })
})
