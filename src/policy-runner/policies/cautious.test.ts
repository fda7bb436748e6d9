/**
 * Tests for cautious.ts - Cautious Sweeper Policy
 */

import { cautiousSweeper, RESERVE_FRACTION } from "./cautious.js"
import type { OutgoingStreet, SweeperObservation } from "../types.js"

function createObservation(overrides: Partial<SweeperObservation> = {}): SweeperObservation {
  return {
    location: "A",
    outgoing: [],
    batteryLife: 1000,
    initialBattery: 1000,
    metersCleaned: 0,
    routeDepth: 0,
    visitsHere: 1,
    ...overrides,
  }
}

function street(to: string, overrides: Partial<OutgoingStreet> = {}): OutgoingStreet {
  return { to, length: 100, travelTime: 10, dirty: false, visits: 0, ...overrides }
}

describe("cautiousSweeper", () => {
  it("keeps a quarter of the battery in reserve", () => {
    expect(RESERVE_FRACTION).toBe(0.25)
  })

  it("cleans like greedy while the battery is healthy", () => {
    const obs = createObservation({
      outgoing: [street("B", { dirty: true, length: 60 }), street("C", { dirty: true, length: 90 })],
    })

    expect(cautiousSweeper.decide(obs)).toEqual({ type: "CleanAndMove", to: "C" })
  })

  it("backs up toward home once on reserve", () => {
    const obs = createObservation({
      batteryLife: 249,
      routeDepth: 4,
      outgoing: [street("B", { dirty: true })],
    })

    expect(cautiousSweeper.decide(obs)).toEqual({ type: "Backup", steps: 1 })
  })

  it("skips a clean that would eat into the reserve", () => {
    // 3 x 10 s from 270 leaves 240, under the 250 reserve
    const obs = createObservation({
      batteryLife: 270,
      outgoing: [street("B", { dirty: true }), street("C", { visits: 1 })],
    })

    expect(cautiousSweeper.decide(obs)).toEqual({ type: "Move", to: "B" })
  })

  it("cleans when the reserve is exactly preserved", () => {
    const obs = createObservation({
      batteryLife: 280,
      outgoing: [street("B", { dirty: true })],
    })

    expect(cautiousSweeper.decide(obs)).toEqual({ type: "CleanAndMove", to: "B" })
  })

  it("only drives when home on reserve power", () => {
    const obs = createObservation({
      batteryLife: 100,
      routeDepth: 0,
      outgoing: [street("B", { dirty: true, visits: 2 }), street("C", { visits: 1 })],
    })

    expect(cautiousSweeper.decide(obs)).toEqual({ type: "Move", to: "C" })
  })
})
