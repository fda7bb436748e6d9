/**
 * WorldSimulation
 *
 * Owns one world (network + agent) for the life of a session. It implements
 * the agent's partial-observability protocol directly and hands out view
 * handles: `partialView()` for agents, `fullView()` for evaluators.
 */

import type { NodeID, NodeView, RawRoadGraph, SimulationOptions, StreetView } from "../types.js"
import { createWorld, type WorldState } from "../world.js"
import {
  backup,
  cleanAndMoveTo,
  getBatteryLife,
  getCurrentLocationInfo,
  getMetersCleaned,
  moveTo,
  scanOutgoing,
} from "../engine.js"
import {
  createFullView,
  createPartialView,
  type FullObservability,
  type PartialObservability,
} from "../observability.js"
import { renderSnapshot, type RenderSnapshot } from "../render.js"
import { loadPreparedNetwork, type RoadNetworkProvider } from "../networkProvider.js"
import { getDefaultPlace, getFallbackSpeedKph } from "../config.js"

export class WorldSimulation implements PartialObservability {
  private readonly state: WorldState
  private readonly partial: PartialObservability
  private readonly full: FullObservability

  private constructor(state: WorldState) {
    this.state = state
    this.partial = createPartialView(state)
    this.full = createFullView(state)
  }

  /**
   * Build a simulation from an already prepared graph (travel times set).
   */
  static fromNetwork(graph: RawRoadGraph, options: SimulationOptions = {}): WorldSimulation {
    return new WorldSimulation(createWorld(graph, options))
  }

  /**
   * Load `options.place` through `provider`, prepare it and build a
   * simulation. Load and validation failures are thrown as-is.
   */
  static async create(
    provider: RoadNetworkProvider,
    options: SimulationOptions = {}
  ): Promise<WorldSimulation> {
    const place = options.place ?? getDefaultPlace()
    const graph = await loadPreparedNetwork(provider, place, getFallbackSpeedKph())
    return WorldSimulation.fromNetwork(graph, { ...options, place })
  }

  getSeed(): string {
    return this.state.seed
  }

  getPlace(): string {
    return this.state.place
  }

  partialView(): PartialObservability {
    return this.partial
  }

  fullView(): FullObservability {
    return this.full
  }

  // Partial-observability protocol

  scanOutgoing(): StreetView[] {
    return scanOutgoing(this.state)
  }

  moveTo(destination: NodeID): NodeID | null {
    return moveTo(this.state, destination)
  }

  cleanAndMoveTo(destination: NodeID): NodeID | null {
    return cleanAndMoveTo(this.state, destination)
  }

  backup(steps: number = 1): NodeID | null {
    return backup(this.state, steps)
  }

  getBatteryLife(): number {
    return getBatteryLife(this.state)
  }

  getMetersCleaned(): number {
    return getMetersCleaned(this.state)
  }

  getCurrentLocationInfo(): NodeView {
    return getCurrentLocationInfo(this.state)
  }

  // Renderer hand-off

  getRoute(): NodeID[] {
    return [...this.state.agent.route]
  }

  renderSnapshot(): RenderSnapshot {
    return renderSnapshot(this.state)
  }
}
