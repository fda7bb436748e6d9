/**
 * WebSocket Handler
 *
 * Handles WebSocket connections and message processing for a map client.
 * Each WebSocketHandler instance manages a single simulation.
 */

import { WorldSimulation } from "../../session/WorldSimulation.js"
import type { RoadNetworkProvider } from "../../networkProvider.js"
import { applyAction } from "../../policy-runner/runner.js"
import type { SweeperAction } from "../../policy-runner/types.js"
import type { ClientMessage, ServerMessage, SweeperState } from "./protocol.js"
import { validateClientMessage } from "./protocol.js"

export type SendFunction = (msg: ServerMessage) => void

export interface Logger {
  info(msg: string): void
}

export class WebSocketHandler {
  private simulation: WorldSimulation | null = null
  private readonly provider: RoadNetworkProvider
  private readonly logger: Logger | null

  constructor(provider: RoadNetworkProvider, logger?: Logger) {
    this.provider = provider
    this.logger = logger ?? null
  }

  /**
   * Check if a simulation currently exists.
   */
  hasSession(): boolean {
    return this.simulation !== null
  }

  /**
   * Handle an incoming message and send responses.
   */
  async handleMessage(message: ClientMessage, send: SendFunction): Promise<void> {
    switch (message.type) {
      case "new_session":
        await this.handleNewSession(message.place, message.seed, send)
        break

      case "action":
        this.handleAction(message.action, send)
        break

      case "get_state":
        this.handleGetState(send)
        break

      case "get_map":
        this.handleGetMap(send)
        break
    }
  }

  /**
   * Handle a raw message string from WebSocket.
   * Validates and parses the message before processing.
   */
  async handleRawMessage(data: string, send: SendFunction): Promise<void> {
    let parsed: unknown
    try {
      parsed = JSON.parse(data)
    } catch {
      send({ type: "error", message: "Invalid JSON" })
      return
    }

    const message = validateClientMessage(parsed)
    if (!message) {
      send({ type: "error", message: "Invalid message format" })
      return
    }

    await this.handleMessage(message, send)
  }

  // ============================================================================
  // Message Handlers
  // ============================================================================

  private async handleNewSession(
    place: string | undefined,
    seed: string | number | undefined,
    send: SendFunction
  ): Promise<void> {
    try {
      this.simulation = await WorldSimulation.create(this.provider, { place, seed })
    } catch (error) {
      const message = error instanceof Error ? error.message : "Failed to start simulation"
      send({ type: "error", message })
      return
    }

    this.logger?.info(
      `[SESSION] place="${this.simulation.getPlace()}" seed="${this.simulation.getSeed()}"`
    )
    this.sendState(this.simulation, send)
  }

  private handleAction(action: SweeperAction, send: SendFunction): void {
    if (!this.simulation) {
      send({ type: "error", message: "No active simulation" })
      return
    }

    const location = applyAction(this.simulation, action)
    const status = location === null ? "REJECTED" : "OK"
    this.logger?.info(
      `[ACTION] ${status} action=${JSON.stringify(action)} battery=${this.simulation.getBatteryLife()} cleaned=${this.simulation.getMetersCleaned()}`
    )

    send({
      type: "action_result",
      action,
      location,
      state: this.snapshot(this.simulation),
    })
  }

  private handleGetState(send: SendFunction): void {
    if (!this.simulation) {
      send({ type: "error", message: "No active simulation" })
      return
    }

    this.sendState(this.simulation, send)
  }

  private handleGetMap(send: SendFunction): void {
    if (!this.simulation) {
      send({ type: "error", message: "No active simulation" })
      return
    }

    send({ type: "map", snapshot: this.simulation.renderSnapshot() })
  }

  // ============================================================================
  // Helpers
  // ============================================================================

  private sendState(simulation: WorldSimulation, send: SendFunction): void {
    send({
      type: "state",
      state: this.snapshot(simulation),
      seed: simulation.getSeed(),
      place: simulation.getPlace(),
    })
  }

  private snapshot(simulation: WorldSimulation): SweeperState {
    return {
      location: simulation.getCurrentLocationInfo(),
      outgoing: simulation.scanOutgoing(),
      batteryLife: simulation.getBatteryLife(),
      metersCleaned: simulation.getMetersCleaned(),
    }
  }
}
