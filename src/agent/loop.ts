import type { NodeID } from "../types.js"
import type { WorldSimulation } from "../session/WorldSimulation.js"
import type { SweeperAction } from "../policy-runner/types.js"
import { createRouteMemory, getObservation, recordArrival } from "../policy-runner/observation.js"
import { applyAction } from "../policy-runner/runner.js"
import { greedySweeper } from "../policy-runner/policies/greedy.js"
import { formatAction, formatActionResult, formatObservation } from "./formatters.js"
import { parseAgentResponse, type AgentResponse } from "./parser.js"
import { createSystemPrompt } from "./prompts.js"
import { createLLMClient, type LLMClient } from "./llm.js"
import { loadAgentConfig } from "./config.js"

/**
 * Configuration for the agent loop
 */
export interface AgentLoopConfig {
  simulation: WorldSimulation
  objective: string
  maxActions: number // Turns, counting replies that could not be parsed
  verbose: boolean
  dryRun?: boolean // If true, never call the LLM - the greedy policy answers instead
  model?: string // Optional model override
  client?: LLMClient // Use this client instead of creating one from agent config
}

/**
 * Result of a single step in the agent loop
 */
export interface StepResult {
  done: boolean
  action: SweeperAction | null
  location: NodeID | null // After the action; null if rejected or not taken
  reasoning: string
  learning: string
  prompt: string
  response: string
  error?: string
}

export interface AgentSessionStats {
  actionsAttempted: number
  actionsSucceeded: number
  actionsRejected: number
  parseErrors: number
  metersCleaned: number
  batteryUsed: number
}

export interface AgentLoop {
  getSimulation(): WorldSimulation

  /**
   * True once the battery is spent, the turn limit is reached, or the agent is stuck
   */
  isComplete(): boolean

  /**
   * Execute a single step (get LLM decision, execute action)
   */
  step(): Promise<StepResult>

  getStats(): AgentSessionStats

  getLearnings(): string[]

  getNotes(): string

  /**
   * Prompts, replies and results in order, for traces
   */
  getConversationHistory(): string[]
}

/**
 * The reply a dry run feeds to the parser in place of the LLM's
 */
export function createDryRunResponse(action: SweeperAction): string {
  return `REASONING: Dry run, following the greedy policy.

ACTION: ${formatAction(action)}

LEARNING: `
}

/**
 * Create an agent loop with the given configuration
 */
export function createAgentLoop(config: AgentLoopConfig): AgentLoop {
  const { simulation } = config
  const view = simulation.partialView()
  const initialBattery = view.getBatteryLife()
  const memory = createRouteMemory(view.getCurrentLocationInfo().locationId)

  const stats: AgentSessionStats = {
    actionsAttempted: 0,
    actionsSucceeded: 0,
    actionsRejected: 0,
    parseErrors: 0,
    metersCleaned: 0,
    batteryUsed: 0,
  }
  const learnings: string[] = []
  const conversationHistory: string[] = []
  let notes = ""

  // LLM client (only if not dry run)
  let llmClient: LLMClient | null = null
  if (!config.dryRun) {
    if (config.client) {
      llmClient = config.client
    } else {
      const agentConfig = loadAgentConfig()
      if (config.model) {
        agentConfig.model = config.model
      }
      llmClient = createLLMClient(agentConfig)
    }
    llmClient.setSystemPrompt(createSystemPrompt(config.objective))
    llmClient.setHistoryLimit(40)
  }

  function observe() {
    return getObservation(view, memory, initialBattery)
  }

  function buildPrompt(stateText: string): string {
    return notes ? `YOUR NOTES:\n${notes}\n\nCURRENT STATE:\n${stateText}` : stateText
  }

  return {
    getSimulation(): WorldSimulation {
      return simulation
    },

    isComplete(): boolean {
      if (view.getBatteryLife() <= 0) return true
      if (stats.actionsAttempted + stats.parseErrors >= config.maxActions) return true
      const obs = observe()
      return obs.outgoing.length === 0 && obs.routeDepth === 0
    },

    async step(): Promise<StepResult> {
      if (this.isComplete()) {
        return {
          done: true,
          action: null,
          location: null,
          reasoning: "",
          learning: "",
          prompt: "",
          response: "",
        }
      }

      const obs = observe()
      const prompt = buildPrompt(formatObservation(obs))
      conversationHistory.push(`STATE:\n${prompt}`)

      let reply: string
      if (llmClient) {
        reply = await llmClient.chat(prompt)
      } else {
        reply = createDryRunResponse(greedySweeper.decide(obs))
      }
      conversationHistory.push(`AGENT:\n${reply}`)

      const response: AgentResponse = parseAgentResponse(reply)
      if (response.notes) {
        notes = response.notes
      }
      if (response.learning && !learnings.includes(response.learning)) {
        learnings.push(response.learning)
      }

      if (!response.action) {
        stats.parseErrors++
        const error = response.error ?? "No action parsed"
        llmClient?.addMessage({
          role: "user",
          content: `${error}. Reply again using the required format.`,
        })
        return {
          done: this.isComplete(),
          action: null,
          location: null,
          reasoning: response.reasoning,
          learning: response.learning,
          prompt,
          response: reply,
          error,
        }
      }

      const action = response.action
      stats.actionsAttempted++

      if (config.verbose) {
        console.log(`\n[Action ${stats.actionsAttempted}] ${formatAction(action)}`)
        console.log(`Reasoning: ${response.reasoning}`)
      }

      const location = applyAction(view, action)
      const batterySpent = obs.batteryLife - view.getBatteryLife()
      const metersCleaned = view.getMetersCleaned() - obs.metersCleaned

      if (location !== null) {
        recordArrival(memory, action, location)
        stats.actionsSucceeded++
      } else {
        stats.actionsRejected++
      }
      stats.batteryUsed += batterySpent
      stats.metersCleaned += metersCleaned

      const resultText = formatActionResult(action, location, batterySpent, metersCleaned)
      conversationHistory.push(`RESULT:\n${resultText}`)
      llmClient?.addMessage({ role: "user", content: `Result: ${resultText}` })

      if (config.verbose) {
        console.log(resultText)
        if (response.learning) {
          console.log(`Learning: ${response.learning}`)
        }
      }

      return {
        done: this.isComplete(),
        action,
        location,
        reasoning: response.reasoning,
        learning: response.learning,
        prompt,
        response: reply,
      }
    },

    getStats(): AgentSessionStats {
      return { ...stats }
    },

    getLearnings(): string[] {
      return [...learnings]
    },

    getNotes(): string {
      return notes
    },

    getConversationHistory(): string[] {
      return [...conversationHistory]
    },
  }
}
