import { readFileSync, existsSync } from "fs"
import { resolve } from "path"
import { getAnthropicApiKey } from "../config.js"

export const DEFAULT_MODEL = "claude-sonnet-4-20250514"

/**
 * Agent configuration loaded from config file
 */
export interface AgentConfig {
  anthropicApiKey: string
  model: string
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value)
}

/**
 * Load agent configuration from a JSON file (default: ./agent-config.json).
 * Missing fields fall back to the engine config / ANTHROPIC_API_KEY and the
 * default model. A file that exists but cannot be parsed is an error.
 */
export function loadAgentConfig(configPath?: string): AgentConfig {
  const defaults: AgentConfig = {
    anthropicApiKey: getAnthropicApiKey() ?? "",
    model: DEFAULT_MODEL,
  }

  const path = configPath ?? resolve(process.cwd(), "agent-config.json")
  if (!existsSync(path)) {
    return defaults
  }

  let parsed: unknown
  try {
    parsed = JSON.parse(readFileSync(path, "utf-8"))
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error)
    throw new Error(`Invalid agent config at ${path}: ${detail}`)
  }
  if (!isRecord(parsed)) {
    throw new Error(`Invalid agent config at ${path}: expected an object`)
  }

  const { anthropicApiKey, model } = parsed
  return {
    anthropicApiKey: typeof anthropicApiKey === "string" ? anthropicApiKey : defaults.anthropicApiKey,
    model: typeof model === "string" ? model : defaults.model,
  }
}
