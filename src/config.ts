/**
 * Global configuration for the simulation engine.
 * Set these values once at startup, and they'll be used throughout.
 */

import type { BackupCostMode } from "./types.js"

/** 20 hours of travel time, in seconds. */
export const DEFAULT_INITIAL_BATTERY = 72000

export const DEFAULT_FALLBACK_SPEED_KPH = 40

export const DEFAULT_PLACE = "Des Moines, Iowa, USA"

export interface EngineConfig {
  /** Place loaded when a caller does not name one. */
  defaultPlace?: string
  /** Directory the file-backed network provider reads maps from. */
  mapsDirectory?: string
  initialBattery?: number
  /** Speed assumed for streets with no speed data of their own or their type. */
  fallbackSpeedKph?: number
  /** "charge" bills each backup step like a move; "free" does not. */
  backupCost?: BackupCostMode
  /** Anthropic API key for the LLM agent. */
  anthropicApiKey?: string
}

/** The global engine configuration */
let config: EngineConfig = {}

/**
 * Set the global engine configuration.
 * Call this once at startup before creating any simulations.
 */
export function setEngineConfig(newConfig: EngineConfig): void {
  config = { ...newConfig }
}

/**
 * Get the current engine configuration.
 */
export function getEngineConfig(): EngineConfig {
  return config
}

export function getDefaultPlace(): string {
  return config.defaultPlace ?? process.env.SWEEPER_PLACE ?? DEFAULT_PLACE
}

export function getMapsDirectory(): string {
  return config.mapsDirectory ?? process.env.SWEEPER_MAPS_DIR ?? "./maps"
}

export function getInitialBattery(): number {
  return config.initialBattery ?? DEFAULT_INITIAL_BATTERY
}

export function getFallbackSpeedKph(): number {
  return config.fallbackSpeedKph ?? DEFAULT_FALLBACK_SPEED_KPH
}

export function getBackupCostMode(): BackupCostMode {
  return config.backupCost ?? "charge"
}

/**
 * Get the Anthropic API key from config, or from ANTHROPIC_API_KEY env var as fallback.
 */
export function getAnthropicApiKey(): string | undefined {
  return config.anthropicApiKey ?? process.env.ANTHROPIC_API_KEY
}
