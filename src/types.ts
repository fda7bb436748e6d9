// Core type definitions for the simulation engine

// ============================================================================
// Identifiers
// ============================================================================

/** Road-network node (intersection) id. Provider ids are carried as strings. */
export type NodeID = string

export type Cleanliness = "clean" | "dirty"

/** How a backup step is paid for. */
export type BackupCostMode = "charge" | "free"

// ============================================================================
// Road network
// ============================================================================

export interface RoadNode {
  id: NodeID
  x: number // longitude
  y: number // latitude
  metadata: Record<string, unknown>
}

/**
 * A directed street segment. `key` disambiguates parallel edges between
 * the same pair of nodes.
 */
export interface RoadEdge {
  from: NodeID
  to: NodeID
  key: number
  length: number // meters
  travelTime: number // seconds
  cleanliness: Cleanliness
  attributes: Record<string, unknown>
}

/**
 * Raw graph as handed over by a network provider, before the simulation
 * takes ownership of it.
 */
export interface RawRoadGraph {
  place: string
  nodes: Array<{ id: NodeID; x: number; y: number; metadata?: Record<string, unknown> }>
  edges: RawRoadEdge[]
}

export interface RawRoadEdge {
  from: NodeID
  to: NodeID
  key?: number
  length: number
  highway?: string
  speedKph?: number
  travelTime?: number
  attributes?: Record<string, unknown>
}

// ============================================================================
// Views (owned snapshots handed to callers)
// ============================================================================

export interface NodeView {
  locationId: NodeID
  x: number
  y: number
  metadata: Record<string, unknown>
}

export interface StreetData {
  key: number
  length: number
  travelTime: number
  cleanliness: Cleanliness
  attributes: Record<string, unknown>
}

export interface StreetView {
  start: NodeView
  end: NodeView
  street: StreetData
}

// ============================================================================
// Contamination
// ============================================================================

export interface ContaminationRegion {
  center: NodeID
  radius: number // meters
}

// ============================================================================
// RNG
// ============================================================================

export interface RngState {
  seed: string
  counter: number
}

// ============================================================================
// Agent & world state
// ============================================================================

export interface AgentState {
  location: NodeID
  /** Never empty; the last entry is always `location`. */
  route: NodeID[]
  /** May go negative: depletion is for the caller to interpret. */
  batteryLife: number
  metersCleaned: number
}

export interface SimulationOptions {
  place?: string
  seed?: number | string
  initialBattery?: number
  backupCost?: BackupCostMode
}
