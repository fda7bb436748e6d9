// Core types
export type {
  NodeID,
  Cleanliness,
  BackupCostMode,
  RoadNode,
  RoadEdge,
  RawRoadGraph,
  RawRoadEdge,
  NodeView,
  StreetData,
  StreetView,
  ContaminationRegion,
  RngState,
  AgentState,
  SimulationOptions,
} from "./types.js"

// Simulation
export { WorldSimulation } from "./session/index.js"
export { createWorld, type WorldState } from "./world.js"
export {
  CLEANING_SURCHARGE,
  scanOutgoing,
  moveTo,
  cleanAndMoveTo,
  backup,
  getBatteryLife,
  getMetersCleaned,
  getCurrentLocationInfo,
} from "./engine.js"

// Observability
export {
  createPartialView,
  createFullView,
  type PartialObservability,
  type FullObservability,
} from "./observability.js"

// Road network
export { RoadNetwork, type Neighbor } from "./roadNetwork.js"
export { boundedNeighborhood, shortestPath } from "./pathfinding.js"
export { generateContamination, regionCountRange } from "./contamination.js"
export {
  FileNetworkProvider,
  StaticNetworkProvider,
  parseRoadGraph,
  imputeSpeeds,
  computeTravelTimes,
  loadPreparedNetwork,
  type RoadNetworkProvider,
} from "./networkProvider.js"

// Rendering
export { renderSnapshot, edgeColor, type RenderSnapshot, type RenderedEdge } from "./render.js"

// Configuration
export { setEngineConfig, getEngineConfig, type EngineConfig } from "./config.js"

// RNG utilities
export { createRng, generateSeed } from "./rng.js"

// Policy runner
export * from "./policy-runner/index.js"
