import type {
  AgentState,
  BackupCostMode,
  ContaminationRegion,
  RawRoadGraph,
  RngState,
  SimulationOptions,
} from "./types.js"
import { RoadNetwork } from "./roadNetwork.js"
import { generateContamination } from "./contamination.js"
import { createRng, generateSeed, pickOne } from "./rng.js"
import { getBackupCostMode, getInitialBattery } from "./config.js"

/**
 * Everything one simulation owns. Exactly one agent mutates it.
 */
export interface WorldState {
  place: string
  seed: string
  rng: RngState
  network: RoadNetwork
  regions: ContaminationRegion[]
  agent: AgentState
  backupCost: BackupCostMode
}

/**
 * Build a world from provider data: contaminate the network, then drop the
 * agent on a random intersection. Same graph + same seed gives the same world.
 */
export function createWorld(graph: RawRoadGraph, options: SimulationOptions = {}): WorldState {
  const network = RoadNetwork.build(graph)
  const seed = options.seed !== undefined ? String(options.seed) : generateSeed()
  const rng = createRng(seed)

  const regions = generateContamination(network, rng)
  const start = pickOne(rng, network.nodeIds())

  const agent: AgentState = {
    location: start,
    route: [start],
    batteryLife: options.initialBattery ?? getInitialBattery(),
    metersCleaned: 0,
  }

  return {
    place: options.place ?? graph.place,
    seed,
    rng,
    network,
    regions,
    agent,
    backupCost: options.backupCost ?? getBackupCostMode(),
  }
}
