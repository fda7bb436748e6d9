/**
 * Road network provider
 *
 * The simulation never fetches maps itself; it asks a RoadNetworkProvider.
 * FileNetworkProvider reads prepared map documents from a directory, one
 * JSON file per place. Speed imputation and travel-time computation are
 * applied after loading, the same way for every provider.
 */

import * as fs from "fs"
import * as path from "path"
import type { RawRoadEdge, RawRoadGraph } from "./types.js"
import { getMapsDirectory } from "./config.js"
import { slugifyPlace } from "./utils.js"

export interface RoadNetworkProvider {
  loadNetwork(place: string): Promise<RawRoadGraph>
}

export class FileNetworkProvider implements RoadNetworkProvider {
  private readonly directory: string

  constructor(directory?: string) {
    this.directory = directory ?? getMapsDirectory()
  }

  getMapPath(place: string): string {
    return path.join(this.directory, `${slugifyPlace(place)}.json`)
  }

  async loadNetwork(place: string): Promise<RawRoadGraph> {
    const mapPath = this.getMapPath(place)
    if (!fs.existsSync(mapPath)) {
      throw new Error(`Place '${place}' could not be resolved: no map at ${mapPath}`)
    }

    let data: unknown
    try {
      data = JSON.parse(await fs.promises.readFile(mapPath, "utf-8"))
    } catch (error) {
      if (error instanceof Error) {
        throw new Error(`Road network for '${place}' is unavailable: ${error.message}`)
      }
      throw error
    }

    return parseRoadGraph(data, place)
  }
}

/**
 * In-memory provider keyed by place name. Places are matched by slug.
 */
export class StaticNetworkProvider implements RoadNetworkProvider {
  private readonly graphs: Map<string, RawRoadGraph>

  constructor(graphs: RawRoadGraph[]) {
    this.graphs = new Map(graphs.map((graph) => [slugifyPlace(graph.place), graph]))
  }

  async loadNetwork(place: string): Promise<RawRoadGraph> {
    const graph = this.graphs.get(slugifyPlace(place))
    if (!graph) {
      throw new Error(`Place '${place}' could not be resolved`)
    }
    return structuredClone(graph)
  }
}

// ============================================================================
// Validation
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value)
}

function isFiniteNumber(value: unknown): value is number {
  return typeof value === "number" && Number.isFinite(value)
}

function parseNodeId(value: unknown): string | null {
  if (typeof value === "string" && value.length > 0) return value
  if (isFiniteNumber(value)) return String(value)
  return null
}

/**
 * Validate a map document and convert it to a RawRoadGraph.
 * Throws with the offending index on the first malformed entry.
 */
export function parseRoadGraph(data: unknown, place: string): RawRoadGraph {
  const fail = (detail: string): never => {
    throw new Error(`Road network for '${place}' is unavailable: ${detail}`)
  }

  if (!isRecord(data)) return fail("document is not an object")
  const { nodes, edges } = data
  if (!Array.isArray(nodes)) return fail("missing 'nodes' array")
  if (!Array.isArray(edges)) return fail("missing 'edges' array")

  const graph: RawRoadGraph = { place, nodes: [], edges: [] }

  nodes.forEach((node: unknown, index) => {
    if (!isRecord(node)) return fail(`node ${index} is not an object`)
    const id = parseNodeId(node.id)
    if (id === null) return fail(`node ${index} has no id`)
    const { x, y, metadata } = node
    if (!isFiniteNumber(x) || !isFiniteNumber(y)) {
      return fail(`node ${index} has invalid coordinates`)
    }
    graph.nodes.push({ id, x, y, metadata: isRecord(metadata) ? metadata : {} })
  })

  edges.forEach((edge: unknown, index) => {
    if (!isRecord(edge)) return fail(`edge ${index} is not an object`)
    const from = parseNodeId(edge.from)
    const to = parseNodeId(edge.to)
    if (from === null || to === null) return fail(`edge ${index} has no endpoints`)
    const { length, key, highway, speedKph, attributes } = edge
    if (!isFiniteNumber(length)) return fail(`edge ${index} has no length`)

    const raw: RawRoadEdge = { from, to, length }
    if (isFiniteNumber(key)) raw.key = key
    if (typeof highway === "string") raw.highway = highway
    if (isFiniteNumber(speedKph)) raw.speedKph = speedKph
    if (isRecord(attributes)) raw.attributes = attributes
    graph.edges.push(raw)
  })

  return graph
}

// ============================================================================
// Speeds and travel times
// ============================================================================

function hasSpeed(edge: RawRoadEdge): edge is RawRoadEdge & { speedKph: number } {
  return edge.speedKph !== undefined && Number.isFinite(edge.speedKph) && edge.speedKph > 0
}

/**
 * Fill in missing speeds: the mean known speed of streets with the same
 * highway type, else `fallbackKph`. Returns a new graph.
 */
export function imputeSpeeds(graph: RawRoadGraph, fallbackKph: number): RawRoadGraph {
  const totals = new Map<string, { sum: number; count: number }>()
  for (const edge of graph.edges) {
    if (!hasSpeed(edge) || edge.highway === undefined) continue
    const total = totals.get(edge.highway) ?? { sum: 0, count: 0 }
    total.sum += edge.speedKph
    total.count++
    totals.set(edge.highway, total)
  }

  const edges = graph.edges.map((edge) => {
    if (hasSpeed(edge)) return { ...edge }
    const total = edge.highway !== undefined ? totals.get(edge.highway) : undefined
    const speedKph = total ? total.sum / total.count : fallbackKph
    return { ...edge, speedKph }
  })

  return { ...graph, edges }
}

/**
 * Travel time in seconds from length (m) and speed (km/h). Edges must
 * already have a speed. Returns a new graph.
 */
export function computeTravelTimes(graph: RawRoadGraph): RawRoadGraph {
  const edges = graph.edges.map((edge) => {
    if (!hasSpeed(edge)) {
      throw new Error(`Edge ${edge.from}->${edge.to} has no speed to derive a travel time from`)
    }
    const metersPerSecond = (edge.speedKph * 1000) / 3600
    return { ...edge, travelTime: edge.length / metersPerSecond }
  })
  return { ...graph, edges }
}

/**
 * Load a place and prepare it for the simulation.
 */
export async function loadPreparedNetwork(
  provider: RoadNetworkProvider,
  place: string,
  fallbackKph: number
): Promise<RawRoadGraph> {
  const graph = await provider.loadNetwork(place)
  return computeTravelTimes(imputeSpeeds(graph, fallbackKph))
}
