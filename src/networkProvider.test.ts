import * as fs from "fs"
import * as path from "path"
import * as os from "os"
import {
  FileNetworkProvider,
  StaticNetworkProvider,
  computeTravelTimes,
  imputeSpeeds,
  loadPreparedNetwork,
  parseRoadGraph,
} from "./networkProvider.js"
import type { RawRoadGraph } from "./types.js"

const SAMPLE_DOCUMENT = {
  nodes: [
    { id: 1, x: -93.6, y: 41.6 },
    { id: "2", x: -93.61, y: 41.6, metadata: { street_count: 3 } },
  ],
  edges: [
    { from: 1, to: 2, length: 100, highway: "residential", speedKph: 36 },
    { from: "2", to: "1", key: 0, length: 100, highway: "residential" },
  ],
}

describe("networkProvider", () => {
  describe("parseRoadGraph", () => {
    it("converts a valid document", () => {
      const graph = parseRoadGraph(SAMPLE_DOCUMENT, "Sample")
      expect(graph.place).toBe("Sample")
      expect(graph.nodes).toEqual([
        { id: "1", x: -93.6, y: 41.6, metadata: {} },
        { id: "2", x: -93.61, y: 41.6, metadata: { street_count: 3 } },
      ])
      expect(graph.edges).toEqual([
        { from: "1", to: "2", length: 100, highway: "residential", speedKph: 36 },
        { from: "2", to: "1", key: 0, length: 100, highway: "residential" },
      ])
    })

    it("rejects documents without nodes", () => {
      expect(() => parseRoadGraph({ edges: [] }, "Sample")).toThrow(
        "Road network for 'Sample' is unavailable: missing 'nodes' array"
      )
    })

    it("rejects non-objects", () => {
      expect(() => parseRoadGraph("nope", "Sample")).toThrow("document is not an object")
    })

    it("names the first malformed node", () => {
      const doc = { nodes: [{ id: "1", x: 0, y: 0 }, { id: "2", x: "west", y: 0 }], edges: [] }
      expect(() => parseRoadGraph(doc, "Sample")).toThrow("node 1 has invalid coordinates")
    })

    it("names the first malformed edge", () => {
      const doc = { nodes: [{ id: "1", x: 0, y: 0 }], edges: [{ from: "1", to: "1" }] }
      expect(() => parseRoadGraph(doc, "Sample")).toThrow("edge 0 has no length")
    })
  })

  describe("imputeSpeeds", () => {
    it("uses the mean speed of the same highway type, else the fallback", () => {
      const graph: RawRoadGraph = {
        place: "Speeds",
        nodes: [],
        edges: [
          { from: "a", to: "b", length: 1, highway: "residential", speedKph: 30 },
          { from: "b", to: "c", length: 1, highway: "residential", speedKph: 50 },
          { from: "c", to: "d", length: 1, highway: "residential" },
          { from: "d", to: "e", length: 1, highway: "primary" },
          { from: "e", to: "f", length: 1 },
          { from: "f", to: "g", length: 1, highway: "primary", speedKph: 0 },
        ],
      }
      const speeds = imputeSpeeds(graph, 25).edges.map((e) => e.speedKph)
      expect(speeds).toEqual([30, 50, 40, 25, 25, 25])
    })

    it("does not modify its input", () => {
      const graph: RawRoadGraph = { place: "P", nodes: [], edges: [{ from: "a", to: "b", length: 1 }] }
      imputeSpeeds(graph, 40)
      expect(graph.edges[0].speedKph).toBeUndefined()
    })
  })

  describe("computeTravelTimes", () => {
    it("derives seconds from meters and km/h", () => {
      const graph: RawRoadGraph = {
        place: "P",
        nodes: [],
        edges: [
          { from: "a", to: "b", length: 100, speedKph: 36 },
          { from: "b", to: "a", length: 500, speedKph: 72 },
        ],
      }
      expect(computeTravelTimes(graph).edges.map((e) => e.travelTime)).toEqual([10, 25])
    })

    it("throws for edges with no speed", () => {
      const graph: RawRoadGraph = { place: "P", nodes: [], edges: [{ from: "a", to: "b", length: 1 }] }
      expect(() => computeTravelTimes(graph)).toThrow(
        "Edge a->b has no speed to derive a travel time from"
      )
    })
  })

  describe("FileNetworkProvider", () => {
    let mapsDir: string

    beforeAll(() => {
      mapsDir = fs.mkdtempSync(path.join(os.tmpdir(), "sweeper-test-maps-"))
      fs.writeFileSync(path.join(mapsDir, "sample-town.json"), JSON.stringify(SAMPLE_DOCUMENT))
      fs.writeFileSync(path.join(mapsDir, "broken-town.json"), "{ not json")
    })

    afterAll(() => {
      fs.rmSync(mapsDir, { recursive: true, force: true })
    })

    it("maps a place to a slugged file name", () => {
      const provider = new FileNetworkProvider(mapsDir)
      expect(provider.getMapPath("Sample Town")).toBe(path.join(mapsDir, "sample-town.json"))
    })

    it("loads a map by place name", async () => {
      const graph = await new FileNetworkProvider(mapsDir).loadNetwork("Sample Town")
      expect(graph.place).toBe("Sample Town")
      expect(graph.nodes).toHaveLength(2)
      expect(graph.edges).toHaveLength(2)
    })

    it("fails for an unknown place", async () => {
      await expect(new FileNetworkProvider(mapsDir).loadNetwork("Atlantis")).rejects.toThrow(
        "Place 'Atlantis' could not be resolved"
      )
    })

    it("fails for an unreadable map", async () => {
      await expect(new FileNetworkProvider(mapsDir).loadNetwork("Broken Town")).rejects.toThrow(
        "Road network for 'Broken Town' is unavailable"
      )
    })

    it("prepares travel times when loaded for a simulation", async () => {
      const graph = await loadPreparedNetwork(new FileNetworkProvider(mapsDir), "Sample Town", 40)
      expect(graph.edges.map((e) => e.travelTime)).toEqual([10, 10])
    })
  })

  describe("StaticNetworkProvider", () => {
    it("returns a copy of the registered graph", async () => {
      const registered = parseRoadGraph(SAMPLE_DOCUMENT, "Static Town")
      const provider = new StaticNetworkProvider([registered])

      const loaded = await provider.loadNetwork("static town")
      loaded.nodes.pop()
      expect(registered.nodes).toHaveLength(2)
    })

    it("fails for an unregistered place", async () => {
      await expect(new StaticNetworkProvider([]).loadNetwork("Nowhere")).rejects.toThrow(
        "Place 'Nowhere' could not be resolved"
      )
    })
  })
})
