/**
 * Tests for bounded neighbourhood and shortest path searches
 */

import { MinHeap, boundedNeighborhood, shortestPath } from "./pathfinding.js"
import { RoadNetwork } from "./roadNetwork.js"
import { edge, graphOf } from "./testWorlds.js"

/** One-way chain a -> b -> c -> d with lengths 100, 200, 300. */
function chain(): RoadNetwork {
  return RoadNetwork.build(
    graphOf(
      ["a", "b", "c", "d"],
      [edge("a", "b", 100, 10), edge("b", "c", 200, 20), edge("c", "d", 300, 30)]
    )
  )
}

describe("MinHeap", () => {
  it("pops entries in distance order, ties by id", () => {
    const heap = new MinHeap()
    heap.push({ id: "c", distance: 5 })
    heap.push({ id: "b", distance: 1 })
    heap.push({ id: "a", distance: 5 })
    heap.push({ id: "d", distance: 0 })

    const order: string[] = []
    while (heap.size > 0) {
      const entry = heap.pop()
      if (entry) order.push(entry.id)
    }
    expect(order).toEqual(["d", "b", "a", "c"])
  })

  it("returns undefined when empty", () => {
    expect(new MinHeap().pop()).toBeUndefined()
  })
})

describe("boundedNeighborhood", () => {
  it("includes nodes exactly at the radius", () => {
    expect(boundedNeighborhood(chain(), "a", 300)).toEqual(new Set(["a", "b", "c"]))
  })

  it("excludes nodes just beyond the radius", () => {
    expect(boundedNeighborhood(chain(), "a", 299)).toEqual(new Set(["a", "b"]))
  })

  it("ignores edge direction", () => {
    expect(boundedNeighborhood(chain(), "d", 500)).toEqual(new Set(["d", "c", "b"]))
  })

  it("always contains the center", () => {
    expect(boundedNeighborhood(chain(), "b", 0)).toEqual(new Set(["b"]))
  })

  it("uses the shortest of several routes", () => {
    const network = RoadNetwork.build(
      graphOf(
        ["s", "m", "t"],
        [edge("s", "t", 500, 50), edge("s", "m", 100, 10), edge("m", "t", 100, 10)]
      )
    )
    expect(boundedNeighborhood(network, "s", 200)).toEqual(new Set(["s", "m", "t"]))
  })

  it("throws for an unknown center", () => {
    expect(() => boundedNeighborhood(chain(), "zz", 10)).toThrow("Unknown center node 'zz'")
  })
})

describe("shortestPath", () => {
  /** s -> x -> t is short but slow; s -> y -> t is long but fast. */
  function diamond(): RoadNetwork {
    return RoadNetwork.build(
      graphOf(
        ["s", "x", "y", "t"],
        [edge("s", "x", 1, 10), edge("x", "t", 1, 10), edge("s", "y", 5, 1), edge("y", "t", 5, 1)]
      )
    )
  }

  it("follows edges in their direction", () => {
    expect(shortestPath(chain(), "a", "d")).toEqual(["a", "b", "c", "d"])
    expect(shortestPath(chain(), "d", "a")).toBeNull()
  })

  it("minimises the chosen weight", () => {
    expect(shortestPath(diamond(), "s", "t", "length")).toEqual(["s", "x", "t"])
    expect(shortestPath(diamond(), "s", "t", "travelTime")).toEqual(["s", "y", "t"])
  })

  it("returns a single-node path from a node to itself", () => {
    expect(shortestPath(chain(), "b", "b")).toEqual(["b"])
  })

  it("returns null for unknown nodes", () => {
    expect(shortestPath(chain(), "a", "zz")).toBeNull()
  })
})
