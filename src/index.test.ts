import { WorldSimulation, getPolicyById, runSimulation, StaticNetworkProvider } from "./index.js"
import { gridGraph } from "./testWorlds.js"

describe("package entry point", () => {
  it("runs a registered policy over a loaded map", async () => {
    const provider = new StaticNetworkProvider([gridGraph(3, 3)])
    const simulation = await WorldSimulation.create(provider, { place: "Grid Town", seed: "entry" })
    const policy = getPolicyById("greedy")
    if (!policy) throw new Error("greedy policy missing")

    const result = runSimulation({
      seed: simulation.getSeed(),
      policy,
      graph: gridGraph(3, 3),
      maxActions: 20,
    })

    expect(result.seed).toBe("entry")
    expect(result.policyId).toBe("greedy")
    expect(result.actionCount).toBeLessThanOrEqual(20)
  })
})
