import { DEFAULT_PORT, buildServer } from "./index.js"
import { StaticNetworkProvider } from "../../networkProvider.js"
import { gridGraph } from "../../testWorlds.js"

describe("web server", () => {
  it("answers health checks", async () => {
    const server = await buildServer({
      provider: new StaticNetworkProvider([gridGraph(2, 2)]),
      logger: false,
    })

    const response = await server.inject({ method: "GET", url: "/health" })

    expect(response.statusCode).toBe(200)
    expect(response.json()).toEqual({ status: "ok" })
    await server.close()
  })

  it("listens on port 3000 unless PORT is set", () => {
    expect(DEFAULT_PORT).toBe(3000)
  })
})
