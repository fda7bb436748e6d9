/**
 * Web Server Entry Point
 *
 * Fastify server with WebSocket support for map clients.
 */

import "dotenv/config"
import Fastify, { type FastifyInstance } from "fastify"
import websocketPlugin from "@fastify/websocket"
import { WebSocketHandler } from "./websocket.js"
import type { ServerMessage } from "./protocol.js"
import { FileNetworkProvider, type RoadNetworkProvider } from "../../networkProvider.js"

export const DEFAULT_PORT = 3000

const PORT = process.env.PORT ? parseInt(process.env.PORT, 10) : DEFAULT_PORT
const HOST = process.env.HOST ?? "0.0.0.0"

export interface ServerOptions {
  provider?: RoadNetworkProvider
  logger?: boolean
}

export async function buildServer(options: ServerOptions = {}): Promise<FastifyInstance> {
  const provider = options.provider ?? new FileNetworkProvider()
  const fastify = Fastify({
    logger: options.logger ?? true,
  })

  await fastify.register(websocketPlugin)

  // WebSocket route for a simulation connection
  fastify.get("/ws", { websocket: true }, (socket) => {
    const handler = new WebSocketHandler(provider, fastify.log)

    const send = (msg: ServerMessage) => {
      if (socket.readyState === socket.OPEN) {
        socket.send(JSON.stringify(msg))
      }
    }

    fastify.log.info("WebSocket client connected")

    socket.on("message", (data) => {
      handler.handleRawMessage(data.toString(), send).catch((error: unknown) => {
        const message = error instanceof Error ? error.message : "Unknown error"
        fastify.log.error(`WebSocket error: ${message}`)
        send({ type: "error", message })
      })
    })

    socket.on("close", () => {
      fastify.log.info("WebSocket client disconnected")
    })

    socket.on("error", (error: Error) => {
      fastify.log.error(`WebSocket error: ${error.message}`)
    })
  })

  // Health check endpoint
  fastify.get("/health", async () => {
    return { status: "ok" }
  })

  return fastify
}

async function startServer(): Promise<void> {
  const fastify = await buildServer()

  try {
    await fastify.listen({ port: PORT, host: HOST })
    console.log(`Server listening on http://${HOST}:${PORT}`)
    console.log(`WebSocket available at ws://${HOST}:${PORT}/ws`)
  } catch (err) {
    fastify.log.error(err)
    process.exit(1)
  }
}

if (require.main === module) {
  startServer().catch((error: unknown) => {
    console.error("Fatal error:", error instanceof Error ? error.message : error)
    process.exit(1)
  })
}
