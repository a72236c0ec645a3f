/**
 * Fastify application: health check plus the environment WebSocket route.
 */

import Fastify, { type FastifyInstance, type FastifyServerOptions } from "fastify"
import websocketPlugin from "@fastify/websocket"
import { WebSocketHandler } from "./websocket.js"
import type { ServerMessage } from "./protocol.js"

export async function buildServer(options: FastifyServerOptions = {}): Promise<FastifyInstance> {
  const fastify = Fastify(options)

  // Register WebSocket plugin
  await fastify.register(websocketPlugin)

  // One environment per connection
  fastify.get("/ws", { websocket: true }, (socket) => {
    const handler = new WebSocketHandler(fastify.log)

    const send = (msg: ServerMessage) => {
      if (socket.readyState === socket.OPEN) {
        socket.send(JSON.stringify(msg))
      }
    }

    fastify.log.info("WebSocket client connected")

    socket.on("message", (data: Buffer) => {
      try {
        handler.handleRawMessage(data.toString(), send)
      } catch (error) {
        const message = error instanceof Error ? error.message : "Unknown error"
        fastify.log.error(`WebSocket error: ${message}`)
        send({ type: "error", message })
      }
    })

    socket.on("close", () => {
      handler.dispose()
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
