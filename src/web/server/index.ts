/**
 * Environment Server Entry Point
 *
 * Serves crossover environments over WebSocket to out-of-process training loops.
 */

import "dotenv/config"
import { buildServer } from "./app.js"
import { getServerConfig } from "../../config.js"

async function startServer(): Promise<void> {
  const config = getServerConfig()
  const fastify = await buildServer({ logger: { level: config.logLevel } })

  try {
    await fastify.listen({ port: config.port, host: config.host })
    console.log(`WebSocket available at ws://${config.host}:${config.port}/ws`)
  } catch (err) {
    fastify.log.error(err)
    process.exit(1)
  }
}

startServer().catch((error: unknown) => {
  console.error("Fatal error:", error)
  process.exit(1)
})
