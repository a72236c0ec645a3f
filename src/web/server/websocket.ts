/**
 * WebSocket Handler
 *
 * Handles message processing for one remote training loop.
 * Each WebSocketHandler instance owns a single environment.
 */

import { Buffer } from "node:buffer"
import { CrossoverEnv } from "../../engine.js"
import { CrossoverEnvError } from "../../errors.js"
import type { Logger } from "../../types.js"
import type { ClientMessage, EnvOptionsPayload, EnvSpec, ServerMessage } from "./protocol.js"
import { validateClientMessage } from "./protocol.js"

export type SendFunction = (msg: ServerMessage) => void

export class WebSocketHandler {
  private env: CrossoverEnv | null = null
  private logger: Logger | null = null

  constructor(logger?: Logger) {
    this.logger = logger ?? null
  }

  /**
   * Check if an environment currently exists.
   */
  hasEnv(): boolean {
    return this.env !== null
  }

  /**
   * Handle an incoming message and send responses.
   * Engine errors are reported to the client rather than thrown.
   */
  handleMessage(message: ClientMessage, send: SendFunction): void {
    try {
      this.dispatch(message, send)
    } catch (error) {
      if (error instanceof CrossoverEnvError) {
        this.logger?.info(`[ERROR] ${error.name}: ${error.message}`)
        send({ type: "error", message: error.message, code: error.name })
        return
      }
      throw error
    }
  }

  /**
   * Handle a raw message string from WebSocket.
   * Validates and parses the message before processing.
   */
  handleRawMessage(data: string, send: SendFunction): void {
    let parsed: unknown
    try {
      parsed = JSON.parse(data)
    } catch {
      send({ type: "error", message: "Invalid JSON" })
      return
    }

    const message = validateClientMessage(parsed)
    if (!message) {
      send({ type: "error", message: "Invalid message format" })
      return
    }

    this.handleMessage(message, send)
  }

  /**
   * Release the environment, e.g. when the socket closes.
   */
  dispose(): void {
    this.env?.close()
    this.env = null
  }

  private dispatch(message: ClientMessage, send: SendFunction): void {
    if (message.type === "make_env") {
      this.handleMakeEnv(message.options ?? {}, send)
      return
    }

    const env = this.env
    if (!env) {
      send({ type: "error", message: "No environment. Send make_env first." })
      return
    }

    switch (message.type) {
      case "reset":
        send({ type: "observation", observations: env.reset() })
        break

      case "step": {
        const result = env.step(message.actions)
        this.logger?.debug(
          `[STEP ${env.getStepCount()}] actions=${message.actions.join(",")} rewards=${result.rewards.join(",")}`
        )
        send({ type: "step_result", result })
        break
      }

      case "render":
        if (message.mode === "ansi") {
          send({ type: "render", mode: "ansi", data: env.render("ansi") })
        } else {
          const image = env.render("rgb_array")
          send({
            type: "render",
            mode: "rgb_array",
            data: Buffer.from(image.data).toString("base64"),
            width: image.width,
            height: image.height,
          })
        }
        break

      case "get_spec":
        send({ type: "spec", spec: describeEnv(env) })
        break

      case "close":
        this.dispose()
        send({ type: "closed" })
        break
    }
  }

  private handleMakeEnv(options: EnvOptionsPayload, send: SendFunction): void {
    const env = new CrossoverEnv({ ...options, logger: this.logger ?? undefined })
    this.env?.close()
    this.env = env
    this.logger?.info(`[ENV] created options=${JSON.stringify(options)}`)
    send({ type: "spec", spec: describeEnv(env) })
  }
}

export function describeEnv(env: CrossoverEnv): EnvSpec {
  return {
    nAgents: env.nAgents,
    actionCount: env.actionSpace.spaces[0]?.n ?? 0,
    actionMeanings: env.getActionMeanings(),
    observationShape: [...env.observationSpace.shape],
    gridShape: { ...env.shape },
    maxSteps: env.maxSteps,
    goalReward: env.goalReward,
    stepCost: env.stepCost,
    fullObservable: env.fullObservable,
  }
}
