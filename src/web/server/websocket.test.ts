import { WebSocketHandler } from "./websocket.js"
import type { ServerMessage } from "./protocol.js"

describe("WebSocketHandler", () => {
  let handler: WebSocketHandler
  let sentMessages: ServerMessage[]

  const mockSend = (msg: ServerMessage) => {
    sentMessages.push(msg)
  }

  const lastMessage = (): ServerMessage | undefined => sentMessages[sentMessages.length - 1]

  beforeEach(() => {
    handler = new WebSocketHandler()
    sentMessages = []
  })

  describe("make_env", () => {
    it("creates an environment and replies with its spec", () => {
      handler.handleMessage({ type: "make_env" }, mockSend)

      expect(handler.hasEnv()).toBe(true)
      expect(sentMessages).toEqual([
        {
          type: "spec",
          spec: {
            nAgents: 4,
            actionCount: 5,
            actionMeanings: ["DOWN", "LEFT", "UP", "RIGHT", "NOOP"],
            observationShape: [3],
            gridShape: { rows: 3, cols: 8 },
            maxSteps: 100,
            goalReward: 5,
            stepCost: 0,
            fullObservable: false,
          },
        },
      ])
    })

    it("applies the requested options", () => {
      handler.handleMessage(
        { type: "make_env", options: { fullObservable: true, stepCost: -1, gridWidth: 10 } },
        mockSend
      )

      const msg = lastMessage()
      if (msg?.type !== "spec") throw new Error("expected spec")
      expect(msg.spec.observationShape).toEqual([12])
      expect(msg.spec.gridShape).toEqual({ rows: 3, cols: 10 })
      expect(msg.spec.stepCost).toBe(-1)
    })

    it("reports invalid options as an error", () => {
      handler.handleMessage({ type: "make_env", options: { gridWidth: 3 } }, mockSend)

      expect(handler.hasEnv()).toBe(false)
      expect(sentMessages).toEqual([
        {
          type: "error",
          message: "gridWidth must be an integer in 4..64, got 3",
          code: "InvalidConfigError",
        },
      ])
    })
  })

  it("rejects an oversized grid without creating an environment", () => {
    handler.handleMessage({ type: "make_env", options: { gridWidth: 100_000_000 } }, mockSend)

    expect(handler.hasEnv()).toBe(false)
    expect(sentMessages).toEqual([
      {
        type: "error",
        message: "gridWidth must be an integer in 4..64, got 100000000",
        code: "InvalidConfigError",
      },
    ])
  })

  describe("without an environment", () => {
    it("asks for make_env first", () => {
      handler.handleMessage({ type: "reset" }, mockSend)
      expect(sentMessages).toEqual([{ type: "error", message: "No environment. Send make_env first." }])
    })
  })

  describe("with an environment", () => {
    beforeEach(() => {
      handler.handleMessage({ type: "make_env" }, mockSend)
      sentMessages = []
    })

    it("reports step before reset", () => {
      handler.handleMessage({ type: "step", actions: [4, 4, 4, 4] }, mockSend)
      expect(sentMessages).toEqual([
        {
          type: "error",
          message: "Environment has not been reset. Call reset() before step().",
          code: "NotInitializedError",
        },
      ])
    })

    it("resets and steps", () => {
      handler.handleMessage({ type: "reset" }, mockSend)
      const reset = lastMessage()
      if (reset?.type !== "observation") throw new Error("expected observation")
      expect(reset.observations[0]).toEqual([1 / 3, 0.25, 0])

      handler.handleMessage({ type: "step", actions: [0, 4, 4, 4] }, mockSend)
      const stepped = lastMessage()
      if (stepped?.type !== "step_result") throw new Error("expected step_result")
      expect(stepped.result.rewards).toEqual([0, 0, 0, 0])
      expect(stepped.result.dones).toEqual([false, false, false, false])
      expect(stepped.result.observations[0]).toEqual([2 / 3, 0.25, 0.01])
    })

    it("reports an invalid action code", () => {
      handler.handleMessage({ type: "reset" }, mockSend)
      handler.handleMessage({ type: "step", actions: [4, 7, 4, 4] }, mockSend)

      expect(lastMessage()).toEqual({
        type: "error",
        message: "Invalid action 7 for agent 1: expected an integer in 0..4",
        code: "InvalidActionError",
      })
    })

    it("reports the wrong number of actions", () => {
      handler.handleMessage({ type: "reset" }, mockSend)
      handler.handleMessage({ type: "step", actions: [4, 4] }, mockSend)

      expect(lastMessage()).toEqual({
        type: "error",
        message: "Expected 4 actions (one per agent) but got 2",
        code: "ActionCountMismatchError",
      })
    })

    it("renders as text", () => {
      handler.handleMessage({ type: "reset" }, mockSend)
      handler.handleMessage({ type: "render", mode: "ansi" }, mockSend)

      expect(lastMessage()).toEqual({
        type: "render",
        mode: "ansi",
        data: "c0####2a\n........\nd1####3b",
      })
    })

    it("renders an image as base64", () => {
      handler.handleMessage({ type: "reset" }, mockSend)
      handler.handleMessage({ type: "render", mode: "rgb_array" }, mockSend)

      const msg = lastMessage()
      if (msg?.type !== "render") throw new Error("expected render")
      expect(msg.width).toBe(320)
      expect(msg.height).toBe(120)
      expect(msg.data.length).toBe(153600)
    })

    it("closes the environment", () => {
      handler.handleMessage({ type: "close" }, mockSend)

      expect(handler.hasEnv()).toBe(false)
      expect(sentMessages).toEqual([{ type: "closed" }])
    })
  })

  describe("handleRawMessage", () => {
    it("rejects invalid JSON", () => {
      handler.handleRawMessage("{not json", mockSend)
      expect(sentMessages).toEqual([{ type: "error", message: "Invalid JSON" }])
    })

    it("rejects unknown messages", () => {
      handler.handleRawMessage(JSON.stringify({ type: "teleport" }), mockSend)
      expect(sentMessages).toEqual([{ type: "error", message: "Invalid message format" }])
    })

    it("dispatches valid messages", () => {
      handler.handleRawMessage(JSON.stringify({ type: "make_env" }), mockSend)
      handler.handleRawMessage(JSON.stringify({ type: "get_spec" }), mockSend)

      expect(sentMessages.map((m) => m.type)).toEqual(["spec", "spec"])
    })
  })

  it("logs through the provided logger", () => {
    const logger = { info: jest.fn(), debug: jest.fn() }
    const logged = new WebSocketHandler(logger)

    logged.handleMessage({ type: "make_env" }, mockSend)
    logged.handleMessage({ type: "reset" }, mockSend)

    expect(logger.info).toHaveBeenCalledWith("[ENV] created options={}")
    expect(logger.debug).toHaveBeenCalledWith("[EPISODE 1] reset")
  })
})
