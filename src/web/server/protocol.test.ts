import { isClientMessage, validateClientMessage } from "./protocol.js"

describe("protocol type guards", () => {
  describe("isClientMessage", () => {
    it("returns false for non-object values", () => {
      expect(isClientMessage(null)).toBe(false)
      expect(isClientMessage(undefined)).toBe(false)
      expect(isClientMessage("reset")).toBe(false)
      expect(isClientMessage([{ type: "reset" }])).toBe(false)
    })

    it("returns false for unknown message types", () => {
      expect(isClientMessage({})).toBe(false)
      expect(isClientMessage({ type: "teleport" })).toBe(false)
    })

    it("returns true for valid messages", () => {
      expect(isClientMessage({ type: "make_env" })).toBe(true)
      expect(isClientMessage({ type: "make_env", options: { stepCost: -0.1 } })).toBe(true)
      expect(isClientMessage({ type: "reset" })).toBe(true)
      expect(isClientMessage({ type: "step", actions: [0, 1, 2, 9] })).toBe(true)
      expect(isClientMessage({ type: "render", mode: "ansi" })).toBe(true)
      expect(isClientMessage({ type: "render", mode: "rgb_array" })).toBe(true)
      expect(isClientMessage({ type: "get_spec" })).toBe(true)
      expect(isClientMessage({ type: "close" })).toBe(true)
    })

    it("rejects malformed payloads", () => {
      expect(isClientMessage({ type: "step" })).toBe(false)
      expect(isClientMessage({ type: "step", actions: ["UP"] })).toBe(false)
      expect(isClientMessage({ type: "render", mode: "human" })).toBe(false)
      expect(isClientMessage({ type: "make_env", options: "full" })).toBe(false)
      expect(isClientMessage({ type: "make_env", options: { fullObservable: "yes" } })).toBe(false)
    })
  })

  describe("validateClientMessage", () => {
    it("returns null for invalid messages", () => {
      expect(validateClientMessage(null)).toBe(null)
      expect(validateClientMessage({ type: "invalid" })).toBe(null)
    })

    it("returns the message unchanged when valid", () => {
      expect(validateClientMessage({ type: "step", actions: [4, 4, 4, 4] })).toEqual({
        type: "step",
        actions: [4, 4, 4, 4],
      })
    })
  })
})
