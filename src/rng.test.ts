import { createRng, rollFloat, rollInt } from "./rng.js"

describe("RNG", () => {
  describe("createRng", () => {
    it("should create RNG state with seed and counter at 0", () => {
      const rng = createRng("test-seed")
      expect(rng.seed).toBe("test-seed")
      expect(rng.counter).toBe(0)
    })
  })

  describe("rollFloat", () => {
    it("should stay in range and increment the counter", () => {
      const rng = createRng("float-test")
      for (let i = 0; i < 100; i++) {
        const value = rollFloat(rng, 2, 3)
        expect(value).toBeGreaterThanOrEqual(2)
        expect(value).toBeLessThan(3)
      }
      expect(rng.counter).toBe(100)
    })

    it("should be deterministic with same seed and counter", () => {
      const a = createRng("determinism-test")
      const b = createRng("determinism-test")
      for (let i = 0; i < 10; i++) {
        expect(rollFloat(a, 0, 1)).toBe(rollFloat(b, 0, 1))
      }
    })
  })

  describe("rollInt", () => {
    it("should return integers in [0, n)", () => {
      const rng = createRng("int-test")
      const seen = new Set<number>()
      for (let i = 0; i < 200; i++) {
        const value = rollInt(rng, 5)
        expect(Number.isInteger(value)).toBe(true)
        seen.add(value)
      }
      expect([...seen].every((v) => v >= 0 && v < 5)).toBe(true)
    })
  })
})
