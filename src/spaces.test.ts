import { DiscreteSpace, MultiAgentActionSpace } from "./spaces.js"
import { createRng } from "./rng.js"

describe("DiscreteSpace", () => {
  const space = new DiscreteSpace(5)

  it("contains integers in [0, n)", () => {
    expect(space.contains(0)).toBe(true)
    expect(space.contains(4)).toBe(true)
    expect(space.contains(5)).toBe(false)
    expect(space.contains(-1)).toBe(false)
    expect(space.contains(2.5)).toBe(false)
    expect(space.contains("2")).toBe(false)
  })

  it("samples inside the space", () => {
    const rng = createRng("discrete")
    for (let i = 0; i < 200; i++) {
      expect(space.contains(space.sample(rng))).toBe(true)
    }
  })

  it("rejects a non-positive size", () => {
    expect(() => new DiscreteSpace(0)).toThrow(RangeError)
  })
})

describe("MultiAgentActionSpace", () => {
  const spaces = new MultiAgentActionSpace([
    new DiscreteSpace(5),
    new DiscreteSpace(5),
    new DiscreteSpace(5),
  ])

  it("samples one action per agent", () => {
    const sample = spaces.sample(createRng("joint"))
    expect(sample).toHaveLength(3)
    expect(spaces.contains(sample)).toBe(true)
  })

  it("is reproducible from the seed", () => {
    expect(spaces.sample(createRng("same"))).toEqual(spaces.sample(createRng("same")))
  })

  it("rejects lists of the wrong length", () => {
    expect(spaces.contains([0, 1])).toBe(false)
  })
})
