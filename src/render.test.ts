import { ConsoleViewer, PixelRenderer, createImage, getPixel, renderAnsi } from "./render.js"
import { GridModel } from "./grid.js"

const GOALS = [
  { row: 0, col: 4 },
  { row: 2, col: 4 },
  { row: 0, col: 0 },
  { row: 2, col: 0 },
]

describe("PixelRenderer", () => {
  const grid = new GridModel({ rows: 3, cols: 5 })

  it("sizes the image from the grid and cell size", () => {
    const image = new PixelRenderer(10).drawBase(grid, GOALS)
    expect(image.width).toBe(50)
    expect(image.height).toBe(30)
  })

  it("fills walls and leaves free cells white", () => {
    const image = new PixelRenderer(10).drawBase(grid, GOALS)
    expect(getPixel(image, 25, 5)).toEqual([0, 0, 0])
    expect(getPixel(image, 25, 15)).toEqual([255, 255, 255])
  })

  it("draws agents on a copy of the base image", () => {
    const renderer = new PixelRenderer(10)
    const base = renderer.drawBase(grid, GOALS)
    const image = renderer.drawAgents(base, [{ row: 1, col: 2 }])

    expect(getPixel(image, 25, 15)).toEqual([255, 0, 0])
    expect(getPixel(base, 25, 15)).toEqual([255, 255, 255])
  })
})

describe("createImage", () => {
  it("fills every pixel", () => {
    const image = createImage(2, 2, [1, 2, 3])
    expect(Array.from(image.data)).toEqual([1, 2, 3, 1, 2, 3, 1, 2, 3, 1, 2, 3])
  })
})

describe("renderAnsi", () => {
  it("marks walls, agents and empty goals", () => {
    const grid = new GridModel({ rows: 3, cols: 5 })
    const positions = [
      { row: 1, col: 2 },
      { row: 2, col: 1 },
      { row: 0, col: 3 },
      { row: 2, col: 0 },
    ]

    expect(renderAnsi(grid, positions, GOALS)).toBe("c.#2a\n..0..\n31#.b")
  })
})

describe("ConsoleViewer", () => {
  it("prints until closed", () => {
    const log = jest.spyOn(console, "log").mockImplementation(() => {})
    const viewer = new ConsoleViewer()

    viewer.imshow(createImage(1, 1, [0, 0, 0]), "grid")
    viewer.close()
    viewer.imshow(createImage(1, 1, [0, 0, 0]), "hidden")

    expect(viewer.isOpen).toBe(false)
    expect(log.mock.calls).toEqual([["grid"], [""]])
    log.mockRestore()
  })
})
