/**
 * Rendering
 *
 * Drawing collaborators used by `CrossoverEnv.render()`. Nothing here touches
 * simulation state; renderers only read positions and the wall layout.
 */

import type { GridShape, Position, RgbImage, Viewer } from "./types.js"
import type { GridModel } from "./grid.js"

export type Rgb = readonly [number, number, number]

export const CELL_SIZE = 40

export const WALL_COLOR: Rgb = [0, 0, 0]
export const FREE_COLOR: Rgb = [255, 255, 255]
export const GRID_LINE_COLOR: Rgb = [200, 200, 200]

export const AGENT_COLORS: readonly Rgb[] = [
  [255, 0, 0], // red
  [0, 0, 255], // blue
  [0, 128, 0], // green
  [255, 165, 0], // orange
]

export function agentColor(agentId: number): Rgb {
  return AGENT_COLORS[agentId % AGENT_COLORS.length]
}

/**
 * Draws the static background once and the agents on top of a copy of it.
 */
export interface Renderer {
  drawBase(grid: GridModel, goals: readonly Position[]): RgbImage
  drawAgents(base: RgbImage, positions: readonly Position[]): RgbImage
}

// ============================================================================
// Raster primitives
// ============================================================================

export function createImage(width: number, height: number, fill: Rgb): RgbImage {
  const data = new Uint8Array(width * height * 3)
  for (let i = 0; i < width * height; i++) {
    data[i * 3] = fill[0]
    data[i * 3 + 1] = fill[1]
    data[i * 3 + 2] = fill[2]
  }
  return { width, height, data }
}

export function getPixel(image: RgbImage, x: number, y: number): Rgb {
  const i = (y * image.width + x) * 3
  return [image.data[i], image.data[i + 1], image.data[i + 2]]
}

function setPixel(image: RgbImage, x: number, y: number, color: Rgb): void {
  if (x < 0 || y < 0 || x >= image.width || y >= image.height) return
  const i = (y * image.width + x) * 3
  image.data[i] = color[0]
  image.data[i + 1] = color[1]
  image.data[i + 2] = color[2]
}

function fillRect(image: RgbImage, x0: number, y0: number, w: number, h: number, color: Rgb): void {
  for (let y = y0; y < y0 + h; y++) {
    for (let x = x0; x < x0 + w; x++) {
      setPixel(image, x, y, color)
    }
  }
}

// ============================================================================
// Pixel renderer
// ============================================================================

export class PixelRenderer implements Renderer {
  readonly cellSize: number

  constructor(cellSize: number = CELL_SIZE) {
    this.cellSize = cellSize
  }

  drawBase(grid: GridModel, goals: readonly Position[]): RgbImage {
    const { rows, cols } = grid.shape
    const size = this.cellSize
    const image = createImage(cols * size, rows * size, FREE_COLOR)

    for (let row = 0; row < rows; row++) {
      for (let col = 0; col < cols; col++) {
        if (grid.wallExists({ row, col })) {
          fillRect(image, col * size, row * size, size, size, WALL_COLOR)
        } else {
          this.drawCellBorder(image, { row, col }, GRID_LINE_COLOR, 1)
        }
      }
    }

    goals.forEach((goal, agentId) => {
      this.drawCellBorder(image, goal, agentColor(agentId), 3)
    })

    return image
  }

  drawAgents(base: RgbImage, positions: readonly Position[]): RgbImage {
    const image: RgbImage = { width: base.width, height: base.height, data: base.data.slice() }
    positions.forEach((pos, agentId) => {
      this.drawDisc(image, pos, agentColor(agentId))
    })
    return image
  }

  private drawCellBorder(image: RgbImage, pos: Position, color: Rgb, thickness: number): void {
    const size = this.cellSize
    const x0 = pos.col * size
    const y0 = pos.row * size
    fillRect(image, x0, y0, size, thickness, color)
    fillRect(image, x0, y0 + size - thickness, size, thickness, color)
    fillRect(image, x0, y0, thickness, size, color)
    fillRect(image, x0 + size - thickness, y0, thickness, size, color)
  }

  private drawDisc(image: RgbImage, pos: Position, color: Rgb): void {
    const size = this.cellSize
    const cx = pos.col * size + size / 2
    const cy = pos.row * size + size / 2
    const radius = size * 0.35
    for (let y = pos.row * size; y < (pos.row + 1) * size; y++) {
      for (let x = pos.col * size; x < (pos.col + 1) * size; x++) {
        const dx = x + 0.5 - cx
        const dy = y + 0.5 - cy
        if (dx * dx + dy * dy <= radius * radius) {
          setPixel(image, x, y, color)
        }
      }
    }
  }
}

// ============================================================================
// Text rendering
// ============================================================================

const GOAL_MARKERS = "abcdefghij"

/**
 * `#` wall, `.` free, agent ids as digits, empty goal cells as `a`, `b`, ...
 */
export function renderAnsi(
  grid: GridModel,
  positions: readonly Position[],
  goals: readonly Position[]
): string {
  const { rows, cols }: GridShape = grid.shape
  const lines: string[] = []
  for (let row = 0; row < rows; row++) {
    let line = ""
    for (let col = 0; col < cols; col++) {
      const agentId = positions.findIndex((p) => p.row === row && p.col === col)
      const goalId = goals.findIndex((g) => g.row === row && g.col === col)
      if (agentId >= 0) {
        line += String(agentId)
      } else if (grid.wallExists({ row, col })) {
        line += "#"
      } else if (goalId >= 0) {
        line += GOAL_MARKERS[goalId] ?? "?"
      } else {
        line += "."
      }
    }
    lines.push(line)
  }
  return lines.join("\n")
}

/**
 * Prints the text rendering to stdout. Stands in for a window.
 */
export class ConsoleViewer implements Viewer {
  private open = true

  get isOpen(): boolean {
    return this.open
  }

  imshow(_image: RgbImage, text: string): void {
    if (!this.open) return
    console.log(text)
    console.log("")
  }

  close(): void {
    this.open = false
  }
}
