// Simulation: owns one grid, the RNG every stochastic rule draws from,
// and the step counter. Runs without a canvas.

import { Grid } from './Grid'
import { createRNG } from './rng'
import type { RNG } from './rng'
import { clearGrid } from './materials'
import { drawStroke, type StrokeTarget } from './stroke'
import { stepFrame } from './systems/frame'

export class Simulation {
  readonly grid: Grid
  rand: RNG
  simStep: number
  initialSeed: number

  constructor(cols: number, rows: number, seed?: number) {
    this.grid = new Grid(cols, rows)
    const s = seed ?? Date.now()
    this.initialSeed = s
    this.rand = createRNG(s)
    this.simStep = 0
  }

  get cols(): number { return this.grid.width }
  get rows(): number { return this.grid.height }

  /** Advance the simulation by one tick. */
  step(): void {
    stepFrame(this.grid, this.rand)
    this.simStep++
  }

  /** Apply one drag segment between two cursor cells. */
  paint(x1: number, y1: number, x2: number, y2: number, target: StrokeTarget): void {
    drawStroke(this.grid, x1, y1, x2, y2, target)
  }

  clear(): void {
    clearGrid(this.grid)
  }

  /** Reset the simulation: clear grid, reseed RNG, zero simStep. */
  reset(seed?: number): void {
    clearGrid(this.grid)
    const s = seed ?? Date.now()
    this.initialSeed = s
    this.rand = createRNG(s)
    this.simStep = 0
  }
}
