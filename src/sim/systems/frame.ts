import type { Grid } from '../Grid'
import { updateCell } from './update'

/**
 * Simulate pass: bottom row first, left to right. A position already marked
 * this frame holds a particle that has moved (or been moved) and is skipped.
 */
export function simulatePass(grid: Grid, rand: () => number): void {
  const { width, height } = grid
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      if (grid.isUpdated(x, y)) continue
      updateCell(grid, x, y, rand)
    }
  }
}

/** Advance the grid by exactly one tick: simulate, then clear the update marks. */
export function stepFrame(grid: Grid, rand: () => number): void {
  simulatePass(grid, rand)
  grid.resetUpdated()
}
