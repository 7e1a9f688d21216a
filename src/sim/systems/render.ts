import type { Grid } from '../Grid'

/**
 * Copy cell colors into a top-left-origin pixel buffer (one uint32 per
 * cell, width * height long). Grid row y lands on pixel row height - 1 - y.
 */
export function renderSystem(grid: Grid, data32: Uint32Array): void {
  const { width, height } = grid
  for (let y = 0; y < height; y++) {
    const rowOff = (height - 1 - y) * width
    for (let x = 0; x < width; x++) {
      data32[rowOff + x] = grid.colorAt(x, y)
    }
  }
}
