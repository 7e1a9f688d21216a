import type { Grid } from '../Grid'

/** Solids fall into anything that is not itself solid ground. */
function canDisplace(grid: Grid, x: number, y: number): boolean {
  return grid.isEmpty(x, y) || grid.isLiquid(x, y) || grid.isGas(x, y)
}

/**
 * Solid movement: straight down, then down-left, then down-right.
 * Diagonal slides are blocked when the cell straight below is static, so a
 * grain cannot cut through the corner of a wall.
 * Returns true if the particle moved.
 */
export function applyGravity(grid: Grid, x: number, y: number): boolean {
  if (y === 0) return false
  const below = y - 1

  if (canDisplace(grid, x, below)) {
    grid.swap(x, y, x, below)
    return true
  }
  if (grid.isStatic(x, below)) return false

  if (canDisplace(grid, x - 1, below)) {
    grid.swap(x, y, x - 1, below)
    return true
  }
  if (canDisplace(grid, x + 1, below)) {
    grid.swap(x, y, x + 1, below)
    return true
  }
  return false
}
