import type { Grid } from '../Grid'

/**
 * Gas movement, gravity inverted: up, up-left, up-right (diagonals blocked
 * by a static cell straight above), then sideways left, then right.
 * Gases only move into empty cells.
 * Returns true if the particle moved.
 */
export function applyRising(grid: Grid, x: number, y: number): boolean {
  const above = y + 1

  if (grid.isEmpty(x, above)) {
    grid.swap(x, y, x, above)
    return true
  }
  if (!grid.isStatic(x, above)) {
    if (grid.isEmpty(x - 1, above)) {
      grid.swap(x, y, x - 1, above)
      return true
    }
    if (grid.isEmpty(x + 1, above)) {
      grid.swap(x, y, x + 1, above)
      return true
    }
  }

  if (grid.isEmpty(x - 1, y)) {
    grid.swap(x, y, x - 1, y)
    return true
  }
  if (grid.isEmpty(x + 1, y)) {
    grid.swap(x, y, x + 1, y)
    return true
  }
  return false
}
