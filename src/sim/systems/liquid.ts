import { OIL, WATER, type MaterialId } from '../constants'
import type { Grid } from '../Grid'

function canFlowInto(grid: Grid, x: number, y: number, sinksThroughOil: boolean): boolean {
  if (grid.isEmpty(x, y) || grid.isGas(x, y)) return true
  return sinksThroughOil && grid.isMaterial(x, y, OIL)
}

/**
 * Liquid movement: down, down-left, down-right (diagonals blocked by a
 * static cell straight below), then sideways left, then right. Like solids,
 * a liquid on the bottom row never moves.
 * Water is denser than oil and sinks through it; other liquids only flow
 * into empty or gas cells.
 * Returns true if the particle moved.
 */
export function applyLiquid(grid: Grid, x: number, y: number, material: MaterialId): boolean {
  if (y === 0) return false
  const sinks = material === WATER
  const below = y - 1

  if (canFlowInto(grid, x, below, sinks)) {
    grid.swap(x, y, x, below)
    return true
  }
  if (!grid.isStatic(x, below)) {
    if (canFlowInto(grid, x - 1, below, sinks)) {
      grid.swap(x, y, x - 1, below)
      return true
    }
    if (canFlowInto(grid, x + 1, below, sinks)) {
      grid.swap(x, y, x + 1, below)
      return true
    }
  }

  if (canFlowInto(grid, x - 1, y, sinks)) {
    grid.swap(x, y, x - 1, y)
    return true
  }
  if (canFlowInto(grid, x + 1, y, sinks)) {
    grid.swap(x, y, x + 1, y)
    return true
  }
  return false
}
