import { EMPTY, FIRE, CLASS_SOLID, CLASS_LIQUID, CLASS_GAS, type ElementClass, type MaterialId } from '../constants'
import type { Grid } from '../Grid'
import { applyGravity } from './gravity'
import { applyLiquid } from './liquid'
import { applyRising } from './rising'
import { applyDecay, applyFlicker, applyIgnition } from './burning'

type MovementHandler = (grid: Grid, x: number, y: number, material: MaterialId) => boolean

// Movement dispatch by element class; static and empty cells never move
const MOVEMENT_DISPATCH: Partial<Record<ElementClass, MovementHandler>> = {
  [CLASS_SOLID]: applyGravity,
  [CLASS_LIQUID]: applyLiquid,
  [CLASS_GAS]: applyRising,
}

/**
 * Run one frame of behavior for the particle at (x, y): decay, flicker and
 * ignition first, then movement for its element class. The position is
 * marked processed afterwards.
 */
export function updateCell(grid: Grid, x: number, y: number, rand: () => number): void {
  const material = grid.materialAt(x, y)
  if (material === undefined) return
  if (material === EMPTY) {
    grid.markUpdated(x, y)
    return
  }

  if (applyDecay(grid, x, y, material, rand)) return
  if (material === FIRE) applyFlicker(grid, x, y, rand)
  if (applyIgnition(grid, x, y, material, rand)) return

  const elementClass = grid.classAt(x, y)
  if (elementClass !== undefined) {
    MOVEMENT_DISPATCH[elementClass]?.(grid, x, y, material)
  }
  grid.markUpdated(x, y)
}
