// Public surface of the simulation core, for the render/input/UI layer.
// Coordinates are grid coordinates with (0, 0) at the bottom-left.

import { Grid } from './Grid'
import { clearGrid } from './materials'

export function createGrid(width: number, height: number): Grid {
  return new Grid(width, height)
}

export function destroyGrid(grid: Grid): void {
  grid.dispose()
}

export function clear(grid: Grid): void {
  clearGrid(grid)
}

/** Render color (ABGR) of a cell; the background color outside the grid. */
export function getColor(grid: Grid, x: number, y: number): number {
  return grid.colorAt(x, y)
}

export { Grid, type Particle, type Vec2 } from './Grid'
export { addParticle, removeParticle, defaultParticle, materialName, MATERIALS, type MaterialDef } from './materials'
export { stepFrame } from './systems/frame'
export { drawStroke, rasterizeLine, type StrokeTarget } from './stroke'
export { nextMaterial, previousMaterial } from './selector'
export { renderSystem } from './systems/render'
export { createRNG, type RNG } from './rng'
export { Simulation } from './Simulation'
export * from './constants'
