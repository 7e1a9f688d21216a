import { EMPTY, SMOKE, FIRE, FLAME, FIRE_SHADES, FIRE_SMOKE_CHANCE, type MaterialId } from '../constants'
import { MATERIALS, defaultTemplate, placeDefault } from '../materials'
import { randomInt } from '../rng'
import type { Grid } from '../Grid'

// 8-neighborhood; each burning neighbor gets its own ignition roll
const NEIGHBOR_OFFSETS: readonly (readonly [number, number])[] = [
  [-1, -1], [0, -1], [1, -1],
  [-1, 0], [1, 0],
  [-1, 1], [0, 1], [1, 1],
]

/**
 * Burn down the life time of a decaying particle by a uniform amount in
 * [0, decay]. At zero the cell empties; fire sometimes leaves smoke.
 * Returns true if the particle expired (the caller stops processing it).
 */
export function applyDecay(grid: Grid, x: number, y: number, material: MaterialId, rand: () => number): boolean {
  const decay = MATERIALS[material].decay
  if (decay === undefined) return false

  const lifeTime = grid.lifeTimeAt(x, y) - rand() * decay
  if (lifeTime > 0) {
    grid.setLifeTime(x, y, lifeTime)
    return false
  }

  const remains = material === FIRE && rand() < FIRE_SMOKE_CHANCE ? SMOKE : EMPTY
  placeDefault(grid, x, y, remains)
  grid.markUpdated(x, y)
  return true
}

/** Cosmetic flicker: fire picks one of its shades every frame. */
export function applyFlicker(grid: Grid, x: number, y: number, rand: () => number): void {
  grid.setColor(x, y, FIRE_SHADES[randomInt(rand, FIRE_SHADES.length)])
}

/**
 * Flammable particles next to fire or flame may catch. On ignition the cell
 * becomes fire in place: velocity is kept and the element class is forced to
 * the class the material burns as (oil keeps flowing, wood stays put).
 * Returns true if the particle ignited.
 */
export function applyIgnition(grid: Grid, x: number, y: number, material: MaterialId, rand: () => number): boolean {
  const ignition = MATERIALS[material].ignition
  if (!ignition) return false

  for (const [dx, dy] of NEIGHBOR_OFFSETS) {
    const n = grid.materialAt(x + dx, y + dy)
    if (n !== FIRE && n !== FLAME) continue
    if (rand() < ignition.chance) {
      grid.transform(x, y, defaultTemplate(FIRE), ignition.burnsAs)
      grid.markUpdated(x, y)
      return true
    }
  }
  return false
}
