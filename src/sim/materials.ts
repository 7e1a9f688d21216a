import {
  EMPTY, SAND, WATER, SMOKE, OIL, WALL, WOOD, FIRE, FLAME,
  CLASS_EMPTY, CLASS_STATIC, CLASS_SOLID, CLASS_LIQUID, CLASS_GAS,
  BG_COLOR, SAND_COLOR, WATER_COLOR, SMOKE_COLOR, OIL_COLOR, WALL_COLOR, WOOD_COLOR, FIRE_COLOR, FLAME_COLOR,
  SMOKE_LIFETIME, FIRE_LIFETIME, FLAME_LIFETIME, SMOKE_DECAY, FIRE_DECAY, FLAME_DECAY,
  OIL_IGNITION_CHANCE, WOOD_IGNITION_CHANCE,
  MATERIAL_IDS, isMaterialId,
  type Material, type MaterialId, type ElementClass,
} from './constants'
import type { Grid, Particle } from './Grid'

// ---------------------------------------------------------------------------
// Material definitions: default particle state plus the rule parameters
// ---------------------------------------------------------------------------

export interface Ignition {
  /** Chance per burning neighbor per frame */
  chance: number
  /** Element class the particle keeps while it burns */
  burnsAs: ElementClass
}

export interface MaterialDef {
  name: Material
  elementClass: ElementClass
  lifeTime: number
  color: number
  /** Upper bound of the per-frame life-time decrement; absent = never decays */
  decay?: number
  ignition?: Ignition
}

export const MATERIALS: Record<MaterialId, MaterialDef> = {
  [EMPTY]: { name: 'empty', elementClass: CLASS_EMPTY, lifeTime: 0, color: BG_COLOR },
  [SAND]: { name: 'sand', elementClass: CLASS_SOLID, lifeTime: 0, color: SAND_COLOR },
  [WATER]: { name: 'water', elementClass: CLASS_LIQUID, lifeTime: 0, color: WATER_COLOR },
  [SMOKE]: { name: 'smoke', elementClass: CLASS_GAS, lifeTime: SMOKE_LIFETIME, color: SMOKE_COLOR, decay: SMOKE_DECAY },
  [OIL]: {
    name: 'oil', elementClass: CLASS_LIQUID, lifeTime: 0, color: OIL_COLOR,
    ignition: { chance: OIL_IGNITION_CHANCE, burnsAs: CLASS_LIQUID },
  },
  [WALL]: { name: 'wall', elementClass: CLASS_STATIC, lifeTime: 0, color: WALL_COLOR },
  [WOOD]: {
    name: 'wood', elementClass: CLASS_STATIC, lifeTime: 0, color: WOOD_COLOR,
    ignition: { chance: WOOD_IGNITION_CHANCE, burnsAs: CLASS_STATIC },
  },
  [FIRE]: { name: 'fire', elementClass: CLASS_SOLID, lifeTime: FIRE_LIFETIME, color: FIRE_COLOR, decay: FIRE_DECAY },
  [FLAME]: { name: 'flame', elementClass: CLASS_GAS, lifeTime: FLAME_LIFETIME, color: FLAME_COLOR, decay: FLAME_DECAY },
}

/** Definition for any numeric id; unknown ids fall back to Empty. */
export function materialDef(id: number): MaterialDef {
  return isMaterialId(id) ? MATERIALS[id] : MATERIALS[EMPTY]
}

export function materialName(id: number): Material {
  return materialDef(id).name
}

function buildDefault(id: MaterialId): Readonly<Particle> {
  const def = MATERIALS[id]
  return Object.freeze({
    material: id,
    elementClass: def.elementClass,
    lifeTime: def.lifeTime,
    velocity: Object.freeze({ x: 0, y: 0 }),
    color: def.color,
  })
}

// Shared templates; Grid.set copies fields, so the rules can write these without allocating
const DEFAULTS: Record<MaterialId, Readonly<Particle>> = {
  [EMPTY]: buildDefault(EMPTY), [SAND]: buildDefault(SAND), [WATER]: buildDefault(WATER),
  [SMOKE]: buildDefault(SMOKE), [OIL]: buildDefault(OIL), [WALL]: buildDefault(WALL),
  [WOOD]: buildDefault(WOOD), [FIRE]: buildDefault(FIRE), [FLAME]: buildDefault(FLAME),
}

export function defaultTemplate(id: number): Readonly<Particle> {
  return isMaterialId(id) ? DEFAULTS[id] : DEFAULTS[EMPTY]
}

/** A fresh, mutable default particle for `id`. */
export function defaultParticle(id: number): Particle {
  const t = defaultTemplate(id)
  return { ...t, velocity: { ...t.velocity } }
}

/** Overwrite a cell with the default particle for `id`. */
export function placeDefault(grid: Grid, x: number, y: number, id: MaterialId): void {
  grid.set(x, y, DEFAULTS[id])
}

// ---------------------------------------------------------------------------
// Grid edits
// ---------------------------------------------------------------------------

/** Place a fresh `material` particle, only into an empty in-range cell. */
export function addParticle(grid: Grid, x: number, y: number, material: MaterialId): void {
  if (!grid.isEmpty(x, y)) return
  placeDefault(grid, x, y, material)
}

export function removeParticle(grid: Grid, x: number, y: number): void {
  if (!grid.inBounds(x, y) || grid.isEmpty(x, y)) return
  placeDefault(grid, x, y, EMPTY)
}

export function clearGrid(grid: Grid): void {
  grid.fill(DEFAULTS[EMPTY])
}

/** Materials a user can paint with, in declaration order. */
export const PAINTABLE: readonly MaterialId[] = MATERIAL_IDS.filter((m) => m !== EMPTY)
