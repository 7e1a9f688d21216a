// Material numeric IDs, in declaration order (the selector cycles in this order)
export const EMPTY = 0, SAND = 1, WATER = 2, SMOKE = 3, OIL = 4
export const WALL = 5, WOOD = 6, FIRE = 7, FLAME = 8

export type MaterialId =
  | typeof EMPTY | typeof SAND | typeof WATER | typeof SMOKE | typeof OIL
  | typeof WALL | typeof WOOD | typeof FIRE | typeof FLAME

export const MATERIAL_IDS: readonly MaterialId[] = [EMPTY, SAND, WATER, SMOKE, OIL, WALL, WOOD, FIRE, FLAME]

export function isMaterialId(n: number): n is MaterialId {
  return Number.isInteger(n) && n >= EMPTY && n <= FLAME
}

export type Material = 'empty' | 'sand' | 'water' | 'smoke' | 'oil' | 'wall' | 'wood' | 'fire' | 'flame'

export const MATERIAL_TO_ID: Record<Material, MaterialId> = {
  empty: EMPTY, sand: SAND, water: WATER, smoke: SMOKE, oil: OIL,
  wall: WALL, wood: WOOD, fire: FIRE, flame: FLAME,
}

export function isMaterialName(s: string): s is Material {
  return Object.hasOwn(MATERIAL_TO_ID, s)
}

// Element classes: the movement category a particle currently belongs to
export const CLASS_EMPTY = 0, CLASS_STATIC = 1, CLASS_SOLID = 2, CLASS_LIQUID = 3, CLASS_GAS = 4

export type ElementClass =
  | typeof CLASS_EMPTY | typeof CLASS_STATIC | typeof CLASS_SOLID | typeof CLASS_LIQUID | typeof CLASS_GAS

export function isElementClass(n: number): n is ElementClass {
  return Number.isInteger(n) && n >= CLASS_EMPTY && n <= CLASS_GAS
}

// Colors as ABGR uint32 (little-endian RGBA bytes in an ImageData view)
export const BG_COLOR = 0xFF1A1A1A

export const SAND_COLOR = 0xFF00F9FD
export const WATER_COLOR = 0xFFFFBF66
export const SMOKE_COLOR = 0xFFA0A0A0
export const OIL_COLOR = 0xFF14283C
export const WALL_COLOR = 0xFF828282
export const WOOD_COLOR = 0xFF374E6F
export const FIRE_COLOR = 0xFF0064FF
export const FLAME_COLOR = 0xFF28C8FF

/** Shades a burning cell cycles through, one picked per frame. */
export const FIRE_SHADES = new Uint32Array([0xFF0000FF, 0xFF0045FF, 0xFF008CFF, 0xFF00D7FF])

// ── Decay and ignition ─────────────────────────────────────────────────
export const SMOKE_LIFETIME = 3.0
export const FIRE_LIFETIME = 1.5
export const FLAME_LIFETIME = 1.0

// Upper bound of the uniform per-frame life-time decrement
export const SMOKE_DECAY = 0.1
export const FIRE_DECAY = 0.15
export const FLAME_DECAY = 0.25

/** Chance that expiring fire leaves smoke behind instead of nothing. */
export const FIRE_SMOKE_CHANCE = 1 / 5

// Per burning neighbor, per frame
export const OIL_IGNITION_CHANCE = 3 / 4
export const WOOD_IGNITION_CHANCE = 1 / 2

// ── Shell defaults ─────────────────────────────────────────────────────
export const WORLD_COLS = 256
export const WORLD_ROWS = 192
export const CELL_SIZE = 3
export const PHYSICS_STEP = 1000 / 60
export const FPS_REPORT_INTERVAL = 500
