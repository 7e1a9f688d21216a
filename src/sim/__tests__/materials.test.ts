import { describe, it, expect } from 'vitest'
import { Grid } from '../Grid'
import {
  EMPTY, SAND, WATER, SMOKE, OIL, WALL, WOOD, FIRE, FLAME,
  CLASS_EMPTY, CLASS_STATIC, CLASS_SOLID, CLASS_LIQUID, CLASS_GAS,
  BG_COLOR, WATER_COLOR, MATERIAL_TO_ID,
} from '../constants'
import {
  MATERIALS, PAINTABLE, materialDef, materialName, defaultParticle,
  addParticle, removeParticle, clearGrid,
} from '../materials'

describe('Material registry', () => {
  it('assigns each material its element class', () => {
    expect(MATERIALS[EMPTY].elementClass).toBe(CLASS_EMPTY)
    expect(MATERIALS[SAND].elementClass).toBe(CLASS_SOLID)
    expect(MATERIALS[WATER].elementClass).toBe(CLASS_LIQUID)
    expect(MATERIALS[SMOKE].elementClass).toBe(CLASS_GAS)
    expect(MATERIALS[OIL].elementClass).toBe(CLASS_LIQUID)
    expect(MATERIALS[WALL].elementClass).toBe(CLASS_STATIC)
    expect(MATERIALS[WOOD].elementClass).toBe(CLASS_STATIC)
    expect(MATERIALS[FIRE].elementClass).toBe(CLASS_SOLID)
    expect(MATERIALS[FLAME].elementClass).toBe(CLASS_GAS)
  })

  it('gives a finite life only to smoke, fire and flame', () => {
    const decaying = PAINTABLE.filter((m) => MATERIALS[m].decay !== undefined)
    expect(decaying).toEqual([SMOKE, FIRE, FLAME])
    expect(MATERIALS[SMOKE].decay).toBe(0.1)
    expect(MATERIALS[FIRE].decay).toBe(0.15)
    expect(MATERIALS[FLAME].decay).toBe(0.25)
    for (const m of [SAND, WATER, OIL, WALL, WOOD] as const) {
      expect(MATERIALS[m].lifeTime).toBe(0)
    }
  })

  it('makes only oil and wood flammable', () => {
    const flammable = PAINTABLE.filter((m) => MATERIALS[m].ignition !== undefined)
    expect(flammable).toEqual([OIL, WOOD])
    expect(MATERIALS[OIL].ignition).toEqual({ chance: 0.75, burnsAs: CLASS_LIQUID })
    expect(MATERIALS[WOOD].ignition).toEqual({ chance: 0.5, burnsAs: CLASS_STATIC })
  })

  it('falls back to empty defaults for unknown ids', () => {
    expect(materialDef(42)).toBe(MATERIALS[EMPTY])
    expect(materialDef(-1)).toBe(MATERIALS[EMPTY])
    expect(defaultParticle(99).material).toBe(EMPTY)
    expect(materialName(1.5)).toBe('empty')
  })

  it('maps names to ids and back', () => {
    for (const [name, id] of Object.entries(MATERIAL_TO_ID)) {
      expect(materialName(id)).toBe(name)
    }
  })

  it('builds fresh default particles', () => {
    const a = defaultParticle(WATER)
    const b = defaultParticle(WATER)
    expect(a).toEqual({
      material: WATER, elementClass: CLASS_LIQUID, lifeTime: 0, velocity: { x: 0, y: 0 }, color: WATER_COLOR,
    })
    a.velocity.x = 5
    expect(b.velocity.x).toBe(0)
    expect(defaultParticle(WATER).velocity.x).toBe(0)
  })
})

describe('addParticle / removeParticle', () => {
  it('adds into an empty cell', () => {
    const grid = new Grid(3, 3)
    addParticle(grid, 1, 1, WOOD)
    expect(grid.get(1, 1)).toEqual(defaultParticle(WOOD))
  })

  it('leaves an occupied cell unchanged', () => {
    const grid = new Grid(3, 3)
    addParticle(grid, 1, 1, SAND)
    grid.setLifeTime(1, 1, 0.5)
    addParticle(grid, 1, 1, WATER)
    expect(grid.materialAt(1, 1)).toBe(SAND)
    expect(grid.lifeTimeAt(1, 1)).toBe(0.5)
  })

  it('ignores out-of-range targets', () => {
    const grid = new Grid(2, 2)
    addParticle(grid, 2, 0, SAND)
    addParticle(grid, 0, -1, SAND)
    removeParticle(grid, -1, 0)
    expect(grid.isEmpty(0, 0)).toBe(true)
    expect(grid.isEmpty(1, 1)).toBe(true)
  })

  it('removes by writing a fresh empty particle', () => {
    const grid = new Grid(2, 2)
    addParticle(grid, 0, 1, FIRE)
    removeParticle(grid, 0, 1)
    expect(grid.get(0, 1)).toEqual({
      material: EMPTY, elementClass: CLASS_EMPTY, lifeTime: 0, velocity: { x: 0, y: 0 }, color: BG_COLOR,
    })
  })

  it('clears the whole grid', () => {
    const grid = new Grid(3, 2)
    addParticle(grid, 0, 0, SAND)
    addParticle(grid, 2, 1, WALL)
    clearGrid(grid)
    for (let y = 0; y < 2; y++) {
      for (let x = 0; x < 3; x++) expect(grid.get(x, y)).toEqual(defaultParticle(EMPTY))
    }
  })
})
