// Runtime overrides read from the page URL: ?seed=N, ?pauseAtStep=N, ?material=name

import { EMPTY, MATERIAL_TO_ID, isMaterialName, type MaterialId } from './sim/constants'

export interface ShellConfig {
  seed: number
  pauseAtStep: number | null
  /** Starting paint material; null keeps the default */
  material: MaterialId | null
}

function readMaterial(name: string | null): MaterialId | null {
  if (name === null) return null
  const key = name.toLowerCase()
  if (!isMaterialName(key)) return null
  const id = MATERIAL_TO_ID[key]
  return id === EMPTY ? null : id
}

export function readConfig(search: string, fallbackSeed: number): ShellConfig {
  const params = new URLSearchParams(search)

  const seedParam = params.get('seed')
  const seed = seedParam !== null ? parseInt(seedParam, 10) : NaN

  const pauseParam = params.get('pauseAtStep')
  const step = pauseParam !== null ? parseInt(pauseParam, 10) : NaN

  return {
    seed: isNaN(seed) ? fallbackSeed : seed,
    pauseAtStep: !isNaN(step) && step > 0 ? step : null,
    material: readMaterial(params.get('material')),
  }
}
