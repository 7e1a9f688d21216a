import type { MaterialId } from './constants'
import { PAINTABLE } from './materials'

// Cyclic over the paintable materials; Empty is not part of the cycle

export function nextMaterial(m: MaterialId): MaterialId {
  const i = PAINTABLE.indexOf(m)
  if (i < 0) return PAINTABLE[0]
  return PAINTABLE[(i + 1) % PAINTABLE.length]
}

export function previousMaterial(m: MaterialId): MaterialId {
  const i = PAINTABLE.indexOf(m)
  if (i < 0) return PAINTABLE[PAINTABLE.length - 1]
  return PAINTABLE[(i - 1 + PAINTABLE.length) % PAINTABLE.length]
}
