import { EMPTY, type MaterialId } from '../constants'
import { Grid } from '../Grid'

/** Deterministic stand-in RNG: yields `values` in order, then repeats the last one. */
export function scripted(...values: number[]): () => number {
  let i = 0
  return () => values[Math.min(i++, values.length - 1)]
}

export function countNonEmpty(grid: Grid): number {
  let n = 0
  for (let y = 0; y < grid.height; y++) {
    for (let x = 0; x < grid.width; x++) {
      if (!grid.isEmpty(x, y)) n++
    }
  }
  return n
}

/** Materials row by row, bottom row first. */
export function materialsOf(grid: Grid): MaterialId[] {
  const out: MaterialId[] = []
  for (let y = 0; y < grid.height; y++) {
    for (let x = 0; x < grid.width; x++) {
      out.push(grid.materialAt(x, y) ?? EMPTY)
    }
  }
  return out
}
