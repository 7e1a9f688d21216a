import type { MaterialId } from './constants'
import type { Grid } from './Grid'
import { addParticle, removeParticle } from './materials'

export type StrokeTarget = MaterialId | 'erase'

/**
 * Visit every integer point on the segment from (x1, y1) to (x2, y2),
 * both ends included, with Bresenham's algorithm (all octants).
 * Coinciding endpoints visit exactly one point; non-finite coordinates
 * visit none.
 */
export function rasterizeLine(
  x1: number, y1: number, x2: number, y2: number,
  visit: (x: number, y: number) => void
): void {
  if (![x1, y1, x2, y2].every(Number.isFinite)) return
  let x = Math.floor(x1), y = Math.floor(y1)
  const ex = Math.floor(x2), ey = Math.floor(y2)
  const dx = Math.abs(ex - x)
  const dy = -Math.abs(ey - y)
  const sx = x < ex ? 1 : -1
  const sy = y < ey ? 1 : -1
  let err = dx + dy

  for (;;) {
    visit(x, y)
    if (x === ex && y === ey) break
    const e2 = 2 * err
    if (e2 >= dy) { err += dy; x += sx }
    if (e2 <= dx) { err += dx; y += sy }
  }
}

type Segment = [x1: number, y1: number, x2: number, y2: number]

/**
 * Liang-Barsky clip of a segment against the cell box [0, width-1] x
 * [0, height-1]. Returns null when nothing of it lies inside.
 */
export function clipSegment(
  x1: number, y1: number, x2: number, y2: number,
  width: number, height: number
): Segment | null {
  const dx = x2 - x1, dy = y2 - y1
  let t0 = 0, t1 = 1
  const edges: readonly (readonly [number, number])[] = [
    [-dx, x1], [dx, width - 1 - x1],
    [-dy, y1], [dy, height - 1 - y1],
  ]
  for (const [p, q] of edges) {
    if (p === 0) {
      if (q < 0) return null
      continue
    }
    const r = q / p
    if (p < 0) {
      if (r > t1) return null
      if (r > t0) t0 = r
    } else {
      if (r < t0) return null
      if (r < t1) t1 = r
    }
  }
  // + 0 turns a rounded -0 into 0
  const at = (a: number, d: number, t: number) => Math.round(a + t * d) + 0
  return [at(x1, dx, t0), at(y1, dy, t0), at(x1, dx, t1), at(y1, dy, t1)]
}

/**
 * Paint (or erase, with 'erase') along the drag from the previous cursor
 * cell to the current one. The segment is clipped to the grid first, so
 * far off-grid endpoints cost nothing; painting never overwrites an
 * occupied cell.
 */
export function drawStroke(
  grid: Grid, x1: number, y1: number, x2: number, y2: number,
  target: StrokeTarget
): void {
  if (![x1, y1, x2, y2].every(Number.isFinite)) return
  const clipped = clipSegment(
    Math.floor(x1), Math.floor(y1), Math.floor(x2), Math.floor(y2),
    grid.width, grid.height
  )
  if (!clipped) return
  const [cx1, cy1, cx2, cy2] = clipped
  if (target === 'erase') {
    rasterizeLine(cx1, cy1, cx2, cy2, (x, y) => removeParticle(grid, x, y))
  } else {
    rasterizeLine(cx1, cy1, cx2, cy2, (x, y) => addParticle(grid, x, y, target))
  }
}
