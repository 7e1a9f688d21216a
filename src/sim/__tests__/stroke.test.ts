import { describe, it, expect } from 'vitest'
import { Grid } from '../Grid'
import { SAND, WALL } from '../constants'
import { addParticle } from '../materials'
import { clipSegment, drawStroke, rasterizeLine } from '../stroke'
import { countNonEmpty } from './helpers'

function points(x1: number, y1: number, x2: number, y2: number): [number, number][] {
  const out: [number, number][] = []
  rasterizeLine(x1, y1, x2, y2, (x, y) => out.push([x, y]))
  return out
}

describe('rasterizeLine', () => {
  it('visits both endpoints of a shallow line', () => {
    expect(points(0, 0, 5, 2)).toEqual([[0, 0], [1, 0], [2, 1], [3, 1], [4, 2], [5, 2]])
  })

  it('walks the same cells backwards', () => {
    expect(points(5, 2, 0, 0)).toEqual([[5, 2], [4, 2], [3, 1], [2, 1], [1, 0], [0, 0]])
  })

  it('handles vertical lines', () => {
    expect(points(2, 0, 2, 3)).toEqual([[2, 0], [2, 1], [2, 2], [2, 3]])
  })

  it('visits a single point when the endpoints coincide', () => {
    expect(points(3, 2, 3, 2)).toEqual([[3, 2]])
  })

  it('floors fractional coordinates', () => {
    expect(points(0.7, 0.2, 2.9, 0.9)).toEqual([[0, 0], [1, 0], [2, 0]])
  })

  it('visits nothing for non-finite coordinates', () => {
    expect(points(NaN, 0, 3, 0)).toEqual([])
    expect(points(0, 0, Infinity, 0)).toEqual([])
  })
})

describe('clipSegment', () => {
  it('keeps a segment that lies inside the grid', () => {
    expect(clipSegment(0, 0, 3, 2, 4, 4)).toEqual([0, 0, 3, 2])
  })

  it('cuts the part outside the grid', () => {
    expect(clipSegment(-3, 0, 2, 0, 4, 2)).toEqual([0, 0, 2, 0])
    expect(clipSegment(0, 0, 2e8, 0, 4, 4)).toEqual([0, 0, 3, 0])
  })

  it('returns null for a segment that misses the grid', () => {
    expect(clipSegment(5, 5, 9, 9, 4, 4)).toBeNull()
    expect(clipSegment(-2, 1, -1, 3, 4, 4)).toBeNull()
  })
})

describe('drawStroke', () => {
  it('paints every cell along a drag', () => {
    const grid = new Grid(8, 4)
    drawStroke(grid, 0, 0, 5, 0, SAND)

    expect(countNonEmpty(grid)).toBe(6)
    for (let x = 0; x <= 5; x++) expect(grid.materialAt(x, 0)).toBe(SAND)
    expect(grid.isEmpty(6, 0)).toBe(true)
  })

  it('paints one cell for a click', () => {
    const grid = new Grid(8, 4)
    drawStroke(grid, 3, 2, 3, 2, SAND)

    expect(countNonEmpty(grid)).toBe(1)
    expect(grid.materialAt(3, 2)).toBe(SAND)
  })

  it('skips the part of a drag outside the grid', () => {
    const grid = new Grid(4, 2)
    drawStroke(grid, -3, 0, 2, 0, SAND)

    expect(countNonEmpty(grid)).toBe(3)
    expect(grid.isEmpty(3, 0)).toBe(true)
  })

  it('walks only the on-grid part of a very long drag', () => {
    const grid = new Grid(4, 4)
    drawStroke(grid, 0, 0, 2e8, 0, SAND)
    drawStroke(grid, 1, -1e9, 1, 1e9, SAND)

    // row 0 plus column 1, sharing (1, 0)
    expect(countNonEmpty(grid)).toBe(7)
    expect(grid.materialAt(3, 0)).toBe(SAND)
    expect(grid.materialAt(1, 3)).toBe(SAND)
  })

  it('ignores drags with non-finite coordinates', () => {
    const grid = new Grid(4, 4)
    drawStroke(grid, NaN, 0, 3, 0, SAND)
    drawStroke(grid, 0, 0, 0, -Infinity, SAND)

    expect(countNonEmpty(grid)).toBe(0)
  })

  it('does not paint over occupied cells', () => {
    const grid = new Grid(8, 4)
    addParticle(grid, 2, 0, WALL)
    drawStroke(grid, 0, 0, 4, 0, SAND)

    expect(grid.materialAt(2, 0)).toBe(WALL)
    expect(countNonEmpty(grid)).toBe(5)
  })

  it('erases along a drag', () => {
    const grid = new Grid(8, 4)
    drawStroke(grid, 0, 0, 5, 0, SAND)
    drawStroke(grid, 1, 0, 3, 0, 'erase')

    expect(countNonEmpty(grid)).toBe(3)
    expect(grid.materialAt(0, 0)).toBe(SAND)
    expect(grid.isEmpty(2, 0)).toBe(true)
    expect(grid.materialAt(4, 0)).toBe(SAND)
  })
})
