export interface CellPos { x: number; y: number }

export interface ViewRect { left: number; top: number; width: number; height: number }

/**
 * Map a pointer position to grid coordinates. Screen y grows downward and
 * grid y grows upward, so the row is flipped. Positions outside the canvas
 * map to out-of-range cells, which stroke edits skip.
 */
export function clientToCell(
  clientX: number, clientY: number, rect: ViewRect, cols: number, rows: number
): CellPos | null {
  if (rect.width <= 0 || rect.height <= 0) return null
  const x = Math.floor((clientX - rect.left) * cols / rect.width)
  const row = Math.floor((clientY - rect.top) * rows / rect.height)
  return { x, y: rows - 1 - row }
}
