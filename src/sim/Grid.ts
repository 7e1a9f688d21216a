// Grid: the cell buffer, stored as a structure of typed arrays.
// (0, 0) is the bottom-left cell; cell (x, y) lives at offset y * width + x.
// Every accessor bounds-checks: out-of-range reads report "not matching",
// out-of-range writes do nothing.

import {
  EMPTY, CLASS_EMPTY, CLASS_STATIC, CLASS_SOLID, CLASS_LIQUID, CLASS_GAS, BG_COLOR,
  isMaterialId, isElementClass,
  type MaterialId, type ElementClass,
} from './constants'

export interface Vec2 {
  x: number
  y: number
}

/** Full state of one cell. Reads return a copy; writes copy the fields in. */
export interface Particle {
  material: MaterialId
  elementClass: ElementClass
  /** Remaining decay budget; 0 and ignored for materials that never decay */
  lifeTime: number
  /** Carried along with the particle; no rule reads it */
  velocity: Vec2
  /** ABGR packed */
  color: number
}

export class Grid {
  private _width: number
  private _height: number

  private material: Uint8Array
  private elementClass: Uint8Array
  private lifeTime: Float32Array
  private velX: Float32Array
  private velY: Float32Array
  private color: Uint32Array
  /** Per-frame scratch: 1 = position already processed this frame */
  private updated: Uint8Array

  constructor(width: number, height: number) {
    if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
      throw new Error(`Invalid grid dimensions: ${width}x${height}`)
    }
    this._width = width
    this._height = height

    // A failed allocation throws RangeError here, before anything is returned
    const size = width * height
    this.material = new Uint8Array(size)        // all 0 = EMPTY
    this.elementClass = new Uint8Array(size)    // all 0 = CLASS_EMPTY
    this.lifeTime = new Float32Array(size)
    this.velX = new Float32Array(size)
    this.velY = new Float32Array(size)
    this.color = new Uint32Array(size).fill(BG_COLOR)
    this.updated = new Uint8Array(size)
  }

  get width(): number { return this._width }
  get height(): number { return this._height }
  get size(): number { return this._width * this._height }

  index(x: number, y: number): number {
    return y * this._width + x
  }

  inBounds(x: number, y: number): boolean {
    return x >= 0 && x < this._width && y >= 0 && y < this._height
  }

  // === Whole-particle access ===

  get(x: number, y: number): Particle | undefined {
    if (!this.inBounds(x, y)) return undefined
    const i = this.index(x, y)
    return {
      material: this.readMaterial(i),
      elementClass: this.readClass(i),
      lifeTime: this.lifeTime[i],
      velocity: { x: this.velX[i], y: this.velY[i] },
      color: this.color[i],
    }
  }

  set(x: number, y: number, p: Readonly<Particle>): void {
    if (!this.inBounds(x, y)) return
    this.write(this.index(x, y), p)
  }

  /** Overwrite every cell with a copy of `p`. */
  fill(p: Readonly<Particle>): void {
    this.material.fill(p.material)
    this.elementClass.fill(p.elementClass)
    this.lifeTime.fill(p.lifeTime)
    this.velX.fill(p.velocity.x)
    this.velY.fill(p.velocity.y)
    this.color.fill(p.color)
  }

  /**
   * Exchange the full state of two cells and mark both positions as
   * processed for this frame. No-op if either cell is out of range.
   */
  swap(x1: number, y1: number, x2: number, y2: number): void {
    if (!this.inBounds(x1, y1) || !this.inBounds(x2, y2)) return
    const a = this.index(x1, y1), b = this.index(x2, y2)

    const m = this.material[a]; this.material[a] = this.material[b]; this.material[b] = m
    const c = this.elementClass[a]; this.elementClass[a] = this.elementClass[b]; this.elementClass[b] = c
    const l = this.lifeTime[a]; this.lifeTime[a] = this.lifeTime[b]; this.lifeTime[b] = l
    const vx = this.velX[a]; this.velX[a] = this.velX[b]; this.velX[b] = vx
    const vy = this.velY[a]; this.velY[a] = this.velY[b]; this.velY[b] = vy
    const col = this.color[a]; this.color[a] = this.color[b]; this.color[b] = col

    this.updated[a] = 1
    this.updated[b] = 1
  }

  /**
   * Turn a cell into `p` in place, keeping its velocity and forcing its
   * element class. Used when a particle catches fire.
   */
  transform(x: number, y: number, p: Readonly<Particle>, elementClass: ElementClass): void {
    if (!this.inBounds(x, y)) return
    const i = this.index(x, y)
    this.material[i] = p.material
    this.elementClass[i] = elementClass
    this.lifeTime[i] = p.lifeTime
    this.color[i] = p.color
  }

  // === Queries (out of range never matches) ===

  materialAt(x: number, y: number): MaterialId | undefined {
    if (!this.inBounds(x, y)) return undefined
    return this.readMaterial(this.index(x, y))
  }

  classAt(x: number, y: number): ElementClass | undefined {
    if (!this.inBounds(x, y)) return undefined
    return this.readClass(this.index(x, y))
  }

  isMaterial(x: number, y: number, m: MaterialId): boolean {
    return this.inBounds(x, y) && this.material[this.index(x, y)] === m
  }

  isEmpty(x: number, y: number): boolean { return this.isMaterial(x, y, EMPTY) }
  isStatic(x: number, y: number): boolean { return this.isClass(x, y, CLASS_STATIC) }
  isSolid(x: number, y: number): boolean { return this.isClass(x, y, CLASS_SOLID) }
  isLiquid(x: number, y: number): boolean { return this.isClass(x, y, CLASS_LIQUID) }
  isGas(x: number, y: number): boolean { return this.isClass(x, y, CLASS_GAS) }

  // === Field access ===

  lifeTimeAt(x: number, y: number): number {
    return this.inBounds(x, y) ? this.lifeTime[this.index(x, y)] : 0
  }

  setLifeTime(x: number, y: number, lifeTime: number): void {
    if (this.inBounds(x, y)) this.lifeTime[this.index(x, y)] = lifeTime
  }

  colorAt(x: number, y: number): number {
    return this.inBounds(x, y) ? this.color[this.index(x, y)] : BG_COLOR
  }

  setColor(x: number, y: number, color: number): void {
    if (this.inBounds(x, y)) this.color[this.index(x, y)] = color
  }

  // === Per-frame update marks ===

  isUpdated(x: number, y: number): boolean {
    return this.inBounds(x, y) && this.updated[this.index(x, y)] === 1
  }

  markUpdated(x: number, y: number): void {
    if (this.inBounds(x, y)) this.updated[this.index(x, y)] = 1
  }

  resetUpdated(): void {
    this.updated.fill(0)
  }

  /** Release the buffers. The grid is 0x0 afterwards, so every access is out of range. */
  dispose(): void {
    this._width = 0
    this._height = 0
    this.material = new Uint8Array(0)
    this.elementClass = new Uint8Array(0)
    this.lifeTime = new Float32Array(0)
    this.velX = new Float32Array(0)
    this.velY = new Float32Array(0)
    this.color = new Uint32Array(0)
    this.updated = new Uint8Array(0)
  }

  private isClass(x: number, y: number, c: ElementClass): boolean {
    return this.inBounds(x, y) && this.elementClass[this.index(x, y)] === c
  }

  private readMaterial(i: number): MaterialId {
    const m = this.material[i]
    return isMaterialId(m) ? m : EMPTY
  }

  private readClass(i: number): ElementClass {
    const c = this.elementClass[i]
    return isElementClass(c) ? c : CLASS_EMPTY
  }

  private write(i: number, p: Readonly<Particle>): void {
    this.material[i] = p.material
    this.elementClass[i] = p.elementClass
    this.lifeTime[i] = p.lifeTime
    this.velX[i] = p.velocity.x
    this.velY[i] = p.velocity.y
    this.color[i] = p.color
  }
}
