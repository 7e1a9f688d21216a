// Mulberry32: seedable 32-bit PRNG. Every stochastic rule draws from one of
// these, so a seed plus an input sequence replays the same frames.
// Values are in [0, 1), like Math.random().

export interface RNG {
  (): number
  getState(): number
  setState(state: number): void
}

export function createRNG(seed: number): RNG {
  let s = seed | 0

  const next = (): number => {
    s = s + 0x6D2B79F5 | 0
    let t = Math.imul(s ^ s >>> 15, 1 | s)
    t = t + Math.imul(t ^ t >>> 7, 61 | t) ^ t
    return ((t ^ t >>> 14) >>> 0) / 4294967296
  }

  return Object.assign(next, {
    getState: () => s,
    setState: (state: number) => { s = state | 0 },
  })
}

/** Uniform integer in [0, n). */
export function randomInt(rand: () => number, n: number): number {
  return Math.floor(rand() * n)
}
