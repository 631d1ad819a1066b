import type { RandomSource } from './types'

// mulberry32
export function createRandom(seed: number): RandomSource {
  let t = seed | 0
  const next = () => {
    t = (t + 0x6d2b79f5) | 0
    let r = Math.imul(t ^ (t >>> 15), 1 | t)
    r ^= r + Math.imul(r ^ (r >>> 7), 61 | r)
    return ((r ^ (r >>> 14)) >>> 0) / 4294967296
  }
  return {
    next,
    nextInt: (bound: number) => Math.floor(next() * bound),
  }
}

export function randomSeed(): number {
  return (Date.now() ^ Math.floor(Math.random() * 0x7fffffff)) | 0
}
