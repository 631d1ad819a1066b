import type { RandomSource } from '../types'

/** Replays `values` for next(), cycling; nextInt scales the same stream. */
export function scriptedRandom(values: number[]): RandomSource {
  let i = 0
  const next = () => values[i++ % values.length]
  return { next, nextInt: bound => Math.floor(next() * bound) }
}
