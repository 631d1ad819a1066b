import { describe, it, expect } from 'vitest'
import { createRandom } from '../random'

describe('createRandom', () => {
  it('repeats the same sequence for the same seed', () => {
    const a = createRandom(42)
    const b = createRandom(42)
    const xs = Array.from({ length: 20 }, () => a.next())
    const ys = Array.from({ length: 20 }, () => b.next())
    expect(xs).toEqual(ys)
  })

  it('differs between seeds', () => {
    expect(createRandom(1).next()).not.toBe(createRandom(2).next())
  })

  it('stays inside its bounds', () => {
    const r = createRandom(7)
    for (let i = 0; i < 1000; i++) {
      const x = r.next()
      expect(x).toBeGreaterThanOrEqual(0)
      expect(x).toBeLessThan(1)
      const n = r.nextInt(6)
      expect(Number.isInteger(n)).toBe(true)
      expect(n).toBeGreaterThanOrEqual(0)
      expect(n).toBeLessThan(6)
    }
  })
})
