import { describe, it, expect } from 'vitest'
import { Passenger } from '../passenger'
import { DOWN, UP } from '../types'

describe('Passenger', () => {
  it('derives its direction from the two floors', () => {
    expect(new Passenger(2, 7).direction).toBe(UP)
    expect(new Passenger(7, 2).direction).toBe(DOWN)
    expect(new Passenger(7, 2).goingUp).toBe(false)
  })

  it('refuses a journey to the same floor', () => {
    expect(() => new Passenger(4, 4)).toThrow(RangeError)
  })

  it('has no conveyance time until unloaded', () => {
    const p = new Passenger(1, 3)
    p.startTick = 5
    expect(p.conveyanceTime).toBeUndefined()
    p.endTick = 9
    expect(p.conveyanceTime).toBe(4)
  })

  it('gets a distinct id unless one is given', () => {
    const a = new Passenger(1, 2)
    const b = new Passenger(1, 2)
    expect(a.id).not.toBe(b.id)
    expect(new Passenger(1, 2, 'p-1').id).toBe('p-1')
  })

  it('describes itself for diagnostics', () => {
    const p = new Passenger(3, 1, 'p-7')
    p.startTick = 2
    expect(p.toString()).toBe('Passenger p-7 F3->F1 (down, start 2, end -)')
  })
})
