import { v4 as uuidv4 } from 'uuid'
import { DOWN, UP } from './types'
import type { Direction } from './types'

export class Passenger {
  readonly id: string
  readonly startFloor: number
  readonly destinationFloor: number
  readonly direction: Direction
  startTick = 0
  endTick?: number

  constructor(startFloor: number, destinationFloor: number, id: string = uuidv4()) {
    if (startFloor === destinationFloor) {
      throw new RangeError(`passenger cannot travel from floor ${startFloor} to itself`)
    }
    this.id = id
    this.startFloor = startFloor
    this.destinationFloor = destinationFloor
    this.direction = destinationFloor > startFloor ? UP : DOWN
  }

  get goingUp() {
    return this.direction === UP
  }

  /** Ticks between arrival and unloading, undefined while still travelling. */
  get conveyanceTime(): number | undefined {
    return this.endTick === undefined ? undefined : this.endTick - this.startTick
  }

  toString() {
    return `Passenger ${this.id} F${this.startFloor}->F${this.destinationFloor} ` +
      `(${this.goingUp ? 'up' : 'down'}, start ${this.startTick}, end ${this.endTick ?? '-'})`
  }
}
