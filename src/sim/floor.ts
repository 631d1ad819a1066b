import { Passenger } from './passenger'
import { createQueue } from './queue'
import type { FifoQueue } from './queue'
import type { RandomSource, Structures } from './types'

export class Floor {
  readonly floorNumber: number
  readonly upWaiting: FifoQueue<Passenger>
  readonly downWaiting: FifoQueue<Passenger>
  readonly destinations: readonly number[]
  private random: RandomSource

  constructor(floorNumber: number, maxFloor: number, random: RandomSource, structures: Structures = 'linked') {
    if (maxFloor < 2 || floorNumber < 1 || floorNumber > maxFloor) {
      throw new RangeError(`floor ${floorNumber} is outside a building of ${maxFloor} floors`)
    }
    this.floorNumber = floorNumber
    this.random = random
    this.upWaiting = createQueue<Passenger>(structures)
    this.downWaiting = createQueue<Passenger>(structures)
    const destinations: number[] = []
    for (let f = 1; f <= maxFloor; f++) {
      if (f !== floorNumber) destinations.push(f)
    }
    this.destinations = destinations
  }

  generatePassenger(): Passenger {
    const dest = this.destinations[this.random.nextInt(this.destinations.length)]
    return new Passenger(this.floorNumber, dest)
  }

  enqueue(p: Passenger) {
    if (p.destinationFloor > p.startFloor) this.upWaiting.push(p)
    else this.downWaiting.push(p)
  }

  waitingCount() {
    return this.upWaiting.size + this.downWaiting.size
  }
}
