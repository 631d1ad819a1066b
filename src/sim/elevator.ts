import { PriorityQueue } from './priorityQueue'
import type { Passenger } from './passenger'
import { DOWN, UP } from './types'
import type { Direction, ElevatorSnapshot } from './types'

export const MAX_FLOORS_PER_TICK = 5

/**
 * One car. Passengers and pending stops are kept per direction, each group
 * ordered so the nearest stop in that direction of travel is at the head.
 * A car only takes work in its committed direction until it runs out of work.
 */
export class Elevator {
  readonly id: number
  readonly maxFloor: number
  readonly capacity: number
  private floor: number
  private direction: Direction = UP

  private onboardUp = new PriorityQueue<Passenger>((a, b) => a.destinationFloor - b.destinationFloor)
  private onboardDown = new PriorityQueue<Passenger>((a, b) => b.destinationFloor - a.destinationFloor)
  private pendingUp = new PriorityQueue<number>((a, b) => a - b)
  private pendingDown = new PriorityQueue<number>((a, b) => b - a)

  constructor(id: number, maxFloor: number, capacity: number, startFloor = 1) {
    this.id = id
    this.maxFloor = maxFloor
    this.capacity = capacity
    this.floor = clamp(startFloor, 1, maxFloor)
  }

  get currentFloor() {
    return this.floor
  }

  get committedDirection(): Direction {
    return this.direction
  }

  isActive(): boolean {
    return !(this.onboardUp.isEmpty() && this.onboardDown.isEmpty() &&
      this.pendingUp.isEmpty() && this.pendingDown.isEmpty())
  }

  /**
   * Lets off every passenger of the committed group whose destination is
   * this floor, then clears pickup stops made here. `floor` must match the
   * car's position, otherwise nothing happens.
   */
  unloadAt(floor: number, tick: number): Passenger[] {
    if (floor !== this.floor) return []
    const onboard = this.onboard(this.direction)
    const completed: Passenger[] = []
    let head = onboard.peek()
    while (head && head.destinationFloor === this.floor) {
      onboard.pop()
      head.endTick = tick
      completed.push(head)
      head = onboard.peek()
    }
    const pending = this.pending(this.direction)
    while (pending.peek() === this.floor) pending.pop()
    return completed
  }

  load(p: Passenger): boolean {
    if (this.isActive()) {
      if (p.direction !== this.direction) return false
      if (this.onboard(p.direction).size >= this.capacity) return false
    } else {
      this.direction = p.direction
    }
    this.onboard(p.direction).push(p)
    this.pending(p.direction).push(p.destinationFloor)
    return true
  }

  /**
   * Books a future stop at the passenger's floor. An idle car heads toward
   * the floor whatever way the passenger wants to go, so a car may arrive
   * committed against the passenger's own direction.
   */
  requestPickup(p: Passenger): boolean {
    if (!this.isActive()) {
      this.direction = this.floor < p.startFloor ? UP : DOWN
      this.pending(this.direction).push(p.startFloor)
      return true
    }
    if (p.direction !== this.direction) return false
    if (this.onboard(p.direction).size >= this.capacity) return false
    // a car already standing on the floor has loaded what it could this visit
    const ahead = p.direction === UP ? this.floor < p.startFloor : this.floor > p.startFloor
    if (!ahead) return false
    this.pending(p.direction).push(p.startFloor)
    return true
  }

  travel() {
    if (!this.isActive()) return
    const target = this.nextStop()
    const distance = Math.min(Math.abs(target - this.floor), MAX_FLOORS_PER_TICK)
    const step = target >= this.floor ? distance : -distance
    this.floor = clamp(this.floor + step, 1, this.maxFloor)
  }

  /** Head of the committed pending set, or the current floor when there is none. */
  nextStop(): number {
    return this.pending(this.direction).peek() ?? this.floor
  }

  onboardCount(dir?: Direction): number {
    if (dir === undefined) return this.onboardUp.size + this.onboardDown.size
    return this.onboard(dir).size
  }

  pendingStops(dir: Direction): number[] {
    return this.pending(dir).toArray()
  }

  snapshot(): ElevatorSnapshot {
    return {
      id: this.id,
      floor: this.floor,
      direction: this.direction,
      active: this.isActive(),
      onboard: this.onboardCount(),
      capacity: this.capacity,
      stops: [...new Set(this.pendingStops(this.direction))],
    }
  }

  private onboard(dir: Direction) {
    return dir === UP ? this.onboardUp : this.onboardDown
  }

  private pending(dir: Direction) {
    return dir === UP ? this.pendingUp : this.pendingDown
  }
}

function clamp(n: number, min: number, max: number) { return Math.max(min, Math.min(max, n)) }
