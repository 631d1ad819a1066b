import { Elevator } from './elevator'
import { Floor } from './floor'
import type { Passenger } from './passenger'
import type { FifoQueue } from './queue'
import { createRandom, randomSeed } from './random'
import { SimulationResult } from './stats'
import type { CompletionCollector, FleetSnapshot, RandomSource, SimConfig, SimStats } from './types'

export const DEFAULT_CONFIG: SimConfig = {
  floors: 32,
  elevators: 1,
  capacity: 10,
  duration: 500,
  arrivalProbability: 0.03,
  structures: 'linked',
}

export interface TickReport {
  tick: number
  arrivals: Passenger[]
  completed: Passenger[]
}

export interface SimOptions {
  random?: RandomSource
  result?: CompletionCollector
}

export class ElevatorSim {
  readonly config: SimConfig
  readonly floors: Floor[]
  readonly elevators: Elevator[]
  readonly result: CompletionCollector
  private random: RandomSource
  private tick = 0

  constructor(cfg: SimConfig, opts: SimOptions = {}) {
    this.config = cfg
    this.random = opts.random ?? createRandom(cfg.seed ?? randomSeed())
    this.result = opts.result ?? new SimulationResult()

    this.floors = Array.from({ length: cfg.floors }, (_, i) =>
      new Floor(i + 1, cfg.floors, this.random, cfg.structures))
    this.elevators = Array.from({ length: cfg.elevators }, (_, i) =>
      new Elevator(i + 1, cfg.floors, cfg.capacity))
  }

  get currentTick() {
    return this.tick
  }

  step(): TickReport {
    const tick = this.tick
    const arrivals: Passenger[] = []
    const completed: Passenger[] = []

    for (const floor of this.floors) {
      const n = floor.floorNumber
      const present = this.elevators.filter(e => e.currentFloor === n)

      for (const e of present) {
        for (const p of e.unloadAt(n, tick)) {
          completed.push(p)
          this.result.reportCompletion(p.conveyanceTime ?? 0)
        }
      }

      if (this.random.next() < this.config.arrivalProbability) {
        const p = floor.generatePassenger()
        p.startTick = tick
        floor.enqueue(p)
        arrivals.push(p)
      }

      for (const e of present) {
        const queue = this.queueFor(e, floor)
        let head = queue.peek()
        while (head && e.load(head)) {
          queue.shift()
          head = queue.peek()
        }
      }
    }

    // anyone still waiting books the first car that will take them
    for (const floor of this.floors) {
      this.requestPickups(floor.upWaiting)
      this.requestPickups(floor.downWaiting)
    }

    for (const e of this.elevators) e.travel()

    this.tick++
    return { tick, arrivals, completed }
  }

  runSimulation(duration = this.config.duration): SimStats | null {
    while (this.tick < duration) this.step()
    return this.result.calculateStatistics()
  }

  fleetSnapshot(): FleetSnapshot {
    return {
      tick: this.tick,
      elevators: this.elevators.map(e => e.snapshot()),
      calls: this.floors.map(f => ({ floor: f.floorNumber, up: f.upWaiting.size, down: f.downWaiting.size })),
    }
  }

  // Active cars draw from their committed direction; idle ones favour the up queue.
  private queueFor(e: Elevator, floor: Floor): FifoQueue<Passenger> {
    if (e.isActive()) return e.committedDirection > 0 ? floor.upWaiting : floor.downWaiting
    return floor.upWaiting.size > 0 ? floor.upWaiting : floor.downWaiting
  }

  private requestPickups(queue: FifoQueue<Passenger>) {
    for (const p of queue) {
      for (const e of this.elevators) {
        if (e.requestPickup(p)) break
      }
    }
  }
}

export type { SimConfig, SimStats } from './types'
