export type Direction = -1 | 1

export const UP: Direction = 1
export const DOWN: Direction = -1

export type Structures = 'linked' | 'array'

export interface SimConfig {
  floors: number
  elevators: number
  capacity: number // per direction group
  duration: number // ticks
  arrivalProbability: number // per floor per tick
  structures: Structures // container hint for floor queues, no observable effect
  seed?: number
}

export interface SimStats {
  passengers: number
  totalTime: number
  averageTime: number
  longestTime: number
  shortestTime: number
  anomalies: number
}

export interface RandomSource {
  /** Uniform in [0, 1). */
  next(): number
  /** Uniform integer in [0, bound). */
  nextInt(bound: number): number
}

export interface CompletionCollector {
  reportCompletion(conveyanceTime: number): void
  calculateStatistics(): SimStats | null
}

export interface ElevatorSnapshot {
  id: number
  floor: number
  direction: Direction
  active: boolean
  onboard: number
  capacity: number
  stops: number[]
}

export interface FleetSnapshot {
  tick: number
  elevators: ElevatorSnapshot[]
  calls: Array<{ floor: number; up: number; down: number }>
}
