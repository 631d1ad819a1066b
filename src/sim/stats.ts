import type { CompletionCollector, SimStats } from './types'

export class SimulationResult implements CompletionCollector {
  private passengers = 0
  private totalTime = 0
  private longestTime = Number.NEGATIVE_INFINITY
  private shortestTime = Number.POSITIVE_INFINITY
  private anomalies = 0

  get anomalyCount() {
    return this.anomalies
  }

  reportCompletion(conveyanceTime: number) {
    if (!(conveyanceTime > 0)) {
      this.anomalies++
      console.warn(`Invalid conveyance time ${conveyanceTime}, passenger not counted`)
      return
    }
    this.passengers++
    this.totalTime += conveyanceTime
    if (conveyanceTime > this.longestTime) this.longestTime = conveyanceTime
    if (conveyanceTime < this.shortestTime) this.shortestTime = conveyanceTime
  }

  calculateStatistics(): SimStats | null {
    if (this.passengers === 0) return null
    return {
      passengers: this.passengers,
      totalTime: this.totalTime,
      averageTime: this.totalTime / this.passengers,
      longestTime: this.longestTime,
      shortestTime: this.shortestTime,
      anomalies: this.anomalies,
    }
  }
}
