import type { FleetSnapshot, SimConfig, SimStats } from './sim/types'

export function formatConfig(cfg: SimConfig): string {
  return [
    `structures: ${cfg.structures}`,
    `floors: ${cfg.floors}`,
    `passengers: ${cfg.arrivalProbability}`,
    `elevators: ${cfg.elevators}`,
    `elevatorCapacity: ${cfg.capacity}`,
    `duration: ${cfg.duration}`,
    `seed: ${cfg.seed ?? 'random'}`,
  ].join('\n')
}

export function formatFleet(state: FleetSnapshot): string {
  const rows = state.elevators.map(e => {
    const dirSymbol = !e.active ? '•' : (e.direction > 0 ? '↑' : '↓')
    const targets = e.stops.join(', ')
    return `#${e.id} ${dirSymbol} F${e.floor} ${e.onboard}/${e.capacity} passengers  Targets: ${targets || '—'}`
  })
  // only floors with someone waiting, top floor first
  const calls = state.calls
    .filter(c => c.up > 0 || c.down > 0)
    .sort((a, b) => b.floor - a.floor)
    .map(c => `Floor ${c.floor}  ↑ ${c.up}  ↓ ${c.down}`)
  return [`Tick ${state.tick}`, ...rows, ...calls].join('\n')
}

export function formatStatistics(stats: SimStats | null): string {
  if (!stats) return 'No passengers in the simulation.'
  const lines = [
    `Passengers: ${stats.passengers}`,
    `Average Time: ${stats.averageTime.toFixed(2)}`,
    `Longest Time: ${stats.longestTime}`,
    `Shortest Time: ${stats.shortestTime}`,
  ]
  if (stats.anomalies > 0) lines.push(`Excluded: ${stats.anomalies}`)
  return lines.join('\n')
}
