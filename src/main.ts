import { loadConfig } from './config'
import { formatConfig, formatFleet, formatStatistics } from './report'
import { randomSeed } from './sim/random'
import { ElevatorSim } from './sim/sim'

function main(argv: string[]) {
  const config = loadConfig(argv[0])
  // pin the seed so the printed config reproduces this run
  if (config.seed === undefined) config.seed = randomSeed()
  console.log(formatConfig(config))

  const sim = new ElevatorSim(config)
  const stats = sim.runSimulation()

  console.log('')
  console.log(formatFleet(sim.fleetSnapshot()))
  console.log('')
  console.log(formatStatistics(stats))
}

try {
  main(process.argv.slice(2))
} catch (err) {
  console.error(err instanceof Error ? err.message : err)
  process.exitCode = 1
}
