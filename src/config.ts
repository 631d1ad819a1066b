import { readFileSync } from 'node:fs'
import { DEFAULT_CONFIG } from './sim/sim'
import type { SimConfig, Structures } from './sim/types'

export type Properties = Record<string, string>

/** `key=value` or `key: value` per line; `#` and `!` start comments. */
export function parseProperties(text: string): Properties {
  const props: Properties = {}
  for (const raw of text.split(/\r?\n/)) {
    const line = raw.trim()
    if (!line || line.startsWith('#') || line.startsWith('!')) continue
    const m = /^([^=:\s]+)\s*[=:]?\s*(.*)$/.exec(line)
    if (m) props[m[1]] = m[2].trim()
  }
  return props
}

// Anything missing, unparsable or out of range falls back to the default.
export function resolveConfig(props: Properties): SimConfig {
  const cfg: SimConfig = {
    floors: intAtLeast(props.floors, 2, DEFAULT_CONFIG.floors),
    elevators: intAtLeast(props.elevators, 1, DEFAULT_CONFIG.elevators),
    capacity: intAtLeast(props.elevatorCapacity, 1, DEFAULT_CONFIG.capacity),
    duration: intAtLeast(props.duration, 1, DEFAULT_CONFIG.duration),
    arrivalProbability: probability(props.passengers, DEFAULT_CONFIG.arrivalProbability),
    structures: structures(props.structures, DEFAULT_CONFIG.structures),
  }
  const seed = parseInt(props.seed ?? '', 10)
  if (Number.isFinite(seed)) cfg.seed = seed
  return cfg
}

export function loadConfig(path?: string): SimConfig {
  if (!path) return resolveConfig({})
  let text: string
  try {
    text = readFileSync(path, 'utf8')
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err)
    console.warn(`Could not read ${path} (${reason}), using defaults`)
    return resolveConfig({})
  }
  return resolveConfig(parseProperties(text))
}

function intAtLeast(value: string | undefined, min: number, fallback: number) {
  const n = parseInt(value ?? '', 10)
  return Number.isFinite(n) && n >= min ? n : fallback
}

function probability(value: string | undefined, fallback: number) {
  const p = parseFloat(value ?? '')
  return p > 0 && p < 1 ? p : fallback
}

function structures(value: string | undefined, fallback: Structures): Structures {
  return value === 'linked' || value === 'array' ? value : fallback
}
