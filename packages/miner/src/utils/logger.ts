import pino from 'pino'
import { formatDuration, formatOre } from '@orebm/math'

// create default logger; tests and main() can replace via setLogger
let logger: pino.Logger = pino({ level: process.env.LOG_LEVEL || 'info' })

export function setLogger(l: pino.Logger) {
  logger = l
}

export function getLogger(): pino.Logger {
  return logger
}

/** Child logger bound to a component name; bind it after any setLogger call. */
export function componentLogger(component: string, bindings: Record<string, unknown> = {}): pino.Logger {
  return logger.child({ component, ...bindings })
}

type CyclePayload = {
  mining_ms?: number
  queue_ms?: number
  confirm_ms?: number
  rewards?: bigint
  /** lamports */
  cost?: number
}

/** Human-oriented timing and amount fields shared by the per-cycle log lines. */
export function cycleFields(payload: CyclePayload): Record<string, string> {
  const out: Record<string, string> = {}
  if (payload.mining_ms !== undefined) out.mining = formatDuration(payload.mining_ms)
  if (payload.queue_ms !== undefined) out.queue = formatDuration(payload.queue_ms)
  if (payload.confirm_ms !== undefined) out.confirm = formatDuration(payload.confirm_ms)
  if (payload.rewards !== undefined) out.rewards = formatOre(payload.rewards)
  if (payload.cost !== undefined) out.cost = formatOre(BigInt(payload.cost))
  return out
}
