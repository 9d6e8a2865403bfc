/**
 * Retry Policy
 * Rationale:
 * - Retry transient conditions: NETWORK_* (provider hiccups), DATA_* (balances not yet visible), SOLVER_*.
 * - Do NOT retry SUBMIT_*: the same bundle is never resent, the next cycle builds a fresh one.
 * - CONFIG_* and INTERNAL faults are fatal or programmer errors.
 */
import type { ReasonCode } from '@orebm/dto'
import { REASONS } from './registry'

export function shouldRetry(code: ReasonCode): boolean {
  return REASONS[code].retryable
}

export function isFatal(code: ReasonCode): boolean {
  return code.startsWith('CONFIG_')
}
