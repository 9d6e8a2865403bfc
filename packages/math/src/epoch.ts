/**
 * epoch.ts
 * Time left before the treasury resets difficulty; work solved against the old state is useless after that.
 */
import type { ChainSnapshot } from '@orebm/dto'

export const EPOCH_DURATION_SECONDS = 60

/**
 * timeToNextEpochMs
 * Milliseconds until `lastResetAt + epochDuration` by the cluster clock, never negative.
 * A clock already past the threshold means the reset is overdue and anyone may trigger it.
 */
export function timeToNextEpochMs(snapshot: Pick<ChainSnapshot, 'treasury' | 'clock'>, epochDurationSeconds = EPOCH_DURATION_SECONDS): number {
  const threshold = snapshot.treasury.lastResetAt + epochDurationSeconds
  const seconds = threshold - snapshot.clock.unixTimestamp
  return Math.max(0, seconds) * 1000
}

/**
 * solveDeadlineMs
 * Solver deadline for the current epoch. Undefined once the reset is due or overdue:
 * nothing bounds the work until the treasury resets.
 */
export function solveDeadlineMs(snapshot: Pick<ChainSnapshot, 'treasury' | 'clock'>, epochDurationSeconds = EPOCH_DURATION_SECONDS): number | undefined {
  const left = timeToNextEpochMs(snapshot, epochDurationSeconds)
  return left > 0 ? left : undefined
}
