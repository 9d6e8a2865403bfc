/**
 * capacity.ts
 * Bus selection for a mining cycle; pure functions only.
 */
import type { Bus } from '@orebm/dto'

/**
 * selectBuses
 * Keeps buses whose available rewards cover `required` and ranks them richest first.
 * An empty result is valid: there is no capacity this cycle.
 */
export function selectBuses(buses: readonly Bus[], required: bigint): Bus[] {
  return buses
    .filter(bus => bus.rewards >= required)
    .sort((a, b) => (b.rewards > a.rewards ? 1 : b.rewards < a.rewards ? -1 : 0))
}

/**
 * requiredCapacity
 * Reward a bus must still hold to pay out `identities` proofs, plus `headroom` proofs of slack
 * for other miners landing on the same bus first.
 */
export function requiredCapacity(rewardRate: bigint, identities: number, headroom: number): bigint {
  const count = BigInt(Math.max(0, identities + headroom))
  return rewardRate * count
}
