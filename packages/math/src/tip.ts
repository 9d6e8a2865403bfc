/**
 * tip.ts
 * Relay tip bidding from the landed-tip percentile feed.
 */
import type { TipSnapshot } from '@orebm/dto'

export const LAMPORTS_PER_SOL = 1_000_000_000

export interface AdaptiveTipParams {
  /** configured tip, used whenever adaptive bidding cannot apply */
  base: number
  /** upper bound; 0 disables adaptive bidding */
  cap: number
  floor: number
  snapshot: TipSnapshot
}

/**
 * adaptiveTip
 * Outbids the median landed tip by one lamport, clamped to [floor, cap].
 * A cold feed (p50 == 0) falls back to the base tip.
 */
export function adaptiveTip({ base, cap, floor, snapshot }: AdaptiveTipParams): number {
  if (cap === 0) return base
  if (snapshot.p50 === 0) return base
  return Math.min(cap, Math.max(floor, snapshot.p50 + 1))
}

/** Converts a SOL-denominated percentile to whole lamports (truncating). */
export function solToLamports(sol: number): number {
  if (!Number.isFinite(sol) || sol <= 0) return 0
  return Math.floor(sol * LAMPORTS_PER_SOL)
}
