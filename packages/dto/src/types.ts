/**
 * Chain and submission records shared by the math helpers and the miner.
 * On-chain token amounts are bigint (u64 on chain); lamport balances, tips and slots are numbers.
 */

export interface Bus {
  id: number
  rewards: bigint
}

export interface Treasury {
  difficulty: Uint8Array
  rewardRate: bigint
  /** unix seconds */
  lastResetAt: number
}

export interface ClockState {
  slot: number
  /** unix seconds */
  unixTimestamp: number
}

export interface ChainSnapshot {
  treasury: Treasury
  clock: ClockState
  buses: Bus[]
}

export interface Proof {
  authority: string
  hash: Uint8Array
  claimableRewards: bigint
}

/** Landed-tip percentiles in lamports. */
export interface TipSnapshot {
  p25: number
  p50: number
  p75: number
  p95: number
  p99: number
}

export const EMPTY_TIPS: TipSnapshot = Object.freeze({ p25: 0, p50: 0, p75: 0, p95: 0, p99: 0 })

export interface SolveResult {
  hash: Uint8Array
  nonce: bigint
}

export type ConfirmationLevel = 'processed' | 'confirmed' | 'finalized'

export interface SignatureStatus {
  slot: number
  /** null once rooted */
  confirmations: number | null
  err: unknown
  confirmationStatus?: ConfirmationLevel
}

export interface SubmissionRecord {
  signatures: string[]
  sentAtSlot: number
  rewardEstimate: bigint
  tipPaid: number
  /** ms since epoch */
  sentAt: number
}
