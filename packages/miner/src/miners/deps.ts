import type { TipSnapshot } from '@orebm/dto'
import type pino from 'pino'
import { describeError, isReasoned, shouldRetry } from '@orebm/reasons'
import { CONSTANTS } from '../config'
import type { ChainService } from '../services/ChainClient'
import type { RandomSource, RelayClient } from '../services/JitoClient'
import type { Solver } from '../services/NonceSolver'
import { SubmissionWatcher } from '../services/SubmissionWatcher'
import { countFailure } from '../utils/metrics'
import { sleep as defaultSleep, Sleep } from '../utils/sleep'

/** Collaborators for anything that submits bundles; tests swap any of them for in-process fakes. */
export interface SubmitDeps {
  chain: ChainService
  relay: RelayClient
  tips: { current(): TipSnapshot }
  watcher?: SubmissionWatcher
  sleep?: Sleep
  now?: () => number
  random?: RandomSource
}

export interface MinerDeps extends SubmitDeps {
  solver: Solver
}

export type Resolved<T extends SubmitDeps> = T & Required<SubmitDeps>

export type ResolvedDeps = Resolved<MinerDeps>

export function resolveDeps<T extends SubmitDeps>(deps: T): Resolved<T> {
  const sleep = deps.sleep ?? defaultSleep
  const now = deps.now ?? Date.now
  return {
    ...deps,
    sleep,
    now,
    random: deps.random ?? Math.random,
    watcher: deps.watcher ?? new SubmissionWatcher(deps.chain, deps.tips, { sleep, now }),
  }
}

export interface TipOptions {
  /** configured tip in lamports */
  priorityFee: number
  /** adaptive tip cap in lamports; 0 keeps the configured tip */
  maxAdaptiveTip: number
  tipFloor: number
}

/** Wait for the next epoch; an overdue reset still backs off RPC_BACKOFF_MS. */
export function epochWaitMs(timeLeftMs: number): number {
  return Math.max(timeLeftMs, CONSTANTS.RPC_BACKOFF_MS)
}

/** How long to wait after a failed step: the epoch wait an error carries, else the RPC backoff. */
export function backoffFor(e: unknown): number {
  if (isReasoned(e)) {
    const wait = e.reason.context?.wait_ms
    if (typeof wait === 'number') return epochWaitMs(wait)
  }
  return CONSTANTS.RPC_BACKOFF_MS
}

/**
 * reportFailure
 * Counts and logs a failed cycle step (warn for retryable codes, error otherwise) and
 * returns how long the caller should wait before trying again.
 */
export function reportFailure(log: pino.Logger, mode: string, e: unknown, msg: string): number {
  const info = describeError(e)
  const wait = backoffFor(e)
  countFailure(mode, info.code ?? 'INTERNAL_ERROR')
  if (isReasoned(e, 'SOLVER_DEADLINE')) {
    log.warn({ wait_ms: wait }, 'mining took too long, waiting for next epoch')
  } else if (info.code && shouldRetry(info.code)) {
    log.warn({ ...info, wait_ms: wait }, msg)
  } else {
    log.error({ ...info, wait_ms: wait }, msg)
  }
  return wait
}
