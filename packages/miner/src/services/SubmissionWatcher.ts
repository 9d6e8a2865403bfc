import type pino from 'pino'
import { SignatureStatus, SubmissionRecord, SubmissionState, TipSnapshot } from '@orebm/dto'
import { describeError } from '@orebm/reasons'
import { CONSTANTS } from '../config'
import { SubmissionMachine } from '../fsm/submissionMachine'
import { componentLogger, cycleFields } from '../utils/logger'
import { addRewards, countSubmission, observeConfirm } from '../utils/metrics'
import { sleep as defaultSleep, Sleep } from '../utils/sleep'
import type { ChainService } from './ChainClient'

/**
 * findLanded
 * Index of the first signature confirmed (or rooted) without error, -1 if none.
 */
export function findLanded(statuses: readonly (SignatureStatus | null)[]): number {
  return statuses.findIndex(
    s =>
      s !== null &&
      s.err === null &&
      (s.confirmations === null || s.confirmationStatus === 'confirmed' || s.confirmationStatus === 'finalized')
  )
}

export interface WatchOutcome {
  state: SubmissionState.LANDED | SubmissionState.DROPPED
  /** last slot observed */
  slot: number
  confirmMs: number
  /** the landed signature */
  signature?: string
}

export interface SubmissionWatcherOptions {
  sleep?: Sleep
  pollMs?: number
  /** extra wait after a failed status query */
  errorBackoffMs?: number
  slotExpiration?: number
  now?: () => number
}

/**
 * SubmissionWatcher
 * Polls signature statuses for a sent submission until one lands or the slot window
 * (sentAtSlot + SLOT_EXPIRATION) passes. Failed status queries are logged and retried after
 * an extra backoff.
 * Never resends; the caller decides what a DROPPED submission means.
 */
export class SubmissionWatcher {
  private readonly fsm = new SubmissionMachine()
  private readonly sleep: Sleep
  private readonly pollMs: number
  private readonly errorBackoffMs: number
  private readonly slotExpiration: number
  private readonly now: () => number

  constructor(
    private readonly chain: Pick<ChainService, 'getSignatureStatuses'>,
    private readonly tips: { current(): TipSnapshot },
    options: SubmissionWatcherOptions = {}
  ) {
    this.sleep = options.sleep ?? defaultSleep
    this.pollMs = options.pollMs ?? CONSTANTS.POLL_INTERVAL_MS
    this.errorBackoffMs = options.errorBackoffMs ?? CONSTANTS.POLL_INTERVAL_MS
    this.slotExpiration = options.slotExpiration ?? CONSTANTS.SLOT_EXPIRATION
    this.now = options.now ?? Date.now
  }

  async watch(record: SubmissionRecord, mode: string, log: pino.Logger = componentLogger('SubmissionWatcher')): Promise<WatchOutcome> {
    let state = SubmissionState.SENT
    let latestSlot = record.sentAtSlot
    const deadline = record.sentAtSlot + this.slotExpiration
    let landed: string | undefined

    while (latestSlot < deadline) {
      await this.sleep(this.pollMs)
      try {
        const { statuses, slot } = await this.chain.getSignatureStatuses(record.signatures)
        latestSlot = Math.max(latestSlot, slot)
        const idx = findLanded(statuses)
        if (idx >= 0) {
          landed = record.signatures[idx]
          break
        }
      } catch (e) {
        log.warn({ ...describeError(e), slot: latestSlot }, 'failed to get signature statuses')
        await this.sleep(this.errorBackoffMs)
      }
    }

    const confirmMs = this.now() - record.sentAt
    if (landed !== undefined) {
      state = this.fsm.transition(state, SubmissionState.LANDED)
      countSubmission(state, mode)
      observeConfirm(state, confirmMs)
      addRewards(mode, record.rewardEstimate)
      log.info(
        { signature: landed, slot: latestSlot, tip: record.tipPaid, ...cycleFields({ confirm_ms: confirmMs, rewards: record.rewardEstimate }) },
        'bundle landed'
      )
      return { state: SubmissionState.LANDED, slot: latestSlot, confirmMs, signature: landed }
    }

    state = this.fsm.transition(state, SubmissionState.DROPPED)
    countSubmission(state, mode)
    observeConfirm(state, confirmMs)
    const tips = this.tips.current()
    log.warn(
      {
        signature: record.signatures[0],
        slot: latestSlot,
        tip: record.tipPaid,
        tip_p50: tips.p50,
        tip_p75: tips.p75,
        tip_p95: tips.p95,
        ...cycleFields({ confirm_ms: confirmMs }),
      },
      'bundle dropped'
    )
    return { state: SubmissionState.DROPPED, slot: latestSlot, confirmMs }
  }
}
