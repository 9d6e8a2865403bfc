import type pino from 'pino'
import { ChainSnapshot, SolveResult, SubmissionState } from '@orebm/dto'
import { adaptiveTip, pickRichest, requiredCapacity, selectBuses, solveDeadlineMs, timeToNextEpochMs } from '@orebm/math'
import { describeError, fail, isReasoned } from '@orebm/reasons'
import { CONSTANTS } from '../config'
import { BuiltBundle, buildMineBundle } from '../services/BundleBuilder'
import { chunk, Identity } from '../services/Identity'
import { busAddress } from '../services/ore'
import { Semaphore } from '../services/Semaphore'
import { componentLogger, cycleFields } from '../utils/logger'
import { countBundlesSent, countFailure, observeMining } from '../utils/metrics'
import { epochWaitMs, MinerDeps, reportFailure, ResolvedDeps, resolveDeps, TipOptions } from './deps'

const MODE = 'fixed'

export interface FixedMinerOptions extends TipOptions {
  threads: number
  /** workers allowed to fetch and solve at the same time */
  concurrency: number
  maxBuses: number
  busHeadroom?: number
}

export type CycleOutcome = 'landed' | 'dropped' | 'skipped'

interface Solved {
  snapshot: ChainSnapshot
  solutions: SolveResult[]
  miningMs: number
  queueMs: number
  timeLeftMs: number
}

/**
 * FixedWorkerMiner
 * One worker per chunk of 25 identities, looping forever. Chain fetch and solving are
 * gated by a shared semaphore; submission and confirmation run outside it.
 */
export class FixedWorkerMiner {
  private readonly deps: ResolvedDeps
  private readonly semaphore: Semaphore
  private readonly log = componentLogger('FixedWorkerMiner')
  private readonly headroom: number
  private rewards = 0n
  private stopped = false

  constructor(
    private readonly identities: readonly Identity[],
    deps: MinerDeps,
    private readonly options: FixedMinerOptions
  ) {
    if (identities.length === 0) throw fail('CONFIG_INVALID', { message: 'no identities to mine with' })
    if (options.maxBuses < 1) throw fail('CONFIG_INVALID', { message: 'max buses must be at least 1' })
    this.deps = resolveDeps(deps)
    this.semaphore = new Semaphore(options.concurrency)
    this.headroom = options.busHeadroom ?? CONSTANTS.FIXED_BUS_HEADROOM
  }

  async run(): Promise<void> {
    const workers = chunk(this.identities, CONSTANTS.BATCH_SIZE)
    const reporter = setInterval(() => this.reportRewards(), CONSTANTS.REWARD_REPORT_INTERVAL_MS)
    try {
      await Promise.all(workers.map((ids, i) => this.runWorker(i, ids)))
    } finally {
      clearInterval(reporter)
    }
  }

  /** Workers finish their current cycle and return. */
  stop(): void {
    this.stopped = true
  }

  /** Logs and resets the landed-reward counter; returns what it held. */
  reportRewards(): bigint {
    const rewards = this.rewards
    this.rewards = 0n
    if (rewards > 0n) this.log.info(cycleFields({ rewards }), 'reward mined')
    return rewards
  }

  private async runWorker(worker: number, identities: readonly Identity[]): Promise<void> {
    this.log.info({ miner: worker, accounts: identities.length }, 'miner started')
    while (!this.stopped) {
      await this.runCycle(worker, identities)
    }
  }

  async runCycle(worker: number, identities: readonly Identity[]): Promise<CycleOutcome> {
    const { chain, relay, tips, watcher, sleep, now, random } = this.deps
    const log = this.log.child({ miner: worker })
    const keys = identities.map(id => id.key)

    let balances: Map<string, number>
    try {
      balances = await chain.getBalances(identities.map(id => id.address))
    } catch (e) {
      return this.skip(log, e, 'failed to get signer balances')
    }

    let solved: Solved
    try {
      solved = await this.solveGated(identities)
    } catch (e) {
      return this.skip(log, e, 'mining failed')
    }
    const { snapshot, solutions, miningMs, queueMs, timeLeftMs } = solved
    log.debug(cycleFields({ mining_ms: miningMs, queue_ms: queueMs }), 'mining done')

    const required = requiredCapacity(snapshot.treasury.rewardRate, identities.length, this.headroom)
    const buses = selectBuses(snapshot.buses, required).slice(0, this.options.maxBuses)
    if (buses.length === 0) {
      const wait = epochWaitMs(timeLeftMs)
      log.warn({ wait_ms: wait }, 'no bus available for mining, waiting for next epoch')
      await sleep(wait)
      return 'skipped'
    }

    const rewards = snapshot.treasury.rewardRate * BigInt(identities.length)
    const tip = adaptiveTip({
      base: this.options.priorityFee,
      cap: this.options.maxAdaptiveTip,
      floor: this.options.tipFloor,
      snapshot: tips.current(),
    })

    let bundles: BuiltBundle[]
    let sentAtSlot: number
    try {
      const tipper = pickRichest(balances, keys)
      if (tipper === undefined) throw fail('DATA_BALANCE_MISSING', { message: 'no balance for the bundle tipper' })
      const latest = await chain.getLatestBlockhash()
      sentAtSlot = latest.slot
      const entries = identities.map((identity, i) => ({ identity, solution: solutions[i] }))
      bundles = buses.map(bus =>
        buildMineBundle({ entries, bus: busAddress(bus.id), blockhash: latest.blockhash, tip, balances, tipper, random })
      )
    } catch (e) {
      return this.skip(log, e, 'failed to build bundles')
    }

    const sentAt = now()
    const results = await Promise.allSettled(bundles.map(b => relay.sendBundle(b.transactions)))
    const signatures: string[] = []
    results.forEach((result, i) => {
      if (result.status === 'rejected') {
        countFailure(MODE, isReasoned(result.reason) ? result.reason.code : 'INTERNAL_ERROR')
        log.error(describeError(result.reason), 'failed to send bundle')
        return
      }
      for (const { feePayer, cost } of bundles[i].costs) {
        const balance = balances.get(feePayer) ?? 0
        if (balance < cost) log.error({ fee_payer: feePayer, balance, cost }, 'insufficient balance for fee')
      }
      log.debug({ bundle: result.value.bundleId, signature: result.value.signature }, 'bundle sent')
      signatures.push(result.value.signature)
    })

    if (signatures.length === 0) {
      log.warn('no bundle sent')
      return 'skipped'
    }
    countBundlesSent(MODE, signatures.length)

    const snapshotTips = tips.current()
    const timing = cycleFields({ mining_ms: miningMs, queue_ms: queueMs })
    log.info({ ...timing, tip, tip_p25: snapshotTips.p25, tip_p50: snapshotTips.p50, slot: sentAtSlot }, 'bundles sent')

    const outcome = await watcher.watch(
      { signatures, sentAtSlot, rewardEstimate: rewards, tipPaid: tip, sentAt },
      MODE,
      log.child(timing)
    )
    if (outcome.state === SubmissionState.LANDED) {
      this.rewards += rewards
      return 'landed'
    }
    return 'dropped'
  }

  // holds a permit for chain fetch and solve only
  private async solveGated(identities: readonly Identity[]): Promise<Solved> {
    const { chain, solver, now } = this.deps
    const queued = now()
    const release = await this.semaphore.acquire()
    const queueMs = now() - queued
    try {
      const snapshot = await chain.getSnapshot()
      const proofs = await chain.getProofs(identities.map(id => id.proof))
      const timeLeftMs = timeToNextEpochMs(snapshot)
      const deadlineMs = solveDeadlineMs(snapshot)
      const started = now()
      let solutions: SolveResult[]
      try {
        solutions = await solver.solve(
          snapshot.treasury.difficulty,
          identities.map((id, i) => ({ challenge: proofs[i].hash, signer: id.address })),
          { threads: this.options.threads, deadlineMs }
        )
      } catch (e) {
        if (isReasoned(e, 'SOLVER_DEADLINE')) throw fail('SOLVER_DEADLINE', { context: { wait_ms: timeLeftMs } }, e)
        throw e
      }
      const miningMs = now() - started
      observeMining(MODE, miningMs)
      if (deadlineMs !== undefined && miningMs > deadlineMs) throw fail('SOLVER_DEADLINE', { context: { wait_ms: timeLeftMs } })
      return { snapshot, solutions, miningMs, queueMs, timeLeftMs }
    } finally {
      release()
    }
  }

  private async skip(log: pino.Logger, e: unknown, msg: string): Promise<CycleOutcome> {
    await this.deps.sleep(reportFailure(log, MODE, e, msg))
    return 'skipped'
  }
}
