import type pino from 'pino'
import type { Bus, ChainSnapshot, SolveResult } from '@orebm/dto'
import { adaptiveTip, pickRichest, requiredCapacity, selectBuses, solveDeadlineMs, timeToNextEpochMs } from '@orebm/math'
import { describeError, fail, isReasoned } from '@orebm/reasons'
import { CONSTANTS } from '../config'
import { BatchPool, Lease } from '../services/BatchPool'
import { buildMineBundle } from '../services/BundleBuilder'
import { chunk, Identity } from '../services/Identity'
import { busAddress } from '../services/ore'
import { componentLogger, cycleFields } from '../utils/logger'
import { countBundlesSent, countFailure, observeMining, setIdleIdentities } from '../utils/metrics'
import { MinerDeps, reportFailure, ResolvedDeps, resolveDeps, TipOptions } from './deps'

const MODE = 'pooled'

export interface IdentityBatch {
  id: number
  identities: readonly Identity[]
}

export interface PooledMinerOptions extends TipOptions {
  maxBuses: number
  busHeadroom?: number
}

/** Everything the submission task needs, gathered once per drained group. */
interface PreparedGroup {
  leases: Lease<IdentityBatch>[]
  buses: Bus[]
  balances: Map<string, number>
  solutions: SolveResult[]
  rewardRate: bigint
  miningMs: number
  blockhash: string
  slot: number
}

/**
 * PooledMiner
 * Batches of 25 identities circulate through a pool: the scheduler drains up to
 * POOL_DRAIN_MAX idle batches, solves them together, hands them to a background
 * submission task and goes back to draining. Each batch returns to the pool when its
 * watch ends (or right away when nothing was sent for it).
 */
export class PooledMiner {
  readonly pool: BatchPool<IdentityBatch>
  private readonly deps: ResolvedDeps
  private readonly log = componentLogger('PooledMiner')
  private readonly headroom: number
  private readonly inFlight = new Set<Promise<void>>()
  private stopped = false

  constructor(identities: readonly Identity[], deps: MinerDeps, private readonly options: PooledMinerOptions) {
    if (identities.length === 0 || identities.length % CONSTANTS.BATCH_SIZE !== 0) {
      throw fail('CONFIG_INVALID', {
        message: `number of keys must be a non-zero multiple of ${CONSTANTS.BATCH_SIZE}, got ${identities.length}`,
      })
    }
    if (options.maxBuses < 1) throw fail('CONFIG_INVALID', { message: 'max buses must be at least 1' })
    this.deps = resolveDeps(deps)
    this.headroom = options.busHeadroom ?? CONSTANTS.POOLED_BUS_HEADROOM
    this.pool = new BatchPool(chunk(identities, CONSTANTS.BATCH_SIZE).map((ids, id) => ({ id, identities: ids })))
    this.updateIdleGauge()
    this.log.info({ keys: identities.length, batches: this.pool.capacity }, 'split signers into batches')
  }

  async run(): Promise<void> {
    while (!this.stopped) {
      const leases = this.takeBatches()
      if (leases.length === 0) {
        this.log.debug('no idle batches, waiting')
        await this.deps.sleep(CONSTANTS.POOL_IDLE_SLEEP_MS)
        continue
      }
      let retry: Lease<IdentityBatch>[] | undefined = leases
      while (retry) {
        if (this.stopped) {
          retry.forEach(lease => this.release(lease))
          break
        }
        retry = await this.mineBatches(retry)
      }
    }
  }

  stop(): void {
    this.stopped = true
  }

  /** Resolves once every background submission and watch has finished. */
  async settle(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all([...this.inFlight])
    }
  }

  takeBatches(): Lease<IdentityBatch>[] {
    const leases = this.pool.drain(CONSTANTS.POOL_DRAIN_MAX)
    if (leases.length > 0) this.updateIdleGauge()
    return leases
  }

  /**
   * mineBatches
   * One scheduler pass over a drained group. Returns the group when it should be retried
   * (after the backoff has elapsed), undefined once it has been handed to the submission task.
   */
  async mineBatches(leases: Lease<IdentityBatch>[]): Promise<Lease<IdentityBatch>[] | undefined> {
    let prepared: PreparedGroup
    try {
      prepared = await this.prepare(leases)
    } catch (e) {
      const log = this.log.child({ batches: leases.map(l => l.item.id).join(',') })
      await this.deps.sleep(reportFailure(log, MODE, e, 'mining pass failed'))
      return leases
    }
    this.submit(prepared)
    return undefined
  }

  private async prepare(leases: Lease<IdentityBatch>[]): Promise<PreparedGroup> {
    const { chain, solver, now } = this.deps
    const identities = leases.flatMap(l => l.item.identities)

    const snapshot: ChainSnapshot = await chain.getSnapshot()
    const balances = await chain.getBalances(identities.map(id => id.address))
    const proofs = await chain.getProofs(identities.map(id => id.proof))
    const timeLeftMs = timeToNextEpochMs(snapshot)
    const deadlineMs = solveDeadlineMs(snapshot)
    const epochWait = { context: { wait_ms: timeLeftMs } }

    const started = now()
    let solutions: SolveResult[]
    try {
      solutions = await solver.solve(
        snapshot.treasury.difficulty,
        identities.map((id, i) => ({ challenge: proofs[i].hash, signer: id.address })),
        { threads: 0, deadlineMs }
      )
    } catch (e) {
      if (isReasoned(e, 'SOLVER_DEADLINE')) throw fail('SOLVER_DEADLINE', epochWait, e)
      throw e
    }
    const miningMs = now() - started
    observeMining(MODE, miningMs)
    if (deadlineMs !== undefined && miningMs > deadlineMs) throw fail('SOLVER_DEADLINE', epochWait)
    this.log.info(
      { accounts: identities.length, idle: this.pool.idle * CONSTANTS.BATCH_SIZE, ...cycleFields({ mining_ms: miningMs }) },
      'mining done'
    )

    const required = requiredCapacity(snapshot.treasury.rewardRate, identities.length, this.headroom)
    const buses = selectBuses(snapshot.buses, required).slice(0, this.options.maxBuses)
    if (buses.length === 0) {
      throw fail('NETWORK_ACCOUNT_INVALID', { message: 'no bus available for mining', ...epochWait })
    }

    let latest: { blockhash: string; slot: number }
    try {
      latest = await chain.getLatestBlockhash()
    } catch (e) {
      throw fail('NETWORK_RPC_UNAVAILABLE', { message: `failed to get latest blockhash: ${describeError(e).error}`, ...epochWait }, e)
    }

    return {
      leases,
      buses,
      balances,
      solutions,
      rewardRate: snapshot.treasury.rewardRate,
      miningMs,
      blockhash: latest.blockhash,
      slot: latest.slot,
    }
  }

  // tip is fixed once per group; each batch then sends and watches on its own
  private submit(group: PreparedGroup): void {
    const { tips } = this.deps
    const snapshotTips = tips.current()
    const tip = adaptiveTip({
      base: this.options.priorityFee,
      cap: this.options.maxAdaptiveTip,
      floor: this.options.tipFloor,
      snapshot: snapshotTips,
    })
    const rewards = group.rewardRate * BigInt(CONSTANTS.BATCH_SIZE)

    group.leases.forEach((lease, b) => {
      const log = this.log.child({ batch: lease.item.id })
      const solutions = group.solutions.slice(b * CONSTANTS.BATCH_SIZE, (b + 1) * CONSTANTS.BATCH_SIZE)
      this.track(this.submitBatch(lease, solutions, group, tip, rewards, log))
    })
  }

  private async submitBatch(
    lease: Lease<IdentityBatch>,
    solutions: SolveResult[],
    group: PreparedGroup,
    tip: number,
    rewards: bigint,
    log: pino.Logger
  ): Promise<void> {
    const { relay, tips, watcher, now, random } = this.deps
    const { identities } = lease.item
    let watching = false
    try {
      const tipper = pickRichest(group.balances, identities.map(id => id.key))
      if (tipper === undefined) throw fail('DATA_BALANCE_MISSING', { message: 'no balance for the bundle tipper' })
      const entries = identities.map((identity, i) => ({ identity, solution: solutions[i] }))

      const sentAt = now()
      const signatures: string[] = []
      for (const bus of group.buses) {
        try {
          const bundle = buildMineBundle({ entries, bus: busAddress(bus.id), blockhash: group.blockhash, tip, balances: group.balances, tipper, random })
          const sent = await relay.sendBundle(bundle.transactions)
          log.debug({ signature: sent.signature, bundle: sent.bundleId }, 'bundle sent')
          signatures.push(sent.signature)
        } catch (e) {
          countFailure(MODE, describeError(e).code ?? 'INTERNAL_ERROR')
          log.error(describeError(e), 'failed to send bundle')
        }
      }

      if (signatures.length === 0) {
        log.warn('no bundle sent, releasing batch')
        return
      }
      countBundlesSent(MODE, signatures.length)
      const snapshotTips = tips.current()
      const timing = cycleFields({ mining_ms: group.miningMs })
      log.info({ ...timing, tip, tip_p25: snapshotTips.p25, tip_p50: snapshotTips.p50, slot: group.slot }, 'bundles sent')

      watching = true
      this.track(
        watcher
          .watch({ signatures, sentAtSlot: group.slot, rewardEstimate: rewards, tipPaid: tip, sentAt }, MODE, log)
          .then(() => undefined)
          .finally(() => this.release(lease))
      )
    } catch (e) {
      countFailure(MODE, describeError(e).code ?? 'INTERNAL_ERROR')
      log.error(describeError(e), 'failed to submit batch')
    } finally {
      if (!watching) this.release(lease)
    }
  }

  private release(lease: Lease<IdentityBatch>) {
    this.pool.release(lease.index)
    this.updateIdleGauge()
  }

  private updateIdleGauge() {
    setIdleIdentities(this.pool.idle * CONSTANTS.BATCH_SIZE)
  }

  private track(task: Promise<void>) {
    const tracked: Promise<void> = task
      .catch(e => {
        this.log.error(describeError(e), 'background task failed')
      })
      .finally(() => this.inFlight.delete(tracked))
    this.inFlight.add(tracked)
  }
}
