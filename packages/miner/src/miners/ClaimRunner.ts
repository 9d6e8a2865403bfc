import type pino from 'pino'
import type { PublicKey } from '@solana/web3.js'
import { SubmissionState } from '@orebm/dto'
import { formatOre } from '@orebm/math'
import { describeError, fail, isReasoned, shouldRetry } from '@orebm/reasons'
import { CONSTANTS } from '../config'
import { buildClaimBundle, BuiltBundle, ClaimEntry } from '../services/BundleBuilder'
import { chunk, Identity } from '../services/Identity'
import { oreTokenAccount } from '../services/ore'
import { componentLogger } from '../utils/logger'
import { countBundlesSent, countFailure } from '../utils/metrics'
import { reportFailure, Resolved, resolveDeps, SubmitDeps } from './deps'

const MODE = 'claim'
const SEND_RETRY_MS = 2_000

export interface ClaimOptions {
  /** wallet that receives the rewards; its ORE token account must already exist */
  beneficiary: PublicKey
  /** units claiming less than this (base units) end the pass */
  threshold: bigint
  auto: boolean
  /** relay tip in lamports */
  priorityFee: number
}

export interface ClaimPassSummary {
  accounts: number
  total: bigint
  claimed: bigint
  discarded: bigint
  remaining: bigint
}

type UnitResult = 'claimed' | 'discarded' | 'stopped'

/**
 * ClaimRunner
 * Moves claimable proof rewards to the beneficiary, richest proofs first, in bundles of up
 * to 25 claims. Every transaction is simulated before sending; a unit that fails simulation
 * is dropped from the pass instead of being sent.
 */
export class ClaimRunner {
  private readonly deps: Resolved<SubmitDeps>
  private readonly log = componentLogger('ClaimRunner')
  private readonly beneficiaryTokens: PublicKey
  private stopped = false

  constructor(private readonly identities: readonly Identity[], deps: SubmitDeps, private readonly options: ClaimOptions) {
    this.deps = resolveDeps(deps)
    this.beneficiaryTokens = oreTokenAccount(options.beneficiary)
  }

  async run(): Promise<void> {
    const ata = this.beneficiaryTokens.toBase58()
    this.log.info({ ata, recipient: this.options.beneficiary.toBase58() }, 'claiming rewards')
    const exists = await this.retrying(() => this.deps.chain.accountExists(this.beneficiaryTokens), 'failed to check token account')
    if (exists === undefined) return
    if (!exists) throw fail('CONFIG_INVALID', { message: `token account does not exist: ${ata}` })
    if (this.identities.length === 0) {
      this.log.info('no claimable accounts found')
      return
    }

    while (!this.stopped) {
      const summary = await this.retrying(() => this.runOnce(), 'claim pass failed')
      if (summary === undefined || !this.options.auto || this.stopped) break
      this.log.info({ wait_ms: CONSTANTS.CLAIM_RECHECK_INTERVAL_MS }, 'will check rewards again')
      await this.deps.sleep(CONSTANTS.CLAIM_RECHECK_INTERVAL_MS)
    }
  }

  stop(): void {
    this.stopped = true
  }

  // repeats `step` after retryable failures; undefined once stopped
  private async retrying<T>(step: () => Promise<T>, msg: string): Promise<T | undefined> {
    while (!this.stopped) {
      try {
        return await step()
      } catch (e) {
        if (!isReasoned(e) || !shouldRetry(e.code)) throw e
        await this.deps.sleep(reportFailure(this.log, MODE, e, msg))
      }
    }
    return undefined
  }

  async runOnce(): Promise<ClaimPassSummary> {
    const claimable = await this.fetchClaimable()
    const total = claimable.reduce((sum, e) => sum + e.amount, 0n)
    const summary: ClaimPassSummary = { accounts: claimable.length, total, claimed: 0n, discarded: 0n, remaining: total }
    this.log.info({ total: formatOre(total), accounts: claimable.length }, 'claimable rewards')

    for (const unit of chunk(claimable, CONSTANTS.MAX_TXS_PER_BUNDLE * CONSTANTS.MAX_PROOFS_PER_TX)) {
      const amount = unit.reduce((sum, e) => sum + e.amount, 0n)
      const log = this.log.child({ unit_rewards: formatOre(amount), unit_accounts: unit.length })
      if (amount < this.options.threshold) {
        log.info({ remaining: formatOre(summary.remaining) }, 'unit reward is below threshold, will not claim')
        break
      }

      const result = await this.claimUnit(unit, amount, summary, log)
      if (result === 'stopped') break
      summary.remaining -= amount
      if (result === 'claimed') {
        summary.claimed += amount
        log.info({ remaining: formatOre(summary.remaining) }, 'claim successful')
      } else {
        summary.discarded += amount
      }
    }
    return summary
  }

  private async fetchClaimable(): Promise<ClaimEntry[]> {
    const entries: ClaimEntry[] = []
    for (const ids of chunk(this.identities, CONSTANTS.FETCH_ACCOUNT_LIMIT)) {
      const proofs = await this.deps.chain.findProofs(ids.map(id => id.proof))
      proofs.forEach((proof, i) => {
        if (proof && proof.claimableRewards > 0n) entries.push({ identity: ids[i], amount: proof.claimableRewards })
      })
    }
    return entries.sort((a, b) => (a.amount === b.amount ? 0 : a.amount > b.amount ? -1 : 1))
  }

  // retries sends and drops until the unit lands or fails simulation
  private async claimUnit(unit: ClaimEntry[], amount: bigint, summary: ClaimPassSummary, log: pino.Logger): Promise<UnitResult> {
    const { chain, relay, watcher, sleep, now, random } = this.deps
    const tip = this.options.priorityFee

    while (!this.stopped) {
      let balances: Map<string, number> | undefined
      try {
        balances = await chain.getBalances(unit.map(e => e.identity.address))
      } catch (e) {
        log.error(describeError(e), 'failed to get balances for signers')
      }

      let latest: { blockhash: string; slot: number }
      try {
        latest = await chain.getLatestBlockhash()
      } catch (e) {
        log.error(describeError(e), 'failed to get latest blockhash')
        await sleep(CONSTANTS.RPC_BACKOFF_MS)
        continue
      }

      const bundle = buildClaimBundle({
        entries: unit,
        beneficiary: this.beneficiaryTokens,
        blockhash: latest.blockhash,
        tip,
        balances,
        random,
      })

      if (!(await this.simulates(bundle, log))) {
        countFailure(MODE, 'SUBMIT_SIMULATION_FAILED')
        log.error({ remaining: formatOre(summary.remaining - amount) }, 'simulation failed, discarding unit')
        return 'discarded'
      }

      const sentAt = now()
      let signature: string
      try {
        const sent = await relay.sendBundle(bundle.transactions)
        signature = sent.signature
        log.info({ signature, bundle: sent.bundleId, slot: latest.slot }, 'bundle sent')
      } catch (e) {
        countFailure(MODE, describeError(e).code ?? 'INTERNAL_ERROR')
        log.error(describeError(e), 'failed to send bundle')
        await sleep(SEND_RETRY_MS)
        continue
      }
      countBundlesSent(MODE)

      const outcome = await watcher.watch(
        { signatures: [signature], sentAtSlot: latest.slot, rewardEstimate: amount, tipPaid: tip, sentAt },
        MODE,
        log
      )
      if (outcome.state === SubmissionState.LANDED) return 'claimed'
      log.error({ slot: latest.slot }, 'bundle dropped, retrying')
    }
    return 'stopped'
  }

  private async simulates(bundle: BuiltBundle, log: pino.Logger): Promise<boolean> {
    for (const tx of bundle.transactions) {
      try {
        const { err } = await this.deps.chain.simulate(tx)
        if (err !== null && err !== undefined) {
          log.error({ err: JSON.stringify(err) }, 'simulation returned an error')
          return false
        }
      } catch (e) {
        log.error(describeError(e), 'failed to simulate transaction')
        return false
      }
    }
    return true
  }
}
