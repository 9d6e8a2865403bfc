import { Writable } from 'stream'
import pino from 'pino'
import { Keypair, PublicKey, Transaction } from '@solana/web3.js'
import { Bus, ChainSnapshot, EMPTY_TIPS, Proof, SignatureStatus, SolveResult, TipSnapshot } from '@orebm/dto'
import { fail } from '@orebm/reasons'
import type { BlockhashAndSlot, ChainService, StatusesAtSlot } from '../src/services/ChainClient'
import { Identity, toIdentity } from '../src/services/Identity'
import { RelayClient, SentBundle, trackingSignature } from '../src/services/JitoClient'
import type { SolveOptions, Solver, SolveWork } from '../src/services/NonceSolver'
import { setLogger } from '../src/utils/logger'
import type { Sleep } from '../src/utils/sleep'

export const BLOCKHASH = '11111111111111111111111111111111'

export function makeIdentities(n: number, offset = 0): Identity[] {
  return Array.from({ length: n }, (_, i) => {
    const seed = new Uint8Array(32)
    seed[0] = (i + offset) & 0xff
    seed[1] = ((i + offset) >> 8) & 0xff
    seed[31] = 7
    return toIdentity(Keypair.fromSeed(seed))
  })
}

export function balancesOf(identities: readonly Identity[], lamports: (i: number) => number): Map<string, number> {
  return new Map(identities.map((id, i) => [id.key, lamports(i)]))
}

export function makeSnapshot(opts: { rewardRate?: bigint; buses?: Bus[]; lastResetAt?: number; now?: number } = {}): ChainSnapshot {
  return {
    treasury: { difficulty: new Uint8Array(32).fill(0xff), rewardRate: opts.rewardRate ?? 10n, lastResetAt: opts.lastResetAt ?? 1_000 },
    clock: { slot: 500, unixTimestamp: opts.now ?? 1_030 },
    buses: opts.buses ?? Array.from({ length: 8 }, (_, id) => ({ id, rewards: 1_000_000n })),
  }
}

export const landedStatus: SignatureStatus = { slot: 101, confirmations: 3, err: null, confirmationStatus: 'confirmed' }

/** In-memory chain; every field can be replaced per test. */
export class FakeChain implements ChainService {
  snapshot: ChainSnapshot = makeSnapshot()
  balances = new Map<string, number>()
  proofs = new Map<string, Proof>()
  slot = 100
  /** slots the chain advances per status query */
  slotStep = 10
  landAfterPolls = 1
  statusPolls = 0
  simulateErr: (tx: Transaction) => unknown = () => null
  existing = new Set<string>()
  failBalances = false
  failSnapshot = 0
  failProofs = 0
  failExists = 0

  async getSnapshot(): Promise<ChainSnapshot> {
    if (this.failSnapshot > 0) {
      this.failSnapshot--
      throw fail('NETWORK_RPC_UNAVAILABLE', { message: 'rpc request failed: timeout' })
    }
    return this.snapshot
  }

  async getProofs(addresses: readonly PublicKey[]): Promise<Proof[]> {
    return addresses.map(a => this.proofs.get(a.toBase58()) ?? { authority: a.toBase58(), hash: new Uint8Array(32), claimableRewards: 0n })
  }

  async findProofs(addresses: readonly PublicKey[]): Promise<(Proof | null)[]> {
    if (this.failProofs > 0) {
      this.failProofs--
      throw fail('NETWORK_RPC_UNAVAILABLE', { message: 'rpc request failed: timeout' })
    }
    return addresses.map(a => this.proofs.get(a.toBase58()) ?? null)
  }

  async getBalances(addresses: readonly PublicKey[]): Promise<Map<string, number>> {
    if (this.failBalances) throw fail('NETWORK_RPC_UNAVAILABLE', { message: 'rpc request failed: timeout' })
    const out = new Map<string, number>()
    for (const a of addresses) {
      const b = this.balances.get(a.toBase58())
      if (b !== undefined) out.set(a.toBase58(), b)
    }
    return out
  }

  async getLatestBlockhash(): Promise<BlockhashAndSlot> {
    return { blockhash: BLOCKHASH, slot: this.slot }
  }

  async getSignatureStatuses(signatures: readonly string[]): Promise<StatusesAtSlot> {
    this.statusPolls++
    this.slot += this.slotStep
    const landed = this.landAfterPolls > 0 && this.statusPolls >= this.landAfterPolls
    return { slot: this.slot, statuses: signatures.map((_, i) => (landed && i === 0 ? landedStatus : null)) }
  }

  async simulate(tx: Transaction): Promise<{ err: unknown }> {
    return { err: this.simulateErr(tx) }
  }

  async accountExists(address: PublicKey): Promise<boolean> {
    if (this.failExists > 0) {
      this.failExists--
      throw fail('NETWORK_RPC_UNAVAILABLE', { message: 'rpc request failed: timeout' })
    }
    return this.existing.has(address.toBase58())
  }
}

export class FakeRelay implements RelayClient {
  sent: Transaction[][] = []
  failNext = 0

  async sendBundle(txs: readonly Transaction[]): Promise<SentBundle> {
    if (this.failNext > 0) {
      this.failNext--
      throw fail('SUBMIT_RELAY_REJECTED', { message: 'relay error: rate limited' })
    }
    this.sent.push([...txs])
    return { signature: trackingSignature(txs[0]), bundleId: `bundle-${this.sent.length}` }
  }
}

export class FakeSolver implements Solver {
  calls: { work: readonly SolveWork[]; options: SolveOptions }[] = []

  async solve(_difficulty: Uint8Array, work: readonly SolveWork[], options: SolveOptions): Promise<SolveResult[]> {
    this.calls.push({ work, options })
    return work.map((_, i) => ({ hash: new Uint8Array(32).fill(1), nonce: BigInt(i) }))
  }
}

export function fixedTips(snapshot: TipSnapshot = EMPTY_TIPS): { current(): TipSnapshot } {
  return { current: () => snapshot }
}

/** Records requested waits and resolves at once. */
export function recordingSleep(): { sleep: Sleep; waits: number[] } {
  const waits: number[] = []
  return {
    waits,
    sleep: async (ms: number) => {
      waits.push(ms)
    },
  }
}

/** Routes the module logger into memory; returns the parsed lines. */
export function captureLogs(level: pino.Level = 'debug'): Record<string, unknown>[] {
  const lines: Record<string, unknown>[] = []
  const stream = new Writable({
    write(chunk: Buffer, _enc, cb) {
      for (const line of chunk.toString().split('\n')) {
        if (line) lines.push(JSON.parse(line))
      }
      cb()
    },
  })
  setLogger(pino({ level }, stream))
  return lines
}

export function silenceLogs() {
  setLogger(pino({ level: 'silent' }))
}
