import { PublicKey, Transaction, TransactionInstruction } from '@solana/web3.js'
import type { SolveResult } from '@orebm/dto'
import { missingBalances, pickRichest, transactionCost } from '@orebm/math'
import { fail } from '@orebm/reasons'
import { CONSTANTS } from '../config'
import { chunk, Identity } from './Identity'
import { buildBribeInstruction, RandomSource, trackingSignature } from './JitoClient'
import { claimInstruction, mineInstruction } from './ore'

export interface MineEntry {
  identity: Identity
  solution: SolveResult
}

export interface PayerCost {
  feePayer: string
  /** lamports: signature fees, plus the tip on the transaction carrying the bribe */
  cost: number
}

export interface BuiltBundle {
  transactions: Transaction[]
  /** first signature of the first transaction */
  signature: string
  costs: PayerCost[]
}

export interface MineBundleParams {
  entries: readonly MineEntry[]
  bus: PublicKey
  blockhash: string
  tip: number
  balances: ReadonlyMap<string, number>
  /** base58 address of the identity paying the bribe; must be one of the entries */
  tipper: string
  random?: RandomSource
}

const MAX_ENTRIES = CONSTANTS.MAX_TXS_PER_BUNDLE * CONSTANTS.MAX_PROOFS_PER_TX

/**
 * buildMineBundle
 * Packs solved proofs into one bundle: groups of up to 5 identities per transaction,
 * each paid by the richest identity of its group and signed by the whole group.
 * The single bribe follows the tipper's own mine instruction.
 */
export function buildMineBundle(params: MineBundleParams): BuiltBundle {
  const { entries, bus, blockhash, tip, balances, tipper } = params
  if (entries.length === 0 || entries.length > MAX_ENTRIES) {
    throw fail('BUNDLE_LIMIT', { message: `bundle takes 1..${MAX_ENTRIES} proofs, got ${entries.length}` })
  }
  if (!entries.some(e => e.identity.key === tipper)) {
    throw fail('BUNDLE_LIMIT', { message: `tipper ${tipper} is not part of the bundle` })
  }

  const transactions: Transaction[] = []
  const costs: PayerCost[] = []

  for (const group of chunk(entries, CONSTANTS.MAX_PROOFS_PER_TX)) {
    const identities = group.map(e => e.identity)
    const feePayer = requirePayer(balances, identities)

    const instructions: TransactionInstruction[] = []
    let carriesTip = false
    for (const { identity, solution } of group) {
      instructions.push(mineInstruction(identity.address, bus, solution.hash, solution.nonce))
      if (identity.key === tipper) {
        instructions.push(buildBribeInstruction(identity.address, tip, params.random))
        carriesTip = true
      }
    }

    transactions.push(signed(instructions, feePayer, identities, blockhash))
    costs.push({ feePayer: feePayer.key, cost: transactionCost(identities.length, carriesTip ? tip : 0) })
  }

  return { transactions, signature: trackingSignature(transactions[0]), costs }
}

export interface ClaimEntry {
  identity: Identity
  amount: bigint
}

export interface ClaimBundleParams {
  entries: readonly ClaimEntry[]
  /** beneficiary's ORE token account */
  beneficiary: PublicKey
  blockhash: string
  tip: number
  /** undefined when balances could not be fetched; payers are then picked at random */
  balances?: ReadonlyMap<string, number>
  random?: RandomSource
}

/**
 * buildClaimBundle
 * Same packing as mining, with claim instructions. The bribe closes the first transaction
 * and is paid by that transaction's fee payer.
 */
export function buildClaimBundle(params: ClaimBundleParams): BuiltBundle {
  const { entries, beneficiary, blockhash, tip, balances } = params
  const random = params.random ?? Math.random
  if (entries.length === 0 || entries.length > MAX_ENTRIES) {
    throw fail('BUNDLE_LIMIT', { message: `bundle takes 1..${MAX_ENTRIES} claims, got ${entries.length}` })
  }

  const transactions: Transaction[] = []
  const costs: PayerCost[] = []

  chunk(entries, CONSTANTS.MAX_PROOFS_PER_TX).forEach((group, i) => {
    const identities = group.map(e => e.identity)
    const richest = balances ? findIdentity(identities, pickRichest(balances, identities.map(id => id.key))) : undefined
    const feePayer = richest ?? identities[Math.min(identities.length - 1, Math.floor(random() * identities.length))]

    const instructions = group.map(e => claimInstruction(e.identity.address, beneficiary, e.amount))
    const carriesTip = i === 0
    if (carriesTip) instructions.push(buildBribeInstruction(feePayer.address, tip, random))

    transactions.push(signed(instructions, feePayer, identities, blockhash))
    costs.push({ feePayer: feePayer.key, cost: transactionCost(identities.length, carriesTip ? tip : 0) })
  })

  return { transactions, signature: trackingSignature(transactions[0]), costs }
}

function requirePayer(balances: ReadonlyMap<string, number>, identities: readonly Identity[]): Identity {
  const keys = identities.map(id => id.key)
  const payer = findIdentity(identities, pickRichest(balances, keys))
  if (!payer) {
    const missing = missingBalances(balances, keys)
    throw fail('DATA_BALANCE_MISSING', {
      message: `no balance for ${missing.length} of ${keys.length} signers`,
      context: { missing: missing.join(',') },
    })
  }
  return payer
}

function findIdentity(identities: readonly Identity[], key: string | undefined): Identity | undefined {
  return key === undefined ? undefined : identities.find(id => id.key === key)
}

function signed(instructions: TransactionInstruction[], feePayer: Identity, signers: readonly Identity[], blockhash: string): Transaction {
  const tx = new Transaction()
  tx.feePayer = feePayer.address
  tx.recentBlockhash = blockhash
  tx.add(...instructions)
  tx.sign(...signers.map(s => s.keypair))
  return tx
}
