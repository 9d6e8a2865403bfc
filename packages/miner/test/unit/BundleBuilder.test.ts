import bs58 from 'bs58'
import { SystemProgram, Transaction } from '@solana/web3.js'
import { isReasoned } from '@orebm/reasons'
import { buildClaimBundle, buildMineBundle, MineEntry } from '../../src/services/BundleBuilder'
import type { Identity } from '../../src/services/Identity'
import { BUS_ADDRESSES, ORE_PROGRAM_ID } from '../../src/services/ore'
import { balancesOf, BLOCKHASH, makeIdentities } from '../helpers'

function entries(identities: Identity[]): MineEntry[] {
  return identities.map((identity, i) => ({ identity, solution: { hash: new Uint8Array(32).fill(3), nonce: BigInt(i) } }))
}

function countIx(tx: Transaction, programId = ORE_PROGRAM_ID) {
  return tx.instructions.filter(ix => ix.programId.equals(programId)).length
}

function caught(fn: () => unknown): unknown {
  try {
    fn()
  } catch (e) {
    return e
  }
  return undefined
}

describe('buildMineBundle', () => {
  const ids = makeIdentities(25)
  // later identities are richer
  const balances = balancesOf(ids, i => 1_000 + i * 10)

  test.each([1, 5, 6, 12, 25])('%i identities -> ceil(n/5) transactions and exactly one bribe', n => {
    const group = ids.slice(0, n)
    const bundle = buildMineBundle({
      entries: entries(group),
      bus: BUS_ADDRESSES[0],
      blockhash: BLOCKHASH,
      tip: 30_000,
      balances,
      tipper: group[0].key,
    })

    expect(bundle.transactions).toHaveLength(Math.ceil(n / 5))
    for (const tx of bundle.transactions) expect(countIx(tx)).toBeLessThanOrEqual(5)
    const mines = bundle.transactions.reduce((sum, tx) => sum + countIx(tx), 0)
    const bribes = bundle.transactions.reduce((sum, tx) => sum + countIx(tx, SystemProgram.programId), 0)
    expect(mines).toBe(n)
    expect(bribes).toBe(1)
  })

  test('pays each transaction from its richest member and tips right after the tipper', () => {
    const group = ids.slice(0, 12)
    const tipper = group[11].key
    const bundle = buildMineBundle({
      entries: entries(group),
      bus: BUS_ADDRESSES[3],
      blockhash: BLOCKHASH,
      tip: 30_000,
      balances,
      tipper,
    })

    expect(bundle.transactions.map(tx => tx.feePayer?.toBase58())).toEqual([group[4].key, group[9].key, group[11].key])
    expect(bundle.costs).toEqual([
      { feePayer: group[4].key, cost: 25_000 },
      { feePayer: group[9].key, cost: 25_000 },
      { feePayer: group[11].key, cost: 2 * 5_000 + 30_000 },
    ])

    const last = bundle.transactions[2].instructions
    expect(last.map(ix => ix.programId.equals(SystemProgram.programId))).toEqual([false, false, true])
    expect(last[1].keys[0].pubkey.toBase58()).toBe(tipper)

    for (const tx of bundle.transactions) expect(tx.verifySignatures()).toBe(true)
    expect(bundle.signature).toBe(bs58.encode(bundle.transactions[0].signature ?? new Uint8Array()))
  })

  test('unknown balance in a group is DATA_BALANCE_MISSING', () => {
    const group = ids.slice(0, 6)
    const partial = balancesOf(group, () => 5_000)
    partial.delete(group[5].key)

    const err = caught(() =>
      buildMineBundle({ entries: entries(group), bus: BUS_ADDRESSES[0], blockhash: BLOCKHASH, tip: 1, balances: partial, tipper: group[0].key })
    )
    expect(isReasoned(err, 'DATA_BALANCE_MISSING')).toBe(true)
    expect(err).toHaveProperty('message', 'no balance for 1 of 1 signers')
  })

  test('tipper outside the bundle or more than 25 proofs is BUNDLE_LIMIT', () => {
    const group = ids.slice(0, 5)
    const outsider = ids[20].key
    expect(
      isReasoned(
        caught(() => buildMineBundle({ entries: entries(group), bus: BUS_ADDRESSES[0], blockhash: BLOCKHASH, tip: 1, balances, tipper: outsider })),
        'BUNDLE_LIMIT'
      )
    ).toBe(true)

    const tooMany = makeIdentities(26, 100)
    expect(
      isReasoned(
        caught(() =>
          buildMineBundle({
            entries: entries(tooMany),
            bus: BUS_ADDRESSES[0],
            blockhash: BLOCKHASH,
            tip: 1,
            balances: balancesOf(tooMany, () => 1),
            tipper: tooMany[0].key,
          })
        ),
        'BUNDLE_LIMIT'
      )
    ).toBe(true)
  })
})

describe('buildClaimBundle', () => {
  const ids = makeIdentities(7, 40)
  const claims = ids.map((identity, i) => ({ identity, amount: BigInt(100 - i) }))
  const beneficiary = makeIdentities(1, 90)[0].address

  test('bribe closes the first transaction only', () => {
    const bundle = buildClaimBundle({ entries: claims, beneficiary, blockhash: BLOCKHASH, tip: 40_000, random: () => 0 })

    expect(bundle.transactions).toHaveLength(2)
    const first = bundle.transactions[0].instructions
    expect(first).toHaveLength(6)
    expect(first[5].programId.equals(SystemProgram.programId)).toBe(true)
    expect(countIx(bundle.transactions[1], SystemProgram.programId)).toBe(0)
    expect(bundle.costs).toEqual([
      { feePayer: ids[0].key, cost: 5 * 5_000 + 40_000 },
      { feePayer: ids[5].key, cost: 2 * 5_000 },
    ])
  })

  test('uses the richest member as fee payer when balances are known', () => {
    const balances = balancesOf(ids, i => (i === 2 ? 9_000 : 1_000))
    const bundle = buildClaimBundle({ entries: claims, beneficiary, blockhash: BLOCKHASH, tip: 1, balances, random: () => 0 })
    expect(bundle.transactions[0].feePayer?.toBase58()).toBe(ids[2].key)
  })
})
