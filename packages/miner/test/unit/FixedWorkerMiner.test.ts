import { fail, isReasoned } from '@orebm/reasons'
import { FixedMinerOptions, FixedWorkerMiner } from '../../src/miners/FixedWorkerMiner'
import { BUS_ADDRESSES } from '../../src/services/ore'
import type { Solver } from '../../src/services/NonceSolver'
import { balancesOf, FakeChain, FakeRelay, FakeSolver, fixedTips, makeIdentities, makeSnapshot, recordingSleep, silenceLogs } from '../helpers'

const options: FixedMinerOptions = {
  priorityFee: 20_000,
  maxAdaptiveTip: 0,
  tipFloor: 30_000,
  threads: 4,
  concurrency: 1,
  maxBuses: 2,
}

describe('FixedWorkerMiner', () => {
  const ids = makeIdentities(10)
  let chain: FakeChain
  let relay: FakeRelay
  let solver: FakeSolver

  beforeEach(() => {
    silenceLogs()
    chain = new FakeChain()
    relay = new FakeRelay()
    solver = new FakeSolver()
    chain.balances = balancesOf(ids, i => 1_000_000 + i)
    // 30s left in the epoch; 10 identities need 10 * (10 + 4) = 140 on a bus
    chain.snapshot = makeSnapshot({
      rewardRate: 10n,
      lastResetAt: 1_000,
      now: 1_030,
      buses: [
        { id: 0, rewards: 1_000n },
        { id: 1, rewards: 50n },
        { id: 2, rewards: 500n },
      ],
    })
  })

  test('solves, sends one bundle per usable bus and credits landed rewards', async () => {
    const { sleep } = recordingSleep()
    const miner = new FixedWorkerMiner(ids, { chain, relay, solver, tips: fixedTips(), sleep, now: () => 0 }, options)

    await expect(miner.runCycle(0, ids)).resolves.toBe('landed')

    expect(solver.calls).toHaveLength(1)
    expect(solver.calls[0].options).toEqual({ threads: 4, deadlineMs: 30_000 })
    expect(relay.sent).toHaveLength(2)
    // richest bus first
    const busOf = (bundle: number) => relay.sent[bundle][0].instructions[0].keys[1].pubkey
    expect(busOf(0).equals(BUS_ADDRESSES[0])).toBe(true)
    expect(busOf(1).equals(BUS_ADDRESSES[2])).toBe(true)
    expect(relay.sent[0]).toHaveLength(2)

    expect(miner.reportRewards()).toBe(100n)
    expect(miner.reportRewards()).toBe(0n)
  })

  test('waits out the epoch when no bus has capacity', async () => {
    chain.snapshot = makeSnapshot({ rewardRate: 10n, lastResetAt: 1_000, now: 1_030, buses: [{ id: 0, rewards: 139n }] })
    const { sleep, waits } = recordingSleep()
    const miner = new FixedWorkerMiner(ids, { chain, relay, solver, tips: fixedTips(), sleep, now: () => 0 }, options)

    await expect(miner.runCycle(0, ids)).resolves.toBe('skipped')
    expect(waits).toEqual([30_000])
    expect(relay.sent).toHaveLength(0)
  })

  test('backs off when balances cannot be fetched', async () => {
    chain.failBalances = true
    const { sleep, waits } = recordingSleep()
    const miner = new FixedWorkerMiner(ids, { chain, relay, solver, tips: fixedTips(), sleep, now: () => 0 }, options)

    await expect(miner.runCycle(0, ids)).resolves.toBe('skipped')
    expect(waits).toEqual([500])
    expect(solver.calls).toHaveLength(0)
  })

  test('solving past the epoch skips the cycle and frees the permit', async () => {
    let clock = 0
    const slow: Solver = {
      async solve(difficulty, work, opts) {
        clock += 31_000
        return solver.solve(difficulty, work, opts)
      },
    }
    const { sleep, waits } = recordingSleep()
    const miner = new FixedWorkerMiner(ids, { chain, relay, solver: slow, tips: fixedTips(), sleep, now: () => clock }, options)

    await expect(miner.runCycle(0, ids)).resolves.toBe('skipped')
    expect(waits).toEqual([30_000])
    expect(relay.sent).toHaveLength(0)

    // the single permit is free again
    await expect(miner.runCycle(0, ids)).resolves.toBe('skipped')
    expect(solver.calls).toHaveLength(2)
  })

  test('an overdue epoch reset solves without a deadline', async () => {
    chain.snapshot = makeSnapshot({ rewardRate: 10n, lastResetAt: 1_000, now: 1_070, buses: [{ id: 0, rewards: 1_000n }] })
    const deadlines: (number | undefined)[] = []
    // stops at once on a spent deadline, like the subprocess solver
    const bounded: Solver = {
      async solve(difficulty, work, opts) {
        deadlines.push(opts.deadlineMs)
        if (opts.deadlineMs !== undefined && opts.deadlineMs <= 0) throw fail('SOLVER_DEADLINE')
        return solver.solve(difficulty, work, opts)
      },
    }
    const { sleep, waits } = recordingSleep()
    const miner = new FixedWorkerMiner(ids, { chain, relay, solver: bounded, tips: fixedTips(), sleep, now: () => 0 }, options)

    for (let i = 0; i < 3; i++) {
      await expect(miner.runCycle(0, ids)).resolves.toBe('landed')
    }
    expect(deadlines).toEqual([undefined, undefined, undefined])
    expect(waits.filter(ms => ms === 0)).toHaveLength(0)
  })

  test('an overdue epoch without bus capacity still backs off', async () => {
    chain.snapshot = makeSnapshot({ rewardRate: 10n, lastResetAt: 1_000, now: 1_070, buses: [{ id: 0, rewards: 139n }] })
    const { sleep, waits } = recordingSleep()
    const miner = new FixedWorkerMiner(ids, { chain, relay, solver, tips: fixedTips(), sleep, now: () => 0 }, options)

    await expect(miner.runCycle(0, ids)).resolves.toBe('skipped')
    expect(waits).toEqual([500])
  })

  test('a signer without a known balance skips the cycle', async () => {
    chain.balances.delete(ids[3].key)
    const { sleep, waits } = recordingSleep()
    const miner = new FixedWorkerMiner(ids, { chain, relay, solver, tips: fixedTips(), sleep, now: () => 0 }, options)

    await expect(miner.runCycle(0, ids)).resolves.toBe('skipped')
    expect(waits).toEqual([500])
    expect(relay.sent).toHaveLength(0)
    expect(chain.statusPolls).toBe(0)
  })

  test('keeps watching when only some bundles were accepted', async () => {
    relay.failNext = 1
    const { sleep } = recordingSleep()
    const miner = new FixedWorkerMiner(ids, { chain, relay, solver, tips: fixedTips(), sleep, now: () => 0 }, options)

    await expect(miner.runCycle(0, ids)).resolves.toBe('landed')
    expect(relay.sent).toHaveLength(1)
  })

  test('nothing sent means nothing watched', async () => {
    relay.failNext = 2
    const { sleep } = recordingSleep()
    const miner = new FixedWorkerMiner(ids, { chain, relay, solver, tips: fixedTips(), sleep, now: () => 0 }, options)

    await expect(miner.runCycle(0, ids)).resolves.toBe('skipped')
    expect(chain.statusPolls).toBe(0)
  })

  test('rejects zero max buses at construction', () => {
    let err: unknown
    try {
      new FixedWorkerMiner(ids, { chain, relay, solver, tips: fixedTips() }, { ...options, maxBuses: 0 })
    } catch (e) {
      err = e
    }
    expect(isReasoned(err, 'CONFIG_INVALID')).toBe(true)
  })
})
