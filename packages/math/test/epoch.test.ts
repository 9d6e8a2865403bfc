import { solveDeadlineMs, timeToNextEpochMs } from '../src/epoch'

function snap(lastResetAt: number, unixTimestamp: number) {
  return {
    treasury: { difficulty: new Uint8Array(32), rewardRate: 1n, lastResetAt },
    clock: { slot: 1, unixTimestamp },
  }
}

describe('epoch timing', () => {
  it('counts down to lastResetAt + 60s', () => {
    expect(timeToNextEpochMs(snap(1000, 1015))).toBe(45_000)
  })

  it('is zero once the reset is due or overdue', () => {
    expect(timeToNextEpochMs(snap(1000, 1060))).toBe(0)
    expect(timeToNextEpochMs(snap(1000, 1200))).toBe(0)
  })

  it('honours a custom epoch length', () => {
    expect(timeToNextEpochMs(snap(1000, 1000), 120)).toBe(120_000)
  })

  it('drops the solver deadline once the reset is overdue', () => {
    expect(solveDeadlineMs(snap(1000, 1015))).toBe(45_000)
    expect(solveDeadlineMs(snap(1000, 1060))).toBeUndefined()
    expect(solveDeadlineMs(snap(1000, 1070))).toBeUndefined()
  })
})
