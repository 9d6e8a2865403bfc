import { EventEmitter } from 'events'
import { EMPTY_TIPS } from '@orebm/dto'
import { parseTipMessage, TipFeed } from '../../src/services/TipFeed'
import { silenceLogs } from '../helpers'

class FakeSocket extends EventEmitter {
  closed = false
  close() {
    this.closed = true
    this.emit('close')
  }
}

const sample = JSON.stringify([
  {
    time: '2024-05-01T00:00:00Z',
    landed_tips_25th_percentile: 0.00001,
    landed_tips_50th_percentile: 0.00002,
    landed_tips_75th_percentile: 0.0001,
    landed_tips_95th_percentile: 0.001,
    landed_tips_99th_percentile: 0.01,
  },
])

describe('parseTipMessage', () => {
  test('converts the first record from SOL to lamports', () => {
    expect(parseTipMessage(sample)).toEqual({ p25: 10_000, p50: 20_000, p75: 100_000, p95: 1_000_000, p99: 10_000_000 })
  })

  test('empty array yields no snapshot', () => {
    expect(parseTipMessage('[]')).toBeUndefined()
  })

  test('malformed payloads throw', () => {
    expect(() => parseTipMessage('not json')).toThrow()
    expect(() => parseTipMessage('[{"landed_tips_50th_percentile":"x"}]')).toThrow()
  })
})

describe('TipFeed', () => {
  let sockets: FakeSocket[]
  let feed: TipFeed

  beforeEach(() => {
    silenceLogs()
    jest.useFakeTimers()
    sockets = []
    feed = new TipFeed('ws://tips.test', () => {
      const s = new FakeSocket()
      sockets.push(s)
      return s
    }, 5_000)
  })

  afterEach(() => {
    feed.stop()
    jest.useRealTimers()
  })

  test('starts cold and publishes each parsed sample as a frozen snapshot', () => {
    feed.start()
    expect(feed.current()).toBe(EMPTY_TIPS)

    sockets[0].emit('message', Buffer.from(sample))
    const snap = feed.current()
    expect(snap.p50).toBe(20_000)
    expect(Object.isFrozen(snap)).toBe(true)
  })

  test('ignores empty and malformed frames', () => {
    feed.start()
    sockets[0].emit('message', Buffer.from(sample))
    const before = feed.current()

    sockets[0].emit('message', '[]')
    sockets[0].emit('message', '{oops')
    expect(feed.current()).toBe(before)
  })

  test('reconnects 5s after the stream closes', () => {
    feed.start()
    sockets[0].emit('error', new Error('socket hang up'))
    sockets[0].emit('close')
    expect(sockets).toHaveLength(1)

    jest.advanceTimersByTime(4_999)
    expect(sockets).toHaveLength(1)
    jest.advanceTimersByTime(1)
    expect(sockets).toHaveLength(2)
  })

  test('retries when the connection cannot be created', () => {
    let attempts = 0
    const flaky = new TipFeed('ws://tips.test', () => {
      attempts++
      if (attempts === 1) throw new Error('invalid url')
      return new FakeSocket()
    }, 5_000)
    flaky.start()
    expect(attempts).toBe(1)
    jest.advanceTimersByTime(5_000)
    expect(attempts).toBe(2)
    flaky.stop()
  })

  test('stop closes the socket and cancels reconnects', () => {
    feed.start()
    feed.stop()
    expect(sockets[0].closed).toBe(true)
    jest.advanceTimersByTime(60_000)
    expect(sockets).toHaveLength(1)
  })
})
