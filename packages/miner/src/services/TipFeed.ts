import WebSocket from 'ws'
import { z } from 'zod'
import { EMPTY_TIPS, TipSnapshot } from '@orebm/dto'
import { solToLamports } from '@orebm/math'
import { describeError } from '@orebm/reasons'
import { CONSTANTS } from '../config'
import { componentLogger } from '../utils/logger'

/** The part of a ws client the feed uses; lets tests drive it with an EventEmitter. */
export interface TipSocket {
  on(event: 'open' | 'message' | 'close' | 'error', listener: (...args: unknown[]) => void): unknown
  close(): void
}

export type SocketFactory = (url: string) => TipSocket

const TipRecordSchema = z.object({
  landed_tips_25th_percentile: z.number(),
  landed_tips_50th_percentile: z.number(),
  landed_tips_75th_percentile: z.number(),
  landed_tips_95th_percentile: z.number(),
  landed_tips_99th_percentile: z.number(),
})

const TipMessageSchema = z.array(TipRecordSchema)

/**
 * parseTipMessage
 * Returns the first record of a stream frame as a frozen lamport snapshot,
 * undefined for an empty array. Throws on malformed JSON or shape.
 */
export function parseTipMessage(text: string): TipSnapshot | undefined {
  const records = TipMessageSchema.parse(JSON.parse(text))
  const first = records[0]
  if (!first) return undefined
  return Object.freeze({
    p25: solToLamports(first.landed_tips_25th_percentile),
    p50: solToLamports(first.landed_tips_50th_percentile),
    p75: solToLamports(first.landed_tips_75th_percentile),
    p95: solToLamports(first.landed_tips_95th_percentile),
    p99: solToLamports(first.landed_tips_99th_percentile),
  })
}

function frameText(data: unknown): string | undefined {
  if (typeof data === 'string') return data
  if (Buffer.isBuffer(data)) return data.toString('utf8')
  if (Array.isArray(data) && data.every(Buffer.isBuffer)) return Buffer.concat(data).toString('utf8')
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString('utf8')
  return undefined
}

/**
 * TipFeed
 * Keeps one subscription to the landed-tip stream open and exposes the latest snapshot.
 * The snapshot is replaced whole on each sample, so readers never see a partial update.
 * Disconnects and connect failures are logged and retried every TIP_RECONNECT_MS until stop().
 */
export class TipFeed {
  private snapshot: TipSnapshot = EMPTY_TIPS
  private socket?: TipSocket
  private reconnectTimer?: NodeJS.Timeout
  private stopped = true
  private readonly log = componentLogger('TipFeed')

  constructor(
    private readonly url: string,
    private readonly socketFactory: SocketFactory = u => new WebSocket(u),
    private readonly reconnectMs: number = CONSTANTS.TIP_RECONNECT_MS
  ) {}

  current(): TipSnapshot {
    return this.snapshot
  }

  start(): void {
    if (!this.stopped) return
    this.stopped = false
    this.connect()
  }

  stop(): void {
    this.stopped = true
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer)
      this.reconnectTimer = undefined
    }
    const socket = this.socket
    this.socket = undefined
    socket?.close()
  }

  private connect(): void {
    let socket: TipSocket
    try {
      socket = this.socketFactory(this.url)
    } catch (e) {
      this.log.error({ ...describeError(e), url: this.url }, 'tip stream connect failed')
      this.scheduleReconnect()
      return
    }
    this.socket = socket

    socket.on('open', () => this.log.info({ url: this.url }, 'tip stream connected'))
    socket.on('message', data => this.onMessage(data))
    socket.on('error', err => {
      this.log.error({ err: err instanceof Error ? err.message : String(err) }, 'tip stream error')
    })
    socket.on('close', () => {
      if (this.socket !== socket) return
      this.socket = undefined
      if (this.stopped) return
      this.log.warn({ retry_ms: this.reconnectMs }, 'tip stream closed, reconnecting')
      this.scheduleReconnect()
    })
  }

  private onMessage(data: unknown): void {
    const text = frameText(data)
    if (text === undefined) {
      this.log.warn('tip stream sent an unreadable frame')
      return
    }
    try {
      const next = parseTipMessage(text)
      if (next) this.snapshot = next
    } catch (e) {
      this.log.warn(describeError(e), 'failed to parse tip stream message')
    }
  }

  private scheduleReconnect(): void {
    if (this.stopped || this.reconnectTimer) return
    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = undefined
      if (!this.stopped) this.connect()
    }, this.reconnectMs)
  }
}
