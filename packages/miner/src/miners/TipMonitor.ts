import type { TipSnapshot } from '@orebm/dto'
import { componentLogger } from '../utils/logger'
import { sleep as defaultSleep, Sleep } from '../utils/sleep'

const LOG_INTERVAL_MS = 5_000

/** Logs the live tip percentiles until stopped. */
export class TipMonitor {
  private readonly log = componentLogger('TipMonitor')
  private stopped = false

  constructor(
    private readonly tips: { current(): TipSnapshot },
    private readonly sleep: Sleep = defaultSleep,
    private readonly intervalMs: number = LOG_INTERVAL_MS
  ) {}

  async run(): Promise<void> {
    while (!this.stopped) {
      await this.sleep(this.intervalMs)
      if (this.stopped) break
      this.report()
    }
  }

  report(): TipSnapshot {
    const t = this.tips.current()
    this.log.info({ p25: t.p25, p50: t.p50, p75: t.p75, p95: t.p95, p99: t.p99 }, 'tips')
    return t
  }

  stop(): void {
    this.stopped = true
  }
}
