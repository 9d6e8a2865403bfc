import type { Server } from 'http'
import express, { Express, Request, Response } from 'express'
import { Registry, Counter, Histogram, Gauge } from 'prom-client'
import { describeError } from '@orebm/reasons'
import { componentLogger } from './logger'

let registry: Registry
let transitionCounter: Counter<string>
let submissionCounter: Counter<string>
let failureCounter: Counter<string>
let bundlesSentCounter: Counter<string>
let miningHistogram: Histogram<string>
let confirmHistogram: Histogram<string>
let idleGauge: Gauge<string>
let rewardsCounter: Counter<string>

function initMetrics(reg?: Registry) {
  registry = reg ?? new Registry()

  transitionCounter = new Counter({
    name: 'submission_transitions_total',
    help: 'Counts submission state transitions',
    labelNames: ['from', 'to'],
    registers: [registry]
  })

  submissionCounter = new Counter({
    name: 'submissions_total',
    help: 'Resolved submissions by terminal outcome and mode',
    labelNames: ['outcome', 'mode'],
    registers: [registry]
  })

  failureCounter = new Counter({
    name: 'cycle_failures_total',
    help: 'Mining cycle failures by reason code',
    labelNames: ['mode', 'reason'],
    registers: [registry]
  })

  bundlesSentCounter = new Counter({
    name: 'bundles_sent_total',
    help: 'Bundles accepted by the relay',
    labelNames: ['mode'],
    registers: [registry]
  })

  miningHistogram = new Histogram({
    name: 'mining_duration_ms',
    help: 'Solver wall time per cycle (ms)',
    labelNames: ['mode'],
    buckets: [1000, 2000, 5000, 10000, 20000, 30000, 45000, 60000],
    registers: [registry]
  })

  confirmHistogram = new Histogram({
    name: 'confirm_duration_ms',
    help: 'Send to terminal state latency by outcome (ms)',
    labelNames: ['outcome'],
    buckets: [2000, 5000, 10000, 20000, 40000, 60000, 90000],
    registers: [registry]
  })

  idleGauge = new Gauge({
    name: 'pool_idle_identities',
    help: 'Identities parked in the batch pool (not in flight)',
    registers: [registry]
  })

  rewardsCounter = new Counter({
    name: 'rewards_landed_total',
    help: 'Nominal ORE rewards (base units) credited on landed bundles',
    labelNames: ['mode'],
    registers: [registry]
  })
}

// initialize default metrics on module load
initMetrics()

export function setRegistry(reg: Registry) {
  initMetrics(reg)
}

export function countTransition(from: string, to: string) {
  transitionCounter.labels({ from, to }).inc()
}

export function countSubmission(outcome: string, mode: string) {
  submissionCounter.labels({ outcome, mode }).inc()
}

export function countFailure(mode: string, reason: string) {
  failureCounter.labels({ mode, reason }).inc()
}

export function countBundlesSent(mode: string, n = 1) {
  bundlesSentCounter.labels({ mode }).inc(n)
}

export function observeMining(mode: string, ms: number) {
  if (ms >= 0) miningHistogram.labels({ mode }).observe(ms)
}

export function observeConfirm(outcome: string, ms: number) {
  if (ms >= 0) confirmHistogram.labels({ outcome }).observe(ms)
}

export function setIdleIdentities(n: number) {
  idleGauge.set(n)
}

export function addRewards(mode: string, amount: bigint) {
  // prom-client counters are float64; base units stay exact well past any realistic total
  rewardsCounter.labels({ mode }).inc(Number(amount))
}

export async function metricsHandler(_req: Request, res: Response): Promise<void> {
  try {
    const body = await registry.metrics()
    res.setHeader('Content-Type', registry.contentType || 'text/plain; version=0.0.4')
    res.status(200).end(body)
  } catch (e) {
    componentLogger('metrics').error(describeError(e), 'failed to collect metrics')
    res.status(500).end('error')
  }
}

/** Express app exposing the registry; tests mount it without listening. */
export function createMetricsApp(): Express {
  const app = express()
  app.get('/metrics', metricsHandler)
  return app
}

/**
 * Serves /metrics on `port`. Returns the server so main() can close it on shutdown.
 * A listen failure is logged and mining carries on without the endpoint.
 */
export function startMetricsServer(port: number): Server {
  const server = createMetricsApp().listen(port)
  server.on('error', e => {
    componentLogger('metrics').error({ ...describeError(e), port }, 'metrics server failed')
  })
  return server
}

export { registry }
