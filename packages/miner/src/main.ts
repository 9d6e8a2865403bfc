#!/usr/bin/env node
/*
 * Entry point for the ore-bundle-miner CLI.
 *
 *  1. Parse argv and validate the environment (both fatal on error)
 *  2. Load identities, connect the chain, relay and tip stream adapters
 *  3. Run the selected command until it finishes or SIGINT/SIGTERM arrives
 */
import type { Server } from 'http'
import pino from 'pino'
import { describeError, fail, isFatal, isReasoned } from '@orebm/reasons'
import { CliArgs, parseArgs, USAGE } from './cli'
import { CONSTANTS, EnvConfig, loadEnv } from './config'
import { ClaimRunner } from './miners/ClaimRunner'
import { FixedWorkerMiner } from './miners/FixedWorkerMiner'
import { PooledMiner } from './miners/PooledMiner'
import { TipMonitor } from './miners/TipMonitor'
import { RpcChainClient } from './services/ChainClient'
import { Identity, loadIdentities } from './services/Identity'
import { JitoClient } from './services/JitoClient'
import { SubprocessSolver } from './services/NonceSolver'
import { TipFeed } from './services/TipFeed'
import { componentLogger, getLogger, setLogger } from './utils/logger'
import { startMetricsServer } from './utils/metrics'

type Runnable = { run(): Promise<void>; stop(): void }

function requirePriorityFee(args: { priorityFee?: number }, env: EnvConfig): number {
  const fee = args.priorityFee ?? env.priorityFee
  if (fee === undefined) throw fail('CONFIG_INVALID', { message: 'jito tip is required: set --priority-fee or PRIORITY_FEE' })
  return fee
}

function identitiesFrom(folder: string): Identity[] {
  const identities = loadIdentities(folder)
  if (identities.length === 0) throw fail('CONFIG_INVALID', { message: `no keys found in ${folder}` })
  componentLogger('main').info({ keys: identities.length }, 'keys loaded')
  return identities
}

function buildRunnable(args: Exclude<CliArgs, { command: 'help' }>, env: EnvConfig, tipFeed: TipFeed): Runnable {
  const chain = new RpcChainClient(args.rpc ?? env.rpcUrl)
  const relay = new JitoClient(env.jitoBlockEngineUrl)
  const tipOptions = (priorityFee: number, maxAdaptiveTip: number) => ({ priorityFee, maxAdaptiveTip, tipFloor: env.tipFloor })

  switch (args.command) {
    case 'mine': {
      const priorityFee = requirePriorityFee(args, env)
      const solver = new SubprocessSolver(args.solver ?? env.nonceWorkerPath)
      return new FixedWorkerMiner(identitiesFrom(args.keyFolder), { chain, relay, solver, tips: tipFeed }, {
        ...tipOptions(priorityFee, args.maxAdaptiveTip),
        threads: args.threads,
        concurrency: args.concurrency,
        maxBuses: args.maxBuses,
      })
    }
    case 'mine-pooled': {
      const priorityFee = requirePriorityFee(args, env)
      const solver = new SubprocessSolver(args.solver ?? env.nonceWorkerGpuPath, { gpu: true })
      return new PooledMiner(identitiesFrom(args.keyFolder), { chain, relay, solver, tips: tipFeed }, {
        ...tipOptions(priorityFee, args.maxAdaptiveTip),
        maxBuses: args.maxBuses,
      })
    }
    case 'claim': {
      const priorityFee = requirePriorityFee(args, env)
      return new ClaimRunner(identitiesFrom(args.keyFolder), { chain, relay, tips: tipFeed }, {
        beneficiary: args.beneficiary,
        threshold: args.threshold,
        auto: args.auto,
        priorityFee,
      })
    }
    case 'tip-stream':
      return new TipMonitor(tipFeed)
  }
}

export async function main(argv: readonly string[] = process.argv.slice(2)): Promise<void> {
  const args = parseArgs(argv)
  if (args.command === 'help') {
    process.stdout.write(`${USAGE}\n`)
    return
  }

  const env = loadEnv()
  setLogger(pino({ level: env.logLevel, base: { app: CONSTANTS.APP_NAME } }))
  const log = componentLogger('main')

  const tipFeed = new TipFeed(env.tipStreamUrl)
  const runnable = buildRunnable(args, env, tipFeed)

  let metricsServer: Server | undefined
  if (env.metricsPort !== undefined) {
    metricsServer = startMetricsServer(env.metricsPort)
    log.info({ port: env.metricsPort }, 'metrics server listening')
  }

  tipFeed.start()
  log.info({ command: args.command }, 'subscribed to jito tip stream')

  const shutdown = (signal: string) => {
    log.info({ signal }, 'shutting down')
    runnable.stop()
    tipFeed.stop()
    metricsServer?.close()
    // in-flight watches are not persisted; nothing to wait for
    process.exit(0)
  }
  process.once('SIGINT', () => shutdown('SIGINT'))
  process.once('SIGTERM', () => shutdown('SIGTERM'))

  try {
    await runnable.run()
  } finally {
    tipFeed.stop()
    metricsServer?.close()
  }
}

if (require.main === module) {
  main().catch(err => {
    const fatal = isReasoned(err) && isFatal(err.code)
    getLogger().fatal(describeError(err), fatal ? 'invalid configuration' : 'unhandled error')
    if (isReasoned(err, 'CONFIG_INVALID') && err.message.startsWith('unknown command')) process.stderr.write(`${USAGE}\n`)
    process.exit(1)
  })
}
