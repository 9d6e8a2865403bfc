// src/config.ts

/**
 * Centralized configuration module for environment variables and constants.
 */

// Load environment variables from .env file if it exists
import dotenv from 'dotenv'
import path from 'path'
import fs from 'fs'
import { z } from 'zod'
import { fail } from '@orebm/reasons'

// Resolves to the package root from both src/ (ts-jest) and dist/ (built) layouts
const packageRoot = path.resolve(__dirname, '..')

const candidateEnvPaths = [
  path.join(packageRoot, '.env'),
  path.join(process.cwd(), '.env')
]
for (const p of candidateEnvPaths) {
  if (fs.existsSync(p)) {
    dotenv.config({ path: p })
    break
  }
}

const blankToUndefined = (v: unknown) => (typeof v === 'string' && v.trim() === '' ? undefined : v)

const lamports = z.coerce.number().int().nonnegative()

const EnvSchema = z.object({
  RPC_URL: z.preprocess(blankToUndefined, z.string().url().default('https://api.mainnet-beta.solana.com')),
  // base relay tip in lamports; required by every command that submits bundles
  PRIORITY_FEE: z.preprocess(blankToUndefined, lamports.optional()),
  JITO_BLOCK_ENGINE_URL: z.preprocess(blankToUndefined, z.string().url().default('https://ny.mainnet.block-engine.jito.wtf')),
  TIP_STREAM_URL: z.preprocess(blankToUndefined, z.string().url().default('ws://bundles-api-rest.jito.wtf/api/v1/bundles/tip_stream')),
  TIP_FLOOR: z.preprocess(blankToUndefined, lamports.default(30_000)),
  NONCE_WORKER_PATH: z.preprocess(blankToUndefined, z.string().default(path.join(packageRoot, 'bin', 'nonce-worker'))),
  NONCE_WORKER_GPU_PATH: z.preprocess(blankToUndefined, z.string().default(path.join(packageRoot, 'bin', 'nonce-worker-gpu'))),
  METRICS_PORT: z.preprocess(blankToUndefined, z.coerce.number().int().positive().max(65535).optional()),
  LOG_LEVEL: z.preprocess(blankToUndefined, z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info')),
})

export type LogLevel = z.infer<typeof EnvSchema>['LOG_LEVEL']

export interface EnvConfig {
  rpcUrl: string
  priorityFee?: number
  jitoBlockEngineUrl: string
  tipStreamUrl: string
  tipFloor: number
  nonceWorkerPath: string
  nonceWorkerGpuPath: string
  metricsPort?: number
  logLevel: LogLevel
}

/**
 * loadEnv
 * Validates the environment; any invalid value is a fatal CONFIG_INVALID error naming the variables.
 */
export function loadEnv(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  const parsed = EnvSchema.safeParse(env)
  if (!parsed.success) {
    const detail = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ')
    throw fail('CONFIG_INVALID', { message: `invalid environment: ${detail}` })
  }
  const e = parsed.data
  return {
    rpcUrl: e.RPC_URL,
    priorityFee: e.PRIORITY_FEE,
    jitoBlockEngineUrl: e.JITO_BLOCK_ENGINE_URL,
    tipStreamUrl: e.TIP_STREAM_URL,
    tipFloor: e.TIP_FLOOR,
    nonceWorkerPath: e.NONCE_WORKER_PATH,
    nonceWorkerGpuPath: e.NONCE_WORKER_GPU_PATH,
    metricsPort: e.METRICS_PORT,
    logLevel: e.LOG_LEVEL,
  }
}

export const CONSTANTS = {
  APP_NAME: 'ore-bundle-miner',
  // identities per pooled batch and per fixed-mode worker
  BATCH_SIZE: 25,
  // relay limits
  MAX_TXS_PER_BUNDLE: 5,
  MAX_PROOFS_PER_TX: 5,
  // slots a blockhash stays valid (151) plus slack
  SLOT_EXPIRATION: 151 + 5,
  POLL_INTERVAL_MS: 2_000,
  RPC_BACKOFF_MS: 500,
  TIP_RECONNECT_MS: 5_000,
  FETCH_ACCOUNT_LIMIT: 100,
  // batches drained from the pool per pipeline pass
  POOL_DRAIN_MAX: 4,
  POOL_IDLE_SLEEP_MS: 500,
  REWARD_REPORT_INTERVAL_MS: 10 * 60 * 1000,
  CLAIM_RECHECK_INTERVAL_MS: 5 * 60 * 1000,
  // bus slack, in proofs, on top of the identities being submitted
  FIXED_BUS_HEADROOM: 4,
  POOLED_BUS_HEADROOM: 20,
}
