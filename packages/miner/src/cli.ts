import { PublicKey } from '@solana/web3.js'
import { parseOre } from '@orebm/math'
import { fail } from '@orebm/reasons'

export interface CommonArgs {
  rpc?: string
  /** relay tip in lamports */
  priorityFee?: number
}

export interface MineArgs extends CommonArgs {
  command: 'mine'
  keyFolder: string
  threads: number
  concurrency: number
  maxAdaptiveTip: number
  maxBuses: number
  solver?: string
}

export interface MinePooledArgs extends CommonArgs {
  command: 'mine-pooled'
  keyFolder: string
  maxAdaptiveTip: number
  maxBuses: number
  solver?: string
}

export interface ClaimArgs extends CommonArgs {
  command: 'claim'
  keyFolder: string
  beneficiary: PublicKey
  /** base units */
  threshold: bigint
  auto: boolean
}

export interface TipStreamArgs extends CommonArgs {
  command: 'tip-stream'
}

export interface HelpArgs {
  command: 'help'
}

export type CliArgs = MineArgs | MinePooledArgs | ClaimArgs | TipStreamArgs | HelpArgs

export const USAGE = `usage: ore-bundle-miner [--rpc <url>] [--priority-fee <lamports>] <command> [options]

commands:
  mine         --key-folder <dir> [--threads 4] [--concurrency 1] [--max-adaptive-tip 0] [--max-buses 2] [--solver <path>]
  mine-pooled  --key-folder <dir> [--max-adaptive-tip 0] [--max-buses 2] [--solver <path>]
  claim        --key-folder <dir> --beneficiary <address> [--threshold 0] [--auto]
  tip-stream`

const BOOLEAN_FLAGS = new Set(['auto'])

function invalid(message: string): never {
  throw fail('CONFIG_INVALID', { message })
}

/**
 * parseArgs
 * `--flag value` pairs, global flags accepted on either side of the command.
 * Unknown flags, missing values and bad numbers are CONFIG_INVALID.
 */
export function parseArgs(argv: readonly string[]): CliArgs {
  const flags = new Map<string, string>()
  const positional: string[] = []

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i]
    if (!arg.startsWith('--')) {
      positional.push(arg)
      continue
    }
    const name = arg.slice(2)
    if (name === 'help') return { command: 'help' }
    if (BOOLEAN_FLAGS.has(name)) {
      flags.set(name, 'true')
      continue
    }
    const value = argv[i + 1]
    if (value === undefined || value.startsWith('--')) invalid(`missing value for --${name}`)
    flags.set(name, value)
    i += 1
  }

  const command = positional[0]
  if (command === undefined) return { command: 'help' }
  if (positional.length > 1) invalid(`unexpected argument: ${positional[1]}`)

  const take = (name: string): string | undefined => {
    const v = flags.get(name)
    flags.delete(name)
    return v
  }
  const int = (name: string, fallback: number, min = 0): number => {
    const raw = take(name)
    if (raw === undefined) return fallback
    const n = Number(raw)
    if (!Number.isSafeInteger(n) || n < min) invalid(`--${name} must be an integer >= ${min}, got ${raw}`)
    return n
  }
  const required = (name: string): string => {
    const v = take(name)
    if (v === undefined) invalid(`--${name} is required for ${command}`)
    return v
  }

  const rpc = take('rpc')
  const priorityFeeRaw = flags.has('priority-fee') ? int('priority-fee', 0) : undefined
  const common: CommonArgs = { rpc, priorityFee: priorityFeeRaw }

  let parsed: CliArgs
  switch (command) {
    case 'mine':
      parsed = {
        ...common,
        command,
        keyFolder: required('key-folder'),
        threads: int('threads', 4),
        concurrency: int('concurrency', 1, 1),
        maxAdaptiveTip: int('max-adaptive-tip', 0),
        maxBuses: int('max-buses', 2, 1),
        solver: take('solver'),
      }
      break
    case 'mine-pooled':
      parsed = {
        ...common,
        command,
        keyFolder: required('key-folder'),
        maxAdaptiveTip: int('max-adaptive-tip', 0),
        maxBuses: int('max-buses', 2, 1),
        solver: take('solver'),
      }
      break
    case 'claim': {
      const keyFolder = required('key-folder')
      const beneficiaryRaw = required('beneficiary')
      let beneficiary: PublicKey
      try {
        beneficiary = new PublicKey(beneficiaryRaw)
      } catch {
        return invalid(`--beneficiary is not a valid address: ${beneficiaryRaw}`)
      }
      const thresholdRaw = take('threshold')
      let threshold = 0n
      if (thresholdRaw !== undefined) {
        try {
          threshold = parseOre(thresholdRaw)
        } catch {
          return invalid(`--threshold must be a decimal ORE amount, got ${thresholdRaw}`)
        }
      }
      parsed = { ...common, command, keyFolder, beneficiary, threshold, auto: take('auto') === 'true' }
      break
    }
    case 'tip-stream':
      parsed = { ...common, command }
      break
    default:
      return invalid(`unknown command: ${command}`)
  }

  const leftover = [...flags.keys()]
  if (leftover.length > 0) invalid(`unknown option for ${command}: --${leftover[0]}`)
  return parsed
}
