import { spawn } from 'child_process'
import type { PublicKey } from '@solana/web3.js'
import type { SolveResult } from '@orebm/dto'
import { fail } from '@orebm/reasons'
import { componentLogger } from '../utils/logger'

export interface SolveWork {
  /** current proof hash of the identity */
  challenge: Uint8Array
  signer: PublicKey
}

export interface SolveOptions {
  threads: number
  /** kill the solver after this many ms (time left in the epoch) */
  deadlineMs?: number
}

/** Finds one (hash, nonce) per work item, in input order. */
export interface Solver {
  solve(difficulty: Uint8Array, work: readonly SolveWork[], options: SolveOptions): Promise<SolveResult[]>
}

const HASH_LEN = 32
const RESULT_LEN = HASH_LEN + 8

/** threads u8 | difficulty 32 | (challenge 32 | signer 32)* */
export function encodeSolveRequest(threads: number, difficulty: Uint8Array, work: readonly SolveWork[]): Buffer {
  if (difficulty.length !== HASH_LEN) throw fail('SOLVER_FAILED', { message: `difficulty must be ${HASH_LEN} bytes` })
  const buf = Buffer.alloc(1 + HASH_LEN + work.length * HASH_LEN * 2)
  buf.writeUInt8(Math.max(0, Math.min(255, Math.floor(threads))), 0)
  buf.set(difficulty, 1)
  work.forEach((w, i) => {
    if (w.challenge.length !== HASH_LEN) throw fail('SOLVER_FAILED', { message: `challenge ${i} must be ${HASH_LEN} bytes` })
    const at = 1 + HASH_LEN + i * HASH_LEN * 2
    buf.set(w.challenge, at)
    buf.set(w.signer.toBytes(), at + HASH_LEN)
  })
  return buf
}

/** (hash 32 | nonce u64 LE)*; the solver must answer every work item */
export function decodeSolveResults(out: Buffer, expected: number): SolveResult[] {
  if (out.length < expected * RESULT_LEN) {
    throw fail('SOLVER_FAILED', { message: `solver returned ${out.length} bytes, expected ${expected * RESULT_LEN}` })
  }
  const results: SolveResult[] = []
  for (let i = 0; i < expected; i++) {
    const at = i * RESULT_LEN
    results.push({
      hash: Uint8Array.from(out.subarray(at, at + HASH_LEN)),
      nonce: out.readBigUInt64LE(at + HASH_LEN),
    })
  }
  return results
}

/** What SubprocessSolver needs from a child process. */
export interface SolverProcess {
  readonly stdin: { end(chunk: Buffer): unknown; on(event: 'error', listener: (err: Error) => void): unknown } | null
  readonly stdout: { on(event: 'data', listener: (chunk: Buffer) => void): unknown } | null
  on(event: 'error', listener: (err: Error) => void): unknown
  on(event: 'close', listener: (code: number | null, signal: NodeJS.Signals | null) => void): unknown
  kill(signal?: NodeJS.Signals): boolean
}

export type SpawnSolver = (binary: string) => SolverProcess

const defaultSpawn: SpawnSolver = binary => spawn(binary, [], { stdio: ['pipe', 'pipe', 'inherit'] })

export interface SubprocessSolverOptions {
  /** GPU workers ignore the thread count; it is sent as 0 */
  gpu?: boolean
  spawn?: SpawnSolver
}

/**
 * SubprocessSolver
 * Runs the external nonce worker once per solve. Request goes to stdin, results come back on stdout.
 * A worker still running at the deadline is killed and the solve fails with SOLVER_DEADLINE.
 */
export class SubprocessSolver implements Solver {
  private readonly gpu: boolean
  private readonly spawnProcess: SpawnSolver
  private readonly log = componentLogger('NonceSolver')

  constructor(private readonly binary: string, options: SubprocessSolverOptions = {}) {
    this.gpu = options.gpu ?? false
    this.spawnProcess = options.spawn ?? defaultSpawn
  }

  solve(difficulty: Uint8Array, work: readonly SolveWork[], options: SolveOptions): Promise<SolveResult[]> {
    if (work.length === 0) return Promise.resolve([])
    const request = encodeSolveRequest(this.gpu ? 0 : options.threads, difficulty, work)

    return new Promise<SolveResult[]>((resolve, reject) => {
      let child: SolverProcess
      try {
        child = this.spawnProcess(this.binary)
      } catch (e) {
        reject(fail('SOLVER_FAILED', { message: `failed to start ${this.binary}` }, e))
        return
      }

      const chunks: Buffer[] = []
      let deadlineHit = false
      let settled = false
      const timer =
        options.deadlineMs === undefined
          ? undefined
          : setTimeout(() => {
              deadlineHit = true
              this.log.warn({ binary: this.binary, deadline_ms: options.deadlineMs }, 'solver overran the epoch, killing')
              child.kill('SIGKILL')
            }, Math.max(0, options.deadlineMs))

      const finish = (err: Error | undefined, results?: SolveResult[]) => {
        if (settled) return
        settled = true
        if (timer) clearTimeout(timer)
        if (err) reject(err)
        else resolve(results ?? [])
      }

      child.on('error', err => finish(fail('SOLVER_FAILED', { message: `solver failed: ${err.message}` }, err)))
      child.stdout?.on('data', chunk => chunks.push(chunk))
      child.on('close', (code, signal) => {
        if (deadlineHit) {
          finish(fail('SOLVER_DEADLINE'))
          return
        }
        if (code !== 0) {
          finish(fail('SOLVER_FAILED', { message: `solver exited with code=${code} signal=${signal}` }))
          return
        }
        try {
          finish(undefined, decodeSolveResults(Buffer.concat(chunks), work.length))
        } catch (e) {
          finish(e instanceof Error ? e : new Error(String(e)))
        }
      })

      // the worker may exit before reading everything; close/exit reports the outcome
      child.stdin?.on('error', err => this.log.debug({ err: err.message }, 'solver stdin closed early'))
      child.stdin?.end(request)
    })
  }
}
