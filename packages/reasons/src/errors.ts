/**
 * ReasonedError
 * Wraps a ReasonDetail so every failure crossing a service boundary carries a stable code.
 */
import type { ReasonCode, ReasonDetail } from '@orebm/dto'
import { reason, ReasonOverrides } from './factory'

export class ReasonedError extends Error {
  public readonly reason: ReasonDetail

  constructor(detail: ReasonDetail, options?: { cause?: unknown }) {
    super(detail.message, options)
    this.name = 'ReasonedError'
    this.reason = detail
  }

  get code(): ReasonCode {
    return this.reason.code
  }

  get retryable(): boolean {
    return this.reason.retryable
  }
}

/** Shorthand for `new ReasonedError(reason(code, overrides))`. */
export function fail(code: ReasonCode, overrides?: ReasonOverrides, cause?: unknown): ReasonedError {
  return new ReasonedError(reason(code, overrides), cause === undefined ? undefined : { cause })
}

export function isReasoned(e: unknown, code?: ReasonCode): e is ReasonedError {
  return e instanceof ReasonedError && (code === undefined || e.code === code)
}

/**
 * toReasoned
 * Passes ReasonedErrors through and wraps anything else under `fallback`, keeping the original message.
 */
export function toReasoned(e: unknown, fallback: ReasonCode): ReasonedError {
  if (e instanceof ReasonedError) return e
  const message = e instanceof Error ? e.message : String(e)
  return fail(fallback, { message: `${REASON_PREFIX[fallback] ?? fallback}: ${message}` }, e)
}

const REASON_PREFIX: Partial<Record<ReasonCode, string>> = {
  NETWORK_RPC_UNAVAILABLE: 'rpc request failed',
  SOLVER_FAILED: 'solver failed',
  SUBMIT_RELAY_REJECTED: 'relay error',
}

/** Message plus code, for log lines. */
export function describeError(e: unknown): { code?: ReasonCode; error: string } {
  if (e instanceof ReasonedError) return { code: e.code, error: e.message }
  return { error: e instanceof Error ? e.message : String(e) }
}
