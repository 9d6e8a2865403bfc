import type { ReasonDetail, ReasonCode } from '@orebm/dto'
import { REASONS } from './registry'

export type ReasonOverrides = Partial<Pick<ReasonDetail, 'message' | 'context'>>

/**
 * reason()
 * Registry entry for `code`. An override message replaces the default text; override
 * context is merged over the entry's own.
 */
export function reason(code: ReasonCode, overrides: ReasonOverrides = {}): ReasonDetail {
  const base = REASONS[code]
  const { message = base.message, context: extra } = overrides
  const context = base.context || extra ? { ...base.context, ...extra } : undefined
  return { ...base, message, context }
}
