/**
 * Reasons Registry
 * Centralizes the machine-parsable failure codes of the miner.
 * Each entry is stable; logs and metrics label failures with these codes.
 */
import { REASONS, getReason } from '@orebm/dto'
import type { ReasonCode, ReasonDetail } from '@orebm/dto'

export { REASONS, getReason }

export type { ReasonCode, ReasonDetail }
