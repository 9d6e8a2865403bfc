import { ReasonCode, ReasonCategory, ReasonDetail } from './enums'

// Centralized mapping from ReasonCode -> ReasonDetail (stable code, category, retryable, message)
export const REASONS: Record<ReasonCode, ReasonDetail> = {
  // NETWORK
  NETWORK_RPC_UNAVAILABLE: { code: 'NETWORK_RPC_UNAVAILABLE', category: ReasonCategory.NETWORK, retryable: true, message: 'Upstream RPC unavailable' },
  NETWORK_ACCOUNT_INVALID: { code: 'NETWORK_ACCOUNT_INVALID', category: ReasonCategory.NETWORK, retryable: true, message: 'Account missing or failed to decode' },

  // DATA
  DATA_BALANCE_MISSING: { code: 'DATA_BALANCE_MISSING', category: ReasonCategory.DATA, retryable: true, message: 'Balance unknown for fee payer candidate' },

  // SOLVER
  SOLVER_FAILED: { code: 'SOLVER_FAILED', category: ReasonCategory.SOLVER, retryable: true, message: 'Nonce solver failed' },
  SOLVER_DEADLINE: { code: 'SOLVER_DEADLINE', category: ReasonCategory.SOLVER, retryable: true, message: 'Solving overran the epoch deadline' },

  // SUBMIT
  SUBMIT_RELAY_REJECTED: { code: 'SUBMIT_RELAY_REJECTED', category: ReasonCategory.SUBMIT, retryable: false, message: 'Relay rejected the bundle' },
  SUBMIT_SIMULATION_FAILED: { code: 'SUBMIT_SIMULATION_FAILED', category: ReasonCategory.SUBMIT, retryable: false, message: 'Transaction simulation failed' },

  // CONFIG
  CONFIG_INVALID: { code: 'CONFIG_INVALID', category: ReasonCategory.CONFIG, retryable: false, message: 'Invalid configuration' },

  // INTERNAL
  BUNDLE_LIMIT: { code: 'BUNDLE_LIMIT', category: ReasonCategory.INTERNAL, retryable: false, message: 'Bundle limits violated' },
  INTERNAL_ERROR: { code: 'INTERNAL_ERROR', category: ReasonCategory.INTERNAL, retryable: false, message: 'Internal error' },
}

export function getReason(code: ReasonCode): ReasonDetail {
  return REASONS[code]
}
