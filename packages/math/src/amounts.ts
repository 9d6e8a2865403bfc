/**
 * amounts.ts
 * Display and cost helpers for ORE and lamport amounts.
 */

export const ORE_DECIMALS = 9
/** base fee the cluster charges per signature */
export const FEE_PER_SIGNER = 5000

/**
 * formatOre
 * Renders base units as a decimal string without trailing zeros ("1.25", "0.000000001", "3").
 */
export function formatOre(amount: bigint, decimals = ORE_DECIMALS): string {
  const negative = amount < 0n
  const abs = negative ? -amount : amount
  const scale = 10n ** BigInt(decimals)
  const whole = abs / scale
  const frac = (abs % scale).toString().padStart(decimals, '0').replace(/0+$/, '')
  const body = frac.length ? `${whole}.${frac}` : `${whole}`
  return negative ? `-${body}` : body
}

/** Parses a decimal ORE amount ("0.5") into base units, truncating extra precision. */
export function parseOre(value: string, decimals = ORE_DECIMALS): bigint {
  const match = /^(\d+)(?:\.(\d*))?$/.exec(value.trim())
  if (!match) throw new Error(`invalid ORE amount: ${value}`)
  const [, whole, frac = ''] = match
  const fracDigits = frac.slice(0, decimals).padEnd(decimals, '0')
  return BigInt(whole) * 10n ** BigInt(decimals) + BigInt(fracDigits)
}

/** Lamports a fee payer needs for one transaction: signature fees plus the tip when it carries the bribe. */
export function transactionCost(signers: number, tip: number): number {
  return FEE_PER_SIGNER * Math.max(0, signers) + Math.max(0, tip)
}

export function formatDuration(ms: number): string {
  return `${(ms / 1000).toFixed(1)}s`
}
