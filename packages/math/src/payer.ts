/**
 * payer.ts
 * Fee payer / tipper selection over known lamport balances.
 */

/**
 * pickRichest
 * Returns the candidate with the largest known balance; the first candidate wins ties.
 * Returns undefined when there are no candidates or any candidate has no known balance,
 * so callers can skip the batch instead of guessing.
 */
export function pickRichest(balances: ReadonlyMap<string, number>, candidates: readonly string[]): string | undefined {
  let best: string | undefined
  let bestBalance = -1
  for (const candidate of candidates) {
    const balance = balances.get(candidate)
    if (balance === undefined) return undefined
    if (balance > bestBalance) {
      best = candidate
      bestBalance = balance
    }
  }
  return best
}

export function missingBalances(balances: ReadonlyMap<string, number>, candidates: readonly string[]): string[] {
  return candidates.filter(c => !balances.has(c))
}
