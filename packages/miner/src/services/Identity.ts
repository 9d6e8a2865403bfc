import fs from 'fs'
import path from 'path'
import { Keypair, PublicKey } from '@solana/web3.js'
import { z } from 'zod'
import { describeError, fail } from '@orebm/reasons'
import { proofAddress } from './ore'

/** A mining identity: signing keypair plus the addresses derived from it. Immutable once loaded. */
export interface Identity {
  readonly keypair: Keypair
  readonly address: PublicKey
  /** base58 address, the key used in balance maps */
  readonly key: string
  readonly proof: PublicKey
}

export function toIdentity(keypair: Keypair): Identity {
  return Object.freeze({
    keypair,
    address: keypair.publicKey,
    key: keypair.publicKey.toBase58(),
    proof: proofAddress(keypair.publicKey),
  })
}

// solana-keygen JSON: 64 secret key bytes
const KeyFileSchema = z.array(z.number().int().min(0).max(255)).length(64)

/**
 * loadIdentities
 * Reads every keypair file of `folder` (sorted by name for stable batching).
 * Any unreadable file is a fatal CONFIG_INVALID error.
 */
export function loadIdentities(folder: string): Identity[] {
  let entries: string[]
  try {
    entries = fs.readdirSync(folder).sort()
  } catch (e) {
    throw fail('CONFIG_INVALID', { message: `failed to read key folder ${folder}: ${describeError(e).error}` })
  }

  return entries
    .filter(name => fs.statSync(path.join(folder, name)).isFile())
    .map(name => {
      const file = path.join(folder, name)
      let raw: unknown
      try {
        raw = JSON.parse(fs.readFileSync(file, 'utf8'))
      } catch (e) {
        throw fail('CONFIG_INVALID', { message: `failed to read keypair from ${file}: ${describeError(e).error}` })
      }
      const parsed = KeyFileSchema.safeParse(raw)
      if (!parsed.success) {
        throw fail('CONFIG_INVALID', { message: `failed to read keypair from ${file}: expected 64 byte array` })
      }
      return toIdentity(Keypair.fromSecretKey(Uint8Array.from(parsed.data)))
    })
}

export function chunk<T>(items: readonly T[], size: number): T[][] {
  if (size <= 0) throw new RangeError('chunk size must be positive')
  const out: T[][] = []
  for (let i = 0; i < items.length; i += size) out.push(items.slice(i, i + size))
  return out
}
