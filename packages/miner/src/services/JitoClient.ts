import axios, { AxiosInstance } from 'axios'
import bs58 from 'bs58'
import { PublicKey, SystemProgram, Transaction, TransactionInstruction } from '@solana/web3.js'
import { fail } from '@orebm/reasons'
import { componentLogger } from '../utils/logger'

/** Accounts the block engine accepts tips on. */
export const JITO_TIP_ACCOUNTS: readonly PublicKey[] = [
  '96gYZGLnJYVFmbjzopPSU6QiEV5fGqZNyN9nmNhvrZU5',
  'HFqU5x63VTqvQss8hp11i4wVV8bD44PvwucfZ2bU7gRe',
  'Cw8CFyM9FkoMi7K7Crf6HNQqf4uEMzpKw6QNghXLvLkY',
  'ADaUMid9yfUytqMBgopwjb2DTLSokTSzL1zt6iGPaS49',
  'DfXygSm4jCyNCybVYYK6DwvWqjKee8pbDmJGcLWNDXjh',
  'ADuUkR4vqLUMWXxW9gh6D6L8pMSawimctcNZ5pGwDcEt',
  'DttWaMuVvTiduZRnguLF7jNxTgiMBZ1hyAumKUiL2KRL',
  '3AVi9Tg9Uo68tJfuvoKvqKNWKkC5wPdSSdeBnizKZ6jT',
].map(a => new PublicKey(a))

export type RandomSource = () => number

export function pickTipAccount(random: RandomSource = Math.random): PublicKey {
  const i = Math.min(JITO_TIP_ACCOUNTS.length - 1, Math.floor(random() * JITO_TIP_ACCOUNTS.length))
  return JITO_TIP_ACCOUNTS[i]
}

export function buildBribeInstruction(from: PublicKey, lamports: number, random: RandomSource = Math.random): TransactionInstruction {
  return SystemProgram.transfer({ fromPubkey: from, toPubkey: pickTipAccount(random), lamports })
}

/** base58 of the transaction's first signature; throws if it is unsigned */
export function trackingSignature(tx: Transaction): string {
  if (!tx.signature) throw fail('BUNDLE_LIMIT', { message: 'transaction is not signed' })
  return bs58.encode(tx.signature)
}

export interface SentBundle {
  /** first signature of the first transaction, used to track landing */
  signature: string
  bundleId: string
}

export interface RelayClient {
  sendBundle(txs: readonly Transaction[]): Promise<SentBundle>
}

type JsonRpcResponse = {
  result?: unknown
  error?: { message?: string } | string
}

/**
 * JitoClient
 *
 * Minimal JSON-RPC client for the block engine bundle endpoint.
 *
 * Method:
 *  - `sendBundle` with a single param: the signed transactions, base58 encoded, in bundle order
 *  - The result is the bundle id; landing is tracked through the first transaction's signature
 *
 * Errors (transport or JSON-RPC) surface as SUBMIT_RELAY_REJECTED; callers skip the bundle.
 */
export class JitoClient implements RelayClient {
  private readonly blockEngineUrl: string
  private readonly http: AxiosInstance
  private readonly log = componentLogger('JitoClient')

  constructor(blockEngineUrl: string) {
    this.blockEngineUrl = blockEngineUrl.replace(/\/$/, '')
    this.http = axios.create({
      baseURL: `${this.blockEngineUrl}/api/v1`,
      timeout: 10_000,
    })
  }

  async sendBundle(txs: readonly Transaction[]): Promise<SentBundle> {
    if (txs.length === 0) throw fail('BUNDLE_LIMIT', { message: 'bundle is empty' })
    const signature = trackingSignature(txs[0])
    const body = {
      jsonrpc: '2.0',
      id: 1,
      method: 'sendBundle',
      params: [txs.map(tx => bs58.encode(tx.serialize()))],
    }

    try {
      const res = await this.http.post<JsonRpcResponse>('/bundles', body, {
        headers: { 'Content-Type': 'application/json' },
      })
      const err = res.data?.error
      if (err) {
        const msg = typeof err === 'string' ? err : err.message || 'unknown relay error'
        throw fail('SUBMIT_RELAY_REJECTED', { message: `relay error: ${msg}` })
      }
      const bundleId = typeof res.data?.result === 'string' ? res.data.result : ''
      this.log.debug({ bundle: bundleId, signature, txs: txs.length }, 'bundle accepted')
      return { signature, bundleId }
    } catch (e: unknown) {
      if (axios.isAxiosError(e)) {
        const status = e.response?.status
        const detail = relayErrorDetail(e.response?.data) ?? e.message
        throw fail('SUBMIT_RELAY_REJECTED', { message: `relay error (status=${status}): ${detail}`, context: { signature } }, e)
      }
      throw e
    }
  }
}

function relayErrorDetail(data: unknown): string | undefined {
  if (typeof data === 'string') return data
  if (typeof data !== 'object' || data === null || !('error' in data)) return undefined
  const err = data.error
  if (typeof err === 'string') return err
  if (typeof err === 'object' && err !== null && 'message' in err && typeof err.message === 'string') return err.message
  return undefined
}
