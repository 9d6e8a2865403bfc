import {
  AccountInfo,
  Commitment,
  Connection,
  PublicKey,
  SYSVAR_CLOCK_PUBKEY,
  Transaction,
  VersionedTransaction,
} from '@solana/web3.js'
import type { ChainSnapshot, Proof, SignatureStatus } from '@orebm/dto'
import { fail, toReasoned } from '@orebm/reasons'
import { CONSTANTS } from '../config'
import { BUS_ADDRESSES, TREASURY_ADDRESS, decodeBus, decodeClock, decodeProof, decodeTreasury } from './ore'

export interface BlockhashAndSlot {
  blockhash: string
  slot: number
}

export interface StatusesAtSlot {
  statuses: (SignatureStatus | null)[]
  slot: number
}

/**
 * Chain queries the miner depends on. Every method rejects with a ReasonedError
 * (NETWORK_RPC_UNAVAILABLE or NETWORK_ACCOUNT_INVALID) so call sites can back off and retry.
 */
export interface ChainService {
  getSnapshot(): Promise<ChainSnapshot>
  /** throws NETWORK_ACCOUNT_INVALID if any proof account is missing */
  getProofs(addresses: readonly PublicKey[]): Promise<Proof[]>
  /** null for proof accounts that do not exist or do not decode */
  findProofs(addresses: readonly PublicKey[]): Promise<(Proof | null)[]>
  /** lamports by base58 address; accounts that do not exist are absent */
  getBalances(addresses: readonly PublicKey[]): Promise<Map<string, number>>
  getLatestBlockhash(): Promise<BlockhashAndSlot>
  getSignatureStatuses(signatures: readonly string[]): Promise<StatusesAtSlot>
  simulate(tx: Transaction): Promise<{ err: unknown }>
  accountExists(address: PublicKey): Promise<boolean>
}

const SYSTEM_ACCOUNTS: readonly PublicKey[] = [TREASURY_ADDRESS, SYSVAR_CLOCK_PUBKEY, ...BUS_ADDRESSES]

/**
 * RpcChainClient - ChainService over a Solana JSON-RPC node.
 * System accounts and proofs are read at `processed`; everything else at `confirmed`.
 */
export class RpcChainClient implements ChainService {
  private readonly connection: Connection

  constructor(rpcUrl: string | Connection) {
    this.connection = typeof rpcUrl === 'string' ? new Connection(rpcUrl, 'confirmed') : rpcUrl
  }

  async getSnapshot(): Promise<ChainSnapshot> {
    const [treasury, clock, ...buses] = await this.getAccounts(SYSTEM_ACCOUNTS, 'processed')
    return {
      treasury: decodeTreasury(this.requireData('treasury', TREASURY_ADDRESS, treasury)),
      clock: decodeClock(this.requireData('clock', SYSVAR_CLOCK_PUBKEY, clock)),
      buses: buses.map((bus, i) => decodeBus(this.requireData('bus', BUS_ADDRESSES[i], bus))),
    }
  }

  async getProofs(addresses: readonly PublicKey[]): Promise<Proof[]> {
    const accounts = await this.getAccounts(addresses, 'processed')
    return accounts.map((account, i) => {
      if (!account) throw fail('NETWORK_ACCOUNT_INVALID', { message: `account ${addresses[i].toBase58()} not registered` })
      return decodeProof(account.data)
    })
  }

  async findProofs(addresses: readonly PublicKey[]): Promise<(Proof | null)[]> {
    const accounts = await this.getAccounts(addresses, 'confirmed')
    return accounts.map(account => {
      if (!account) return null
      try {
        return decodeProof(account.data)
      } catch {
        return null
      }
    })
  }

  async getBalances(addresses: readonly PublicKey[]): Promise<Map<string, number>> {
    const accounts = await this.getAccounts(addresses, 'confirmed')
    const balances = new Map<string, number>()
    accounts.forEach((account, i) => {
      if (account) balances.set(addresses[i].toBase58(), account.lamports)
    })
    return balances
  }

  async getLatestBlockhash(): Promise<BlockhashAndSlot> {
    try {
      const res = await this.connection.getLatestBlockhashAndContext('confirmed')
      return { blockhash: res.value.blockhash, slot: res.context.slot }
    } catch (e) {
      throw toReasoned(e, 'NETWORK_RPC_UNAVAILABLE')
    }
  }

  async getSignatureStatuses(signatures: readonly string[]): Promise<StatusesAtSlot> {
    try {
      const res = await this.connection.getSignatureStatuses([...signatures])
      return {
        slot: res.context.slot,
        statuses: res.value.map(s =>
          s ? { slot: s.slot, confirmations: s.confirmations, err: s.err, confirmationStatus: s.confirmationStatus } : null
        ),
      }
    } catch (e) {
      throw toReasoned(e, 'NETWORK_RPC_UNAVAILABLE')
    }
  }

  async simulate(tx: Transaction): Promise<{ err: unknown }> {
    try {
      const res = await this.connection.simulateTransaction(new VersionedTransaction(tx.compileMessage()), {
        sigVerify: false,
        replaceRecentBlockhash: true,
        commitment: 'processed',
      })
      return { err: res.value.err }
    } catch (e) {
      throw toReasoned(e, 'NETWORK_RPC_UNAVAILABLE')
    }
  }

  async accountExists(address: PublicKey): Promise<boolean> {
    try {
      return (await this.connection.getAccountInfo(address, 'confirmed')) !== null
    } catch (e) {
      throw toReasoned(e, 'NETWORK_RPC_UNAVAILABLE')
    }
  }

  // getMultipleAccounts is capped per request; split and keep order
  private async getAccounts(addresses: readonly PublicKey[], commitment: Commitment): Promise<(AccountInfo<Buffer> | null)[]> {
    const out: (AccountInfo<Buffer> | null)[] = []
    try {
      for (let i = 0; i < addresses.length; i += CONSTANTS.FETCH_ACCOUNT_LIMIT) {
        const slice = addresses.slice(i, i + CONSTANTS.FETCH_ACCOUNT_LIMIT)
        out.push(...(await this.connection.getMultipleAccountsInfo([...slice], { commitment })))
      }
    } catch (e) {
      throw toReasoned(e, 'NETWORK_RPC_UNAVAILABLE')
    }
    return out
  }

  private requireData(name: string, address: PublicKey, account: AccountInfo<Buffer> | null | undefined): Buffer {
    if (!account) throw fail('NETWORK_ACCOUNT_INVALID', { message: `${name} account ${address.toBase58()} doesn't exist` })
    return account.data
  }
}
