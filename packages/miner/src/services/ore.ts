import { PublicKey, TransactionInstruction, SYSVAR_SLOT_HASHES_PUBKEY } from '@solana/web3.js'
import { getAssociatedTokenAddressSync, TOKEN_PROGRAM_ID } from '@solana/spl-token'
import type { Bus, ClockState, Proof, Treasury } from '@orebm/dto'
import { fail } from '@orebm/reasons'

/**
 * ORE v1 program bindings: addresses, the two instructions the miner sends and the
 * account layouts it reads. Account data starts with an 8-byte discriminator.
 */

export const ORE_PROGRAM_ID = new PublicKey('mineRHF5r6S7HyD9SppBfVMXMavDkJsxwGesEvxZr2A')
export const ORE_MINT = new PublicKey('oreoN2tQbHXVaZsr3pf66A48miqcBXCDJozganhEJgz')
export const BUS_COUNT = 8

const BUS_SEED = Buffer.from('bus')
const PROOF_SEED = Buffer.from('proof')
const TREASURY_SEED = Buffer.from('treasury')

export const TREASURY_ADDRESS = PublicKey.findProgramAddressSync([TREASURY_SEED], ORE_PROGRAM_ID)[0]

export const BUS_ADDRESSES: readonly PublicKey[] = Array.from(
  { length: BUS_COUNT },
  (_, i) => PublicKey.findProgramAddressSync([BUS_SEED, Buffer.from([i])], ORE_PROGRAM_ID)[0]
)

export const TREASURY_TOKENS = getAssociatedTokenAddressSync(ORE_MINT, TREASURY_ADDRESS, true)

export function proofAddress(authority: PublicKey): PublicKey {
  return PublicKey.findProgramAddressSync([PROOF_SEED, authority.toBuffer()], ORE_PROGRAM_ID)[0]
}

export function oreTokenAccount(owner: PublicKey): PublicKey {
  return getAssociatedTokenAddressSync(ORE_MINT, owner)
}

export function busAddress(id: number): PublicKey {
  const address = BUS_ADDRESSES[id]
  if (!address) throw fail('NETWORK_ACCOUNT_INVALID', { message: `unknown bus id ${id}` })
  return address
}

enum OreInstruction {
  Mine = 2,
  Claim = 3,
}

export function mineInstruction(signer: PublicKey, bus: PublicKey, hash: Uint8Array, nonce: bigint): TransactionInstruction {
  const data = Buffer.alloc(1 + 32 + 8)
  data.writeUInt8(OreInstruction.Mine, 0)
  data.set(hash.subarray(0, 32), 1)
  data.writeBigUInt64LE(nonce, 33)
  return new TransactionInstruction({
    programId: ORE_PROGRAM_ID,
    keys: [
      { pubkey: signer, isSigner: true, isWritable: true },
      { pubkey: bus, isSigner: false, isWritable: true },
      { pubkey: proofAddress(signer), isSigner: false, isWritable: true },
      { pubkey: TREASURY_ADDRESS, isSigner: false, isWritable: false },
      { pubkey: SYSVAR_SLOT_HASHES_PUBKEY, isSigner: false, isWritable: false },
    ],
    data,
  })
}

export function claimInstruction(signer: PublicKey, beneficiary: PublicKey, amount: bigint): TransactionInstruction {
  const data = Buffer.alloc(1 + 8)
  data.writeUInt8(OreInstruction.Claim, 0)
  data.writeBigUInt64LE(amount, 1)
  return new TransactionInstruction({
    programId: ORE_PROGRAM_ID,
    keys: [
      { pubkey: signer, isSigner: true, isWritable: true },
      { pubkey: beneficiary, isSigner: false, isWritable: true },
      { pubkey: proofAddress(signer), isSigner: false, isWritable: true },
      { pubkey: TREASURY_ADDRESS, isSigner: false, isWritable: true },
      { pubkey: TREASURY_TOKENS, isSigner: false, isWritable: true },
      { pubkey: TOKEN_PROGRAM_ID, isSigner: false, isWritable: false },
    ],
    data,
  })
}

// ---- Account layouts ----

const DISCRIMINATOR_LEN = 8

function requireLength(name: string, data: Buffer, len: number) {
  if (data.length < len) {
    throw fail('NETWORK_ACCOUNT_INVALID', { message: `${name} account too short (${data.length} < ${len})` })
  }
}

/** bump u64 | admin 32 | difficulty 32 | last_reset_at i64 | reward_rate u64 | total_claimed_rewards u64 */
export function decodeTreasury(data: Buffer): Treasury {
  requireLength('treasury', data, DISCRIMINATOR_LEN + 96)
  return {
    difficulty: Uint8Array.from(data.subarray(48, 80)),
    lastResetAt: Number(data.readBigInt64LE(80)),
    rewardRate: data.readBigUInt64LE(88),
  }
}

/** id u64 | rewards u64 */
export function decodeBus(data: Buffer): Bus {
  requireLength('bus', data, DISCRIMINATOR_LEN + 16)
  return {
    id: Number(data.readBigUInt64LE(8)),
    rewards: data.readBigUInt64LE(16),
  }
}

/** authority 32 | claimable_rewards u64 | hash 32 | total_hashes u64 | total_rewards u64 */
export function decodeProof(data: Buffer): Proof {
  requireLength('proof', data, DISCRIMINATOR_LEN + 72)
  return {
    authority: new PublicKey(data.subarray(8, 40)).toBase58(),
    claimableRewards: data.readBigUInt64LE(40),
    hash: Uint8Array.from(data.subarray(48, 80)),
  }
}

/** Clock sysvar (bincode, no discriminator): slot | epoch_start_timestamp | epoch | leader_schedule_epoch | unix_timestamp */
export function decodeClock(data: Buffer): ClockState {
  requireLength('clock', data, 40)
  return {
    slot: Number(data.readBigUInt64LE(0)),
    unixTimestamp: Number(data.readBigInt64LE(32)),
  }
}
