import path from 'path'
import { isReasoned } from '@orebm/reasons'
import { CONSTANTS, loadEnv } from '../../src/config'

describe('loadEnv', () => {
  test('falls back to defaults for unset and blank values', () => {
    const cfg = loadEnv({ TIP_FLOOR: '  ', LOG_LEVEL: '' })
    expect(cfg).toMatchObject({
      rpcUrl: 'https://api.mainnet-beta.solana.com',
      jitoBlockEngineUrl: 'https://ny.mainnet.block-engine.jito.wtf',
      tipFloor: 30_000,
      logLevel: 'info',
    })
    expect(cfg.priorityFee).toBeUndefined()
    expect(cfg.metricsPort).toBeUndefined()
    expect(cfg.nonceWorkerPath.endsWith(path.join('bin', 'nonce-worker'))).toBe(true)
  })

  test('coerces numeric values', () => {
    const cfg = loadEnv({ PRIORITY_FEE: '50000', METRICS_PORT: '9464', TIP_FLOOR: '1000' })
    expect(cfg.priorityFee).toBe(50_000)
    expect(cfg.metricsPort).toBe(9464)
    expect(cfg.tipFloor).toBe(1_000)
  })

  test('names every invalid variable', () => {
    let err: unknown
    try {
      loadEnv({ PRIORITY_FEE: 'abc', METRICS_PORT: '70000' })
    } catch (e) {
      err = e
    }
    expect(isReasoned(err, 'CONFIG_INVALID')).toBe(true)
    const message = err instanceof Error ? err.message : ''
    expect(message).toContain('PRIORITY_FEE')
    expect(message).toContain('METRICS_PORT')
  })

  test('bundle limits multiply to the batch size', () => {
    expect(CONSTANTS.MAX_TXS_PER_BUNDLE * CONSTANTS.MAX_PROOFS_PER_TX).toBe(CONSTANTS.BATCH_SIZE)
  })
})
