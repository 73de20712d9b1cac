import { describe, expect, it } from 'vitest'
import { InvalidArgumentError } from './fetcher/errors'
import { isDebugApi, resolveConfig } from './config'

describe('resolveConfig', () => {
  it('falls back to config/fetcher.json', () => {
    const cfg = resolveConfig({})
    expect(cfg.baseUrl).toBe('https://api.binance.com')
    expect(cfg.timeoutMs).toBe(10000)
    expect(cfg.snapshotDir).toBe('snapshots')
    expect(cfg.depthLimit).toBe(20)
    expect(cfg.timeframes.map(tf => `${tf.interval}:${tf.limit}:${tf.keep}`)).toEqual(['1h:24:6', '4h:42:6', '1d:30:7'])
  })

  it('applies environment variables, then explicit overrides', () => {
    const env = { BINANCE_BASE_URL: 'https://api.binance.test/', REQUEST_TIMEOUT_MS: '2500', SNAPSHOT_DIR: 'env-dir' }
    const cfg = resolveConfig(env)
    expect(cfg.baseUrl).toBe('https://api.binance.test')
    expect(cfg.timeoutMs).toBe(2500)
    expect(cfg.snapshotDir).toBe('env-dir')
    expect(resolveConfig(env, { snapshotDir: 'cli-dir' }).snapshotDir).toBe('cli-dir')
  })

  it('ignores blank environment values', () => {
    expect(resolveConfig({ REQUEST_TIMEOUT_MS: ' ', SNAPSHOT_DIR: '' })).toMatchObject({ timeoutMs: 10000, snapshotDir: 'snapshots' })
  })

  it('rejects a non-integer timeout', () => {
    expect(() => resolveConfig({ REQUEST_TIMEOUT_MS: '1.5s' })).toThrow(InvalidArgumentError)
    expect(() => resolveConfig({ REQUEST_TIMEOUT_MS: '1.5s' })).toThrow('REQUEST_TIMEOUT_MS must be an integer, got "1.5s"')
  })

  it('validates the merged result', () => {
    expect(() => resolveConfig({}, { timeoutMs: 0 })).toThrow('invalid configuration')
    expect(() => resolveConfig({ BINANCE_BASE_URL: 'not a url' })).toThrow(InvalidArgumentError)
  })
})

describe('isDebugApi', () => {
  it('accepts 1, true and yes in any case', () => {
    expect(isDebugApi({ DEBUG_API: '1' })).toBe(true)
    expect(isDebugApi({ DEBUG_API: 'TRUE' })).toBe(true)
    expect(isDebugApi({ DEBUG_API: 'yes' })).toBe(true)
    expect(isDebugApi({ DEBUG_API: '0' })).toBe(false)
    expect(isDebugApi({})).toBe(false)
  })
})
