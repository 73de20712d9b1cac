import { promises as fs } from 'node:fs'
import os from 'node:os'
import path from 'node:path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { runMarketSnapshot, type CliClient, type CliDeps } from './cli'
import type { FetcherConfig } from '../services/config'
import { BASE_URL, fixtureSource } from '../services/testing/binance_mock'

const NOW = () => new Date('2026-10-19T12:00:00.000Z')

type Harness = { deps: CliDeps; out: string[]; err: string[]; configs: FetcherConfig[]; closed: () => number }

function harness(opts: { reachable?: boolean; env?: Record<string, string> } = {}): Harness {
  const out: string[] = []
  const err: string[] = []
  const configs: FetcherConfig[] = []
  let closed = 0
  const createClient = (cfg: FetcherConfig): CliClient => {
    configs.push(cfg)
    return {
      ...fixtureSource(),
      ping: async () => opts.reachable ?? true,
      close: async () => { closed++ },
    }
  }
  const deps: CliDeps = {
    env: { BINANCE_BASE_URL: BASE_URL, ...opts.env },
    createClient,
    out: line => out.push(line),
    err: line => err.push(line),
    now: NOW,
  }
  return { deps, out, err, configs, closed: () => closed }
}

describe('market-snapshot CLI', () => {
  let dir: string

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'market-snapshot-cli-'))
  })

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true })
  })

  it('prints the report, saves the file and exits 0', async () => {
    const h = harness()
    const code = await runMarketSnapshot(['ethusdt', '--out', dir], h.deps)
    expect(code).toBe(0)
    expect(h.err).toEqual([])
    expect(h.out).toContain('  MARKET SNAPSHOT - ETHUSDT')
    expect(h.out).toContain('  Price: $3,890.45')
    expect(h.out.slice(-2)).toEqual([`  Snapshot saved to: ${path.join(dir, 'ethusdt_20261019_120000.json')}`, '='.repeat(80)])
    expect(h.configs[0].snapshotDir).toBe(dir)
    expect(h.closed()).toBe(1)
    expect(await fs.readdir(dir)).toEqual(['ethusdt_20261019_120000.json'])
  })

  it('takes the output directory from SNAPSHOT_DIR', async () => {
    const h = harness({ env: { SNAPSHOT_DIR: dir } })
    expect(await runMarketSnapshot(['BTC/USDT'], h.deps)).toBe(0)
    expect(await fs.readdir(dir)).toEqual(['btcusdt_20261019_120000.json'])
  })

  it('info mode prints basic stats and writes nothing', async () => {
    const h = harness()
    const code = await runMarketSnapshot(['ETHUSDT', 'info', '--out', dir], h.deps)
    expect(code).toBe(0)
    expect(h.out).toContain('  Mode: info')
    expect(h.out).toContain('  Best Ask: $3,890.01 (8.2000)')
    expect(h.out[h.out.length - 1]).toBe('='.repeat(80))
    expect(await fs.readdir(dir)).toEqual([])
  })

  it('rejects an unknown mode', async () => {
    const h = harness()
    expect(await runMarketSnapshot(['ETHUSDT', 'full'], h.deps)).toBe(1)
    expect(h.err).toEqual(['Error: unknown mode "full": expected snapshot or info'])
    expect(h.configs).toHaveLength(0)
  })

  it('rejects a malformed symbol before connecting', async () => {
    const h = harness()
    expect(await runMarketSnapshot(['ETH-USDT'], h.deps)).toBe(1)
    expect(h.err).toEqual(['Error: invalid symbol "ETH-USDT": expected letters and digits only (e.g. ETHUSDT)'])
    expect(h.configs).toHaveLength(0)
  })

  it('exits 1 on a missing symbol argument', async () => {
    const h = harness()
    expect(await runMarketSnapshot([], h.deps)).toBe(1)
    expect(h.err).toEqual(["error: missing required argument 'symbol'"])
  })

  it('reports an unreachable API and still closes the client', async () => {
    const h = harness({ reachable: false })
    expect(await runMarketSnapshot(['ETHUSDT', '--out', dir], h.deps)).toBe(1)
    expect(h.err).toEqual([`Error: cannot connect to Binance API at ${BASE_URL}`])
    expect(h.out).toEqual([])
    expect(h.closed()).toBe(1)
  })

  it('keeps the printed report when saving fails', async () => {
    const blocker = path.join(dir, 'file')
    await fs.writeFile(blocker, 'x')
    const h = harness()
    const code = await runMarketSnapshot(['ETHUSDT', '--out', path.join(blocker, 'sub')], h.deps)
    expect(code).toBe(1)
    expect(h.out).toContain('  Symbol: ETHUSDT')
    expect(h.out[h.out.length - 1]).toBe('='.repeat(80))
    expect(h.err).toHaveLength(1)
    expect(h.err[0].startsWith(`Error: failed to write snapshot ${path.join(blocker, 'sub', 'ethusdt_20261019_120000.json')}`)).toBe(true)
  })
})
