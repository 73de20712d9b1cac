import { Command, CommanderError } from 'commander'
import { BinanceClient } from '../services/fetcher/binance'
import { InvalidArgumentError, MarketDataError, TransportError, errorMessage } from '../services/fetcher/errors'
import type { FetcherConfig } from '../services/config'
import { isDebugApi, resolveConfig } from '../services/config'
import { normalizeSymbol } from '../services/fetcher/normalize'
import { buildInfoView, buildMarketSnapshot, type MarketDataSource } from '../services/snapshot/build_snapshot'
import { footer, renderInfoReport, renderSnapshotReport } from '../services/report/console_report'
import { saveSnapshot } from '../services/report/persist'

export type CliClient = MarketDataSource & Pick<BinanceClient, 'ping' | 'close'>

export type CliDeps = {
  env: Record<string, string | undefined>
  createClient: (cfg: FetcherConfig) => CliClient
  out: (line: string) => void
  err: (line: string) => void
  now?: () => Date
}

export const defaultDeps = (): CliDeps => ({
  env: process.env,
  createClient: cfg => new BinanceClient(cfg),
  out: line => process.stdout.write(`${line}\n`),
  err: line => process.stderr.write(`${line}\n`),
})

type Mode = 'snapshot' | 'info'
type CliOptions = { out?: string }

function parseMode(raw: string): Mode {
  const v = raw.toLowerCase()
  if (v === 'snapshot' || v === 'info') return v
  throw new InvalidArgumentError(`unknown mode "${raw}": expected snapshot or info`)
}

async function runSnapshot(client: CliClient, cfg: FetcherConfig, symbol: string, deps: CliDeps): Promise<number> {
  const snapshot = await buildMarketSnapshot(client, symbol, { ...cfg, now: deps.now })
  for (const line of renderSnapshotReport(snapshot)) deps.out(line)
  // the report is already out; a failed write only changes the exit code
  let code = 0
  try {
    const file = await saveSnapshot(snapshot, cfg.snapshotDir)
    deps.out(`  Snapshot saved to: ${file}`)
  } catch (e) {
    deps.err(`Error: ${errorMessage(e)}`)
    code = 1
  }
  deps.out(footer())
  return code
}

async function runInfo(client: CliClient, symbol: string, deps: CliDeps): Promise<number> {
  const view = await buildInfoView(client, symbol, deps.now)
  for (const line of renderInfoReport(view)) deps.out(line)
  deps.out(footer())
  return 0
}

/**
 * market-snapshot <symbol> [mode]
 *
 * Resolves to the process exit code; never calls process.exit itself.
 */
export async function runMarketSnapshot(argv: string[], deps: CliDeps = defaultDeps()): Promise<number> {
  let exitCode = 0
  const program = new Command()
  program
    .name('market-snapshot')
    .description('Market analytics snapshot from Binance public market data (no API key needed)')
    .argument('<symbol>', 'trading pair, e.g. ETHUSDT')
    .argument('[mode]', 'snapshot (fetch, print and save) or info (print basic stats only)', 'snapshot')
    .option('-o, --out <dir>', 'snapshot output directory (default from config/fetcher.json or SNAPSHOT_DIR)')
    .exitOverride()
    .configureOutput({ writeOut: s => deps.out(s.trimEnd()), writeErr: s => deps.err(s.trimEnd()) })
    .addHelpText('after', '\nExamples:\n  market-snapshot ETHUSDT\n  market-snapshot BTCUSDT info\n  market-snapshot SOLUSDT --out ./data')
    .action(async (rawSymbol: string, modeRaw: string, opts: CliOptions) => {
      const symbol = normalizeSymbol(rawSymbol)
      const mode = parseMode(modeRaw)
      const cfg = resolveConfig(deps.env, opts.out ? { snapshotDir: opts.out } : {})
      if (isDebugApi(deps.env)) console.error('[CLI]', `running ${mode} for ${symbol}`)
      const client = deps.createClient(cfg)
      try {
        if (!(await client.ping())) throw new TransportError('/api/v3/ping', `cannot connect to Binance API at ${cfg.baseUrl}`)
        exitCode = mode === 'info' ? await runInfo(client, symbol, deps) : await runSnapshot(client, cfg, symbol, deps)
      } finally {
        await client.close()
      }
    })

  try {
    await program.parseAsync(argv, { from: 'user' })
  } catch (e) {
    if (e instanceof CommanderError) return e.exitCode
    if (e instanceof MarketDataError) {
      if (isDebugApi(deps.env)) console.error('[CLI] failed', { stage: e.stage, name: e.name })
      deps.err(`Error: ${e.message}`)
      return 1
    }
    deps.err(`Error: ${errorMessage(e)}`)
    return 1
  }
  return exitCode
}
