import fs from 'node:fs'
import path from 'node:path'
import Ajv from 'ajv'
import addFormats from 'ajv-formats'
import dotenv from 'dotenv'
import defaults from '../config/fetcher.json'
import configSchema from '../schemas/fetcher_config.schema.json'
import type { DepthLimit, KlineInterval } from '../types/market_raw'
import { InvalidArgumentError } from './fetcher/errors'

export type TimeframeConfig = {
  interval: KlineInterval
  limit: number
  keep: number
}

export type FetcherConfig = {
  baseUrl: string
  timeoutMs: number
  keepAliveMs: number
  snapshotDir: string
  depthLimit: DepthLimit
  tradesLimit: number
  topLevels: number
  timeframes: TimeframeConfig[]
}

const ajv = new Ajv({ allErrors: true })
addFormats(ajv)
const validateConfig = ajv.compile<FetcherConfig>(configSchema)

type Env = Record<string, string | undefined>

export function loadEnvFiles(cwd: string = process.cwd()): void {
  const tryLoad = (p: string) => { if (fs.existsSync(p)) dotenv.config({ path: p }) }
  tryLoad(path.resolve(cwd, '.env.local'))
  tryLoad(path.resolve(cwd, '.env'))
}

export function isDebugApi(env: Env = process.env): boolean {
  const v = String(env.DEBUG_API || '').toLowerCase()
  return v === 'true' || v === '1' || v === 'yes'
}

function intFromEnv(env: Env, key: string): number | undefined {
  const raw = env[key]
  if (raw === undefined || raw.trim() === '') return undefined
  const n = Number(raw)
  if (!Number.isInteger(n)) throw new InvalidArgumentError(`${key} must be an integer, got "${raw}"`)
  return n
}

// Precedence: overrides > environment > config/fetcher.json
export function resolveConfig(env: Env = process.env, overrides: Partial<FetcherConfig> = {}): FetcherConfig {
  const timeoutMs = intFromEnv(env, 'REQUEST_TIMEOUT_MS')
  const merged: unknown = {
    ...defaults,
    ...(env.BINANCE_BASE_URL ? { baseUrl: env.BINANCE_BASE_URL } : {}),
    ...(timeoutMs !== undefined ? { timeoutMs } : {}),
    ...(env.SNAPSHOT_DIR ? { snapshotDir: env.SNAPSHOT_DIR } : {}),
    ...overrides,
  }
  if (!validateConfig(merged)) throw new InvalidArgumentError(`invalid configuration: ${ajv.errorsText(validateConfig.errors)}`)
  return { ...merged, baseUrl: merged.baseUrl.replace(/\/+$/, '') }
}
