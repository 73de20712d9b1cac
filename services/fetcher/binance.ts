import { Agent, request, type Dispatcher } from 'undici'
import type Decimal from 'decimal.js'
import type { BookTicker, Candle, DailyStats, OrderBook, PriceTick, Trade } from '../../types/market_raw'
import type { FetcherConfig } from '../config'
import { isDebugApi } from '../config'
import { ResponseError, TransportError, errorMessage } from './errors'
import {
  assertDepthLimit, assertInterval, clampListLimit, normalizeSymbol, parseAvgPrice, parseBookTicker, parseCandles,
  parseDailyStats, parseOrderBook, parsePriceTick, parseServerTime, parseTrades,
} from './normalize'

type Params = Record<string, string | number>

export type BinanceClientOptions = {
  // Replaces the pooled Agent (tests pass an undici MockAgent)
  dispatcher?: Dispatcher
  debug?: boolean
}

function isAbortError(e: unknown): boolean {
  return e instanceof Error && (e.name === 'AbortError' || e.name === 'TimeoutError')
}

function apiErrorBody(text: string): { code?: number; msg?: string } {
  let parsed: unknown
  try { parsed = JSON.parse(text) } catch { return {} } // not JSON (proxy error page etc.)
  if (!parsed || typeof parsed !== 'object') return {}
  const code = 'code' in parsed && typeof parsed.code === 'number' ? parsed.code : undefined
  const msg = 'msg' in parsed && typeof parsed.msg === 'string' ? parsed.msg : undefined
  return { code, msg }
}

/**
 * Client for the public Binance spot REST API.
 *
 * Every call goes through one keep-alive Agent so concurrent requests of a
 * snapshot share connections. Nothing is retried: failures surface as
 * TransportError (no response) or ResponseError (bad status or payload).
 */
export class BinanceClient {
  private readonly dispatcher: Dispatcher
  private readonly ownsDispatcher: boolean
  private readonly debug: boolean

  constructor(private readonly cfg: FetcherConfig, opts: BinanceClientOptions = {}) {
    this.ownsDispatcher = !opts.dispatcher
    this.dispatcher = opts.dispatcher ?? new Agent({ keepAliveTimeout: cfg.keepAliveMs, keepAliveMaxTimeout: cfg.keepAliveMs })
    this.debug = opts.debug ?? isDebugApi()
  }

  async close(): Promise<void> {
    if (this.ownsDispatcher) await this.dispatcher.close()
  }

  private async httpGet(path: string, params?: Params): Promise<unknown> {
    const qs = params ? new URLSearchParams(Object.entries(params).map<[string, string]>(([k, v]) => [k, String(v)])).toString() : ''
    const url = `${this.cfg.baseUrl}${path}${qs ? `?${qs}` : ''}`
    const ac = new AbortController()
    const to = setTimeout(() => ac.abort(), this.cfg.timeoutMs)
    const t0 = Date.now()
    try {
      let res: Dispatcher.ResponseData
      try {
        res = await request(url, { method: 'GET', signal: ac.signal, dispatcher: this.dispatcher })
      } catch (e) {
        if (isAbortError(e)) throw new TransportError(path, `timeout after ${this.cfg.timeoutMs}ms ${path}`, { timeout: true, cause: e })
        throw new TransportError(path, `request failed ${path}: ${errorMessage(e)}`, { cause: e })
      }
      let text: string
      try {
        text = await res.body.text()
      } catch (e) {
        throw new TransportError(path, `body read failed ${path}: ${errorMessage(e)}`, { timeout: isAbortError(e), cause: e })
      }
      if (this.debug) console.error('[FETCHER]', res.statusCode, path, qs, `${Date.now() - t0}ms`)
      if (res.statusCode < 200 || res.statusCode >= 300) {
        const api = apiErrorBody(text)
        const detail = api.msg ? `: ${api.msg}` : ''
        throw new ResponseError(path, `HTTP ${res.statusCode} ${path}${detail}`, { statusCode: res.statusCode, apiCode: api.code })
      }
      try {
        const data: unknown = JSON.parse(text)
        return data
      } catch (e) {
        throw new ResponseError(path, `malformed JSON from ${path}`, { statusCode: res.statusCode, cause: e })
      }
    } finally {
      clearTimeout(to)
    }
  }

  async ping(): Promise<boolean> {
    try {
      await this.httpGet('/api/v3/ping')
      return true
    } catch (e) {
      if (this.debug) console.error('[FETCHER] ping failed', errorMessage(e))
      return false
    }
  }

  async getServerTime(): Promise<number> {
    const path = '/api/v3/time'
    return parseServerTime(path, await this.httpGet(path))
  }

  async getPrice(symbol: string): Promise<PriceTick> {
    const path = '/api/v3/ticker/price'
    return parsePriceTick(path, await this.httpGet(path, { symbol: normalizeSymbol(symbol) }))
  }

  async getDailyStats(symbol: string): Promise<DailyStats> {
    const path = '/api/v3/ticker/24hr'
    return parseDailyStats(path, await this.httpGet(path, { symbol: normalizeSymbol(symbol) }))
  }

  async getOrderBook(symbol: string, limit = 20): Promise<OrderBook> {
    const path = '/api/v3/depth'
    const sym = normalizeSymbol(symbol)
    const depth = assertDepthLimit(limit)
    return parseOrderBook(path, sym, await this.httpGet(path, { symbol: sym, limit: depth }))
  }

  async getRecentTrades(symbol: string, limit = 100): Promise<Trade[]> {
    const path = '/api/v3/trades'
    const sym = normalizeSymbol(symbol)
    return parseTrades(path, await this.httpGet(path, { symbol: sym, limit: clampListLimit(limit, 'trades') }))
  }

  async getCandles(symbol: string, interval = '1h', limit = 100): Promise<Candle[]> {
    const path = '/api/v3/klines'
    const sym = normalizeSymbol(symbol)
    const itv = assertInterval(interval)
    return parseCandles(path, await this.httpGet(path, { symbol: sym, interval: itv, limit: clampListLimit(limit, 'klines') }))
  }

  // 5-minute average served by Binance
  async getAvgPrice(symbol: string): Promise<Decimal> {
    const path = '/api/v3/avgPrice'
    return parseAvgPrice(path, await this.httpGet(path, { symbol: normalizeSymbol(symbol) }))
  }

  async getBestBidAsk(symbol: string): Promise<BookTicker> {
    const path = '/api/v3/ticker/bookTicker'
    return parseBookTicker(path, await this.httpGet(path, { symbol: normalizeSymbol(symbol) }))
  }
}
