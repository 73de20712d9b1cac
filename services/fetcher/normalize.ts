import Ajv, { type ValidateFunction } from 'ajv'
import Decimal from 'decimal.js'
import tickerPriceSchema from '../../schemas/binance/ticker_price.schema.json'
import ticker24hSchema from '../../schemas/binance/ticker_24hr.schema.json'
import depthSchema from '../../schemas/binance/depth.schema.json'
import tradesSchema from '../../schemas/binance/trades.schema.json'
import klinesSchema from '../../schemas/binance/klines.schema.json'
import avgPriceSchema from '../../schemas/binance/avg_price.schema.json'
import bookTickerSchema from '../../schemas/binance/book_ticker.schema.json'
import serverTimeSchema from '../../schemas/binance/server_time.schema.json'
import { DEPTH_LIMITS, KLINE_INTERVALS } from '../../types/market_raw'
import type {
  BookTicker, Candle, DailyStats, DepthLimit, KlineInterval, OrderBook, PriceTick, RawAvgPrice, RawBookTicker,
  RawDepth, RawKline, RawServerTime, RawTicker24h, RawTickerPrice, RawTrade, Trade,
} from '../../types/market_raw'
import { InvalidArgumentError, ResponseError } from './errors'

export const MAX_LIST_LIMIT = 1000

const ajv = new Ajv({ allErrors: true, strictTuples: false })
const validateTickerPrice = ajv.compile<RawTickerPrice>(tickerPriceSchema)
const validateTicker24h = ajv.compile<RawTicker24h>(ticker24hSchema)
const validateDepth = ajv.compile<RawDepth>(depthSchema)
const validateTrades = ajv.compile<RawTrade[]>(tradesSchema)
const validateKlines = ajv.compile<RawKline[]>(klinesSchema)
const validateAvgPrice = ajv.compile<RawAvgPrice>(avgPriceSchema)
const validateBookTicker = ajv.compile<RawBookTicker>(bookTickerSchema)
const validateServerTime = ajv.compile<RawServerTime>(serverTimeSchema)

function check<T>(validate: ValidateFunction<T>, name: string, path: string, payload: unknown): T {
  if (validate(payload)) return payload
  throw new ResponseError(path, `schema_invalid:${name} ${ajv.errorsText(validate.errors)}`)
}

export const toDecimal = (v: string | number): Decimal => new Decimal(v)

export function normalizeSymbol(raw: string): string {
  const v = String(raw || '').trim().toUpperCase().replace('/', '')
  if (!v) throw new InvalidArgumentError('symbol must not be empty')
  if (!/^[A-Z0-9]+$/.test(v)) throw new InvalidArgumentError(`invalid symbol "${raw}": expected letters and digits only (e.g. ETHUSDT)`)
  return v
}

export function assertDepthLimit(limit: number): DepthLimit {
  const hit = DEPTH_LIMITS.find(l => l === limit)
  if (hit === undefined) throw new InvalidArgumentError(`invalid depth limit ${limit}: expected one of ${DEPTH_LIMITS.join(', ')}`)
  return hit
}

// Binance caps list endpoints at 1000 rows; larger requests are clamped, not rejected
export function clampListLimit(limit: number, name: string): number {
  if (!Number.isInteger(limit) || limit < 1) throw new InvalidArgumentError(`invalid ${name} limit ${limit}: expected a positive integer`)
  return Math.min(limit, MAX_LIST_LIMIT)
}

export function assertInterval(interval: string): KlineInterval {
  const hit = KLINE_INTERVALS.find(i => i === interval)
  if (hit === undefined) throw new InvalidArgumentError(`invalid kline interval "${interval}": expected one of ${KLINE_INTERVALS.join(', ')}`)
  return hit
}

export function parsePriceTick(path: string, payload: unknown): PriceTick {
  const raw = check(validateTickerPrice, 'ticker_price', path, payload)
  return { symbol: raw.symbol, price: toDecimal(raw.price) }
}

export function parseDailyStats(path: string, payload: unknown): DailyStats {
  const raw = check(validateTicker24h, 'ticker_24hr', path, payload)
  return {
    symbol: raw.symbol,
    priceChange: toDecimal(raw.priceChange),
    priceChangePercent: toDecimal(raw.priceChangePercent),
    weightedAvgPrice: toDecimal(raw.weightedAvgPrice),
    prevClosePrice: toDecimal(raw.prevClosePrice),
    lastPrice: toDecimal(raw.lastPrice),
    bidPrice: toDecimal(raw.bidPrice),
    askPrice: toDecimal(raw.askPrice),
    openPrice: toDecimal(raw.openPrice),
    highPrice: toDecimal(raw.highPrice),
    lowPrice: toDecimal(raw.lowPrice),
    volume: toDecimal(raw.volume),
    quoteVolume: toDecimal(raw.quoteVolume),
    openTime: raw.openTime,
    closeTime: raw.closeTime,
    count: raw.count,
  }
}

export function parseOrderBook(path: string, symbol: string, payload: unknown): OrderBook {
  const raw = check(validateDepth, 'depth', path, payload)
  const toLevel = ([p, q]: [string, string]) => ({ price: toDecimal(p), quantity: toDecimal(q) })
  return { symbol, lastUpdateId: raw.lastUpdateId, bids: raw.bids.map(toLevel), asks: raw.asks.map(toLevel) }
}

export function parseTrades(path: string, payload: unknown): Trade[] {
  const raw = check(validateTrades, 'trades', path, payload)
  return raw.map(t => ({
    id: t.id,
    price: toDecimal(t.price),
    qty: toDecimal(t.qty),
    quoteQty: toDecimal(t.quoteQty),
    time: t.time,
    isBuyerMaker: t.isBuyerMaker,
  }))
}

export function parseCandles(path: string, payload: unknown): Candle[] {
  const raw = check(validateKlines, 'klines', path, payload)
  return raw.map(k => ({
    openTime: k[0],
    open: toDecimal(k[1]),
    high: toDecimal(k[2]),
    low: toDecimal(k[3]),
    close: toDecimal(k[4]),
    volume: toDecimal(k[5]),
    closeTime: k[6],
    quoteVolume: toDecimal(k[7]),
    trades: k[8],
    takerBuyVolume: toDecimal(k[9]),
    takerBuyQuoteVolume: toDecimal(k[10]),
  }))
}

export function parseAvgPrice(path: string, payload: unknown): Decimal {
  return toDecimal(check(validateAvgPrice, 'avg_price', path, payload).price)
}

export function parseBookTicker(path: string, payload: unknown): BookTicker {
  const raw = check(validateBookTicker, 'book_ticker', path, payload)
  return {
    symbol: raw.symbol,
    bidPrice: toDecimal(raw.bidPrice),
    bidQty: toDecimal(raw.bidQty),
    askPrice: toDecimal(raw.askPrice),
    askQty: toDecimal(raw.askQty),
  }
}

export function parseServerTime(path: string, payload: unknown): number {
  return check(validateServerTime, 'server_time', path, payload).serverTime
}
