import Decimal from 'decimal.js'
import type { BinanceClient } from '../fetcher/binance'
import type { FetcherConfig, TimeframeConfig } from '../config'
import { isDebugApi } from '../config'
import type { Candle } from '../../types/market_raw'
import type { InfoView, MarketSnapshot } from '../../types/snapshot'
import { normalizeSymbol } from '../fetcher/normalize'
import { analyzeDepth, analyzeTrades, changePercentConsistent, recomputeChangePercent, spreadFromBookTicker } from './analytics'

export type MarketDataSource = Pick<BinanceClient,
  'getPrice' | 'getDailyStats' | 'getOrderBook' | 'getRecentTrades' | 'getCandles' | 'getAvgPrice' | 'getBestBidAsk'>

export type SnapshotOptions = Pick<FetcherConfig, 'depthLimit' | 'tradesLimit' | 'topLevels' | 'timeframes'> & {
  now?: () => Date
}

// Decimal instances are left alone: they are immutable by API but not frozen-safe
function deepFreeze<T>(value: T): T {
  if (value instanceof Decimal) return value
  if (value && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value)
    for (const v of Object.values(value)) deepFreeze(v)
  }
  return value
}

async function fetchTimeframe(src: MarketDataSource, symbol: string, tf: TimeframeConfig): Promise<[string, Candle[]]> {
  const candles = await src.getCandles(symbol, tf.interval, tf.limit)
  return [tf.interval, candles.slice(-tf.keep)]
}

/**
 * Fetches everything for one symbol concurrently and assembles the snapshot.
 * Any failing call rejects the whole build; a partial snapshot is never returned.
 */
export async function buildMarketSnapshot(src: MarketDataSource, rawSymbol: string, opts: SnapshotOptions): Promise<MarketSnapshot> {
  const symbol = normalizeSymbol(rawSymbol)
  const now = opts.now ?? (() => new Date())
  const t0 = Date.now()

  const [price, stats, book, trades, avgPrice, bookTicker, klineEntries] = await Promise.all([
    src.getPrice(symbol),
    src.getDailyStats(symbol),
    src.getOrderBook(symbol, opts.depthLimit),
    src.getRecentTrades(symbol, opts.tradesLimit),
    src.getAvgPrice(symbol),
    src.getBestBidAsk(symbol),
    Promise.all(opts.timeframes.map(tf => fetchTimeframe(src, symbol, tf))),
  ])

  const dataWarnings: string[] = []
  if (!changePercentConsistent(stats)) {
    const recomputed = recomputeChangePercent(stats)
    const msg = `price_change_percent_mismatch: api=${stats.priceChangePercent.toString()} recomputed=${recomputed ? recomputed.toFixed(3) : 'n/a'}`
    console.warn('[SNAPSHOT]', symbol, msg)
    dataWarnings.push(msg)
  }

  const snapshot: MarketSnapshot = {
    timestamp: now().toISOString(),
    symbol,
    summary: {
      price: price.price,
      avg_price_5m: avgPrice,
      price_change_24h: stats.priceChange,
      price_change_percent_24h: stats.priceChangePercent,
      high_24h: stats.highPrice,
      low_24h: stats.lowPrice,
      volume_24h: stats.volume,
      quote_volume_24h: stats.quoteVolume,
      trade_count_24h: stats.count,
    },
    book_ticker: bookTicker,
    spread: spreadFromBookTicker(bookTicker),
    depth_analysis: analyzeDepth(book.bids, book.asks, opts.topLevels),
    trade_analysis: analyzeTrades(trades),
    klines: Object.fromEntries(klineEntries),
    data_warnings: dataWarnings,
  }
  if (isDebugApi()) console.error('[SNAPSHOT]', symbol, `assembled in ${Date.now() - t0}ms`)
  return deepFreeze(snapshot)
}

export async function buildInfoView(src: Pick<MarketDataSource, 'getDailyStats' | 'getBestBidAsk'>, rawSymbol: string, now: () => Date = () => new Date()): Promise<InfoView> {
  const symbol = normalizeSymbol(rawSymbol)
  const [stats, bookTicker] = await Promise.all([src.getDailyStats(symbol), src.getBestBidAsk(symbol)])
  return deepFreeze({ timestamp: now().toISOString(), symbol, stats, book_ticker: bookTicker, spread: spreadFromBookTicker(bookTicker) })
}
