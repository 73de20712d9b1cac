import Decimal from 'decimal.js'
import type { BookTicker, Candle, DailyStats, OrderBookLevel, Trade } from '../../types/market_raw'
import type { DepthAnalysis, SpreadAnalysis, TradeAnalysis } from '../../types/snapshot'

const ZERO = new Decimal(0)
const HUNDRED = new Decimal(100)

// null rather than a throw: an empty side is a valid (if rare) market state
export function safeRatio(num: Decimal, den: Decimal): Decimal | null {
  return den.isZero() ? null : num.div(den)
}

export function sumQuantities(levels: readonly OrderBookLevel[]): Decimal {
  return levels.reduce((acc, l) => acc.plus(l.quantity), ZERO)
}

export function analyzeDepth(bids: readonly OrderBookLevel[], asks: readonly OrderBookLevel[], topLevels = 5): DepthAnalysis {
  const totalBid = sumQuantities(bids)
  const totalAsk = sumQuantities(asks)
  return {
    total_bid_depth: totalBid,
    total_ask_depth: totalAsk,
    bid_ask_ratio: safeRatio(totalBid, totalAsk),
    top_bids: bids.slice(0, topLevels),
    top_asks: asks.slice(0, topLevels),
  }
}

// Taker-initiated buy <=> buyer was not the maker
export function analyzeTrades(trades: readonly Trade[]): TradeAnalysis {
  const buys = trades.filter(t => !t.isBuyerMaker).length
  const sells = trades.length - buys
  const totalQty = trades.reduce((acc, t) => acc.plus(t.qty), ZERO)
  return {
    total_trades: trades.length,
    buy_trades: buys,
    sell_trades: sells,
    buy_sell_ratio: safeRatio(new Decimal(buys), new Decimal(sells)),
    avg_trade_size: trades.length ? totalQty.div(trades.length) : null,
  }
}

export function computeSpread(bid: Decimal, ask: Decimal): SpreadAnalysis {
  const absolute = ask.minus(bid)
  const pct = safeRatio(absolute, bid)
  return { absolute, percent: pct ? pct.times(HUNDRED) : null }
}

export const spreadFromBookTicker = (bt: BookTicker): SpreadAnalysis => computeSpread(bt.bidPrice, bt.askPrice)

// (last - open) / open * 100, null for a zero open
export function recomputeChangePercent(stats: DailyStats): Decimal | null {
  const pct = safeRatio(stats.lastPrice.minus(stats.openPrice), stats.openPrice)
  return pct ? pct.times(HUNDRED) : null
}

export const CHANGE_PERCENT_TOLERANCE = new Decimal('0.01')

// Binance rounds priceChangePercent to 3 dp, so compare within a tolerance
export function changePercentConsistent(stats: DailyStats, tolerance: Decimal = CHANGE_PERCENT_TOLERANCE): boolean {
  const recomputed = recomputeChangePercent(stats)
  if (!recomputed) return stats.priceChangePercent.isZero()
  return recomputed.minus(stats.priceChangePercent).abs().lte(tolerance)
}

export type CandleTrend = {
  first_open: Decimal
  last_close: Decimal
  change_percent: Decimal | null
}

export function candleTrend(candles: readonly Candle[]): CandleTrend | null {
  if (!candles.length) return null
  const first = candles[0].open
  const last = candles[candles.length - 1].close
  const pct = safeRatio(last.minus(first), first)
  return { first_open: first, last_close: last, change_percent: pct ? pct.times(HUNDRED) : null }
}
