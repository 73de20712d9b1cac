import { describe, it, expect } from 'vitest'
import Decimal from 'decimal.js'
import { analyzeDepth, analyzeTrades, candleTrend, changePercentConsistent, computeSpread, recomputeChangePercent } from './analytics'
import { parseCandles, parseDailyStats, parseOrderBook, parseTrades } from '../fetcher/normalize'
import { depth20, klines, ticker24h, trades, HOUR } from '../testing/binance_mock'

const d = (v: string) => new Decimal(v)
const level = (price: string, quantity: string) => ({ price: d(price), quantity: d(quantity) })

describe('analyzeDepth', () => {
  it('sums each side and divides bid by ask depth', () => {
    const book = parseOrderBook('/api/v3/depth', 'ETHUSDT', depth20())
    const depth = analyzeDepth(book.bids, book.asks)
    expect(depth.total_bid_depth.toString()).toBe('125.5')
    expect(depth.total_ask_depth.toString()).toBe('118.2')
    expect(depth.bid_ask_ratio?.toFixed(2)).toBe('1.06')
    expect(depth.top_bids).toHaveLength(5)
    expect(depth.top_asks[0].price.toFixed(2)).toBe('3890.01')
  })

  it('does not pick up binary floating point error', () => {
    const depth = analyzeDepth([level('1', '0.1'), level('0.9', '0.2')], [level('2', '0.3')])
    expect(depth.total_bid_depth.toString()).toBe('0.3')
    expect(depth.bid_ask_ratio?.toString()).toBe('1')
  })

  it('reports a null ratio for an empty ask side', () => {
    const depth = analyzeDepth([level('100', '2')], [])
    expect(depth.total_ask_depth.isZero()).toBe(true)
    expect(depth.bid_ask_ratio).toBeNull()
  })
})

describe('analyzeTrades', () => {
  it('splits by the buyer-is-maker flag', () => {
    const result = analyzeTrades(parseTrades('/api/v3/trades', trades(10, 6)))
    expect(result).toMatchObject({ total_trades: 10, buy_trades: 6, sell_trades: 4 })
    expect(result.buy_sell_ratio?.toString()).toBe('1.5')
    expect(result.avg_trade_size?.toString()).toBe('0.5')
  })

  it('averages trade quantities', () => {
    const list = [...parseTrades('/api/v3/trades', trades(1, 1, '0.1')), ...parseTrades('/api/v3/trades', trades(1, 0, '0.2'))]
    expect(analyzeTrades(list).avg_trade_size?.toString()).toBe('0.15')
  })

  it('has no ratio without sells and no average without trades', () => {
    const onlyBuys = analyzeTrades(parseTrades('/api/v3/trades', trades(4, 4)))
    expect(onlyBuys.buy_sell_ratio).toBeNull()
    const none = analyzeTrades([])
    expect(none).toMatchObject({ total_trades: 0, buy_trades: 0, sell_trades: 0, buy_sell_ratio: null, avg_trade_size: null })
  })
})

describe('computeSpread', () => {
  it('is ask minus bid, and relative to the bid in percent', () => {
    const sp = computeSpread(d('3890.00'), d('3890.01'))
    expect(sp.absolute.toString()).toBe('0.01')
    expect(sp.percent?.toSignificantDigits(3).toString()).toBe('0.000257')
  })

  it('has no percent for a zero bid', () => {
    expect(computeSpread(d('0'), d('1')).percent).toBeNull()
  })
})

describe('24h change cross-check', () => {
  it('matches the API percent within tolerance', () => {
    const stats = parseDailyStats('/api/v3/ticker/24hr', ticker24h())
    expect(recomputeChangePercent(stats)?.toFixed(3)).toBe('1.176')
    expect(changePercentConsistent(stats)).toBe(true)
  })

  it('flags a percent that does not fit last and open', () => {
    const stats = parseDailyStats('/api/v3/ticker/24hr', ticker24h({ priceChangePercent: '2.500' }))
    expect(changePercentConsistent(stats)).toBe(false)
  })
})

describe('candleTrend', () => {
  it('runs from the first open to the last close', () => {
    const trend = candleTrend(parseCandles('/api/v3/klines', klines(3, HOUR)))
    expect(trend?.first_open.toFixed(2)).toBe('3800.00')
    expect(trend?.last_close.toFixed(2)).toBe('3803.00')
    expect(trend?.change_percent?.toFixed(4)).toBe('0.0789')
  })

  it('is null for no candles', () => {
    expect(candleTrend([])).toBeNull()
  })
})
