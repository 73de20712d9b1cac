import type Decimal from 'decimal.js'
import type { BookTicker, Candle, DailyStats, OrderBookLevel } from './market_raw'

export type SnapshotSummary = {
  readonly price: Decimal
  readonly avg_price_5m: Decimal
  readonly price_change_24h: Decimal
  readonly price_change_percent_24h: Decimal
  readonly high_24h: Decimal
  readonly low_24h: Decimal
  readonly volume_24h: Decimal
  readonly quote_volume_24h: Decimal
  readonly trade_count_24h: number
}

export type DepthAnalysis = {
  readonly total_bid_depth: Decimal
  readonly total_ask_depth: Decimal
  readonly bid_ask_ratio: Decimal | null
  readonly top_bids: readonly OrderBookLevel[]
  readonly top_asks: readonly OrderBookLevel[]
}

export type TradeAnalysis = {
  readonly total_trades: number
  readonly buy_trades: number
  readonly sell_trades: number
  readonly buy_sell_ratio: Decimal | null
  readonly avg_trade_size: Decimal | null
}

export type SpreadAnalysis = {
  readonly absolute: Decimal
  readonly percent: Decimal | null
}

export type MarketSnapshot = {
  readonly timestamp: string
  readonly symbol: string
  readonly summary: SnapshotSummary
  readonly book_ticker: BookTicker
  readonly spread: SpreadAnalysis
  readonly depth_analysis: DepthAnalysis
  readonly trade_analysis: TradeAnalysis
  readonly klines: Readonly<Record<string, readonly Candle[]>>
  readonly data_warnings: readonly string[]
}

export type InfoView = {
  readonly timestamp: string
  readonly symbol: string
  readonly stats: DailyStats
  readonly book_ticker: BookTicker
  readonly spread: SpreadAnalysis
}

// On-disk form: decimals become JSON numbers
export type LevelFile = { price: number; quantity: number }

export type CandleFile = {
  openTime: number
  open: number
  high: number
  low: number
  close: number
  volume: number
  closeTime: number
  quoteVolume: number
  trades: number
  takerBuyVolume: number
  takerBuyQuoteVolume: number
}

export type SnapshotFile = {
  timestamp: string
  symbol: string
  summary: {
    price: number
    avg_price_5m: number
    price_change_24h: number
    price_change_percent_24h: number
    high_24h: number
    low_24h: number
    volume_24h: number
    quote_volume_24h: number
    trade_count_24h: number
  }
  book_ticker: {
    symbol: string
    bid_price: number
    bid_qty: number
    ask_price: number
    ask_qty: number
  }
  spread: { absolute: number; percent: number | null }
  depth_analysis: {
    total_bid_depth: number
    total_ask_depth: number
    bid_ask_ratio: number | null
    top_bids: LevelFile[]
    top_asks: LevelFile[]
  }
  trade_analysis: {
    total_trades: number
    buy_trades: number
    sell_trades: number
    buy_sell_ratio: number | null
    avg_trade_size: number | null
  }
  klines: Record<string, CandleFile[]>
  data_warnings: string[]
}
