import type Decimal from 'decimal.js'

export const KLINE_INTERVALS = ['1s', '1m', '3m', '5m', '15m', '30m', '1h', '2h', '4h', '6h', '8h', '12h', '1d', '3d', '1w', '1M'] as const
export type KlineInterval = typeof KLINE_INTERVALS[number]

export const DEPTH_LIMITS = [5, 10, 20, 50, 100, 500, 1000, 5000] as const
export type DepthLimit = typeof DEPTH_LIMITS[number]

export type PriceTick = {
  readonly symbol: string
  readonly price: Decimal
}

export type DailyStats = {
  readonly symbol: string
  readonly priceChange: Decimal
  readonly priceChangePercent: Decimal
  readonly weightedAvgPrice: Decimal
  readonly prevClosePrice: Decimal
  readonly lastPrice: Decimal
  readonly bidPrice: Decimal
  readonly askPrice: Decimal
  readonly openPrice: Decimal
  readonly highPrice: Decimal
  readonly lowPrice: Decimal
  readonly volume: Decimal
  readonly quoteVolume: Decimal
  readonly openTime: number
  readonly closeTime: number
  readonly count: number
}

export type OrderBookLevel = {
  readonly price: Decimal
  readonly quantity: Decimal
}

// bids descending, asks ascending (as served)
export type OrderBook = {
  readonly symbol: string
  readonly lastUpdateId: number
  readonly bids: readonly OrderBookLevel[]
  readonly asks: readonly OrderBookLevel[]
}

export type Trade = {
  readonly id: number
  readonly price: Decimal
  readonly qty: Decimal
  readonly quoteQty: Decimal
  readonly time: number
  readonly isBuyerMaker: boolean
}

export type Candle = {
  readonly openTime: number
  readonly open: Decimal
  readonly high: Decimal
  readonly low: Decimal
  readonly close: Decimal
  readonly volume: Decimal
  readonly closeTime: number
  readonly quoteVolume: Decimal
  readonly trades: number
  readonly takerBuyVolume: Decimal
  readonly takerBuyQuoteVolume: Decimal
}

export type BookTicker = {
  readonly symbol: string
  readonly bidPrice: Decimal
  readonly bidQty: Decimal
  readonly askPrice: Decimal
  readonly askQty: Decimal
}

// Wire shapes, exactly as Binance serves them (numbers as strings)
export type RawTickerPrice = { symbol: string; price: string }

export type RawTicker24h = {
  symbol: string
  priceChange: string
  priceChangePercent: string
  weightedAvgPrice: string
  prevClosePrice: string
  lastPrice: string
  bidPrice: string
  askPrice: string
  openPrice: string
  highPrice: string
  lowPrice: string
  volume: string
  quoteVolume: string
  openTime: number
  closeTime: number
  count: number
}

export type RawDepth = {
  lastUpdateId: number
  bids: Array<[string, string]>
  asks: Array<[string, string]>
}

export type RawTrade = {
  id: number
  price: string
  qty: string
  quoteQty: string
  time: number
  isBuyerMaker: boolean
}

export type RawKline = [number, string, string, string, string, string, number, string, number, string, string, ...unknown[]]

export type RawAvgPrice = { mins: number; price: string }

export type RawBookTicker = {
  symbol: string
  bidPrice: string
  bidQty: string
  askPrice: string
  askQty: string
}

export type RawServerTime = { serverTime: number }
