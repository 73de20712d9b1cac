import { promises as fs } from 'node:fs'
import path from 'node:path'
import Ajv from 'ajv'
import addFormats from 'ajv-formats'
import type Decimal from 'decimal.js'
import snapshotSchema from '../../schemas/market_snapshot.schema.json'
import type { Candle, OrderBookLevel } from '../../types/market_raw'
import type { CandleFile, LevelFile, MarketSnapshot, SnapshotFile } from '../../types/snapshot'
import { PersistenceError, errorMessage } from '../fetcher/errors'

const ajv = new Ajv({ allErrors: true, allowUnionTypes: true })
addFormats(ajv)
const validateSnapshotFile = ajv.compile<SnapshotFile>(snapshotSchema)

const n = (d: Decimal): number => d.toNumber()
const nOrNull = (d: Decimal | null): number | null => (d ? d.toNumber() : null)
const level = (l: OrderBookLevel): LevelFile => ({ price: n(l.price), quantity: n(l.quantity) })

const candle = (k: Candle): CandleFile => ({
  openTime: k.openTime,
  open: n(k.open),
  high: n(k.high),
  low: n(k.low),
  close: n(k.close),
  volume: n(k.volume),
  closeTime: k.closeTime,
  quoteVolume: n(k.quoteVolume),
  trades: k.trades,
  takerBuyVolume: n(k.takerBuyVolume),
  takerBuyQuoteVolume: n(k.takerBuyQuoteVolume),
})

export function toSnapshotFile(s: MarketSnapshot): SnapshotFile {
  const sum = s.summary
  const d = s.depth_analysis
  const t = s.trade_analysis
  return {
    timestamp: s.timestamp,
    symbol: s.symbol,
    summary: {
      price: n(sum.price),
      avg_price_5m: n(sum.avg_price_5m),
      price_change_24h: n(sum.price_change_24h),
      price_change_percent_24h: n(sum.price_change_percent_24h),
      high_24h: n(sum.high_24h),
      low_24h: n(sum.low_24h),
      volume_24h: n(sum.volume_24h),
      quote_volume_24h: n(sum.quote_volume_24h),
      trade_count_24h: sum.trade_count_24h,
    },
    book_ticker: {
      symbol: s.book_ticker.symbol,
      bid_price: n(s.book_ticker.bidPrice),
      bid_qty: n(s.book_ticker.bidQty),
      ask_price: n(s.book_ticker.askPrice),
      ask_qty: n(s.book_ticker.askQty),
    },
    spread: { absolute: n(s.spread.absolute), percent: nOrNull(s.spread.percent) },
    depth_analysis: {
      total_bid_depth: n(d.total_bid_depth),
      total_ask_depth: n(d.total_ask_depth),
      bid_ask_ratio: nOrNull(d.bid_ask_ratio),
      top_bids: d.top_bids.map(level),
      top_asks: d.top_asks.map(level),
    },
    trade_analysis: {
      total_trades: t.total_trades,
      buy_trades: t.buy_trades,
      sell_trades: t.sell_trades,
      buy_sell_ratio: nOrNull(t.buy_sell_ratio),
      avg_trade_size: nOrNull(t.avg_trade_size),
    },
    klines: Object.fromEntries(Object.entries(s.klines).map(([itv, ks]) => [itv, ks.map(candle)])),
    data_warnings: [...s.data_warnings],
  }
}

// ethusdt_20261019_120000.json (UTC of the capture time)
export function snapshotFileName(s: Pick<MarketSnapshot, 'symbol' | 'timestamp'>): string {
  const iso = new Date(s.timestamp).toISOString()
  const stamp = `${iso.slice(0, 10).replace(/-/g, '')}_${iso.slice(11, 19).replace(/:/g, '')}`
  return `${s.symbol.toLowerCase()}_${stamp}.json`
}

export async function saveSnapshot(s: MarketSnapshot, outputDir: string): Promise<string> {
  const dir = path.resolve(outputDir)
  const file = path.join(dir, snapshotFileName(s))
  try {
    await fs.mkdir(dir, { recursive: true })
    await fs.writeFile(file, `${JSON.stringify(toSnapshotFile(s), null, 2)}\n`, 'utf8')
  } catch (e) {
    throw new PersistenceError(file, `failed to write snapshot ${file}: ${errorMessage(e)}`, e)
  }
  return file
}

export function parseSnapshotFile(text: string, source = 'snapshot'): SnapshotFile {
  let data: unknown
  try {
    data = JSON.parse(text)
  } catch (e) {
    throw new PersistenceError(source, `malformed JSON in ${source}`, e)
  }
  if (!validateSnapshotFile(data)) throw new PersistenceError(source, `schema_invalid:snapshot ${ajv.errorsText(validateSnapshotFile.errors)}`)
  return data
}

export async function loadSnapshot(file: string): Promise<SnapshotFile> {
  let text: string
  try {
    text = await fs.readFile(file, 'utf8')
  } catch (e) {
    throw new PersistenceError(file, `failed to read snapshot ${file}: ${errorMessage(e)}`, e)
  }
  return parseSnapshotFile(text, file)
}
