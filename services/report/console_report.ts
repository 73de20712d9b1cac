import type Decimal from 'decimal.js'
import type { InfoView, MarketSnapshot, SpreadAnalysis } from '../../types/snapshot'
import { candleTrend } from '../snapshot/analytics'

const WIDTH = 80
const QUOTE_ASSETS = ['FDUSD', 'USDT', 'USDC', 'BUSD', 'TUSD', 'EUR', 'TRY', 'BTC', 'ETH', 'BNB']

export function groupThousands(fixed: string): string {
  const [int, frac] = fixed.split('.')
  const grouped = int.replace(/\B(?=(\d{3})+(?!\d))/g, ',')
  return frac !== undefined ? `${grouped}.${frac}` : grouped
}

export const num = (d: Decimal, dp: number): string => groupThousands(d.toFixed(dp))
export const money = (d: Decimal, dp = 2): string => d.isNegative() && !d.isZero() ? `-$${num(d.abs(), dp)}` : `$${num(d, dp)}`
export const signed = (d: Decimal, dp = 2): string => (d.isNegative() && !d.isZero() ? '' : '+') + num(d, dp)
const ratio = (d: Decimal | null, dp = 2): string => d ? d.toFixed(dp) : 'n/a'
const share = (part: number, total: number): string => total ? `${(part / total * 100).toFixed(1)}%` : 'n/a'

export function baseAsset(symbol: string): string {
  const quote = QUOTE_ASSETS.find(q => symbol.endsWith(q) && symbol.length > q.length)
  return quote ? symbol.slice(0, -quote.length) : symbol
}

function header(symbol: string, mode: 'snapshot' | 'info', timestamp: string): string[] {
  return [
    '',
    '='.repeat(WIDTH),
    `  MARKET SNAPSHOT - ${symbol}`,
    '='.repeat(WIDTH),
    '',
    `  Captured: ${timestamp}`,
    `  Mode: ${mode}`,
    '',
    '-'.repeat(WIDTH),
  ]
}

const spreadLine = (sp: SpreadAnalysis): string => `  Spread: ${money(sp.absolute, 4)} (${sp.percent ? sp.percent.toFixed(4) : 'n/a'}%)`

export function renderSnapshotReport(s: MarketSnapshot): string[] {
  const sum = s.summary
  const d = s.depth_analysis
  const t = s.trade_analysis
  const lines = header(s.symbol, 'snapshot', s.timestamp)
  lines.push(
    `  Symbol: ${s.symbol}`,
    `  Price: ${money(sum.price)}`,
    `  24h Change: ${signed(sum.price_change_24h)} (${signed(sum.price_change_percent_24h)}%)`,
    `  24h Range: ${money(sum.low_24h)} - ${money(sum.high_24h)}`,
    `  24h Volume: ${num(sum.volume_24h, 2)} ${baseAsset(s.symbol)}`,
    `  24h Quote Volume: ${money(sum.quote_volume_24h)}`,
    `  24h Trades: ${groupThousands(String(sum.trade_count_24h))}`,
    '',
    '  Order Book Depth:',
    `    Total Bid Depth: ${num(d.total_bid_depth, 4)}`,
    `    Total Ask Depth: ${num(d.total_ask_depth, 4)}`,
    `    Bid/Ask Ratio: ${ratio(d.bid_ask_ratio)}`,
    '',
    `  Recent Trade Analysis (last ${t.total_trades}):`,
    `    Buy Trades: ${t.buy_trades} (${share(t.buy_trades, t.total_trades)})`,
    `    Sell Trades: ${t.sell_trades} (${share(t.sell_trades, t.total_trades)})`,
    `    Buy/Sell Ratio: ${ratio(t.buy_sell_ratio)}`,
    `    Avg Trade Size: ${ratio(t.avg_trade_size, 4)}`,
    '',
    spreadLine(s.spread),
  )
  const trends = Object.entries(s.klines)
    .map(([interval, candles]) => ({ interval, trend: candleTrend(candles), n: candles.length }))
  if (trends.length) {
    lines.push('', '  Trend:')
    for (const { interval, trend, n } of trends) {
      if (!trend) { lines.push(`    ${interval}: no candles`); continue }
      const pct = trend.change_percent ? `${signed(trend.change_percent)}%` : 'n/a'
      lines.push(`    ${interval} (${n} candles): ${money(trend.first_open)} -> ${money(trend.last_close)} (${pct})`)
    }
  }
  for (const w of s.data_warnings) lines.push(`  Warning: ${w}`)
  lines.push('-'.repeat(WIDTH))
  return lines
}

export function renderInfoReport(v: InfoView): string[] {
  const st = v.stats
  const bt = v.book_ticker
  const lines = header(v.symbol, 'info', v.timestamp)
  lines.push(
    `  Symbol: ${v.symbol}`,
    '',
    `  Price: ${money(st.lastPrice)}`,
    `  24h Change: ${signed(st.priceChange)} (${signed(st.priceChangePercent)}%)`,
    `  24h High: ${money(st.highPrice)}`,
    `  24h Low: ${money(st.lowPrice)}`,
    `  24h Volume: ${num(st.volume, 2)}`,
    `  24h Trades: ${groupThousands(String(st.count))}`,
    '',
    `  Best Bid: ${money(bt.bidPrice)} (${num(bt.bidQty, 4)})`,
    `  Best Ask: ${money(bt.askPrice)} (${num(bt.askQty, 4)})`,
    spreadLine(v.spread),
    '-'.repeat(WIDTH),
  )
  return lines
}

export const footer = (): string => '='.repeat(WIDTH)
