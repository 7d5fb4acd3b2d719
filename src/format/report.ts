// src/format/report.ts
import { ASSET_SYMBOL, QUOTE_SYMBOL } from '../config'
import { MarketSnapshot, PriceQuote, ReportFigures, SupplyReading } from '../types'
import { getPrice } from '../services/price'
import { getCirculatingSupply } from '../services/supply'
import { escapeMarkdownV2 } from './markdown'

export const PRICE_ERROR_MESSAGE = '\u{1F6A8} Error: Unable to fetch price from MEXC or CoinGecko.'

export interface ReportFetchers {
  getPrice: () => Promise<PriceQuote | null>
  getCirculatingSupply: () => Promise<SupplyReading>
}

const defaultFetchers: ReportFetchers = {
  getPrice: () => getPrice(),
  getCirculatingSupply: () => getCirculatingSupply()
}

// roundingMode is missing from the ES2022 Intl typings; Node 20's ICU honours it
type FixedFormatOptions = Intl.NumberFormatOptions & { roundingMode?: 'halfEven' }

// exact binary ties go to the even digit, so 1.125 renders as 1.12
function fixed(digits: number, grouping: boolean): Intl.NumberFormat {
  const options: FixedFormatOptions = {
    minimumFractionDigits: digits,
    maximumFractionDigits: digits,
    useGrouping: grouping,
    roundingMode: 'halfEven'
  }
  return new Intl.NumberFormat('en-US', options)
}

const eightDecimals = fixed(8, false)
const threeDecimals = fixed(3, false)
const twoDecimals = fixed(2, true)
const noDecimals = fixed(0, true)

// price first; supply is only looked up once there is something to multiply it by
export async function getMarketSnapshot(fetchers: ReportFetchers = defaultFetchers): Promise<MarketSnapshot | null> {
  const quote = await fetchers.getPrice()
  if (!quote) return null

  const supply = await fetchers.getCirculatingSupply()
  return {
    price: quote.value,
    priceSource: quote.source,
    supply: supply.value,
    supplySource: supply.source,
    marketCap: quote.value * supply.value
  }
}

export function computeFigures(snapshot: MarketSnapshot): ReportFigures {
  return {
    supplyTrillions: snapshot.supply / 1_000_000_000_000,
    marketCapMillions: snapshot.marketCap / 1_000_000,
    pricePerMillion: snapshot.price * 1_000_000,
    pricePerBillion: snapshot.price * 1_000_000_000
  }
}

// plain text; escaping happens once in buildPriceReport
export function renderReport(snapshot: MarketSnapshot): string {
  const f = computeFigures(snapshot)
  return [
    `${ASSET_SYMBOL}/${QUOTE_SYMBOL} Price (${snapshot.priceSource})`,
    '',
    `${eightDecimals.format(snapshot.price)}$ per ${ASSET_SYMBOL}`,
    `${twoDecimals.format(f.pricePerMillion)}$ per 1M ${ASSET_SYMBOL}`,
    `${noDecimals.format(f.pricePerBillion)}$ per 1B ${ASSET_SYMBOL}`,
    '',
    `Market Cap: $${twoDecimals.format(f.marketCapMillions)}M`,
    `Circ Supply: ${threeDecimals.format(f.supplyTrillions)}T ${ASSET_SYMBOL}`
  ].join('\n')
}

/**
 * The reply for /price: the escaped report, or the escaped error message
 * when no price source answered. Ready to send with parse_mode MarkdownV2.
 */
export async function buildPriceReport(fetchers: ReportFetchers = defaultFetchers): Promise<string> {
  const snapshot = await getMarketSnapshot(fetchers)
  const message = snapshot ? renderReport(snapshot) : PRICE_ERROR_MESSAGE
  return escapeMarkdownV2(message)
}
