// src/services/price.ts
import debug from 'debug'
import { PriceQuote, PriceSourceLabel } from '../types'
import { firstAvailable, Source } from '../utils/fallback'
import { getMexcPrice } from './mexc'
import { getCoinGeckoPrice } from './coingecko'

const log = debug('app:price')

export const PRICE_SOURCES: readonly Source<number, PriceSourceLabel>[] = [
  { name: 'MEXC', fetch: getMexcPrice },
  { name: 'CoinGecko', fetch: getCoinGeckoPrice }
]

// null means no tier produced a price; callers must check
export async function getPrice(
  sources: readonly Source<number, PriceSourceLabel>[] = PRICE_SOURCES
): Promise<PriceQuote | null> {
  const quote = await firstAvailable(sources)
  if (quote) log('price %d from %s', quote.value, quote.source)
  return quote
}
