// src/services/coingecko.ts
import client from '../http/axiosClient'
import { COINGECKO_ID, COINGECKO_MARKETS_URL } from '../config'
import { CoinGeckoMarket } from '../types'
import { asInteger, asNumber, isRecord } from '../utils/numbers'
import { errorMessage } from '../utils/errors'

type MarketField = keyof Pick<CoinGeckoMarket, 'circulating_supply' | 'current_price'>

// one GET per call: price and supply lookups never share a response
async function fetchMarketField(field: MarketField, what: string): Promise<unknown> {
  try {
    const res = await client.get<unknown>(COINGECKO_MARKETS_URL, {
      params: { vs_currency: 'usd', ids: COINGECKO_ID }
    })
    const data = res.data
    const first: unknown = Array.isArray(data) ? data[0] : undefined
    if (isRecord(first) && field in first) return first[field]

    // eslint-disable-next-line no-console
    console.warn(`CoinGecko ${what} returned unexpected format:`, JSON.stringify(data))
  } catch (e: unknown) {
    // supply misses log at warn, price misses at error
    // eslint-disable-next-line no-console
    const report = what === 'supply' ? console.warn : console.error
    report(`CoinGecko ${what} error:`, errorMessage(e))
  }
  return undefined
}

export async function getCoinGeckoSupply(): Promise<number | null> {
  const raw = await fetchMarketField('circulating_supply', 'supply')
  if (raw === undefined) return null
  const supply = asInteger(raw)
  if (supply === undefined) {
    // eslint-disable-next-line no-console
    console.warn('CoinGecko circulating_supply is not a number:', JSON.stringify(raw))
    return null
  }
  return supply
}

export async function getCoinGeckoPrice(): Promise<number | null> {
  const raw = await fetchMarketField('current_price', 'price')
  if (raw === undefined) return null
  const price = asNumber(raw)
  if (price === undefined) {
    // eslint-disable-next-line no-console
    console.error('CoinGecko current_price is not a number:', JSON.stringify(raw))
    return null
  }
  return price
}
