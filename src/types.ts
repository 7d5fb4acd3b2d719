// src/types.ts

export type PriceSourceLabel = 'MEXC' | 'CoinGecko'
export type SupplySourceLabel = 'explorer' | 'CoinGecko' | 'manual'

// a value together with the tier that produced it
export interface Sourced<T, S extends string = string> {
  value: T
  source: S
}

export type PriceQuote = Sourced<number, PriceSourceLabel>
export type SupplyReading = Sourced<number, SupplySourceLabel>

// one invocation's worth of upstream data, never cached
export interface MarketSnapshot {
  price: number
  priceSource: PriceSourceLabel
  supply: number
  supplySource: SupplySourceLabel
  marketCap: number
}

export interface ReportFigures {
  supplyTrillions: number
  marketCapMillions: number
  pricePerMillion: number
  pricePerBillion: number
}

// subset of the CoinGecko /coins/markets item we read
export interface CoinGeckoMarket {
  id?: string
  current_price?: number | null
  circulating_supply?: number | null
}
