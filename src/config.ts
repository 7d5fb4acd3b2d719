// src/config.ts
import dotenv from 'dotenv'
dotenv.config()

export const TELEGRAM_BOT_TOKEN = process.env.TELEGRAM_BOT_TOKEN || ''
export const PORT = process.env.PORT ? Number(process.env.PORT) : 3000

export const HTTP_TIMEOUT_MS = process.env.HTTP_TIMEOUT_MS ? Number(process.env.HTTP_TIMEOUT_MS) : 5000
// tiers already provide the fallback, so no transport-level retries unless asked for
export const HTTP_RETRIES = process.env.HTTP_RETRIES ? Number(process.env.HTTP_RETRIES) : 0

export const EXPLORER_SUPPLY_URL = process.env.EXPLORER_SUPPLY_URL || 'https://explorer.nexa.org/api/coinsupply'
export const COINGECKO_MARKETS_URL = process.env.COINGECKO_MARKETS_URL || 'https://api.coingecko.com/api/v3/coins/markets'
export const COINGECKO_ID = process.env.COINGECKO_ID || 'nexa'
export const MEXC_TICKER_URL = process.env.MEXC_TICKER_URL || 'https://api.mexc.com/api/v3/ticker/price'
export const MEXC_SYMBOL = process.env.MEXC_SYMBOL || 'NEXAUSDT'

// last resort when neither the explorer nor CoinGecko answer; bump by hand
export const MANUAL_CIRC_SUPPLY = process.env.MANUAL_CIRC_SUPPLY ? Number(process.env.MANUAL_CIRC_SUPPLY) : 8_000_000_000_000

export const ASSET_SYMBOL = 'NEXA'
export const QUOTE_SYMBOL = 'USDT'

export const PRICE_COMMANDS: readonly string[] = ['price', 'p']
