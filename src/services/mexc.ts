// src/services/mexc.ts
import client from '../http/axiosClient'
import { MEXC_SYMBOL, MEXC_TICKER_URL } from '../config'
import { asNumber, isRecord } from '../utils/numbers'
import { errorMessage } from '../utils/errors'

// ticker/price answers { symbol, price } with the price as a decimal string
export async function getMexcPrice(): Promise<number | null> {
  try {
    const res = await client.get<unknown>(MEXC_TICKER_URL, { params: { symbol: MEXC_SYMBOL } })
    const data = res.data
    if (isRecord(data) && 'price' in data) {
      const price = asNumber(data.price)
      if (price !== undefined) return price
      throw new Error(`non-numeric price ${JSON.stringify(data.price)}`)
    }
    // eslint-disable-next-line no-console
    console.warn('Unexpected MEXC API response format:', JSON.stringify(data))
  } catch (e: unknown) {
    // eslint-disable-next-line no-console
    console.error('MEXC API error:', errorMessage(e))
  }
  return null
}
