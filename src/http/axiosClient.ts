// src/http/axiosClient.ts
import axios, { AxiosInstance } from 'axios'
import axiosRetry from 'axios-retry'
import { HTTP_RETRIES, HTTP_TIMEOUT_MS } from '../config'

export interface HttpClientOptions {
  timeout?: number
  retries?: number
}

// Retry-After is either delay-seconds or an HTTP date
export function retryAfterMs(value: unknown, now = Date.now()): number | undefined {
  if (value == null) return undefined
  const raw = String(value)
  const n = parseInt(raw, 10)
  if (!isNaN(n)) return n * 1000
  const d = Date.parse(raw)
  if (!isNaN(d)) {
    return Math.min(Math.max(0, d - now), 30_000)
  }
  return undefined
}

export function createHttpClient(options: HttpClientOptions = {}): AxiosInstance {
  const client = axios.create({
    timeout: options.timeout ?? HTTP_TIMEOUT_MS,
    headers: { 'User-Agent': 'nexa-price-bot/1.0' }
  })

  axiosRetry(client, {
    retries: options.retries ?? HTTP_RETRIES,
    retryDelay: (retryCount, error) => {
      const ra = retryAfterMs(error.response?.headers?.['retry-after'])
      if (ra !== undefined) return ra
      return Math.min(500 * Math.pow(2, retryCount - 1), 10_000)
    },
    retryCondition: (error) => {
      if (error.response) {
        const s = error.response.status
        if (s === 429) return true
        if (s >= 500 && s < 600) return true
      }
      return axiosRetry.isNetworkOrIdempotentRequestError(error)
    }
  })

  return client
}

const client = createHttpClient()

export default client
