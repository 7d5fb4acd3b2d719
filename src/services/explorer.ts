// src/services/explorer.ts
import debug from 'debug'
import client from '../http/axiosClient'
import { EXPLORER_SUPPLY_URL } from '../config'
import { asInteger } from '../utils/numbers'
import { errorMessage } from '../utils/errors'

const log = debug('app:explorer')

const INTEGER_TEXT = /^[+-]?\d+$/

function parseIntegerText(text: string): number | undefined {
  const trimmed = text.trim()
  return INTEGER_TEXT.test(trimmed) ? Number(trimmed) : undefined
}

/**
 * The explorer's coinsupply endpoint is undocumented and has answered both
 * with a JSON number and with bare digits, so both are accepted.
 * Returns undefined for anything else.
 */
export function parseSupplyBody(body: string): number | undefined {
  let parsed: unknown
  try {
    parsed = JSON.parse(body)
  } catch {
    log('coinsupply body is not JSON, trying plain text')
    return parseIntegerText(body)
  }

  if (typeof parsed === 'number') return asInteger(parsed)
  if (typeof parsed === 'string') return parseIntegerText(parsed)
  return undefined
}

export async function getExplorerSupply(): Promise<number | null> {
  try {
    // keep the raw text; axios would otherwise JSON-parse behind our back
    const res = await client.get<string>(EXPLORER_SUPPLY_URL, { responseType: 'text' })
    const body = typeof res.data === 'string' ? res.data : String(res.data)
    log('raw coinsupply response: %o', body)

    const supply = parseSupplyBody(body)
    if (supply === undefined) {
      throw new Error(`unparseable coinsupply body: ${JSON.stringify(body)}`)
    }
    return supply
  } catch (e: unknown) {
    // eslint-disable-next-line no-console
    console.error('Explorer supply error:', errorMessage(e))
    return null
  }
}
