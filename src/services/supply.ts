// src/services/supply.ts
import debug from 'debug'
import { MANUAL_CIRC_SUPPLY } from '../config'
import { SupplyReading, SupplySourceLabel } from '../types'
import { firstAvailable, Source } from '../utils/fallback'
import { getExplorerSupply } from './explorer'
import { getCoinGeckoSupply } from './coingecko'

const log = debug('app:supply')

export const SUPPLY_SOURCES: readonly Source<number, SupplySourceLabel>[] = [
  { name: 'explorer', fetch: getExplorerSupply },
  { name: 'CoinGecko', fetch: getCoinGeckoSupply }
]

/**
 * Circulating supply: explorer, then CoinGecko, then MANUAL_CIRC_SUPPLY.
 * Never rejects.
 */
export async function getCirculatingSupply(
  sources: readonly Source<number, SupplySourceLabel>[] = SUPPLY_SOURCES
): Promise<SupplyReading> {
  const found = await firstAvailable(sources)
  if (found) {
    log('Using %s supply: %d', found.source, found.value)
    return found
  }

  // eslint-disable-next-line no-console
  console.warn(`Falling back to manual supply: ${MANUAL_CIRC_SUPPLY}`)
  return { value: MANUAL_CIRC_SUPPLY, source: 'manual' }
}
