// src/utils/fallback.ts
import debug from 'debug'
import { Sourced } from '../types'

const log = debug('app:fallback')

// one tier of a fallback chain: resolves to a value, or null when it has nothing usable
export interface Source<T, S extends string = string> {
  name: S
  fetch: () => Promise<T | null>
}

/**
 * Walks `sources` in order and returns the first value produced, tagged with
 * the name of the source that produced it. Sources run one after another,
 * never in parallel. A source that throws counts as a miss.
 *
 * Resolves to `null` only when every source missed.
 */
export async function firstAvailable<T, S extends string>(
  sources: readonly Source<T, S>[]
): Promise<Sourced<T, S> | null> {
  for (let i = 0; i < sources.length; i++) {
    const source = sources[i]
    let value: T | null = null
    try {
      value = await source.fetch()
    } catch (e: unknown) {
      // eslint-disable-next-line no-console
      console.error(`${source.name} source threw`, e instanceof Error ? e.message : e)
    }
    if (value !== null) return { value, source: source.name }

    const next = sources[i + 1]
    if (next) log('%s gave nothing, falling back to %s', source.name, next.name)
  }
  return null
}
