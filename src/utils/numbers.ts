// src/utils/numbers.ts

// safe accessor helper for numeric upstream fields (numbers or numeric strings)
export function asNumber(v: unknown): number | undefined {
  if (v == null) return undefined
  if (typeof v === 'string' && v.trim() === '') return undefined
  if (typeof v !== 'number' && typeof v !== 'string') return undefined
  const n = Number(v)
  return Number.isFinite(n) ? n : undefined
}

// whole token units; fractional supplies are truncated toward zero
export function asInteger(v: unknown): number | undefined {
  const n = asNumber(v)
  return n === undefined ? undefined : Math.trunc(n)
}

export function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v)
}
