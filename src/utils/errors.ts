// src/utils/errors.ts

// message for logging; axios errors already carry status/code in their message
export function errorMessage(e: unknown): string {
  if (e instanceof Error) return e.message
  return String(e)
}
