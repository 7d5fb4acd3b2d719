// src/format/markdown.ts

// Telegram MarkdownV2 reserved characters, outside of code/pre entities
export const MARKDOWN_V2_RESERVED = ['_', '*', '[', ']', '(', ')', '~', '`', '>', '#', '+', '-', '=', '|', '{', '}', '.', '!'] as const

const RESERVED_PATTERN = new RegExp(`[${MARKDOWN_V2_RESERVED.map((c) => `\\${c}`).join('')}]`, 'g')

/**
 * Backslash-escapes every MarkdownV2 reserved character.
 *
 * Not idempotent: run it once over the finished message, never over
 * fragments that get concatenated afterwards.
 */
export function escapeMarkdownV2(text: string): string {
  return text.replace(RESERVED_PATTERN, '\\$&')
}
