// src/bot/commands.ts
import debug from 'debug'
import { buildPriceReport } from '../format/report'

const log = debug('app:commands')

// the slice of grammY's Context the handler touches
export interface ReplyContext {
  reply(text: string, other: { parse_mode: 'MarkdownV2' }): Promise<unknown>
}

export type ReportBuilder = () => Promise<string>

// a failed reply rejects into bot.catch; no retry here
export function createPriceCommandHandler(buildReport: ReportBuilder = buildPriceReport) {
  return async (ctx: ReplyContext): Promise<void> => {
    const message = await buildReport()
    log('replying with %d chars', message.length)
    await ctx.reply(message, { parse_mode: 'MarkdownV2' })
  }
}
