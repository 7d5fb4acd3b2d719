// src/bot/bot.ts
import { Bot } from 'grammy'
import debug from 'debug'
import { PRICE_COMMANDS } from '../config'
import { createPriceCommandHandler, ReportBuilder } from './commands'
import { errorMessage } from '../utils/errors'

const log = debug('app:bot')

export interface CreateBotOptions {
  buildReport?: ReportBuilder
}

export function createBot(token: string, options: CreateBotOptions = {}): Bot {
  const bot = new Bot(token)
  const handlePrice = createPriceCommandHandler(options.buildReport)

  bot.command([...PRICE_COMMANDS], (ctx) => handlePrice(ctx))

  bot.catch((err) => {
    // eslint-disable-next-line no-console
    console.error(`Error while handling update ${err.ctx.update.update_id}:`, errorMessage(err.error))
  })

  return bot
}

// command menu shown by Telegram clients; both aliases listed
export async function publishCommands(bot: Bot): Promise<void> {
  await bot.api.setMyCommands(
    PRICE_COMMANDS.map((command) => ({ command, description: 'NEXA price and market cap' }))
  )
  log('published commands: %s', PRICE_COMMANDS.join(', '))
}
