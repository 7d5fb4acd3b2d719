// src/index.ts
import debug from 'debug'
import { createServer } from './app'
import { createBot, publishCommands } from './bot/bot'
import { PORT, TELEGRAM_BOT_TOKEN } from './config'
import { errorMessage } from './utils/errors'

const log = debug('app:main')

function main() {
  if (!TELEGRAM_BOT_TOKEN) {
    // eslint-disable-next-line no-console
    console.error('TELEGRAM_BOT_TOKEN is not set')
    process.exit(1)
  }

  const bot = createBot(TELEGRAM_BOT_TOKEN)
  const { httpServer } = createServer()

  httpServer.listen(PORT, () => {
    // eslint-disable-next-line no-console
    console.log(`Server listening on port ${PORT}`)
  })

  const shutdown = (signal: string) => {
    log('received %s, shutting down', signal)
    httpServer.close()
    bot.stop().catch((e: unknown) => {
      // eslint-disable-next-line no-console
      console.error('bot stop error', errorMessage(e))
    })
  }
  process.once('SIGINT', () => shutdown('SIGINT'))
  process.once('SIGTERM', () => shutdown('SIGTERM'))

  publishCommands(bot).catch((e: unknown) => {
    // eslint-disable-next-line no-console
    console.warn('could not publish command menu', errorMessage(e))
  })

  // long polling; resolves once bot.stop() is called
  bot
    .start({ onStart: (me) => log('Bot @%s polling', me.username) })
    .catch((e: unknown) => {
      // eslint-disable-next-line no-console
      console.error('bot polling failed', errorMessage(e))
      process.exit(1)
    })
}

main()
