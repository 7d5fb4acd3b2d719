// src/routes/price.ts
import express from 'express'
import debug from 'debug'
import { computeFigures, getMarketSnapshot } from '../format/report'

const log = debug('app:routes:price')
const router = express.Router()

// GET /price
// same lookup as the /price bot command, as JSON
router.get('/', async (_req, res) => {
  try {
    const snapshot = await getMarketSnapshot()
    if (!snapshot) {
      return res.status(503).json({ error: 'price unavailable' })
    }
    log('served snapshot from %s', snapshot.priceSource)
    return res.json({ ...snapshot, ...computeFigures(snapshot) })
  } catch (e) {
    // eslint-disable-next-line no-console
    console.error('price route error', e)
    return res.status(500).json({ error: 'failed to build price snapshot' })
  }
})

export default router
