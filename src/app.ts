// src/app.ts
import express from 'express'
import http from 'http'
import cors from 'cors'
import morgan from 'morgan'
import priceRouter from './routes/price'
import { PRICE_SOURCES } from './services/price'
import { SUPPLY_SOURCES } from './services/supply'

const app = express()
app.use(cors())
app.use(morgan('tiny'))

// liveness plus the fallback order each lookup walks; no upstream is contacted
app.get('/health', (_req, res) => {
  return res.json({
    ok: true,
    service: 'nexa-price-bot',
    uptime_seconds: Math.floor(process.uptime()),
    sources: {
      price: PRICE_SOURCES.map((s) => s.name),
      supply: [...SUPPLY_SOURCES.map((s) => s.name), 'manual']
    },
    timestamp: Date.now()
  })
})

app.use('/price', priceRouter)

export function createServer() {
  const httpServer = http.createServer(app)
  return { app, httpServer }
}

export default app
