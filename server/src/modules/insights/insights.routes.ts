import fs from 'node:fs'
import { Router } from 'express'
import { marketInsightsSchema, type MarketInsights } from '@shared/types'

const insightsPath = new URL('./insights.json', import.meta.url)

let cached: MarketInsights | null = null

// Static market snapshot, read once and served as-is.
export function loadMarketInsights(): MarketInsights {
  if (!cached) {
    cached = marketInsightsSchema.parse(JSON.parse(fs.readFileSync(insightsPath, 'utf8')))
  }
  return cached
}

export function buildInsightsRouter() {
  const router = Router()

  router.get('/', (_req, res) => {
    res.json(loadMarketInsights())
  })

  return router
}
