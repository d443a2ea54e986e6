import { z } from "zod"
import type { MarketInsights } from "../insights.types"

export const marketInsightsSchema: z.ZodType<MarketInsights> = z.object({
  market_outlook: z.string(),
  industry_growth: z.number(),
  demand_level: z.string(),
  top_skills: z.array(z.string()),
  salary_ranges: z.array(
    z.object({
      role: z.string(),
      min: z.number(),
      max: z.number(),
    })
  ),
  trends: z.array(z.string()),
  recommended_skills: z.array(z.string()),
})
