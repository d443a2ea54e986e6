export interface SalaryRange {
  role: string
  /** Thousands of USD per year */
  min: number
  max: number
}

export interface MarketInsights {
  market_outlook: string
  industry_growth: number
  demand_level: string
  top_skills: string[]
  salary_ranges: SalaryRange[]
  trends: string[]
  recommended_skills: string[]
}
