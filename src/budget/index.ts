export { BudgetTracker } from './tracker.js'
export { DEFAULT_PRICING, resolvePricing, estimateCostUsd, estimateTokens, createUsage } from './pricing.js'
export type { PriceOverrides } from './pricing.js'
export type {
  StageName,
  TokenCounts,
  Usage,
  ModelPricing,
  BudgetLimits,
  BudgetDecision,
  BudgetSnapshot,
  BudgetTotals,
  DenyReason
} from './types.js'
