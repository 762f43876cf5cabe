// src/budget/types.ts
export type StageName = 'overview' | 'deep-dive' | 'reading-plan'

/** Token counts as reported by a provider for a single request. */
export interface TokenCounts {
  promptTokens: number
  completionTokens: number
  cachedPromptTokens: number
}

export interface Usage extends TokenCounts {
  readonly stage: StageName
  readonly model: string
  readonly totalTokens: number
  readonly costUsd: number
}

/** Per 1M tokens, USD. */
export interface ModelPricing {
  input: number
  output: number
  cachedInput: number
}

export interface BudgetLimits {
  maxTokens?: number
  maxCostUsd?: number
  maxRequests?: number
}

export type DenyReason = 'max_tokens' | 'max_cost' | 'max_requests'

export type BudgetDecision =
  | { allowed: true }
  | { allowed: false; reason: DenyReason }

export interface BudgetTotals {
  tokens: number
  costUsd: number
  requests: number
}

export interface BudgetSnapshot {
  limits: {
    maxTokens: number | null
    maxCostUsd: number | null
    maxRequests: number | null
  }
  totals: BudgetTotals
  remaining: {
    tokens: number | null
    costUsd: number | null
    requests: number | null
  }
  exhausted: boolean
  denyReason?: DenyReason
  calls: Usage[]
}
