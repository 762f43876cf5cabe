// src/budget/tracker.ts
import { estimateCostUsd } from './pricing.js'
import type {
  BudgetDecision,
  BudgetLimits,
  BudgetSnapshot,
  BudgetTotals,
  DenyReason,
  ModelPricing,
  Usage
} from './types.js'

/**
 * Accumulates usage across every model request of a run and gates the next one.
 *
 * `reserve` must be called before a request is issued. The first denial is
 * sticky: totals only ever grow, so once a ceiling is met every remaining stage
 * is skipped.
 */
export class BudgetTracker {
  private limits: BudgetLimits
  private pricing: ModelPricing
  private totals: BudgetTotals = { tokens: 0, costUsd: 0, requests: 0 }
  private calls: Usage[] = []
  private denyReason?: DenyReason

  constructor(limits: BudgetLimits, pricing: ModelPricing) {
    for (const [key, value] of Object.entries(limits)) {
      if (value !== undefined && (!Number.isFinite(value) || value < 0)) {
        throw new RangeError(`Budget limit ${key} must be a non-negative number, got ${value}`)
      }
    }
    this.limits = { ...limits }
    this.pricing = pricing
  }

  reserve(estimatedTokens: number): BudgetDecision {
    if (this.denyReason) {
      return { allowed: false, reason: this.denyReason }
    }

    const prompt = Math.max(1, Math.ceil(estimatedTokens))
    const reason = this.check(prompt)
    if (reason) {
      this.denyReason = reason
      return { allowed: false, reason }
    }
    return { allowed: true }
  }

  record(usage: Usage): void {
    if (usage.promptTokens < 0 || usage.completionTokens < 0 || usage.costUsd < 0) {
      throw new RangeError('Usage values must be non-negative')
    }
    this.calls.push(usage)
    this.totals = {
      tokens: this.totals.tokens + usage.totalTokens,
      costUsd: this.totals.costUsd + usage.costUsd,
      requests: this.totals.requests + 1
    }
  }

  remaining(): { tokens: number; costUsd: number; requests: number } {
    const { maxTokens, maxCostUsd, maxRequests } = this.limits
    return {
      tokens: maxTokens === undefined ? Infinity : Math.max(0, maxTokens - this.totals.tokens),
      costUsd: maxCostUsd === undefined ? Infinity : Math.max(0, maxCostUsd - this.totals.costUsd),
      requests: maxRequests === undefined ? Infinity : Math.max(0, maxRequests - this.totals.requests)
    }
  }

  isExhausted(): boolean {
    return this.denyReason !== undefined
  }

  getDenyReason(): DenyReason | undefined {
    return this.denyReason
  }

  getTotals(): BudgetTotals {
    return { ...this.totals }
  }

  snapshot(): BudgetSnapshot {
    const remaining = this.remaining()
    const finite = (n: number) => (Number.isFinite(n) ? n : null)
    return {
      limits: {
        maxTokens: this.limits.maxTokens ?? null,
        maxCostUsd: this.limits.maxCostUsd ?? null,
        maxRequests: this.limits.maxRequests ?? null
      },
      totals: this.getTotals(),
      remaining: {
        tokens: finite(remaining.tokens),
        costUsd: finite(remaining.costUsd),
        requests: finite(remaining.requests)
      },
      exhausted: this.isExhausted(),
      denyReason: this.denyReason,
      calls: [...this.calls]
    }
  }

  private check(promptTokens: number): DenyReason | undefined {
    const { maxTokens, maxCostUsd, maxRequests } = this.limits

    if (maxRequests !== undefined && this.totals.requests + 1 > maxRequests) {
      return 'max_requests'
    }
    if (maxTokens !== undefined && (this.totals.tokens >= maxTokens || this.totals.tokens + promptTokens > maxTokens)) {
      return 'max_tokens'
    }
    if (maxCostUsd !== undefined) {
      // A met ceiling denies even when the next prompt is priced at zero
      if (this.totals.costUsd >= maxCostUsd) {
        return 'max_cost'
      }
      const promptCost = estimateCostUsd(
        { promptTokens, completionTokens: 0, cachedPromptTokens: 0 },
        this.pricing
      )
      if (this.totals.costUsd + promptCost > maxCostUsd) {
        return 'max_cost'
      }
    }
    return undefined
  }
}
