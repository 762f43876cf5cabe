// src/budget/pricing.ts
import { ConfigurationError } from '../errors.js'
import type { ModelPricing, StageName, TokenCounts, Usage } from './types.js'

// USD per 1M tokens
export const DEFAULT_PRICING: Readonly<Record<string, ModelPricing>> = {
  'gpt-4.1': { input: 2.0, output: 8.0, cachedInput: 0.5 },
  'gpt-4.1-mini': { input: 0.4, output: 1.6, cachedInput: 0.1 },
  'gpt-4.1-nano': { input: 0.1, output: 0.4, cachedInput: 0.025 },
  'gpt-4o': { input: 2.5, output: 10.0, cachedInput: 1.25 },
  'gpt-4o-mini': { input: 0.15, output: 0.6, cachedInput: 0.075 },
  'o4-mini': { input: 1.1, output: 4.4, cachedInput: 0.275 },
  'claude-3-5-haiku-latest': { input: 0.8, output: 4.0, cachedInput: 0.08 },
  'claude-3-5-sonnet-latest': { input: 3.0, output: 15.0, cachedInput: 0.3 },
  'claude-sonnet-4-20250514': { input: 3.0, output: 15.0, cachedInput: 0.3 },
  'gemini-1.5-flash': { input: 0.075, output: 0.3, cachedInput: 0.01875 },
  'gemini-1.5-pro': { input: 1.25, output: 5.0, cachedInput: 0.3125 },
  'gemini-2.0-flash': { input: 0.1, output: 0.4, cachedInput: 0.025 }
}

export interface PriceOverrides {
  priceIn?: number
  priceOut?: number
  priceCachedIn?: number
}

/**
 * Resolve pricing for a model. Explicit overrides win over configured per-model
 * entries, which win over the built-in table. An unknown model without
 * overrides is a configuration error.
 */
export function resolvePricing(
  model: string,
  overrides: PriceOverrides = {},
  configured: Record<string, ModelPricing> = {}
): ModelPricing {
  const { priceIn, priceOut, priceCachedIn } = overrides

  if ((priceIn === undefined) !== (priceOut === undefined)) {
    throw new ConfigurationError('--price-in and --price-out must be provided together')
  }

  if (priceIn !== undefined && priceOut !== undefined) {
    return {
      input: priceIn,
      output: priceOut,
      cachedInput: priceCachedIn ?? priceIn
    }
  }

  const entry = configured[model] ?? DEFAULT_PRICING[model]
  if (!entry) {
    const known = Object.keys({ ...DEFAULT_PRICING, ...configured }).sort().join(', ')
    throw new ConfigurationError(
      `No pricing known for model "${model}". Pass --price-in/--price-out or add it under "pricing" in the config file. Known models: ${known}`
    )
  }
  return entry
}

export function estimateCostUsd(tokens: TokenCounts, pricing: ModelPricing): number {
  const cached = Math.min(tokens.cachedPromptTokens, tokens.promptTokens)
  const uncached = tokens.promptTokens - cached
  return (
    (uncached / 1_000_000) * pricing.input +
    (cached / 1_000_000) * pricing.cachedInput +
    (tokens.completionTokens / 1_000_000) * pricing.output
  )
}

export function createUsage(stage: StageName, model: string, tokens: TokenCounts, pricing: ModelPricing): Usage {
  return Object.freeze({
    stage,
    model,
    promptTokens: tokens.promptTokens,
    completionTokens: tokens.completionTokens,
    cachedPromptTokens: tokens.cachedPromptTokens,
    totalTokens: tokens.promptTokens + tokens.completionTokens,
    costUsd: estimateCostUsd(tokens, pricing)
  })
}

// ~4 chars per token
export function estimateTokens(text: string): number {
  return Math.max(1, Math.ceil(text.length / 4))
}
