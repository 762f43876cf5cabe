// src/stages/invoke.ts
import { createUsage, estimateTokens } from '../budget/pricing.js'
import type { BudgetTracker } from '../budget/tracker.js'
import type { DenyReason, ModelPricing, StageName, Usage } from '../budget/types.js'
import { parseResponse, type ParsedResponse } from '../parser/response-parser.js'
import type { ResponseShape } from '../parser/shapes.js'
import type { AIProvider } from '../providers/types.js'

/** Everything a stage needs to issue one budgeted model request. */
export interface StageContext {
  provider: AIProvider
  tracker: BudgetTracker
  pricing: ModelPricing
  onUsage?: (usage: Usage) => void
  onDiagnostic?: (message: string) => void
}

export type StageCall<T> =
  | { kind: 'denied'; reason: DenyReason }
  | { kind: 'responded'; parsed: ParsedResponse<T>; usage: Usage }

/**
 * Reserve, call, record, parse. A denied reservation issues no request.
 * ModelError from the provider propagates unchanged.
 */
export async function invokeStage<T>(
  ctx: StageContext,
  stage: StageName,
  systemPrompt: string,
  prompt: string,
  shape: ResponseShape<T>
): Promise<StageCall<T>> {
  const estimated = estimateTokens(systemPrompt) + estimateTokens(prompt)
  const decision = ctx.tracker.reserve(estimated)
  if (!decision.allowed) {
    ctx.onDiagnostic?.(`${stage}: budget denied (${decision.reason}), estimated ${estimated} prompt tokens`)
    return { kind: 'denied', reason: decision.reason }
  }

  const completion = await ctx.provider.chat(
    [{ role: 'user', content: prompt }],
    { systemPrompt, responseFormat: 'json' }
  )

  const usage = createUsage(stage, ctx.provider.model, completion.tokens, ctx.pricing)
  ctx.tracker.record(usage)
  ctx.onUsage?.(usage)

  return { kind: 'responded', parsed: parseResponse(completion.text, shape), usage }
}
