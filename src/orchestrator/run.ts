// src/orchestrator/run.ts
import { resolvePricing } from '../budget/pricing.js'
import type { ModelPricing } from '../budget/types.js'
import type { BriefConfig, PricingConfig, RunSettings } from '../config/types.js'
import { GitHubClient } from '../github/client.js'
import type { RepoContext, RepoSource } from '../github/types.js'
import { createProvider } from '../providers/factory.js'
import type { AIProvider } from '../providers/types.js'
import { BriefingOrchestrator } from './orchestrator.js'
import type { BriefingResult, OrchestratorOptions } from './types.js'

export interface BriefingDeps {
  config: BriefConfig
  /** Defaults to a GitHubClient using the configured token. */
  source?: RepoSource
  /** Defaults to the provider matching `settings.model`. */
  provider?: AIProvider
}

export type BriefingCallbacks = Omit<OrchestratorOptions, 'maxIters' | 'maxKeyFiles' | 'maxFileChars' | 'fileTimeoutMs'> & {
  onContext?: (context: RepoContext) => void
}

function configuredPricing(pricing: Record<string, PricingConfig>): Record<string, ModelPricing> {
  const table: Record<string, ModelPricing> = {}
  for (const [model, entry] of Object.entries(pricing)) {
    table[model] = { input: entry.input, output: entry.output, cachedInput: entry.cached_input ?? entry.input }
  }
  return table
}

/**
 * Resolve pricing and the provider (both fail fast with ConfigurationError),
 * fetch the repository context, then run every stage.
 */
export async function runBriefing(
  repoUrl: string,
  settings: RunSettings,
  deps: BriefingDeps,
  callbacks: BriefingCallbacks = {}
): Promise<BriefingResult> {
  const pricing = resolvePricing(
    settings.model,
    { priceIn: settings.priceIn, priceOut: settings.priceOut, priceCachedIn: settings.priceCachedIn },
    configuredPricing(deps.config.pricing)
  )
  const provider = deps.provider ?? createProvider(settings.model, deps.config)
  const source = deps.source ?? new GitHubClient({ token: deps.config.github.token })

  const context = await source.fetchContext(repoUrl, {
    maxReadmeChars: settings.maxReadmeChars,
    maxTreeEntries: settings.maxTreeEntries,
    maxKeyFiles: settings.maxKeyFiles,
    maxFileChars: settings.maxFileChars,
    ref: settings.ref
  })
  callbacks.onContext?.(context)

  const orchestrator = new BriefingOrchestrator(
    provider,
    source,
    pricing,
    {
      maxTokens: settings.maxTokens,
      maxCostUsd: settings.maxCostUsd,
      maxRequests: settings.maxTurns
    },
    {
      ...callbacks,
      maxIters: settings.maxIters,
      maxKeyFiles: settings.maxKeyFiles,
      maxFileChars: settings.maxFileChars,
      fileTimeoutMs: settings.fileTimeoutMs
    }
  )
  return orchestrator.run(context)
}
