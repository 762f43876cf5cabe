// src/config/types.ts
import type { ProviderName } from '../providers/types.js'

export interface ProviderConfig {
  api_key: string
}

export interface DefaultsConfig {
  model?: string
  output_format?: 'markdown' | 'json'
  max_iters?: number
  max_turns?: number
  max_cost?: number
  max_tokens?: number
  max_readme_chars?: number
  max_tree_entries?: number
  max_key_files?: number
  max_file_chars?: number
  file_timeout_ms?: number
}

/** USD per 1M tokens. */
export interface PricingConfig {
  input: number
  output: number
  cached_input?: number
  /** Routes a model whose name does not identify its provider. */
  provider?: ProviderName
}

export interface BriefConfig {
  providers: {
    openai?: ProviderConfig
    anthropic?: ProviderConfig
    google?: ProviderConfig
  }
  defaults: DefaultsConfig
  pricing: Record<string, PricingConfig>
  github: {
    token?: string
  }
}

/** Fully resolved settings for one run: CLI flag > config file > built-in default. */
export interface RunSettings {
  model: string
  format: 'markdown' | 'json'
  output?: string
  ref: string
  maxIters: number
  maxTurns: number
  maxCostUsd?: number
  maxTokens?: number
  maxReadmeChars: number
  maxTreeEntries: number
  maxKeyFiles: number
  maxFileChars: number
  fileTimeoutMs: number
  priceIn?: number
  priceOut?: number
  priceCachedIn?: number
  verbose: boolean
}

export const DEFAULT_SETTINGS = {
  model: 'gpt-4.1-mini',
  format: 'markdown',
  maxIters: 2,
  maxTurns: 12,
  maxReadmeChars: 12_000,
  maxTreeEntries: 350,
  maxKeyFiles: 12,
  maxFileChars: 12_000,
  fileTimeoutMs: 20_000
} as const
