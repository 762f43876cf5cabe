// src/config/settings.ts
import { ConfigurationError } from '../errors.js'
import { DEFAULT_SETTINGS, type BriefConfig, type RunSettings } from './types.js'

/** Raw `brief` command options as commander hands them over. */
export interface BriefCommandOptions {
  model?: string
  format?: string
  output?: string
  ref?: string
  maxIters?: string
  maxTurns?: string
  maxCost?: string
  maxTokens?: string
  maxReadmeChars?: string
  maxTreeEntries?: string
  maxKeyFiles?: string
  maxFileChars?: string
  fileTimeout?: string
  priceIn?: string
  priceOut?: string
  priceCachedIn?: string
  verbose?: boolean
}

export function parseCount(value: string, flag: string): number {
  const n = Number(value)
  if (value.trim() === '' || !Number.isInteger(n) || n < 0) {
    throw new ConfigurationError(`${flag} must be a non-negative integer, got "${value}"`)
  }
  return n
}

export function parseAmount(value: string, flag: string): number {
  const n = Number(value)
  if (value.trim() === '' || !Number.isFinite(n) || n < 0) {
    throw new ConfigurationError(`${flag} must be a non-negative number, got "${value}"`)
  }
  return n
}

function optional<T>(value: string | undefined, parse: (v: string) => T): T | undefined {
  return value === undefined ? undefined : parse(value)
}

export function resolveRunSettings(options: BriefCommandOptions, config: BriefConfig): RunSettings {
  const d = config.defaults
  const count = (value: string | undefined, flag: string) => optional(value, v => parseCount(v, flag))
  const amount = (value: string | undefined, flag: string) => optional(value, v => parseAmount(v, flag))

  const format = options.format ?? d.output_format ?? DEFAULT_SETTINGS.format
  if (format !== 'markdown' && format !== 'json') {
    throw new ConfigurationError(`--format must be "markdown" or "json", got "${format}"`)
  }

  const maxIters = count(options.maxIters, '--max-iters') ?? d.max_iters ?? DEFAULT_SETTINGS.maxIters
  // Without an explicit ceiling, leave room for the overview, every deep-dive iteration and the reading plan
  const maxTurns = count(options.maxTurns, '--max-turns') ?? d.max_turns ?? Math.max(DEFAULT_SETTINGS.maxTurns, maxIters + 2)

  return {
    model: options.model ?? d.model ?? DEFAULT_SETTINGS.model,
    format,
    output: options.output,
    ref: options.ref ?? '',
    maxIters,
    maxTurns,
    maxCostUsd: amount(options.maxCost, '--max-cost') ?? d.max_cost,
    maxTokens: count(options.maxTokens, '--max-tokens') ?? d.max_tokens,
    maxReadmeChars: count(options.maxReadmeChars, '--max-readme-chars') ?? d.max_readme_chars ?? DEFAULT_SETTINGS.maxReadmeChars,
    maxTreeEntries: count(options.maxTreeEntries, '--max-tree-entries') ?? d.max_tree_entries ?? DEFAULT_SETTINGS.maxTreeEntries,
    maxKeyFiles: count(options.maxKeyFiles, '--max-key-files') ?? d.max_key_files ?? DEFAULT_SETTINGS.maxKeyFiles,
    maxFileChars: count(options.maxFileChars, '--max-file-chars') ?? d.max_file_chars ?? DEFAULT_SETTINGS.maxFileChars,
    fileTimeoutMs: count(options.fileTimeout, '--file-timeout') ?? d.file_timeout_ms ?? DEFAULT_SETTINGS.fileTimeoutMs,
    priceIn: amount(options.priceIn, '--price-in'),
    priceOut: amount(options.priceOut, '--price-out'),
    priceCachedIn: amount(options.priceCachedIn, '--price-cached-in'),
    verbose: options.verbose ?? false
  }
}
