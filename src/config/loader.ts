// src/config/loader.ts
import { existsSync, readFileSync } from 'fs'
import { homedir } from 'os'
import { join } from 'path'
import YAML from 'yaml'
import { z } from 'zod'
import { ConfigurationError } from '../errors.js'
import type { BriefConfig } from './types.js'

export function defaultConfigPath(baseDir: string = homedir()): string {
  return join(baseDir, '.repo-brief', 'config.yaml')
}

// An unset ${VAR} leaves an empty YAML value, which parses as null
const providerSchema = z.object({ api_key: z.string().nullish() })
const count = z.number().int().nonnegative()

const configSchema = z.object({
  providers: z
    .object({
      openai: providerSchema.optional(),
      anthropic: providerSchema.optional(),
      google: providerSchema.optional()
    })
    .default({}),
  defaults: z
    .object({
      model: z.string().min(1).optional(),
      output_format: z.enum(['markdown', 'json']).optional(),
      max_iters: count.optional(),
      max_turns: count.optional(),
      max_cost: z.number().nonnegative().optional(),
      max_tokens: count.optional(),
      max_readme_chars: count.optional(),
      max_tree_entries: count.optional(),
      max_key_files: count.optional(),
      max_file_chars: count.optional(),
      file_timeout_ms: count.optional()
    })
    .default({}),
  pricing: z
    .record(
      z.object({
        input: z.number().nonnegative(),
        output: z.number().nonnegative(),
        cached_input: z.number().nonnegative().optional(),
        provider: z.enum(['openai', 'anthropic', 'google']).optional()
      })
    )
    .default({}),
  github: z.object({ token: z.string().nullish() }).default({})
})

/**
 * Replace ${VAR} references with environment values. Unset variables become
 * empty strings so a config can mention keys for providers that are not used.
 */
export function expandEnv(text: string, env: NodeJS.ProcessEnv = process.env): string {
  return text.replace(/\$\{([A-Za-z_][A-Za-z0-9_]*)\}/g, (_, name: string) => env[name] ?? '')
}

export function parseConfig(text: string, env: NodeJS.ProcessEnv = process.env, source = 'config'): BriefConfig {
  let raw: unknown
  try {
    raw = YAML.parse(expandEnv(text, env)) ?? {}
  } catch (e) {
    throw new ConfigurationError(`Failed to parse ${source}: ${e instanceof Error ? e.message : String(e)}`)
  }

  const result = configSchema.safeParse(raw)
  if (!result.success) {
    const issue = result.error.issues[0]
    throw new ConfigurationError(`Invalid ${source}: ${issue.path.join('.') || 'root'}: ${issue.message}`)
  }

  const { providers, defaults, pricing, github } = result.data
  const config: BriefConfig = { providers: {}, defaults, pricing, github: {} }
  for (const name of ['openai', 'anthropic', 'google'] as const) {
    const key = providers[name]?.api_key
    if (key) config.providers[name] = { api_key: key }
  }
  if (github.token) config.github.token = github.token
  return config
}

/**
 * Load the config file. An explicit path must exist; the default location is
 * optional. Provider keys and the GitHub token fall back to the environment.
 */
export function loadConfig(configPath?: string, env: NodeJS.ProcessEnv = process.env): BriefConfig {
  const path = configPath ?? defaultConfigPath()
  let config: BriefConfig

  if (existsSync(path)) {
    config = parseConfig(readFileSync(path, 'utf-8'), env, path)
  } else if (configPath) {
    throw new ConfigurationError(`Config file not found: ${configPath}`)
  } else {
    config = { providers: {}, defaults: {}, pricing: {}, github: {} }
  }

  const fromEnv = (name: string) => env[name]?.trim() || undefined
  const openaiKey = fromEnv('OPENAI_API_KEY')
  const anthropicKey = fromEnv('ANTHROPIC_API_KEY')
  const googleKey = fromEnv('GOOGLE_API_KEY')

  if (!config.providers.openai && openaiKey) config.providers.openai = { api_key: openaiKey }
  if (!config.providers.anthropic && anthropicKey) config.providers.anthropic = { api_key: anthropicKey }
  if (!config.providers.google && googleKey) config.providers.google = { api_key: googleKey }
  if (!config.github.token) config.github.token = fromEnv('GITHUB_TOKEN')

  return config
}
