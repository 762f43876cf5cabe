// src/config/init.ts
import { writeFileSync, mkdirSync, existsSync } from 'fs'
import { dirname } from 'path'
import { DEFAULT_SETTINGS } from './types.js'
import { defaultConfigPath } from './loader.js'
import type { ProviderName } from '../providers/types.js'

export interface ProviderOption {
  id: ProviderName
  name: string
  model: string
  envVar: string
  description: string
}

export const AVAILABLE_PROVIDERS: ProviderOption[] = [
  {
    id: 'openai',
    name: 'OpenAI',
    model: DEFAULT_SETTINGS.model,
    envVar: 'OPENAI_API_KEY',
    description: 'GPT models through the OpenAI API'
  },
  {
    id: 'anthropic',
    name: 'Anthropic',
    model: 'claude-3-5-haiku-latest',
    envVar: 'ANTHROPIC_API_KEY',
    description: 'Claude models through the Anthropic API'
  },
  {
    id: 'google',
    name: 'Google Gemini',
    model: 'gemini-2.0-flash',
    envVar: 'GOOGLE_API_KEY',
    description: 'Gemini models through the Google AI API'
  }
]

export function generateConfig(selectedProviderIds: ProviderName[]): string {
  const selected = AVAILABLE_PROVIDERS.filter(p => selectedProviderIds.includes(p.id))

  let providersSection = '# Model provider API keys (use environment variables)\nproviders:'
  for (const provider of selected) {
    providersSection += `
  ${provider.id}:
    api_key: \${${provider.envVar}}`
  }
  if (selected.length === 0) {
    providersSection += ' {}'
  }

  const model = selected[0]?.model ?? DEFAULT_SETTINGS.model

  return `# repo-brief configuration

${providersSection}

# GitHub access (optional, raises API rate limits)
github:
  token: \${GITHUB_TOKEN}

# Defaults, overridden by command-line flags
defaults:
  model: ${model}
  output_format: ${DEFAULT_SETTINGS.format}
  max_iters: ${DEFAULT_SETTINGS.maxIters}
  max_turns: ${DEFAULT_SETTINGS.maxTurns}
  # max_cost: 0.25     # USD ceiling for the whole run
  # max_tokens: 200000
  max_readme_chars: ${DEFAULT_SETTINGS.maxReadmeChars}
  max_tree_entries: ${DEFAULT_SETTINGS.maxTreeEntries}
  max_key_files: ${DEFAULT_SETTINGS.maxKeyFiles}
  max_file_chars: ${DEFAULT_SETTINGS.maxFileChars}

# Per-model prices in USD per 1M tokens, for models missing from the built-in table.
# "provider" (openai, anthropic or google) routes a model whose name does not
# start with gpt, o<digit>, claude or gemini.
pricing: {}
#  my-finetuned-model:
#    input: 0.5
#    output: 2.0
#    cached_input: 0.125
#    provider: openai
`
}

export function initConfig(baseDir?: string, selectedProviders: ProviderName[] = ['openai']): string {
  const configPath = defaultConfigPath(baseDir)

  if (existsSync(configPath)) {
    throw new Error(`Config already exists: ${configPath}`)
  }

  mkdirSync(dirname(configPath), { recursive: true })
  writeFileSync(configPath, generateConfig(selectedProviders), 'utf-8')

  return configPath
}
