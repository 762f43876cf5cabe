// src/providers/factory.ts
import type { AIProvider, ProviderName } from './types.js'
import type { BriefConfig } from '../config/types.js'
import { ConfigurationError } from '../errors.js'
import { AnthropicProvider } from './anthropic.js'
import { OpenAIProvider } from './openai.js'
import { GeminiProvider } from './gemini.js'

const API_KEY_ENV: Record<ProviderName, string> = {
  openai: 'OPENAI_API_KEY',
  anthropic: 'ANTHROPIC_API_KEY',
  google: 'GOOGLE_API_KEY'
}

export function getProviderForModel(model: string): ProviderName {
  if (model.startsWith('gpt') || /^o\d/.test(model)) {
    return 'openai'
  }
  if (model.startsWith('claude')) {
    return 'anthropic'
  }
  if (model.startsWith('gemini')) {
    return 'google'
  }
  throw new ConfigurationError(
    `Unknown model: ${model}. Name its provider under "pricing.${model}.provider" in the config file.`
  )
}

export interface CreateProviderOptions {
  timeoutMs?: number
  maxRetries?: number
}

export function createProvider(model: string, config: BriefConfig, options: CreateProviderOptions = {}): AIProvider {
  const providerName = config.pricing[model]?.provider ?? getProviderForModel(model)
  const providerConfig = config.providers[providerName]

  if (!providerConfig) {
    throw new ConfigurationError(
      `${API_KEY_ENV[providerName]} is required for model ${model}. Set it in your environment, a .env file or the config file.`
    )
  }

  const providerOptions = { apiKey: providerConfig.api_key, model, ...options }
  switch (providerName) {
    case 'openai':
      return new OpenAIProvider(providerOptions)
    case 'anthropic':
      return new AnthropicProvider(providerOptions)
    case 'google':
      return new GeminiProvider(providerOptions)
  }
}
