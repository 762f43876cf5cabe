// src/providers/anthropic.ts
import Anthropic from '@anthropic-ai/sdk'
import { ModelError, errorMessage } from '../errors.js'
import type { AIProvider, ChatCompletion, ChatOptions, Message, ProviderOptions } from './types.js'

const DEFAULT_MAX_OUTPUT_TOKENS = 4096

export class AnthropicProvider implements AIProvider {
  name = 'anthropic'
  model: string
  private client: Anthropic

  constructor(options: ProviderOptions) {
    this.client = new Anthropic({
      apiKey: options.apiKey,
      timeout: options.timeoutMs ?? 120_000,
      maxRetries: options.maxRetries ?? 2
    })
    this.model = options.model
  }

  async chat(messages: Message[], options: ChatOptions = {}): Promise<ChatCompletion> {
    // No native JSON mode; the system prompt carries the format instructions
    try {
      const response = await this.client.messages.create({
        model: this.model,
        max_tokens: options.maxOutputTokens ?? DEFAULT_MAX_OUTPUT_TOKENS,
        ...(options.systemPrompt ? { system: options.systemPrompt } : {}),
        messages: messages.map(m => ({ role: m.role, content: m.content }))
      })

      const text = response.content
        .map(block => (block.type === 'text' ? block.text : ''))
        .join('')
      const cached = response.usage.cache_read_input_tokens ?? 0

      return {
        text,
        tokens: {
          // input_tokens excludes cache reads
          promptTokens: response.usage.input_tokens + cached,
          completionTokens: response.usage.output_tokens,
          cachedPromptTokens: cached
        }
      }
    } catch (error) {
      const status = error instanceof Anthropic.APIError ? error.status : undefined
      throw new ModelError(this.name, `Anthropic request failed: ${errorMessage(error)}`, { status, cause: error })
    }
  }
}
