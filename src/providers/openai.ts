// src/providers/openai.ts
import OpenAI from 'openai'
import type { ChatCompletionMessageParam } from 'openai/resources/chat/completions'
import { ModelError, errorMessage } from '../errors.js'
import type { AIProvider, ChatCompletion, ChatOptions, Message, ProviderOptions } from './types.js'

export class OpenAIProvider implements AIProvider {
  name = 'openai'
  model: string
  private client: OpenAI

  constructor(options: ProviderOptions) {
    this.client = new OpenAI({
      apiKey: options.apiKey,
      timeout: options.timeoutMs ?? 120_000,
      maxRetries: options.maxRetries ?? 2
    })
    this.model = options.model
  }

  async chat(messages: Message[], options: ChatOptions = {}): Promise<ChatCompletion> {
    const params: ChatCompletionMessageParam[] = []
    if (options.systemPrompt) {
      params.push({ role: 'system', content: options.systemPrompt })
    }
    for (const m of messages) {
      params.push({ role: m.role, content: m.content })
    }

    try {
      const completion = await this.client.chat.completions.create({
        model: this.model,
        messages: params,
        ...(options.responseFormat === 'json' ? { response_format: { type: 'json_object' as const } } : {}),
        ...(options.maxOutputTokens ? { max_tokens: options.maxOutputTokens } : {})
      })

      return {
        text: completion.choices[0]?.message?.content ?? '',
        tokens: {
          promptTokens: completion.usage?.prompt_tokens ?? 0,
          completionTokens: completion.usage?.completion_tokens ?? 0,
          cachedPromptTokens: completion.usage?.prompt_tokens_details?.cached_tokens ?? 0
        }
      }
    } catch (error) {
      const status = error instanceof OpenAI.APIError ? error.status : undefined
      throw new ModelError(this.name, `OpenAI request failed: ${errorMessage(error)}`, { status, cause: error })
    }
  }
}
