// src/providers/types.ts
import type { TokenCounts } from '../budget/types.js'

export interface Message {
  role: 'user' | 'assistant'
  content: string
}

export interface ChatOptions {
  systemPrompt?: string
  /** 'json' asks the provider for a JSON object when it supports that mode. */
  responseFormat?: 'json' | 'text'
  maxOutputTokens?: number
}

export interface ChatCompletion {
  text: string
  tokens: TokenCounts
}

export interface AIProvider {
  name: string
  model: string
  /** Fails with ModelError on transport failure. */
  chat(messages: Message[], options?: ChatOptions): Promise<ChatCompletion>
}

export interface ProviderOptions {
  apiKey: string
  model: string
  timeoutMs?: number
  maxRetries?: number
}

export type ProviderName = 'openai' | 'anthropic' | 'google'
