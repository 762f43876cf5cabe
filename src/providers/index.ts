export { createProvider, getProviderForModel } from './factory.js'
export type { CreateProviderOptions } from './factory.js'
export { OpenAIProvider } from './openai.js'
export { AnthropicProvider } from './anthropic.js'
export { GeminiProvider } from './gemini.js'
export type { AIProvider, Message, ChatOptions, ChatCompletion, ProviderOptions, ProviderName } from './types.js'
