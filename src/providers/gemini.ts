import { GoogleGenerativeAI } from '@google/generative-ai'
import { ModelError, errorMessage } from '../errors.js'
import type { AIProvider, ChatCompletion, ChatOptions, Message, ProviderOptions } from './types.js'

export class GeminiProvider implements AIProvider {
  name = 'gemini'
  model: string
  private client: GoogleGenerativeAI
  private timeoutMs: number

  constructor(options: ProviderOptions) {
    this.client = new GoogleGenerativeAI(options.apiKey)
    this.model = options.model
    this.timeoutMs = options.timeoutMs ?? 120_000
  }

  async chat(messages: Message[], options: ChatOptions = {}): Promise<ChatCompletion> {
    const model = this.client.getGenerativeModel(
      {
        model: this.model,
        systemInstruction: options.systemPrompt,
        generationConfig: {
          ...(options.responseFormat === 'json' ? { responseMimeType: 'application/json' } : {}),
          ...(options.maxOutputTokens ? { maxOutputTokens: options.maxOutputTokens } : {})
        }
      },
      { timeout: this.timeoutMs }
    )

    // Build conversation history
    const history = messages.slice(0, -1).map(m => ({
      role: m.role === 'assistant' ? 'model' : 'user',
      parts: [{ text: m.content }]
    }))
    const lastMessage = messages[messages.length - 1]
    if (!lastMessage) {
      throw new ModelError(this.name, 'Gemini request needs at least one message')
    }

    try {
      const chat = model.startChat({ history })
      const result = await chat.sendMessage(lastMessage.content)
      const usage = result.response.usageMetadata

      return {
        text: result.response.text(),
        tokens: {
          promptTokens: usage?.promptTokenCount ?? 0,
          completionTokens: usage?.candidatesTokenCount ?? 0,
          cachedPromptTokens: usage?.cachedContentTokenCount ?? 0
        }
      }
    } catch (error) {
      throw new ModelError(this.name, `Gemini request failed: ${errorMessage(error)}`, { cause: error })
    }
  }
}
