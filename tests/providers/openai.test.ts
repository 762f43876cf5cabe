// tests/providers/openai.test.ts
import { describe, it, expect, vi, beforeEach } from 'vitest'
import { OpenAIProvider } from '../../src/providers/openai.js'
import { ModelError } from '../../src/errors.js'

const { create } = vi.hoisted(() => ({ create: vi.fn() }))

vi.mock('openai', () => {
  class APIError extends Error {
    status: number
    constructor(status: number, message: string) {
      super(message)
      this.status = status
    }
  }
  class OpenAI {
    static APIError = APIError
    chat = { completions: { create } }
  }
  return { default: OpenAI }
})

describe('OpenAIProvider', () => {
  beforeEach(() => {
    create.mockReset()
  })

  it('should send the system prompt and request a JSON object', async () => {
    create.mockResolvedValue({
      choices: [{ message: { content: '{"summary": "ok"}' } }],
      usage: { prompt_tokens: 100, completion_tokens: 20, prompt_tokens_details: { cached_tokens: 40 } }
    })
    const provider = new OpenAIProvider({ apiKey: 'test-secret', model: 'gpt-4.1-mini' })

    const result = await provider.chat([{ role: 'user', content: 'describe' }], { systemPrompt: 'be brief', responseFormat: 'json' })

    expect(result).toEqual({
      text: '{"summary": "ok"}',
      tokens: { promptTokens: 100, completionTokens: 20, cachedPromptTokens: 40 }
    })
    expect(create).toHaveBeenCalledWith({
      model: 'gpt-4.1-mini',
      messages: [
        { role: 'system', content: 'be brief' },
        { role: 'user', content: 'describe' }
      ],
      response_format: { type: 'json_object' }
    })
  })

  it('should treat missing usage as zero tokens', async () => {
    create.mockResolvedValue({ choices: [] })
    const provider = new OpenAIProvider({ apiKey: 'test-secret', model: 'gpt-4.1-mini' })

    const result = await provider.chat([{ role: 'user', content: 'hi' }])

    expect(result).toEqual({ text: '', tokens: { promptTokens: 0, completionTokens: 0, cachedPromptTokens: 0 } })
  })

  it('should wrap transport failures in ModelError', async () => {
    create.mockRejectedValue(new Error('socket hang up'))
    const provider = new OpenAIProvider({ apiKey: 'test-secret', model: 'gpt-4.1-mini' })

    const error = await provider.chat([{ role: 'user', content: 'hi' }]).catch((e: unknown) => e)

    expect(error).toBeInstanceOf(ModelError)
    expect(error).toMatchObject({ provider: 'openai', message: 'OpenAI request failed: socket hang up' })
  })
})
