// tests/config/init.test.ts
import { describe, it, expect, afterEach } from 'vitest'
import { existsSync, mkdtempSync, readFileSync, rmSync } from 'fs'
import { tmpdir } from 'os'
import { join } from 'path'
import { generateConfig, initConfig } from '../../src/config/init.js'
import { parseConfig } from '../../src/config/loader.js'

describe('generateConfig', () => {
  it('should produce a config the loader accepts', () => {
    const text = generateConfig(['anthropic', 'openai'])
    const config = parseConfig(text, { ANTHROPIC_API_KEY: 'test-anthropic-key', OPENAI_API_KEY: 'test-openai-key' })

    expect(config.providers).toEqual({
      openai: { api_key: 'test-openai-key' },
      anthropic: { api_key: 'test-anthropic-key' }
    })
    expect(config.defaults.model).toBe('gpt-4.1-mini')
    expect(config.defaults.max_iters).toBe(2)
    expect(config.pricing).toEqual({})
  })

  it('should default to the first selected provider model', () => {
    expect(parseConfig(generateConfig(['anthropic']), {}).defaults.model).toBe('claude-3-5-haiku-latest')
  })

  it('should fall back to the default model without providers', () => {
    const config = parseConfig(generateConfig([]), {})
    expect(config.providers).toEqual({})
    expect(config.defaults.model).toBe('gpt-4.1-mini')
  })
})

describe('initConfig', () => {
  const dirs: string[] = []

  afterEach(() => {
    for (const dir of dirs.splice(0)) rmSync(dir, { recursive: true, force: true })
  })

  it('should write the config once and refuse to overwrite it', () => {
    const base = mkdtempSync(join(tmpdir(), 'repo-brief-init-'))
    dirs.push(base)

    const path = initConfig(base, ['openai'])

    expect(path).toBe(join(base, '.repo-brief', 'config.yaml'))
    expect(existsSync(path)).toBe(true)
    expect(readFileSync(path, 'utf-8')).toContain('api_key: ${OPENAI_API_KEY}')
    expect(() => initConfig(base, ['openai'])).toThrow(`Config already exists: ${path}`)
  })
})
