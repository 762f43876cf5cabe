// tests/parser/json.test.ts
import { describe, it, expect } from 'vitest'
import { extractJson, findJsonObject } from '../../src/parser/json.js'

describe('findJsonObject', () => {
  it('should return the first balanced object', () => {
    expect(findJsonObject('before {"a": {"b": 1}} after {"c": 2}')).toBe('{"a": {"b": 1}}')
  })

  it('should ignore braces inside strings', () => {
    expect(findJsonObject('x {"a": "}{", "b": "\\"}"} y')).toBe('{"a": "}{", "b": "\\"}"}')
  })

  it('should return null without an object', () => {
    expect(findJsonObject('no braces here')).toBeNull()
    expect(findJsonObject('{ never closed')).toBeNull()
  })
})

describe('extractJson', () => {
  it('should parse bare JSON', () => {
    expect(extractJson('  {"a": 1}  ')).toEqual({ ok: true, value: { a: 1 } })
  })

  it('should unwrap a fenced block', () => {
    expect(extractJson('```json\n{"a": [1, 2]}\n```')).toEqual({ ok: true, value: { a: [1, 2] } })
  })

  it('should find an object embedded in prose', () => {
    expect(extractJson('Here you go: {"a": true}. Enjoy!')).toEqual({ ok: true, value: { a: true } })
  })

  it('should report empty responses', () => {
    expect(extractJson('   ')).toEqual({ ok: false, reason: 'empty response' })
  })

  it('should report text without JSON', () => {
    expect(extractJson('The repository is a web server.')).toEqual({
      ok: false,
      reason: 'no JSON object found in response'
    })
  })

  it('should report malformed JSON', () => {
    const result = extractJson('prefix {"a": 1,} suffix')
    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.reason.startsWith('malformed JSON: ')).toBe(true)
    }
  })
})
