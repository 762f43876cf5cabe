// src/parser/response-parser.ts
import { extractJson } from './json.js'
import type { ResponseShape } from './shapes.js'

export type ParsedResponse<T> =
  | { kind: 'structured'; value: T }
  | { kind: 'fallback'; raw: string; reason: string }

/**
 * Decode raw model output against a stage's shape. Never throws: anything that
 * does not decode cleanly comes back as the raw-text fallback.
 */
export function parseResponse<T>(raw: string, shape: ResponseShape<T>): ParsedResponse<T> {
  const extracted = extractJson(raw)
  if (!extracted.ok) {
    return { kind: 'fallback', raw, reason: extracted.reason }
  }

  const result = shape.schema.safeParse(extracted.value)
  if (!result.success) {
    const issue = result.error.issues[0]
    const where = issue && issue.path.length > 0 ? issue.path.join('.') : 'response'
    return {
      kind: 'fallback',
      raw,
      reason: `${shape.name} shape mismatch at ${where}: ${issue ? issue.message : 'invalid'}`
    }
  }
  return { kind: 'structured', value: result.data }
}
