// src/parser/json.ts

const FENCE = /^```[a-zA-Z]*\s*\n?([\s\S]*?)\n?\s*```$/

function unfence(text: string): string {
  const match = text.match(FENCE)
  return match ? match[1].trim() : text
}

/**
 * Slice out the first balanced `{...}` object, skipping braces inside strings.
 */
export function findJsonObject(text: string): string | null {
  let start = text.indexOf('{')
  while (start !== -1) {
    let depth = 0
    let inString = false
    let escaped = false

    for (let i = start; i < text.length; i++) {
      const ch = text[i]

      if (inString) {
        if (escaped) {
          escaped = false
        } else if (ch === '\\') {
          escaped = true
        } else if (ch === '"') {
          inString = false
        }
        continue
      }

      if (ch === '"') {
        inString = true
      } else if (ch === '{') {
        depth++
      } else if (ch === '}') {
        depth--
        if (depth === 0) {
          return text.slice(start, i + 1)
        }
      }
    }

    // Unclosed object, try the next opening brace
    start = text.indexOf('{', start + 1)
  }
  return null
}

export type JsonExtraction =
  | { ok: true; value: unknown }
  | { ok: false; reason: string }

export function extractJson(raw: string): JsonExtraction {
  const body = unfence(raw.trim())
  if (!body) {
    return { ok: false, reason: 'empty response' }
  }

  try {
    return { ok: true, value: JSON.parse(body) }
  } catch {
    // fall through to embedded object search
  }

  const slice = findJsonObject(body)
  if (!slice) {
    return { ok: false, reason: 'no JSON object found in response' }
  }
  try {
    return { ok: true, value: JSON.parse(slice) }
  } catch (e) {
    return { ok: false, reason: `malformed JSON: ${e instanceof Error ? e.message : String(e)}` }
  }
}
