// src/reporter/output.ts
import { mkdirSync, writeFileSync } from 'fs'
import { dirname } from 'path'

export interface OutputTarget {
  write(text: string): unknown
}

/**
 * Write the rendered briefing to a file, or to `stdout` when no path or "-"
 * is given. Parent directories are created. Returns the file path written, or
 * null for stdout.
 */
export function writeOutput(text: string, output?: string, stdout: OutputTarget = process.stdout): string | null {
  const body = text.endsWith('\n') ? text : `${text}\n`
  if (!output || output === '-') {
    stdout.write(body)
    return null
  }
  mkdirSync(dirname(output), { recursive: true })
  writeFileSync(output, body, 'utf-8')
  return output
}
