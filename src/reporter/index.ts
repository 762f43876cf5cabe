// src/reporter/index.ts
import { JsonReporter } from './json.js'
import { MarkdownReporter } from './markdown.js'
import type { OutputFormat, Reporter } from './types.js'

export { JsonReporter, MarkdownReporter }
export { writeOutput } from './output.js'
export type { OutputTarget } from './output.js'
export type { OutputFormat, Reporter }

export function createReporter(format: OutputFormat): Reporter {
  return format === 'json' ? new JsonReporter() : new MarkdownReporter()
}
