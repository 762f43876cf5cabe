// src/reporter/types.ts
import type { BriefingResult } from '../orchestrator/types.js'

export type OutputFormat = 'markdown' | 'json'

export interface Reporter {
  readonly format: OutputFormat
  generate(result: BriefingResult): string
}
