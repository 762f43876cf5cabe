// src/reporter/json.ts
import type { BriefingResult } from '../orchestrator/types.js'
import type { Reporter } from './types.js'

export class JsonReporter implements Reporter {
  readonly format = 'json'

  generate(result: BriefingResult): string {
    // Date serialises through toJSON as an ISO string
    return JSON.stringify(result, null, 2)
  }
}
