export { parseResponse } from './response-parser.js'
export type { ParsedResponse } from './response-parser.js'
export { extractJson, findJsonObject } from './json.js'
export { OVERVIEW_SHAPE, DEEP_DIVE_SHAPE, READING_PLAN_SHAPE } from './shapes.js'
export type {
  ResponseShape,
  OverviewPayload,
  DeepDivePayload,
  ReadingPlanPayload,
  CandidateFilePayload
} from './shapes.js'
