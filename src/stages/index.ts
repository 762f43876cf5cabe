// src/stages/index.ts
export { invokeStage } from './invoke.js'
export type { StageCall, StageContext } from './invoke.js'
export { contextOverview, runOverviewStage } from './overview.js'
export type { OverviewResult } from './overview.js'
export { DeepDiveLoop, TRANSITIONS, isTerminal } from './deep-dive.js'
export type {
  DeepDiveEndReason,
  DeepDiveOptions,
  DeepDiveReport,
  DeepDiveState,
  DeepDiveTransition,
  FetchOutcome
} from './deep-dive.js'
export { knownPaths, runReadingPlanStage, synthesizeReadingPlan } from './reading-plan.js'
export type { ReadingPlanItem, ReadingPlanResult } from './reading-plan.js'
