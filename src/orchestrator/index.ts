// src/orchestrator/index.ts
export { BriefingOrchestrator } from './orchestrator.js'
export { runBriefing } from './run.js'
export type { BriefingCallbacks, BriefingDeps } from './run.js'
export { Understanding } from './understanding.js'
export type { CandidateFile, CandidateInput, CandidateStatus } from './understanding.js'
export type { BriefingResult, DegradedFlags, OrchestratorOptions, StageOutcome, StoppedReason } from './types.js'
