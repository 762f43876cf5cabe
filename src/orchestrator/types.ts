// src/orchestrator/types.ts
import type { BudgetSnapshot, StageName, Usage } from '../budget/types.js'
import type { ReadingPlanItem } from '../stages/reading-plan.js'
import type { DeepDiveReport, DeepDiveTransition } from '../stages/deep-dive.js'
import type { CandidateFile } from './understanding.js'

export type StageOutcome =
  | 'completed'        // structured response consumed
  | 'fallback'         // response did not match the shape, raw text used
  | 'skipped_budget'   // reserve denied before or during the stage
  | 'skipped_cancelled'
  | 'aborted'          // deep-dive only: a whole fetch batch failed

export type StoppedReason = 'completed' | 'budget_exceeded' | 'fetch_failed' | 'cancelled'

export interface DegradedFlags {
  overview: boolean
  deepDive: boolean
  readingPlan: boolean
}

export interface BriefingResult {
  readonly repoUrl: string
  readonly fullName: string
  readonly ref: string
  readonly model: string
  readonly overview: string
  readonly openQuestions: readonly string[]
  readonly candidates: readonly CandidateFile[]
  readonly readingPlan: readonly ReadingPlanItem[]
  readonly stages: Readonly<Record<StageName, StageOutcome>>
  readonly degraded: Readonly<DegradedFlags>
  readonly deepDive: DeepDiveReport
  readonly budget: BudgetSnapshot
  readonly stoppedReason: StoppedReason
  readonly warnings: readonly string[]
  readonly generatedAt: Date
}

export interface OrchestratorOptions {
  maxIters: number
  maxKeyFiles: number
  maxFileChars: number
  fileTimeoutMs: number
  /** Checked at stage and iteration boundaries, never mid-request. */
  signal?: AbortSignal
  onStageStart?: (stage: StageName) => void
  onStageComplete?: (stage: StageName, outcome: StageOutcome) => void
  onTransition?: (transition: DeepDiveTransition) => void
  onUsage?: (usage: Usage) => void
  onDiagnostic?: (message: string) => void
  now?: () => Date
}
