// src/orchestrator/orchestrator.ts
import { BudgetTracker } from '../budget/tracker.js'
import type { BudgetLimits, ModelPricing, StageName } from '../budget/types.js'
import type { RepoContext, RepoSource } from '../github/types.js'
import type { AIProvider } from '../providers/types.js'
import { DeepDiveLoop, type DeepDiveEndReason, type DeepDiveReport } from '../stages/deep-dive.js'
import type { StageContext } from '../stages/invoke.js'
import { contextOverview, runOverviewStage } from '../stages/overview.js'
import { runReadingPlanStage, synthesizeReadingPlan, type ReadingPlanItem } from '../stages/reading-plan.js'
import type { BriefingResult, OrchestratorOptions, StageOutcome, StoppedReason } from './types.js'
import { Understanding } from './understanding.js'

type Halt = 'budget_exceeded' | 'cancelled'

function skippedOutcome(halt: Halt): StageOutcome {
  return halt === 'cancelled' ? 'skipped_cancelled' : 'skipped_budget'
}

function skippedReport(reason: DeepDiveEndReason): DeepDiveReport {
  return {
    state: 'done',
    iterations: 0,
    endReason: reason,
    explored: [],
    unavailable: [],
    filesFetched: 0,
    fallbacks: 0,
    transitions: [],
    warnings: []
  }
}

/**
 * Drives overview, deep-dive and reading plan strictly in order for one
 * repository. Owns the run's Understanding and BudgetTracker; nothing is
 * shared between runs.
 */
export class BriefingOrchestrator {
  private provider: AIProvider
  private source: RepoSource
  private pricing: ModelPricing
  private limits: BudgetLimits
  private options: OrchestratorOptions

  constructor(
    provider: AIProvider,
    source: RepoSource,
    pricing: ModelPricing,
    limits: BudgetLimits,
    options: OrchestratorOptions
  ) {
    this.provider = provider
    this.source = source
    this.pricing = pricing
    this.limits = limits
    this.options = options
  }

  private cancelled(): boolean {
    return this.options.signal?.aborted ?? false
  }

  private complete(stage: StageName, outcome: StageOutcome): void {
    this.options.onStageComplete?.(stage, outcome)
  }

  async run(context: RepoContext): Promise<BriefingResult> {
    const understanding = new Understanding()
    const tracker = new BudgetTracker(this.limits, this.pricing)
    const warnings: string[] = []
    const ctx: StageContext = {
      provider: this.provider,
      tracker,
      pricing: this.pricing,
      onUsage: this.options.onUsage,
      onDiagnostic: this.options.onDiagnostic
    }
    let halt: Halt | null = null

    // Overview
    let overview: StageOutcome
    if (this.cancelled()) {
      halt = 'cancelled'
      overview = 'skipped_cancelled'
      understanding.summary = contextOverview(context)
    } else {
      this.options.onStageStart?.('overview')
      const result = await runOverviewStage(ctx, context, understanding, this.options.maxKeyFiles)
      overview = result.outcome
      if (result.outcome === 'skipped_budget') {
        halt = 'budget_exceeded'
        warnings.push(`Budget exhausted (${result.reason}) before the overview; briefing built from repository metadata only.`)
      } else if (result.outcome === 'fallback') {
        warnings.push(`Overview response was not structured (${result.reason}); raw text used as the summary.`)
      }
    }
    this.complete('overview', overview)

    // Deep-dive
    let deepDive: StageOutcome
    let report: DeepDiveReport
    if (halt === null && this.cancelled()) halt = 'cancelled'
    if (halt !== null) {
      deepDive = skippedOutcome(halt)
      report = skippedReport(halt)
    } else {
      this.options.onStageStart?.('deep-dive')
      const loop = new DeepDiveLoop(ctx, this.source, context, understanding, {
        maxIters: this.options.maxIters,
        maxKeyFiles: this.options.maxKeyFiles,
        maxFileChars: this.options.maxFileChars,
        fileTimeoutMs: this.options.fileTimeoutMs,
        signal: this.options.signal,
        onTransition: this.options.onTransition
      })
      report = await loop.run()
      warnings.push(...report.warnings)

      if (report.state === 'aborted') {
        deepDive = 'aborted'
      } else if (report.endReason === 'budget_exceeded') {
        deepDive = 'skipped_budget'
        halt = 'budget_exceeded'
        warnings.push(`Budget exhausted (${report.denyReason ?? 'limit reached'}) during the deep-dive after ${report.iterations} iteration(s).`)
      } else if (report.endReason === 'cancelled') {
        deepDive = 'skipped_cancelled'
        halt = 'cancelled'
      } else if (report.fallbacks > 0) {
        deepDive = 'fallback'
        warnings.push(`${report.fallbacks} deep-dive response(s) were not structured; raw text used as the summary.`)
      } else {
        deepDive = 'completed'
      }
    }
    this.complete('deep-dive', deepDive)

    // Reading plan
    let readingPlan: StageOutcome
    let items: ReadingPlanItem[]
    if (halt === null && this.cancelled()) halt = 'cancelled'
    if (halt !== null) {
      readingPlan = skippedOutcome(halt)
      items = synthesizeReadingPlan(context, understanding)
    } else {
      this.options.onStageStart?.('reading-plan')
      const result = await runReadingPlanStage(ctx, context, understanding)
      readingPlan = result.outcome
      items = result.items
      if (result.outcome === 'skipped_budget') {
        halt = 'budget_exceeded'
        warnings.push(`Budget exhausted (${result.reason}) before the reading plan; plan synthesised from candidate files.`)
      } else if (result.outcome === 'fallback') {
        warnings.push(`Reading-plan response was not structured (${result.reason}); plan synthesised from candidate files.`)
      }
    }
    this.complete('reading-plan', readingPlan)

    if (halt === 'cancelled') {
      warnings.push('Run cancelled; remaining stages were skipped.')
    }

    const stoppedReason: StoppedReason = report.state === 'aborted' ? 'fetch_failed' : halt ?? 'completed'

    return {
      repoUrl: context.repoUrl,
      fullName: context.fullName,
      ref: context.ref,
      model: this.provider.model,
      overview: understanding.summary,
      openQuestions: [...understanding.openQuestions],
      candidates: understanding.snapshotCandidates(),
      readingPlan: items,
      stages: { 'overview': overview, 'deep-dive': deepDive, 'reading-plan': readingPlan },
      degraded: {
        overview: overview !== 'completed',
        deepDive: deepDive !== 'completed',
        readingPlan: readingPlan !== 'completed'
      },
      deepDive: report,
      budget: tracker.snapshot(),
      stoppedReason,
      warnings,
      generatedAt: this.options.now?.() ?? new Date()
    }
  }
}
