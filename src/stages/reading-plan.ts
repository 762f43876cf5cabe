// src/stages/reading-plan.ts
import type { DenyReason } from '../budget/types.js'
import type { RepoContext } from '../github/types.js'
import { READING_PLAN_SHAPE } from '../parser/shapes.js'
import { normalizePath } from '../repo-scanner/filter.js'
import type { Understanding } from '../orchestrator/understanding.js'
import { invokeStage, type StageContext } from './invoke.js'
import { buildReadingPlanPrompt, READING_PLAN_SYSTEM_PROMPT } from './prompts.js'

export interface ReadingPlanItem {
  path: string
  reason: string
  estimatedMinutes: number | null
  /** Whether the path appears in the repository tree or the candidate list. */
  knownPath: boolean
}

export type ReadingPlanResult =
  | { outcome: 'completed'; items: ReadingPlanItem[] }
  | { outcome: 'fallback'; items: ReadingPlanItem[]; reason: string }
  | { outcome: 'skipped_budget'; items: ReadingPlanItem[]; reason: DenyReason }

export function knownPaths(context: RepoContext, understanding: Understanding): Set<string> {
  return new Set([
    ...context.treePaths,
    ...context.keyFiles,
    ...understanding.candidates.map(c => c.path)
  ])
}

function isKnown(path: string, known: Set<string>): boolean {
  const cleaned = normalizePath(path)
  if (cleaned.length === 0) return false
  if (known.has(cleaned)) return true
  // Directory guidance such as "src/" counts when some known file lives under it
  const prefix = cleaned.endsWith('/') ? cleaned : `${cleaned}/`
  for (const p of known) {
    if (p.startsWith(prefix)) return true
  }
  return false
}

/**
 * Plan built without the model: candidates in first-discovery order, or the
 * sampled key files when nothing was ever proposed.
 */
export function synthesizeReadingPlan(context: RepoContext, understanding: Understanding): ReadingPlanItem[] {
  const paths = understanding.candidates.length > 0
    ? understanding.candidates.map(c => c.path)
    : [...context.keyFiles]
  return paths.map(path => ({ path, reason: '', estimatedMinutes: null, knownPath: true }))
}

export async function runReadingPlanStage(
  ctx: StageContext,
  context: RepoContext,
  understanding: Understanding
): Promise<ReadingPlanResult> {
  const prompt = buildReadingPlanPrompt({
    context,
    summary: understanding.summary,
    openQuestions: understanding.openQuestions,
    knownPaths: [...new Set([...context.keyFiles, ...understanding.candidates.map(c => c.path)])]
  })

  const call = await invokeStage(ctx, 'reading-plan', READING_PLAN_SYSTEM_PROMPT, prompt, READING_PLAN_SHAPE)
  if (call.kind === 'denied') {
    return { outcome: 'skipped_budget', items: synthesizeReadingPlan(context, understanding), reason: call.reason }
  }

  const { parsed } = call
  if (parsed.kind === 'fallback') {
    ctx.onDiagnostic?.(`reading-plan: ${parsed.reason}`)
    return { outcome: 'fallback', items: synthesizeReadingPlan(context, understanding), reason: parsed.reason }
  }

  const known = knownPaths(context, understanding)
  const items = parsed.value.items.map(item => ({
    path: item.path.trim(),
    reason: item.reason.trim(),
    estimatedMinutes: item.estimated_minutes,
    knownPath: isKnown(item.path, known)
  }))
  return { outcome: 'completed', items }
}
