// src/stages/overview.ts
import type { DenyReason } from '../budget/types.js'
import type { RepoContext } from '../github/types.js'
import { OVERVIEW_SHAPE } from '../parser/shapes.js'
import type { Understanding } from '../orchestrator/understanding.js'
import { invokeStage, type StageContext } from './invoke.js'
import { buildOverviewPrompt, buildOverviewSystemPrompt } from './prompts.js'

const README_EXCERPT_CHARS = 1500

export type OverviewResult =
  | { outcome: 'completed'; added: number }
  | { outcome: 'fallback'; reason: string }
  | { outcome: 'skipped_budget'; reason: DenyReason }

/**
 * Plain-text overview built from repository metadata alone, used when the
 * model is never asked.
 */
export function contextOverview(context: RepoContext): string {
  const lines = [`# ${context.fullName}`, '']
  if (context.description) lines.push(context.description, '')
  if (context.language) lines.push(`- Language: ${context.language}`)
  if (context.topics.length > 0) lines.push(`- Topics: ${context.topics.join(', ')}`)
  if (context.license) lines.push(`- License: ${context.license}`)
  lines.push(`- Ref: ${context.ref}`)

  const readme = context.readme.trim()
  if (readme) {
    const excerpt = readme.length > README_EXCERPT_CHARS ? `${readme.slice(0, README_EXCERPT_CHARS)}…` : readme
    lines.push('', '## README excerpt', '', excerpt)
  }
  return lines.join('\n')
}

export async function runOverviewStage(
  ctx: StageContext,
  context: RepoContext,
  understanding: Understanding,
  maxCandidates: number
): Promise<OverviewResult> {
  const call = await invokeStage(
    ctx,
    'overview',
    buildOverviewSystemPrompt(maxCandidates),
    buildOverviewPrompt(context),
    OVERVIEW_SHAPE
  )

  if (call.kind === 'denied') {
    understanding.summary = contextOverview(context)
    return { outcome: 'skipped_budget', reason: call.reason }
  }

  const { parsed } = call
  if (parsed.kind === 'fallback') {
    ctx.onDiagnostic?.(`overview: ${parsed.reason}`)
    understanding.summary = parsed.raw.trim()
    return { outcome: 'fallback', reason: parsed.reason }
  }

  understanding.summary = parsed.value.summary.trim()
  understanding.setOpenQuestions(parsed.value.open_questions)
  const added = understanding.addCandidates(parsed.value.candidate_files, 'overview', maxCandidates)
  return { outcome: 'completed', added: added.length }
}
