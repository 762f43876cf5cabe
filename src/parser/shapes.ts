// src/parser/shapes.ts
import { z } from 'zod'

const candidateFile = z.object({
  path: z.string().min(1),
  reason: z.string()
})

export const overviewSchema = z.object({
  summary: z.string(),
  open_questions: z.array(z.string()),
  candidate_files: z.array(candidateFile)
})

export const deepDiveSchema = z.object({
  updated_summary: z.string(),
  open_questions: z.array(z.string()),
  new_candidate_files: z.array(candidateFile)
})

export const readingPlanSchema = z.object({
  items: z.array(
    z.object({
      path: z.string().min(1),
      reason: z.string(),
      estimated_minutes: z.number().nonnegative()
    })
  )
})

export type CandidateFilePayload = z.infer<typeof candidateFile>
export type OverviewPayload = z.infer<typeof overviewSchema>
export type DeepDivePayload = z.infer<typeof deepDiveSchema>
export type ReadingPlanPayload = z.infer<typeof readingPlanSchema>

export interface ResponseShape<T> {
  name: 'overview' | 'deep-dive' | 'reading-plan'
  schema: z.ZodType<T>
  /** Shown to the model as the required output format. */
  example: string
}

export const OVERVIEW_SHAPE: ResponseShape<OverviewPayload> = {
  name: 'overview',
  schema: overviewSchema,
  example: `{
  "summary": "string (markdown briefing)",
  "open_questions": ["string"],
  "candidate_files": [{ "path": "src/index.ts", "reason": "why it is worth reading" }]
}`
}

export const DEEP_DIVE_SHAPE: ResponseShape<DeepDivePayload> = {
  name: 'deep-dive',
  schema: deepDiveSchema,
  example: `{
  "updated_summary": "string (markdown briefing, updated)",
  "open_questions": ["string"],
  "new_candidate_files": [{ "path": "src/core/engine.ts", "reason": "why it is worth reading" }]
}`
}

export const READING_PLAN_SHAPE: ResponseShape<ReadingPlanPayload> = {
  name: 'reading-plan',
  schema: readingPlanSchema,
  example: `{
  "items": [{ "path": "README.md", "reason": "one sentence on why it matters", "estimated_minutes": 10 }]
}`
}
