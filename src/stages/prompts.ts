// src/stages/prompts.ts
import type { RepoContext } from '../github/types.js'
import { DEEP_DIVE_SHAPE, OVERVIEW_SHAPE, READING_PLAN_SHAPE } from '../parser/shapes.js'

export interface FileExcerpt {
  path: string
  content: string
}

export function buildOverviewSystemPrompt(maxCandidates: number): string {
  return `You are a staff engineer. Goal: produce an "80% understanding" overview of a GitHub repository.

You will be given repo_context JSON with metadata, README, a tree summary and sampled key files.

OUTPUT MUST BE A SINGLE VALID JSON OBJECT with this schema:
${OVERVIEW_SHAPE.example}

The summary is markdown and covers:
- What it is and who it is for
- Key features
- Architecture overview (major directories and modules)
- Execution model and entrypoints (CLI, web, service)
- How to run locally, config and env vars (only if evidenced; otherwise say unknown)
- Data flow (APIs, databases, queues) if evidenced
- Risks and gotchas (tests, build complexity) if evidenced

open_questions lists what the context could not answer.
candidate_files lists 0-${maxCandidates} paths from the tree worth reading next, most important first,
each with a one-sentence reason. Prefer entrypoints and core logic. Never invent paths.`
}

export function buildOverviewPrompt(context: RepoContext): string {
  return JSON.stringify({
    repo_url: context.repoUrl,
    ref: context.ref,
    repo_context: {
      full_name: context.fullName,
      description: context.description,
      stars: context.stars,
      language: context.language,
      topics: context.topics,
      license: context.license,
      default_branch: context.defaultBranch,
      readme: context.readme,
      tree_summary: context.treeSummary,
      key_files: context.keyFiles,
      key_file_contents: context.keyFileContents
    },
    instruction: 'Analyze this repo context and produce the required JSON output.'
  })
}

export const DEEP_DIVE_SYSTEM_PROMPT = `You are a staff engineer refining a briefing about a GitHub repository.

You will be given the current briefing (markdown), the open questions, and the contents of
files that were just fetched. Improve the briefing with sharper, more accurate details and be
explicit about what the files support versus what is inferred. Answer open questions where the
files allow it and drop the ones you answered.

OUTPUT MUST BE A SINGLE VALID JSON OBJECT with this schema:
${DEEP_DIVE_SHAPE.example}

new_candidate_files lists 0-6 additional paths worth reading, only if they are needed.
Keep it succinct and focused on 80% understanding.`

export interface DeepDivePromptData {
  context: RepoContext
  summary: string
  openQuestions: readonly string[]
  files: FileExcerpt[]
  unavailable: readonly string[]
  alreadyExplored: readonly string[]
  iteration: number
}

export function buildDeepDivePrompt(data: DeepDivePromptData): string {
  const { context, summary, openQuestions, files, unavailable, alreadyExplored, iteration } = data
  return JSON.stringify({
    repo_url: context.repoUrl,
    ref: context.ref,
    iteration,
    current_briefing_markdown: summary,
    open_questions: openQuestions,
    fetched_files: Object.fromEntries(files.map(f => [f.path, f.content])),
    unavailable_paths: unavailable,
    already_explored: alreadyExplored,
    instruction: 'Use the fetched files to improve the briefing and produce the required JSON output.'
  })
}

export const READING_PLAN_SYSTEM_PROMPT = `You are a staff engineer writing a practical reading plan to get productive fast.

You will be given the final briefing, the open questions, and the known paths of the repository.

OUTPUT MUST BE A SINGLE VALID JSON OBJECT with this schema:
${READING_PLAN_SHAPE.example}

Requirements:
- 8-15 items, in the order they should be read.
- Each item names a file or directory, says in one sentence why it matters,
  and estimates the reading time in whole minutes.
- Only use paths that appear in known_paths or tree_summary, or clearly
  directory-level guidance such as "src/".`

export interface ReadingPlanPromptData {
  context: RepoContext
  summary: string
  openQuestions: readonly string[]
  knownPaths: readonly string[]
}

export function buildReadingPlanPrompt(data: ReadingPlanPromptData): string {
  const { context, summary, openQuestions, knownPaths } = data
  return JSON.stringify({
    repo_url: context.repoUrl,
    final_briefing_markdown: summary,
    open_questions: openQuestions,
    tree_summary: context.treeSummary,
    known_paths: knownPaths,
    note: 'Only use file paths that appear in known_paths or tree_summary.'
  })
}
