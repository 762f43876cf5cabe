// src/stages/deep-dive.ts
import type { DenyReason } from '../budget/types.js'
import { InvalidTransitionError, errorMessage } from '../errors.js'
import type { RepoContext, RepoSource } from '../github/types.js'
import { DEEP_DIVE_SHAPE } from '../parser/shapes.js'
import type { CandidateFile, Understanding } from '../orchestrator/understanding.js'
import { invokeStage, type StageContext } from './invoke.js'
import { buildDeepDivePrompt, DEEP_DIVE_SYSTEM_PROMPT, type FileExcerpt } from './prompts.js'

export type DeepDiveState = 'idle' | 'selecting' | 'fetching' | 'refining' | 'done' | 'aborted'

export const TRANSITIONS: Readonly<Record<DeepDiveState, readonly DeepDiveState[]>> = {
  idle: ['selecting', 'done'],
  selecting: ['fetching', 'done'],
  fetching: ['refining', 'selecting', 'aborted'],
  refining: ['selecting', 'done'],
  done: [],
  aborted: []
}

export type DeepDiveEndReason =
  | 'no_candidates'
  | 'iteration_cap'
  | 'file_cap'
  | 'budget_exceeded'
  | 'cancelled'
  | 'fetch_failed'

export interface DeepDiveTransition {
  from: DeepDiveState
  to: DeepDiveState
  iteration: number
  note?: string
}

export type FetchOutcome =
  | { status: 'ok'; path: string; content: string }
  | { status: 'unavailable'; path: string; reason: string }
  | { status: 'failed'; path: string; reason: string }

export interface DeepDiveReport {
  state: 'done' | 'aborted'
  iterations: number
  endReason: DeepDiveEndReason
  explored: string[]
  unavailable: string[]
  filesFetched: number
  /** Refinement responses that did not match the expected shape. */
  fallbacks: number
  denyReason?: DenyReason
  transitions: DeepDiveTransition[]
  warnings: string[]
}

export interface DeepDiveOptions {
  maxIters: number
  maxKeyFiles: number
  maxFileChars: number
  fileTimeoutMs: number
  signal?: AbortSignal
  onTransition?: (transition: DeepDiveTransition) => void
}

export function isTerminal(state: DeepDiveState): boolean {
  return TRANSITIONS[state].length === 0
}

/**
 * Bounded refinement loop over candidate files. Each `step()` performs the
 * work of the current state and moves to the next one; `run()` steps until a
 * terminal state.
 */
export class DeepDiveLoop {
  private current: DeepDiveState = 'idle'
  private iteration = 0
  private filesFetched = 0
  private fallbacks = 0
  private batch: CandidateFile[] = []
  private fetched: FileExcerpt[] = []
  private endReason: DeepDiveEndReason = 'no_candidates'
  private denyReason?: DenyReason
  private transitions: DeepDiveTransition[] = []
  private warnings: string[] = []
  private ctx: StageContext
  private source: RepoSource
  private context: RepoContext
  private understanding: Understanding
  private options: DeepDiveOptions

  constructor(
    ctx: StageContext,
    source: RepoSource,
    context: RepoContext,
    understanding: Understanding,
    options: DeepDiveOptions
  ) {
    this.ctx = ctx
    this.source = source
    this.context = context
    this.understanding = understanding
    this.options = options
  }

  get state(): DeepDiveState {
    return this.current
  }

  get iterations(): number {
    return this.iteration
  }

  async run(): Promise<DeepDiveReport> {
    while (!isTerminal(this.current)) {
      await this.step()
    }
    return this.report()
  }

  async step(): Promise<DeepDiveState> {
    switch (this.current) {
      case 'idle':
        this.start()
        break
      case 'selecting':
        this.select()
        break
      case 'fetching':
        await this.fetchBatch()
        break
      case 'refining':
        await this.refine()
        break
      case 'done':
      case 'aborted':
        break
    }
    return this.current
  }

  report(): DeepDiveReport {
    if (!isTerminal(this.current)) {
      throw new Error(`Deep-dive report requested in non-terminal state ${this.current}`)
    }
    return {
      state: this.current === 'aborted' ? 'aborted' : 'done',
      iterations: this.iteration,
      endReason: this.endReason,
      explored: this.understanding.explored(),
      unavailable: this.understanding.unavailable(),
      filesFetched: this.filesFetched,
      fallbacks: this.fallbacks,
      denyReason: this.denyReason,
      transitions: [...this.transitions],
      warnings: [...this.warnings]
    }
  }

  private transition(to: DeepDiveState, note?: string): void {
    const from = this.current
    if (!TRANSITIONS[from].includes(to)) {
      throw new InvalidTransitionError(from, to)
    }
    this.current = to
    const record: DeepDiveTransition = { from, to, iteration: this.iteration, note }
    this.transitions.push(record)
    this.options.onTransition?.(record)
  }

  private finish(reason: DeepDiveEndReason, note?: string): void {
    this.endReason = reason
    this.transition('done', note ?? reason)
  }

  private start(): void {
    if (this.options.signal?.aborted) {
      this.finish('cancelled')
    } else if (!this.understanding.hasPending()) {
      this.finish('no_candidates')
    } else if (this.iteration >= this.options.maxIters) {
      this.finish('iteration_cap')
    } else {
      this.transition('selecting')
    }
  }

  private select(): void {
    if (this.options.signal?.aborted) {
      this.finish('cancelled')
      return
    }
    if (this.iteration >= this.options.maxIters) {
      this.finish('iteration_cap')
      return
    }

    const room = this.options.maxKeyFiles - this.filesFetched
    const pending = this.understanding.pending()
    if (pending.length === 0) {
      this.finish('no_candidates')
      return
    }
    if (room <= 0) {
      this.finish('file_cap')
      return
    }

    this.batch = pending.slice(0, room)
    this.transition('fetching', this.batch.map(c => c.path).join(', '))
  }

  private async fetchBatch(): Promise<void> {
    const outcomes = await Promise.all(this.batch.map(c => this.fetchOne(c.path)))
    this.filesFetched += outcomes.length

    const ok: FileExcerpt[] = []
    const lost: string[] = []
    for (const outcome of outcomes) {
      if (outcome.status === 'ok') {
        ok.push({ path: outcome.path, content: outcome.content })
      } else {
        lost.push(outcome.path)
        this.warnings.push(`File ${outcome.status}: ${outcome.path} (${outcome.reason})`)
      }
    }
    this.understanding.markUnavailable(lost)

    if (ok.length > 0) {
      this.fetched = ok
      this.transition('refining', `${ok.length} of ${outcomes.length} files fetched`)
    } else if (outcomes.every(o => o.status === 'failed')) {
      this.endReason = 'fetch_failed'
      this.warnings.push(`Every file in the batch failed to fetch: ${lost.join(', ')}`)
      this.transition('aborted', 'fetch_failed')
    } else {
      this.transition('selecting', 'no file content in batch')
    }
  }

  /** Fetch a single file, turning a throw or a hang into a `failed` outcome. */
  private async fetchOne(path: string): Promise<FetchOutcome> {
    const controller = new AbortController()
    let timer: NodeJS.Timeout | undefined
    const timeout = new Promise<FetchOutcome>(resolve => {
      timer = setTimeout(() => {
        controller.abort()
        resolve({ status: 'failed', path, reason: `timed out after ${this.options.fileTimeoutMs}ms` })
      }, this.options.fileTimeoutMs)
    })

    const fetch = this.source
      .fetchFile(this.context, path, { signal: controller.signal, maxChars: this.options.maxFileChars })
      .then((file): FetchOutcome => file.status === 'ok'
        ? { status: 'ok', path, content: file.content }
        : { status: 'unavailable', path, reason: file.reason })
      .catch((error: unknown): FetchOutcome => ({ status: 'failed', path, reason: errorMessage(error) }))

    try {
      return await Promise.race([fetch, timeout])
    } finally {
      clearTimeout(timer)
    }
  }

  private async refine(): Promise<void> {
    const files = this.fetched
    const prompt = buildDeepDivePrompt({
      context: this.context,
      summary: this.understanding.summary,
      openQuestions: this.understanding.openQuestions,
      files,
      unavailable: this.understanding.unavailable(),
      alreadyExplored: this.understanding.explored(),
      iteration: this.iteration + 1
    })

    const call = await invokeStage(this.ctx, 'deep-dive', DEEP_DIVE_SYSTEM_PROMPT, prompt, DEEP_DIVE_SHAPE)
    if (call.kind === 'denied') {
      this.denyReason = call.reason
      this.finish('budget_exceeded', call.reason)
      return
    }

    const { parsed } = call
    if (parsed.kind === 'structured') {
      this.understanding.summary = parsed.value.updated_summary.trim()
      this.understanding.setOpenQuestions(parsed.value.open_questions)
      this.understanding.addCandidates(parsed.value.new_candidate_files, 'deep-dive')
    } else {
      this.fallbacks++
      this.ctx.onDiagnostic?.(`deep-dive: ${parsed.reason}`)
      this.understanding.summary = parsed.raw.trim()
    }

    this.understanding.markExplored(files.map(f => f.path))
    this.fetched = []
    this.batch = []
    this.iteration++

    if (this.iteration >= this.options.maxIters) {
      this.finish('iteration_cap')
    } else {
      this.transition('selecting')
    }
  }
}
