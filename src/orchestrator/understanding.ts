// src/orchestrator/understanding.ts
import { normalizePath } from '../repo-scanner/filter.js'
import type { StageName } from '../budget/types.js'

export type CandidateStatus = 'pending' | 'explored' | 'unavailable'

export interface CandidateFile {
  path: string
  reason: string
  discoveredBy: StageName | 'context'
  status: CandidateStatus
}

export interface CandidateInput {
  path: string
  reason: string
}

/**
 * The evolving picture of the repository threaded through every stage.
 * Candidates keep first-discovery order; a path is never added twice and a
 * path that was already explored or found unavailable is never reopened.
 */
export class Understanding {
  summary = ''
  private questions: string[] = []
  private candidateList: CandidateFile[] = []
  private index = new Map<string, CandidateFile>()

  get openQuestions(): readonly string[] {
    return this.questions
  }

  get candidates(): readonly CandidateFile[] {
    return this.candidateList
  }

  setOpenQuestions(questions: readonly string[]): void {
    const seen = new Set<string>()
    this.questions = []
    for (const q of questions) {
      const trimmed = q.trim()
      if (trimmed && !seen.has(trimmed)) {
        seen.add(trimmed)
        this.questions.push(trimmed)
      }
    }
  }

  /**
   * Append candidates in order, skipping invalid and already-known paths.
   * With `limit`, stops once that many new candidates were added; the rest are
   * dropped whole. Returns the candidates that were actually added.
   */
  addCandidates(inputs: readonly CandidateInput[], discoveredBy: CandidateFile['discoveredBy'], limit?: number): CandidateFile[] {
    const added: CandidateFile[] = []
    for (const input of inputs) {
      if (limit !== undefined && added.length >= limit) break
      const path = normalizePath(input.path)
      if (!path || this.index.has(path)) continue

      const candidate: CandidateFile = { path, reason: input.reason.trim(), discoveredBy, status: 'pending' }
      this.index.set(path, candidate)
      this.candidateList.push(candidate)
      added.push(candidate)
    }
    return added
  }

  pending(): CandidateFile[] {
    return this.candidateList.filter(c => c.status === 'pending')
  }

  hasPending(): boolean {
    return this.candidateList.some(c => c.status === 'pending')
  }

  markExplored(paths: readonly string[]): void {
    this.mark(paths, 'explored')
  }

  markUnavailable(paths: readonly string[]): void {
    this.mark(paths, 'unavailable')
  }

  explored(): string[] {
    return this.candidateList.filter(c => c.status === 'explored').map(c => c.path)
  }

  unavailable(): string[] {
    return this.candidateList.filter(c => c.status === 'unavailable').map(c => c.path)
  }

  has(path: string): boolean {
    return this.index.has(normalizePath(path))
  }

  snapshotCandidates(): CandidateFile[] {
    return this.candidateList.map(c => ({ ...c }))
  }

  private mark(paths: readonly string[], status: CandidateStatus): void {
    for (const p of paths) {
      const candidate = this.index.get(normalizePath(p))
      if (candidate && candidate.status === 'pending') {
        candidate.status = status
      }
    }
  }
}
