// tests/reporter/fixtures.ts
import type { BriefingResult } from '../../src/orchestrator/types.js'

export function completedResult(): BriefingResult {
  return {
    repoUrl: 'https://github.com/acme/widget',
    fullName: 'acme/widget',
    ref: 'main',
    model: 'gpt-4.1-mini',
    overview: 'Widget serves widgets.',
    openQuestions: ['How is it deployed?'],
    candidates: [
      { path: 'src/server.ts', reason: 'Entrypoint', discoveredBy: 'overview', status: 'explored' },
      { path: 'src/gone.ts', reason: 'Missing', discoveredBy: 'overview', status: 'unavailable' }
    ],
    readingPlan: [
      { path: 'src/server.ts', reason: 'Entry | point', estimatedMinutes: 10, knownPath: true },
      { path: 'lib/ghost.ts', reason: 'Helpers', estimatedMinutes: null, knownPath: false }
    ],
    stages: { 'overview': 'completed', 'deep-dive': 'completed', 'reading-plan': 'completed' },
    degraded: { overview: false, deepDive: false, readingPlan: false },
    deepDive: {
      state: 'done',
      iterations: 1,
      endReason: 'no_candidates',
      explored: ['src/server.ts'],
      unavailable: ['src/gone.ts'],
      filesFetched: 2,
      fallbacks: 0,
      transitions: [{ from: 'idle', to: 'selecting', iteration: 0 }],
      warnings: []
    },
    budget: {
      limits: { maxTokens: null, maxCostUsd: 0.5, maxRequests: 12 },
      totals: { tokens: 12345, costUsd: 0.0123, requests: 3 },
      remaining: { tokens: null, costUsd: 0.4877, requests: 9 },
      exhausted: false,
      calls: []
    },
    stoppedReason: 'completed',
    warnings: [],
    generatedAt: new Date('2026-01-26T10:00:00Z')
  }
}

export function budgetSkippedResult(): BriefingResult {
  return {
    ...completedResult(),
    overview: '# acme/widget',
    openQuestions: [],
    candidates: [],
    readingPlan: [{ path: 'README.md', reason: '', estimatedMinutes: null, knownPath: true }],
    stages: { 'overview': 'skipped_budget', 'deep-dive': 'skipped_budget', 'reading-plan': 'skipped_budget' },
    degraded: { overview: true, deepDive: true, readingPlan: true },
    deepDive: {
      state: 'done',
      iterations: 0,
      endReason: 'budget_exceeded',
      explored: [],
      unavailable: [],
      filesFetched: 0,
      fallbacks: 0,
      transitions: [],
      warnings: []
    },
    budget: {
      limits: { maxTokens: null, maxCostUsd: 0, maxRequests: null },
      totals: { tokens: 0, costUsd: 0, requests: 0 },
      remaining: { tokens: null, costUsd: 0, requests: null },
      exhausted: true,
      denyReason: 'max_cost',
      calls: []
    },
    stoppedReason: 'budget_exceeded',
    warnings: ['Budget exhausted (max_cost) before the overview; briefing built from repository metadata only.']
  }
}
