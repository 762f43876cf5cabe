// tests/stages/overview.test.ts
import { describe, it, expect } from 'vitest'
import { BudgetTracker } from '../../src/budget/tracker.js'
import type { BudgetLimits } from '../../src/budget/types.js'
import { Understanding } from '../../src/orchestrator/understanding.js'
import { contextOverview, runOverviewStage } from '../../src/stages/overview.js'
import type { AIProvider } from '../../src/providers/types.js'
import { createContext, createMockProvider, overviewJson } from '../helpers.js'

const pricing = { input: 2, output: 8, cachedInput: 0.5 }

const stageContext = (provider: AIProvider, limits: BudgetLimits = {}) => ({
  provider,
  tracker: new BudgetTracker(limits, pricing),
  pricing
})

describe('runOverviewStage', () => {
  it('should fill the understanding from a structured response', async () => {
    const { provider, chat } = createMockProvider([
      overviewJson(['src/server.ts', 'src/db.ts', 'src/routes.ts', 'src/auth.ts'])
    ])
    const ctx = stageContext(provider)
    const understanding = new Understanding()

    const result = await runOverviewStage(ctx, createContext(), understanding, 3)

    expect(result).toEqual({ outcome: 'completed', added: 3 })
    expect(understanding.summary).toBe('Overview summary')
    expect(understanding.openQuestions).toEqual(['How is it deployed?'])
    expect(understanding.candidates.map(c => c.path)).toEqual(['src/server.ts', 'src/db.ts', 'src/routes.ts'])
    expect(understanding.candidates.every(c => c.discoveredBy === 'overview')).toBe(true)
    expect(chat).toHaveBeenCalledTimes(1)
    expect(chat.mock.calls[0][1]?.responseFormat).toBe('json')
    const totals = ctx.tracker.getTotals()
    expect(totals.tokens).toBe(1500)
    expect(totals.requests).toBe(1)
    expect(totals.costUsd).toBeCloseTo(0.006, 10)
  })

  it('should keep raw text as the summary when the response is not JSON', async () => {
    const { provider } = createMockProvider(['  The widget repo serves widgets over HTTP.  '])
    const understanding = new Understanding()

    const result = await runOverviewStage(stageContext(provider), createContext(), understanding, 3)

    expect(result).toEqual({ outcome: 'fallback', reason: 'no JSON object found in response' })
    expect(understanding.summary).toBe('The widget repo serves widgets over HTTP.')
    expect(understanding.candidates).toHaveLength(0)
  })

  it('should skip the request and summarise the context when the budget denies', async () => {
    const { provider, chat } = createMockProvider([overviewJson(['src/server.ts'])])
    const understanding = new Understanding()
    const context = createContext()

    const result = await runOverviewStage(stageContext(provider, { maxCostUsd: 0 }), context, understanding, 3)

    expect(result).toEqual({ outcome: 'skipped_budget', reason: 'max_cost' })
    expect(chat).not.toHaveBeenCalled()
    expect(understanding.summary).toBe(contextOverview(context))
  })
})

describe('contextOverview', () => {
  it('should render metadata and a README excerpt', () => {
    expect(contextOverview(createContext())).toBe([
      '# acme/widget',
      '',
      'A widget service',
      '',
      '- Language: TypeScript',
      '- Topics: http, widgets',
      '- License: MIT',
      '- Ref: main',
      '',
      '## README excerpt',
      '',
      '# Widget\nServes widgets.'
    ].join('\n'))
  })

  it('should omit missing fields', () => {
    const context = createContext({ description: null, language: null, topics: [], license: null, readme: '' })
    expect(contextOverview(context)).toBe('# acme/widget\n\n- Ref: main')
  })
})
