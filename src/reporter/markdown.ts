// src/reporter/markdown.ts
import type { StageName } from '../budget/types.js'
import type { BriefingResult } from '../orchestrator/types.js'
import type { ReadingPlanItem } from '../stages/reading-plan.js'
import type { Reporter } from './types.js'

const STAGES: StageName[] = ['overview', 'deep-dive', 'reading-plan']

function cell(text: string): string {
  return text.replace(/\r?\n/g, ' ').replace(/\|/g, '\\|')
}

function usd(value: number): string {
  return `$${value.toFixed(4)}`
}

export class MarkdownReporter implements Reporter {
  readonly format = 'markdown'

  generate(result: BriefingResult): string {
    const lines: string[] = []

    // Header
    lines.push(`# Repository Briefing: ${result.fullName}`)
    lines.push(`Generated: ${result.generatedAt.toISOString().split('T')[0]} | Ref: ${result.ref} | Model: ${result.model}`)
    lines.push(`Source: ${result.repoUrl}`)
    lines.push('')

    const degraded = STAGES.filter(stage => result.stages[stage] !== 'completed')
    if (degraded.length > 0) {
      lines.push(`> Degraded: ${degraded.map(stage => `${stage} (${result.stages[stage]})`).join(', ')}`)
      lines.push('')
    }

    lines.push('## Overview')
    lines.push('')
    lines.push(result.overview.trim() || '_No overview available._')
    lines.push('')

    if (result.openQuestions.length > 0) {
      lines.push('## Open Questions')
      for (const q of result.openQuestions) {
        lines.push(`- ${q}`)
      }
      lines.push('')
    }

    lines.push('## Reading Plan')
    lines.push('')
    if (result.readingPlan.length === 0) {
      lines.push('_No files to suggest._')
    } else {
      lines.push(this.formatPlanTable(result.readingPlan))
    }
    if (result.degraded.readingPlan && result.readingPlan.length > 0) {
      lines.push('')
      lines.push(`_Plan synthesised from candidate files in discovery order (reading-plan stage: ${result.stages['reading-plan']})._`)
    }
    lines.push('')

    if (result.deepDive.explored.length > 0 || result.deepDive.unavailable.length > 0) {
      lines.push('## Explored Files')
      for (const path of result.deepDive.explored) {
        lines.push(`- \`${path}\``)
      }
      for (const path of result.deepDive.unavailable) {
        lines.push(`- \`${path}\` (unavailable)`)
      }
      lines.push('')
    }

    lines.push(...this.formatMetadata(result))

    return lines.join('\n')
  }

  private formatPlanTable(items: readonly ReadingPlanItem[]): string {
    const lines: string[] = []
    lines.push('| # | Path | Why | Minutes |')
    lines.push('|---|------|-----|---------|')
    items.forEach((item, i) => {
      const path = item.knownPath ? `\`${cell(item.path)}\`` : `\`${cell(item.path)}\` (unverified)`
      const minutes = item.estimatedMinutes === null ? '-' : String(item.estimatedMinutes)
      lines.push(`| ${i + 1} | ${path} | ${cell(item.reason)} | ${minutes} |`)
    })
    return lines.join('\n')
  }

  private formatMetadata(result: BriefingResult): string[] {
    const { budget, deepDive } = result
    const lines: string[] = []
    lines.push('## Run Metadata')
    const costLimit = budget.limits.maxCostUsd === null ? 'unlimited' : usd(budget.limits.maxCostUsd)
    lines.push(`- Cost: ${usd(budget.totals.costUsd)} (limit: ${costLimit})`)
    const tokenLimit = budget.limits.maxTokens === null ? 'unlimited' : budget.limits.maxTokens.toLocaleString('en-US')
    lines.push(`- Tokens: ${budget.totals.tokens.toLocaleString('en-US')} (limit: ${tokenLimit})`)
    const requestLimit = budget.limits.maxRequests === null ? 'unlimited' : String(budget.limits.maxRequests)
    lines.push(`- Requests: ${budget.totals.requests} (limit: ${requestLimit})`)
    lines.push(`- Deep-dive: ${deepDive.iterations} iteration(s), ended: ${deepDive.endReason}`)
    lines.push(`- Stopped: ${result.stoppedReason}`)

    if (result.warnings.length > 0) {
      lines.push('')
      lines.push('### Warnings')
      for (const w of result.warnings) {
        lines.push(`- ${w}`)
      }
    }
    return lines
  }
}
