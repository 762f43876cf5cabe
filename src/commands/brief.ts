import { Command } from 'commander'
import chalk from 'chalk'
import ora from 'ora'
import { loadConfig } from '../config/loader.js'
import { resolveRunSettings, type BriefCommandOptions } from '../config/settings.js'
import { ConfigurationError, errorMessage } from '../errors.js'
import { runBriefing } from '../orchestrator/run.js'
import type { BriefingResult, StageOutcome } from '../orchestrator/types.js'
import { createReporter, writeOutput } from '../reporter/index.js'

export const EXIT_OK = 0
export const EXIT_ERROR = 1
export const EXIT_USAGE = 2
export const EXIT_INTERRUPTED = 130

interface BriefOptions extends BriefCommandOptions {
  config?: string
}

export function exitCodeFor(result: BriefingResult, interrupted: boolean): number {
  if (interrupted) return EXIT_INTERRUPTED
  if (result.stoppedReason === 'fetch_failed') return EXIT_ERROR
  return EXIT_OK
}

export function exitCodeForError(error: unknown): number {
  return error instanceof ConfigurationError ? EXIT_USAGE : EXIT_ERROR
}

function describeOutcome(outcome: StageOutcome): string {
  switch (outcome) {
    case 'completed': return 'done'
    case 'fallback': return 'unstructured response, raw text kept'
    case 'skipped_budget': return 'skipped, budget exhausted'
    case 'skipped_cancelled': return 'skipped, cancelled'
    case 'aborted': return 'aborted, every file in a batch failed'
  }
}

async function runBriefCommand(repoUrl: string, options: BriefOptions): Promise<number> {
  const spinner = ora('Loading configuration...').start()
  const controller = new AbortController()
  let interrupts = 0
  const onSigint = () => {
    interrupts++
    if (interrupts > 1) process.exit(EXIT_INTERRUPTED)
    controller.abort()
    spinner.warn(chalk.yellow('Interrupted, stopping after the current request (Ctrl+C again to quit now)'))
  }
  process.on('SIGINT', onSigint)

  try {
    const config = loadConfig(options.config)
    const settings = resolveRunSettings(options, config)
    spinner.succeed('Configuration loaded')

    const verbose = (message: string) => {
      if (settings.verbose) console.error(chalk.dim(`  ${message}`))
    }

    console.error(chalk.bgBlue.white.bold(' Repository Briefing '))
    console.error(chalk.dim(`├─ Repo: ${repoUrl}`))
    console.error(chalk.dim(`├─ Model: ${settings.model}`))
    console.error(chalk.dim(`├─ Max iterations: ${settings.maxIters}, max requests: ${settings.maxTurns}`))
    console.error(chalk.dim(`└─ Max cost: ${settings.maxCostUsd === undefined ? 'unlimited' : `$${settings.maxCostUsd}`}`))

    spinner.start('Fetching repository context...')
    const result = await runBriefing(repoUrl, settings, { config }, {
      signal: controller.signal,
      onContext: context => {
        spinner.succeed(`Fetched ${context.fullName}@${context.ref}`)
        verbose(`${context.treePaths.length} files in tree, ${context.keyFiles.length} key files sampled`)
      },
      onStageStart: stage => {
        spinner.start(`Running ${stage}...`)
      },
      onStageComplete: (stage, outcome) => {
        const text = `${stage}: ${describeOutcome(outcome)}`
        if (outcome === 'completed') {
          spinner.succeed(text)
        } else if (spinner.isSpinning) {
          spinner.warn(chalk.yellow(text))
        } else {
          console.error(chalk.yellow(`⚠ ${text}`))
        }
      },
      onTransition: t => verbose(`deep-dive ${t.from} -> ${t.to}${t.note ? ` (${t.note})` : ''}`),
      onUsage: u => verbose(`${u.stage}: ${u.promptTokens} in / ${u.completionTokens} out, ~$${u.costUsd.toFixed(4)}`),
      onDiagnostic: verbose
    })

    const rendered = createReporter(settings.format).generate(result)
    const written = writeOutput(rendered, settings.output)

    const { totals } = result.budget
    console.error(chalk.dim(`\n  Total ${totals.tokens.toLocaleString()} tokens in ${totals.requests} request(s), ~$${totals.costUsd.toFixed(4)}`))
    if (result.stoppedReason !== 'completed') {
      console.error(chalk.yellow(`  Stopped: ${result.stoppedReason}`))
    }
    if (written) {
      console.error(chalk.green(`  ✓ Output saved to: ${written}`))
    }

    return exitCodeFor(result, controller.signal.aborted)
  } catch (error) {
    spinner.fail('Error')
    console.error(chalk.red(`Error: ${errorMessage(error)}`))
    return controller.signal.aborted ? EXIT_INTERRUPTED : exitCodeForError(error)
  } finally {
    process.off('SIGINT', onSigint)
  }
}

export const briefCommand = new Command('brief')
  .description('Generate a briefing and reading plan for a public GitHub repository')
  .argument('<repo_url>', 'Repository URL, e.g. https://github.com/OWNER/REPO')
  .option('-c, --config <path>', 'Path to config file')
  .option('-m, --model <name>', 'Model name (default: gpt-4.1-mini)')
  .option('--max-iters <n>', 'Deep-dive iterations (default: 2)')
  .option('--max-turns <n>', 'Maximum model requests for the whole run, all stages included (default: 12, or max-iters + 2 when larger)')
  .option('--max-cost <usd>', 'Cost ceiling in USD (default: unlimited)')
  .option('--max-tokens <n>', 'Token ceiling (default: unlimited)')
  .option('-f, --format <format>', 'Output format (markdown|json)')
  .option('-o, --output <path>', 'Write to a file instead of stdout ("-" for stdout)')
  .option('--ref <ref>', 'Branch, tag or commit to read (default: the default branch)')
  .option('--max-readme-chars <n>', 'README characters sent to the model (default: 12000)')
  .option('--max-tree-entries <n>', 'Tree summary entries (default: 350)')
  .option('--max-key-files <n>', 'Key files sampled and fetched per run (default: 12)')
  .option('--max-file-chars <n>', 'Characters kept per fetched file (default: 12000)')
  .option('--file-timeout <ms>', 'Per-file fetch timeout during the deep-dive (default: 20000)')
  .option('--price-in <usd>', 'Input price per 1M tokens, overrides the pricing table')
  .option('--price-out <usd>', 'Output price per 1M tokens, overrides the pricing table')
  .option('--price-cached-in <usd>', 'Cached input price per 1M tokens (default: the input price)')
  .option('--verbose', 'Print state transitions and per-request usage to stderr')
  .action(async (repoUrl: string, options: BriefOptions) => {
    process.exitCode = await runBriefCommand(repoUrl, options)
  })
