import { Command } from 'commander'
import { initConfig, AVAILABLE_PROVIDERS } from '../config/init.js'
import type { ProviderName } from '../providers/types.js'
import chalk from 'chalk'
import { createInterface } from 'readline'

export function parseProviderSelection(answer: string): ProviderName[] {
  const selections = answer
    .split(',')
    .map(s => s.trim())
    .filter(s => s)
    .map(s => parseInt(s, 10))
    .filter(n => !isNaN(n) && n >= 1 && n <= AVAILABLE_PROVIDERS.length)
    .map(n => AVAILABLE_PROVIDERS[n - 1].id)

  return [...new Set(selections)]
}

async function selectProviders(): Promise<ProviderName[]> {
  const rl = createInterface({
    input: process.stdin,
    output: process.stderr
  })

  const question = (prompt: string): Promise<string> => {
    return new Promise(resolve => {
      rl.question(prompt, resolve)
    })
  }

  console.error(chalk.cyan('\nSelect the model providers you have API keys for:\n'))

  AVAILABLE_PROVIDERS.forEach((provider, index) => {
    console.error(`  ${chalk.bold(index + 1)}. ${provider.name} ${chalk.dim(`(${provider.model})`)}`)
    console.error(`     ${chalk.dim(provider.description)}`)
  })

  console.error()
  const answer = await question(chalk.white('Enter provider numbers separated by comma (e.g., 1,2): '))
  rl.close()

  return parseProviderSelection(answer)
}

export const initCommand = new Command('init')
  .description('Create a starter config at ~/.repo-brief/config.yaml')
  .option('-y, --yes', 'Use the default provider (OpenAI)')
  .action(async (options: { yes?: boolean }) => {
    try {
      let selected: ProviderName[] = ['openai']

      if (!options.yes) {
        const answer = await selectProviders()
        if (answer.length === 0) {
          console.error(chalk.yellow('\nNo providers selected. Using the default (OpenAI).'))
        } else {
          selected = answer
        }

        console.error(chalk.yellow('\nSet these environment variables (or put them in a .env file):'))
        for (const provider of AVAILABLE_PROVIDERS.filter(p => selected.includes(p.id))) {
          console.error(`  - ${provider.envVar}`)
        }
        console.error(`  - GITHUB_TOKEN ${chalk.dim('(optional)')}`)
      }

      const path = initConfig(undefined, selected)
      console.error(chalk.green(`\n✓ Config created at: ${path}`))
      console.error(chalk.dim('Edit this file to change the default model, limits and pricing.'))
    } catch (error) {
      if (error instanceof Error) {
        console.error(chalk.red(`Error: ${error.message}`))
      }
      process.exitCode = 1
    }
  })
