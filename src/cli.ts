#!/usr/bin/env node
import { Command, CommanderError } from 'commander'
import { config as loadDotenv } from 'dotenv'
import { briefCommand, EXIT_USAGE } from './commands/brief.js'
import { initCommand } from './commands/init.js'

const program = new Command()

program
  .name('repo-brief')
  .description('Budgeted language-model briefings for GitHub repositories')
  .version('0.1.0')
  .option('--no-dotenv', 'Do not load a .env file from the working directory')
  .hook('preAction', () => {
    if (program.opts().dotenv !== false) {
      loadDotenv()
    }
  })

program.addCommand(briefCommand, { isDefault: true })
program.addCommand(initCommand)

// Usage errors exit with 2, help and version with 0
for (const command of [program, briefCommand, initCommand]) {
  command.exitOverride()
}

try {
  await program.parseAsync()
} catch (error) {
  if (error instanceof CommanderError) {
    process.exitCode = error.exitCode === 0 ? 0 : EXIT_USAGE
  } else {
    throw error
  }
}
