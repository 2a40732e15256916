import { existsSync, readFileSync } from 'fs'
import { fileURLToPath } from 'url'
import type { Command } from 'commander'
import { UsageError } from '../lib/errors.js'
import { runAction } from './shared.js'

// Sources sit two levels below the root; compiled output one more.
const CANDIDATES = ['../../completion/octoeb.bash', '../../../completion/octoeb.bash']

export function completionScriptPath(): string {
  for (const candidate of CANDIDATES) {
    const path = fileURLToPath(new URL(candidate, import.meta.url))
    if (existsSync(path)) return path
  }
  throw new UsageError('Bash completion script is missing from this installation')
}

export function registerCompletionCommand(program: Command): void {
  program
    .command('completion')
    .description('Print the bash completion script (eval "$(octoeb completion)")')
    .action(
      runAction(async () => {
        process.stdout.write(readFileSync(completionScriptPath(), 'utf-8'))
      })
    )
}
