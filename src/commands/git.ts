import chalk from 'chalk'
import type { Command } from 'commander'
import { changelog, sync, update } from '../workflows/local.js'
import { createContext, runAction } from './shared.js'

export function registerGitCommands(program: Command): void {
  // --- changelog ---
  program
    .command('changelog')
    .description('Changelog of the merges since the latest release')
    .option('-b, --base <ref>', 'Start of the range (defaults to the latest release tag)')
    .option('--head <ref>', 'End of the range', 'HEAD')
    .option('--ids', 'Print only the ticket ids')
    .action(
      runAction(async (opts: { base?: string; head: string; ids?: boolean }, command: Command) => {
        const ctx = createContext(command)
        const result = await changelog(ctx, { base: opts.base, head: opts.head })

        if (opts.ids) {
          console.log(result.ticketIds.join('\n'))
          return
        }
        if (result.lines.length === 0) {
          console.log(chalk.yellow(`No changes between ${result.base} and ${result.head}`))
          return
        }
        console.log(result.text)
      })
    )

  // --- sync ---
  program
    .command('sync')
    .description('Bring the fork master and develop up to date with mainline')
    .action(
      runAction(async (_opts: object, command: Command) => {
        const ctx = createContext(command)
        const branches = await sync(ctx)
        console.log(chalk.green(`Synced ${branches.join(', ')}`))
      })
    )

  // --- update ---
  program
    .command('update')
    .description('Rebase the current branch onto its mainline base and force-push it')
    .option('-b, --base <branch>', 'Base branch (derived from the branch name when omitted)')
    .action(
      runAction(async (opts: { base?: string }, command: Command) => {
        const ctx = createContext(command)
        const { branch, base } = await update(ctx, { base: opts.base })
        console.log(chalk.green(`${branch} rebased onto ${ctx.config.repo.mainlineRemote}/${base}`))
      })
    )
}
