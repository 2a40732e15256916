import chalk from 'chalk'
import type { Command } from 'commander'
import { BRANCH_KINDS } from '../lib/types.js'
import { startBranch, startRelease } from '../workflows/start.js'
import { createContext, parseTicketId, parseVersion, resolveTicketId, runAction } from './shared.js'

const KIND_HELP = {
  feature: 'Start a feature branch off develop',
  hotfix: 'Start a hotfix branch off the latest release tag',
  releasefix: 'Start a releasefix branch off a release branch',
} as const

export function registerStartCommand(program: Command): void {
  const start = program.command('start').description('Start a feature, hotfix, releasefix or release branch')

  for (const kind of BRANCH_KINDS) {
    const sub = start
      .command(kind)
      .description(KIND_HELP[kind])
      .option('-t, --ticket <id>', 'Ticket id, e.g. EB-123 (prompted when omitted)', parseTicketId)
      .option('--no-checkout', 'Do not fetch and check out the new branch')

    if (kind === 'releasefix') {
      sub.option('-v, --version <version>', 'Release to fix (defaults to the newest release branch)', parseVersion)
    }

    sub.action(
      runAction(async (opts: { ticket?: string; checkout: boolean; version?: string }, command: Command) => {
        const ctx = createContext(command)
        const ticketId = await resolveTicketId(ctx, kind, opts.ticket)

        const result = await startBranch(ctx, kind, ticketId, { version: opts.version, checkout: opts.checkout })

        console.log(
          result.created
            ? chalk.green(`Branch ${result.branch} created off ${result.base}`)
            : chalk.yellow(`Branch ${result.branch} was already started`)
        )
        console.log(chalk.dim(result.url))
        if (result.transition.changed) {
          console.log(`${result.ticket.key}: ${result.transition.from} → ${result.transition.to}`)
        }
        if (!result.checkedOut) {
          console.log(`\nTo work on it:\n  git fetch ${ctx.config.repo.forkRemote} && git checkout ${result.branch}`)
        }
      })
    )
  }

  start
    .command('release')
    .description('Cut a release branch off develop')
    .argument('[version]', 'Release version (defaults to the one after the latest release)', parseVersion)
    .option('-v, --version <version>', 'Same as the version argument', parseVersion)
    .option('--checkout', 'Check out the release branch afterwards')
    .action(
      runAction(async (version: string | undefined, opts: { version?: string; checkout?: boolean }, command: Command) => {
        const ctx = createContext(command)
        const result = await startRelease(ctx, { version: version ?? opts.version, checkout: opts.checkout })

        console.log(
          result.branchCreated
            ? chalk.green(`Release branch ${result.branch} created`)
            : chalk.yellow(`Release branch ${result.branch} already exists`)
        )
        console.log(chalk.dim(result.url))
        console.log(
          `Release ticket: ${chalk.bold(result.ticket.key)} ${result.ticketCreated ? '(created)' : '(existing)'} ${chalk.dim(result.ticket.url)}`
        )
        if (result.channel) console.log(`Channel: #${result.channel.name}`)

        if (result.changelog && result.changelog.lines.length > 0) {
          console.log(chalk.bold('\nChanges:'))
          console.log(result.changelog.text)
        }
        for (const warning of result.warnings) {
          console.log(chalk.yellow(`Warning: ${warning}`))
        }
      })
    )
}
