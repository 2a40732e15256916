import chalk from 'chalk'
import type { Command } from 'commander'
import open from 'open'
import { BRANCH_KINDS } from '../lib/types.js'
import { reviewBranch } from '../workflows/review.js'
import { createContext, parseTicketId, parseVersion, resolveTicketId, runAction } from './shared.js'

export function registerReviewCommand(program: Command): void {
  const review = program.command('review').description('Open a pull request for a started branch')

  for (const kind of BRANCH_KINDS) {
    const sub = review
      .command(kind)
      .description(`Open the pull request for a ${kind} branch`)
      .option('-t, --ticket <id>', 'Ticket id, e.g. EB-123 (prompted when omitted)', parseTicketId)
      .option('-o, --open', 'Open the pull request in the browser')

    if (kind === 'releasefix') {
      sub.option('-v, --version <version>', 'Release the fix targets (defaults to the newest release branch)', parseVersion)
    }

    sub.action(
      runAction(async (opts: { ticket?: string; open?: boolean; version?: string }, command: Command) => {
        const ctx = createContext(command)
        const ticketId = await resolveTicketId(ctx, kind, opts.ticket)

        const { pullRequest, created, transition, ticket, base } = await reviewBranch(ctx, kind, ticketId, {
          version: opts.version,
        })

        console.log(
          created
            ? chalk.green(`Pull request #${pullRequest.number} opened into ${base}`)
            : chalk.yellow(`Pull request #${pullRequest.number} into ${base} was already open`)
        )
        console.log(chalk.dim(pullRequest.url))
        if (transition.changed) {
          console.log(`${ticket.key}: ${transition.from} → ${transition.to}`)
        }

        if (opts.open) {
          await open(pullRequest.url)
        }
      })
    )
  }
}
