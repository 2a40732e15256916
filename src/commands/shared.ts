import chalk from 'chalk'
import { InvalidArgumentError, type Command } from 'commander'
import { select } from '@inquirer/prompts'
import { OctoebError, UsageError, WorkflowStepError, describe } from '../lib/errors.js'
import { isTicketId, isVersion } from '../lib/format.js'
import * as log from '../lib/logger.js'
import type { BranchKind } from '../lib/types.js'
import { createWorkflowContext, type WorkflowContext } from '../workflows/context.js'

export type GlobalOptions = {
  config?: string
  log: log.LogLevel
}

export function globalOptions(command: Command): GlobalOptions {
  const opts = command.optsWithGlobals<Partial<GlobalOptions>>()
  return { config: opts.config, log: opts.log ?? 'warn' }
}

export function createContext(command: Command): WorkflowContext {
  return createWorkflowContext(globalOptions(command).config)
}

// --- Argument parsers ---

export function parseTicketId(value: string): string {
  if (!isTicketId(value)) {
    throw new InvalidArgumentError('Expected a ticket id such as EB-123.')
  }
  return value.toUpperCase()
}

export function parseVersion(value: string): string {
  if (!isVersion(value)) {
    throw new InvalidArgumentError('Expected a dotted numeric version such as 1.2.3.4.')
  }
  return value
}

// --- Interactive ---

/** Ticket id from `-t`, or picked from the user's tickets on a terminal. */
export async function resolveTicketId(ctx: WorkflowContext, kind: BranchKind, ticket?: string): Promise<string> {
  if (ticket) return ticket
  if (!process.stdin.isTTY) {
    throw new UsageError('-t, --ticket <id> is required')
  }

  const tickets = (await ctx.tracker.listMyTickets()).filter((t) => t.kinds.includes(kind))
  if (tickets.length === 0) {
    throw new UsageError(`None of your tickets is a ${kind} ticket; pass -t <id>`)
  }

  return select({
    message: `Select a ${kind} ticket:`,
    choices: tickets.map((t) => ({
      name: `${t.key.padEnd(10)} ${t.summary.substring(0, 60)}  ${chalk.dim(`[${t.status}]`)}`,
      value: t.key,
    })),
  })
}

// --- Failure reporting ---

export function reportFailure(error: unknown): void {
  if (error instanceof WorkflowStepError) {
    console.error(chalk.red(`✗ ${error.workflow} failed at "${error.step}"`))
    console.error(chalk.red(`  ${describe(error.cause)}`))
    if (error.completed.length > 0) {
      console.error('\nCompleted before the failure (left in place):')
      for (const step of error.completed) {
        console.error(chalk.green(`  ✓ ${step}`))
      }
    }
    return
  }
  console.error(chalk.red(`Error: ${describe(error)}`))
}

export function exitCodeOf(error: unknown): number {
  return error instanceof OctoebError ? error.exitCode : 1
}

/** Wrap a command action so failures print a report and set the exit code. */
export function runAction<A extends unknown[]>(fn: (...args: A) => Promise<void>): (...args: A) => Promise<void> {
  return async (...args: A) => {
    try {
      await fn(...args)
    } catch (error) {
      reportFailure(error)
      if (!(error instanceof OctoebError)) {
        log.debug(error instanceof Error && error.stack ? error.stack : String(error))
      }
      process.exit(exitCodeOf(error))
    }
  }
}
