import chalk from 'chalk'
import { changelogFromMessages, releaseBranchName, type Changelog } from '../lib/format.js'
import type { BranchRef, Release, Ticket } from '../lib/types.js'
import { Workflow } from '../lib/workflow.js'
import { changelogPatterns, requireBranch, resolveReleaseBranch, type WorkflowContext } from './context.js'

export interface QaReport {
  branch: string
  tickets: Ticket[]
  changelog: Changelog
}

async function releaseChanges(ctx: WorkflowContext, wf: Workflow, branch: BranchRef): Promise<Changelog> {
  const { master } = ctx.config.repo
  const comparison = await wf.step(`compare ${master}...${branch.name}`, () =>
    ctx.mainline.compare(master, branch.name)
  )
  return changelogFromMessages(
    comparison.commits.map((c) => c.message),
    changelogPatterns(ctx.config)
  )
}

/**
 * Tickets merged into a release branch but not yet into master. Read-only;
 * tickets are fetched one at a time in id order.
 */
export async function listQaTickets(ctx: WorkflowContext, options: { branch?: string } = {}): Promise<QaReport> {
  const wf = new Workflow('qa')
  const { branch: name } = options

  const branch = await wf.step('find release branch', () =>
    name ? requireBranch(ctx.mainline, name) : resolveReleaseBranch(ctx)
  )
  const changelog = await releaseChanges(ctx, wf, branch)

  const tickets: Ticket[] = []
  for (const id of changelog.ticketIds) {
    tickets.push(await wf.step(`fetch ticket ${id}`, () => ctx.tracker.getTicket(id)))
  }

  return { branch: branch.name, tickets, changelog }
}

/** One line per ticket; `verbose` adds type, status and link. */
export function renderQaReport(report: QaReport, verbose = false): string[] {
  if (report.tickets.length === 0) {
    return [`No tickets waiting for QA on ${report.branch}`]
  }

  const lines = [chalk.bold(`Tickets on ${report.branch}:`)]
  for (const ticket of report.tickets) {
    lines.push(`  ${ticket.key}  ${ticket.summary}`)
    if (verbose) {
      lines.push(chalk.dim(`      ${ticket.issueType} · ${ticket.status} · ${ticket.url}`))
    }
  }
  return lines
}

export interface PrereleaseResult {
  version: string
  branch: string
  release: Release
  created: boolean
  changelog: Changelog
}

/** Tag the head of the version's release branch as a pre-release. */
export async function publishPrerelease(ctx: WorkflowContext, version: string): Promise<PrereleaseResult> {
  const wf = new Workflow('qa prerelease')
  const name = releaseBranchName(ctx.config.release, version)

  const branch = await wf.step(`find ${name}`, () => requireBranch(ctx.mainline, name))
  const changelog = await releaseChanges(ctx, wf, branch)

  const { release, created } = await wf.step(`tag ${version}`, () =>
    ctx.mainline.createTag(version, branch.sha, {
      title: `${name} (pre-release)`,
      body: `**Changes:**\n${changelog.text}`,
      prerelease: true,
    })
  )

  return { version, branch: name, release, created, changelog }
}
