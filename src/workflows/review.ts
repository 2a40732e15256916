import { branchName } from '../lib/format.js'
import type { BranchKind, PullRequest, Ticket, TransitionResult } from '../lib/types.js'
import { Workflow } from '../lib/workflow.js'
import { assertTicketKind, forkIsSeparate, requireBranch, resolveReleaseBranch, type WorkflowContext } from './context.js'

const TITLE_PREFIX: Record<BranchKind, string> = {
  feature: 'Feature',
  hotfix: 'Hotfix',
  releasefix: 'Releasefix',
}

export interface ReviewOptions {
  /** Release a releasefix targets; the newest release branch when unset. */
  version?: string
}

export interface ReviewResult {
  ticket: Ticket
  branch: string
  base: string
  pullRequest: PullRequest
  created: boolean
  transition: TransitionResult
}

export function pullRequestTitle(kind: BranchKind, ticket: Pick<Ticket, 'key' | 'summary'>): string {
  return `${TITLE_PREFIX[kind]} ${ticket.key}: ${ticket.summary}`
}

/** Ticket link, then the first line of every commit as a bullet. */
export function pullRequestBody(ticket: Pick<Ticket, 'key' | 'url'>, messages: string[] = []): string {
  const lines = [`Ticket: [${ticket.key}](${ticket.url})`]
  const commits = messages.map((m) => m.split('\n')[0].trim()).filter(Boolean)
  if (commits.length > 0) {
    lines.push('', '**Commits:**', ...commits.map((c) => `- ${c}`))
  }
  return lines.join('\n')
}

async function reviewBase(ctx: WorkflowContext, kind: BranchKind, version?: string): Promise<string> {
  switch (kind) {
    case 'feature':
      return ctx.config.repo.develop
    case 'hotfix':
      return ctx.config.repo.master
    case 'releasefix':
      return (await resolveReleaseBranch(ctx, version)).name
  }
}

/**
 * Open (or reuse) the pull request for a started branch on mainline and move
 * the ticket to review.
 */
export async function reviewBranch(
  ctx: WorkflowContext,
  kind: BranchKind,
  ticketId: string,
  options: ReviewOptions = {}
): Promise<ReviewResult> {
  const { bugtracker } = ctx.config
  const wf = new Workflow(`review ${kind}`)

  const ticket = await wf.step(`fetch ticket ${ticketId}`, () => ctx.tracker.getTicket(ticketId))
  await wf.step('check ticket type', () => assertTicketKind(ticket, kind))

  const branch = branchName(kind, ticket)
  await wf.step(`find ${branch} on ${ctx.fork.owner}`, () => requireBranch(ctx.fork, branch))

  const base = await wf.step('resolve base branch', () => reviewBase(ctx, kind, options.version))
  const head = forkIsSeparate(ctx) ? `${ctx.fork.owner}:${branch}` : branch

  const body = await wf.step('describe changes', async () => {
    if (kind === 'feature') return pullRequestBody(ticket)
    const comparison = await ctx.mainline.compare(base, head)
    return pullRequestBody(
      ticket,
      comparison.commits.map((c) => c.message)
    )
  })

  const { pullRequest, created } = await wf.step(`open pull request into ${base}`, () =>
    ctx.mainline.openPullRequest(head, base, pullRequestTitle(kind, ticket), body)
  )

  const transition = await wf.step(`move ${ticket.key} to ${bugtracker.inReviewStatus}`, () =>
    ctx.tracker.transitionTicket(ticket.key, bugtracker.inReviewStatus)
  )

  return { ticket, branch, base, pullRequest, created, transition }
}
