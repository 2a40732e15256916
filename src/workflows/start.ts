import { UsageError } from '../lib/errors.js'
import {
  branchName,
  changelogFromMessages,
  fillTemplate,
  releaseBranchName,
  releaseChannelName,
  releaseTicketSummary,
  type Changelog,
} from '../lib/format.js'
import * as log from '../lib/logger.js'
import type { BranchKind, Channel, Ticket, TransitionResult } from '../lib/types.js'
import { Workflow } from '../lib/workflow.js'
import {
  assertTicketKind,
  changelogPatterns,
  forkIsSeparate,
  nextVersion,
  requireBranch,
  resolveReleaseBranch,
  type WorkflowContext,
} from './context.js'

export interface StartBranchOptions {
  /** Release a releasefix branches off; the newest release branch when unset. */
  version?: string
  checkout?: boolean
}

export interface StartBranchResult {
  ticket: Ticket
  branch: string
  base: string
  created: boolean
  url: string
  transition: TransitionResult
  checkedOut: boolean
}

interface WorkBase {
  label: string
  sha: string
}

async function resolveWorkBase(ctx: WorkflowContext, kind: BranchKind, version?: string): Promise<WorkBase> {
  const { repo } = ctx.config

  switch (kind) {
    case 'feature': {
      const develop = await requireBranch(ctx.mainline, repo.develop)
      return { label: develop.name, sha: develop.sha }
    }
    case 'hotfix': {
      const latest = await ctx.mainline.latestRelease()
      if (!latest) throw new UsageError('No published release to start a hotfix from')
      const sha = await ctx.mainline.getTagSha(latest.tagName)
      if (!sha) throw new UsageError(`Release ${latest.tagName} has no tag on ${ctx.mainline.owner}/${ctx.mainline.repo}`)
      return { label: latest.tagName, sha }
    }
    case 'releasefix': {
      const branch = await resolveReleaseBranch(ctx, version)
      return { label: branch.name, sha: branch.sha }
    }
  }
}

/** Bring the fork's copy of `name` to `sha`, creating it if it is missing. */
async function syncForkBranch(ctx: WorkflowContext, name: string, sha: string): Promise<void> {
  const existing = await ctx.fork.getBranch(name)
  if (!existing) {
    await ctx.fork.createBranch({ sha }, name)
  } else if (existing.sha !== sha) {
    await ctx.fork.updateBranch(name, sha)
  }
}

/**
 * Start a feature, hotfix or releasefix branch for a ticket on the fork and
 * move the ticket to the in-progress status.
 */
export async function startBranch(
  ctx: WorkflowContext,
  kind: BranchKind,
  ticketId: string,
  options: StartBranchOptions = {}
): Promise<StartBranchResult> {
  const { repo, bugtracker } = ctx.config
  const wf = new Workflow(`start ${kind}`)

  const ticket = await wf.step(`fetch ticket ${ticketId}`, () => ctx.tracker.getTicket(ticketId))
  await wf.step('check ticket type', () => assertTicketKind(ticket, kind))

  const name = branchName(kind, ticket)
  const base = await wf.step('resolve base', () => resolveWorkBase(ctx, kind, options.version))

  if (kind === 'releasefix' && forkIsSeparate(ctx)) {
    await wf.step(`sync ${base.label} to ${ctx.fork.owner}`, () => syncForkBranch(ctx, base.label, base.sha))
  }

  const { created } = await wf.step(`create branch ${name}`, () => ctx.fork.createBranch({ sha: base.sha }, name))
  if (!created) log.info(`Branch ${name} was already started`)

  const transition = await wf.step(`move ${ticket.key} to ${bugtracker.inProgressStatus}`, () =>
    ctx.tracker.transitionTicket(ticket.key, bugtracker.inProgressStatus)
  )

  const checkout = options.checkout ?? true
  if (checkout) {
    await wf.step(`checkout ${name}`, () => {
      ctx.git.fetch(repo.forkRemote)
      ctx.git.checkout(name)
    })
  }

  return {
    ticket,
    branch: name,
    base: base.label,
    created,
    url: ctx.fork.branchUrl(name),
    transition,
    checkedOut: checkout,
  }
}

// --- Release ---

export interface StartReleaseOptions {
  version?: string
  checkout?: boolean
}

export interface StartReleaseResult {
  version: string
  branch: string
  branchCreated: boolean
  url: string
  ticket: Ticket
  ticketCreated: boolean
  channel?: Channel
  changelog?: Changelog
  warnings: string[]
}

/**
 * Cut a release branch from develop on mainline, open its release ticket and
 * announce it. Re-running for the same version reuses what already exists.
 */
export async function startRelease(ctx: WorkflowContext, options: StartReleaseOptions = {}): Promise<StartReleaseResult> {
  const { repo, bugtracker, release, slack } = ctx.config
  const wf = new Workflow('start release')

  const version = options.version ?? (await wf.step('determine next version', () => nextVersion(ctx)))
  const branch = releaseBranchName(release, version)

  const develop = await wf.step(`resolve ${repo.develop}`, () => requireBranch(ctx.mainline, repo.develop))
  const { created: branchCreated } = await wf.step(`create branch ${branch}`, () =>
    ctx.mainline.createBranch({ sha: develop.sha }, branch)
  )
  const url = ctx.mainline.branchUrl(branch)

  const summary = releaseTicketSummary(release, version)
  let ticket = await wf.step('find release ticket', () =>
    ctx.tracker.findReleaseTicket(bugtracker.releaseTicketProject, bugtracker.releaseTicketType, summary)
  )
  let ticketCreated = false
  if (ticket) {
    wf.skip('create release ticket', `${ticket.key} exists`)
  } else {
    ticket = await wf.step('create release ticket', () =>
      ctx.tracker.createReleaseTicket(bugtracker.releaseTicketProject, bugtracker.releaseTicketType, {
        summary,
        description: `Release branch: ${url}`,
      })
    )
    ticketCreated = true
  }
  const releaseTicket = ticket

  const channelName = releaseChannelName(release, version)
  const channel = await wf.bestEffort(`create channel #${channelName}`, () => ctx.notifier.createChannel(channelName))
  if (channel) {
    if (slack?.groupId) {
      const groupId = slack.groupId
      await wf.bestEffort('invite release group', () => ctx.notifier.invite(channel, groupId))
    }
    const topic = fillTemplate(slack?.topicStr ?? 'Release {version}', {
      version,
      branch,
      ticket: releaseTicket.key,
    })
    await wf.bestEffort('set channel topic', () => ctx.notifier.postTopic(channel, topic))
  }

  const changelog = await wf.bestEffort('collect changelog', async () => {
    const comparison = await ctx.mainline.compare(repo.master, branch)
    return changelogFromMessages(
      comparison.commits.map((c) => c.message),
      changelogPatterns(ctx.config)
    )
  })

  if (options.checkout) {
    await wf.step(`checkout ${branch}`, () => {
      ctx.git.fetch(repo.mainlineRemote)
      ctx.git.checkout(branch)
    })
  }

  return {
    version,
    branch,
    branchCreated,
    url,
    ticket: releaseTicket,
    ticketCreated,
    channel: ctx.notifier.enabled ? channel : undefined,
    changelog,
    warnings: wf.warnings.map((w) => `${w.step}: ${w.message}`),
  }
}
