import { UsageError } from '../lib/errors.js'
import {
  changelogFromMessages,
  isHotfixVersion,
  releaseBranchName,
  releaseTicketSummary,
  releaseVersion,
  versionFromTag,
  type Changelog,
} from '../lib/format.js'
import * as log from '../lib/logger.js'
import type { Comparison, PullRequest, Release, Ticket, TransitionResult } from '../lib/types.js'
import { Workflow } from '../lib/workflow.js'
import {
  changelogPatterns,
  requireBranch,
  resolveReleaseBranch,
  type ReleaseBranch,
  type WorkflowContext,
} from './context.js'

export interface PublishReleaseOptions {
  version?: string
}

/** What a release publishes: a release branch, or master for a hotfix (`branch: null`). */
export interface ReleaseTarget {
  version: string
  branch: ReleaseBranch | null
}

/**
 * Release branch for `version` (the newest one when none is given). A hotfix
 * version whose release branch is gone is released straight from master, as
 * long as it belongs to the latest published release.
 */
export async function findReleaseTarget(ctx: WorkflowContext, version?: string): Promise<ReleaseTarget> {
  if (!version || !isHotfixVersion(version)) {
    const branch = await resolveReleaseBranch(ctx, version)
    return { version: version ?? branch.version, branch }
  }

  const name = releaseBranchName(ctx.config.release, version)
  const found = await ctx.mainline.getBranch(name)
  if (found) return { version, branch: { ...found, version } }

  const latest = await ctx.mainline.latestRelease()
  const latestVersion = latest ? versionFromTag(latest.tagName) : null
  if (!latestVersion || releaseVersion(latestVersion) !== releaseVersion(version)) {
    throw new UsageError(
      `No ${name} branch, and ${version} is not a hotfix of the latest release ${latest?.tagName ?? '(none)'}`
    )
  }
  log.debug(`${name} is gone; releasing hotfix ${version} from ${ctx.config.repo.master}`)
  return { version, branch: null }
}

export interface PublishReleaseResult {
  version: string
  /** Absent for a hotfix released from master. */
  branch?: string
  pullRequest?: PullRequest
  /** False when the release branch was already in master. */
  merged: boolean
  release: Release
  created: boolean
  ticket?: Ticket
  transition?: TransitionResult
  changelog: Changelog
}

/**
 * Merge the release branch into master (skipped for a hotfix released from
 * master), tag master as the release and close
 * the release ticket. Each step checks what is already done, so an
 * interrupted release can be re-run.
 */
export async function publishRelease(
  ctx: WorkflowContext,
  options: PublishReleaseOptions = {}
): Promise<PublishReleaseResult> {
  const { repo, bugtracker, release: releaseConfig } = ctx.config
  const { master } = repo
  const wf = new Workflow('release')

  const { version, branch } = await wf.step('find release branch', () => findReleaseTarget(ctx, options.version))

  let pending: Comparison | undefined
  let pullRequest: PullRequest | undefined
  let merged = false
  if (!branch) {
    wf.skip('merge release branch', `hotfix ${version} is tagged on ${master}`)
  } else {
    pending = await wf.step(`compare ${master}...${branch.name}`, () => ctx.mainline.compare(master, branch.name))
    merged = pending.aheadBy > 0
    if (!merged) {
      wf.skip(`merge ${branch.name}`, `already in ${master}`)
    } else {
      pullRequest = (
        await wf.step('open release pull request', () =>
          ctx.mainline.openPullRequest(branch.name, master, `Release ${version}`, `Merge ${branch.name} into ${master}`)
        )
      ).pullRequest
      const number = pullRequest.number
      await wf.step(`merge #${number}`, () => ctx.mainline.mergePullRequest(number, `Release ${version}`))
    }
  }

  const head = await wf.step(`resolve ${master}`, () => requireBranch(ctx.mainline, master))
  const previous = await wf.step('find previous release', () => ctx.mainline.latestRelease())

  const changelog = await wf.step('collect changelog', async () => {
    const commits =
      previous && previous.tagName !== version
        ? (await ctx.mainline.compare(previous.tagName, head.sha)).commits
        : (pending?.commits ?? [])
    return changelogFromMessages(
      commits.map((c) => c.message),
      changelogPatterns(ctx.config)
    )
  })

  const { release, created } = await wf.step(`tag ${version}`, () =>
    ctx.mainline.createTag(version, head.sha, {
      title: branch?.name ?? `Hotfix ${version}`,
      body: `**Changes:**\n${changelog.text}`,
    })
  )

  const ticket = await wf.step('find release ticket', () =>
    ctx.tracker.findReleaseTicket(
      bugtracker.releaseTicketProject,
      bugtracker.releaseTicketType,
      releaseTicketSummary(releaseConfig, version)
    )
  )

  let transition: TransitionResult | undefined
  if (ticket) {
    transition = await wf.step(`move ${ticket.key} to ${bugtracker.doneStatus}`, () =>
      ctx.tracker.transitionTicket(ticket.key, bugtracker.doneStatus)
    )
  } else {
    wf.skip('close release ticket', 'no release ticket found')
    log.warn(`Warning: no release ticket found for ${version}`)
  }

  return {
    version,
    branch: branch?.name,
    pullRequest,
    merged,
    release,
    created,
    ticket: ticket ?? undefined,
    transition,
    changelog,
  }
}

export interface Versions {
  release: Release | null
  prerelease: Release | null
}

export async function versions(ctx: WorkflowContext): Promise<Versions> {
  const release = await ctx.mainline.latestRelease()
  const prerelease = await ctx.mainline.latestPrerelease()
  return { release, prerelease }
}
