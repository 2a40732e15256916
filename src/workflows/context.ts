import { defaultEnvironment, loadConfig } from '../lib/config.js'
import { HostAPIError, TicketTypeMismatch, UsageError } from '../lib/errors.js'
import {
  compareVersions,
  nextReleaseVersion,
  releaseBaseName,
  releaseBranchName,
  versionFromReleaseBranch,
  versionFromTag,
} from '../lib/format.js'
import { createGit } from '../lib/git.js'
import { GitHubClient } from '../lib/github.js'
import { JiraClient } from '../lib/jira-api.js'
import * as log from '../lib/logger.js'
import { createNotifier } from '../lib/slack.js'
import type {
  BranchKind,
  BranchRef,
  GitOps,
  IssueTracker,
  Notifier,
  OctoebConfig,
  SourceHost,
  Ticket,
} from '../lib/types.js'

/** Everything a workflow talks to, built once per invocation. */
export interface WorkflowContext {
  config: OctoebConfig
  tracker: IssueTracker
  mainline: SourceHost
  fork: SourceHost
  notifier: Notifier
  git: GitOps
}

/** Load the configuration and build every client a workflow needs. */
export function createWorkflowContext(configPath?: string): WorkflowContext {
  const config = loadConfig(defaultEnvironment(configPath))
  log.debug(`Using ${config.source}`)

  const { repo } = config
  return {
    config,
    tracker: new JiraClient(config.bugtracker),
    mainline: new GitHubClient(repo, repo.owner, repo.repo),
    fork: new GitHubClient(repo, repo.fork, repo.repo),
    notifier: createNotifier(config),
    git: createGit(),
  }
}

export interface ReleaseBranch extends BranchRef {
  version: string
}

export function assertTicketKind(ticket: Ticket, kind: BranchKind): void {
  if (!ticket.kinds.includes(kind)) {
    throw new TicketTypeMismatch(ticket.key, kind, ticket.issueType)
  }
}

export function forkIsSeparate(ctx: WorkflowContext): boolean {
  return ctx.fork.owner !== ctx.mainline.owner
}

export async function requireBranch(host: SourceHost, name: string): Promise<BranchRef> {
  const branch = await host.getBranch(name)
  if (!branch) {
    throw new HostAPIError(404, `branch ${name} not found`, `${host.owner}/${host.repo}`)
  }
  return branch
}

/** Newest `<release base>-<version>` branch on mainline, by version order. */
export async function latestReleaseBranch(ctx: WorkflowContext): Promise<ReleaseBranch | null> {
  const branches = await ctx.mainline.listBranches(`${releaseBaseName(ctx.config.release)}-`)

  let latest: ReleaseBranch | null = null
  for (const branch of branches) {
    const version = versionFromReleaseBranch(ctx.config.release, branch.name)
    if (version && (!latest || compareVersions(version, latest.version) > 0)) {
      latest = { ...branch, version }
    }
  }
  return latest
}

/** Release branch for `version`, or the newest one when no version is given. */
export async function resolveReleaseBranch(ctx: WorkflowContext, version?: string): Promise<ReleaseBranch> {
  if (version) {
    const branch = await requireBranch(ctx.mainline, releaseBranchName(ctx.config.release, version))
    return { ...branch, version }
  }

  const latest = await latestReleaseBranch(ctx)
  if (!latest) {
    throw new UsageError(
      `No ${releaseBaseName(ctx.config.release)}-* branch found on ${ctx.mainline.owner}/${ctx.mainline.repo}; pass a version`
    )
  }
  return latest
}

/** Version after the latest published release. */
export async function nextVersion(ctx: WorkflowContext): Promise<string> {
  const latest = await ctx.mainline.latestRelease()
  if (!latest) {
    throw new UsageError('No published release to count from; pass a version')
  }
  const version = versionFromTag(latest.tagName)
  if (!version) {
    throw new UsageError(`Cannot read a version from tag ${latest.tagName}; pass a version`)
  }
  return nextReleaseVersion(version)
}

export function changelogPatterns(config: OctoebConfig): { changelogRe?: string; issueRe?: string } {
  return { changelogRe: config.repo.changelogRe, issueRe: config.repo.issueRe }
}
