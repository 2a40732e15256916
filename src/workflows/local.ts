import { UsageError, describe } from '../lib/errors.js'
import { buildChangelog, type Changelog } from '../lib/format.js'
import * as log from '../lib/logger.js'
import { Workflow } from '../lib/workflow.js'
import { changelogPatterns, type WorkflowContext } from './context.js'

// --- Changelog ---

export interface ChangelogOptions {
  base?: string
  head?: string
}

export interface LocalChangelog extends Changelog {
  base: string
  head: string
}

/** Changelog of the merges in the local `base..head` range. */
export async function changelog(ctx: WorkflowContext, options: ChangelogOptions = {}): Promise<LocalChangelog> {
  const wf = new Workflow('changelog')
  const head = options.head ?? 'HEAD'

  const base =
    options.base ??
    (await wf.step('find latest release', async () => {
      const latest = await ctx.mainline.latestRelease()
      return latest?.tagName ?? ctx.config.repo.master
    }))

  const history = await wf.step(`git log ${base}..${head}`, () => ctx.git.log(base, head, { merges: true }))
  return { base, head, ...buildChangelog(history, changelogPatterns(ctx.config)) }
}

// --- Sync ---

/**
 * Fast-forward the fork's master and develop from mainline through the local
 * clone, then return to the branch the user was on.
 */
export async function sync(ctx: WorkflowContext): Promise<string[]> {
  const { master, develop, mainlineRemote, forkRemote } = ctx.config.repo
  const branches = [master, develop]
  const wf = new Workflow('sync')

  await wf.step(`sync ${branches.join(', ')}`, () =>
    ctx.git.withStash(() => {
      const original = ctx.git.currentBranch()
      try {
        for (const branch of branches) {
          log.info(`  ${mainlineRemote}/${branch} → ${forkRemote}/${branch}`)
          ctx.git.checkout(branch)
          ctx.git.pull(mainlineRemote, branch)
          ctx.git.push(forkRemote, branch)
        }
      } finally {
        ctx.git.checkout(original)
      }
    })
  )

  return branches
}

// --- Update ---

export interface UpdateResult {
  branch: string
  base: string
}

export function baseForBranch(ctx: WorkflowContext, branch: string): string | null {
  const prefix = branch.split('-')[0]
  if (prefix === 'feature') return ctx.config.repo.develop
  if (prefix === 'hotfix') return ctx.config.repo.master
  return null
}

/** Rebase the current branch onto its mainline base and force-push it to the fork. */
export async function update(ctx: WorkflowContext, options: { base?: string } = {}): Promise<UpdateResult> {
  const { mainlineRemote, forkRemote } = ctx.config.repo
  const branch = ctx.git.currentBranch()
  const base = options.base ?? baseForBranch(ctx, branch)
  if (!base) {
    throw new UsageError(`Cannot tell the base of ${branch}; pass --base`)
  }

  const wf = new Workflow('update')
  await wf.step(`rebase ${branch} onto ${mainlineRemote}/${base}`, () =>
    ctx.git.withStash(() => {
      try {
        ctx.git.pull(mainlineRemote, base, { rebase: true })
      } catch (error) {
        try {
          ctx.git.abortRebase()
        } catch (abortError) {
          log.debug(`No rebase to abort: ${describe(abortError)}`)
        }
        ctx.git.checkout(branch)
        throw error
      }
    })
  )
  await wf.step(`push ${branch} to ${forkRemote}`, () => ctx.git.push(forkRemote, branch, { force: true }))

  return { branch, base }
}
