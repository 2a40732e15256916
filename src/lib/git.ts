import { execFileSync } from 'child_process'
import { GitCommandFailure } from './errors.js'
import * as log from './logger.js'
import type { GitOps } from './types.js'

function stderrOf(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'stderr' in error && error.stderr) {
    return String(error.stderr).trim()
  }
  return error instanceof Error ? error.message : String(error)
}

export function runGit(args: string[], cwd?: string): string {
  log.debug(`git ${args.join(' ')}`)
  try {
    return execFileSync('git', args, {
      cwd,
      encoding: 'utf-8',
      stdio: ['ignore', 'pipe', 'pipe'],
    }).trim()
  } catch (error) {
    throw new GitCommandFailure(args, stderrOf(error), { cause: error })
  }
}

export function remoteUrl(remote: string, cwd?: string): string | null {
  try {
    return runGit(['remote', 'get-url', remote], cwd)
  } catch (error) {
    if (error instanceof GitCommandFailure) return null
    throw error
  }
}

/**
 * Local git operations used by the workflows. Each call is one `git`
 * subprocess; a non-zero exit is a `GitCommandFailure`.
 */
export function createGit(cwd?: string): GitOps {
  const git = (...args: string[]) => runGit(args, cwd)

  return {
    currentBranch: () => git('rev-parse', '--abbrev-ref', 'HEAD'),

    fetch: (remote) => {
      git('fetch', '-q', remote)
    },

    checkout: (branch) => {
      git('checkout', '-q', branch)
    },

    log: (base, head = '', options = {}) =>
      options.merges
        ? git('log', '--oneline', '--merges', `${base}..${head}`)
        : git('log', '--name-status', `${base}..${head}`),

    pull: (remote, branch, options = {}) => {
      git('pull', '-q', ...(options.rebase ? ['-r'] : []), remote, branch)
    },

    push: (remote, branch, options = {}) => {
      git('push', '-q', ...(options.force ? ['-f'] : []), remote, branch)
    },

    abortRebase: () => {
      git('rebase', '--abort')
    },

    /**
     * Park uncommitted work, run `fn`, then restore it. The stash is popped
     * whether or not `fn` throws.
     */
    withStash<T>(fn: () => T): T {
      const ref = git('stash', 'create')
      if (ref) {
        log.debug(`Stashed local changes as ${ref}`)
        git('stash', 'store', '-q', '-m', 'octoeb auto-stash', ref)
        git('reset', '-q', '--hard')
      }

      let result: T
      try {
        result = fn()
      } catch (error) {
        if (ref) {
          try {
            git('stash', 'pop', '-q')
          } catch (popError) {
            log.error(`Could not restore stashed changes (${ref}); run "git stash pop": ${stderrOf(popError)}`)
          }
        }
        throw error
      }

      if (ref) git('stash', 'pop', '-q')
      return result
    },
  }
}
