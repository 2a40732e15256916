import { DuplicateRefError, HostAPIError, HostUnavailable } from './errors.js'
import * as log from './logger.js'
import type {
  BaseRef,
  BranchRef,
  CompareStatus,
  Comparison,
  CreatedBranch,
  CreatedRelease,
  MergeResult,
  OpenedPullRequest,
  PullRequest,
  Release,
  RepoConfig,
  SourceHost,
  TagOptions,
} from './types.js'

// --- GitHub payloads ---

interface GitRef {
  ref: string
  object: { sha: string; type: string }
}

interface GitHubPull {
  number: number
  title: string
  html_url: string
  head: { ref: string; label: string }
  base: { ref: string }
  merged?: boolean
  merged_at: string | null
}

interface GitHubRelease {
  id: number
  tag_name: string
  name: string | null
  prerelease: boolean
  draft: boolean
  html_url: string
  body: string | null
}

interface GitHubCompare {
  status: CompareStatus
  ahead_by: number
  behind_by: number
  commits: Array<{ sha: string; commit: { message: string } }>
}

function refPath(name: string): string {
  // `owner:branch` heads keep their colon
  return name
    .split('/')
    .map((segment) => encodeURIComponent(segment).replace(/%3A/g, ':'))
    .join('/')
}

function toPullRequest(pull: GitHubPull): PullRequest {
  return {
    number: pull.number,
    title: pull.title,
    url: pull.html_url,
    head: pull.head.label,
    base: pull.base.ref,
    merged: pull.merged ?? pull.merged_at !== null,
  }
}

function toRelease(release: GitHubRelease): Release {
  return {
    id: release.id,
    tagName: release.tag_name,
    name: release.name ?? release.tag_name,
    prerelease: release.prerelease,
    url: release.html_url,
    body: release.body ?? '',
  }
}

/**
 * GitHub REST wrapper bound to one `owner/repo`. The CLI builds one for the
 * mainline owner and one for the fork owner.
 */
export class GitHubClient implements SourceHost {
  private readonly base: string

  constructor(
    private readonly config: Pick<RepoConfig, 'token' | 'apiUrl' | 'webUrl'>,
    readonly owner: string,
    readonly repo: string
  ) {
    this.base = `${config.apiUrl}/repos/${owner}/${repo}/`
  }

  private async request<T>(method: string, path: string, body?: unknown): Promise<T> {
    const url = `${this.base}${path}`
    log.debug(`GitHubClient ${method} ${url}`)

    let response: Response
    try {
      response = await fetch(url, {
        method,
        headers: {
          Authorization: `Bearer ${this.config.token}`,
          Accept: 'application/vnd.github+json',
          'X-GitHub-Api-Version': '2022-11-28',
          ...(body !== undefined ? { 'Content-Type': 'application/json' } : {}),
        },
        body: body !== undefined ? JSON.stringify(body) : undefined,
      })
    } catch (error) {
      throw new HostUnavailable(this.config.apiUrl, error)
    }

    const text = await response.text()
    if (!response.ok) {
      throw new HostAPIError(response.status, text, `${method} ${this.owner}/${this.repo}/${path}`)
    }
    return JSON.parse(text) as T
  }

  /** Like `request`, but a 404 is `null`. */
  private async lookup<T>(path: string): Promise<T | null> {
    try {
      return await this.request<T>('GET', path)
    } catch (error) {
      if (error instanceof HostAPIError && error.status === 404) return null
      throw error
    }
  }

  // --- Branches ---

  async getBranch(name: string): Promise<BranchRef | null> {
    const ref = await this.lookup<GitRef>(`git/ref/heads/${refPath(name)}`)
    return ref ? { name, sha: ref.object.sha } : null
  }

  async listBranches(prefix: string): Promise<BranchRef[]> {
    const refs = await this.request<GitRef[]>('GET', `git/matching-refs/heads/${refPath(prefix)}`)
    return refs.map((ref) => ({
      name: ref.ref.replace(/^refs\/heads\//, ''),
      sha: ref.object.sha,
    }))
  }

  private async resolveBase(base: BaseRef): Promise<string> {
    if ('sha' in base) return base.sha
    if ('tag' in base) {
      const sha = await this.getTagSha(base.tag)
      if (!sha) throw new HostAPIError(404, `tag ${base.tag} not found`, `${this.owner}/${this.repo}`)
      return sha
    }
    const branch = await this.getBranch(base.branch)
    if (!branch) throw new HostAPIError(404, `branch ${base.branch} not found`, `${this.owner}/${this.repo}`)
    return branch.sha
  }

  /**
   * Create `name` from `base`. An existing branch of that name is returned
   * with `created: false`.
   */
  async createBranch(base: BaseRef, name: string): Promise<CreatedBranch> {
    const existing = await this.getBranch(name)
    if (existing) {
      log.debug(`Branch ${name} already exists at ${existing.sha}`)
      return { branch: existing, created: false }
    }

    const sha = await this.resolveBase(base)
    const ref = await this.request<GitRef>('POST', 'git/refs', { ref: `refs/heads/${name}`, sha })
    return { branch: { name, sha: ref.object.sha }, created: true }
  }

  async updateBranch(name: string, sha: string): Promise<BranchRef> {
    const ref = await this.request<GitRef>('PATCH', `git/refs/heads/${refPath(name)}`, { sha })
    return { name, sha: ref.object.sha }
  }

  branchUrl(name: string): string {
    return `${this.config.webUrl}/${this.owner}/${this.repo}/tree/${name}`
  }

  // --- Tags and releases ---

  /** Commit sha a tag points at, following annotated tag objects. */
  async getTagSha(name: string): Promise<string | null> {
    const ref = await this.lookup<GitRef>(`git/ref/tags/${refPath(name)}`)
    if (!ref) return null
    if (ref.object.type !== 'tag') return ref.object.sha
    const tag = await this.request<{ object: { sha: string } }>('GET', `git/tags/${ref.object.sha}`)
    return tag.object.sha
  }

  async getRelease(tag: string): Promise<Release | null> {
    const release = await this.lookup<GitHubRelease>(`releases/tags/${refPath(tag)}`)
    return release ? toRelease(release) : null
  }

  async latestRelease(): Promise<Release | null> {
    const release = await this.lookup<GitHubRelease>('releases/latest')
    return release ? toRelease(release) : null
  }

  async listReleases(): Promise<Release[]> {
    const releases = await this.request<GitHubRelease[]>('GET', 'releases?per_page=30')
    return releases.filter((r) => !r.draft).map(toRelease)
  }

  async latestPrerelease(): Promise<Release | null> {
    const releases = await this.listReleases()
    return releases.find((r) => r.prerelease) ?? null
  }

  /**
   * Publish a release tagged `name` at `target`. A tag that already points at
   * `target` is success; one pointing elsewhere is a `DuplicateRefError`.
   */
  async createTag(name: string, target: string, options: TagOptions = {}): Promise<CreatedRelease> {
    const existingSha = await this.getTagSha(name)
    if (existingSha) {
      if (existingSha !== target) {
        throw new DuplicateRefError(`tag ${name}`, existingSha, target)
      }
      const release = await this.getRelease(name)
      if (release) return { release, created: false }
    }

    const release = await this.request<GitHubRelease>('POST', 'releases', {
      tag_name: name,
      target_commitish: target,
      name: options.title ?? name,
      body: options.body ?? '',
      draft: false,
      prerelease: options.prerelease ?? false,
    })
    return { release: toRelease(release), created: true }
  }

  // --- Pull requests ---

  async findPullRequest(head: string, base: string): Promise<PullRequest | null> {
    const label = head.includes(':') ? head : `${this.owner}:${head}`
    const query = new URLSearchParams({ head: label, base, state: 'open' })
    const pulls = await this.request<GitHubPull[]>('GET', `pulls?${query.toString()}`)
    return pulls.length > 0 ? toPullRequest(pulls[0]) : null
  }

  /**
   * Open a pull request from `head` (`branch` or `owner:branch`) into `base`,
   * reusing an open one for the same pair.
   */
  async openPullRequest(head: string, base: string, title: string, body?: string): Promise<OpenedPullRequest> {
    const existing = await this.findPullRequest(head, base)
    if (existing) return { pullRequest: existing, created: false }

    const pull = await this.request<GitHubPull>('POST', 'pulls', {
      title,
      head,
      base,
      ...(body ? { body } : {}),
    })
    return { pullRequest: toPullRequest(pull), created: true }
  }

  async mergePullRequest(number: number, commitTitle?: string): Promise<MergeResult> {
    const pull = await this.request<GitHubPull & { merge_commit_sha: string | null }>('GET', `pulls/${number}`)
    if (pull.merged ?? pull.merged_at !== null) {
      return { merged: true, sha: pull.merge_commit_sha ?? '', alreadyMerged: true }
    }

    const result = await this.request<{ merged: boolean; sha: string; message: string }>(
      'PUT',
      `pulls/${number}/merge`,
      { merge_method: 'merge', ...(commitTitle ? { commit_title: commitTitle } : {}) }
    )
    if (!result.merged) {
      throw new HostAPIError(405, result.message, `merge #${number}`)
    }
    return { merged: true, sha: result.sha, alreadyMerged: false }
  }

  // --- History ---

  async compare(base: string, head: string): Promise<Comparison> {
    const result = await this.request<GitHubCompare>('GET', `compare/${refPath(base)}...${refPath(head)}`)
    return {
      status: result.status,
      aheadBy: result.ahead_by,
      behindBy: result.behind_by,
      commits: result.commits.map((c) => ({ sha: c.sha, message: c.commit.message })),
    }
  }
}

export function detectRepoFromRemote(remoteUrl: string): { owner: string; repo: string } | null {
  // git@github.com:owner/repo.git or https://github.com/owner/repo.git
  const match = remoteUrl.trim().match(/github\.com[:/]([^/]+)\/(.+?)(?:\.git)?$/)
  return match ? { owner: match[1], repo: match[2] } : null
}
