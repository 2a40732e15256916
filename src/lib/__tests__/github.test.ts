import { beforeEach, describe, expect, it, vi } from 'vitest'
import { DuplicateRefError, HostAPIError, HostUnavailable } from '../errors.js'
import { GitHubClient, detectRepoFromRemote } from '../github.js'
import { makeConfig } from '../../workflows/__tests__/fakes.js'

function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } })
}

function notFound(): Response {
  return json({ message: 'Not Found' }, 404)
}

function release(tag: string, prerelease = false, draft = false) {
  return {
    id: 1,
    tag_name: tag,
    name: null,
    prerelease,
    draft,
    html_url: `https://github.test/acme/shop/releases/tag/${tag}`,
    body: null,
  }
}

const API = 'https://api.github.test/repos/acme/shop/'

describe('GitHubClient', () => {
  const fetchMock = vi.fn<typeof fetch>()
  let client: GitHubClient

  function requested(index: number): { url: string; method: string | undefined; body: unknown } {
    const [url, init] = fetchMock.mock.calls[index]
    return {
      url: String(url),
      method: init?.method,
      body: init?.body ? JSON.parse(String(init.body)) : undefined,
    }
  }

  beforeEach(() => {
    fetchMock.mockReset()
    vi.stubGlobal('fetch', fetchMock)
    client = new GitHubClient(makeConfig().repo, 'acme', 'shop')
  })

  describe('branches', () => {
    it('reads a branch head and sends the token', async () => {
      fetchMock.mockResolvedValueOnce(json({ ref: 'refs/heads/develop', object: { sha: 'd1', type: 'commit' } }))

      expect(await client.getBranch('develop')).toEqual({ name: 'develop', sha: 'd1' })
      expect(requested(0).url).toBe(`${API}git/ref/heads/develop`)
      expect(fetchMock.mock.calls[0][1]?.headers).toMatchObject({ Authorization: 'Bearer test-secret' })
    })

    it('treats a missing branch as null', async () => {
      fetchMock.mockResolvedValueOnce(notFound())
      expect(await client.getBranch('feature-EB-1')).toBeNull()
    })

    it('keeps other errors', async () => {
      fetchMock.mockResolvedValueOnce(json({ message: 'Bad credentials' }, 401))

      const failure = client.getBranch('develop')
      await expect(failure).rejects.toBeInstanceOf(HostAPIError)
      await expect(failure).rejects.toMatchObject({ status: 401 })
    })

    it('reports an unreachable host', async () => {
      fetchMock.mockRejectedValueOnce(new TypeError('fetch failed'))
      await expect(client.getBranch('develop')).rejects.toBeInstanceOf(HostUnavailable)
    })

    it('lists branches by prefix', async () => {
      fetchMock.mockResolvedValueOnce(
        json([
          { ref: 'refs/heads/release-1.0.0.1', object: { sha: 'r1', type: 'commit' } },
          { ref: 'refs/heads/release-1.0.0.2', object: { sha: 'r2', type: 'commit' } },
        ])
      )

      expect(await client.listBranches('release-')).toEqual([
        { name: 'release-1.0.0.1', sha: 'r1' },
        { name: 'release-1.0.0.2', sha: 'r2' },
      ])
      expect(requested(0).url).toBe(`${API}git/matching-refs/heads/release-`)
    })

    it('creates a branch from another branch', async () => {
      fetchMock
        .mockResolvedValueOnce(notFound())
        .mockResolvedValueOnce(json({ ref: 'refs/heads/develop', object: { sha: 'd1', type: 'commit' } }))
        .mockResolvedValueOnce(json({ ref: 'refs/heads/feature-EB-1', object: { sha: 'd1', type: 'commit' } }, 201))

      expect(await client.createBranch({ branch: 'develop' }, 'feature-EB-1')).toEqual({
        branch: { name: 'feature-EB-1', sha: 'd1' },
        created: true,
      })
      expect(requested(2)).toEqual({
        url: `${API}git/refs`,
        method: 'POST',
        body: { ref: 'refs/heads/feature-EB-1', sha: 'd1' },
      })
    })

    it('returns an existing branch without creating it', async () => {
      fetchMock.mockResolvedValueOnce(json({ ref: 'refs/heads/feature-EB-1', object: { sha: 'f1', type: 'commit' } }))

      expect(await client.createBranch({ sha: 'd1' }, 'feature-EB-1')).toEqual({
        branch: { name: 'feature-EB-1', sha: 'f1' },
        created: false,
      })
      expect(fetchMock).toHaveBeenCalledTimes(1)
    })

    it('fails when the base branch is missing', async () => {
      fetchMock.mockResolvedValueOnce(notFound()).mockResolvedValueOnce(notFound())

      await expect(client.createBranch({ branch: 'nope' }, 'feature-EB-1')).rejects.toThrow(
        'Source host error 404 (acme/shop): branch nope not found'
      )
    })

    it('builds web links', () => {
      expect(client.branchUrl('develop')).toBe('https://github.test/acme/shop/tree/develop')
    })
  })

  describe('tags and releases', () => {
    it('follows annotated tags to their commit', async () => {
      fetchMock
        .mockResolvedValueOnce(json({ ref: 'refs/tags/1.0.0.1', object: { sha: 'tag1', type: 'tag' } }))
        .mockResolvedValueOnce(json({ object: { sha: 'c1' } }))

      expect(await client.getTagSha('1.0.0.1')).toBe('c1')
      expect(requested(1).url).toBe(`${API}git/tags/tag1`)
    })

    it('publishes a release for a new tag', async () => {
      fetchMock.mockResolvedValueOnce(notFound()).mockResolvedValueOnce(json(release('1.0.0.2'), 201))

      const result = await client.createTag('1.0.0.2', 'm2', { body: '* EB-1 : Login' })

      expect(result.created).toBe(true)
      expect(result.release).toMatchObject({ tagName: '1.0.0.2', name: '1.0.0.2', body: '' })
      expect(requested(1).body).toEqual({
        tag_name: '1.0.0.2',
        target_commitish: 'm2',
        name: '1.0.0.2',
        body: '* EB-1 : Login',
        draft: false,
        prerelease: false,
      })
    })

    it('accepts a tag already at the target', async () => {
      fetchMock
        .mockResolvedValueOnce(json({ ref: 'refs/tags/1.0.0.2', object: { sha: 'm2', type: 'commit' } }))
        .mockResolvedValueOnce(json(release('1.0.0.2')))

      expect((await client.createTag('1.0.0.2', 'm2')).created).toBe(false)
      expect(fetchMock).toHaveBeenCalledTimes(2)
    })

    it('refuses a tag pointing elsewhere', async () => {
      fetchMock.mockResolvedValueOnce(json({ ref: 'refs/tags/1.0.0.2', object: { sha: 'aaaaaaa1', type: 'commit' } }))

      await expect(client.createTag('1.0.0.2', 'bbbbbbb2')).rejects.toThrow(
        new DuplicateRefError('tag 1.0.0.2', 'aaaaaaa1', 'bbbbbbb2')
      )
    })

    it('skips drafts when looking for the latest pre-release', async () => {
      fetchMock.mockResolvedValueOnce(
        json([release('1.0.0.3', true, true), release('1.0.0.2', true), release('1.0.0.1')])
      )

      expect((await client.latestPrerelease())?.tagName).toBe('1.0.0.2')
    })

    it('has no latest release on a fresh repository', async () => {
      fetchMock.mockResolvedValueOnce(notFound())
      expect(await client.latestRelease()).toBeNull()
    })
  })

  describe('pull requests', () => {
    const pull = {
      number: 7,
      title: 'Feature EB-1: Login',
      html_url: 'https://github.test/acme/shop/pull/7',
      head: { ref: 'feature-EB-1', label: 'dev1:feature-EB-1' },
      base: { ref: 'develop' },
      merged_at: null,
    }

    it('reuses an open pull request for the same branches', async () => {
      fetchMock.mockResolvedValueOnce(json([pull]))

      const result = await client.openPullRequest('dev1:feature-EB-1', 'develop', 'Feature EB-1: Login')

      expect(result).toEqual({
        created: false,
        pullRequest: {
          number: 7,
          title: 'Feature EB-1: Login',
          url: 'https://github.test/acme/shop/pull/7',
          head: 'dev1:feature-EB-1',
          base: 'develop',
          merged: false,
        },
      })
      const query = new URL(requested(0).url).searchParams
      expect(query.get('head')).toBe('dev1:feature-EB-1')
      expect(query.get('state')).toBe('open')
    })

    it('prefixes a bare head with the owner when searching', async () => {
      fetchMock.mockResolvedValueOnce(json([])).mockResolvedValueOnce(json(pull, 201))

      expect((await client.openPullRequest('release-1.0.0.2', 'master', 'Release')).created).toBe(true)
      expect(new URL(requested(0).url).searchParams.get('head')).toBe('acme:release-1.0.0.2')
      expect(requested(1).body).toEqual({ title: 'Release', head: 'release-1.0.0.2', base: 'master' })
    })

    it('merges an open pull request', async () => {
      fetchMock
        .mockResolvedValueOnce(json({ ...pull, merge_commit_sha: null }))
        .mockResolvedValueOnce(json({ merged: true, sha: 'm3', message: 'merged' }))

      expect(await client.mergePullRequest(7)).toEqual({ merged: true, sha: 'm3', alreadyMerged: false })
      expect(requested(1)).toMatchObject({ url: `${API}pulls/7/merge`, method: 'PUT' })
    })

    it('does not merge twice', async () => {
      fetchMock.mockResolvedValueOnce(json({ ...pull, merged: true, merge_commit_sha: 'm3' }))

      expect(await client.mergePullRequest(7)).toEqual({ merged: true, sha: 'm3', alreadyMerged: true })
      expect(fetchMock).toHaveBeenCalledTimes(1)
    })
  })

  it('compares two refs', async () => {
    fetchMock.mockResolvedValueOnce(
      json({
        status: 'ahead',
        ahead_by: 1,
        behind_by: 0,
        commits: [{ sha: 'c1', commit: { message: 'Merge pull request #7 from dev1/feature-EB-1' } }],
      })
    )

    expect(await client.compare('master', 'dev1:release-1.0.0.2')).toEqual({
      status: 'ahead',
      aheadBy: 1,
      behindBy: 0,
      commits: [{ sha: 'c1', message: 'Merge pull request #7 from dev1/feature-EB-1' }],
    })
    expect(requested(0).url).toBe(`${API}compare/master...dev1:release-1.0.0.2`)
  })
})

describe('detectRepoFromRemote', () => {
  it('reads ssh and https remotes', () => {
    expect(detectRepoFromRemote('git@github.com:acme/shop.git')).toEqual({ owner: 'acme', repo: 'shop' })
    expect(detectRepoFromRemote('https://github.com/acme/shop\n')).toEqual({ owner: 'acme', repo: 'shop' })
    expect(detectRepoFromRemote('https://gitlab.com/acme/shop.git')).toBeNull()
  })
})
