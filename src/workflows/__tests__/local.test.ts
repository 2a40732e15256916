import { beforeEach, describe, expect, it } from 'vitest'
import { UsageError } from '../../lib/errors.js'
import { changelog, sync, update } from '../local.js'
import { makeContext, type FakeContext } from './fakes.js'

describe('changelog', () => {
  let ctx: FakeContext

  beforeEach(() => {
    ctx = makeContext()
  })

  it('covers the merges since the latest release', async () => {
    ctx.mainline.addRelease('1.0.0.1', 'm1')

    const result = await changelog(ctx)

    expect(result.base).toBe('1.0.0.1')
    expect(result.head).toBe('HEAD')
    expect(ctx.git.calls).toEqual(['log 1.0.0.1..HEAD'])
    expect(result.lines).toEqual(['* EB-12 : Add Login', '* EB-9 : Fix Cart Total'])
    expect(result.ticketIds).toEqual(['EB-12', 'EB-9'])
  })

  it('falls back to master without a release', async () => {
    const result = await changelog(ctx)
    expect(result.base).toBe('master')
  })

  it('does not ask the host when a base is given', async () => {
    await changelog(ctx, { base: 'v1', head: 'develop' })

    expect(ctx.mainline.calls).toEqual([])
    expect(ctx.git.calls).toEqual(['log v1..develop'])
  })
})

describe('sync', () => {
  it('updates master and develop on the fork and returns to the current branch', async () => {
    const ctx = makeContext()
    ctx.git.branch = 'feature-EB-1-x'

    expect(await sync(ctx)).toEqual(['master', 'develop'])
    expect(ctx.git.calls).toEqual([
      'stash',
      'checkout master',
      'pull mainline master',
      'push origin master',
      'checkout develop',
      'pull mainline develop',
      'push origin develop',
      'checkout feature-EB-1-x',
      'stash pop',
    ])
  })

  it('returns to the branch and restores the stash when a push fails', async () => {
    const ctx = makeContext()
    ctx.git.branch = 'feature-EB-1-x'
    ctx.git.failing.add('push')

    await expect(sync(ctx)).rejects.toMatchObject({ step: 'sync master, develop' })
    expect(ctx.git.calls.slice(-2)).toEqual(['checkout feature-EB-1-x', 'stash pop'])
  })
})

describe('update', () => {
  let ctx: FakeContext

  beforeEach(() => {
    ctx = makeContext()
    ctx.git.branch = 'feature-EB-1-add-login'
  })

  it('rebases a feature onto develop and force-pushes it', async () => {
    expect(await update(ctx)).toEqual({ branch: 'feature-EB-1-add-login', base: 'develop' })
    expect(ctx.git.calls).toEqual([
      'stash',
      'pull -r mainline develop',
      'stash pop',
      'push -f origin feature-EB-1-add-login',
    ])
  })

  it('rebases a hotfix onto master', async () => {
    ctx.git.branch = 'hotfix-EB-2-cart'
    expect((await update(ctx)).base).toBe('master')
  })

  it('honours an explicit base', async () => {
    expect((await update(ctx, { base: 'release-1.0.0.2' })).base).toBe('release-1.0.0.2')
    expect(ctx.git.calls).toContain('pull -r mainline release-1.0.0.2')
  })

  it('aborts the rebase and does not push when the pull fails', async () => {
    ctx.git.failing.add('pull')

    await expect(update(ctx)).rejects.toMatchObject({ step: 'rebase feature-EB-1-add-login onto mainline/develop' })
    expect(ctx.git.calls).toEqual([
      'stash',
      'pull -r mainline develop',
      'rebase --abort',
      'checkout feature-EB-1-add-login',
      'stash pop',
    ])
  })

  it('needs a base for a branch it cannot classify', async () => {
    ctx.git.branch = 'experiment'

    await expect(update(ctx)).rejects.toBeInstanceOf(UsageError)
    expect(ctx.git.calls).toEqual([])
  })
})
