import { beforeEach, describe, expect, it } from 'vitest'
import { HostAPIError } from '../../lib/errors.js'
import { pullRequestBody, pullRequestTitle, reviewBranch } from '../review.js'
import { makeConfig, makeContext, type FakeContext } from './fakes.js'

describe('pullRequestBody', () => {
  it('links the ticket and lists commit subjects', () => {
    const body = pullRequestBody({ key: 'EB-2', url: 'https://jira.test/browse/EB-2' }, [
      'Fix rounding\n\nUse integer cents',
      'Add test',
    ])

    expect(body).toBe(
      'Ticket: [EB-2](https://jira.test/browse/EB-2)\n\n**Commits:**\n- Fix rounding\n- Add test'
    )
  })

  it('is only the ticket link without commits', () => {
    expect(pullRequestBody({ key: 'EB-1', url: 'u' })).toBe('Ticket: [EB-1](u)')
  })
})

describe('reviewBranch', () => {
  let ctx: FakeContext

  beforeEach(() => {
    ctx = makeContext()
    ctx.tracker.addTicket('EB-1', 'Add login page', 'Story', 'In Progress')
    ctx.tracker.addTicket('EB-2', 'Cart total wrong', 'Bug', 'In Progress')
    ctx.fork.branches.set('feature-EB-1-add-login-page', 'f1')
    ctx.fork.branches.set('hotfix-EB-2-cart-total-wrong', 'h1')
  })

  it('opens a feature pull request from the fork into develop', async () => {
    const result = await reviewBranch(ctx, 'feature', 'EB-1')

    expect(result.base).toBe('develop')
    expect(result.created).toBe(true)
    expect(result.pullRequest).toMatchObject({
      number: 1,
      title: 'Feature EB-1: Add login page',
      head: 'dev1:feature-EB-1-add-login-page',
      base: 'develop',
    })
    expect(result.transition).toEqual({ changed: true, from: 'In Progress', to: 'In Review' })
    expect(ctx.mainline.calls.some((c) => c.startsWith('compare'))).toBe(false)
  })

  it('reuses the open pull request on a second run', async () => {
    await reviewBranch(ctx, 'feature', 'EB-1')
    const second = await reviewBranch(ctx, 'feature', 'EB-1')

    expect(second.created).toBe(false)
    expect(second.pullRequest.number).toBe(1)
    expect(second.transition.changed).toBe(false)
    expect(ctx.mainline.pulls).toHaveLength(1)
  })

  it('targets master and collects commits for a hotfix', async () => {
    const result = await reviewBranch(ctx, 'hotfix', 'EB-2')

    expect(result.base).toBe('master')
    expect(result.pullRequest.title).toBe('Hotfix EB-2: Cart total wrong')
    expect(ctx.mainline.calls).toContain('compare master...dev1:hotfix-EB-2-cart-total-wrong')
  })

  it('targets the release branch for a releasefix', async () => {
    ctx.mainline.branches.set('release-1.0.0.2', 'r2')
    ctx.fork.branches.set('releasefix-EB-2-cart-total-wrong', 'x1')

    const result = await reviewBranch(ctx, 'releasefix', 'EB-2')

    expect(result.base).toBe('release-1.0.0.2')
    expect(result.pullRequest.head).toBe('dev1:releasefix-EB-2-cart-total-wrong')
  })

  it('uses a plain head when the fork is the mainline repository', async () => {
    const config = makeConfig()
    const same = makeContext(makeConfig({ repo: { ...config.repo, fork: 'acme' } }))
    same.tracker.addTicket('EB-1', 'Add login page', 'Story')
    same.fork.branches.set('feature-EB-1-add-login-page', 'f1')

    const result = await reviewBranch(same, 'feature', 'EB-1')

    expect(result.pullRequest.head).toBe('feature-EB-1-add-login-page')
  })

  it('fails when the branch was never started', async () => {
    ctx.fork.branches.delete('feature-EB-1-add-login-page')

    await expect(reviewBranch(ctx, 'feature', 'EB-1')).rejects.toMatchObject({
      step: 'find feature-EB-1-add-login-page on dev1',
      cause: expect.any(HostAPIError),
    })
    expect(ctx.mainline.pulls).toEqual([])
    expect(ctx.tracker.transitions).toEqual([])
  })
})
