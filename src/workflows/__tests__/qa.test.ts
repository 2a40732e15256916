import { beforeEach, describe, expect, it } from 'vitest'
import { HostAPIError } from '../../lib/errors.js'
import { listQaTickets, publishPrerelease, renderQaReport } from '../qa.js'
import { makeContext, type FakeContext } from './fakes.js'

const MERGES = [
  'Merge pull request #7 from dev1/feature-EB-12-add-login',
  'Merge pull request #8 from dev2/hotfix-EB-9-fix_cart_total',
  'Bump version',
]

function ticketKeys(lines: string[]): string[] {
  return lines.flatMap((line) => {
    const match = line.match(/^ {2}([A-Z]+-\d+) /)
    return match ? [match[1]] : []
  })
}

describe('listQaTickets', () => {
  let ctx: FakeContext

  beforeEach(() => {
    ctx = makeContext()
    ctx.mainline.branches.set('release-1.0.0.1', 'r1')
    ctx.mainline.branches.set('release-1.0.0.2', 'r2')
    ctx.mainline.setComparison('master', 'release-1.0.0.2', MERGES)
    ctx.tracker.addTicket('EB-12', 'Add login', 'Story', 'QA')
    ctx.tracker.addTicket('EB-9', 'Fix cart total', 'Bug', 'QA')
  })

  it('lists the tickets merged into the newest release branch', async () => {
    const report = await listQaTickets(ctx)

    expect(report.branch).toBe('release-1.0.0.2')
    expect(report.tickets.map((t) => t.key)).toEqual(['EB-12', 'EB-9'])
    expect(ctx.tracker.transitions).toEqual([])
  })

  it('renders the same tickets with and without detail', async () => {
    const report = await listQaTickets(ctx)

    const plain = renderQaReport(report)
    const verbose = renderQaReport(report, true)

    expect(plain).toHaveLength(3)
    expect(verbose).toHaveLength(5)
    expect(ticketKeys(verbose)).toEqual(ticketKeys(plain))
    expect(ticketKeys(plain)).toEqual(['EB-12', 'EB-9'])
  })

  it('says so when nothing waits for QA', () => {
    expect(renderQaReport({ branch: 'release-1.0.0.2', tickets: [], changelog: { ticketIds: [], lines: [], text: '' } })).toEqual([
      'No tickets waiting for QA on release-1.0.0.2',
    ])
  })

  it('fails on an unknown branch', async () => {
    await expect(listQaTickets(ctx, { branch: 'release-9.9.9.9' })).rejects.toMatchObject({
      step: 'find release branch',
      cause: expect.any(HostAPIError),
    })
  })
})

describe('publishPrerelease', () => {
  it('tags the release branch head as a pre-release with the changelog', async () => {
    const ctx = makeContext()
    ctx.mainline.branches.set('release-1.0.0.2', 'r2')
    ctx.mainline.setComparison('master', 'release-1.0.0.2', MERGES)

    const result = await publishPrerelease(ctx, '1.0.0.2.1')

    expect(result.branch).toBe('release-1.0.0.2')
    expect(result.created).toBe(true)
    expect(result.release.prerelease).toBe(true)
    expect(result.release.body).toBe('**Changes:**\n* EB-12 : Add Login\n* EB-9 : Fix Cart Total')
    expect(ctx.mainline.tags.get('1.0.0.2.1')).toBe('r2')
  })
})
