import { describe, expect, it } from 'vitest'
import { ConfigMissingKey, GitCommandFailure, WorkflowStepError } from '../errors.js'
import { Workflow } from '../workflow.js'

describe('Workflow', () => {
  it('records completed and skipped steps in order', async () => {
    const workflow = new Workflow('start feature')

    expect(await workflow.step('fetch ticket EB-1', () => 'EB-1')).toBe('EB-1')
    workflow.skip('create branch feature-EB-1', 'already exists')
    await workflow.step('move EB-1 to In Progress', async () => undefined)

    expect(workflow.completed).toEqual([
      'fetch ticket EB-1',
      'create branch feature-EB-1 (already exists)',
      'move EB-1 to In Progress',
    ])
  })

  it('stops at a failing step and reports what came before', async () => {
    const workflow = new Workflow('release')
    await workflow.step('find release branch', () => 'release-1.0.0.2')
    const cause = new GitCommandFailure(['push'], 'rejected')

    const failure = workflow.step('merge #7', () => {
      throw cause
    })

    await expect(failure).rejects.toBeInstanceOf(WorkflowStepError)
    await expect(failure).rejects.toMatchObject({
      workflow: 'release',
      step: 'merge #7',
      completed: ['find release branch'],
      cause,
      message: 'release: "merge #7" failed: git push failed: rejected',
    })
  })

  it('keeps the exit code of the cause', async () => {
    const workflow = new Workflow('qa')

    await expect(
      workflow.step('load config', () => {
        throw new ConfigMissingKey('repo', 'TOKEN')
      })
    ).rejects.toMatchObject({ exitCode: 2 })
    await expect(
      workflow.step('compare', () => {
        throw new Error('boom')
      })
    ).rejects.toMatchObject({ exitCode: 1 })
  })

  it('turns best-effort failures into warnings', async () => {
    const workflow = new Workflow('start release')

    const result = await workflow.bestEffort('create channel #release-1_0_0_2', async () => {
      throw new Error('missing_scope')
    })
    await workflow.bestEffort('set channel topic', () => true)

    expect(result).toBeUndefined()
    expect(workflow.warnings).toEqual([{ step: 'create channel #release-1_0_0_2', message: 'missing_scope' }])
    expect(workflow.completed).toEqual(['set channel topic'])
  })
})
