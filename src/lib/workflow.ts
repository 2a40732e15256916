import { WorkflowStepError, describe } from './errors.js'
import * as log from './logger.js'

export interface StepWarning {
  step: string
  message: string
}

/**
 * Runs the steps of one command in order. A required step that throws stops
 * the run with a `WorkflowStepError` listing what already completed; nothing
 * is undone. Best-effort steps log a warning and carry on.
 */
export class Workflow {
  readonly completed: string[] = []
  readonly warnings: StepWarning[] = []

  constructor(readonly name: string) {}

  async step<T>(label: string, fn: () => Promise<T> | T): Promise<T> {
    log.info(`→ ${label}`)
    try {
      const result = await fn()
      this.completed.push(label)
      return result
    } catch (error) {
      throw new WorkflowStepError(this.name, label, [...this.completed], error)
    }
  }

  async bestEffort<T>(label: string, fn: () => Promise<T> | T): Promise<T | undefined> {
    log.info(`→ ${label}`)
    try {
      const result = await fn()
      this.completed.push(label)
      return result
    } catch (error) {
      const message = describe(error)
      this.warnings.push({ step: label, message })
      log.warn(`Warning: ${label} failed: ${message}`)
      return undefined
    }
  }

  /** Record a step that was not needed (already done, nothing to do). */
  skip(label: string, reason: string): void {
    log.info(`- ${label}: ${reason}`)
    this.completed.push(`${label} (${reason})`)
  }
}
