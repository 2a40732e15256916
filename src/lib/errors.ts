/**
 * Error taxonomy. Every failure the CLI reports is one of these; `exitCode`
 * is what the process exits with.
 */

export class OctoebError extends Error {
  readonly exitCode: number = 1

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
  }
}

// --- Configuration ---

export class ConfigNotFound extends OctoebError {
  override readonly exitCode = 2

  constructor(readonly searched: readonly string[]) {
    super(`No .octoebrc found. Searched:\n${searched.map((p) => `  ${p}`).join('\n')}`)
  }
}

export class ConfigParseError extends OctoebError {
  override readonly exitCode = 2

  constructor(
    readonly path: string,
    detail: string,
    readonly line?: number,
    options?: { cause?: unknown }
  ) {
    super(`Could not parse ${path}${line !== undefined ? ` (line ${line})` : ''}: ${detail}`, options)
  }
}

export class ConfigMissingKey extends OctoebError {
  override readonly exitCode = 2

  constructor(
    readonly section: string,
    readonly key: string
  ) {
    super(`Missing ${key} in [${section}] config section`)
  }
}

// --- Remote services ---

export class TrackerAPIError extends OctoebError {
  constructor(
    readonly status: number,
    readonly body: string,
    context?: string
  ) {
    super(`Issue tracker error ${status}${context ? ` (${context})` : ''}: ${body}`)
  }
}

export class TrackerUnavailable extends OctoebError {
  constructor(url: string, cause: unknown) {
    super(`Issue tracker unreachable at ${url}: ${describe(cause)}`, { cause })
  }
}

export class TicketTransitionUnavailable extends OctoebError {
  constructor(
    readonly ticket: string,
    readonly target: string,
    readonly available: readonly string[]
  ) {
    super(
      `Ticket ${ticket} cannot move to "${target}". ` +
        `Available: ${available.length > 0 ? available.join(', ') : 'none'}`
    )
  }
}

export class HostAPIError extends OctoebError {
  constructor(
    readonly status: number,
    readonly body: string,
    context?: string
  ) {
    super(`Source host error ${status}${context ? ` (${context})` : ''}: ${body}`)
  }
}

export class HostUnavailable extends OctoebError {
  constructor(url: string, cause: unknown) {
    super(`Source host unreachable at ${url}: ${describe(cause)}`, { cause })
  }
}

export class DuplicateRefError extends OctoebError {
  constructor(
    readonly ref: string,
    readonly existingSha: string,
    readonly targetSha: string
  ) {
    super(`${ref} already exists at ${existingSha.slice(0, 7)}, not ${targetSha.slice(0, 7)}`)
  }
}

/** Never fatal: workflows log it as a warning. */
export class NotificationFailure extends OctoebError {
  constructor(method: string, detail: string, options?: { cause?: unknown }) {
    super(`Slack ${method} failed: ${detail}`, options)
  }
}

// --- Workflow ---

export class TicketTypeMismatch extends OctoebError {
  constructor(
    readonly ticket: string,
    readonly expected: string,
    readonly actual: string
  ) {
    super(`Ticket ${ticket} is a "${actual}", which is not a ${expected} ticket type`)
  }
}

export class GitCommandFailure extends OctoebError {
  constructor(
    readonly args: readonly string[],
    readonly stderr: string,
    options?: { cause?: unknown }
  ) {
    super(`git ${args.join(' ')} failed${stderr ? `: ${stderr}` : ''}`, options)
  }
}

export class UsageError extends OctoebError {}

export class WorkflowStepError extends OctoebError {
  override readonly exitCode: number

  constructor(
    readonly workflow: string,
    readonly step: string,
    readonly completed: readonly string[],
    override readonly cause: unknown
  ) {
    super(`${workflow}: "${step}" failed: ${describe(cause)}`, { cause })
    this.exitCode = cause instanceof OctoebError ? cause.exitCode : 1
  }
}

export function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
