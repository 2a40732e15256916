import { TicketTransitionUnavailable, TrackerAPIError, TrackerUnavailable } from './errors.js'
import { ticketKinds } from './format.js'
import * as log from './logger.js'
import type {
  BugtrackerConfig,
  IssueTracker,
  ReleaseTicketFields,
  Ticket,
  TransitionResult,
} from './types.js'

const ISSUE_FIELDS = 'summary,status,issuetype'

interface JiraIssue {
  key: string
  fields: {
    summary: string
    status: { name: string }
    issuetype: { name: string }
  }
}

interface JiraSearchResponse {
  issues: JiraIssue[]
  nextPageToken?: string
  isLast?: boolean
}

interface JiraTransition {
  id: string
  name: string
  to: { name: string }
}

function quoteJql(value: string): string {
  return `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`
}

/**
 * Jira REST wrapper. One authenticated call per request, no retries.
 */
export class JiraClient implements IssueTracker {
  private readonly base: string
  private readonly auth: string

  constructor(private readonly config: BugtrackerConfig) {
    this.base = `${config.baseUrl}/rest/api/latest/`
    this.auth = `Basic ${Buffer.from(`${config.user}:${config.token}`).toString('base64')}`
  }

  private async request<T>(method: string, path: string, body?: unknown): Promise<T | undefined> {
    const url = `${this.base}${path}`
    log.debug(`JiraClient ${method} ${url}`)

    let response: Response
    try {
      response = await fetch(url, {
        method,
        headers: {
          Authorization: this.auth,
          Accept: 'application/json',
          ...(body !== undefined ? { 'Content-Type': 'application/json' } : {}),
        },
        body: body !== undefined ? JSON.stringify(body) : undefined,
      })
    } catch (error) {
      throw new TrackerUnavailable(this.config.baseUrl, error)
    }

    const text = await response.text()
    if (!response.ok) {
      throw new TrackerAPIError(response.status, text, `${method} ${path}`)
    }
    // transitions answer 204 No Content
    return text ? (JSON.parse(text) as T) : undefined
  }

  private async requestJson<T>(method: string, path: string, body?: unknown): Promise<T> {
    const result = await this.request<T>(method, path, body)
    if (result === undefined) {
      throw new TrackerAPIError(204, 'empty response', `${method} ${path}`)
    }
    return result
  }

  private toTicket(issue: JiraIssue): Ticket {
    const issueType = issue.fields.issuetype.name
    return {
      key: issue.key,
      summary: issue.fields.summary,
      issueType,
      kinds: ticketKinds(issueType, this.config),
      status: issue.fields.status.name,
      url: `${this.config.baseUrl}/browse/${issue.key}`,
    }
  }

  async getTicket(id: string): Promise<Ticket> {
    const issue = await this.requestJson<JiraIssue>(
      'GET',
      `issue/${encodeURIComponent(id)}?fields=${ISSUE_FIELDS}`
    )
    return this.toTicket(issue)
  }

  /** Enhanced JQL search (`search/jql`), following `nextPageToken` to the end. */
  async searchTickets(jql: string): Promise<Ticket[]> {
    const tickets: Ticket[] = []
    let pageToken: string | undefined
    do {
      const query = new URLSearchParams({ jql, fields: ISSUE_FIELDS, maxResults: '100' })
      if (pageToken) query.set('nextPageToken', pageToken)
      const page = await this.requestJson<JiraSearchResponse>('GET', `search/jql?${query.toString()}`)
      tickets.push(...page.issues.map((issue) => this.toTicket(issue)))
      pageToken = page.isLast ? undefined : page.nextPageToken
    } while (pageToken)
    return tickets
  }

  async listMyTickets(filterId: string = this.config.ticketFilterId): Promise<Ticket[]> {
    return this.searchTickets(`filter=${filterId}`)
  }

  /** Used by shell completion. */
  async getMyTicketIds(): Promise<string[]> {
    const tickets = await this.listMyTickets()
    return tickets.map((t) => t.key)
  }

  async transitionTicket(id: string, targetStatus: string): Promise<TransitionResult> {
    const ticket = await this.getTicket(id)
    const target = targetStatus.toLowerCase()
    if (ticket.status.toLowerCase() === target) {
      log.debug(`${id} already in "${ticket.status}"`)
      return { changed: false, from: ticket.status, to: ticket.status }
    }

    const { transitions } = await this.requestJson<{ transitions: JiraTransition[] }>(
      'GET',
      `issue/${encodeURIComponent(id)}/transitions`
    )
    const transition =
      transitions.find((t) => t.to.name.toLowerCase() === target) ??
      transitions.find((t) => t.name.toLowerCase() === target)

    if (!transition) {
      throw new TicketTransitionUnavailable(
        id,
        targetStatus,
        transitions.map((t) => t.to.name)
      )
    }

    await this.request('POST', `issue/${encodeURIComponent(id)}/transitions`, {
      transition: { id: transition.id },
    })
    return { changed: true, from: ticket.status, to: transition.to.name }
  }

  async findReleaseTicket(project: string, type: string, summary: string): Promise<Ticket | null> {
    const jql =
      `project = ${quoteJql(project)} AND issuetype = ${quoteJql(type)} ` +
      `AND summary ~ ${quoteJql(summary)} ORDER BY created DESC`
    const tickets = await this.searchTickets(jql)
    // `~` is a fuzzy text match, so confirm the exact summary
    return tickets.find((t) => t.summary === summary) ?? null
  }

  async createReleaseTicket(
    project: string,
    type: string,
    fields: ReleaseTicketFields
  ): Promise<Ticket> {
    const created = await this.requestJson<{ key: string }>('POST', 'issue', {
      fields: {
        project: { key: project },
        issuetype: { name: type },
        summary: fields.summary,
        ...(fields.description ? { description: fields.description } : {}),
      },
    })
    return this.getTicket(created.key)
  }
}

export function formatTicket(ticket: Ticket): string {
  return [
    `Ticket: ${ticket.key} - ${ticket.summary}`,
    `URL: ${ticket.url}`,
    `Type: ${ticket.issueType}${ticket.kinds.length > 0 ? ` (${ticket.kinds.join(', ')})` : ''}`,
    `Status: ${ticket.status}`,
  ].join('\n')
}
