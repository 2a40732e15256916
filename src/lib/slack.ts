import { NotificationFailure } from './errors.js'
import * as log from './logger.js'
import type { Channel, Notifier, OctoebConfig, SlackConfig } from './types.js'

const SLACK_API_URL = 'https://slack.com/api/'

// conversations.invite errors meaning the user is in the channel already
const ALREADY_PRESENT = new Set(['already_in_channel', 'cant_invite_self'])

interface SlackResponse {
  ok: boolean
  error?: string
}

/**
 * Slack Web API wrapper for release channels. Calls are form-encoded so the
 * same helper serves read and write methods.
 */
export class SlackNotifier implements Notifier {
  readonly enabled = true

  constructor(private readonly config: SlackConfig) {}

  private async call<T extends object>(method: string, params: Record<string, string>): Promise<T & SlackResponse> {
    log.debug(`Slack ${method} ${JSON.stringify(params)}`)

    let response: Response
    try {
      response = await fetch(`${SLACK_API_URL}${method}`, {
        method: 'POST',
        headers: {
          Authorization: `Bearer ${this.config.token}`,
          'Content-Type': 'application/x-www-form-urlencoded',
        },
        body: new URLSearchParams(params).toString(),
      })
    } catch (error) {
      throw new NotificationFailure(method, error instanceof Error ? error.message : String(error), { cause: error })
    }

    if (!response.ok) {
      throw new NotificationFailure(method, `HTTP ${response.status} ${await response.text()}`)
    }

    return (await response.json()) as T & SlackResponse
  }

  private async callOk<T extends object>(method: string, params: Record<string, string>): Promise<T & SlackResponse> {
    const result = await this.call<T>(method, params)
    if (!result.ok) {
      throw new NotificationFailure(method, result.error ?? 'unknown error')
    }
    return result
  }

  /** Create the channel, or reuse the existing one of that name. */
  async createChannel(name: string): Promise<Channel> {
    const created = await this.call<{ channel?: Channel }>('conversations.create', { name })
    if (created.ok && created.channel) {
      return { id: created.channel.id, name: created.channel.name }
    }
    if (created.error !== 'name_taken') {
      throw new NotificationFailure('conversations.create', created.error ?? 'unknown error')
    }

    let cursor = ''
    do {
      const page = await this.callOk<{
        channels: Channel[]
        response_metadata?: { next_cursor?: string }
      }>('conversations.list', {
        exclude_archived: 'true',
        limit: '1000',
        types: 'public_channel,private_channel',
        ...(cursor ? { cursor } : {}),
      })
      const existing = page.channels.find((c) => c.name === name)
      if (existing) return { id: existing.id, name: existing.name }
      cursor = page.response_metadata?.next_cursor ?? ''
    } while (cursor)

    throw new NotificationFailure('conversations.list', `channel #${name} exists but is not visible`)
  }

  /**
   * Invite the members of a user group one at a time, so one bad id does not
   * sink the rest. Returns how many were actually added; members already in
   * the channel (the token owner included) are not counted.
   */
  async invite(channel: Channel, groupId: string): Promise<number> {
    const { users } = await this.callOk<{ users: string[] }>('usergroups.users.list', { usergroup: groupId })

    let invited = 0
    const failed: string[] = []
    for (const user of users) {
      const result = await this.call<object>('conversations.invite', { channel: channel.id, users: user })
      if (result.ok) {
        invited++
      } else if (!ALREADY_PRESENT.has(result.error ?? '')) {
        failed.push(`${user}: ${result.error ?? 'unknown error'}`)
      }
    }

    if (failed.length > 0) {
      throw new NotificationFailure('conversations.invite', `invited ${invited}, failed ${failed.join(', ')}`)
    }
    return invited
  }

  async postTopic(channel: Channel, text: string): Promise<void> {
    await this.callOk('conversations.setTopic', { channel: channel.id, topic: text })
    await this.callOk('chat.postMessage', { channel: channel.id, text })
  }
}

/** Stands in when no [slack] section is configured. */
export class NoopNotifier implements Notifier {
  readonly enabled = false

  async createChannel(name: string): Promise<Channel> {
    return { id: '', name }
  }

  async invite(): Promise<number> {
    return 0
  }

  async postTopic(): Promise<void> {}
}

/** Chosen once at startup from the presence of the [slack] section. */
export function createNotifier(config: Pick<OctoebConfig, 'slack'>): Notifier {
  if (!config.slack) {
    log.debug('No [slack] section; notifications disabled')
    return new NoopNotifier()
  }
  return new SlackNotifier(config.slack)
}
