import { UsageError } from '../lib/errors.js'
import type { IssueTracker, SourceHost } from '../lib/types.js'

export interface ClientMethod<C> {
  usage: string
  run(client: C, args: string[]): Promise<unknown>
}

export type MethodRegistry<C> = Record<string, ClientMethod<C>>

function arg(args: string[], index: number, name: string): string {
  const value = args[index]
  if (value === undefined || value === '') {
    throw new UsageError(`Missing argument <${name}>`)
  }
  return value
}

export const TRACKER_METHODS: MethodRegistry<IssueTracker> = {
  get_ticket: { usage: '<id>', run: (t, args) => t.getTicket(arg(args, 0, 'id')) },
  get_my_ticket_ids: { usage: '', run: async (t) => (await t.getMyTicketIds()).join('\n') },
  list_my_tickets: { usage: '[filter-id]', run: (t, args) => t.listMyTickets(args[0]) },
  search_tickets: { usage: '<jql>', run: (t, args) => t.searchTickets(arg(args, 0, 'jql')) },
  transition_ticket: {
    usage: '<id> <status>',
    run: (t, args) => t.transitionTicket(arg(args, 0, 'id'), arg(args, 1, 'status')),
  },
  find_release_ticket: {
    usage: '<project> <type> <summary>',
    run: (t, args) => t.findReleaseTicket(arg(args, 0, 'project'), arg(args, 1, 'type'), arg(args, 2, 'summary')),
  },
}

export const HOST_METHODS: MethodRegistry<SourceHost> = {
  get_branch: { usage: '<name>', run: (h, args) => h.getBranch(arg(args, 0, 'name')) },
  list_branches: { usage: '<prefix>', run: (h, args) => h.listBranches(arg(args, 0, 'prefix')) },
  get_tag_sha: { usage: '<tag>', run: (h, args) => h.getTagSha(arg(args, 0, 'tag')) },
  get_release: { usage: '<tag>', run: (h, args) => h.getRelease(arg(args, 0, 'tag')) },
  latest_release: { usage: '', run: (h) => h.latestRelease() },
  latest_prerelease: { usage: '', run: (h) => h.latestPrerelease() },
  list_releases: { usage: '', run: (h) => h.listReleases() },
  find_pull_request: {
    usage: '<head> <base>',
    run: (h, args) => h.findPullRequest(arg(args, 0, 'head'), arg(args, 1, 'base')),
  },
  compare: { usage: '<base> <head>', run: (h, args) => h.compare(arg(args, 0, 'base'), arg(args, 1, 'head')) },
}

export function describeMethods<C>(registry: MethodRegistry<C>): string[] {
  return Object.entries(registry).map(([name, method]) => (method.usage ? `${name} ${method.usage}` : name))
}

/** Run a registered method; strings print as they are, anything else as JSON. */
export async function callMethod<C>(
  registry: MethodRegistry<C>,
  client: C,
  name: string,
  args: string[] = []
): Promise<string> {
  const method = Object.hasOwn(registry, name) ? registry[name] : undefined
  if (!method) {
    throw new UsageError(`Unknown method "${name}". Available: ${Object.keys(registry).join(', ')}`)
  }
  const result = await method.run(client, args)
  return typeof result === 'string' ? result : JSON.stringify(result, null, 2)
}
