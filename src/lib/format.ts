import type { BranchKind, OctoebConfig, Ticket, TicketKind } from './types.js'

const VERSION_RE = /^\d+(?:\.\d+){1,4}$/
const TICKET_RE = /^[A-Za-z]+-\d+$/

// Default patterns match `git log --oneline --merges` lines such as
// "Merge pull request #12 from alice/feature-EB-123-add-login"
export const DEFAULT_CHANGELOG_RE = String.raw`merge pull request #\d+ from [\w/]*(?:[/-]([a-z]{2,4}-\d+)-(.*))`
export const DEFAULT_ISSUE_RE = String.raw`merge pull request #\d+ from [\w/]*(?:[/-]([a-z]+-\d+))`

// --- Versions ---

export function isVersion(value: string): boolean {
  return VERSION_RE.test(value)
}

/** Strip a leading `v` and any release-name prefix from a tag. */
export function versionFromTag(tag: string): string | null {
  const match = tag.match(/(\d+(?:\.\d+){1,4})$/)
  return match ? match[1] : null
}

/** The first four components; release branches are named after these. */
export function releaseVersion(version: string): string {
  return version.split('.').slice(0, 4).join('.')
}

/** A fifth component marks a hotfix on top of a release. */
export function isHotfixVersion(version: string): boolean {
  return version.split('.').length > 4
}

/**
 * Bump the last component of the release version, keeping its zero padding:
 * `17.33.1.09` -> `17.33.1.10`, `2.4.1` -> `2.4.2`.
 */
export function nextReleaseVersion(latest: string): string {
  const parts = releaseVersion(latest).split('.')
  const last = parts[parts.length - 1]
  parts[parts.length - 1] = String(Number(last) + 1).padStart(last.length, '0')
  return parts.join('.')
}

export function compareVersions(a: string, b: string): number {
  const left = a.split('.').map(Number)
  const right = b.split('.').map(Number)
  for (let i = 0; i < Math.max(left.length, right.length); i++) {
    const diff = (left[i] ?? 0) - (right[i] ?? 0)
    if (diff !== 0) return diff
  }
  return 0
}

// --- Tickets ---

export function isTicketId(value: string): boolean {
  return TICKET_RE.test(value)
}

export function ticketKinds(issueType: string, bugtracker: OctoebConfig['bugtracker']): TicketKind[] {
  const type = issueType.toLowerCase()
  const matches = (types: readonly string[]) => types.some((t) => t.toLowerCase() === type)

  const kinds: TicketKind[] = []
  if (matches(bugtracker.featureTypes)) kinds.push('feature')
  if (matches(bugtracker.hotfixTypes)) kinds.push('hotfix')
  if (matches(bugtracker.releasefixTypes)) kinds.push('releasefix')
  if (type === bugtracker.releaseTicketType.toLowerCase()) kinds.push('release')
  return kinds
}

// --- Names ---

export function slugify(text: string, maxLength = 60): string {
  return text
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '')
    .slice(0, maxLength)
    .replace(/-+$/, '')
}

/** `feature-EB-123-add-login-page` */
export function branchName(kind: BranchKind, ticket: Pick<Ticket, 'key' | 'summary'>): string {
  const slug = slugify(ticket.summary)
  return slug ? `${kind}-${ticket.key}-${slug}` : `${kind}-${ticket.key}`
}

/** `PREFIX[-MAIN]` from the [release] section. */
export function releaseBaseName(release: OctoebConfig['release']): string {
  return [release.prefix, release.main].filter((part): part is string => Boolean(part)).join('-')
}

export function releaseBranchName(release: OctoebConfig['release'], version: string): string {
  return `${releaseBaseName(release)}-${releaseVersion(version)}`
}

export function versionFromReleaseBranch(release: OctoebConfig['release'], branch: string): string | null {
  const prefix = `${releaseBaseName(release)}-`
  if (!branch.startsWith(prefix)) return null
  const version = branch.slice(prefix.length)
  return isVersion(version) ? version : null
}

export function releaseChannelName(release: OctoebConfig['release'], version: string): string {
  return releaseBranchName(release, version)
    .toLowerCase()
    .replace(/\./g, '_')
    .replace(/[^a-z0-9_-]/g, '_')
    .slice(0, 80)
}

export function releaseTicketSummary(release: OctoebConfig['release'], version: string): string {
  return `Release ${releaseBranchName(release, version)}`
}

/** Fill `{name}` placeholders; unknown names are left as they are. */
export function fillTemplate(template: string, values: Record<string, string>): string {
  return template.replace(/\{(\w+)\}/g, (match, name: string) => values[name] ?? match)
}

// --- Changelog ---

export interface ChangelogPatterns {
  changelogRe?: string
  issueRe?: string
}

export interface Changelog {
  ticketIds: string[]
  lines: string[]
  text: string
}

function titleCase(text: string): string {
  return text.toLowerCase().replace(/(^|[^a-z])([a-z])/g, (_, before: string, letter: string) => before + letter.toUpperCase())
}

/**
 * Build changelog lines (`* EB-123 : Add Login`) and the set of ticket ids
 * from merge commit messages.
 */
export function buildChangelog(log: string, patterns: ChangelogPatterns = {}): Changelog {
  const changelogRe = new RegExp(patterns.changelogRe ?? DEFAULT_CHANGELOG_RE, 'gi')
  const issueRe = new RegExp(patterns.issueRe ?? DEFAULT_ISSUE_RE, 'gi')

  const ticketIds = new Set<string>()
  for (const match of log.matchAll(issueRe)) {
    if (match[1]) ticketIds.add(match[1].toUpperCase())
  }

  const lines = new Set<string>()
  for (const match of log.matchAll(changelogRe)) {
    if (!match[1]) continue
    const title = titleCase((match[2] ?? '').replace(/[-_]/g, ' ').trim())
    lines.add(`* ${match[1].toUpperCase()} : ${title}`)
  }

  const sorted = [...lines].sort()
  return { ticketIds: [...ticketIds].sort(), lines: sorted, text: sorted.join('\n') }
}

/** Changelog from host commit messages; only the first line of each counts. */
export function changelogFromMessages(messages: string[], patterns: ChangelogPatterns = {}): Changelog {
  return buildChangelog(messages.map((m) => m.split('\n')[0]).join('\n'), patterns)
}
