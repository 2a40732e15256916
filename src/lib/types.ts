// --- Config Types ---

export interface RepoConfig {
  owner: string
  fork: string
  repo: string
  token: string
  user: string
  master: string
  develop: string
  mainlineRemote: string
  forkRemote: string
  apiUrl: string
  webUrl: string
  changelogRe?: string
  issueRe?: string
}

export interface BugtrackerConfig {
  baseUrl: string
  user: string
  token: string
  ticketFilterId: string
  releaseTicketProject: string
  releaseTicketType: string
  featureTypes: readonly string[]
  hotfixTypes: readonly string[]
  releasefixTypes: readonly string[]
  inProgressStatus: string
  inReviewStatus: string
  qaStatus: string
  doneStatus: string
}

export interface SlackConfig {
  token: string
  groupId?: string
  topicStr: string
}

export interface ReleaseConfig {
  prefix: string
  main?: string
}

export interface OctoebConfig {
  /** File the configuration was read from. */
  source: string
  repo: RepoConfig
  bugtracker: BugtrackerConfig
  slack?: SlackConfig
  release: ReleaseConfig
}

// --- Ticket Types ---

export type BranchKind = 'feature' | 'hotfix' | 'releasefix'
export type TicketKind = BranchKind | 'release'

export const BRANCH_KINDS: readonly BranchKind[] = ['feature', 'hotfix', 'releasefix']

export interface Ticket {
  key: string
  summary: string
  issueType: string
  kinds: TicketKind[]
  status: string
  url: string
}

export interface ReleaseTicketFields {
  summary: string
  description?: string
}

export interface TransitionResult {
  changed: boolean
  from: string
  to: string
}

export interface IssueTracker {
  getTicket(id: string): Promise<Ticket>
  listMyTickets(filterId?: string): Promise<Ticket[]>
  getMyTicketIds(): Promise<string[]>
  searchTickets(jql: string): Promise<Ticket[]>
  transitionTicket(id: string, targetStatus: string): Promise<TransitionResult>
  findReleaseTicket(project: string, type: string, summary: string): Promise<Ticket | null>
  createReleaseTicket(project: string, type: string, fields: ReleaseTicketFields): Promise<Ticket>
}

// --- Source Host Types ---

export type BaseRef = { branch: string } | { tag: string } | { sha: string }

export interface BranchRef {
  name: string
  sha: string
}

export interface CreatedBranch {
  branch: BranchRef
  created: boolean
}

export interface PullRequest {
  number: number
  title: string
  url: string
  head: string
  base: string
  merged: boolean
}

export interface OpenedPullRequest {
  pullRequest: PullRequest
  created: boolean
}

export interface MergeResult {
  merged: boolean
  sha: string
  alreadyMerged: boolean
}

export interface Release {
  id: number
  tagName: string
  name: string
  prerelease: boolean
  url: string
  body: string
}

export interface CreatedRelease {
  release: Release
  created: boolean
}

export interface TagOptions {
  title?: string
  body?: string
  prerelease?: boolean
}

export type CompareStatus = 'diverged' | 'ahead' | 'behind' | 'identical'

export interface Commit {
  sha: string
  message: string
}

export interface Comparison {
  status: CompareStatus
  aheadBy: number
  behindBy: number
  commits: Commit[]
}

export interface SourceHost {
  readonly owner: string
  readonly repo: string
  getBranch(name: string): Promise<BranchRef | null>
  createBranch(base: BaseRef, name: string): Promise<CreatedBranch>
  updateBranch(name: string, sha: string): Promise<BranchRef>
  listBranches(prefix: string): Promise<BranchRef[]>
  getTagSha(name: string): Promise<string | null>
  findPullRequest(head: string, base: string): Promise<PullRequest | null>
  openPullRequest(head: string, base: string, title: string, body?: string): Promise<OpenedPullRequest>
  mergePullRequest(number: number, commitTitle?: string): Promise<MergeResult>
  createTag(name: string, target: string, options?: TagOptions): Promise<CreatedRelease>
  getRelease(tag: string): Promise<Release | null>
  latestRelease(): Promise<Release | null>
  latestPrerelease(): Promise<Release | null>
  listReleases(): Promise<Release[]>
  compare(base: string, head: string): Promise<Comparison>
  branchUrl(name: string): string
}

// --- Notification Types ---

export interface Channel {
  id: string
  name: string
}

export interface Notifier {
  /** False for the no-op client chosen when chat is not configured. */
  readonly enabled: boolean
  createChannel(name: string): Promise<Channel>
  invite(channel: Channel, groupId: string): Promise<number>
  postTopic(channel: Channel, text: string): Promise<void>
}

// --- Local git ---

export interface GitOps {
  currentBranch(): string
  fetch(remote: string): void
  checkout(branch: string): void
  log(base: string, head?: string, options?: { merges?: boolean }): string
  pull(remote: string, branch: string, options?: { rebase?: boolean }): void
  push(remote: string, branch: string, options?: { force?: boolean }): void
  abortRebase(): void
  withStash<T>(fn: () => T): T
}
