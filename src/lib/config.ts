import { config as dotenvConfig } from 'dotenv'
import { existsSync, readFileSync, statSync } from 'fs'
import { homedir } from 'os'
import { join, resolve } from 'path'
import { z } from 'zod'
import { ConfigMissingKey, ConfigNotFound, ConfigParseError } from './errors.js'
import * as log from './logger.js'
import type { OctoebConfig } from './types.js'

export const CONFIG_FILE_NAME = '.octoebrc'

export interface ConfigEnvironment {
  cwd: string
  home: string
  env: NodeJS.ProcessEnv
  platform: NodeJS.Platform
  /** Explicit path from `--config`; takes the place of `$OCTOEB_CONFIG`. */
  configPath?: string
}

/**
 * Ordered candidate paths, first match wins:
 * 1. explicit path (`--config` or `$OCTOEB_CONFIG`)
 * 2. `<cwd>/.octoebrc`
 * 3. `<config home>/octoeb/.octoebrc`
 * 4. `<home>/.octoebrc`
 */
export function configSearchPaths(environment: ConfigEnvironment): string[] {
  const { cwd, home, env, platform } = environment
  const explicit = environment.configPath ?? env.OCTOEB_CONFIG
  const configHome =
    env.XDG_CONFIG_HOME ||
    (platform === 'win32' && env.APPDATA ? env.APPDATA : join(home, '.config'))

  const paths = [
    explicit ? resolve(cwd, explicit) : undefined,
    join(cwd, CONFIG_FILE_NAME),
    join(configHome, 'octoeb', CONFIG_FILE_NAME),
    join(home, CONFIG_FILE_NAME),
  ].filter((p): p is string => p !== undefined)

  return [...new Set(paths)]
}

export function findConfigFile(environment: ConfigEnvironment): string | null {
  for (const candidate of configSearchPaths(environment)) {
    if (existsSync(candidate) && statSync(candidate).isFile()) {
      return candidate
    }
  }
  return null
}

// --- Parsing ---

type RawSections = Record<string, Record<string, string>>

/**
 * Parse ini text into lower-case sections of upper-case keys. A key ends at
 * the first `=` or `:`; the rest of the line is the value, verbatim, so `#`
 * and `;` inside a value (changelog patterns, topics) are kept. Only whole
 * lines starting with `#` or `;` are comments. Empty values are dropped so
 * they count as missing.
 */
export function parseConfigText(text: string, path: string): RawSections {
  const sections: RawSections = {}
  let current: Record<string, string> | undefined

  text.split(/\r?\n/).forEach((rawLine, index) => {
    const line = rawLine.trim()
    if (!line || line.startsWith(';') || line.startsWith('#')) return

    const header = line.match(/^\[([^\]]+)\]$/)
    if (header) {
      const name = header[1].trim().toLowerCase()
      current = sections[name] ?? {}
      sections[name] = current
      return
    }

    const delimiters = [line.indexOf('='), line.indexOf(':')].filter((at) => at > 0)
    if (delimiters.length === 0) {
      throw new ConfigParseError(path, `expected "KEY = value", got "${line}"`, index + 1)
    }
    if (!current) {
      throw new ConfigParseError(path, 'key outside of a [section]', index + 1)
    }

    const at = Math.min(...delimiters)
    const key = line.slice(0, at).trim().toUpperCase()
    const value = line.slice(at + 1).trim()
    if (value !== '') {
      current[key] = value
    } else {
      delete current[key]
    }
  })

  return sections
}

// --- Validation ---

const required = z.string().min(1)
const list = (fallback: string) =>
  z
    .string()
    .default(fallback)
    .transform((value) =>
      value
        .split(',')
        .map((item) => item.trim())
        .filter(Boolean)
    )

const repoSchema = z.object({
  OWNER: required,
  FORK: required,
  REPO: required,
  TOKEN: required,
  USER: required,
  MASTER: z.string().default('master'),
  DEVELOP: z.string().default('develop'),
  MAINLINE_REMOTE: z.string().default('mainline'),
  FORK_REMOTE: z.string().default('origin'),
  API_URL: z.string().default('https://api.github.com'),
  WEB_URL: z.string().default('https://github.com'),
  CHANGELOG_RE: z.string().optional(),
  ISSUE_RE: z.string().optional(),
})

const bugtrackerSchema = z.object({
  BASE_URL: required,
  USER: required,
  TOKEN: required,
  TICKET_FILTER_ID: required,
  RELEASE_TICKET_PROJECT: z.string().default('MAN'),
  RELEASE_TICKET_TYPE: z.string().default('RELEASE'),
  FEATURE_TYPES: list('Story,Task,Improvement,New Feature'),
  HOTFIX_TYPES: list('Bug'),
  RELEASEFIX_TYPES: list('Bug'),
  IN_PROGRESS_STATUS: z.string().default('In Progress'),
  IN_REVIEW_STATUS: z.string().default('In Review'),
  QA_STATUS: z.string().default('QA'),
  DONE_STATUS: z.string().default('Done'),
})

const slackSchema = z.object({
  TOKEN: required,
  GROUP_ID: z.string().optional(),
  TOPIC_STR: z.string().default('Release {version}'),
})

const releaseSchema = z.object({
  PREFIX: z.string().default('release'),
  MAIN: z.string().optional(),
})

const configSchema = z.object({
  repo: repoSchema,
  bugtracker: bugtrackerSchema,
  slack: slackSchema.optional(),
  release: releaseSchema,
})

const TOKEN_OVERRIDES = [
  ['repo', 'OCTOEB_REPO_TOKEN'],
  ['bugtracker', 'OCTOEB_BUGTRACKER_TOKEN'],
  ['slack', 'OCTOEB_SLACK_TOKEN'],
] as const

/**
 * Validate parsed sections and apply defaults. Token variables from the
 * environment replace the file's TOKEN of a section that exists.
 */
export function buildConfig(
  sections: RawSections,
  source: string,
  env: NodeJS.ProcessEnv = {}
): OctoebConfig {
  const input: RawSections = {
    repo: { ...sections.repo },
    bugtracker: { ...sections.bugtracker },
    release: { ...sections.release },
  }
  if (sections.slack) input.slack = { ...sections.slack }

  for (const [section, variable] of TOKEN_OVERRIDES) {
    const override = env[variable]
    const target = input[section]
    if (override && target) target.TOKEN = override
  }

  const result = configSchema.safeParse(input)
  if (!result.success) {
    const issue = result.error.issues[0]
    const [section, key] = issue.path
    if (typeof section === 'string' && typeof key === 'string') {
      throw new ConfigMissingKey(section, key)
    }
    throw new ConfigParseError(source, issue.message)
  }

  const { repo, bugtracker, slack, release } = result.data
  const config: OctoebConfig = {
    source,
    repo: {
      owner: repo.OWNER,
      fork: repo.FORK,
      repo: repo.REPO,
      token: repo.TOKEN,
      user: repo.USER,
      master: repo.MASTER,
      develop: repo.DEVELOP,
      mainlineRemote: repo.MAINLINE_REMOTE,
      forkRemote: repo.FORK_REMOTE,
      apiUrl: repo.API_URL.replace(/\/+$/, ''),
      webUrl: repo.WEB_URL.replace(/\/+$/, ''),
      changelogRe: repo.CHANGELOG_RE,
      issueRe: repo.ISSUE_RE,
    },
    bugtracker: {
      baseUrl: bugtracker.BASE_URL.replace(/\/+$/, ''),
      user: bugtracker.USER,
      token: bugtracker.TOKEN,
      ticketFilterId: bugtracker.TICKET_FILTER_ID,
      releaseTicketProject: bugtracker.RELEASE_TICKET_PROJECT,
      releaseTicketType: bugtracker.RELEASE_TICKET_TYPE,
      featureTypes: bugtracker.FEATURE_TYPES,
      hotfixTypes: bugtracker.HOTFIX_TYPES,
      releasefixTypes: bugtracker.RELEASEFIX_TYPES,
      inProgressStatus: bugtracker.IN_PROGRESS_STATUS,
      inReviewStatus: bugtracker.IN_REVIEW_STATUS,
      qaStatus: bugtracker.QA_STATUS,
      doneStatus: bugtracker.DONE_STATUS,
    },
    slack: slack && {
      token: slack.TOKEN,
      groupId: slack.GROUP_ID,
      topicStr: slack.TOPIC_STR,
    },
    release: {
      prefix: release.PREFIX,
      main: release.MAIN,
    },
  }

  return deepFreeze(config)
}

function deepFreeze<T extends object>(value: T): Readonly<T> {
  for (const child of Object.values(value)) {
    if (typeof child === 'object' && child !== null && !Object.isFrozen(child)) {
      deepFreeze(child)
    }
  }
  return Object.freeze(value)
}

// --- Loading ---

export function defaultEnvironment(configPath?: string): ConfigEnvironment {
  const cwd = process.cwd()
  const projectEnv = resolve(cwd, '.env')
  if (existsSync(projectEnv)) {
    dotenvConfig({ path: projectEnv })
  }
  return { cwd, home: homedir(), env: process.env, platform: process.platform, configPath }
}

/**
 * Locate, parse and validate `.octoebrc`. Called once per invocation; the
 * returned object is frozen.
 */
export function loadConfig(environment: ConfigEnvironment = defaultEnvironment()): OctoebConfig {
  const path = findConfigFile(environment)
  if (!path) {
    throw new ConfigNotFound(configSearchPaths(environment))
  }
  log.debug(`Reading config from ${path}`)

  let text: string
  try {
    text = readFileSync(path, 'utf-8')
  } catch (error) {
    throw new ConfigParseError(path, error instanceof Error ? error.message : String(error), undefined, {
      cause: error,
    })
  }

  return buildConfig(parseConfigText(text, path), path, environment.env)
}
