import { existsSync, writeFileSync } from 'fs'
import { homedir } from 'os'
import { join } from 'path'
import chalk from 'chalk'
import type { Command } from 'commander'
import { CONFIG_FILE_NAME, configSearchPaths, defaultEnvironment, findConfigFile } from '../lib/config.js'
import { remoteUrl } from '../lib/git.js'
import { detectRepoFromRemote } from '../lib/github.js'
import { globalOptions, runAction } from './shared.js'

export function sampleConfig(repo: { owner: string; repo: string } | null): string {
  return `# octoeb configuration. Values may also come from OCTOEB_*_TOKEN variables.

[repo]
# Mainline owner, your fork's owner and the repository name
OWNER=${repo?.owner ?? ''}
FORK=
REPO=${repo?.repo ?? ''}
USER=
# GitHub personal access token
TOKEN=
# MASTER=master
# DEVELOP=develop
# MAINLINE_REMOTE=mainline
# FORK_REMOTE=origin

[bugtracker]
BASE_URL=https://example.atlassian.net
USER=
TOKEN=
# Saved filter listing your open tickets
TICKET_FILTER_ID=
# RELEASE_TICKET_PROJECT=MAN
# RELEASE_TICKET_TYPE=RELEASE
# FEATURE_TYPES=Story,Task,Improvement,New Feature
# HOTFIX_TYPES=Bug
# RELEASEFIX_TYPES=Bug

# Remove this section to run without release channels
[slack]
TOKEN=
# GROUP_ID=
# TOPIC_STR=Release {version}

[release]
# PREFIX=release
`
}

export function registerConfigCommand(program: Command): void {
  const cfg = program.command('config').description('Manage the .octoebrc configuration')

  cfg
    .command('init')
    .description('Write a sample .octoebrc')
    .option('--local', `Write ./${CONFIG_FILE_NAME} instead of ~/${CONFIG_FILE_NAME}`)
    .action(
      runAction(async (opts: { local?: boolean }) => {
        const path = opts.local ? join(process.cwd(), CONFIG_FILE_NAME) : join(homedir(), CONFIG_FILE_NAME)
        if (existsSync(path)) {
          console.log(chalk.yellow(`Config already exists: ${path}`))
          return
        }

        const remote = remoteUrl('mainline') ?? remoteUrl('origin')
        writeFileSync(path, sampleConfig(remote ? detectRepoFromRemote(remote) : null), { mode: 0o600 })
        console.log(chalk.green(`Created sample config: ${path}`))
        console.log('Fill in the tokens, then run "octoeb config path" to check which file is used.')
      })
    )

  cfg
    .command('path')
    .description('Show the config file in use and where it is looked for')
    .action(
      runAction(async (_opts: object, command: Command) => {
        const environment = defaultEnvironment(globalOptions(command).config)
        const found = findConfigFile(environment)

        console.log(found ? `Using: ${chalk.bold(found)}` : chalk.yellow('No config file found.'))
        console.log('\nSearch order:')
        for (const candidate of configSearchPaths(environment)) {
          const marker = candidate === found ? chalk.green('●') : chalk.dim('○')
          console.log(`  ${marker} ${candidate}`)
        }
      })
    )
}
