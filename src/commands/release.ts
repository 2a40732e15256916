import chalk from 'chalk'
import type { Command } from 'commander'
import { confirm } from '@inquirer/prompts'
import { UsageError } from '../lib/errors.js'
import { findReleaseTarget, publishRelease, versions } from '../workflows/release.js'
import { raiseToInfo } from './qa.js'
import { createContext, parseVersion, runAction } from './shared.js'

export function registerReleaseCommand(program: Command): void {
  program
    .command('release')
    .description('Merge a release branch into master, tag it and close its ticket')
    .argument('[version]', 'Version to release (defaults to the newest release branch)', parseVersion)
    .option('-v, --verbose', 'Show each step and the changelog')
    .option('-y, --yes', 'Do not ask for confirmation')
    .action(
      runAction(async (version: string | undefined, opts: { verbose?: boolean; yes?: boolean }, command: Command) => {
        if (opts.verbose) raiseToInfo()
        const ctx = createContext(command)
        const { master } = ctx.config.repo

        const target = await findReleaseTarget(ctx, version)
        const source = target.branch ? `${target.branch.name} into ${master}` : `${master} as a hotfix`

        if (!opts.yes) {
          if (!process.stdin.isTTY) {
            throw new UsageError('Confirmation needed; pass -y to release without a prompt')
          }
          const proceed = await confirm({
            message: `Release ${target.version} from ${source}?`,
            default: false,
          })
          if (!proceed) {
            console.log(chalk.yellow('Release cancelled.'))
            return
          }
        }

        const result = await publishRelease(ctx, { version: target.version })

        if (result.pullRequest) {
          console.log(`Merged #${result.pullRequest.number} into ${master}`)
        } else if (result.branch) {
          console.log(chalk.dim(`${result.branch} was already merged into ${master}`))
        } else {
          console.log(chalk.dim(`Hotfix ${result.version} tagged on ${master}`))
        }
        console.log(
          result.created
            ? chalk.green(`Release ${result.version} published`)
            : chalk.yellow(`Release ${result.version} was already published`)
        )
        console.log(chalk.dim(result.release.url))
        if (result.ticket && result.transition?.changed) {
          console.log(`${result.ticket.key}: ${result.transition.from} → ${result.transition.to}`)
        }
        if (opts.verbose && result.changelog.lines.length > 0) {
          console.log(chalk.bold('\nChanges:'))
          console.log(result.changelog.text)
        }
      })
    )

  program
    .command('versions')
    .description('Show the latest release and pre-release')
    .action(
      runAction(async (_opts: object, command: Command) => {
        const ctx = createContext(command)
        const { release, prerelease } = await versions(ctx)
        console.log(`Release:     ${release ? chalk.bold(release.tagName) : chalk.dim('none')}`)
        console.log(`Pre-release: ${prerelease ? chalk.bold(prerelease.tagName) : chalk.dim('none')}`)
      })
    )
}
