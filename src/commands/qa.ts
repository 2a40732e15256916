import chalk from 'chalk'
import type { Command } from 'commander'
import * as log from '../lib/logger.js'
import { listQaTickets, publishPrerelease, renderQaReport } from '../workflows/qa.js'
import { createContext, parseVersion, runAction } from './shared.js'

/** `-v` shows step progress as well as ticket detail. */
export function raiseToInfo(): void {
  const { level } = log.getLoggerOptions()
  if (level === 'warn' || level === 'error') log.configureLogger({ level: 'info' })
}

export function registerQaCommand(program: Command): void {
  program
    .command('qa')
    .description('List the tickets waiting for QA on a release branch, or tag a pre-release')
    .option('-v, --verbose', 'Show ticket type, status and link')
    .option('-b, --branch <name>', 'Release branch (defaults to the newest)')
    .option('-p, --prerelease <version>', 'Tag the release branch head as a pre-release', parseVersion)
    .action(
      runAction(async (opts: { verbose?: boolean; branch?: string; prerelease?: string }, command: Command) => {
        if (opts.verbose) raiseToInfo()
        const ctx = createContext(command)

        if (opts.prerelease) {
          const result = await publishPrerelease(ctx, opts.prerelease)
          console.log(
            result.created
              ? chalk.green(`Pre-release ${result.version} published from ${result.branch}`)
              : chalk.yellow(`Pre-release ${result.version} already exists`)
          )
          console.log(chalk.dim(result.release.url))
          if (result.changelog.lines.length > 0) console.log(`\n${result.changelog.text}`)
          return
        }

        const report = await listQaTickets(ctx, { branch: opts.branch })
        for (const line of renderQaReport(report, opts.verbose)) {
          console.log(line)
        }
      })
    )
}
