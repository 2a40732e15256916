#!/usr/bin/env tsx
/**
 * octoeb - Gitflow helper that keeps GitHub branches, Jira tickets and Slack
 * release channels in step.
 *
 * Usage:
 *   octoeb start feature -t EB-123     # branch a ticket off develop
 *   octoeb review feature -t EB-123    # open its pull request
 *   octoeb start release [version]     # cut a release branch
 *   octoeb qa [-v]                     # tickets waiting for QA
 *   octoeb release [version]           # merge, tag and close the release
 *   octoeb sync | update               # keep the fork and current branch current
 *
 * See: octoeb --help
 */

import { Command, Option } from 'commander'
import { configureLogger, LOG_LEVELS, type LogLevel } from '../src/lib/logger.js'
import { registerStartCommand } from '../src/commands/start.js'
import { registerReviewCommand } from '../src/commands/review.js'
import { registerQaCommand } from '../src/commands/qa.js'
import { registerReleaseCommand } from '../src/commands/release.js'
import { registerGitCommands } from '../src/commands/git.js'
import { registerDevCommands } from '../src/commands/dev.js'
import { registerConfigCommand } from '../src/commands/config.js'
import { registerCompletionCommand } from '../src/commands/completion.js'
import { runAction } from '../src/commands/shared.js'

const program = new Command()

program
  .name('octoeb')
  .description('Gitflow helper for GitHub, Jira and Slack')
  .version('1.0.0', '-V, --version')
  // global options go before the command; sub-commands have their own -v and --version
  .enablePositionalOptions()
  .option('-c, --config <path>', 'Use this .octoebrc instead of searching for one')
  .addOption(new Option('--log <level>', 'Log level').choices(LOG_LEVELS).default('warn'))

program.hook('preAction', (thisCommand) => {
  const { log } = thisCommand.optsWithGlobals<{ log: LogLevel }>()
  configureLogger({ level: log })
})

registerStartCommand(program)
registerReviewCommand(program)
registerQaCommand(program)
registerReleaseCommand(program)
registerGitCommands(program)
registerDevCommands(program)
registerConfigCommand(program)
registerCompletionCommand(program)

// MCP server mode
program
  .command('mcp')
  .description('Start the MCP server (stdio transport) exposing read-only queries')
  .option('-l, --list', 'List the available MCP tools without starting the server')
  .action(
    runAction(async (opts: { list?: boolean }) => {
      const { MCP_TOOLS, startMcpServer } = await import('../src/mcp/server.js')
      if (opts.list) {
        console.log('\noctoeb MCP server tools:\n')
        for (const t of MCP_TOOLS) {
          console.log(`  • ${t.name} — ${t.description}`)
        }
        console.log(`\nTotal: ${MCP_TOOLS.length} tools\n`)
        return
      }
      await startMcpServer()
    })
  )

program.parseAsync().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : String(error))
  process.exit(1)
})
