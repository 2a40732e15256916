import type { Command } from 'commander'
import { Option } from 'commander'
import { HOST_METHODS, TRACKER_METHODS, callMethod, describeMethods } from '../workflows/dev.js'
import { createContext, runAction } from './shared.js'

interface MethodOptions {
  name?: string
  args?: string[]
  list?: boolean
}

function printMethods(lines: string[]): void {
  console.log('Available methods:\n')
  for (const line of lines) console.log(`  ${line}`)
}

export function registerDevCommands(program: Command): void {
  program
    .command('jira')
    .description('Call an issue tracker client method (development aid)')
    .option('-m, --name <method>', 'Method to call')
    .option('-a, --args <args...>', 'Positional arguments for the method')
    .option('-l, --list', 'List the available methods')
    .action(
      runAction(async (opts: MethodOptions, command: Command) => {
        if (opts.list || !opts.name) {
          printMethods(describeMethods(TRACKER_METHODS))
          return
        }
        const ctx = createContext(command)
        console.log(await callMethod(TRACKER_METHODS, ctx.tracker, opts.name, opts.args))
      })
    )

  program
    .command('method')
    .description('Call a source host client method (development aid)')
    .addOption(new Option('-t, --target <target>', 'Repository to call against').choices(['mainline', 'fork']).default('mainline'))
    .option('-m, --name <method>', 'Method to call')
    .option('-a, --args <args...>', 'Positional arguments for the method')
    .option('-l, --list', 'List the available methods')
    .action(
      runAction(async (opts: MethodOptions & { target: 'mainline' | 'fork' }, command: Command) => {
        if (opts.list || !opts.name) {
          printMethods(describeMethods(HOST_METHODS))
          return
        }
        const ctx = createContext(command)
        const host = opts.target === 'fork' ? ctx.fork : ctx.mainline
        console.log(await callMethod(HOST_METHODS, host, opts.name, opts.args))
      })
    )
}
