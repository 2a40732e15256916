/**
 * Levelled console output for the CLI.
 *
 * `debug` is grey, `warn` yellow, `error` red. `success` and `dim` always
 * print; the others are filtered by the configured level. The MCP server
 * switches the stream to stderr so stdout stays a clean transport.
 */

import chalk from 'chalk'

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error']

export interface LoggerOptions {
  level?: LogLevel
  stream?: 'stdout' | 'stderr'
}

let options: Required<LoggerOptions> = {
  level: 'warn',
  stream: 'stdout',
}

const levelPriority: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
}

export function configureLogger(next: LoggerOptions): void {
  options = { ...options, ...next }
}

export function getLoggerOptions(): Required<LoggerOptions> {
  return { ...options }
}

function shouldLog(level: LogLevel): boolean {
  return levelPriority[level] >= levelPriority[options.level]
}

function write(message: string): void {
  if (options.stream === 'stderr') {
    console.error(message)
  } else {
    console.log(message)
  }
}

export function debug(message: string): void {
  if (shouldLog('debug')) write(chalk.gray(message))
}

export function info(message: string): void {
  if (shouldLog('info')) write(message)
}

export function warn(message: string): void {
  if (shouldLog('warn')) write(chalk.yellow(message))
}

export function error(message: string): void {
  if (shouldLog('error')) write(chalk.red(message))
}

export function success(message: string): void {
  write(chalk.green(message))
}

export function dim(message: string): void {
  write(chalk.dim(message))
}
