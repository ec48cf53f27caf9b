import chalk from 'chalk'

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

interface LoggerConfig {
  level: LogLevel
  /** Only errors are printed */
  quiet: boolean
  /** Prefix log lines with an ISO timestamp */
  timestamps: boolean
}

type ConsoleMethod = 'debug' | 'info' | 'warn' | 'error'

const LEVELS: Record<LogLevel, { rank: number; method: ConsoleMethod; color: (text: string) => string }> = {
  debug: { rank: 0, method: 'debug', color: chalk.gray },
  info: { rank: 1, method: 'info', color: chalk.blue },
  warn: { rank: 2, method: 'warn', color: chalk.yellow },
  error: { rank: 3, method: 'error', color: chalk.red }
}

const SEVERITY_COLORS: Record<string, (text: string) => string> = {
  critical: chalk.bgRed.white,
  high: chalk.red,
  medium: chalk.yellow,
  low: chalk.cyan,
  info: chalk.gray
}

let config: LoggerConfig = {
  level: 'info',
  quiet: false,
  timestamps: true
}

/**
 * Configure the logger
 */
export function configureLogger(options: Partial<LoggerConfig>): void {
  config = { ...config, ...options }
}

function log(level: LogLevel, message: string, args: unknown[]): void {
  if (config.quiet && level !== 'error') return
  const { rank, method, color } = LEVELS[level]
  if (rank < LEVELS[config.level].rank) return

  const stamp = config.timestamps ? `[${new Date().toISOString()}] ` : ''
  console[method](color(`${stamp}[${level.toUpperCase()}] ${message}`), ...args)
}

export function debug(message: string, ...args: unknown[]): void {
  log('debug', message, args)
}

export function info(message: string, ...args: unknown[]): void {
  log('info', message, args)
}

export function warn(message: string, ...args: unknown[]): void {
  log('warn', message, args)
}

export function error(message: string, ...args: unknown[]): void {
  log('error', message, args)
}

/**
 * Print a single finding, coloured by severity
 */
export function finding(severity: string, message: string, location: string): void {
  if (config.quiet) return
  const color = SEVERITY_COLORS[severity] ?? chalk.white
  console.log(`${color(`[${severity.toUpperCase()}]`)} ${message} (${chalk.dim(location)})`)
}

/**
 * Print a per-file status line: `OK   src/file.c: message` or `FAIL src/file.c: message`
 */
export function status(ok: boolean, file: string, message: string): void {
  if (config.quiet) return
  const label = ok ? chalk.green('OK  ') : chalk.red('FAIL')
  console.log(`${label} ${file}: ${message}`)
}

export interface Logger {
  debug: (message: string, ...args: unknown[]) => void
  info: (message: string, ...args: unknown[]) => void
  warn: (message: string, ...args: unknown[]) => void
  error: (message: string, ...args: unknown[]) => void
}

/**
 * Create a logger whose messages carry a `[name]` prefix
 */
export function createLogger(name: string): Logger {
  const named = (level: LogLevel) =>
    (message: string, ...args: unknown[]) => log(level, `[${name}] ${message}`, args)

  return {
    debug: named('debug'),
    info: named('info'),
    warn: named('warn'),
    error: named('error')
  }
}
