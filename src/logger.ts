import type { Writable } from 'node:stream'
import type { LoggingConfig } from './types'
import process from 'node:process'

/**
 * Log level type
 */
type LogLevel = 'debug' | 'info' | 'warn' | 'error'

/**
 * ANSI color codes for terminal output
 */
const ANSI_COLORS = {
  reset: '\u001B[0m',
  dim: '\u001B[2m',
  red: '\u001B[31m',
  yellow: '\u001B[33m',
  blue: '\u001B[34m',
  cyan: '\u001B[36m',
} as const

export interface LoggerOptions {
  logging?: LoggingConfig
  /** Receives debug and info output; defaults to process.stdout */
  stdout?: Writable
  /** Receives warnings and errors; defaults to process.stderr */
  stderr?: Writable
  colors?: boolean
}

/**
 * Logger class with scoped, leveled output
 */
export class Logger {
  private verbose: boolean
  private scopeName?: string
  private useColors: boolean
  private options: LoggerOptions

  constructor(verbose = false, scopeName?: string, options: LoggerOptions = {}) {
    this.verbose = verbose
    this.scopeName = scopeName
    this.options = options
    this.useColors = options.colors ?? (Boolean(process.stdout.isTTY) && !process.env.NO_COLOR)
  }

  /**
   * Enable or disable verbose logging
   */
  setVerbose(verbose: boolean): void {
    this.verbose = verbose
  }

  isVerbose(): boolean {
    return this.verbose
  }

  /**
   * Create a new logger instance with a scope
   */
  withScope(scope: string): Logger {
    const name = this.scopeName ? `${this.scopeName}:${scope}` : scope
    return new Logger(this.verbose, name, this.options)
  }

  private format(level: LogLevel, message: string): string {
    let formatted = ''

    if (this.options.logging?.timestamps) {
      formatted += this.colorize(new Date().toISOString(), 'dim')
      formatted += ' '
    }

    formatted = `${formatted}${this.getLevelString(level)} `

    if (this.scopeName) {
      formatted = `${formatted}${this.colorize(`[${this.scopeName}]`, 'dim')} `
    }

    return formatted + message
  }

  private getLevelString(level: LogLevel): string {
    const prefixes = this.options.logging?.prefixes
    const levelStr = {
      debug: prefixes?.debug ?? 'DEBUG',
      info: prefixes?.info ?? 'INFO',
      warn: prefixes?.warn ?? 'WARN',
      error: prefixes?.error ?? 'ERROR',
    }[level]

    if (!this.useColors) {
      return `[${levelStr}]`
    }

    const colors = {
      debug: ANSI_COLORS.cyan,
      info: ANSI_COLORS.blue,
      warn: ANSI_COLORS.yellow,
      error: ANSI_COLORS.red,
    }

    return `${colors[level]}[${levelStr}]${ANSI_COLORS.reset}`
  }

  private colorize(text: string, style: keyof typeof ANSI_COLORS): string {
    if (!this.useColors) {
      return text
    }
    return `${ANSI_COLORS[style]}${text}${ANSI_COLORS.reset}`
  }

  private write(level: LogLevel, message: string, args: unknown[]): void {
    const stream = level === 'warn' || level === 'error'
      ? this.options.stderr ?? process.stderr
      : this.options.stdout ?? process.stdout
    const extra = args.length ? ` ${args.map(a => (a instanceof Error ? a.message : String(a))).join(' ')}` : ''
    stream.write(`${this.format(level, message)}${extra}\n`)
  }

  /**
   * Log a debug message; only printed in verbose mode
   */
  debug(message: string, ...args: unknown[]): void {
    if (!this.verbose)
      return
    this.write('debug', message, args)
  }

  info(message: string, ...args: unknown[]): void {
    this.write('info', message, args)
  }

  warn(message: string, ...args: unknown[]): void {
    this.write('warn', message, args)
  }

  error(message: string, ...args: unknown[]): void {
    this.write('error', message, args)
  }
}
