import type { Readable, Writable } from 'node:stream'
import type { AliasManager } from './shell/alias-manager'
import type { CommandRegistry } from './shell/command-registry'
import type { HistoryManager } from './history/history-manager'
import type { Logger } from './logger'
import type { PathTranslator } from './utils/path-translator'

export interface WinuxConfig {
  verbose: boolean
  aliases?: Record<string, string>
  history?: HistoryConfig
  paths?: PathConfig
  hostShell?: HostShellConfig
  execution?: ExecutionConfig
  prompt?: PromptConfig
  logging?: LoggingConfig
}

export interface HistoryConfig {
  maxEntries?: number
  /** Skip a line that equals the most recent entry */
  ignoreDuplicates?: boolean
  /** Skip lines that start with a space */
  ignoreSpace?: boolean
}

export interface PathConfig {
  /**
   * Rewrite path arguments between Linux and Windows syntax.
   * Defaults to true on Windows hosts and false everywhere else.
   */
  translate?: boolean
  /** Overrides the system drive read from the environment, e.g. `D:` */
  systemDrive?: string
  /** Prefix under which drives are mounted, e.g. `/mnt` for `/mnt/c` */
  mountPrefix?: string
  mappings?: PathMappingRule[]
}

/**
 * A prefix pair rewritten in both directions. Rules are tried in order and
 * the first matching one wins.
 */
export interface PathMappingRule {
  emulated: string
  host: string
}

export interface HostShellConfig {
  /** Executable of the host command interpreter; defaults to %COMSPEC% or /bin/sh */
  path?: string
  /** Arguments placed before the command line, e.g. `['/d', '/s', '/c']` */
  args?: string[]
}

export interface ExecutionConfig {
  /** highWaterMark of the streams connecting two stages, in bytes */
  pipeBufferSize?: number
  /** Signal sent to host processes when a pipeline is interrupted */
  killSignal?: NodeJS.Signals
}

export interface PromptConfig {
  /** Supports `{user}`, `{host}` and `{path}` placeholders */
  format?: string
}

export interface LoggingConfig {
  timestamps?: boolean
  prefixes?: {
    debug?: string
    info?: string
    warn?: string
    error?: string
  }
}

/** Values read once from the process environment at startup */
export interface HostEnvironment {
  platform: NodeJS.Platform
  hostShell: string
  hostShellArgs: string[]
  systemDrive: string
  homeDir: string
  user: string
  hostname: string
  variables: Record<string, string>
}

export type TokenType = 'word' | 'pipe' | 'redirect-truncate' | 'redirect-append'

export interface Token {
  type: TokenType
  value: string
  /** Offset of the first character of the token in the input line */
  position: number
  quoted: boolean
}

export type RedirectionSpec =
  | { type: 'terminal' }
  | { type: 'pipe' }
  | { type: 'truncate', target: string }
  | { type: 'append', target: string }

export type FileRedirection = Extract<RedirectionSpec, { type: 'truncate' | 'append' }>

export interface Stage {
  name: string
  args: string[]
  /** stdout target; every stage but the last is `pipe` */
  stdout: RedirectionSpec
  position: number
}

export interface Pipeline {
  raw: string
  stages: Stage[]
}

export interface AliasDefinition {
  name: string
  command: string
  args: string[]
  source: 'builtin' | 'user'
}

export interface AliasResolution {
  name: string
  prefixArgs: string[]
}

export interface HistoryEntry {
  index: number
  line: string
  exitCode?: number
}

export interface CommandIO {
  stdin: Readable
  stdout: Writable
  stderr: Writable
  /** True when stdin is the interactive terminal rather than a pipe */
  terminal: boolean
  /** Aborted when the pipeline is interrupted */
  signal: AbortSignal
}

/**
 * Which arguments of a command hold paths:
 * - `none`: never translate
 * - `operands`: every argument that is not an option
 * - `auto`: operands that contain a path separator
 * - `{ operandsFrom: n }`: operands after the first n, e.g. past a pattern
 * - a list of zero-based argument positions
 */
export type PathArgumentSpec = 'none' | 'operands' | 'auto' | { operandsFrom: number } | readonly number[]

export interface CommandHandler {
  name: string
  execute: (args: string[], io: CommandIO, shell: Shell) => Promise<number>
}

export interface BuiltinCommand extends CommandHandler {
  description: string
  usage: string
  examples?: string[]
  pathArguments?: PathArgumentSpec
}

export interface DispatchedStage {
  stage: Stage
  handler: CommandHandler
  /** Arguments handed to the handler; path-translated for builtins */
  args: string[]
  builtin: boolean
}

export interface ExecutionResult {
  exitCode: number
  duration: number
  error?: Error
}

export interface Shell {
  config: WinuxConfig
  host: HostEnvironment
  cwd: string
  log: Logger
  aliases: AliasManager
  history: HistoryManager
  registry: CommandRegistry
  paths: PathTranslator

  /** Exit code of the most recent line */
  lastExitCode: number

  execute: (line: string) => Promise<ExecutionResult>
  changeDirectory: (path: string) => boolean
  /** Resolves an argument already in host form against the shell cwd */
  resolvePath: (path: string) => string
  /** Ends the read-eval loop or script after the current line */
  requestExit: (code: number) => void
  stop: () => void
}
