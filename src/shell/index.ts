import type { Readable, Writable } from 'node:stream'
import type { BuiltinCommand, ExecutionResult, HostEnvironment, Shell, Stage, WinuxConfig } from '../types'
import type { PipelineIO } from './pipeline-executor'
import { statSync } from 'node:fs'
import { isAbsolute, resolve } from 'node:path'
import process from 'node:process'
import { createBuiltins } from '../builtins'
import { defaultConfig, mergeConfig } from '../config'
import { EXIT_FAILURE, WinuxError, errorMessage } from '../errors'
import { HistoryManager } from '../history/history-manager'
import { Logger } from '../logger'
import { CommandParser, ParseError } from '../parser'
import { resolveHostEnvironment } from '../utils/environment'
import { PathTranslator } from '../utils/path-translator'
import { writeLine } from '../utils/streams'
import { AliasManager } from './alias-manager'
import { CommandRegistry } from './command-registry'
import { Dispatcher } from './dispatcher'
import { HostShellFallback } from './host-shell'
import { PipelineExecutor } from './pipeline-executor'

export { AliasManager } from './alias-manager'
export { CommandRegistry } from './command-registry'
export { Dispatcher } from './dispatcher'
export { HostShellFallback, StageStartError } from './host-shell'
export { PipelineExecutor } from './pipeline-executor'
export { ReplManager } from './repl-manager'

export interface WinuxShellOptions {
  host?: HostEnvironment
  /** Starting directory; defaults to the process cwd */
  cwd?: string
  /** Input handed to the first stage when reading from a terminal */
  stdin?: Readable
  stdout?: Writable
  stderr?: Writable
  /** Whether `stdin` is an interactive terminal */
  terminal?: boolean
  /** Replaces the built-in command catalog */
  builtins?: BuiltinCommand[]
  log?: Logger
}

export class WinuxShell implements Shell {
  public config: WinuxConfig
  public host: HostEnvironment
  public cwd: string
  public previousDirectory: string | undefined
  public log: Logger
  public aliases: AliasManager
  public history: HistoryManager
  public registry: CommandRegistry
  public paths: PathTranslator
  public lastExitCode = 0
  public readonly parser: CommandParser
  public readonly stdout: Writable
  public readonly stderr: Writable

  private dispatcher: Dispatcher
  private executor: PipelineExecutor
  private stdin: Readable | undefined
  private terminal: boolean
  private exitCode: number | undefined

  constructor(config: WinuxConfig = defaultConfig, options: WinuxShellOptions = {}) {
    this.config = mergeConfig(defaultConfig, config)
    this.host = options.host ?? resolveHostEnvironment()
    this.cwd = options.cwd ?? process.cwd()
    this.stdout = options.stdout ?? process.stdout
    this.stderr = options.stderr ?? process.stderr
    this.stdin = options.stdin
    this.terminal = options.terminal ?? false
    this.log = options.log ?? new Logger(this.config.verbose, 'shell', { logging: this.config.logging })

    const paths = this.config.paths ?? {}
    this.paths = new PathTranslator({
      enabled: paths.translate ?? this.host.platform === 'win32',
      systemDrive: paths.systemDrive ?? this.host.systemDrive,
      homeDir: this.host.homeDir,
      mountPrefix: paths.mountPrefix,
      mappings: paths.mappings,
    })

    this.parser = new CommandParser()
    this.aliases = new AliasManager(this.parser, this.config.aliases)
    this.history = new HistoryManager(this.config.history)
    this.registry = new CommandRegistry(options.builtins ?? createBuiltins().values())

    const hostShell = this.config.hostShell ?? {}
    const execution = this.config.execution ?? {}
    const fallback = new HostShellFallback({
      shell: hostShell.path ?? this.host.hostShell,
      shellArgs: hostShell.args ?? this.host.hostShellArgs,
      platform: this.host.platform,
      killSignal: execution.killSignal,
      log: this.log.withScope('host'),
    })
    this.dispatcher = new Dispatcher(this.registry, this.paths, fallback)
    this.executor = new PipelineExecutor(this, {
      pipeBufferSize: execution.pipeBufferSize ?? 16 * 1024,
    })
  }

  /** True once `exit` or `stop()` asked the session to end */
  get exitRequested(): boolean {
    return this.exitCode !== undefined
  }

  /** Code requested by `exit`, otherwise that of the last line */
  get exitStatus(): number {
    return this.exitCode ?? this.lastExitCode
  }

  /**
   * Runs one input line and records it in history. Never rejects: parse, alias
   * and redirection failures are reported on stderr and turned into exit codes.
   */
  async execute(line: string, io: Partial<PipelineIO> = {}): Promise<ExecutionResult> {
    const start = performance.now()
    let recorded = line
    let exitCode: number
    let error: Error | undefined

    try {
      recorded = this.history.expand(line)
      if (recorded !== line)
        await writeLine(io.stdout ?? this.stdout, recorded)

      const pipeline = this.parser.parse(recorded)
      const stages = pipeline.stages.map(stage => this.resolveAliases(stage))
      const dispatched = this.dispatcher.dispatchAll(stages)
      exitCode = await this.executor.run(dispatched, {
        stdin: io.stdin ?? this.stdin,
        stdout: io.stdout ?? this.stdout,
        stderr: io.stderr ?? this.stderr,
        terminal: io.terminal ?? (this.terminal && this.stdin !== undefined),
      })
    }
    catch (caught) {
      error = caught instanceof Error ? caught : new Error(String(caught))
      if (caught instanceof ParseError) {
        exitCode = caught.exitCode
        await writeLine(io.stderr ?? this.stderr, caught.format(recorded))
      }
      else if (caught instanceof WinuxError) {
        exitCode = caught.exitCode
        await writeLine(io.stderr ?? this.stderr, `winux: ${caught.message}`)
      }
      else {
        exitCode = EXIT_FAILURE
        this.log.error(`unexpected failure running '${recorded}':`, caught)
      }
    }

    this.history.record(recorded, exitCode)
    this.lastExitCode = exitCode
    const duration = performance.now() - start
    this.log.debug(`'${recorded}' exited with ${exitCode} in ${duration.toFixed(1)}ms`)
    return { exitCode, duration, error }
  }

  /**
   * Executes lines one after another, stopping early when a line asks to
   * exit. Returns the exit code of the last line run.
   */
  async runScript(lines: Iterable<string> | AsyncIterable<string>): Promise<number> {
    for await (const line of lines) {
      if (this.exitRequested)
        break
      await this.execute(line)
    }
    return this.exitStatus
  }

  changeDirectory(path: string): boolean {
    let target: string
    if (path === '-') {
      if (!this.previousDirectory)
        return false
      target = this.previousDirectory
    }
    else {
      target = this.resolvePath(path)
    }

    try {
      if (!statSync(target).isDirectory())
        return false
    }
    catch (error) {
      this.log.debug(`cd ${path}: ${errorMessage(error)}`)
      return false
    }

    this.previousDirectory = this.cwd
    this.cwd = target
    this.host.variables.OLDPWD = this.previousDirectory
    this.host.variables.PWD = this.cwd
    return true
  }

  resolvePath(path: string): string {
    if (path === '~')
      return this.host.homeDir
    if (path.startsWith('~/'))
      return resolve(this.host.homeDir, path.slice(2))
    return isAbsolute(path) ? resolve(path) : resolve(this.cwd, path)
  }

  /** Current directory in Linux-style form, with the home directory as `~` */
  displayPath(): string {
    const cwd = this.paths.toEmulatedForm(this.cwd)
    const home = this.paths.toEmulatedForm(this.host.homeDir)
    if (cwd === home)
      return '~'
    if (home !== '/' && cwd.startsWith(`${home}/`))
      return `~${cwd.slice(home.length)}`
    return cwd
  }

  renderPrompt(): string {
    const format = this.config.prompt?.format ?? '{user}@{host}:{path}$ '
    return format
      .replace(/\{user\}/g, this.host.user)
      .replace(/\{host\}/g, this.host.hostname)
      .replace(/\{path\}/g, this.displayPath())
  }

  /** Interrupts the running pipeline, if any */
  interrupt(): boolean {
    return this.executor.interrupt()
  }

  get busy(): boolean {
    return this.executor.running
  }

  requestExit(code: number): void {
    this.exitCode = code
  }

  stop(): void {
    this.exitCode ??= this.lastExitCode
    this.interrupt()
  }

  private resolveAliases(stage: Stage): Stage {
    const { name, prefixArgs } = this.aliases.resolve(stage.name)
    if (name !== stage.name || prefixArgs.length > 0)
      this.log.debug(`alias ${stage.name} -> ${[name, ...prefixArgs].join(' ')}`)
    return { ...stage, name, args: [...prefixArgs, ...stage.args] }
  }
}
