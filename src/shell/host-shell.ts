import type { ChildProcess, StdioOptions } from 'node:child_process'
import type { Logger } from '../logger'
import type { CommandHandler, CommandIO, Shell } from '../types'
import { spawn } from 'node:child_process'
import { constants } from 'node:os'
import { EXIT_FAILURE, EXIT_NOT_EXECUTABLE, EXIT_NOT_FOUND, WinuxError } from '../errors'
import { isBrokenPipe } from '../utils/streams'

/**
 * Raised when a stage cannot be started at all, e.g. the host shell is missing.
 * Aborts the whole pipeline.
 */
export class StageStartError extends WinuxError {
  readonly command: string

  constructor(command: string, cause: unknown) {
    const code = cause instanceof Error && 'code' in cause ? cause.code : undefined
    const reason = cause instanceof Error ? cause.message : String(cause)
    super(
      `${command}: failed to start: ${reason}`,
      'ESTAGESTART',
      code === 'ENOENT' ? EXIT_NOT_FOUND : EXIT_NOT_EXECUTABLE,
    )
    this.name = 'StageStartError'
    this.command = command
  }
}

export interface HostShellOptions {
  shell: string
  shellArgs: string[]
  platform: NodeJS.Platform
  killSignal?: NodeJS.Signals
  log: Logger
}

function isCmd(shell: string): boolean {
  return /(?:^|[\\/])cmd(?:\.exe)?$/i.test(shell)
}

/**
 * Quotes one argument for the host interpreter when it holds characters the
 * interpreter would otherwise split or interpret. Both forms leave variable
 * references (`%VAR%`, `$VAR`) for the host to expand.
 */
export function quoteForHost(arg: string, platform: NodeJS.Platform): string {
  if (platform === 'win32') {
    if (arg !== '' && !/[\s"&|<>^()]/.test(arg))
      return arg
    return `"${arg.replace(/"/g, '""')}"`
  }
  if (arg !== '' && /^[\w@%+=:,./\-$*?~[\]]+$/.test(arg))
    return arg
  return `"${arg.replace(/["\\`]/g, '\\$&')}"`
}

function waitForSpawn(child: ChildProcess): Promise<void> {
  return new Promise((resolve, reject) => {
    const onSpawn = () => {
      child.off('error', onError)
      resolve()
    }
    const onError = (error: Error) => {
      child.off('spawn', onSpawn)
      reject(error)
    }
    child.once('spawn', onSpawn)
    child.once('error', onError)
  })
}

function waitForClose(child: ChildProcess): Promise<number> {
  return new Promise((resolve) => {
    child.once('close', (code: number | null, signal: NodeJS.Signals | null) => {
      if (code !== null)
        resolve(code)
      else
        resolve(signal ? 128 + constants.signals[signal] : EXIT_FAILURE)
    })
  })
}

/**
 * Delegates a command the emulated catalog does not know to the host's native
 * command interpreter. The command name and arguments arrive untranslated;
 * `argv[0]` is the command name.
 */
export class HostShellFallback implements CommandHandler {
  readonly name = 'host-shell'
  private options: HostShellOptions

  constructor(options: HostShellOptions) {
    this.options = options
  }

  commandLine(argv: string[]): string {
    return argv.map(arg => quoteForHost(arg, this.options.platform)).join(' ')
  }

  async execute(argv: string[], io: CommandIO, shell: Shell): Promise<number> {
    const { log } = this.options
    const line = this.commandLine(argv)
    const verbatim = isCmd(this.options.shell)
    const stdio: StdioOptions = [io.terminal ? 'inherit' : 'pipe', 'pipe', 'pipe']

    log.debug(`spawning ${this.options.shell}: ${line}`)
    const child = spawn(this.options.shell, [...this.options.shellArgs, verbatim ? `"${line}"` : line], {
      cwd: shell.cwd,
      env: shell.host.variables,
      stdio,
      windowsHide: true,
      windowsVerbatimArguments: verbatim,
    })

    try {
      await waitForSpawn(child)
    }
    catch (error) {
      throw new StageStartError(argv[0] ?? this.options.shell, error)
    }

    const closed = waitForClose(child)
    const onAbort = () => {
      child.kill(this.options.killSignal ?? 'SIGTERM')
      // Grandchildren may keep the pipes open after the shell itself is gone
      child.stdout?.destroy()
      child.stderr?.destroy()
    }
    // Mimic SIGPIPE: once the reader is gone the process sees its stdout closed
    const onDownstreamClose = () => {
      child.stdout?.destroy()
    }
    if (io.signal.aborted)
      onAbort()
    else
      io.signal.addEventListener('abort', onAbort, { once: true })
    io.stdout.once('close', onDownstreamClose)

    if (child.stdin) {
      child.stdin.on('error', (error) => {
        if (isBrokenPipe(error))
          log.debug(`${argv[0]}: stopped reading its input`)
        else
          log.warn(`${argv[0]}: stdin error:`, error)
      })
      io.stdin.pipe(child.stdin)
    }
    child.stdout?.pipe(io.stdout, { end: false })
    child.stderr?.pipe(io.stderr, { end: false })

    try {
      const code = await closed
      log.debug(`${argv[0]} exited with ${code}`)
      return code
    }
    finally {
      io.signal.removeEventListener('abort', onAbort)
      io.stdout.off('close', onDownstreamClose)
      if (child.stdin)
        io.stdin.unpipe(child.stdin)
    }
  }
}
