import type { Logger } from '../logger'
import type { ExecutionResult } from '../types'
import process from 'node:process'

/** Source of input lines; resolves null at end of input */
export interface LineSource {
  read: (prompt: string) => Promise<string | null>
}

/** What the read-eval loop needs from the shell */
export interface ReplShell {
  readonly exitRequested: boolean
  readonly exitStatus: number
  execute: (line: string) => Promise<ExecutionResult>
  renderPrompt: () => string
  interrupt: () => boolean
}

export class ReplManager {
  private shell: ReplShell
  private reader: LineSource
  private log: Logger
  private running = false

  constructor(shell: ReplShell, reader: LineSource, log: Logger) {
    this.shell = shell
    this.reader = reader
    this.log = log
  }

  /**
   * Prompts, runs the line and repeats until end of input or `exit`.
   * Resolves with the session's exit status.
   */
  async start(): Promise<number> {
    if (this.running)
      return this.shell.exitStatus

    this.running = true
    // SIGINT only arrives here while a command runs; at the prompt readline
    // turns Ctrl+C into its own event
    const onSigint = () => {
      if (!this.shell.interrupt())
        this.log.debug('SIGINT with no running pipeline')
    }
    process.on('SIGINT', onSigint)

    try {
      while (this.running && !this.shell.exitRequested) {
        const line = await this.reader.read(this.shell.renderPrompt())
        if (line === null)
          break

        try {
          await this.shell.execute(line)
        }
        catch (error) {
          this.log.error('Shell error:', error)
        }
      }
    }
    finally {
      process.off('SIGINT', onSigint)
      this.running = false
    }

    return this.shell.exitStatus
  }

  stop(): void {
    this.running = false
  }

  isRunning(): boolean {
    return this.running
  }
}
