import type { Writable } from 'node:stream'
import type { Logger } from '../logger'
import type { CommandIO, DispatchedStage, Shell } from '../types'
import type { RedirectionTarget } from '../utils/redirection'
import { PassThrough, Readable } from 'node:stream'
import { EXIT_FAILURE, EXIT_INTERRUPTED, errorMessage } from '../errors'
import { openRedirectionTarget } from '../utils/redirection'
import { isBrokenPipe, writeLine } from '../utils/streams'
import { StageStartError } from './host-shell'

export interface PipelineIO {
  /** Input of the first stage; an empty stream when omitted */
  stdin?: Readable
  stdout: Writable
  stderr: Writable
  /** True when `stdin` is the interactive terminal */
  terminal?: boolean
}

export interface PipelineExecutorOptions {
  /** highWaterMark of the streams between stages, in bytes */
  pipeBufferSize: number
}

/**
 * Runs the stages of one pipeline concurrently, each stage's output streaming
 * into the next one's input as it is produced.
 */
export class PipelineExecutor {
  private controller: AbortController | undefined
  private log: Logger

  constructor(
    private shell: Shell,
    private options: PipelineExecutorOptions,
  ) {
    this.log = shell.log.withScope('pipeline')
  }

  get running(): boolean {
    return this.controller !== undefined
  }

  /**
   * Aborts the running pipeline. Host processes receive the configured kill
   * signal and emulated commands stop at their next write or read.
   * Returns false when nothing is running.
   */
  interrupt(): boolean {
    if (!this.controller || this.controller.signal.aborted)
      return false
    this.log.debug('interrupting pipeline')
    this.controller.abort()
    return true
  }

  /**
   * Resolves with the exit code of the last stage, `130` when interrupted, or
   * the start error's code when a stage could not be started. Rejects only when
   * the redirection target cannot be opened, before any stage has started.
   */
  async run(stages: DispatchedStage[], io: PipelineIO): Promise<number> {
    const last = stages.at(-1)
    if (!last)
      return 0

    let target: RedirectionTarget | undefined
    const redirect = last.stage.stdout
    if (redirect.type === 'truncate' || redirect.type === 'append') {
      const hostPath = this.shell.resolvePath(this.shell.paths.toHostForm(redirect.target))
      this.log.debug(`redirecting output to ${hostPath} (${redirect.type})`)
      target = await openRedirectionTarget(redirect, hostPath)
      target.stream.on('error', (error) => {
        this.log.warn(`${redirect.target}:`, error)
      })
    }

    const controller = new AbortController()
    this.controller = controller
    const pipes: PassThrough[] = []
    for (let i = 0; i < stages.length - 1; i++) {
      const pipe = new PassThrough({ highWaterMark: this.options.pipeBufferSize })
      pipe.on('error', (error) => {
        this.log.debug(`pipe ${i} -> ${i + 1}:`, error)
      })
      pipes.push(pipe)
    }
    const onAbort = () => {
      for (const pipe of pipes)
        pipe.destroy()
    }
    controller.signal.addEventListener('abort', onAbort, { once: true })

    const stdin = io.stdin ?? Readable.from([])
    const output = target?.stream ?? io.stdout
    let startError: StageStartError | undefined

    const runStage = async (dispatched: DispatchedStage, index: number): Promise<number> => {
      const input = index === 0 ? stdin : pipes[index - 1]
      const stageIO: CommandIO = {
        stdin: input,
        stdout: index === stages.length - 1 ? output : pipes[index],
        stderr: io.stderr,
        terminal: index === 0 && io.terminal === true,
        signal: controller.signal,
      }
      const name = dispatched.stage.name

      try {
        return await dispatched.handler.execute(dispatched.args, stageIO, this.shell)
      }
      catch (error) {
        if (error instanceof StageStartError) {
          startError ??= error
          controller.abort()
          return error.exitCode
        }
        if (isBrokenPipe(error)) {
          this.log.debug(`${name}: output closed`)
          return EXIT_FAILURE
        }
        await writeLine(io.stderr, `${name}: ${errorMessage(error)}`)
        return EXIT_FAILURE
      }
      finally {
        // Downstream sees end of input; upstream sees its reader go away
        if (index < pipes.length)
          pipes[index].end()
        if (index > 0)
          pipes[index - 1].destroy()
        this.log.debug(`stage ${index} (${name}) finished`)
      }
    }

    try {
      const codes = await Promise.all(stages.map((stage, index) => runStage(stage, index)))

      if (startError) {
        await writeLine(io.stderr, `winux: ${startError.message}`)
        return startError.exitCode
      }
      if (controller.signal.aborted)
        return EXIT_INTERRUPTED
      return codes[codes.length - 1] ?? 0
    }
    finally {
      controller.signal.removeEventListener('abort', onAbort)
      this.controller = undefined
      if (target)
        await target.close()
    }
  }
}
