import type { WriteStream } from 'node:fs'
import type { FileHandle } from 'node:fs/promises'
import type { FileRedirection } from '../types'
import { open } from 'node:fs/promises'
import { EXIT_FAILURE, WinuxError } from '../errors'

export class RedirectionTargetError extends WinuxError {
  readonly target: string

  constructor(target: string, cause: unknown) {
    const reason = cause instanceof Error && 'code' in cause && typeof cause.code === 'string'
      ? cause.code
      : cause instanceof Error ? cause.message : String(cause)
    super(`${target}: cannot open for writing (${reason})`, 'EREDIRECT', EXIT_FAILURE)
    this.name = 'RedirectionTargetError'
    this.target = target
  }
}

export interface RedirectionTarget {
  stream: WriteStream
  /** Flushes and closes the file. Safe to call more than once. */
  close: () => Promise<void>
}

/**
 * Opens the file an output redirection points at, before any stage starts.
 * `truncate` empties an existing file and `append` keeps its contents; both
 * create the file when it does not exist.
 */
export async function openRedirectionTarget(spec: FileRedirection, hostPath: string): Promise<RedirectionTarget> {
  let handle: FileHandle
  try {
    handle = await open(hostPath, spec.type === 'append' ? 'a' : 'w')
  }
  catch (error) {
    throw new RedirectionTargetError(spec.target, error)
  }

  const stream = handle.createWriteStream()
  let closing: Promise<void> | undefined

  const close = (): Promise<void> => {
    closing ??= new Promise<void>((resolve) => {
      if (stream.closed) {
        resolve()
        return
      }
      stream.once('close', () => resolve())
      stream.end()
    })
    return closing
  }

  return { stream, close }
}
