import type { Readable, Writable } from 'node:stream'
import { createInterface } from 'node:readline'

const BROKEN_PIPE_CODES = new Set([
  'EPIPE',
  'ECONNRESET',
  'ERR_STREAM_DESTROYED',
  'ERR_STREAM_WRITE_AFTER_END',
  'ERR_STREAM_PREMATURE_CLOSE',
])

/**
 * True for the errors a writer sees after its reader went away
 */
export function isBrokenPipe(error: unknown): boolean {
  if (!(error instanceof Error) || !('code' in error))
    return false
  return typeof error.code === 'string' && BROKEN_PIPE_CODES.has(error.code)
}

/**
 * Writes a chunk and waits until the stream can take more. Resolves false when
 * the stream was closed by its reader, in which case the writer should stop.
 */
export function writeOutput(stream: Writable, chunk: string | Uint8Array): Promise<boolean> {
  if (stream.destroyed || stream.writableEnded)
    return Promise.resolve(false)

  return new Promise<boolean>((resolve) => {
    let settled = false
    const settle = (ok: boolean) => {
      if (settled)
        return
      settled = true
      stream.off('drain', onDrain)
      stream.off('close', onClose)
      resolve(ok)
    }
    const onDrain = () => settle(true)
    const onClose = () => settle(false)

    const accepted = stream.write(chunk, (error) => {
      if (error)
        settle(false)
    })
    if (accepted) {
      settle(true)
      return
    }
    stream.once('drain', onDrain)
    stream.once('close', onClose)
  })
}

export function writeLine(stream: Writable, line: string): Promise<boolean> {
  return writeOutput(stream, `${line}\n`)
}

export interface ReadLinesOptions {
  /** Read from an interactive terminal: Ctrl+D ends input without ending the stream */
  terminal?: boolean
  /** Where a terminal echoes typed characters */
  echo?: Writable
  signal?: AbortSignal
}

/**
 * Iterates the lines of a stream as they arrive. Stops at end of input, when
 * the signal aborts, or when the consumer breaks out of the loop.
 */
export async function* readLines(input: Readable, options: ReadLinesOptions = {}): AsyncGenerator<string> {
  const { terminal = false, echo, signal } = options
  if (signal?.aborted)
    return

  const rl = createInterface({
    input,
    output: terminal ? echo : undefined,
    terminal,
    crlfDelay: Number.POSITIVE_INFINITY,
  })
  const onAbort = () => rl.close()
  signal?.addEventListener('abort', onAbort, { once: true })

  try {
    for await (const line of rl)
      yield line
  }
  finally {
    signal?.removeEventListener('abort', onAbort)
    rl.close()
  }
}
