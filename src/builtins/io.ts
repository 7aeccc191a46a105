import type { Readable } from 'node:stream'
import type { CommandIO, FlagError, ParsedFlags, Shell } from './types'
import { open } from 'node:fs/promises'
import process from 'node:process'
import { readLines, writeLine } from '../utils/streams'

/**
 * Splits short flags (`-la` counts as `-l -a`) from operands. `--` ends flag
 * parsing and a lone `-` is an operand meaning standard input.
 */
export function parseFlags(args: string[], allowed: string): ParsedFlags | FlagError {
  const flags = new Set<string>()
  const operands: string[] = []
  let parsing = true

  for (const arg of args) {
    if (parsing && arg === '--') {
      parsing = false
      continue
    }
    if (!parsing || !arg.startsWith('-') || arg === '-') {
      operands.push(arg)
      continue
    }
    for (const flag of arg.slice(1)) {
      if (!allowed.includes(flag))
        return { error: `invalid option -- '${flag}'` }
      flags.add(flag)
    }
  }

  return { flags, operands }
}

const FS_ERRORS: Record<string, string> = {
  ENOENT: 'No such file or directory',
  EACCES: 'Permission denied',
  EPERM: 'Operation not permitted',
  EISDIR: 'Is a directory',
  ERR_FS_EISDIR: 'Is a directory',
  ENOTDIR: 'Not a directory',
  ENOTEMPTY: 'Directory not empty',
  EBUSY: 'Resource busy or locked',
}

/** Turns a file system error into the short reason shown after the operand */
export function describeFsError(error: unknown): string {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string')
    return FS_ERRORS[error.code] ?? error.message
  return error instanceof Error ? error.message : String(error)
}

export async function report(io: CommandIO, command: string, message: string): Promise<void> {
  await writeLine(io.stderr, `${command}: ${message}`)
}

export class IsDirectoryError extends Error {
  readonly code = 'EISDIR'

  constructor(path: string) {
    super(`${path}: Is a directory`)
    this.name = 'IsDirectoryError'
  }
}

/**
 * Opens a file operand for reading; `-` stands for the command's input
 */
export async function openInput(operand: string, io: CommandIO, shell: Shell): Promise<Readable> {
  if (operand === '-')
    return io.stdin

  const handle = await open(shell.resolvePath(operand), 'r')
  const info = await handle.stat()
  if (info.isDirectory()) {
    await handle.close()
    throw new IsDirectoryError(operand)
  }
  return handle.createReadStream()
}

/**
 * Lines of an input stream. Reading the interactive terminal goes through a
 * terminal-mode readline so that Ctrl+D ends this command's input only.
 */
export function inputLines(input: Readable, io: CommandIO): AsyncGenerator<string> {
  const terminal = input === io.stdin && io.terminal
  return readLines(input, {
    terminal,
    echo: terminal ? process.stdout : undefined,
    signal: io.signal,
  })
}
