/** Exit code for lines that never started executing (parse or alias failures) */
export const EXIT_PRE_EXECUTION = 258
export const EXIT_FAILURE = 1
export const EXIT_NOT_EXECUTABLE = 126
export const EXIT_NOT_FOUND = 127
export const EXIT_INTERRUPTED = 130

/**
 * Base class for errors that end a single invocation. The interpreter reports
 * them and carries on with the next line.
 */
export class WinuxError extends Error {
  readonly code: string
  readonly exitCode: number

  constructor(message: string, code: string, exitCode: number) {
    super(message)
    this.name = 'WinuxError'
    this.code = code
    this.exitCode = exitCode
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
