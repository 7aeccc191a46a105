import type { BuiltinCommand, CommandIO, Shell } from './types'
import { report } from './io'

/**
 * Exit command - ends the session after the current line with an optional
 * status code; without one the status of the previous line is kept
 */
export const exitCommand: BuiltinCommand = {
  name: 'exit',
  description: 'Exit the shell',
  usage: 'exit [code]',
  async execute(args: string[], io: CommandIO, shell: Shell): Promise<number> {
    if (args.length > 1) {
      await report(io, 'exit', 'too many arguments')
      return 1
    }

    let exitCode = shell.lastExitCode
    if (args[0] !== undefined) {
      if (!/^-?\d+$/.test(args[0])) {
        await report(io, 'exit', `${args[0]}: numeric argument required`)
        shell.requestExit(2)
        return 2
      }
      // Exit statuses wrap around like the low byte of a process status
      exitCode = ((Number(args[0]) % 256) + 256) % 256
    }

    shell.requestExit(exitCode)
    return exitCode
  },
}
