import type { BuiltinCommand, CommandIO, Shell } from './types'
import { writeLine } from '../utils/streams'
import { report } from './io'

/**
 * CD (Change Directory) command - changes the shell's working directory.
 * `cd -` returns to the previous directory and prints it.
 */
export const cdCommand: BuiltinCommand = {
  name: 'cd',
  description: 'Change the current directory',
  usage: 'cd [directory | -]',
  examples: ['cd /c/Users', 'cd ~/projects', 'cd -'],
  pathArguments: 'operands',
  async execute(args: string[], io: CommandIO, shell: Shell): Promise<number> {
    if (args.length > 1) {
      await report(io, 'cd', 'too many arguments')
      return 1
    }

    const target = args[0] ?? shell.host.homeDir
    if (!shell.changeDirectory(target)) {
      await report(io, 'cd', target === '-' ? 'no previous directory' : `${target}: No such directory`)
      return 1
    }

    if (target === '-')
      await writeLine(io.stdout, shell.paths.toEmulatedForm(shell.cwd))
    return 0
  },
}
