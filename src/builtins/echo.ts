import type { BuiltinCommand, CommandIO, Shell } from './types'
import { writeOutput } from '../utils/streams'

/**
 * Echo command - displays text to standard output
 * Supports the -n flag to suppress the trailing newline
 */
export const echoCommand: BuiltinCommand = {
  name: 'echo',
  description: 'Display text',
  usage: 'echo [-n] [string ...]',
  pathArguments: 'none',
  async execute(args: string[], io: CommandIO, _shell: Shell): Promise<number> {
    let noNewline = false
    let textArgs = args

    if (args[0] === '-n') {
      noNewline = true
      textArgs = args.slice(1)
    }

    const output = textArgs.join(' ')
    await writeOutput(io.stdout, noNewline ? output : `${output}\n`)
    return 0
  },
}
