import type { BuiltinCommand, CommandIO, Shell } from './types'
import { writeOutput } from '../utils/streams'

// Clear screen, clear scrollback, cursor home
const CLEAR_SEQUENCE = '\u001B[2J\u001B[3J\u001B[H'

export const clearCommand: BuiltinCommand = {
  name: 'clear',
  description: 'Clear the terminal screen',
  usage: 'clear',
  async execute(_args: string[], io: CommandIO, _shell: Shell): Promise<number> {
    await writeOutput(io.stdout, CLEAR_SEQUENCE)
    return 0
  },
}
