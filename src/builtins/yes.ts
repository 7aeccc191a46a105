import type { BuiltinCommand, CommandIO, Shell } from './types'
import { setImmediate } from 'node:timers/promises'
import { writeOutput } from '../utils/streams'

// Lines are written in blocks of roughly this many bytes
const BLOCK_SIZE = 8 * 1024

/**
 * Yes command - repeats a line until its reader goes away or the pipeline is
 * interrupted
 */
export const yesCommand: BuiltinCommand = {
  name: 'yes',
  description: 'Repeatedly print a line',
  usage: 'yes [string ...]',
  examples: ['yes | head -n 3', 'yes hello | head -n 2'],
  async execute(args: string[], io: CommandIO, _shell: Shell): Promise<number> {
    const line = `${args.length > 0 ? args.join(' ') : 'y'}\n`
    const block = line.repeat(Math.max(1, Math.floor(BLOCK_SIZE / line.length)))

    while (!io.signal.aborted) {
      if (!await writeOutput(io.stdout, block))
        break
      // A terminal accepts every write, so let signals and I/O through
      await setImmediate()
    }
    return 0
  },
}
