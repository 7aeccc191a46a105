import type { BuiltinCommand, CommandIO, Shell } from './types'
import { writeLine } from '../utils/streams'
import { report } from './io'

function describe(command: BuiltinCommand): string[] {
  const lines = [`${command.name}: ${command.description}`, `Usage: ${command.usage}`]
  if (command.examples?.length) {
    lines.push('Examples:')
    for (const example of command.examples)
      lines.push(`  ${example}`)
  }
  return lines
}

/**
 * Help command - displays help information about builtin commands
 * Can show general help or specific command help; aliases are followed to the
 * command they run
 */
export const helpCommand: BuiltinCommand = {
  name: 'help',
  description: 'Display help information',
  usage: 'help [command]',
  examples: ['help', 'help filter', 'man ls'],
  async execute(args: string[], io: CommandIO, shell: Shell): Promise<number> {
    let lines: string[]

    if (args.length === 0) {
      const commands = shell.registry.list()
      const width = Math.max(...commands.map(cmd => cmd.name.length))
      lines = [
        'Built-in commands:',
        ...commands.map(cmd => `  ${cmd.name.padEnd(width)}  ${cmd.description}`),
        '',
        'Anything else runs in the host shell. Use \'help <command>\' for details.',
      ]
    }
    else {
      const name = args[0]
      let command: BuiltinCommand | undefined
      try {
        command = shell.registry.get(shell.aliases.resolve(name).name)
      }
      catch {
        // a broken alias chain simply has no help topic
        command = undefined
      }
      if (!command) {
        await report(io, 'help', `no help topics match '${name}'`)
        return 1
      }
      lines = describe(command)
    }

    for (const line of lines) {
      if (!await writeLine(io.stdout, line))
        break
    }
    return 0
  },
}
