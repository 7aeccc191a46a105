import type { BuiltinCommand, CommandIO, Shell } from './types'
import { errorMessage } from '../errors'
import { formatAliasValue } from '../shell/alias-manager'
import { writeLine } from '../utils/streams'
import { report } from './io'

/**
 * Alias command - defines or displays command aliases
 * Supports creating, listing, and looking up aliases
 */
export const aliasCommand: BuiltinCommand = {
  name: 'alias',
  description: 'Define or display aliases',
  usage: 'alias [name[=value] ...]',
  examples: ['alias', 'alias ll', 'alias gs=\'git status\''],
  async execute(args: string[], io: CommandIO, shell: Shell): Promise<number> {
    if (args.length === 0) {
      for (const def of shell.aliases.list()) {
        if (!await writeLine(io.stdout, `alias ${def.name}='${formatAliasValue(def)}'`))
          break
      }
      return 0
    }

    let status = 0
    for (const arg of args) {
      const eq = arg.indexOf('=')
      if (eq === -1) {
        const def = shell.aliases.get(arg)
        if (!def) {
          await report(io, 'alias', `${arg}: not found`)
          status = 1
          continue
        }
        await writeLine(io.stdout, `alias ${def.name}='${formatAliasValue(def)}'`)
        continue
      }

      try {
        shell.aliases.define(arg.slice(0, eq), arg.slice(eq + 1))
      }
      catch (error) {
        await report(io, 'alias', errorMessage(error))
        status = 1
      }
    }
    return status
  },
}
