import type { BuiltinCommand, CommandIO, Shell } from './types'
import { access, constants } from 'node:fs/promises'
import { delimiter, join } from 'node:path'
import { AliasCycleError, formatAliasValue } from '../shell/alias-manager'
import { writeLine } from '../utils/streams'
import { report } from './io'

async function isExecutable(path: string, windows: boolean): Promise<boolean> {
  try {
    await access(path, windows ? constants.F_OK : constants.X_OK)
    return true
  }
  catch {
    return false
  }
}

/**
 * Looks a host command up on PATH, trying PATHEXT extensions on Windows
 */
async function findOnPath(name: string, shell: Shell): Promise<string | undefined> {
  const vars = shell.host.variables
  const windows = shell.host.platform === 'win32'
  const dirs = (vars.PATH ?? vars.Path ?? '').split(delimiter).filter(Boolean)
  const extensions = windows
    ? ['', ...(vars.PATHEXT ?? '.COM;.EXE;.BAT;.CMD').split(';').filter(Boolean).map(ext => ext.toLowerCase())]
    : ['']

  for (const dir of dirs) {
    for (const ext of extensions) {
      const candidate = join(dir, `${name}${ext}`)
      if (await isExecutable(candidate, windows))
        return candidate
    }
  }
  return undefined
}

/**
 * Which command - tells how a name would be run: through an alias, as a
 * builtin, or by the host shell from a PATH entry
 */
export const whichCommand: BuiltinCommand = {
  name: 'which',
  description: 'Show how a command name is resolved',
  usage: 'which name ...',
  examples: ['which ls', 'which git'],
  async execute(args: string[], io: CommandIO, shell: Shell): Promise<number> {
    if (args.length === 0) {
      await report(io, 'which', 'missing command name')
      return 1
    }

    let status = 0
    for (const name of args) {
      const alias = shell.aliases.get(name)
      if (alias) {
        let line = `${name}: aliased to ${formatAliasValue(alias)}`
        try {
          const resolved = shell.aliases.resolve(name)
          if (resolved.name !== alias.command)
            line += ` (runs ${[resolved.name, ...resolved.prefixArgs].join(' ')})`
        }
        catch (error) {
          if (!(error instanceof AliasCycleError))
            throw error
          line += ' (alias cycle)'
        }
        await writeLine(io.stdout, line)
        continue
      }

      if (shell.registry.has(name)) {
        await writeLine(io.stdout, `${name}: shell built-in command`)
        continue
      }

      const found = await findOnPath(name, shell)
      if (found) {
        await writeLine(io.stdout, shell.paths.toEmulatedForm(found))
        continue
      }

      await report(io, 'which', `no ${name} in PATH`)
      status = 1
    }
    return status
  },
}
