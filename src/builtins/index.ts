import type { BuiltinCommand } from '../types'
import { aliasCommand } from './alias'
import { cdCommand } from './cd'
import { clearCommand } from './clear'
import { countCommand } from './count'
import { echoCommand } from './echo'
import { exitCommand } from './exit'
import { filterCommand } from './filter'
import { headCommand } from './head'
import { helpCommand } from './help'
import { historyCommand } from './history'
import { listCommand } from './list'
import { pwdCommand } from './pwd'
import { removeCommand } from './remove'
import { showCommand } from './show'
import { touchCommand } from './touch'
import { unaliasCommand } from './unalias'
import { whichCommand } from './which'
import { yesCommand } from './yes'

export function createBuiltins(): Map<string, BuiltinCommand> {
  const builtins = new Map<string, BuiltinCommand>()

  // Add all builtin commands in alphabetical order
  builtins.set('alias', aliasCommand)
  builtins.set('cd', cdCommand)
  builtins.set('clear', clearCommand)
  builtins.set('count', countCommand)
  builtins.set('echo', echoCommand)
  builtins.set('exit', exitCommand)
  builtins.set('filter', filterCommand)
  builtins.set('head', headCommand)
  builtins.set('help', helpCommand)
  builtins.set('history', historyCommand)
  builtins.set('list', listCommand)
  builtins.set('pwd', pwdCommand)
  builtins.set('remove', removeCommand)
  builtins.set('show', showCommand)
  builtins.set('touch', touchCommand)
  builtins.set('unalias', unaliasCommand)
  builtins.set('which', whichCommand)
  builtins.set('yes', yesCommand)

  return builtins
}
