import type { CommandParser } from '../parser'
import type { AliasDefinition, AliasResolution } from '../types'
import { EXIT_PRE_EXECUTION, WinuxError } from '../errors'

/** Upper bound on the number of expansions a single command name may go through */
export const MAX_ALIAS_DEPTH = 16

/**
 * Aliases seeded at startup. They map familiar Linux names onto the emulated
 * command catalog and may be shadowed by user aliases.
 */
export const BUILTIN_ALIASES: Readonly<Record<string, string>> = {
  ls: 'list',
  ll: 'ls -l -a',
  la: 'ls -a',
  l: 'ls',
  dir: 'ls -l',
  rm: 'remove',
  del: 'rm',
  grep: 'filter',
  cat: 'show',
  type: 'cat',
  wc: 'count',
  cls: 'clear',
  quit: 'exit',
  man: 'help',
  '..': 'cd ..',
  '...': 'cd ../..',
}

/**
 * Expansion text of an alias as it would be typed, quoting words that contain
 * whitespace or quotes
 */
export function formatAliasValue(def: AliasDefinition): string {
  return [def.command, ...def.args]
    .map(word => /[\s'"]/.test(word) || word === '' ? `"${word.replace(/(["\\])/g, '\\$1')}"` : word)
    .join(' ')
}

export class AliasCycleError extends WinuxError {
  readonly alias: string
  readonly chain: string[]

  constructor(alias: string, chain: string[], reason: 'cycle' | 'depth') {
    const walked = [...chain, alias].join(' -> ')
    super(
      reason === 'cycle'
        ? `alias cycle detected at '${alias}': ${walked}`
        : `alias '${alias}' exceeds the maximum expansion depth of ${MAX_ALIAS_DEPTH}: ${walked}`,
      'EALIASCYCLE',
      EXIT_PRE_EXECUTION,
    )
    this.name = 'AliasCycleError'
    this.alias = alias
    this.chain = chain
  }
}

export class AliasDefinitionError extends WinuxError {
  constructor(message: string) {
    super(message, 'EALIASDEF', EXIT_PRE_EXECUTION)
    this.name = 'AliasDefinitionError'
  }
}

export class AliasManager {
  private builtin = new Map<string, AliasDefinition>()
  private user = new Map<string, AliasDefinition>()
  private parser: CommandParser

  constructor(parser: CommandParser, userAliases: Record<string, string> = {}, builtinAliases: Record<string, string> = BUILTIN_ALIASES) {
    this.parser = parser
    for (const [name, value] of Object.entries(builtinAliases))
      this.builtin.set(name, this.createDefinition(name, value, 'builtin'))
    for (const [name, value] of Object.entries(userAliases))
      this.define(name, value)
  }

  /**
   * Defines or replaces a user alias. The value is a command name followed by
   * fixed leading arguments; pipes and redirections are not allowed.
   */
  define(name: string, value: string): AliasDefinition {
    const definition = this.createDefinition(name, value, 'user')
    this.user.set(name, definition)
    return definition
  }

  /**
   * Removes the user alias of that name, or the built-in one when no user alias
   * exists. Returns false when neither is defined.
   */
  remove(name: string): boolean {
    if (this.user.delete(name))
      return true
    return this.builtin.delete(name)
  }

  /**
   * Removes every user alias; built-in ones stay
   */
  clear(): void {
    this.user.clear()
  }

  get(name: string): AliasDefinition | undefined {
    return this.user.get(name) ?? this.builtin.get(name)
  }

  has(name: string): boolean {
    return this.user.has(name) || this.builtin.has(name)
  }

  /**
   * Effective alias table, user entries shadowing built-in ones, sorted by name
   */
  list(): AliasDefinition[] {
    const merged = new Map(this.builtin)
    for (const [name, def] of this.user)
      merged.set(name, def)
    return Array.from(merged.values()).sort((a, b) => a.name.localeCompare(b.name))
  }

  /**
   * Follows the alias chain starting at `name` until it reaches a name that is
   * not an alias. Fixed arguments of outer expansions come after those of inner
   * ones, so `ll` -> `ls -l -a` -> `list` yields `list -l -a`.
   */
  resolve(name: string): AliasResolution {
    const visited = new Set<string>()
    const chain: string[] = []
    let current = name
    let prefixArgs: string[] = []

    for (;;) {
      const def = this.get(current)
      if (!def)
        return { name: current, prefixArgs }

      if (visited.has(current))
        throw new AliasCycleError(current, chain, 'cycle')
      if (chain.length >= MAX_ALIAS_DEPTH)
        throw new AliasCycleError(current, chain, 'depth')

      visited.add(current)
      chain.push(current)
      prefixArgs = [...def.args, ...prefixArgs]
      current = def.command
    }
  }

  private createDefinition(name: string, value: string, source: AliasDefinition['source']): AliasDefinition {
    if (!name || /[\s'"|>\\]/.test(name))
      throw new AliasDefinitionError(`invalid alias name '${name}'`)

    const tokens = this.parser.tokenize(value)
    if (tokens.length === 0)
      throw new AliasDefinitionError(`alias '${name}' has an empty expansion`)
    if (tokens.some(t => t.type !== 'word'))
      throw new AliasDefinitionError(`alias '${name}' may not contain pipes or redirections`)

    const [command, ...args] = tokens.map(t => t.value)
    if (!command)
      throw new AliasDefinitionError(`alias '${name}' has an empty command name`)
    return { name, command, args, source }
  }
}
