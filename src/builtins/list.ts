import type { Stats } from 'node:fs'
import type { BuiltinCommand, CommandIO, Shell } from './types'
import { readdir, stat } from 'node:fs/promises'
import { join } from 'node:path'
import { writeLine } from '../utils/streams'
import { describeFsError, parseFlags, report } from './io'

interface ListedEntry {
  name: string
  info?: Stats
}

function formatLong(entry: ListedEntry): string {
  const info = entry.info
  if (!info)
    return `?          ? ????-??-?? ??:?? ${entry.name}`
  const type = info.isDirectory() ? 'd' : '-'
  const modified = info.mtime.toISOString().slice(0, 16).replace('T', ' ')
  return `${type} ${String(info.size).padStart(10)} ${modified} ${entry.name}`
}

async function directoryEntries(path: string, all: boolean, long: boolean): Promise<ListedEntry[]> {
  const names = (await readdir(path))
    .filter(name => all || !name.startsWith('.'))
    .sort((a, b) => a.localeCompare(b))
  if (!long)
    return names.map(name => ({ name }))

  return Promise.all(names.map(async (name): Promise<ListedEntry> => {
    try {
      return { name, info: await stat(join(path, name)) }
    }
    catch {
      // dangling link or entry removed while listing
      return { name }
    }
  }))
}

async function writeEntries(io: CommandIO, entries: ListedEntry[], long: boolean): Promise<boolean> {
  for (const entry of entries) {
    if (!await writeLine(io.stdout, long ? formatLong(entry) : entry.name))
      return false
  }
  return true
}

/**
 * List command - prints directory contents, one entry per line
 */
export const listCommand: BuiltinCommand = {
  name: 'list',
  description: 'List directory contents',
  usage: 'list [-a] [-l] [path ...]',
  examples: ['list', 'list -l /c/Users', 'ls -a ~'],
  pathArguments: 'operands',
  async execute(args: string[], io: CommandIO, shell: Shell): Promise<number> {
    const parsed = parseFlags(args, 'al')
    if ('error' in parsed) {
      await report(io, 'list', parsed.error)
      return 2
    }

    const all = parsed.flags.has('a')
    const long = parsed.flags.has('l')
    const targets = parsed.operands.length > 0 ? parsed.operands : ['.']
    const headers = targets.length > 1
    let status = 0

    for (const [index, target] of targets.entries()) {
      if (io.signal.aborted)
        return status

      const path = shell.resolvePath(target)
      let info: Stats
      try {
        info = await stat(path)
      }
      catch (error) {
        await report(io, 'list', `cannot access '${target}': ${describeFsError(error)}`)
        status = 2
        continue
      }

      if (!info.isDirectory()) {
        if (!await writeEntries(io, [{ name: target, info }], long))
          return status
        continue
      }

      let entries: ListedEntry[]
      try {
        entries = await directoryEntries(path, all, long)
      }
      catch (error) {
        await report(io, 'list', `cannot open directory '${target}': ${describeFsError(error)}`)
        status = 2
        continue
      }

      if (headers && !await writeLine(io.stdout, `${index > 0 ? '\n' : ''}${target}:`))
        return status
      if (!await writeEntries(io, entries, long))
        return status
    }

    return status
  },
}
