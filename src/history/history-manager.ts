import type { HistoryConfig, HistoryEntry } from '../types'
import { EXIT_PRE_EXECUTION, WinuxError } from '../errors'

export class HistoryExpansionError extends WinuxError {
  constructor(reference: string) {
    super(`${reference}: event not found`, 'EHISTORY', EXIT_PRE_EXECUTION)
    this.name = 'HistoryExpansionError'
  }
}

/**
 * Bounded, in-memory record of submitted lines with a navigation cursor for
 * up/down browsing. Entries carry a sequential index that keeps counting after
 * old entries are evicted.
 */
export class HistoryManager {
  private buffer: HistoryEntry[] = []
  private nextIndex = 1
  // Offset from the newest entry; -1 while not browsing
  private cursor = -1
  private maxEntries: number
  private ignoreDuplicates: boolean
  private ignoreSpace: boolean

  constructor(config: HistoryConfig = {}) {
    this.maxEntries = Math.max(1, config.maxEntries ?? 1000)
    this.ignoreDuplicates = config.ignoreDuplicates ?? true
    this.ignoreSpace = config.ignoreSpace ?? true
  }

  /**
   * Appends a submitted line, evicting the oldest entry when full, and resets
   * navigation. Returns the new entry, or undefined when the line was skipped.
   */
  record(line: string, exitCode?: number): HistoryEntry | undefined {
    this.reset()

    if (!line.trim())
      return undefined
    if (this.ignoreSpace && line.startsWith(' '))
      return undefined
    const newest = this.buffer.at(-1)
    if (this.ignoreDuplicates && newest?.line === line) {
      newest.exitCode = exitCode
      return undefined
    }

    const entry: HistoryEntry = { index: this.nextIndex++, line, exitCode }
    this.buffer.push(entry)
    if (this.buffer.length > this.maxEntries)
      this.buffer.splice(0, this.buffer.length - this.maxEntries)
    return entry
  }

  /**
   * Steps to the next older entry. Stays on the oldest entry once reached and
   * returns undefined only when the history is empty.
   */
  previous(): string | undefined {
    if (this.buffer.length === 0)
      return undefined
    if (this.cursor < this.buffer.length - 1)
      this.cursor++
    return this.current()
  }

  /**
   * Steps to the next newer entry. Moving past the newest entry leaves
   * navigation and returns undefined.
   */
  next(): string | undefined {
    if (this.cursor < 0)
      return undefined
    this.cursor--
    return this.current()
  }

  /** Entry under the navigation cursor */
  current(): string | undefined {
    if (this.cursor < 0)
      return undefined
    return this.buffer[this.buffer.length - 1 - this.cursor]?.line
  }

  isBrowsing(): boolean {
    return this.cursor >= 0
  }

  reset(): void {
    this.cursor = -1
  }

  /** Entries oldest first */
  entries(limit?: number): HistoryEntry[] {
    const all = this.buffer.map(entry => ({ ...entry }))
    return limit === undefined ? all : all.slice(Math.max(0, all.length - limit))
  }

  search(query: string): HistoryEntry[] {
    const needle = query.toLowerCase()
    return this.entries().filter(entry => entry.line.toLowerCase().includes(needle))
  }

  clear(): void {
    this.buffer = []
    this.reset()
  }

  get size(): number {
    return this.buffer.length
  }

  /**
   * Replaces a line consisting of `!!` (the newest entry) or `!n` (entry with
   * index n) by the referenced line. Any other line is returned unchanged.
   */
  expand(line: string): string {
    const reference = line.trim()
    if (reference === '!!') {
      const newest = this.buffer.at(-1)
      if (!newest)
        throw new HistoryExpansionError(reference)
      return newest.line
    }

    const match = reference.match(/^!(\d+)$/)
    if (!match)
      return line
    const index = Number(match[1])
    const entry = this.buffer.find(e => e.index === index)
    if (!entry)
      throw new HistoryExpansionError(reference)
    return entry.line
  }
}
