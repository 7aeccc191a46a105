import type { Readable } from 'node:stream'
import type { BuiltinCommand, CommandIO, Shell } from './types'
import { Buffer } from 'node:buffer'
import { writeLine } from '../utils/streams'
import { describeFsError, inputLines, openInput, parseFlags, report } from './io'

interface Counts {
  lines: number
  words: number
  bytes: number
}

// space, \t, \n, \v, \f, \r
const WHITESPACE = new Set([0x20, 0x09, 0x0A, 0x0B, 0x0C, 0x0D])

async function countStream(input: Readable, io: CommandIO): Promise<Counts> {
  const counts: Counts = { lines: 0, words: 0, bytes: 0 }

  if (input === io.stdin && io.terminal) {
    for await (const line of inputLines(input, io)) {
      counts.lines++
      counts.words += line.split(/\s+/).filter(Boolean).length
      counts.bytes += Buffer.byteLength(line) + 1
    }
    return counts
  }

  let inWord = false
  for await (const chunk of input) {
    const bytes = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk))
    counts.bytes += bytes.length
    for (const byte of bytes) {
      if (byte === 0x0A)
        counts.lines++
      if (WHITESPACE.has(byte)) {
        inWord = false
      }
      else if (!inWord) {
        inWord = true
        counts.words++
      }
    }
  }
  return counts
}

/**
 * Count command - prints newline, word and byte counts
 */
export const countCommand: BuiltinCommand = {
  name: 'count',
  description: 'Count lines, words and bytes',
  usage: 'count [-l] [-w] [-c] [file ...]',
  examples: ['count notes.txt', 'list | wc -l'],
  pathArguments: 'operands',
  async execute(args: string[], io: CommandIO, shell: Shell): Promise<number> {
    const parsed = parseFlags(args, 'lwc')
    if ('error' in parsed) {
      await report(io, 'count', parsed.error)
      return 1
    }

    const selected = parsed.flags.size > 0 ? parsed.flags : new Set(['l', 'w', 'c'])
    const format = (counts: Counts, label?: string) => {
      const fields: number[] = []
      if (selected.has('l'))
        fields.push(counts.lines)
      if (selected.has('w'))
        fields.push(counts.words)
      if (selected.has('c'))
        fields.push(counts.bytes)
      return label === undefined ? fields.join(' ') : `${fields.join(' ')} ${label}`
    }

    const sources = parsed.operands.length > 0 ? parsed.operands : ['-']
    const total: Counts = { lines: 0, words: 0, bytes: 0 }
    let status = 0

    for (const source of sources) {
      let counts: Counts
      try {
        counts = await countStream(await openInput(source, io, shell), io)
      }
      catch (error) {
        if (io.signal.aborted)
          return status
        await report(io, 'count', `${source}: ${describeFsError(error)}`)
        status = 1
        continue
      }
      total.lines += counts.lines
      total.words += counts.words
      total.bytes += counts.bytes
      if (!await writeLine(io.stdout, format(counts, parsed.operands.length > 0 ? source : undefined)))
        return status
    }

    if (sources.length > 1)
      await writeLine(io.stdout, format(total, 'total'))
    return status
  },
}
