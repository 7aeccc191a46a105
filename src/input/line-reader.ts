import type { Key } from 'node:readline'
import type { Readable, Writable } from 'node:stream'
import type { HistoryManager } from '../history/history-manager'
import { createInterface, emitKeypressEvents } from 'node:readline'

export interface LineReaderOptions {
  input: Readable
  output: Writable
  history: HistoryManager
  /** Enables line editing, arrow keys and Ctrl+C handling */
  terminal: boolean
}

/**
 * Reads one line per prompt from the interactive input. Up and down arrows
 * browse the shell history; Ctrl+C discards the current line and Ctrl+D on an
 * empty line ends input.
 *
 * A fresh readline interface is created for every prompt and closed as soon as
 * the line is submitted, so running commands get the input stream to
 * themselves.
 */
export class LineReader {
  private options: LineReaderOptions

  constructor(options: LineReaderOptions) {
    this.options = options
  }

  /**
   * Resolves with the submitted line, or null at end of input
   */
  read(prompt: string): Promise<string | null> {
    const { input, output, history, terminal } = this.options

    return new Promise((resolve) => {
      const rl = createInterface({ input, output, terminal, prompt, historySize: 0 })
      let settled = false
      let draft = ''

      const replaceLine = (text: string) => {
        rl.write(null, { ctrl: true, name: 'e' })
        rl.write(null, { ctrl: true, name: 'u' })
        rl.write(text)
      }

      const onKeypress = (_str: string | undefined, key: Key | undefined) => {
        if (key?.name === 'up') {
          if (!history.isBrowsing())
            draft = rl.line
          const entry = history.previous()
          if (entry !== undefined)
            replaceLine(entry)
        }
        else if (key?.name === 'down') {
          if (!history.isBrowsing())
            return
          replaceLine(history.next() ?? draft)
        }
      }

      const finish = (line: string | null) => {
        if (settled)
          return
        settled = true
        history.reset()
        if (terminal)
          input.off('keypress', onKeypress)
        rl.close()
        resolve(line)
      }

      rl.on('line', line => finish(line))
      rl.on('close', () => finish(null))
      rl.on('SIGINT', () => {
        replaceLine('')
        history.reset()
        output.write('^C\n')
        rl.prompt()
      })

      if (terminal) {
        emitKeypressEvents(input, rl)
        input.on('keypress', onKeypress)
      }
      rl.prompt()
    })
  }
}
