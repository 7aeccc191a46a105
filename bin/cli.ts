#!/usr/bin/env -S npx tsx
import type { WinuxConfig } from '../src/types'
import process from 'node:process'
import { CAC } from 'cac'
import pkg from '../package.json'
import { defaultConfig, diffWinuxConfigs, loadWinuxConfig, validateWinuxConfig } from '../src/config'
import { LineReader } from '../src/input/line-reader'
import { ReplManager, WinuxShell } from '../src/shell/index'
import { readLines } from '../src/utils/streams'

const cli = new CAC('winux')

interface CliOptions {
  verbose?: boolean
  config?: string
  command?: string
}

async function resolveConfig(options: CliOptions): Promise<WinuxConfig> {
  const cfg = await loadWinuxConfig({ path: options.config })
  return { ...cfg, verbose: options.verbose ?? cfg.verbose }
}

async function runInteractive(config: WinuxConfig): Promise<number> {
  const shell = new WinuxShell(config, { stdin: process.stdin, terminal: true })
  const reader = new LineReader({
    input: process.stdin,
    output: process.stdout,
    history: shell.history,
    terminal: true,
  })
  const repl = new ReplManager(shell, reader, shell.log.withScope('repl'))

  const onSigterm = () => {
    shell.stop()
    repl.stop()
  }
  process.on('SIGTERM', onSigterm)
  try {
    return await repl.start()
  }
  finally {
    process.off('SIGTERM', onSigterm)
  }
}

// Default command - interactive shell, one line, or a script on stdin
cli
  .command('[...args]', 'Start the winux shell, or run the given command line', {
    allowUnknownOptions: true,
    ignoreOptionDefaultValue: true,
  })
  .option('-c, --command <line>', 'Run one command line and exit with its status')
  .option('--verbose', 'Enable verbose logging')
  .option('--config <config>', 'Path to config file')
  .example('winux')
  .example('winux -c "ls /c/Users | grep txt"')
  .example('type script.txt | winux')
  .action(async (args: string[], options: CliOptions) => {
    try {
      const config = await resolveConfig(options)
      const line = options.command ?? (args.length > 0 ? args.join(' ') : undefined)

      if (line !== undefined) {
        const shell = new WinuxShell(config, { stdin: process.stdin, terminal: process.stdin.isTTY === true })
        const result = await shell.execute(line)
        process.exit(result.exitCode)
      }

      if (process.stdin.isTTY) {
        process.exit(await runInteractive(config))
      }

      // Non-interactive: each line of stdin is a command line
      const shell = new WinuxShell(config)
      process.exit(await shell.runScript(readLines(process.stdin)))
    }
    catch (err) {
      process.stderr.write(`winux: ${err instanceof Error ? err.message : String(err)}\n`)
      process.exit(1)
    }
  })

// Show the effective configuration
cli
  .command('config', 'Validate the configuration and show how it differs from the defaults')
  .option('--config <config>', 'Path to config file')
  .action(async (options: CliOptions) => {
    const config = await loadWinuxConfig({ path: options.config })
    const { valid, errors, warnings } = validateWinuxConfig(config)

    for (const warning of warnings)
      process.stdout.write(`warning: ${warning}\n`)
    for (const error of errors)
      process.stderr.write(`error: ${error}\n`)

    const changes = diffWinuxConfigs(defaultConfig, config)
    if (changes.length === 0)
      process.stdout.write('Using the default configuration.\n')
    else
      process.stdout.write(`Changed from defaults:\n${changes.map(c => `  ${c}`).join('\n')}\n`)

    process.exit(valid ? 0 : 1)
  })

// Version command
cli.command('version', 'Show the version').action(() => {
  process.stdout.write(`${pkg.version}\n`)
})

cli.version(pkg.version)
cli.help()
cli.parse()
