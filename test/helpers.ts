import type { BuiltinCommand, HostEnvironment, WinuxConfig } from '../src/types'
import { Buffer } from 'node:buffer'
import { mkdtempSync, rmSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import process from 'node:process'
import type { Readable } from 'node:stream'
import { Writable } from 'node:stream'
import { createBuiltins } from '../src/builtins'
import { defaultConfig } from '../src/config'
import { WinuxShell } from '../src/shell'

/** Writable that keeps everything written to it */
export class Sink extends Writable {
  private chunks: Buffer[] = []

  override _write(chunk: Buffer | string, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    this.chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk))
    callback()
  }

  text(): string {
    return Buffer.concat(this.chunks).toString('utf8')
  }

  reset(): void {
    this.chunks = []
  }
}

export function makeTempDir(): string {
  return mkdtempSync(join(tmpdir(), 'winux-test-'))
}

export function removeTempDir(dir: string): void {
  rmSync(dir, { recursive: true, force: true })
}

export function testHost(homeDir: string, overrides: Partial<HostEnvironment> = {}): HostEnvironment {
  const variables: Record<string, string> = {}
  for (const [key, value] of Object.entries(process.env)) {
    if (value !== undefined)
      variables[key] = value
  }
  return {
    platform: 'linux',
    hostShell: '/bin/sh',
    hostShellArgs: ['-c'],
    systemDrive: 'C:',
    homeDir,
    user: 'tester',
    hostname: 'testbox',
    variables,
    ...overrides,
  }
}

export interface TestShell {
  shell: WinuxShell
  out: Sink
  err: Sink
}

export function createTestShell(dir: string, options: {
  config?: Partial<WinuxConfig>
  host?: Partial<HostEnvironment>
  extraBuiltins?: BuiltinCommand[]
  stdin?: Readable
} = {}): TestShell {
  const out = new Sink()
  const err = new Sink()
  const shell = new WinuxShell({ ...defaultConfig, ...options.config }, {
    host: testHost(dir, options.host),
    cwd: dir,
    stdin: options.stdin,
    stdout: out,
    stderr: err,
    builtins: [...createBuiltins().values(), ...(options.extraBuiltins ?? [])],
  })
  return { shell, out, err }
}
