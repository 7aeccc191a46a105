import { describe, expect, it } from 'vitest'
import { Logger } from '../src/logger'
import { Sink } from './helpers'

function sinks() {
  return { stdout: new Sink(), stderr: new Sink() }
}

describe('Logger', () => {
  it('writes info to stdout with level and scope', () => {
    const io = sinks()
    new Logger(false, 'shell', { ...io, colors: false }).info('hello')
    expect(io.stdout.text()).toBe('[INFO] [shell] hello\n')
    expect(io.stderr.text()).toBe('')
  })

  it('prints debug output only when verbose', () => {
    const io = sinks()
    const log = new Logger(false, 'shell', { ...io, colors: false })
    log.debug('hidden')
    expect(io.stdout.text()).toBe('')

    log.setVerbose(true)
    log.debug('shown')
    expect(io.stdout.text()).toBe('[DEBUG] [shell] shown\n')
  })

  it('nests scopes and sends warnings to stderr', () => {
    const io = sinks()
    new Logger(false, 'shell', { ...io, colors: false }).withScope('host').warn('careful')
    expect(io.stderr.text()).toBe('[WARN] [shell:host] careful\n')
  })

  it('appends the message of error arguments', () => {
    const io = sinks()
    new Logger(false, 'shell', { ...io, colors: false }).error('failed:', new Error('boom'))
    expect(io.stderr.text()).toBe('[ERROR] [shell] failed: boom\n')
  })

  it('uses configured prefixes and omits a missing scope', () => {
    const io = sinks()
    new Logger(false, undefined, { ...io, colors: false, logging: { prefixes: { info: 'I' } } }).info('msg')
    expect(io.stdout.text()).toBe('[I] msg\n')
  })

  it('prefixes an ISO timestamp when enabled', () => {
    const io = sinks()
    new Logger(false, 'shell', { ...io, colors: false, logging: { timestamps: true } }).info('tick')
    expect(io.stdout.text()).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z \[INFO\] \[shell\] tick\n$/)
  })
})
