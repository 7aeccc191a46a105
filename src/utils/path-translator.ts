import type { PathArgumentSpec, PathMappingRule } from '../types'

export interface PathTranslatorOptions {
  /** When false both directions return their input unchanged */
  enabled: boolean
  /** Drive that `/` maps to, e.g. `C:` */
  systemDrive: string
  /** Host-form home directory that `~` maps to */
  homeDir: string
  mountPrefix?: string
  mappings?: PathMappingRule[]
}

const DRIVE_ROOT = /^\/([a-z])(?:\/(.*))?$/i
const HOST_DRIVE = /^([a-z]):(?:[\\/](.*))?$/i
const UNC_EMULATED = /^\/\/([^/]+)(?:\/(.*))?$/
const UNC_HOST = /^\\\\([^\\/]+)(?:[\\/](.*))?$/

function isPositionList(spec: PathArgumentSpec): spec is readonly number[] {
  return Array.isArray(spec)
}

function toBackslashes(path: string): string {
  return path.replace(/\//g, '\\')
}

function toSlashes(path: string): string {
  return path.replace(/\\/g, '/')
}

function trimTrailingSeparators(path: string): string {
  return path.replace(/[\\/]+$/, '')
}

function normalizeDrive(drive: string): string {
  const letter = drive.replace(/[:\\/]+$/, '').toUpperCase()
  return `${letter}:`
}

/**
 * Rewrites paths between the Linux-style syntax users type and the Windows
 * syntax the host understands.
 *
 * System-drive paths are canonical in root-relative form (`/Users/me`), other
 * drives in `/d/...` form, so a canonical path survives a round trip.
 */
export class PathTranslator {
  readonly enabled: boolean
  private systemDrive: string
  private homeDir: string
  private mountPrefix: string
  private mappings: PathMappingRule[]

  constructor(options: PathTranslatorOptions) {
    this.enabled = options.enabled
    this.systemDrive = normalizeDrive(options.systemDrive)
    this.homeDir = options.homeDir
    this.mountPrefix = trimTrailingSeparators(options.mountPrefix ?? '/mnt')
    this.mappings = (options.mappings ?? []).map(rule => ({
      emulated: trimTrailingSeparators(rule.emulated),
      host: trimTrailingSeparators(rule.host),
    }))
  }

  toHostForm(arg: string): string {
    if (!this.enabled || !arg)
      return arg

    for (const rule of this.mappings) {
      const rest = this.matchPrefix(arg, rule.emulated, '/', false)
      if (rest !== undefined)
        return `${rule.host}${toBackslashes(rest)}`
    }

    if (arg === '~')
      return this.homeDir
    if (arg.startsWith('~/'))
      return `${trimTrailingSeparators(this.homeDir)}\\${toBackslashes(arg.slice(2))}`

    const unc = arg.match(UNC_EMULATED)
    if (unc)
      return `\\\\${unc[1]}${unc[2] !== undefined ? `\\${toBackslashes(unc[2])}` : ''}`

    if (this.mountPrefix) {
      const rest = this.matchPrefix(arg, this.mountPrefix, '/', false)
      const mounted = rest !== undefined ? rest.match(DRIVE_ROOT) : null
      if (mounted)
        return this.driveForm(mounted[1], mounted[2])
    }

    const drive = arg.match(DRIVE_ROOT)
    if (drive)
      return this.driveForm(drive[1], drive[2])

    if (arg.startsWith('/'))
      return `${this.systemDrive}\\${toBackslashes(arg.replace(/^\/+/, ''))}`

    return arg
  }

  toEmulatedForm(path: string): string {
    if (!this.enabled || !path)
      return path

    for (const rule of this.mappings) {
      const rest = this.matchPrefix(path, rule.host, '\\', true)
      if (rest !== undefined)
        return `${rule.emulated}${toSlashes(rest)}` || '/'
    }

    const unc = path.match(UNC_HOST)
    if (unc)
      return `//${unc[1]}${unc[2] !== undefined ? `/${toSlashes(unc[2])}` : ''}`

    const drive = path.match(HOST_DRIVE)
    // A bare `C:` is drive-relative and has no Linux-style equivalent
    if (!drive || drive[2] === undefined)
      return path

    const rest = trimTrailingSeparators(toSlashes(drive[2]))
    if (normalizeDrive(drive[1]) === this.systemDrive)
      return `/${rest}`
    return `/${drive[1].toLowerCase()}${rest ? `/${rest}` : ''}`
  }

  /**
   * Translates the arguments a command declares as paths and leaves the others
   * untouched.
   */
  translateArguments(args: string[], spec: PathArgumentSpec = 'none'): string[] {
    if (!this.enabled || spec === 'none')
      return args.slice()

    if (isPositionList(spec)) {
      const positions = spec
      return args.map((arg, index) => positions.includes(index) ? this.toHostForm(arg) : arg)
    }

    const skip = typeof spec === 'string' ? 0 : spec.operandsFrom
    const auto = spec === 'auto'
    let operand = 0
    let optionsDone = false
    return args.map((arg) => {
      if (!optionsDone && arg === '--') {
        optionsDone = true
        return arg
      }
      if (!optionsDone && arg.startsWith('-') && arg !== '-')
        return arg
      if (operand++ < skip)
        return arg
      if (auto && !arg.includes('/'))
        return arg
      return this.toHostForm(arg)
    })
  }

  /**
   * Returns what follows `prefix` when `path` equals it or continues it with a
   * separator; the returned remainder keeps its leading separator.
   */
  private matchPrefix(path: string, prefix: string, separator: '/' | '\\', ignoreCase: boolean): string | undefined {
    if (!prefix)
      return undefined
    const head = path.slice(0, prefix.length)
    const same = ignoreCase ? head.toLowerCase() === prefix.toLowerCase() : head === prefix
    if (!same)
      return undefined
    const rest = path.slice(prefix.length)
    if (rest === '')
      return ''
    if (rest[0] === separator || rest[0] === '/')
      return rest
    return undefined
  }

  private driveForm(letter: string, rest: string | undefined): string {
    return `${letter.toUpperCase()}:\\${rest ? toBackslashes(rest) : ''}`
  }
}
