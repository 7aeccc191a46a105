import type { PathMappingRule, WinuxConfig } from './types'
import { constants, homedir } from 'node:os'
import { resolve } from 'node:path'
import process from 'node:process'
import { pathToFileURL } from 'node:url'

export const defaultConfig: WinuxConfig = {
  verbose: false,
  aliases: {},
  history: {
    maxEntries: 1000,
    ignoreDuplicates: true,
    ignoreSpace: true,
  },
  paths: {
    mountPrefix: '/mnt',
    mappings: [],
  },
  hostShell: {},
  execution: {
    pipeBufferSize: 16 * 1024,
    killSignal: 'SIGTERM',
  },
  prompt: {
    format: '{user}@{host}:{path}$ ',
  },
  logging: {
    timestamps: false,
    prefixes: {
      debug: 'DEBUG',
      info: 'INFO',
      warn: 'WARN',
      error: 'ERROR',
    },
  },
}

/**
 * Layers `override` on top of `base`, one level deep for the object sections
 */
export function mergeConfig(base: WinuxConfig, override: Partial<WinuxConfig>): WinuxConfig {
  return {
    ...base,
    ...override,
    verbose: override.verbose ?? base.verbose,
    aliases: { ...base.aliases, ...override.aliases },
    history: { ...base.history, ...override.history },
    paths: { ...base.paths, ...override.paths },
    hostShell: { ...base.hostShell, ...override.hostShell },
    execution: { ...base.execution, ...override.execution },
    prompt: { ...base.prompt, ...override.prompt },
    logging: {
      ...base.logging,
      ...override.logging,
      prefixes: { ...base.logging?.prefixes, ...override.logging?.prefixes },
    },
  }
}

// Provide a reusable loader that always fetches the latest config from disk
// Options:
// - path: explicit path to a config file; if provided, we load it directly
export async function loadWinuxConfig(options?: { path?: string }): Promise<WinuxConfig> {
  // 1) Explicit path wins
  const explicitPath = options?.path || process.env.WINUX_CONFIG
  if (explicitPath) {
    const mod: unknown = await import(pathToFileURL(resolvePath(explicitPath)).href)
    const userCfg = isRecord(mod) && 'default' in mod ? mod.default : mod
    return mergeConfig(defaultConfig, coerceUserConfig(userCfg))
  }

  // 2) bunfig search (current dir up, then user config locations)
  const { loadConfig } = await import('bunfig')
  const loaded: WinuxConfig = await loadConfig({
    name: 'winux',
    defaultConfig,
  })
  return mergeConfig(defaultConfig, coerceUserConfig(loaded))
}

function resolvePath(p: string): string {
  // Support tilde expansion and relative paths
  if (p.startsWith('~')) {
    return resolve(homedir(), p.slice(1).replace(/^[\\/]/, ''))
  }
  return resolve(p)
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(v => typeof v === 'string')
}

function isSignal(value: unknown): value is NodeJS.Signals {
  return typeof value === 'string' && value in constants.signals
}

function stringRecord(value: unknown): Record<string, string> | undefined {
  if (!isRecord(value))
    return undefined
  const out: Record<string, string> = {}
  for (const [key, v] of Object.entries(value)) {
    if (typeof v === 'string')
      out[key] = v
  }
  return out
}

function mappingRules(value: unknown): PathMappingRule[] | undefined {
  if (!Array.isArray(value))
    return undefined
  const rules: PathMappingRule[] = []
  for (const item of value) {
    if (isRecord(item) && typeof item.emulated === 'string' && typeof item.host === 'string')
      rules.push({ emulated: item.emulated, host: item.host })
  }
  return rules
}

/**
 * Picks the recognised settings out of a user-supplied config module.
 * Unknown keys and values of the wrong type are dropped.
 */
export function coerceUserConfig(value: unknown): Partial<WinuxConfig> {
  if (!isRecord(value))
    return {}

  const cfg: Partial<WinuxConfig> = {}
  if (typeof value.verbose === 'boolean')
    cfg.verbose = value.verbose

  const aliases = stringRecord(value.aliases)
  if (aliases)
    cfg.aliases = aliases

  const { history, paths, hostShell, execution, prompt, logging } = value
  if (isRecord(history)) {
    cfg.history = {
      maxEntries: typeof history.maxEntries === 'number' ? history.maxEntries : undefined,
      ignoreDuplicates: typeof history.ignoreDuplicates === 'boolean' ? history.ignoreDuplicates : undefined,
      ignoreSpace: typeof history.ignoreSpace === 'boolean' ? history.ignoreSpace : undefined,
    }
  }
  if (isRecord(paths)) {
    cfg.paths = {
      translate: typeof paths.translate === 'boolean' ? paths.translate : undefined,
      systemDrive: typeof paths.systemDrive === 'string' ? paths.systemDrive : undefined,
      mountPrefix: typeof paths.mountPrefix === 'string' ? paths.mountPrefix : undefined,
      mappings: mappingRules(paths.mappings),
    }
  }
  if (isRecord(hostShell)) {
    cfg.hostShell = {
      path: typeof hostShell.path === 'string' ? hostShell.path : undefined,
      args: isStringArray(hostShell.args) ? hostShell.args : undefined,
    }
  }
  if (isRecord(execution)) {
    cfg.execution = {
      pipeBufferSize: typeof execution.pipeBufferSize === 'number' ? execution.pipeBufferSize : undefined,
      killSignal: isSignal(execution.killSignal) ? execution.killSignal : undefined,
    }
  }
  if (isRecord(prompt) && typeof prompt.format === 'string')
    cfg.prompt = { format: prompt.format }
  if (isRecord(logging)) {
    cfg.logging = {
      timestamps: typeof logging.timestamps === 'boolean' ? logging.timestamps : undefined,
      prefixes: stringRecord(logging.prefixes),
    }
  }

  return stripUndefined(cfg)
}

function stripUndefined(cfg: Partial<WinuxConfig>): Partial<WinuxConfig> {
  const sections = ['history', 'paths', 'hostShell', 'execution', 'logging'] as const
  for (const section of sections) {
    const value = cfg[section]
    if (!value)
      continue
    for (const [key, v] of Object.entries(value)) {
      if (v === undefined)
        Reflect.deleteProperty(value, key)
    }
  }
  return cfg
}

// Validate a loaded config and return errors/warnings without throwing.
export function validateWinuxConfig(cfg: WinuxConfig): { valid: boolean, errors: string[], warnings: string[] } {
  const errors: string[] = []
  const warnings: string[] = []

  const hist = cfg.history
  if (hist?.maxEntries !== undefined && (!Number.isInteger(hist.maxEntries) || hist.maxEntries <= 0)) {
    errors.push(`history.maxEntries must be a positive integer (got: ${hist.maxEntries})`)
  }

  const paths = cfg.paths
  if (paths?.systemDrive !== undefined && !/^[a-z]:?\\?$/i.test(paths.systemDrive)) {
    errors.push(`paths.systemDrive must look like "C:" (got: ${paths.systemDrive})`)
  }
  if (paths?.mountPrefix && !paths.mountPrefix.startsWith('/')) {
    errors.push(`paths.mountPrefix must start with "/" (got: ${paths.mountPrefix})`)
  }
  for (const [i, rule] of (paths?.mappings ?? []).entries()) {
    if (!rule.emulated.startsWith('/'))
      errors.push(`paths.mappings[${i}].emulated must start with "/" (got: ${rule.emulated})`)
    if (!/^(?:[a-z]:|\\\\)/i.test(rule.host))
      warnings.push(`paths.mappings[${i}].host does not look like a Windows path (got: ${rule.host})`)
  }

  const size = cfg.execution?.pipeBufferSize
  if (size !== undefined && (!Number.isInteger(size) || size <= 0)) {
    errors.push(`execution.pipeBufferSize must be a positive integer (got: ${size})`)
  }

  for (const [name, value] of Object.entries(cfg.aliases ?? {})) {
    if (!name || /[\s'"|>]/.test(name))
      errors.push(`aliases: invalid alias name "${name}"`)
    if (!value.trim())
      errors.push(`aliases.${name} must not be empty`)
    else if (/[|>]/.test(value))
      warnings.push(`aliases.${name} contains a pipe or redirection and will be rejected`)
  }

  if (cfg.hostShell?.path === '') {
    errors.push('hostShell.path must not be empty')
  }

  return { valid: errors.length === 0, errors, warnings }
}

// Create a human-readable diff between two configs (shallow for readability)
export function diffWinuxConfigs(oldCfg: WinuxConfig, newCfg: WinuxConfig): string[] {
  const changes: string[] = []
  const keys = new Set<string>([...Object.keys(oldCfg), ...Object.keys(newCfg)])

  const summarize = (val: unknown): string => {
    if (val === undefined) {
      return 'undefined'
    }
    if (Array.isArray(val)) {
      return `[array:${val.length}]`
    }
    if (isRecord(val)) {
      return '{...}'
    }
    return JSON.stringify(val)
  }

  const oldEntries = new Map<string, unknown>(Object.entries(oldCfg))
  const newEntries = new Map<string, unknown>(Object.entries(newCfg))
  for (const k of Array.from(keys).sort()) {
    const a = oldEntries.get(k)
    const b = newEntries.get(k)
    if (JSON.stringify(a) !== JSON.stringify(b)) {
      changes.push(`${k}: ${summarize(a)} -> ${summarize(b)}`)
    }
  }

  return changes
}
