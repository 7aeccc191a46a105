import type { HostEnvironment } from '../types'
import { homedir, hostname, userInfo } from 'node:os'
import process from 'node:process'

function definedOnly(env: NodeJS.ProcessEnv): Record<string, string> {
  const out: Record<string, string> = {}
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined)
      out[key] = value
  }
  return out
}

function currentUser(): string {
  try {
    return userInfo().username
  }
  catch {
    // userInfo throws when the uid has no passwd entry (containers)
    return 'user'
  }
}

/**
 * Reads host shell location, system drive and identity from the environment.
 * Called once at startup; the result is never refreshed per command.
 */
export function resolveHostEnvironment(
  env: NodeJS.ProcessEnv = process.env,
  platform: NodeJS.Platform = process.platform,
): HostEnvironment {
  const isWindows = platform === 'win32'
  const override = env.WINUX_HOST_SHELL

  let hostShell: string
  let hostShellArgs: string[]
  if (isWindows) {
    hostShell = override || env.ComSpec || env.COMSPEC || 'cmd.exe'
    hostShellArgs = /cmd(?:\.exe)?$/i.test(hostShell) ? ['/d', '/s', '/c'] : ['-Command']
  }
  else {
    hostShell = override || '/bin/sh'
    hostShellArgs = ['-c']
  }

  return {
    platform,
    hostShell,
    hostShellArgs,
    systemDrive: env.SystemDrive || env.SYSTEMDRIVE || 'C:',
    homeDir: (isWindows ? env.USERPROFILE : env.HOME) || homedir(),
    user: env.USERNAME || env.USER || currentUser(),
    hostname: env.COMPUTERNAME || env.HOSTNAME || hostname(),
    variables: definedOnly(env),
  }
}
