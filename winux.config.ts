import type { WinuxConfig } from './src/types'

/**
 * Winux Configuration
 *
 * Copy this file next to where you start winux, or point WINUX_CONFIG at it.
 * Every section is optional; missing values fall back to the defaults.
 */
export default {
  verbose: false,

  // Your own aliases, layered on top of the built-in ones (ls, grep, cat, ...)
  aliases: {
    gs: 'git status',
    lt: 'ls -l',
  },

  history: {
    maxEntries: 1000,
    ignoreDuplicates: true,
    ignoreSpace: true,
  },

  paths: {
    // Defaults to true on Windows and false elsewhere
    // translate: true,
    mountPrefix: '/mnt',
    mappings: [
      { emulated: '/tmp', host: 'C:\\Windows\\Temp' },
    ],
  },

  // Leave empty to use %COMSPEC% (or /bin/sh outside Windows)
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
  },
} satisfies WinuxConfig
