export { createBuiltins } from './builtins'
export { coerceUserConfig, defaultConfig, diffWinuxConfigs, loadWinuxConfig, mergeConfig, validateWinuxConfig } from './config'
export * from './errors'
export { HistoryExpansionError, HistoryManager } from './history/history-manager'
export { LineReader } from './input/line-reader'
export type { LineReaderOptions } from './input/line-reader'
export { Logger } from './logger'
export type { LoggerOptions } from './logger'
export { CommandParser, ParseError } from './parser'
export { AliasCycleError, AliasDefinitionError, BUILTIN_ALIASES, MAX_ALIAS_DEPTH } from './shell/alias-manager'
export { quoteForHost } from './shell/host-shell'
export type { HostShellOptions } from './shell/host-shell'
export { AliasManager, CommandRegistry, Dispatcher, HostShellFallback, PipelineExecutor, ReplManager, StageStartError, WinuxShell } from './shell/index'
export type { WinuxShellOptions } from './shell/index'
export type { PipelineIO } from './shell/pipeline-executor'
export type * from './types'
export { resolveHostEnvironment } from './utils/environment'
export { PathTranslator } from './utils/path-translator'
export type { PathTranslatorOptions } from './utils/path-translator'
export { openRedirectionTarget, RedirectionTargetError } from './utils/redirection'
export { isBrokenPipe, readLines, writeLine, writeOutput } from './utils/streams'
