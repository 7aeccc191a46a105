export type { BuiltinCommand, CommandIO, PathArgumentSpec, Shell } from '../types'

export interface ParsedFlags {
  flags: Set<string>
  operands: string[]
}

export interface FlagError {
  error: string
}
