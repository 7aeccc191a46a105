import type { BuiltinCommand } from '../types'

/**
 * Maps canonical command names to their emulated implementations.
 */
export class CommandRegistry {
  private commands = new Map<string, BuiltinCommand>()

  constructor(commands: Iterable<BuiltinCommand> = []) {
    for (const command of commands)
      this.register(command)
  }

  /**
   * Registers a command under its own name, replacing any previous entry
   */
  register(command: BuiltinCommand): void {
    this.commands.set(command.name, command)
  }

  unregister(name: string): boolean {
    return this.commands.delete(name)
  }

  has(name: string): boolean {
    return this.commands.has(name)
  }

  get(name: string): BuiltinCommand | undefined {
    return this.commands.get(name)
  }

  list(): BuiltinCommand[] {
    return Array.from(this.commands.values()).sort((a, b) => a.name.localeCompare(b.name))
  }

  get size(): number {
    return this.commands.size
  }
}
