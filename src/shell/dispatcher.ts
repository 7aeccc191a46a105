import type { DispatchedStage, Stage } from '../types'
import type { PathTranslator } from '../utils/path-translator'
import type { CommandRegistry } from './command-registry'
import type { HostShellFallback } from './host-shell'

/**
 * Decides which handler runs a stage whose command name has already been
 * alias-resolved. Names in the registry run emulated with their path arguments
 * translated; everything else goes to the host interpreter verbatim.
 */
export class Dispatcher {
  private registry: CommandRegistry
  private translator: PathTranslator
  private fallback: HostShellFallback

  constructor(registry: CommandRegistry, translator: PathTranslator, fallback: HostShellFallback) {
    this.registry = registry
    this.translator = translator
    this.fallback = fallback
  }

  dispatch(stage: Stage): DispatchedStage {
    const command = this.registry.get(stage.name)
    if (command) {
      return {
        stage,
        handler: command,
        args: this.translator.translateArguments(stage.args, command.pathArguments),
        builtin: true,
      }
    }

    return {
      stage,
      handler: this.fallback,
      args: [stage.name, ...stage.args],
      builtin: false,
    }
  }

  dispatchAll(stages: Stage[]): DispatchedStage[] {
    return stages.map(stage => this.dispatch(stage))
  }
}
