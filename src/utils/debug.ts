import debug from 'debug'

/**
 * Debugger wraps the `debug` package with per-module namespaces.
 *
 * Example usage:
 * const debugger = new Debugger('create-template');
 * debugger.log('Cloning started'); // logs to 'template-builder:create-template'
 * debugger.log('error', 'Clone failed'); // logs to 'template-builder:create-template:error'
 */
export class Debugger {
  private debuggers: { [key: string]: debug.Debugger } = {}

  constructor (private module: string) {
    this.debuggers.default = debug('template-builder:' + module)
  }

  public log (...args: string[]) {
    if (args.length === 1) {
      this.debuggers.default(args[0])
    } else if (args.length === 2) {
      const [subDebug, message] = args
      if (!this.debuggers[subDebug]) {
        this.debuggers[subDebug] = debug(`template-builder:${this.module}:${subDebug}`)
      }
      this.debuggers[subDebug](message)
    }
  }
}

/**
 * Turns any thrown value into a message string.
 */
export function errorMessage (error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
