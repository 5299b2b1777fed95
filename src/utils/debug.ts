import debug from 'debug'

/** Root namespace for every debug channel in this package */
export const DEBUG_NAMESPACE = 'vmlaunch'

/**
 * Debugger wraps the `debug` package with one lazily created channel per
 * sub-namespace.
 *
 * Example usage:
 * const dbg = new Debugger('step-run')
 * dbg.log('Launching VM')           // vmlaunch:step-run
 * dbg.log('error', 'Launch failed') // vmlaunch:step-run:error
 *
 * Enable with `DEBUG=vmlaunch:*`.
 */
export class Debugger {
  private channels: Map<string, debug.Debugger> = new Map()

  constructor (private module: string) {
    this.channels.set('default', debug(`${DEBUG_NAMESPACE}:${module}`))
  }

  log (message: string): void
  log (channel: string, message: string): void
  log (...args: string[]): void {
    if (args.length === 1) {
      this.channel('default')(args[0])
    } else if (args.length === 2) {
      const [sub, message] = args
      this.channel(sub)(message)
    }
  }

  private channel (sub: string): debug.Debugger {
    let channel = this.channels.get(sub)
    if (!channel) {
      channel = debug(`${DEBUG_NAMESPACE}:${this.module}:${sub}`)
      this.channels.set(sub, channel)
    }
    return channel
  }
}
