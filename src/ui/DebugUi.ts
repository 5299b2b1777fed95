import { Debugger } from '../utils/debug'
import { Ui } from '../types/step.types'

/**
 * Ui that writes to `debug` channels, for running a step without a
 * terminal front end. Messages go to `vmlaunch:ui`, errors to
 * `vmlaunch:ui:error`.
 */
export class DebugUi implements Ui {
  private readonly debug: Debugger

  constructor (module: string = 'ui') {
    this.debug = new Debugger(module)
  }

  say (message: string): void {
    this.debug.log(`==> ${message}`)
  }

  message (message: string): void {
    this.debug.log(`    ${message}`)
  }

  error (message: string): void {
    this.debug.log('error', message)
  }
}
