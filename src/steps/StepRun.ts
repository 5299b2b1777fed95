import { Debugger } from '../utils/debug'
import { synthesizeArgs } from '../core/synthesizeArgs'
import { HandlebarsRenderer } from '../template/HandlebarsRenderer'
import { QemuBuilderConfig } from '../types/config.types'
import { BootDrive, TokenSequence } from '../types/qemu.types'
import { RunPhase, RunState, Step, StepAction, TemplateRenderer } from '../types/step.types'
import { LaunchError, StopError, toError } from '../types/errors.types'

/**
 * Options for StepRun
 */
export interface StepRunOptions {
  /** Boot order passed to `-boot` */
  bootDrive: BootDrive
  /** Status line announced before launching */
  message: string
  /** Renderer for override templates (default: HandlebarsRenderer) */
  renderer?: TemplateRenderer
}

/**
 * Launches the VM and stops it again when the pipeline cleans up.
 *
 * run() halts the pipeline when the arguments cannot be built or QEMU fails
 * to start. cleanup() always asks the driver to stop once run() was entered,
 * and only reports a stop failure.
 */
export class StepRun implements Step<RunState> {
  private readonly bootDrive: BootDrive
  private readonly message: string
  private readonly renderer: TemplateRenderer
  private readonly debug: Debugger
  private phase: RunPhase = 'idle'
  private launchAttempted: boolean = false

  constructor (options: StepRunOptions) {
    this.bootDrive = options.bootDrive
    this.message = options.message
    this.renderer = options.renderer ?? new HandlebarsRenderer()
    this.debug = new Debugger('step-run')
  }

  async run (state: RunState): Promise<StepAction> {
    const { ui, driver } = state
    this.launchAttempted = true

    ui.say(this.message)

    if (state.signal?.aborted) {
      this.debug.log('Run cancelled before launch')
      return 'halt'
    }

    let command: TokenSequence
    try {
      command = synthesizeArgs(
        { config: state.config, facts: state, bootDrive: this.bootDrive, ui },
        this.renderer
      )
    } catch (error) {
      const err = toError(error)
      ui.error(`Error processing QemuArgs: ${err.message}`)
      state.error = err
      return 'halt'
    }

    try {
      await driver.start(command)
    } catch (error) {
      const err = new LaunchError(toError(error), command)
      ui.error(`Error launching VM: ${err.message}`)
      state.error = err
      return 'halt'
    }

    this.phase = 'running'
    this.debug.log(`VM ${state.config.vmName} running`)
    return 'continue'
  }

  async cleanup (state: RunState): Promise<void> {
    if (!this.launchAttempted) {
      return
    }

    try {
      await state.driver.stop()
    } catch (error) {
      const err = new StopError(toError(error))
      this.debug.log('error', err.message)
      state.ui.error(`Error shutting down VM: ${err.message}`)
    } finally {
      this.phase = 'stopped'
    }
  }

  getPhase (): RunPhase {
    return this.phase
  }
}

/**
 * Creates the run step for a configuration: install from CD-ROM, or boot
 * straight from the disk when an existing image is used.
 */
export function createRunStep (config: QemuBuilderConfig, renderer?: TemplateRenderer): StepRun {
  if (config.diskImage) {
    return new StepRun({ bootDrive: 'c', message: 'Starting VM, booting disk image', renderer })
  }
  return new StepRun({ bootDrive: 'once=d', message: 'Starting VM, booting from CD-ROM', renderer })
}
