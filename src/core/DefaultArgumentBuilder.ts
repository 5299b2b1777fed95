import { Debugger } from '../utils/debug'
import { QemuCommandBuilder } from './QemuCommandBuilder'
import { VncConfig } from '../display/VncConfig'
import { QemuBuilderConfig } from '../types/config.types'
import { BootDrive, DEFAULT_DISPLAY, DEFAULT_MEMORY, DefaultSpec } from '../types/qemu.types'
import { DiscoveredFacts, Ui } from '../types/step.types'

const debug = new Debugger('default-args')

export const HEADLESS_WARNING =
  'WARNING: The VM will be started in headless mode, as configured.\n' +
  'In headless mode, errors during the boot sequence or OS setup\n' +
  "won't be easily visible. Use at your own discretion."

export const NO_ACCELERATION_WARNING =
  'WARNING: The VM will be started with no hardware acceleration.\n' +
  'The installation may take considerably longer to finish.'

/**
 * Computes the arguments QEMU needs to boot the VM, before user overrides.
 *
 * Headless mode and a disabled accelerator are surfaced as UI warnings.
 * A missing floppy is only noted in the debug log.
 */
export function buildDefaultArgs (
  config: QemuBuilderConfig,
  facts: DiscoveredFacts,
  bootDrive: BootDrive,
  ui: Ui
): DefaultSpec {
  const builder = new QemuCommandBuilder()

  if (config.headless) {
    ui.message(HEADLESS_WARNING)
  } else {
    builder.setDisplay(DEFAULT_DISPLAY)
  }

  builder
    .setName(config.vmName)
    .setMachine(config.machineType, config.accelerator)
    .addUserNetwork(facts.sshHostPort, config.netDevice)
    .addDrive({
      outputDir: config.outputDir,
      vmName: config.vmName,
      format: config.format,
      bus: config.diskInterface,
      cache: config.diskCache,
      discard: config.diskDiscard
    })

  if (!config.diskImage) {
    builder.addCdrom(facts.isoPath)
  }

  builder
    .setBootOrder(bootDrive)
    .setMemory(DEFAULT_MEMORY)
    .addVnc(new VncConfig({ port: facts.vncPort }))

  if (config.accelerator === 'none') {
    ui.message(NO_ACCELERATION_WARNING)
  }

  if (facts.floppyPath !== undefined) {
    builder.addFloppy(facts.floppyPath)
  } else {
    debug.log('No floppy files, not attaching a floppy')
  }

  return builder.build()
}
