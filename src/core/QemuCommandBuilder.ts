import path from 'path'
import {
  Accelerator,
  BootDrive,
  DefaultSpec,
  DiskCache,
  DiskDiscard,
  DiskFormat,
  DiskInterface,
  FlagKey,
  GUEST_SSH_PORT,
  USER_NETDEV_ID
} from '../types/qemu.types'
import { VncConfig } from '../display/VncConfig'

/**
 * Options for the primary disk drive
 */
export interface DriveOptions {
  outputDir: string
  vmName: string
  format: DiskFormat
  bus: DiskInterface
  cache: DiskCache
  discard: DiskDiscard
}

/**
 * QemuCommandBuilder provides a fluent API for building the default QEMU
 * arguments. Each flag holds a single value; setting a flag twice replaces
 * the first value.
 *
 * @example
 * ```typescript
 * const defaults = new QemuCommandBuilder()
 *   .setName('web-01')
 *   .setMachine('pc', 'kvm')
 *   .setMemory('512M')
 *   .build()
 * // Map { '-name' => 'web-01', '-machine' => 'type=pc,accel=kvm', '-m' => '512M' }
 * ```
 */
export class QemuCommandBuilder {
  private args: DefaultSpec = new Map()

  /**
   * Set the VM name shown in window titles and monitor output
   */
  setName (name: string): this {
    return this.set('-name', name)
  }

  /**
   * Set machine type, appending the accelerator unless it is 'none'
   */
  setMachine (type: string, accel: Accelerator): this {
    let machineArg = `type=${type}`
    if (accel !== 'none') {
      machineArg += `,accel=${accel}`
    }
    return this.set('-machine', machineArg)
  }

  /**
   * Set memory size, e.g. '512M' or '2G'
   */
  setMemory (size: string): this {
    return this.set('-m', size)
  }

  /**
   * Add a user-mode network backend that forwards a host port to guest SSH,
   * and attach a NIC of the given model to it.
   *
   * @param sshHostPort - Host port forwarded to guest port 22
   * @param model - NIC model, e.g. 'virtio-net' or 'e1000'
   */
  addUserNetwork (sshHostPort: number, model: string): this {
    this.set('-netdev', `user,id=${USER_NETDEV_ID},hostfwd=tcp::${sshHostPort}-:${GUEST_SSH_PORT}`)
    return this.set('-device', `${model},netdev=${USER_NETDEV_ID}`)
  }

  /**
   * Add the primary disk. The image path is `<outputDir>/<vmName>.<format>`.
   *
   * @example
   * builder.addDrive({ outputDir: 'out', vmName: 'vm', format: 'qcow2', bus: 'virtio', cache: 'writeback', discard: 'ignore' })
   * // -drive file=out/vm.qcow2,if=virtio,cache=writeback,discard=ignore
   */
  addDrive (options: DriveOptions): this {
    const imagePath = QemuCommandBuilder.diskImagePath(options.outputDir, options.vmName, options.format)
    return this.set(
      '-drive',
      `file=${imagePath},if=${options.bus},cache=${options.cache},discard=${options.discard}`
    )
  }

  /**
   * Add CD-ROM drive
   * @param isoPath - Path to ISO file
   */
  addCdrom (isoPath: string): this {
    return this.set('-cdrom', isoPath)
  }

  /**
   * Add floppy drive A
   */
  addFloppy (floppyPath: string): this {
    return this.set('-fda', floppyPath)
  }

  /**
   * Set boot order, passed through verbatim (e.g. 'once=d' or 'c')
   */
  setBootOrder (bootDrive: BootDrive): this {
    return this.set('-boot', bootDrive)
  }

  /**
   * Add VNC display
   */
  addVnc (vnc: VncConfig): this {
    return this.set('-vnc', vnc.toOptionValue())
  }

  /**
   * Set the local display backend, e.g. 'sdl' or 'gtk'
   */
  setDisplay (display: string): this {
    return this.set('-display', display)
  }

  /**
   * Build and return a copy of the flag map
   */
  build (): DefaultSpec {
    return new Map(this.args)
  }

  /**
   * Path of the VM disk image inside the output directory
   */
  static diskImagePath (outputDir: string, vmName: string, format: string): string {
    return path.join(outputDir, `${vmName}.${format.toLowerCase()}`)
  }

  private set (key: FlagKey, value: string): this {
    this.args.set(key, value)
    return this
  }
}
