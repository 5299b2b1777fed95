/**
 * Builder configuration types
 * @module types/config
 */

import {
  Accelerator,
  DiskCache,
  DiskDiscard,
  DiskFormat,
  DiskInterface,
  OverrideSpec
} from './qemu.types'

/**
 * Fully resolved builder configuration. Produced by `prepareConfig`;
 * every field is set and validated.
 */
export interface QemuBuilderConfig {
  /** VM name, also used for the disk image file name */
  vmName: string
  /** QEMU machine type, e.g. 'pc' or 'q35' */
  machineType: string
  accelerator: Accelerator
  diskInterface: DiskInterface
  diskCache: DiskCache
  diskDiscard: DiskDiscard
  /** NIC model for `-device` */
  netDevice: string
  /** Start without a display window */
  headless: boolean
  format: DiskFormat
  /** Directory where the disk image lives */
  outputDir: string
  /** Boot an existing disk image instead of installing from ISO */
  diskImage: boolean
  /** Directory served over HTTP to the guest */
  httpDir: string
  qemuBinary: string
  /** Raw, unexpanded override rows */
  qemuArgs: OverrideSpec
  /** Values for the `user` template helper */
  userVariables: Record<string, string>
}

/**
 * Configuration as written by the user. Anything missing gets a default.
 */
export type RawBuilderConfig = {
  [K in keyof QemuBuilderConfig]?: unknown
}

/**
 * Error codes for configuration errors
 */
export enum ConfigErrorCode {
  INVALID_CONFIG = 'INVALID_CONFIG'
}

/**
 * Raised by `prepareConfig` with every problem found
 */
export class ConfigError extends Error {
  /** Error code for programmatic handling */
  public readonly code: ConfigErrorCode

  /** One message per invalid field */
  public readonly errors: string[]

  constructor (code: ConfigErrorCode, message: string, errors: string[]) {
    super(message)
    this.name = 'ConfigError'
    this.code = code
    this.errors = errors
  }
}
