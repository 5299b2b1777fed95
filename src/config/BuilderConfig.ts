/**
 * Builder configuration defaults and validation
 *
 * **Fallback Chain**: explicit config value → default below
 *
 * ```typescript
 * const config = prepareConfig({ vmName: 'web-01', accelerator: 'tcg' }, 'web')
 * // config.outputDir === 'output-web', config.diskInterface === 'virtio', ...
 * ```
 */

import netDevices from './netDevices.json'
import { Debugger } from '../utils/debug'
import {
  ConfigError,
  ConfigErrorCode,
  QemuBuilderConfig,
  RawBuilderConfig
} from '../types/config.types'
import {
  Accelerator,
  DEFAULT_QEMU_BINARY,
  DiskCache,
  DiskDiscard,
  DiskFormat,
  DiskInterface,
  FlagRow
} from '../types/qemu.types'

const debug = new Debugger('config')

export const ACCELERATORS: readonly Accelerator[] = ['kvm', 'tcg', 'xen', 'hax', 'hvf', 'whpx', 'none']
export const DISK_INTERFACES: readonly DiskInterface[] = ['ide', 'scsi', 'virtio', 'virtio-scsi']
export const DISK_CACHES: readonly DiskCache[] = ['writethrough', 'writeback', 'none', 'unsafe', 'directsync']
export const DISK_DISCARDS: readonly DiskDiscard[] = ['unmap', 'ignore']
export const DISK_FORMATS: readonly DiskFormat[] = ['qcow2', 'raw']

/** NIC models accepted for `netDevice` */
export const NET_DEVICES: readonly string[] = netDevices

/** Build name used when none is given */
export const DEFAULT_BUILD_NAME = 'qemu'

/**
 * Applies defaults to a raw configuration and validates it.
 *
 * @param raw - Configuration as written by the user
 * @param buildName - Name of the build, used for default VM and output names
 * @throws {ConfigError} Listing every invalid field
 */
export function prepareConfig (raw: RawBuilderConfig, buildName: string = DEFAULT_BUILD_NAME): QemuBuilderConfig {
  const errors: string[] = []

  const vmName = readString(raw.vmName, 'vmName', buildName, errors)
  const outputDir = readString(raw.outputDir, 'outputDir', `output-${buildName}`, errors)
  const machineType = readString(raw.machineType, 'machineType', 'pc', errors)
  const netDevice = readChoice(raw.netDevice, 'netDevice', 'virtio-net', NET_DEVICES, errors)
  const accelerator = readChoice(raw.accelerator, 'accelerator', 'kvm', ACCELERATORS, errors)
  const diskInterface = readChoice(raw.diskInterface, 'diskInterface', 'virtio', DISK_INTERFACES, errors)
  const diskCache = readChoice(raw.diskCache, 'diskCache', 'writeback', DISK_CACHES, errors)
  const diskDiscard = readChoice(raw.diskDiscard, 'diskDiscard', 'ignore', DISK_DISCARDS, errors)
  const format = readChoice(
    typeof raw.format === 'string' ? raw.format.toLowerCase() : raw.format,
    'format', 'qcow2', DISK_FORMATS, errors
  )
  const headless = readBoolean(raw.headless, 'headless', false, errors)
  const diskImage = readBoolean(raw.diskImage, 'diskImage', false, errors)
  const httpDir = readPath(raw.httpDir, 'httpDir', errors)
  const qemuBinary = readString(raw.qemuBinary, 'qemuBinary', DEFAULT_QEMU_BINARY, errors)
  const qemuArgs = readQemuArgs(raw.qemuArgs, errors)
  const userVariables = readUserVariables(raw.userVariables, errors)

  if (errors.length > 0) {
    debug.log('error', `Invalid configuration: ${errors.join(', ')}`)
    throw new ConfigError(
      ConfigErrorCode.INVALID_CONFIG,
      `Invalid builder configuration: ${errors.join(', ')}`,
      errors
    )
  }

  return {
    vmName,
    machineType,
    accelerator,
    diskInterface,
    diskCache,
    diskDiscard,
    netDevice,
    headless,
    format,
    outputDir,
    diskImage,
    httpDir,
    qemuBinary,
    qemuArgs,
    userVariables
  }
}

function readString (value: unknown, field: string, fallback: string, errors: string[]): string {
  if (value === undefined) {
    return fallback
  }
  if (typeof value !== 'string' || value.trim().length === 0) {
    errors.push(`${field} must be a non-empty string`)
    return fallback
  }
  return value
}

function readPath (value: unknown, field: string, errors: string[]): string {
  if (value === undefined) {
    return ''
  }
  if (typeof value !== 'string') {
    errors.push(`${field} must be a string`)
    return ''
  }
  return value
}

function readBoolean (value: unknown, field: string, fallback: boolean, errors: string[]): boolean {
  if (value === undefined) {
    return fallback
  }
  if (typeof value !== 'boolean') {
    errors.push(`${field} must be a boolean`)
    return fallback
  }
  return value
}

function readChoice<T extends string> (
  value: unknown,
  field: string,
  fallback: T,
  allowed: readonly T[],
  errors: string[]
): T {
  if (value === undefined) {
    return fallback
  }
  const match = allowed.find(choice => choice === value)
  if (match === undefined) {
    errors.push(`Invalid ${field}: '${String(value)}'. Must be one of: ${allowed.join(', ')}`)
    return fallback
  }
  return match
}

function readQemuArgs (value: unknown, errors: string[]): FlagRow[] {
  if (value === undefined || value === null) {
    return []
  }
  if (!Array.isArray(value)) {
    errors.push('qemuArgs must be an array of string arrays')
    return []
  }

  const rows: FlagRow[] = []
  value.forEach((row: unknown, index) => {
    if (!Array.isArray(row) || row.length === 0 || !row.every((part): part is string => typeof part === 'string')) {
      errors.push(`qemuArgs row ${index}: must be a non-empty array of strings`)
      return
    }
    if (!row[0].startsWith('-')) {
      errors.push(`qemuArgs row ${index}: '${row[0]}' is not a flag`)
      return
    }
    rows.push([...row])
  })
  return rows
}

function readUserVariables (value: unknown, errors: string[]): Record<string, string> {
  if (value === undefined) {
    return {}
  }
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    errors.push('userVariables must be an object of strings')
    return {}
  }

  const variables: Record<string, string> = {}
  for (const [name, variable] of Object.entries(value)) {
    if (typeof variable !== 'string') {
      errors.push(`userVariables.${name} must be a string`)
      continue
    }
    variables[name] = variable
  }
  return variables
}
