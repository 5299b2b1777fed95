/**
 * VNC display configuration class
 * @module display/VncConfig
 */

import { Debugger } from '../utils/debug'
import { VncConfigOptions, VNC_BASE_PORT, MAX_VNC_PORT, DEFAULT_VNC_ADDR } from '../types/display.types'

/**
 * Derives the `-vnc` option value from a discovered host port.
 *
 * QEMU takes a display number rather than a port, so the port is offset by
 * the VNC base port.
 *
 * @example
 * ```typescript
 * new VncConfig({ port: 5947 }).toOptionValue()  // '0.0.0.0:47'
 * ```
 */
export class VncConfig {
  private readonly debug: Debugger
  private readonly port: number
  private readonly addr: string

  /**
   * @throws Error if the port does not map to a VNC display (5900-65535)
   */
  constructor (options: VncConfigOptions) {
    this.debug = new Debugger('vnc-config')
    if (!Number.isInteger(options.port) || options.port < VNC_BASE_PORT || options.port > MAX_VNC_PORT) {
      this.debug.log('error', `Invalid VNC port: ${options.port}`)
      throw new Error(`Invalid VNC port ${options.port}: must be an integer between ${VNC_BASE_PORT} and ${MAX_VNC_PORT}`)
    }
    this.port = options.port
    this.addr = options.addr ?? DEFAULT_VNC_ADDR
  }

  /**
   * Value for the `-vnc` flag: `addr:display`
   */
  toOptionValue (): string {
    const value = `${this.addr}:${this.getDisplay()}`
    this.debug.log(`VNC port ${this.port} -> ${value}`)
    return value
  }

  /**
   * Gets the VNC display number (port - 5900).
   */
  getDisplay (): number {
    return VncConfig.portToDisplay(this.port)
  }

  /**
   * Converts a port number to its corresponding VNC display number.
   *
   * @example
   * ```typescript
   * VncConfig.portToDisplay(5901)  // Returns 1
   * ```
   */
  static portToDisplay (port: number): number {
    return port - VNC_BASE_PORT
  }
}
