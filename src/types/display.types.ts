/**
 * Display configuration types for VNC
 * @module types/display
 */

/** Base port for VNC display numbers (actual port = 5900 + display number) */
export const VNC_BASE_PORT = 5900

/** Highest TCP port, display 59635 */
export const MAX_VNC_PORT = 65535

/** Listen address for VNC; the VM console is reachable on all interfaces */
export const DEFAULT_VNC_ADDR = '0.0.0.0'

/**
 * Configuration options for VNC display
 */
export interface VncConfigOptions {
  /** Host TCP port chosen by an earlier step (5900 or above) */
  port: number
  /** Listen address (default: 0.0.0.0) */
  addr?: string
}
