/**
 * Contracts between the launch step and its collaborators
 * @module types/step
 */

import { QemuBuilderConfig } from './config.types'
import { TokenSequence } from './qemu.types'

// =============================================================================
// Collaborators
// =============================================================================

/**
 * User-facing notification sink. Calls are fire-and-forget.
 */
export interface Ui {
  /** Announce a major action */
  say (message: string): void
  /** Informational detail or warning */
  message (message: string): void
  /** Report a failure */
  error (message: string): void
}

/**
 * Starts and stops the external VM process.
 */
export interface ProcessSupervisor {
  /** Launch the VM with the given arguments; resolves once it is running */
  start (args: TokenSequence): Promise<void>
  /** Stop the VM; resolves once it has terminated */
  stop (): Promise<void>
}

/**
 * Values available to override argument templates
 */
export interface QemuArgsTemplateData {
  HTTPIP: string
  HTTPPort: number
  HTTPDir: string
  OutputDir: string
  Name: string
}

/**
 * Everything a template fragment may reference
 */
export interface TemplateContext {
  data: QemuArgsTemplateData
  /** Values reachable through the `user` helper */
  userVariables: Readonly<Record<string, string>>
}

/**
 * Expands placeholders in one string. Throws when the fragment references
 * something undefined or is malformed.
 */
export interface TemplateRenderer {
  render (fragment: string, context: TemplateContext): string
}

// =============================================================================
// Pipeline state
// =============================================================================

/**
 * Facts discovered by earlier pipeline steps
 */
export interface DiscoveredFacts {
  /** Path to the installation ISO */
  isoPath: string
  /** Host VNC port (5900 + display) */
  vncPort: number
  /** Host port forwarded to guest SSH */
  sshHostPort: number
  /** Port of the HTTP server serving `httpDir` */
  httpPort: number
  /** Floppy image, only when earlier steps built one */
  floppyPath?: string
}

/**
 * Typed state shared by the steps of one pipeline run
 */
export interface RunState extends DiscoveredFacts {
  config: QemuBuilderConfig
  driver: ProcessSupervisor
  ui: Ui
  /** Aborted by the orchestrator to cancel the run */
  signal?: AbortSignal
  /** Set by a step that halted the pipeline */
  error?: Error
}

/**
 * Outcome of a step's run phase
 */
export type StepAction = 'continue' | 'halt'

/**
 * A pipeline step. `cleanup` is called once for every step whose `run`
 * was invoked, in reverse order, whatever the outcome.
 */
export interface Step<S> {
  run (state: S): Promise<StepAction>
  cleanup (state: S): Promise<void>
}

/**
 * Lifecycle phase of the launch step
 */
export type RunPhase = 'idle' | 'running' | 'stopped'
