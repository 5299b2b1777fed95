/**
 * Error types for argument synthesis and the launch/teardown step.
 * @module types/errors
 */

/**
 * Error codes for step operations
 */
export enum StepErrorCode {
  /** A template fragment failed to expand */
  RENDER_FAILED = 'RENDER_FAILED',
  /** Override arguments could not be turned into a token list */
  ARGUMENT_SYNTHESIS_FAILED = 'ARGUMENT_SYNTHESIS_FAILED',
  /** The process supervisor failed to start QEMU */
  LAUNCH_FAILED = 'LAUNCH_FAILED',
  /** The process supervisor failed to stop QEMU */
  STOP_FAILED = 'STOP_FAILED'
}

/**
 * Normalizes anything thrown into an Error instance
 */
export function toError (error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error))
}

/**
 * Base class for the closed set of step errors. Callers branch on `code`.
 */
export abstract class StepError extends Error {
  abstract readonly code: StepErrorCode

  /** Underlying failure */
  readonly cause: Error

  protected constructor (message: string, cause: Error) {
    super(message)
    this.cause = cause
  }
}

/**
 * A template fragment in the override rows failed to render
 */
export class RenderError extends StepError {
  readonly code = StepErrorCode.RENDER_FAILED

  constructor (
    /** The raw fragment that failed */
    readonly fragment: string,
    /** Index of the override row holding the fragment */
    readonly rowIndex: number,
    cause: Error
  ) {
    super(`Failed to render '${fragment}' in qemuArgs row ${rowIndex}: ${cause.message}`, cause)
    this.name = 'RenderError'
  }
}

/**
 * Wraps a RenderError with the stage where synthesis failed
 */
export class ArgumentSynthesisError extends StepError {
  readonly code = StepErrorCode.ARGUMENT_SYNTHESIS_FAILED

  constructor (cause: RenderError) {
    super(`while processing override arguments: ${cause.message}`, cause)
    this.name = 'ArgumentSynthesisError'
  }
}

/**
 * The process supervisor could not start the VM
 */
export class LaunchError extends StepError {
  readonly code = StepErrorCode.LAUNCH_FAILED

  constructor (
    cause: Error,
    /** Arguments the launch was attempted with */
    readonly args: readonly string[]
  ) {
    super(cause.message, cause)
    this.name = 'LaunchError'
  }
}

/**
 * The process supervisor could not stop the VM during teardown
 */
export class StopError extends StepError {
  readonly code = StepErrorCode.STOP_FAILED

  constructor (cause: Error) {
    super(cause.message, cause)
    this.name = 'StopError'
  }
}

/**
 * Type guard to check if an error is one of the step errors
 */
export function isStepError (error: unknown): error is StepError {
  return error instanceof StepError
}
