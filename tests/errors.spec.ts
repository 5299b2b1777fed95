/**
 * Step error tests
 */

import {
  ArgumentSynthesisError,
  LaunchError,
  RenderError,
  StepErrorCode,
  StopError,
  isStepError,
  toError
} from '../src/types/errors.types'
import { ConfigError, ConfigErrorCode } from '../src/types/config.types'

describe('step errors', () => {
  const renderError = new RenderError('{{Hostname}}', 2, new Error('"Hostname" not defined'))

  it('describes the failing fragment and row', () => {
    expect(renderError.code).toBe(StepErrorCode.RENDER_FAILED)
    expect(renderError.name).toBe('RenderError')
    expect(renderError.message).toBe('Failed to render \'{{Hostname}}\' in qemuArgs row 2: "Hostname" not defined')
  })

  it('prefixes synthesis failures with the stage', () => {
    const error = new ArgumentSynthesisError(renderError)

    expect(error.code).toBe(StepErrorCode.ARGUMENT_SYNTHESIS_FAILED)
    expect(error.cause).toBe(renderError)
    expect(error.message).toBe(`while processing override arguments: ${renderError.message}`)
  })

  it('keeps the launch arguments and the cause message', () => {
    const cause = new Error('spawn qemu-system-x86_64 ENOENT')
    const error = new LaunchError(cause, ['-m', '512M'])

    expect(error.code).toBe(StepErrorCode.LAUNCH_FAILED)
    expect(error.message).toBe('spawn qemu-system-x86_64 ENOENT')
    expect(error.args).toEqual(['-m', '512M'])
    expect(error.cause).toBe(cause)
  })

  it('recognizes only step errors', () => {
    expect(isStepError(new StopError(new Error('timeout')))).toBe(true)
    expect(isStepError(renderError)).toBe(true)
    expect(isStepError(new Error('plain'))).toBe(false)
    expect(isStepError(new ConfigError(ConfigErrorCode.INVALID_CONFIG, 'bad', ['bad']))).toBe(false)
    expect(isStepError('RENDER_FAILED')).toBe(false)
  })

  it('normalizes thrown values to errors', () => {
    const error = new Error('kept')

    expect(toError(error)).toBe(error)
    expect(toError('text').message).toBe('text')
  })
})
