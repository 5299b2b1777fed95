/**
 * StepRun launch/teardown tests
 *
 * These tests verify that:
 * 1. A successful run starts the supervisor with the synthesized arguments
 * 2. Synthesis and launch failures halt the pipeline and are reported
 * 3. Cleanup always stops the VM once run() was entered, and only reports stop failures
 */

import { StepRun, createRunStep } from '../src/steps/StepRun'
import { groupTokens } from '../src/core/ArgumentMerger'
import { prepareConfig } from '../src/config/BuilderConfig'
import {
  ArgumentSynthesisError,
  LaunchError
} from '../src/types/errors.types'
import { RawBuilderConfig } from '../src/types/config.types'
import { ProcessSupervisor, RunState, Ui } from '../src/types/step.types'

describe('StepRun', () => {
  let ui: jest.Mocked<Ui>
  let driver: jest.Mocked<ProcessSupervisor>

  function createState (raw: RawBuilderConfig = {}): RunState {
    return {
      config: prepareConfig({ vmName: 'web-01', outputDir: 'out', ...raw }),
      driver,
      ui,
      isoPath: '/isos/install.iso',
      vncPort: 5947,
      sshHostPort: 3213,
      httpPort: 8123
    }
  }

  beforeEach(() => {
    ui = {
      say: jest.fn(),
      message: jest.fn(),
      error: jest.fn()
    }
    driver = {
      start: jest.fn().mockResolvedValue(undefined),
      stop: jest.fn().mockResolvedValue(undefined)
    }
  })

  describe('run', () => {
    it('announces, launches with the synthesized arguments and continues', async () => {
      const step = new StepRun({ bootDrive: 'once=d', message: 'Starting VM, booting from CD-ROM' })
      const state = createState({ qemuArgs: [['-m', '1G']] })

      const action = await step.run(state)

      expect(action).toBe('continue')
      expect(step.getPhase()).toBe('running')
      expect(ui.say).toHaveBeenNthCalledWith(1, 'Starting VM, booting from CD-ROM')
      expect(driver.start).toHaveBeenCalledTimes(1)
      const grouped = groupTokens(driver.start.mock.calls[0][0])
      expect(grouped.get('-m')).toEqual(['1G'])
      expect(grouped.get('-boot')).toEqual(['once=d'])
      expect(grouped.get('-cdrom')).toEqual(['/isos/install.iso'])
      expect(ui.error).not.toHaveBeenCalled()
      expect(state.error).toBeUndefined()
    })

    it('halts without launching when an override fails to render', async () => {
      const step = new StepRun({ bootDrive: 'once=d', message: 'Starting VM' })
      const state = createState({ qemuArgs: [['-name', '{{Hostname}}']] })

      const action = await step.run(state)

      expect(action).toBe('halt')
      expect(driver.start).not.toHaveBeenCalled()
      expect(state.error).toBeInstanceOf(ArgumentSynthesisError)
      expect(ui.error).toHaveBeenCalledTimes(1)
      expect(ui.error.mock.calls[0][0].startsWith(
        'Error processing QemuArgs: while processing override arguments: '
      )).toBe(true)
    })

    it('halts and reports when the VM fails to start', async () => {
      driver.start.mockRejectedValue(new Error('qemu-system-x86_64 exited during startup with code 1, signal null'))
      const step = new StepRun({ bootDrive: 'once=d', message: 'Starting VM' })
      const state = createState()

      const action = await step.run(state)

      expect(action).toBe('halt')
      expect(step.getPhase()).toBe('idle')
      expect(ui.error).toHaveBeenCalledWith(
        'Error launching VM: qemu-system-x86_64 exited during startup with code 1, signal null'
      )
      expect(state.error).toBeInstanceOf(LaunchError)
      const launchError = state.error as LaunchError
      expect(launchError.args).toEqual(driver.start.mock.calls[0][0])
    })

    it('halts before launching when the run is already cancelled', async () => {
      const controller = new AbortController()
      controller.abort()
      const step = new StepRun({ bootDrive: 'once=d', message: 'Starting VM' })
      const state = { ...createState(), signal: controller.signal }

      const action = await step.run(state)

      expect(action).toBe('halt')
      expect(driver.start).not.toHaveBeenCalled()

      await step.cleanup(state)
      expect(driver.stop).toHaveBeenCalledTimes(1)
    })
  })

  describe('cleanup', () => {
    it('stops the VM after a successful run', async () => {
      const step = new StepRun({ bootDrive: 'once=d', message: 'Starting VM' })
      const state = createState()

      await step.run(state)
      await step.cleanup(state)

      expect(driver.stop).toHaveBeenCalledTimes(1)
      expect(step.getPhase()).toBe('stopped')
    })

    it('still stops the VM after a halted run', async () => {
      driver.start.mockRejectedValue(new Error('boom'))
      const step = new StepRun({ bootDrive: 'once=d', message: 'Starting VM' })
      const state = createState()

      await step.run(state)
      await step.cleanup(state)

      expect(driver.stop).toHaveBeenCalledTimes(1)
    })

    it('reports a stop failure without throwing', async () => {
      driver.stop.mockRejectedValue(new Error('did not exit'))
      const step = new StepRun({ bootDrive: 'once=d', message: 'Starting VM' })
      const state = createState()

      await step.run(state)
      await expect(step.cleanup(state)).resolves.toBeUndefined()

      expect(ui.error).toHaveBeenCalledWith('Error shutting down VM: did not exit')
      expect(step.getPhase()).toBe('stopped')
    })

    it('does nothing when run() was never called', async () => {
      const step = new StepRun({ bootDrive: 'once=d', message: 'Starting VM' })

      await step.cleanup(createState())

      expect(driver.stop).not.toHaveBeenCalled()
      expect(step.getPhase()).toBe('idle')
    })
  })

  describe('createRunStep', () => {
    it('boots from CD-ROM for an ISO install', async () => {
      const state = createState()

      await createRunStep(state.config).run(state)

      expect(ui.say).toHaveBeenCalledWith('Starting VM, booting from CD-ROM')
      expect(groupTokens(driver.start.mock.calls[0][0]).get('-boot')).toEqual(['once=d'])
    })

    it('boots the disk when an existing image is used', async () => {
      const state = createState({ diskImage: true })

      await createRunStep(state.config).run(state)

      expect(ui.say).toHaveBeenCalledWith('Starting VM, booting disk image')
      const grouped = groupTokens(driver.start.mock.calls[0][0])
      expect(grouped.get('-boot')).toEqual(['c'])
      expect(grouped.has('-cdrom')).toBe(false)
    })
  })
})
