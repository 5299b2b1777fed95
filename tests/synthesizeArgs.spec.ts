/**
 * Argument synthesis tests
 *
 * End-to-end synthesis with the Handlebars renderer: defaults, rendered
 * overrides, and failure wrapping.
 */

import { synthesizeArgs } from '../src/core/synthesizeArgs'
import { groupTokens } from '../src/core/ArgumentMerger'
import { HandlebarsRenderer } from '../src/template/HandlebarsRenderer'
import { prepareConfig } from '../src/config/BuilderConfig'
import {
  ArgumentSynthesisError,
  RenderError,
  StepErrorCode
} from '../src/types/errors.types'
import { DiscoveredFacts, Ui } from '../src/types/step.types'

const facts: DiscoveredFacts = {
  isoPath: '/isos/install.iso',
  vncPort: 5947,
  sshHostPort: 3213,
  httpPort: 8123
}

describe('synthesizeArgs', () => {
  let ui: jest.Mocked<Ui>
  const renderer = new HandlebarsRenderer()

  beforeEach(() => {
    ui = {
      say: jest.fn(),
      message: jest.fn(),
      error: jest.fn()
    }
  })

  it('returns the defaults when there are no overrides', () => {
    const config = prepareConfig({ vmName: 'web-01', outputDir: 'out' })

    const tokens = synthesizeArgs({ config, facts, bootDrive: 'once=d', ui }, renderer)

    expect(groupTokens(tokens)).toEqual(new Map([
      ['-display', ['sdl']],
      ['-name', ['web-01']],
      ['-machine', ['type=pc,accel=kvm']],
      ['-netdev', ['user,id=user.0,hostfwd=tcp::3213-:22']],
      ['-device', ['virtio-net,netdev=user.0']],
      ['-drive', ['file=out/web-01.qcow2,if=virtio,cache=writeback,discard=ignore']],
      ['-cdrom', ['/isos/install.iso']],
      ['-boot', ['once=d']],
      ['-m', ['512M']],
      ['-vnc', ['0.0.0.0:47']]
    ]))
    expect(ui.say).not.toHaveBeenCalled()
  })

  it('renders overrides and lets them replace the defaults', () => {
    const config = prepareConfig({
      vmName: 'web-01',
      outputDir: 'out',
      qemuArgs: [
        ['-m', '2G'],
        ['-netdev', 'user,id=user.0,', 'hostfwd=tcp::{{HTTPPort}}-:80'],
        ['-device', 'virtio-net,netdev=user.0'],
        ['-device', 'virtio-rng-pci'],
        ['-serial', 'file:{{OutputDir}}/{{Name}}-serial.log']
      ]
    })

    const grouped = groupTokens(synthesizeArgs({ config, facts, bootDrive: 'once=d', ui }, renderer))

    expect(grouped.get('-m')).toEqual(['2G'])
    expect(grouped.get('-netdev')).toEqual(['user,id=user.0,hostfwd=tcp::8123-:80'])
    expect(grouped.get('-device')).toEqual(['virtio-net,netdev=user.0', 'virtio-rng-pci'])
    expect(grouped.get('-serial')).toEqual(['file:out/web-01-serial.log'])
    expect(grouped.get('-name')).toEqual(['web-01'])
    expect(grouped.get('-vnc')).toEqual(['0.0.0.0:47'])
    expect(ui.say).toHaveBeenCalledWith('Overriding default QEMU arguments with qemuArgs...')
  })

  it('turns an override that renders empty into a bare flag', () => {
    const config = prepareConfig({
      vmName: 'web-01',
      httpDir: '',
      qemuArgs: [['-display', '{{HTTPDir}}']]
    })

    const tokens = synthesizeArgs({ config, facts, bootDrive: 'once=d', ui }, renderer)

    expect(groupTokens(tokens).get('-display')).toEqual([])
    expect(tokens.filter(token => token === '-display')).toHaveLength(1)
    expect(tokens).not.toContain('sdl')
  })

  it('fails with ArgumentSynthesisError on an undefined placeholder', () => {
    const config = prepareConfig({
      vmName: 'web-01',
      qemuArgs: [['-name', '{{Hostname}}']]
    })

    let caught: unknown
    try {
      synthesizeArgs({ config, facts, bootDrive: 'once=d', ui }, renderer)
    } catch (error) {
      caught = error
    }

    expect(caught).toBeInstanceOf(ArgumentSynthesisError)
    const synthesisError = caught as ArgumentSynthesisError
    expect(synthesisError.code).toBe(StepErrorCode.ARGUMENT_SYNTHESIS_FAILED)
    expect(synthesisError.cause).toBeInstanceOf(RenderError)
    expect(synthesisError.message.startsWith('while processing override arguments: ')).toBe(true)
  })
})
