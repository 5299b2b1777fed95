import { Debugger } from '../utils/debug'
import { buildDefaultArgs } from './DefaultArgumentBuilder'
import { buildTemplateContext, expandOverrideArgs } from './ArgumentExpander'
import { mergeArgs } from './ArgumentMerger'
import { QemuBuilderConfig } from '../types/config.types'
import { BootDrive, OverrideSpec, TokenSequence } from '../types/qemu.types'
import { DiscoveredFacts, TemplateRenderer, Ui } from '../types/step.types'
import { ArgumentSynthesisError, RenderError } from '../types/errors.types'

const debug = new Debugger('synthesize')

/**
 * Inputs for one argument synthesis
 */
export interface SynthesisInput {
  config: QemuBuilderConfig
  facts: DiscoveredFacts
  bootDrive: BootDrive
  ui: Ui
}

/**
 * Computes the full QEMU argument list: defaults, then the user's
 * `qemuArgs` rendered and merged on top.
 *
 * @throws {ArgumentSynthesisError} When an override fragment fails to render
 */
export function synthesizeArgs (input: SynthesisInput, renderer: TemplateRenderer): TokenSequence {
  const { config, facts, bootDrive, ui } = input
  const defaults = buildDefaultArgs(config, facts, bootDrive, ui)

  let overrides: OverrideSpec = []
  if (config.qemuArgs.length > 0) {
    ui.say('Overriding default QEMU arguments with qemuArgs...')
    try {
      overrides = expandOverrideArgs(config.qemuArgs, renderer, buildTemplateContext(config, facts.httpPort))
    } catch (error) {
      if (error instanceof RenderError) {
        throw new ArgumentSynthesisError(error)
      }
      throw error
    }
  }

  const tokens = mergeArgs(overrides, defaults)
  debug.log(`Synthesized ${tokens.length} tokens from ${defaults.size} defaults and ${overrides.length} override rows`)
  return tokens
}
