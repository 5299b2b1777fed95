import { QemuBuilderConfig } from '../types/config.types'
import { OverrideSpec, USER_NET_HOST_IP } from '../types/qemu.types'
import { TemplateContext, TemplateRenderer } from '../types/step.types'
import { RenderError, toError } from '../types/errors.types'

/**
 * Builds the values override templates can reference
 */
export function buildTemplateContext (config: QemuBuilderConfig, httpPort: number): TemplateContext {
  return {
    data: {
      HTTPIP: USER_NET_HOST_IP,
      HTTPPort: httpPort,
      HTTPDir: config.httpDir,
      OutputDir: config.outputDir,
      Name: config.vmName
    },
    userVariables: config.userVariables
  }
}

/**
 * Renders every fragment of every override row, keeping the row shape.
 *
 * @returns New rows; the input is not modified
 * @throws {RenderError} On the first fragment that fails to render
 */
export function expandOverrideArgs (
  rows: OverrideSpec | undefined,
  renderer: TemplateRenderer,
  context: TemplateContext
): OverrideSpec {
  if (!rows || rows.length === 0) {
    return []
  }

  return rows.map((row, rowIndex) =>
    row.map(fragment => {
      try {
        return renderer.render(fragment, context)
      } catch (error) {
        throw new RenderError(fragment, rowIndex, toError(error))
      }
    })
  )
}
