import Handlebars from 'handlebars'
import { Debugger } from '../utils/debug'
import { TemplateContext, TemplateRenderer } from '../types/step.types'

/**
 * Renders override fragments with Handlebars.
 *
 * - Unknown placeholders throw (`strict`).
 * - Output is not HTML-escaped, so `=`, `&` and quotes reach QEMU untouched.
 * - `{{user "name"}}` reads a user variable and throws when it is unset.
 * - Placeholders use Handlebars syntax: `{{HTTPIP}}`, not `{{ .HTTPIP }}`.
 *
 * @example
 * ```typescript
 * const renderer = new HandlebarsRenderer()
 * renderer.render('hostfwd=tcp::{{HTTPPort}}-:80', context)  // 'hostfwd=tcp::8080-:80'
 * ```
 */
export class HandlebarsRenderer implements TemplateRenderer {
  private readonly handlebars: typeof Handlebars
  private readonly cache: Map<string, Handlebars.TemplateDelegate<TemplateContext['data']>> = new Map()
  private readonly debug: Debugger
  private userVariables: Readonly<Record<string, string>> = {}

  constructor () {
    this.debug = new Debugger('template')
    this.handlebars = Handlebars.create()
    this.handlebars.registerHelper('user', (name: unknown) => {
      if (typeof name !== 'string' || !Object.prototype.hasOwnProperty.call(this.userVariables, name)) {
        throw new Error(`user variable '${String(name)}' is not defined`)
      }
      return this.userVariables[name]
    })
  }

  render (fragment: string, context: TemplateContext): string {
    let template = this.cache.get(fragment)
    if (!template) {
      template = this.handlebars.compile<TemplateContext['data']>(fragment, {
        strict: true,
        noEscape: true
      })
      this.cache.set(fragment, template)
    }

    // Helpers read user variables from the renderer; rendering is synchronous
    this.userVariables = context.userVariables
    try {
      const rendered = template(this.templateData(context.data))
      this.debug.log(`'${fragment}' -> '${rendered}'`)
      return rendered
    } finally {
      this.userVariables = {}
    }
  }

  /**
   * Copies the data onto a null-prototype object so that strict mode also
   * rejects names such as `constructor` or `toString`.
   */
  private templateData (data: TemplateContext['data']): TemplateContext['data'] {
    const bare = Object.create(null, {
      [Symbol.toPrimitive]: { value: () => 'template data' }
    })
    return Object.assign(bare, data)
  }
}
