import { Debugger, errorMessage } from '../utils/debug'
import { Driver, Template } from '../types/driver.types'

/**
 * Result of a successful build: the private templates it created.
 */
export class TemplateArtifact {
  private readonly debug: Debugger

  constructor (
    readonly templates: readonly Template[],
    private readonly driver: Driver
  ) {
    this.debug = new Debugger('artifact')
  }

  /** Template UUIDs joined by commas */
  id (): string {
    return this.templates.map(t => t.uuid).join(',')
  }

  toString (): string {
    const list = this.templates.map(t => `${t.title} (${t.uuid})`).join(', ')
    return `Private templates (${this.templates.length}): ${list}`
  }

  /**
   * Deletes every template, attempting all of them.
   * @throws Error listing each template that could not be deleted
   */
  async destroy (): Promise<void> {
    const failures: string[] = []
    for (const template of this.templates) {
      this.debug.log(`Destroying template ${template.uuid}`)
      try {
        await this.driver.deleteTemplate(template.uuid)
      } catch (error) {
        failures.push(`${template.uuid}: ${errorMessage(error)}`)
      }
    }
    if (failures.length > 0) {
      throw new Error(`Failed to destroy ${failures.length} template(s): ${failures.join('; ')}`)
    }
  }
}
