/**
 * TemplateBuilder - runs a build that ends in private templates
 *
 * @example
 * ```typescript
 * const config = loadConfig(JSON.parse(fs.readFileSync('build.json', 'utf8')))
 * const builder = new TemplateBuilder(config, {
 *   ui: new ConsoleUi('upcloud'),
 *   steps: [provisionServerStep]
 * })
 * const artifact = await builder.run()
 * console.log(artifact.toString())
 * ```
 */

import { Debugger } from '../utils/debug'
import { TimestampSource } from '../utils/timestamp'
import { UpCloudDriver } from '../driver/UpCloudDriver'
import { StepRunner } from '../pipeline/StepRunner'
import { StepCreateTemplate } from '../steps/StepCreateTemplate'
import { BuilderConfig } from '../types/config.types'
import { Driver } from '../types/driver.types'
import { BuildError, BuildState, Step, StepAction, Ui } from '../types/pipeline.types'
import { TemplateArtifact } from './TemplateArtifact'

export interface TemplateBuilderOptions {
  /** Progress output */
  ui: Ui
  /** Driver to use (default: UpCloudDriver from the configured credentials) */
  driver?: Driver
  /** Steps that run before template creation and set `serverUuid` */
  steps?: Step[]
  /** Source of title timestamps */
  timestamps?: TimestampSource
}

export class TemplateBuilder {
  private readonly debug: Debugger
  private readonly driver: Driver
  private readonly runner: StepRunner

  constructor (
    private readonly config: BuilderConfig,
    private readonly options: TemplateBuilderOptions
  ) {
    this.debug = new Debugger('builder')
    this.runner = new StepRunner()
    this.driver = options.driver ?? new UpCloudDriver({
      username: config.username,
      password: config.password,
      timeoutMs: config.timeoutMs
    })
  }

  /**
   * Runs the configured steps followed by template creation.
   * @throws BuildError carrying the halting error as its cause
   */
  async run (): Promise<TemplateArtifact> {
    const state: BuildState = {
      ui: this.options.ui,
      driver: this.driver
    }
    const steps: Step[] = [
      ...(this.options.steps ?? []),
      new StepCreateTemplate(this.config, this.options.timestamps)
    ]

    this.debug.log(`Starting build with ${steps.length} step(s)`)
    const result = await this.runner.run(steps, state)

    if (result.action === StepAction.HALT) {
      const reason = result.error?.message ?? 'build halted'
      throw new BuildError(`Build failed: ${reason}`, state, result.error)
    }

    const templates = state.templates ?? []
    this.debug.log(`Build finished with ${templates.length} template(s)`)
    return new TemplateArtifact(templates, this.driver)
  }
}
