import { Debugger, errorMessage } from '../utils/debug'
import { TimestampSource } from '../utils/timestamp'
import { BuilderConfig } from '../types/config.types'
import { StorageVolume, Template } from '../types/driver.types'
import {
  BuildState,
  haltWithError,
  Step,
  StepAction,
  StepError,
  StepErrorCode
} from '../types/pipeline.types'

/** Title prefix of the intermediate clones */
export const CLONE_TITLE_PREFIX = 'template-builder'

export type CreateTemplateConfig = Pick<BuilderConfig, 'cloneZones' | 'templatePrefix' | 'templateName'>

/**
 * Creates private templates from the build server's disk.
 *
 * The disk is first cloned into every configured clone zone, then one
 * template is created per disk (the original first, clones in zone order),
 * all sharing one title. Clones are recorded in `state.cleanupStorageUuids`
 * as soon as they exist; cleanup deletes them. The original disk and the
 * templates are never recorded.
 *
 * The first failing driver call halts the step. Whatever was created before
 * it stays recorded on the state.
 *
 * @example
 * const step = new StepCreateTemplate({ cloneZones: ['uk-lon1'], templatePrefix: 'web' })
 * await new StepRunner().run([provisionStep, step], state)
 */
export class StepCreateTemplate implements Step {
  readonly name = 'create-template'
  private readonly debug: Debugger

  constructor (
    private readonly config: CreateTemplateConfig,
    private readonly timestamps: TimestampSource = new TimestampSource()
  ) {
    this.debug = new Debugger('create-template')
  }

  async run (state: BuildState): Promise<StepAction> {
    const { ui, driver, serverUuid } = state
    if (!serverUuid) {
      return haltWithError(state, new StepError(
        StepErrorCode.MISSING_STATE,
        this.name,
        'No server to create templates from: serverUuid is not set'
      ))
    }

    let storage: StorageVolume
    try {
      storage = await driver.getServerStorage(serverUuid)
    } catch (error) {
      return this.halt(state, error)
    }
    this.debug.log(`Server ${serverUuid} uses storage ${storage.uuid}`)

    const cleanupStorageUuids: string[] = []
    const templates: Template[] = []
    state.cleanupStorageUuids = cleanupStorageUuids
    state.templates = templates

    const storageUuids = [storage.uuid]

    for (const zone of this.config.cloneZones) {
      ui.say(`Cloning storage "${storage.uuid}" to zone "${zone}"...`)
      const title = `${CLONE_TITLE_PREFIX}-${this.timestamps.next()}-cloned-disk1`
      try {
        const cloned = await driver.cloneStorage(storage.uuid, zone, title)
        storageUuids.push(cloned.uuid)
        cleanupStorageUuids.push(cloned.uuid)
        this.debug.log(`Cloned ${storage.uuid} to ${cloned.uuid} in ${zone}`)
      } catch (error) {
        return this.halt(state, error)
      }
    }
    if (this.config.cloneZones.length > 0) {
      ui.say('Cloning completed...')
    }

    const templateTitle = this.templateTitle()

    for (const uuid of storageUuids) {
      ui.say(`Creating template for storage "${uuid}"...`)
      try {
        const template = await driver.createTemplate(uuid, templateTitle)
        templates.push(template)
      } catch (error) {
        return this.halt(state, error)
      }
      ui.say(`Template for storage "${uuid}" created...`)
    }

    this.debug.log(`Created ${templates.length} template(s) titled ${templateTitle}`)
    return StepAction.CONTINUE
  }

  async cleanup (state: BuildState): Promise<void> {
    const storageUuids = state.cleanupStorageUuids
    if (!storageUuids) {
      return
    }

    for (const uuid of storageUuids) {
      state.ui.say(`Deleting storage "${uuid}"...`)
      try {
        await state.driver.deleteTemplate(uuid)
      } catch (error) {
        this.debug.log('error', `Failed to delete storage ${uuid}: ${errorMessage(error)}`)
        state.ui.error(errorMessage(error))
      }
    }
  }

  /**
   * Either `<prefix>-<timestamp>` or the fixed name; a prepared configuration
   * has exactly one of the two.
   */
  private templateTitle (): string {
    if (this.config.templatePrefix) {
      return `${this.config.templatePrefix}-${this.timestamps.next()}`
    }
    return this.config.templateName ?? ''
  }

  private halt (state: BuildState, error: unknown): StepAction {
    this.debug.log('error', errorMessage(error))
    return haltWithError(state, error instanceof Error ? error : new Error(String(error)))
  }
}
