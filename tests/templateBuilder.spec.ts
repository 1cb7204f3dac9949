/**
 * TemplateBuilder and TemplateArtifact tests
 *
 * Runs whole builds against the in-memory driver: upstream steps, template
 * creation, cleanup of intermediate clones, and the resulting artifact.
 */

import { TemplateBuilder } from '../src/builder/TemplateBuilder'
import { TemplateArtifact } from '../src/builder/TemplateArtifact'
import { loadConfig } from '../src/config/BuilderConfig'
import { BuildError, BuildState, Step, StepAction } from '../src/types/pipeline.types'
import { BuilderConfig } from '../src/types/config.types'
import { TimestampSource } from '../src/utils/timestamp'
import { InMemoryDriver, RecordingUi } from './helpers/InMemoryDriver'

function provisionStep (serverUuid: string): Step {
  return {
    name: 'provision',
    run: jest.fn(async (state: BuildState) => {
      state.serverUuid = serverUuid
      return StepAction.CONTINUE
    }),
    cleanup: jest.fn(async () => {})
  }
}

describe('TemplateBuilder', () => {
  let driver: InMemoryDriver
  let ui: RecordingUi
  let config: BuilderConfig
  const timestamps = (): TimestampSource => new TimestampSource(() => new Date(Date.UTC(2026, 9, 19, 12, 0, 0)))

  beforeEach(() => {
    driver = new InMemoryDriver()
    driver.addServer('server-1', { uuid: 'storage-original', title: 'build disk' })
    ui = new RecordingUi()
    config = loadConfig({
      username: 'api-user',
      password: 'test-secret',
      zone: 'fi-hel2',
      storage_uuid: '01000000-0000-4000-8000-000030200200',
      clone_zones: ['de-fra1'],
      template_prefix: 'web'
    }, { env: () => undefined })
  })

  it('returns an artifact with one template per storage', async () => {
    const builder = new TemplateBuilder(config, {
      ui,
      driver,
      steps: [provisionStep('server-1')],
      timestamps: timestamps()
    })

    const artifact = await builder.run()

    expect(artifact.id()).toBe('template-1,template-2')
    expect(artifact.toString()).toBe(
      'Private templates (2): web-20261019-120000-1 (template-1), web-20261019-120000-1 (template-2)'
    )
  })

  it('deletes the intermediate clones once the build succeeds', async () => {
    const builder = new TemplateBuilder(config, { ui, driver, steps: [provisionStep('server-1')] })

    await builder.run()

    expect(driver.callsOf('deleteTemplate').map(c => c.uuid)).toEqual(['clone-1'])
    expect(driver.storages.has('clone-1')).toBe(false)
    expect([...driver.templates.keys()]).toEqual(['template-1', 'template-2'])
  })

  it('throws a BuildError and cleans up every step when the build halts', async () => {
    driver.failTemplateFor.add('clone-1')
    const provision = provisionStep('server-1')
    const builder = new TemplateBuilder(config, { ui, driver, steps: [provision], timestamps: timestamps() })

    const error = await builder.run().catch((e: unknown) => e)

    if (!(error instanceof BuildError)) {
      throw new Error('expected a BuildError')
    }
    expect(error.message).toBe('Build failed: templatize of clone-1 failed')
    expect(error.cause).toBe(error.state.error)
    expect(error.state.templates).toEqual([{ uuid: 'template-1', title: 'web-20261019-120000-1' }])
    expect(provision.cleanup).toHaveBeenCalledTimes(1)
    expect(driver.callsOf('deleteTemplate').map(c => c.uuid)).toEqual(['clone-1'])
  })

  it('halts when no step provides a server', async () => {
    const builder = new TemplateBuilder(config, { ui, driver })

    await expect(builder.run()).rejects.toThrow('Build failed: No server to create templates from: serverUuid is not set')
    expect(driver.calls).toHaveLength(0)
  })
})

describe('TemplateArtifact', () => {
  let driver: InMemoryDriver

  beforeEach(() => {
    driver = new InMemoryDriver()
  })

  it('destroys every template', async () => {
    const artifact = new TemplateArtifact([
      { uuid: 'template-1', title: 'web' },
      { uuid: 'template-2', title: 'web' }
    ], driver)

    await artifact.destroy()

    expect(driver.callsOf('deleteTemplate').map(c => c.uuid)).toEqual(['template-1', 'template-2'])
  })

  it('attempts every template and lists the failures', async () => {
    driver.failDeleteFor.add('template-1')
    const artifact = new TemplateArtifact([
      { uuid: 'template-1', title: 'web' },
      { uuid: 'template-2', title: 'web' }
    ], driver)

    await expect(artifact.destroy()).rejects.toThrow('Failed to destroy 1 template(s): template-1: delete of template-1 failed')
    expect(driver.callsOf('deleteTemplate').map(c => c.uuid)).toEqual(['template-1', 'template-2'])
  })
})
