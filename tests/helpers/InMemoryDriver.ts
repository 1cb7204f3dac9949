import { Driver, StorageVolume, Template } from '../../src/types/driver.types'
import { Ui } from '../../src/types/pipeline.types'

export type DriverCall =
  | { op: 'getServerStorage', serverUuid: string }
  | { op: 'cloneStorage', storageUuid: string, zone: string, title: string }
  | { op: 'createTemplate', storageUuid: string, title: string }
  | { op: 'deleteTemplate', uuid: string }

/**
 * Driver keeping storages and templates in maps.
 *
 * Clones are numbered `clone-1`, `clone-2`, ... and templates `template-1`,
 * `template-2`, ... in creation order.
 */
export class InMemoryDriver implements Driver {
  readonly calls: DriverCall[] = []
  readonly storages = new Map<string, StorageVolume>()
  readonly templates = new Map<string, Template>()
  readonly servers = new Map<string, string>()

  /** Zones whose clone fails */
  failCloneZones = new Set<string>()
  /** Storage UUIDs whose templatize fails */
  failTemplateFor = new Set<string>()
  /** UUIDs whose deletion fails */
  failDeleteFor = new Set<string>()

  private cloneCount = 0
  private templateCount = 0

  addServer (serverUuid: string, storage: StorageVolume): void {
    this.servers.set(serverUuid, storage.uuid)
    this.storages.set(storage.uuid, storage)
  }

  async getServerStorage (serverUuid: string): Promise<StorageVolume> {
    this.calls.push({ op: 'getServerStorage', serverUuid })
    const storageUuid = this.servers.get(serverUuid)
    const storage = storageUuid ? this.storages.get(storageUuid) : undefined
    if (!storage) {
      throw new Error(`server ${serverUuid} not found`)
    }
    return storage
  }

  async cloneStorage (storageUuid: string, zone: string, title: string): Promise<StorageVolume> {
    this.calls.push({ op: 'cloneStorage', storageUuid, zone, title })
    if (this.failCloneZones.has(zone)) {
      throw new Error(`clone to ${zone} failed`)
    }
    this.cloneCount++
    const clone: StorageVolume = { uuid: `clone-${this.cloneCount}`, title, zone }
    this.storages.set(clone.uuid, clone)
    return clone
  }

  async createTemplate (storageUuid: string, title: string): Promise<Template> {
    this.calls.push({ op: 'createTemplate', storageUuid, title })
    if (this.failTemplateFor.has(storageUuid)) {
      throw new Error(`templatize of ${storageUuid} failed`)
    }
    this.templateCount++
    const template: Template = { uuid: `template-${this.templateCount}`, title }
    this.templates.set(template.uuid, template)
    return template
  }

  async deleteTemplate (uuid: string): Promise<void> {
    this.calls.push({ op: 'deleteTemplate', uuid })
    if (this.failDeleteFor.has(uuid)) {
      throw new Error(`delete of ${uuid} failed`)
    }
    this.storages.delete(uuid)
    this.templates.delete(uuid)
  }

  callsOf<K extends DriverCall['op']> (op: K): Array<Extract<DriverCall, { op: K }>> {
    return this.calls.filter((c): c is Extract<DriverCall, { op: K }> => c.op === op)
  }
}

/**
 * Ui collecting lines for assertions
 */
export class RecordingUi implements Ui {
  readonly said: string[] = []
  readonly errors: string[] = []

  say (message: string): void {
    this.said.push(message)
  }

  error (message: string): void {
    this.errors.push(message)
  }
}
