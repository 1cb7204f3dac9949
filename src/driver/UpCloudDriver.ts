/**
 * UpCloud Driver - storage and template operations over the UpCloud REST API
 *
 * @example
 * ```typescript
 * const driver = new UpCloudDriver({
 *   username: config.username,
 *   password: config.password,
 *   timeoutMs: config.timeoutMs
 * })
 *
 * const storage = await driver.getServerStorage(serverUuid)
 * const template = await driver.createTemplate(storage.uuid, 'web-20261019-120000')
 * ```
 */

import axios, { AxiosAdapter, AxiosInstance, AxiosRequestConfig } from 'axios'
import { z } from 'zod'
import { Debugger, errorMessage } from '../utils/debug'
import { formatDuration } from '../utils/duration'
import { pollUntil, PollTimeoutError } from '../utils/poll'
import {
  DEFAULT_API_BASE_URL,
  DEFAULT_POLL_INTERVAL_MS,
  Driver,
  DriverError,
  DriverErrorCode,
  StorageVolume,
  Template
} from '../types/driver.types'

/** Storage state in which a storage can be used again */
export const STORAGE_STATE_ONLINE = 'online'

export interface UpCloudDriverOptions {
  username: string
  password: string
  /** Upper bound for waiting on a storage state */
  timeoutMs: number
  /** Delay between state polls (default: 5000) */
  pollIntervalMs?: number
  /** API base URL (default: https://api.upcloud.com/1.3) */
  baseUrl?: string
  /** Custom axios adapter, used to serve requests in-process */
  adapter?: AxiosAdapter
}

const storageDeviceSchema = z.object({
  storage: z.string(),
  storage_title: z.string(),
  type: z.string(),
  storage_size: z.number().optional()
})

const serverResponseSchema = z.object({
  server: z.object({
    uuid: z.string(),
    zone: z.string().optional(),
    storage_devices: z.object({
      storage_device: z.array(storageDeviceSchema).optional()
    }).optional()
  })
})

const storageResponseSchema = z.object({
  storage: z.object({
    uuid: z.string(),
    title: z.string(),
    state: z.string(),
    zone: z.string().optional(),
    size: z.number().optional()
  })
})

const apiErrorSchema = z.object({
  error: z.object({
    error_code: z.string().optional(),
    error_message: z.string().optional()
  })
})

type ApiStorage = z.infer<typeof storageResponseSchema>['storage']

/**
 * Driver implementation backed by the UpCloud API.
 *
 * Clone and templatize calls return once the new storage is online, so
 * callers can chain operations on it right away.
 */
export class UpCloudDriver implements Driver {
  private readonly client: AxiosInstance
  private readonly debug: Debugger
  private readonly timeoutMs: number
  private readonly pollIntervalMs: number

  constructor (options: UpCloudDriverOptions) {
    this.debug = new Debugger('upcloud-driver')
    this.timeoutMs = options.timeoutMs
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS

    this.client = axios.create({
      baseURL: (options.baseUrl ?? DEFAULT_API_BASE_URL).replace(/\/$/, ''),
      auth: {
        username: options.username,
        password: options.password
      },
      headers: {
        Accept: 'application/json'
      },
      adapter: options.adapter
    })
  }

  async getServerStorage (serverUuid: string): Promise<StorageVolume> {
    const operation = 'get-server-storage'
    this.debug.log(`Fetching storage of server ${serverUuid}`)

    const data = await this.send(operation, `Failed to get details of server "${serverUuid}"`, {
      method: 'GET',
      url: `/server/${serverUuid}`
    })
    const { server } = this.parse(operation, serverResponseSchema, data)

    const disk = (server.storage_devices?.storage_device ?? []).find(d => d.type === 'disk')
    if (!disk) {
      throw new DriverError(
        DriverErrorCode.STORAGE_NOT_FOUND,
        operation,
        `Server "${serverUuid}" has no disk attached`
      )
    }

    return {
      uuid: disk.storage,
      title: disk.storage_title,
      ...(server.zone ? { zone: server.zone } : {}),
      ...(disk.storage_size !== undefined ? { size: disk.storage_size } : {})
    }
  }

  async cloneStorage (storageUuid: string, zone: string, title: string): Promise<StorageVolume> {
    const operation = 'clone-storage'
    this.debug.log(`Cloning storage ${storageUuid} to ${zone} as ${title}`)

    const data = await this.send(operation, `Failed to clone storage "${storageUuid}" to zone "${zone}"`, {
      method: 'POST',
      url: `/storage/${storageUuid}/clone`,
      data: { storage: { zone, title } }
    })
    const { storage } = this.parse(operation, storageResponseSchema, data)

    const online = await this.waitForOnline(storage.uuid)
    return toStorageVolume(online)
  }

  async createTemplate (storageUuid: string, title: string): Promise<Template> {
    const operation = 'create-template'
    this.debug.log(`Templatizing storage ${storageUuid} as ${title}`)

    const data = await this.send(operation, `Failed to create template from storage "${storageUuid}"`, {
      method: 'POST',
      url: `/storage/${storageUuid}/templatize`,
      data: { storage: { title } }
    })
    const { storage } = this.parse(operation, storageResponseSchema, data)

    const online = await this.waitForOnline(storage.uuid)
    return {
      uuid: online.uuid,
      title: online.title,
      ...(online.zone ? { zone: online.zone } : {})
    }
  }

  async deleteTemplate (uuid: string): Promise<void> {
    this.debug.log(`Deleting storage ${uuid}`)
    await this.send('delete-storage', `Failed to delete storage "${uuid}"`, {
      method: 'DELETE',
      url: `/storage/${uuid}`
    })
  }

  /**
   * Polls a storage until it is online.
   * @throws DriverError with code TIMEOUT when the state is not reached in time
   */
  private async waitForOnline (uuid: string): Promise<ApiStorage> {
    const operation = 'wait-for-storage'
    try {
      return await pollUntil(
        async () => {
          const data = await this.send(operation, `Failed to read state of storage "${uuid}"`, {
            method: 'GET',
            url: `/storage/${uuid}`
          })
          return this.parse(operation, storageResponseSchema, data).storage
        },
        storage => storage.state === STORAGE_STATE_ONLINE,
        { timeoutMs: this.timeoutMs, intervalMs: this.pollIntervalMs, debugNamespace: 'upcloud-driver:poll' }
      )
    } catch (error) {
      if (error instanceof PollTimeoutError) {
        throw new DriverError(
          DriverErrorCode.TIMEOUT,
          operation,
          `Storage "${uuid}" did not become ${STORAGE_STATE_ONLINE} within ${formatDuration(this.timeoutMs)}`
        )
      }
      throw error
    }
  }

  private async send (operation: string, description: string, config: AxiosRequestConfig): Promise<unknown> {
    try {
      const response = await this.client.request<unknown>(config)
      return response.data
    } catch (error) {
      const driverError = toDriverError(operation, description, error)
      this.debug.log('error', driverError.message)
      throw driverError
    }
  }

  private parse<S extends z.ZodTypeAny> (operation: string, schema: S, data: unknown): z.infer<S> {
    const parsed = schema.safeParse(data)
    if (!parsed.success) {
      const issue = parsed.error.issues[0]
      const where = issue && issue.path.length > 0 ? ` at '${issue.path.join('.')}'` : ''
      throw new DriverError(
        DriverErrorCode.INVALID_RESPONSE,
        operation,
        `Unexpected API response for ${operation}${where}: ${issue?.message ?? 'invalid body'}`
      )
    }
    return parsed.data
  }
}

function toStorageVolume (storage: ApiStorage): StorageVolume {
  return {
    uuid: storage.uuid,
    title: storage.title,
    ...(storage.zone ? { zone: storage.zone } : {}),
    ...(storage.size !== undefined ? { size: storage.size } : {})
  }
}

function toDriverError (operation: string, description: string, error: unknown): DriverError {
  if (axios.isAxiosError(error)) {
    const body = apiErrorSchema.safeParse(error.response?.data)
    const apiError = body.success ? body.data.error : undefined
    return new DriverError(
      DriverErrorCode.API_ERROR,
      operation,
      `${description}: ${apiError?.error_message ?? error.message}`,
      { status: error.response?.status, apiErrorCode: apiError?.error_code }
    )
  }
  return new DriverError(DriverErrorCode.API_ERROR, operation, `${description}: ${errorMessage(error)}`)
}
