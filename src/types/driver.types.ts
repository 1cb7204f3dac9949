/**
 * Driver type definitions: the remote operations a build performs against
 * the cloud API, and the records they return.
 */

/** UpCloud API base URL */
export const DEFAULT_API_BASE_URL = 'https://api.upcloud.com/1.3'

/** Delay between storage state polls in milliseconds */
export const DEFAULT_POLL_INTERVAL_MS = 5000

/**
 * A disk known to the cloud API
 */
export interface StorageVolume {
  /** Storage UUID */
  uuid: string
  /** Storage title */
  title: string
  /** Zone the storage lives in (if reported) */
  zone?: string
  /** Size in gigabytes (if reported) */
  size?: number
}

/**
 * A private template created from a storage volume
 */
export interface Template {
  uuid: string
  title: string
  zone?: string
}

/**
 * Remote operations used by the template stage.
 *
 * Each call resolves with a definitive result or rejects; there is no
 * partial-result state.
 */
export interface Driver {
  /** Resolves the primary disk attached to a server */
  getServerStorage (serverUuid: string): Promise<StorageVolume>
  /** Clones a storage volume into another zone */
  cloneStorage (storageUuid: string, zone: string, title: string): Promise<StorageVolume>
  /** Creates a template from a storage volume */
  createTemplate (storageUuid: string, title: string): Promise<Template>
  /** Deletes a template or storage by UUID */
  deleteTemplate (uuid: string): Promise<void>
}

/**
 * Driver error codes for structured error handling
 */
export enum DriverErrorCode {
  /** The API answered with an error status */
  API_ERROR = 'API_ERROR',
  /** The server has no disk attached */
  STORAGE_NOT_FOUND = 'STORAGE_NOT_FOUND',
  /** The API answered with a body we cannot read */
  INVALID_RESPONSE = 'INVALID_RESPONSE',
  /** A resource did not reach the expected state in time */
  TIMEOUT = 'TIMEOUT'
}

/**
 * Error class for driver operations
 */
export class DriverError extends Error {
  /** Error code for programmatic handling */
  readonly code: DriverErrorCode
  /** Operation that failed, e.g. 'clone-storage' */
  readonly operation: string
  /** HTTP status code (API errors only) */
  readonly status?: number
  /** UpCloud error code such as STORAGE_NOT_FOUND (API errors only) */
  readonly apiErrorCode?: string

  constructor (
    code: DriverErrorCode,
    operation: string,
    message: string,
    details: { status?: number, apiErrorCode?: string } = {}
  ) {
    super(message)
    this.name = 'DriverError'
    this.code = code
    this.operation = operation
    this.status = details.status
    this.apiErrorCode = details.apiErrorCode
  }
}
