/**
 * Configuration Type Definitions
 *
 * Normalized builder configuration, its defaults, and the errors produced
 * while preparing it from raw input.
 *
 * @module types/config
 */

import { CreateServerInterface } from './network.types'

// =============================================================================
// Defaults
// =============================================================================

/** Template prefix used when neither a prefix nor a name is configured */
export const DEFAULT_TEMPLATE_PREFIX = 'custom-image'

/** SSH username used when none is configured */
export const DEFAULT_SSH_USERNAME = 'root'

/** Storage size in gigabytes */
export const DEFAULT_STORAGE_SIZE = 25

/** State timeout in milliseconds (5 minutes) */
export const DEFAULT_TIMEOUT_MS = 5 * 60 * 1000

/** SSH port */
export const DEFAULT_SSH_PORT = 22

/** SSH connect timeout */
export const DEFAULT_SSH_TIMEOUT = '5m'

/** Upper bound for template_prefix and template_name */
export const MAX_TEMPLATE_TITLE_LENGTH = 40

/** Environment variable consulted when `username` is empty */
export const ENV_API_USER = 'UPCLOUD_API_USER'

/** Environment variable consulted when `password` is empty */
export const ENV_API_PASSWORD = 'UPCLOUD_API_PASSWORD'

// =============================================================================
// Normalized configuration
// =============================================================================

export type CommunicatorType = 'ssh' | 'none'

/**
 * How the build talks to the server once it is up
 */
export interface CommunicatorConfig {
  type: CommunicatorType
  sshUsername: string
  sshPort: number
  sshTimeoutMs: number
  sshHost?: string
}

/**
 * Fully prepared builder configuration.
 *
 * Exactly one of `templatePrefix` and `templateName` is set.
 */
export interface BuilderConfig {
  /** API username */
  username: string
  /** API password */
  password: string
  /** Zone the build server runs in */
  zone: string
  /** Source storage (template) UUID */
  storageUuid?: string
  /** Source storage (template) name */
  storageName?: string
  templatePrefix?: string
  templateName?: string
  /** Build server disk size in gigabytes */
  storageSize: number
  /** How long to wait for a resource to reach a state */
  timeoutMs: number
  /** Zones to replicate the template into, in order */
  cloneZones: string[]
  /** Interfaces for the build server */
  networking: CreateServerInterface[]
  sshPrivateKeyPath?: string
  sshPublicKeyPath?: string
  sshPrivateKey?: Buffer
  sshPublicKey?: Buffer
  communicator: CommunicatorConfig
}

// =============================================================================
// Preparation
// =============================================================================

/** Looks up an environment variable */
export type EnvLookup = (name: string) => string | undefined

/**
 * Collaborators used while preparing a configuration
 */
export interface PrepareOptions {
  /** Environment lookup (default: process.env) */
  env?: EnvLookup
  /** Reads a key file (default: fs.readFileSync) */
  readFile?: (path: string) => Buffer
}

export type PrepareResult =
  | { ok: true, config: BuilderConfig }
  | { ok: false, errors: string[] }

/**
 * Error thrown when a configuration does not prepare.
 * Carries every validation message, not just the first.
 */
export class ConfigError extends Error {
  readonly errors: string[]

  constructor (errors: string[]) {
    super(`${errors.length} error(s) occurred:\n${errors.map(e => `* ${e}`).join('\n')}`)
    this.name = 'ConfigError'
    this.errors = errors
  }
}
