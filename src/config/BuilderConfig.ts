/**
 * Builder configuration: decoding, defaulting and validation
 * @module config/BuilderConfig
 *
 * @example
 * ```typescript
 * const result = prepareConfig(JSON.parse(raw), { env: name => process.env[name] })
 * if (!result.ok) {
 *   result.errors.forEach(e => console.error(e))
 * }
 * ```
 */

import * as fs from 'fs'
import { z } from 'zod'
import { Debugger, errorMessage } from '../utils/debug'
import { parseDuration } from '../utils/duration'
import { prepareCommunicator, rawCommunicatorShape } from '../communicator/CommunicatorConfig'
import {
  convertNetworkInterfaces,
  rawNetworkInterfaceSchema,
  validateNetworkInterfaces
} from '../network/NetworkInterfaces'
import {
  BuilderConfig,
  ConfigError,
  DEFAULT_STORAGE_SIZE,
  DEFAULT_TEMPLATE_PREFIX,
  DEFAULT_TIMEOUT_MS,
  ENV_API_PASSWORD,
  ENV_API_USER,
  MAX_TEMPLATE_TITLE_LENGTH,
  PrepareOptions,
  PrepareResult
} from '../types/config.types'

export const rawBuilderConfigSchema = z.object({
  username: z.string().optional(),
  password: z.string().optional(),
  zone: z.string().optional(),
  storage_uuid: z.string().optional(),
  storage_name: z.string().optional(),
  template_prefix: z.string().optional(),
  template_name: z.string().optional(),
  storage_size: z.number().int().nonnegative().optional(),
  state_timeout_duration: z.string().optional(),
  clone_zones: z.array(z.string().min(1)).optional(),
  network_interfaces: z.array(rawNetworkInterfaceSchema).optional(),
  ssh_private_key_path: z.string().optional(),
  ssh_public_key_path: z.string().optional(),
  ...rawCommunicatorShape
}).strict()

export type RawBuilderConfig = z.infer<typeof rawBuilderConfigSchema>

const debug = new Debugger('config')

function formatIssue (issue: z.ZodIssue): string {
  if (issue.path.length === 0) {
    return issue.message
  }
  return `'${issue.path.join('.')}': ${issue.message}`
}

/**
 * Prepares a builder configuration from raw input.
 *
 * Every violation is collected; a result is either a complete configuration
 * or the full list of messages. Nothing here talks to the API.
 *
 * @param raw - Decoded configuration, usually parsed JSON
 * @param options - Environment and file-system collaborators
 */
export function prepareConfig (raw: unknown, options: PrepareOptions = {}): PrepareResult {
  const env = options.env ?? ((name: string) => process.env[name])
  const readFile = options.readFile ?? ((path: string) => fs.readFileSync(path))

  const parsed = rawBuilderConfigSchema.safeParse(raw ?? {})
  if (!parsed.success) {
    const errors = parsed.error.issues.map(formatIssue)
    debug.log('error', `Configuration could not be decoded: ${errors.join('; ')}`)
    return { ok: false, errors }
  }
  const input = parsed.data

  // explicit values win over the environment
  const username = input.username || env(ENV_API_USER) || ''
  const password = input.password || env(ENV_API_PASSWORD) || ''
  const zone = input.zone ?? ''
  const storageUuid = input.storage_uuid ?? ''
  const storageName = input.storage_name ?? ''

  const templateName = input.template_name ?? ''
  let templatePrefix = input.template_prefix ?? ''
  if (templatePrefix === '' && templateName === '') {
    templatePrefix = DEFAULT_TEMPLATE_PREFIX
  }

  const storageSize = input.storage_size || DEFAULT_STORAGE_SIZE
  const networking = convertNetworkInterfaces(input.network_interfaces)
  const communicator = prepareCommunicator(input)

  const errors: string[] = [...communicator.errors]

  if (username === '') {
    errors.push("'username' must be specified")
  }

  if (password === '') {
    errors.push("'password' must be specified")
  }

  if (zone === '') {
    errors.push("'zone' must be specified")
  }

  if (storageUuid === '' && storageName === '') {
    errors.push("'storage_uuid' or 'storage_name' must be specified")
  }

  let sshPrivateKey: Buffer | undefined
  if (input.ssh_private_key_path) {
    try {
      sshPrivateKey = readFile(input.ssh_private_key_path)
    } catch (error) {
      errors.push(`Failed to read private key: ${errorMessage(error)}`)
    }
  }

  let sshPublicKey: Buffer | undefined
  if (input.ssh_public_key_path) {
    try {
      sshPublicKey = readFile(input.ssh_public_key_path)
    } catch (error) {
      errors.push(`Failed to read public key: ${errorMessage(error)}`)
    }
  }

  if (templatePrefix.length > MAX_TEMPLATE_TITLE_LENGTH) {
    errors.push(`'template_prefix' must be 0-${MAX_TEMPLATE_TITLE_LENGTH} characters`)
  }

  if (templateName.length > MAX_TEMPLATE_TITLE_LENGTH) {
    errors.push(`'template_name' is limited to ${MAX_TEMPLATE_TITLE_LENGTH} characters`)
  }

  if (templatePrefix.length > 0 && templateName.length > 0) {
    errors.push("you can either use 'template_prefix' or 'template_name' in your configuration")
  }

  let timeoutMs = DEFAULT_TIMEOUT_MS
  if (input.state_timeout_duration) {
    const parsedTimeout = parseDuration(input.state_timeout_duration)
    if (parsedTimeout === null) {
      errors.push(`'state_timeout_duration' is not a valid duration: "${input.state_timeout_duration}"`)
    } else if (parsedTimeout > 0) {
      timeoutMs = parsedTimeout
    }
  }

  errors.push(...validateNetworkInterfaces(input.network_interfaces))

  if (errors.length > 0) {
    debug.log('error', `Configuration has ${errors.length} error(s)`)
    return { ok: false, errors }
  }

  const config: BuilderConfig = {
    username,
    password,
    zone,
    storageSize,
    timeoutMs,
    cloneZones: [...(input.clone_zones ?? [])],
    networking,
    communicator: communicator.config
  }
  if (storageUuid !== '') config.storageUuid = storageUuid
  if (storageName !== '') config.storageName = storageName
  if (templatePrefix !== '') config.templatePrefix = templatePrefix
  if (templateName !== '') config.templateName = templateName
  if (input.ssh_private_key_path) config.sshPrivateKeyPath = input.ssh_private_key_path
  if (input.ssh_public_key_path) config.sshPublicKeyPath = input.ssh_public_key_path
  if (sshPrivateKey) config.sshPrivateKey = sshPrivateKey
  if (sshPublicKey) config.sshPublicKey = sshPublicKey

  debug.log(`Configuration prepared for zone ${zone} with ${config.cloneZones.length} clone zone(s)`)
  return { ok: true, config }
}

/**
 * Prepares a configuration or throws.
 * @throws ConfigError listing every validation message
 */
export function loadConfig (raw: unknown, options: PrepareOptions = {}): BuilderConfig {
  const result = prepareConfig(raw, options)
  if (!result.ok) {
    throw new ConfigError(result.errors)
  }
  return result.config
}
