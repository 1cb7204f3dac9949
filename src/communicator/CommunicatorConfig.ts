/**
 * Communicator sub-configuration
 * @module communicator/CommunicatorConfig
 */

import { z } from 'zod'
import { parseDuration } from '../utils/duration'
import {
  CommunicatorConfig,
  DEFAULT_SSH_PORT,
  DEFAULT_SSH_TIMEOUT,
  DEFAULT_SSH_USERNAME
} from '../types/config.types'

/** Keys the communicator reads from the flat builder configuration */
export const rawCommunicatorShape = {
  communicator: z.enum(['ssh', 'none']).optional(),
  ssh_username: z.string().optional(),
  ssh_port: z.number().int().optional(),
  ssh_timeout: z.string().optional(),
  ssh_host: z.string().optional()
}

const rawCommunicatorSchema = z.object(rawCommunicatorShape)

export type RawCommunicatorConfig = z.infer<typeof rawCommunicatorSchema>

/**
 * Applies communicator defaults and validates the result.
 * SSH checks only apply when the communicator is 'ssh'.
 */
export function prepareCommunicator (raw: RawCommunicatorConfig): { config: CommunicatorConfig, errors: string[] } {
  const errors: string[] = []
  const type = raw.communicator ?? 'ssh'
  const sshUsername = raw.ssh_username || DEFAULT_SSH_USERNAME
  const sshPort = raw.ssh_port || DEFAULT_SSH_PORT
  const sshTimeout = raw.ssh_timeout || DEFAULT_SSH_TIMEOUT
  const sshTimeoutMs = parseDuration(sshTimeout)

  if (type === 'ssh') {
    if (sshUsername.trim() === '') {
      errors.push("'ssh_username' must be specified")
    }
    if (sshPort < 1 || sshPort > 65535) {
      errors.push(`'ssh_port' must be between 1 and 65535, got ${sshPort}`)
    }
    if (sshTimeoutMs === null) {
      errors.push(`'ssh_timeout' is not a valid duration: "${sshTimeout}"`)
    }
  }

  const config: CommunicatorConfig = {
    type,
    sshUsername,
    sshPort,
    sshTimeoutMs: sshTimeoutMs ?? 0
  }
  if (raw.ssh_host) {
    config.sshHost = raw.ssh_host
  }
  return { config, errors }
}
