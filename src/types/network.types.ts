/**
 * Network-related type definitions for the interfaces a build server is
 * created with.
 */

/** Interface types accepted by the server API */
export const INTERFACE_TYPES = ['public', 'private', 'utility'] as const

/** IP address families accepted by the server API */
export const IP_ADDRESS_FAMILIES = ['IPv4', 'IPv6'] as const

export type InterfaceType = typeof INTERFACE_TYPES[number]

export type IPAddressFamily = typeof IP_ADDRESS_FAMILIES[number]

/**
 * IP address entry of a server interface request
 */
export interface CreateServerIPAddress {
  family: IPAddressFamily
  /** Fixed address (optional, assigned by the API when absent) */
  address?: string
}

/**
 * Interface entry of a create-server request
 */
export interface CreateServerInterface {
  type: InterfaceType
  /** Network UUID (required for private interfaces) */
  network?: string
  ipAddresses: CreateServerIPAddress[]
}

/**
 * Networking used when the configuration names no interfaces:
 * a single public IPv4 interface.
 */
export const DEFAULT_NETWORKING: readonly CreateServerInterface[] = [
  {
    type: 'public',
    ipAddresses: [{ family: 'IPv4' }]
  }
]
