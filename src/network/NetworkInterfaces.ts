import { z } from 'zod'
import {
  CreateServerInterface,
  CreateServerIPAddress,
  DEFAULT_NETWORKING,
  INTERFACE_TYPES,
  IP_ADDRESS_FAMILIES
} from '../types/network.types'

export const rawIPAddressSchema = z.object({
  family: z.enum(IP_ADDRESS_FAMILIES).optional(),
  address: z.string().optional()
}).strict()

export const rawNetworkInterfaceSchema = z.object({
  type: z.enum(INTERFACE_TYPES),
  network: z.string().optional(),
  ip_addresses: z.array(rawIPAddressSchema).optional()
}).strict()

export type RawIPAddress = z.infer<typeof rawIPAddressSchema>

export type RawNetworkInterface = z.infer<typeof rawNetworkInterfaceSchema>

/**
 * Converts configured interfaces into create-server request entries.
 *
 * Falls back to DEFAULT_NETWORKING when nothing is configured. Families
 * default to IPv4 and an interface listing no addresses gets one IPv4 entry.
 */
export function convertNetworkInterfaces (raw: RawNetworkInterface[] | undefined): CreateServerInterface[] {
  if (!raw || raw.length === 0) {
    return DEFAULT_NETWORKING.map(iface => ({
      ...iface,
      ipAddresses: iface.ipAddresses.map(ip => ({ ...ip }))
    }))
  }

  return raw.map(iface => {
    const addresses: RawIPAddress[] = iface.ip_addresses && iface.ip_addresses.length > 0
      ? iface.ip_addresses
      : [{}]
    const converted: CreateServerInterface = {
      type: iface.type,
      ipAddresses: addresses.map((ip): CreateServerIPAddress => ({
        family: ip.family ?? 'IPv4',
        ...(ip.address ? { address: ip.address } : {})
      }))
    }
    if (iface.network) {
      converted.network = iface.network
    }
    return converted
  })
}

/**
 * Checks what the schema cannot express per entry.
 * @returns one message per violation
 */
export function validateNetworkInterfaces (raw: RawNetworkInterface[] | undefined): string[] {
  const errors: string[] = []
  ;(raw ?? []).forEach((iface, index) => {
    if (iface.type === 'private' && !iface.network) {
      errors.push(`network_interfaces[${index}]: 'network' is required for private interfaces`)
    }
  })
  return errors
}
