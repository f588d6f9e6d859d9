import { PortAllocationError } from '../errors.js'
import type { ResourceSet } from '../resources/resource-set.js'
import type { Address, AdditionalAddress, Listener } from '../resources/schema.js'
import { validateResource } from '../resources/validator.js'
import type { ResourceValidator } from '../resources/validator.js'
import type { ProxyPortAllocator } from './allocator.js'

/**
 * `install` binds a batch that is being added or is the new side of an
 * update: its callbacks commit leases. `remove` binds a batch that is being
 * removed or is the old side of an update: its callbacks release leases.
 */
export type BindMode = 'install' | 'remove'

export interface BindOptions {
  mode: BindMode
  ipv4Enabled: boolean
  ipv6Enabled: boolean
  validator?: ResourceValidator
}

export const IPV4_LOOPBACK = '127.0.0.1'
export const IPV6_LOOPBACK = '::1'

/**
 * Loopback addresses for every enabled family. IPv4 is primary when both
 * are enabled; the IPv6 address then goes to `additional_addresses`.
 */
export function localListenerAddresses(
  port: number,
  ipv4Enabled: boolean,
  ipv6Enabled: boolean
): { address: Address; additional: AdditionalAddress[] } {
  const addresses: Address[] = []
  if (ipv4Enabled) addresses.push({ socket_address: { address: IPV4_LOOPBACK, port_value: port } })
  if (ipv6Enabled) addresses.push({ socket_address: { address: IPV6_LOOPBACK, port_value: port } })
  const [address, ...rest] = addresses
  if (!address) throw new Error('At least one IP family must be enabled')
  return { address, additional: rest.map((extra) => ({ address: extra })) }
}

function needsAddress(listener: Listener): boolean {
  return listener.address === undefined && listener.internal_listener === undefined
}

/**
 * Leases a port for every listener that has no address and is not internal,
 * attaches loopback addresses and registers the lease callback on the set.
 *
 * All leases are resolved before the set is touched: on failure the set is
 * unchanged, leases created by this call are released again, and a
 * {@link PortAllocationError} is thrown.
 */
export async function bindListenerPorts(
  set: ResourceSet,
  allocator: ProxyPortAllocator,
  options: BindOptions
): Promise<void> {
  const pending = set.listeners.filter(needsAddress)
  const bound: { listener: Listener; name: string; port: number }[] = []
  const created: string[] = []

  for (const listener of pending) {
    const name = listener.name ?? ''
    const preexisting = allocator.getPort(name) !== undefined
    const result = allocator.allocate(name, false, true)
    if (result.success && !preexisting) created.push(name)

    if (!result.success || result.port === 0) {
      const reason = result.success ? 'allocator returned port 0' : result.error
      await Promise.all(created.map((leased) => allocator.release(leased)))
      throw new PortAllocationError(name, reason)
    }
    bound.push({ listener, name, port: result.port })
  }

  for (const { listener, name, port } of bound) {
    const { address, additional } = localListenerAddresses(
      port,
      options.ipv4Enabled,
      options.ipv6Enabled
    )
    listener.address = address
    if (additional.length > 0) listener.additional_addresses = additional

    set.setPortCallback(
      name,
      options.mode === 'install'
        ? (signal) => allocator.ack(name, signal)
        : () => allocator.release(name)
    )
  }

  if (options.validator) {
    for (const listener of set.listeners) {
      validateResource(options.validator, 'listener', listener)
    }
  }
}
