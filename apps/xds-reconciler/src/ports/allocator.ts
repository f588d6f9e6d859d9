import type { PortEntry } from '@switchyard/config'

export type LeaseState = 'allocated' | 'committed'

export interface PortLease {
  readonly name: string
  readonly port: number
  readonly ingress: boolean
  readonly localOnly: boolean
  state: LeaseState
}

export type AllocateResult = { success: true; port: number } | { success: false; error: string }

/**
 * Leases proxy ports to listeners that arrive without an address.
 *
 * `ack` and `release` are idempotent and succeed for names that hold no
 * lease, so a listener that is already gone never turns into an error.
 */
export interface ProxyPortAllocator {
  /** Lease a port for a listener. Idempotent: returns the existing lease's port. */
  allocate(name: string, ingress: boolean, localOnly: boolean): AllocateResult

  /** Confirm a lease after its listener was acknowledged by the proxy. */
  ack(name: string, signal?: AbortSignal): Promise<void>

  /** Return a lease's port to the pool. */
  release(name: string): Promise<void>

  getPort(name: string): number | undefined

  getLease(name: string): Readonly<PortLease> | undefined

  getAllocations(): ReadonlyMap<string, number>

  /** Number of ports remaining in the pool. */
  availableCount(): number
}

/**
 * Expand a PortEntry array into a flat list of individual port numbers.
 *
 * Single ports pass through unchanged. Tuple ranges [start, end] expand
 * into every integer from start to end inclusive.
 */
export function expandPortRange(entries: readonly PortEntry[]): number[] {
  const ports: number[] = []
  for (const entry of entries) {
    if (typeof entry === 'number') {
      ports.push(entry)
    } else {
      const [start, end] = entry
      for (let port = start; port <= end; port++) {
        ports.push(port)
      }
    }
  }
  return ports
}

/**
 * Create an in-memory port allocator over a PortEntry pool.
 *
 * Existing `name → port` leases (restart recovery) are reserved before any
 * new allocation and start out committed. Leases on ports outside the pool
 * are dropped.
 */
export function createPortAllocator(
  portRange: readonly PortEntry[],
  existing?: ReadonlyMap<string, number>
): ProxyPortAllocator {
  const pool = new Set<number>(expandPortRange(portRange))
  const available = new Set<number>(pool)
  const leases = new Map<string, PortLease>()

  if (existing) {
    for (const [name, port] of existing) {
      if (!pool.has(port)) continue
      leases.set(name, { name, port, ingress: false, localOnly: true, state: 'committed' })
      available.delete(port)
    }
  }

  return {
    allocate(name, ingress, localOnly) {
      const lease = leases.get(name)
      if (lease) {
        return { success: true, port: lease.port }
      }

      const next = available.values().next()
      if (next.done) {
        return { success: false, error: 'No ports available' }
      }

      const port = next.value
      available.delete(port)
      leases.set(name, { name, port, ingress, localOnly, state: 'allocated' })
      return { success: true, port }
    },

    async ack(name, signal) {
      signal?.throwIfAborted()
      const lease = leases.get(name)
      if (lease) lease.state = 'committed'
    },

    async release(name) {
      const lease = leases.get(name)
      if (!lease) return
      leases.delete(name)
      available.add(lease.port)
    },

    getPort(name) {
      return leases.get(name)?.port
    },

    getLease(name) {
      return leases.get(name)
    },

    getAllocations() {
      return new Map([...leases].map(([name, lease]) => [name, lease.port]))
    },

    availableCount() {
      return available.size
    },
  }
}
