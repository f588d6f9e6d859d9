import { ValidationError } from '../errors.js'
import { resourceKey } from './schema.js'
import type { ResourceByKind } from './schema.js'
import type { ResourceKind } from './types.js'

/**
 * Per-kind semantic checks run after normalization (and again on listeners
 * after port binding). Returns the problems found; empty means valid.
 */
export interface ResourceValidator {
  check<K extends ResourceKind>(kind: K, resource: ResourceByKind[K]): string[]
}

export function validateResource<K extends ResourceKind>(
  validator: ResourceValidator,
  kind: K,
  resource: ResourceByKind[K]
): void {
  const problems = validator.check(kind, resource)
  if (problems.length > 0) {
    throw new ValidationError(kind, resourceKey(kind, resource), resource, problems.join('; '))
  }
}

const DURATION_RE = /^-?\d+(\.\d{1,9})?s$/

const CHECKS: { [K in ResourceKind]: (resource: ResourceByKind[K]) => string[] } = {
  listener(listener) {
    const problems: string[] = []
    const socket = listener.address?.socket_address
    if (socket && !socket.address) problems.push('address.socket_address.address is required')
    listener.filter_chains?.forEach((chain, i) => {
      chain.filters?.forEach((filter, j) => {
        if (!filter.name) problems.push(`filter_chains[${i}].filters[${j}].name is required`)
      })
    })
    listener.listener_filters?.forEach((filter, i) => {
      if (!filter.name) problems.push(`listener_filters[${i}].name is required`)
    })
    return problems
  },
  route(route) {
    const problems: string[] = []
    route.virtual_hosts?.forEach((vhost, i) => {
      if (!vhost.name) problems.push(`virtual_hosts[${i}].name is required`)
      if (!vhost.domains?.length) problems.push(`virtual_hosts[${i}].domains must not be empty`)
    })
    return problems
  },
  cluster(cluster) {
    const timeout = cluster.connect_timeout
    if (timeout !== undefined && (typeof timeout !== 'string' || !DURATION_RE.test(timeout))) {
      return ['connect_timeout must be a duration such as "0.25s"']
    }
    return []
  },
  endpoint() {
    return []
  },
  secret() {
    return []
  },
}

/** Structural checks Envoy itself would reject a resource for. */
export function createResourceValidator(): ResourceValidator {
  return {
    check(kind, resource) {
      return CHECKS[kind](resource)
    },
  }
}
