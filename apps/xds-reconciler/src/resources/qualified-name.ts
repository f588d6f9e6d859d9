/**
 * Owning scope of a resource batch. Every resource name and cross-reference
 * in the batch is rewritten to `namespace/name/<resource>`.
 */
export interface ConfigScope {
  namespace: string
  name: string
}

export interface QualifiedName {
  name: string
  /** False when the input was returned as is. */
  updated: boolean
}

/**
 * Scope a resource name unless it is empty or already contains a `/`.
 *
 * Used for references that may legitimately point at another scope's
 * resource (clusters, endpoints, secrets).
 */
export function qualifyName(scope: ConfigScope, resourceName: string): QualifiedName {
  if (resourceName === '' || resourceName.includes('/')) {
    return { name: resourceName, updated: false }
  }
  return { name: prefixed(scope, resourceName), updated: true }
}

/**
 * Scope a resource name unless it is empty or already scoped by this
 * namespace. A name scoped by a different namespace is prefixed again.
 *
 * Used for names that must always belong to the owning batch (listeners,
 * route configurations, virtual hosts).
 */
export function qualifyNameForced(scope: ConfigScope, resourceName: string): QualifiedName {
  const idx = resourceName.indexOf('/')
  if (
    resourceName === '' ||
    (idx >= 0 && idx === scope.namespace.length && resourceName.startsWith(scope.namespace))
  ) {
    return { name: resourceName, updated: false }
  }
  return { name: prefixed(scope, resourceName), updated: true }
}

function prefixed(scope: ConfigScope, resourceName: string): string {
  return `${scope.namespace}/${scope.name}/${resourceName}`
}

export function scopeKey(scope: ConfigScope): string {
  return `${scope.namespace}/${scope.name}`
}
