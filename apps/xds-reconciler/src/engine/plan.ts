import type { ResourceSet } from '../resources/resource-set.js'
import { resourceKey } from '../resources/schema.js'
import type { Listener, ResourceByKind } from '../resources/schema.js'
import type { ResourceKind } from '../resources/types.js'

/** Deletes remove dependents before the resources they reference. */
export const DELETE_ORDER = ['listener', 'route', 'cluster', 'endpoint', 'secret'] as const

/** Adds push dependencies before the resources that reference them. */
export const ADD_ORDER = ['secret', 'endpoint', 'cluster', 'route', 'listener'] as const

export interface PlannedAdd<K extends ResourceKind = ResourceKind> {
  kind: K
  name: string
  resource: ResourceByKind[K]
}

export interface PlannedDelete {
  kind: ResourceKind
  name: string
}

/**
 * Ordered operations for one batch. Every member of the new set is re-pushed;
 * the push channel drops unchanged content.
 */
export interface ReconcilePlan {
  deletes: PlannedDelete[]
  adds: PlannedAdd[]
  /** A listener changes port, so deletes must be acknowledged before any add. */
  waitForDelete: boolean
  /** Listeners in both sets on the same port. Their new-set callbacks must not run. */
  retainedListeners: string[]
}

/** Only a new incarnation bound to a socket address can move ports. */
function portChanged(old: Listener, next: Listener): boolean {
  const socket = next.address?.socket_address
  if (!socket) return false
  return (old.address?.socket_address?.port_value ?? 0) !== (socket.port_value ?? 0)
}

function keyed<K extends ResourceKind>(set: ResourceSet, kind: K): Map<string, ResourceByKind[K]> {
  return new Map(set.list(kind).map((resource) => [resourceKey(kind, resource), resource]))
}

function addsOf<K extends ResourceKind>(set: ResourceSet, kind: K): PlannedAdd[] {
  return set.list(kind).map((resource): PlannedAdd<K> => ({
    kind,
    name: resourceKey(kind, resource),
    resource,
  }))
}

/**
 * Diff two sets per kind. Keys only in `previous` are deleted, everything in
 * `next` is added. A listener whose bound port changed is deleted and added.
 */
export function planReconcile(previous: ResourceSet, next: ResourceSet): ReconcilePlan {
  const deletes: PlannedDelete[] = []
  const adds: PlannedAdd[] = []
  const retainedListeners: string[] = []
  let waitForDelete = false

  for (const kind of DELETE_ORDER) {
    const upcoming = new Set(next.names(kind))
    for (const name of previous.names(kind)) {
      if (!upcoming.has(name)) deletes.push({ kind, name })
    }
  }

  const previousListeners = keyed(previous, 'listener')
  for (const [name, listener] of keyed(next, 'listener')) {
    const old = previousListeners.get(name)
    if (!old) continue
    if (portChanged(old, listener)) {
      deletes.push({ kind: 'listener', name })
      waitForDelete = true
    } else {
      retainedListeners.push(name)
    }
  }
  // Port-changing listener deletes still go first.
  deletes.sort((a, b) => DELETE_ORDER.indexOf(a.kind) - DELETE_ORDER.indexOf(b.kind))

  for (const kind of ADD_ORDER) {
    adds.push(...addsOf(next, kind))
  }

  return { deletes, adds, waitForDelete, retainedListeners }
}
