import { DuplicateNameError, MissingNameError } from '../errors.js'
import { resourceKey } from './schema.js'
import type { Listener, ResourceByKind } from './schema.js'
import { RESOURCE_KINDS, TYPE_URLS } from './types.js'
import type { RawResource, ResourceKind } from './types.js'

/**
 * One-shot lifecycle hook bound to a listener whose address was leased for
 * this batch: commits the lease after an acknowledged install, or releases
 * it after an acknowledged removal.
 */
export type PortCallback = (signal: AbortSignal) => Promise<void>

type Collections = { [K in ResourceKind]: ResourceByKind[K][] }

/**
 * Canonical container for one normalized batch. Names are unique per kind;
 * endpoints are keyed by `cluster_name`.
 */
export class ResourceSet {
  private readonly collections: Collections = {
    listener: [],
    route: [],
    cluster: [],
    endpoint: [],
    secret: [],
  }
  private readonly portCallbacks = new Map<string, PortCallback>()

  static empty(): ResourceSet {
    return new ResourceSet()
  }

  add<K extends ResourceKind>(kind: K, resource: ResourceByKind[K]): void {
    const name = resourceKey(kind, resource)
    if (!name) throw new MissingNameError(kind)
    if (this.has(kind, name)) throw new DuplicateNameError(kind, name)
    this.collections[kind].push(resource)
  }

  list<K extends ResourceKind>(kind: K): readonly ResourceByKind[K][] {
    return this.collections[kind]
  }

  get<K extends ResourceKind>(kind: K, name: string): ResourceByKind[K] | undefined {
    return this.collections[kind].find((resource) => resourceKey(kind, resource) === name)
  }

  has(kind: ResourceKind, name: string): boolean {
    return this.get(kind, name) !== undefined
  }

  names(kind: ResourceKind): string[] {
    return this.list(kind).map((resource) => resourceKey(kind, resource))
  }

  get listeners(): readonly Listener[] {
    return this.collections.listener
  }

  get size(): number {
    return RESOURCE_KINDS.reduce((total, kind) => total + this.collections[kind].length, 0)
  }

  /** Per-kind counts, for logging. */
  counts(): Record<ResourceKind, number> {
    return {
      listener: this.collections.listener.length,
      route: this.collections.route.length,
      cluster: this.collections.cluster.length,
      endpoint: this.collections.endpoint.length,
      secret: this.collections.secret.length,
    }
  }

  // --- Port lifecycle callbacks ---

  setPortCallback(listenerName: string, callback: PortCallback): void {
    this.portCallbacks.set(listenerName, callback)
  }

  hasPortCallback(listenerName: string): boolean {
    return this.portCallbacks.has(listenerName)
  }

  /** Remove and return the callback, so it can be invoked at most once. */
  takePortCallback(listenerName: string): PortCallback | undefined {
    const callback = this.portCallbacks.get(listenerName)
    this.portCallbacks.delete(listenerName)
    return callback
  }

  dropPortCallback(listenerName: string): boolean {
    return this.portCallbacks.delete(listenerName)
  }

  // --- Comparison and rendering ---

  /** Whether moving from this set to `next` adds or removes any listener by name. */
  listenersAddedOrDeleted(next: ResourceSet): boolean {
    const current = new Set(this.names('listener'))
    const upcoming = next.names('listener')
    if (upcoming.some((name) => !current.has(name))) return true
    const upcomingSet = new Set(upcoming)
    return [...current].some((name) => !upcomingSet.has(name))
  }

  /** Render back to tagged JSON, in kind order. */
  toRaw(): RawResource[] {
    const raw: RawResource[] = []
    for (const kind of RESOURCE_KINDS) {
      for (const resource of this.collections[kind]) {
        raw.push({ '@type': TYPE_URLS[kind], ...structuredClone(resource) })
      }
    }
    return raw
  }
}
