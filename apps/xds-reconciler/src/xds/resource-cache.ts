import { isDeepStrictEqual } from 'node:util'
import type { Completion } from '../completion/barrier.js'
import { PushRejectedError } from '../errors.js'
import type { ResourceByKind } from '../resources/schema.js'
import { RESOURCE_KINDS } from '../resources/types.js'
import type { ResourceKind } from '../resources/types.js'
import type { PushChannel, ResultCallback, RevertFunc } from './push-channel.js'

/** All resources of one kind at a given version. */
export interface KindSnapshot<K extends ResourceKind = ResourceKind> {
  version: number
  resources: ResourceByKind[K][]
}

export type XdsSnapshot = { [K in ResourceKind]: KindSnapshot<K> }

export type CacheWatcher = (kind: ResourceKind, version: number) => void

export interface XdsResourceCache extends PushChannel {
  get<K extends ResourceKind>(kind: K, name: string): ResourceByKind[K] | undefined

  list<K extends ResourceKind>(kind: K): ResourceByKind[K][]

  version(kind: ResourceKind): number

  /** Current resources and version of every kind. */
  getSnapshot(): XdsSnapshot

  /** Subscribe to version changes. Returns an unsubscribe function. */
  watch(callback: CacheWatcher): () => void

  /** The data plane accepted `version` of `kind`. */
  ack(kind: ResourceKind, version: number): void

  /** The data plane rejected `version` of `kind`. */
  nack(kind: ResourceKind, version: number, detail: string): void

  /** Changes still waiting for an acknowledgment. */
  pendingCount(kind?: ResourceKind): number
}

interface PendingChange {
  readonly id: number
  readonly version: number
  readonly name: string
  readonly completion?: Completion
  readonly onResult?: ResultCallback
}

interface KindState<K extends ResourceKind> {
  version: number
  resources: Map<string, ResourceByKind[K]>
  pending: PendingChange[]
}

type KindStates = { [K in ResourceKind]: KindState<K> }

function emptyState<K extends ResourceKind>(): KindState<K> {
  return { version: 0, resources: new Map(), pending: [] }
}

const noop: RevertFunc = () => {}

/**
 * Create an in-memory, versioned resource cache.
 *
 * Every effective change bumps the kind's version and notifies watchers
 * synchronously. Acknowledgments settle every pending change at or below
 * the acknowledged version.
 */
export function createResourceCache(): XdsResourceCache {
  const state: KindStates = {
    listener: emptyState(),
    route: emptyState(),
    cluster: emptyState(),
    endpoint: emptyState(),
    secret: emptyState(),
  }
  const watchers = new Set<CacheWatcher>()
  let nextId = 0

  function notify(kind: ResourceKind): void {
    const { version } = state[kind]
    for (const callback of watchers) {
      callback(kind, version)
    }
  }

  function write<K extends ResourceKind>(
    kind: K,
    name: string,
    resource: ResourceByKind[K] | undefined
  ): number {
    const entry: KindState<K> = state[kind]
    if (resource === undefined) entry.resources.delete(name)
    else entry.resources.set(name, resource)
    entry.version++
    notify(kind)
    return entry.version
  }

  function change<K extends ResourceKind>(
    kind: K,
    name: string,
    resource: ResourceByKind[K] | undefined,
    completion?: Completion,
    onResult?: ResultCallback
  ): RevertFunc {
    const entry: KindState<K> = state[kind]
    const previous = entry.resources.get(name)
    if (isDeepStrictEqual(previous, resource)) {
      completion?.resolve()
      return noop
    }

    const id = nextId++
    const version = write(kind, name, resource)
    entry.pending.push({ id, version, name, completion, onResult })

    let reverted = false
    return () => {
      if (reverted) return
      reverted = true
      entry.pending = entry.pending.filter((change) => change.id !== id)
      write(kind, name, previous)
    }
  }

  function settle(kind: ResourceKind, version: number, detail?: string): void {
    const entry = state[kind]
    const settled = entry.pending.filter((change) => change.version <= version)
    entry.pending = entry.pending.filter((change) => change.version > version)
    for (const change of settled) {
      const err =
        detail === undefined ? undefined : new PushRejectedError(kind, change.name, detail)
      change.completion?.resolve(err)
      change.onResult?.(err)
    }
  }

  function snapshotOf<K extends ResourceKind>(kind: K): KindSnapshot<K> {
    const entry: KindState<K> = state[kind]
    return { version: entry.version, resources: [...entry.resources.values()] }
  }

  return {
    upsert(kind, name, resource, completion, onResult) {
      return change(kind, name, structuredClone(resource), completion, onResult)
    },

    delete(kind, name, completion, onResult) {
      return change(kind, name, undefined, completion, onResult)
    },

    get<K extends ResourceKind>(kind: K, name: string) {
      const entry: KindState<K> = state[kind]
      return entry.resources.get(name)
    },

    list<K extends ResourceKind>(kind: K) {
      const entry: KindState<K> = state[kind]
      return [...entry.resources.values()]
    },

    version(kind) {
      return state[kind].version
    },

    getSnapshot() {
      return {
        listener: snapshotOf('listener'),
        route: snapshotOf('route'),
        cluster: snapshotOf('cluster'),
        endpoint: snapshotOf('endpoint'),
        secret: snapshotOf('secret'),
      }
    },

    watch(callback) {
      watchers.add(callback)
      return () => {
        watchers.delete(callback)
      }
    },

    ack(kind, version) {
      settle(kind, version)
    },

    nack(kind, version, detail) {
      settle(kind, version, detail)
    },

    pendingCount(kind) {
      const kinds: readonly ResourceKind[] = kind ? [kind] : RESOURCE_KINDS
      return kinds.reduce((total, k) => total + state[k].pending.length, 0)
    },
  }
}
