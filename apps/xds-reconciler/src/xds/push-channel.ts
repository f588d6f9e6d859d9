import type { Completion } from '../completion/barrier.js'
import type { ResourceByKind } from '../resources/schema.js'
import type { ResourceKind } from '../resources/types.js'

/** Reverses exactly one upsert or delete. */
export type RevertFunc = () => void

/** Per-resource outcome; `err` is set when the data plane rejected the change. */
export type ResultCallback = (err?: Error) => void

/**
 * Delivers resources to the data plane.
 *
 * Calls return as soon as the change is queued. The optional completion is
 * resolved when the data plane acknowledges or rejects the change, and
 * `onResult` is invoked at most once with the same outcome. A call that
 * leaves state unchanged resolves its completion at once and never invokes
 * `onResult`.
 */
export interface PushChannel {
  upsert<K extends ResourceKind>(
    kind: K,
    name: string,
    resource: ResourceByKind[K],
    completion?: Completion,
    onResult?: ResultCallback
  ): RevertFunc

  delete(
    kind: ResourceKind,
    name: string,
    completion?: Completion,
    onResult?: ResultCallback
  ): RevertFunc
}
