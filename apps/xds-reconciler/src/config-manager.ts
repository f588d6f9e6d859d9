import type { ProxyConfig } from '@switchyard/config'
import type { Logger } from '@logtape/logtape'
import { TelemetryBuilder } from '@switchyard/telemetry'
import type { ServiceTelemetry } from '@switchyard/telemetry'
import type { XdsReconciler } from './engine/reconciler.js'
import { OperationQueue } from './operation-queue.js'
import type { ProxyPortAllocator } from './ports/allocator.js'
import { bindListenerPorts } from './ports/binder.js'
import type { BindMode } from './ports/binder.js'
import { ResourceNormalizer } from './resources/normalizer.js'
import { scopeKey } from './resources/qualified-name.js'
import type { ConfigScope } from './resources/qualified-name.js'
import type { ResourceSet } from './resources/resource-set.js'
import type { ResourceKind } from './resources/types.js'
import type { ResourceValidator } from './resources/validator.js'

export interface ProxyConfigManagerOptions {
  reconciler: XdsReconciler
  allocator: ProxyPortAllocator
  proxy: ProxyConfig
  validator?: ResourceValidator
  telemetry?: ServiceTelemetry
}

export interface AppliedConfig {
  namespace: string
  name: string
  counts: Record<ResourceKind, number>
}

interface StoredConfig {
  scope: ConfigScope
  raw: unknown[]
  counts: Record<ResourceKind, number>
}

/**
 * Owns the last applied batch of every scope and turns each change into one
 * reconciliation: install for a new scope, update against the stored batch
 * otherwise, uninstall on removal. Operations run one at a time.
 *
 * The stored batch only changes when the reconciliation committed.
 */
export class ProxyConfigManager {
  private readonly reconciler: XdsReconciler
  private readonly allocator: ProxyPortAllocator
  private readonly proxy: ProxyConfig
  private readonly validator: ResourceValidator | undefined
  private readonly logger: Logger
  private readonly applied = new Map<string, StoredConfig>()
  private readonly queue = new OperationQueue()

  constructor(options: ProxyConfigManagerOptions) {
    this.reconciler = options.reconciler
    this.allocator = options.allocator
    this.proxy = options.proxy
    this.validator = options.validator
    this.logger = (options.telemetry ?? TelemetryBuilder.noop('xds-reconciler')).logger.getChild(
      'config'
    )
  }

  apply(scope: ConfigScope, raw: readonly unknown[], signal?: AbortSignal): Promise<void> {
    return this.queue.enqueue(() => this.applyNow(scope, raw, signal))
  }

  /** Uninstall a scope's batch. Resolves false when the scope holds nothing. */
  remove(scope: ConfigScope, signal?: AbortSignal): Promise<boolean> {
    return this.queue.enqueue(() => this.removeNow(scope, signal))
  }

  list(): AppliedConfig[] {
    return [...this.applied.values()].map(({ scope, counts }) => ({
      namespace: scope.namespace,
      name: scope.name,
      counts: { ...counts },
    }))
  }

  has(scope: ConfigScope): boolean {
    return this.applied.has(scopeKey(scope))
  }

  private async applyNow(
    scope: ConfigScope,
    raw: readonly unknown[],
    signal?: AbortSignal
  ): Promise<void> {
    const key = scopeKey(scope)
    const next = await this.prepare(scope, raw, 'install')
    const stored = this.applied.get(key)

    try {
      if (stored) {
        const previous = await this.prepare(scope, stored.raw, 'remove')
        if (previous.listenersAddedOrDeleted(next)) {
          this.logger.info`Listener membership of ${key} changes: ${previous.names('listener').length} -> ${next.names('listener').length}`
        }
        await this.reconciler.update(previous, next, signal)
      } else {
        await this.reconciler.install(next, signal)
      }
    } catch (err) {
      await this.releaseUncommitted(next)
      throw err
    }

    this.applied.set(key, { scope: { ...scope }, raw: structuredClone([...raw]), counts: next.counts() })
    this.logger.info`Applied ${key}: ${next.size} resource(s)`
  }

  private async removeNow(scope: ConfigScope, signal?: AbortSignal): Promise<boolean> {
    const key = scopeKey(scope)
    const stored = this.applied.get(key)
    if (!stored) return false

    const previous = await this.prepare(scope, stored.raw, 'remove')
    await this.reconciler.uninstall(previous, signal)
    this.applied.delete(key)
    this.logger.info`Removed ${key}`
    return true
  }

  private async prepare(
    scope: ConfigScope,
    raw: readonly unknown[],
    mode: BindMode
  ): Promise<ResourceSet> {
    const normalizer = new ResourceNormalizer({
      scope,
      filterNames: this.proxy.filterNames,
      enableBpfTproxy: this.proxy.enableBpfTproxy,
      useOriginalSourceAddress: this.proxy.useOriginalSourceAddress,
      l7LoadBalancer: this.proxy.l7LoadBalancer,
      xdsClusterName: this.proxy.xdsClusterName,
      validator: this.validator,
    })
    const set = normalizer.normalize(raw)
    await bindListenerPorts(set, this.allocator, {
      mode,
      ipv4Enabled: this.proxy.ipv4Enabled,
      ipv6Enabled: this.proxy.ipv6Enabled,
      validator: this.validator,
    })
    return set
  }

  /** Leases taken for a batch that never committed go back to the pool. */
  private async releaseUncommitted(set: ResourceSet): Promise<void> {
    for (const name of set.names('listener')) {
      if (this.allocator.getLease(name)?.state === 'allocated') {
        await this.allocator.release(name)
      }
    }
  }
}
