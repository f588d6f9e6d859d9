import { Hono } from 'hono'
import { SwitchyardService } from '@switchyard/service'
import type { SwitchyardServiceOptions } from '@switchyard/service'
import { ProxyConfigManager } from './config-manager.js'
import { XdsReconciler } from './engine/reconciler.js'
import { createPortAllocator } from './ports/allocator.js'
import type { ProxyPortAllocator } from './ports/allocator.js'
import { createResourceValidator } from './resources/validator.js'
import { ConfigRpcServer, createRpcHandler } from './rpc/server.js'
import { createResourceCache } from './xds/resource-cache.js'
import type { XdsResourceCache } from './xds/resource-cache.js'
import { createRestXdsHandler } from './xds/rest-xds.js'

/**
 * Wires the reconciliation pipeline behind HTTP: config RPC under `/rpc`,
 * REST-JSON xDS for the proxy under `/v3`.
 */
export class ReconcilerService extends SwitchyardService {
  readonly info = { name: 'xds-reconciler', version: '0.0.0' }
  readonly handler = new Hono()
  private _cache: XdsResourceCache | undefined
  private _allocator: ProxyPortAllocator | undefined
  private _manager: ProxyConfigManager | undefined

  constructor(options: SwitchyardServiceOptions) {
    super(options)
  }

  get cache(): XdsResourceCache {
    if (!this._cache) throw new Error('ReconcilerService not initialized')
    return this._cache
  }

  get manager(): ProxyConfigManager {
    if (!this._manager) throw new Error('ReconcilerService not initialized')
    return this._manager
  }

  protected override async onInitialize(): Promise<void> {
    const { proxy } = this.config
    const cache = createResourceCache()
    const allocator = createPortAllocator(proxy.portRange)
    const reconciler = new XdsReconciler({
      channel: cache,
      ackTimeoutMs: proxy.ackTimeoutMs,
      telemetry: this.telemetry,
    })
    const manager = new ProxyConfigManager({
      reconciler,
      allocator,
      proxy,
      validator: proxy.validateResources ? createResourceValidator() : undefined,
      telemetry: this.telemetry,
    })

    this._cache = cache
    this._allocator = allocator
    this._manager = manager

    const rpcServer = new ConfigRpcServer({ manager, telemetry: this.telemetry })
    this.handler.get('/', (c) => c.text('Switchyard xDS reconciler is running.'))
    this.telemetry.logger
      .warn`RPC endpoint /rpc has no authentication, restrict network access in production`
    this.handler.route('/rpc', createRpcHandler(rpcServer))
    this.handler.route('/', createRestXdsHandler({ cache, telemetry: this.telemetry }))
    this.telemetry.logger
      .info`Proxy port pool holds ${allocator.availableCount()} port(s) for node ${this.config.node.name}`
  }

  protected override async onShutdown(): Promise<void> {
    const leases = this._allocator?.getAllocations().size ?? 0
    this.telemetry.logger.info`Shutting down with ${leases} leased proxy port(s)`
  }
}
