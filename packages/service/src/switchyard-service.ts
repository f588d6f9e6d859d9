import type { SwitchyardConfig } from '@switchyard/config'
import type { ServiceTelemetry } from '@switchyard/telemetry'
import { TelemetryBuilder, shutdownTelemetry } from '@switchyard/telemetry'
import type { Hono } from 'hono'
import type {
  ISwitchyardService,
  ServiceInfo,
  ServiceState,
  SwitchyardServiceOptions,
} from './types.js'

/**
 * Abstract base class for Switchyard services.
 *
 * Owns config injection, telemetry setup and the
 * created → initializing → ready → shutting_down → stopped lifecycle.
 * Subclasses define `info` and `handler` and build their domain objects in
 * `onInitialize()`. The HTTP server is not owned here; wrap `handler` with
 * `switchyardHonoServer()`.
 *
 * @example
 * ```ts
 * const reconciler = await ReconcilerService.create({ config })
 * await switchyardHonoServer(reconciler.handler, { services: [reconciler] }).start()
 * ```
 */
export abstract class SwitchyardService implements ISwitchyardService {
  readonly config: SwitchyardConfig
  private _telemetry: ServiceTelemetry | undefined
  private _state: ServiceState = 'created'
  private readonly _prebuiltTelemetry: ServiceTelemetry | undefined

  abstract readonly info: ServiceInfo

  /** Hono route group with all service routes. Populated during onInitialize(). */
  abstract readonly handler: Hono

  protected constructor(options: SwitchyardServiceOptions) {
    this.config = options.config
    this._prebuiltTelemetry = options.telemetry
  }

  /** Telemetry context. Throws if accessed before initialize(). */
  get telemetry(): ServiceTelemetry {
    if (!this._telemetry) {
      throw new Error(
        `Service "${this.info.name}" not initialized. Call initialize() or use static create().`
      )
    }
    return this._telemetry
  }

  get state(): ServiceState {
    return this._state
  }

  async initialize(): Promise<void> {
    if (this._state !== 'created') {
      throw new Error(
        `Cannot initialize service "${this.info.name}" in state "${this._state}". Expected "created".`
      )
    }
    this._state = 'initializing'

    try {
      this._telemetry = this._prebuiltTelemetry ?? (await this.buildTelemetry())
      await this.onInitialize()

      this._state = 'ready'
      this.telemetry.logger.info`${this.info.name} v${this.info.version} initialized`
    } catch (err) {
      this._state = 'stopped'
      throw err
    }
  }

  async shutdown(): Promise<void> {
    if (this._state !== 'ready') return
    this._state = 'shutting_down'

    try {
      this.telemetry.logger.info`${this.info.name} shutting down`
      await this.onShutdown()
    } finally {
      if (!this._prebuiltTelemetry) {
        await shutdownTelemetry()
      }
      this._state = 'stopped'
    }
  }

  /**
   * Telemetry export is optional: a service whose exporters fail to start
   * keeps running on the no-op providers.
   */
  private async buildTelemetry(): Promise<ServiceTelemetry> {
    try {
      return await new TelemetryBuilder(this.info.name).withLogger().withMetrics().withTracing().build()
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err)
      console.warn(`[${this.info.name}] telemetry unavailable: ${message}`)
      return TelemetryBuilder.noop(this.info.name)
    }
  }

  /** App-specific async initialization. Called after telemetry is available. */
  protected async onInitialize(): Promise<void> {}

  /** App-specific shutdown logic. Called before telemetry shutdown. */
  protected async onShutdown(): Promise<void> {}

  /** Create and initialize a service in one call. */
  static async create<T extends SwitchyardService>(
    this: new (options: SwitchyardServiceOptions) => T,
    options: SwitchyardServiceOptions
  ): Promise<T> {
    const instance = new this(options)
    await instance.initialize()
    return instance
  }
}
