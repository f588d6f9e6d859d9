/**
 * @switchyard/telemetry: TelemetryBuilder
 *
 * Chainable per-service telemetry configuration. `build()` initializes the
 * global providers once per process and hands back scoped instances;
 * `noop()` touches no global state and is what unit tests use.
 *
 * @example
 * ```ts
 * const telemetry = await new TelemetryBuilder('xds-reconciler')
 *   .withLogger({ level: 'debug' })
 *   .withMetrics()
 *   .withTracing({ samplingRatio: 0.1 })
 *   .build()
 * ```
 */

import { getLogger } from '@logtape/logtape'
import { trace, metrics } from '@opentelemetry/api'
import { ROOT_CATEGORY } from './constants.js'
import { initTelemetry } from './index.js'
import type {
  ServiceTelemetry,
  LoggerBuilderOpts,
  MetricsBuilderOpts,
  TracingBuilderOpts,
} from './types.js'

export class TelemetryBuilder {
  private readonly _serviceName: string
  private _loggerOpts: LoggerBuilderOpts | undefined
  private _metricsOpts: MetricsBuilderOpts | undefined
  private _tracingOpts: TracingBuilderOpts | undefined

  constructor(serviceName: string) {
    if (!serviceName || !serviceName.trim()) {
      throw new Error('serviceName must be a non-empty string')
    }
    this._serviceName = serviceName
  }

  withLogger(opts?: LoggerBuilderOpts): this {
    this._loggerOpts = opts ?? {}
    return this
  }

  withMetrics(opts?: MetricsBuilderOpts): this {
    this._metricsOpts = opts ?? {}
    return this
  }

  withTracing(opts?: TracingBuilderOpts): this {
    this._tracingOpts = opts ?? {}
    return this
  }

  /**
   * Initialize the global telemetry providers (if not already initialized)
   * and return a frozen `ServiceTelemetry`.
   */
  async build(): Promise<ServiceTelemetry> {
    await initTelemetry({
      serviceName: this._serviceName,
      logLevel: this._loggerOpts?.level,
      metricsExportIntervalMs: this._metricsOpts?.exportIntervalMs,
      samplingRatio: this._tracingOpts?.samplingRatio,
    })

    const category = this._loggerOpts?.category ?? [this._serviceName]
    return Object.freeze({
      serviceName: this._serviceName,
      logger: getLogger([ROOT_CATEGORY, ...category]),
      meter: metrics.getMeter(this._serviceName),
      tracer: trace.getTracer(this._serviceName),
    })
  }

  /**
   * Synchronously return a `ServiceTelemetry` backed by whatever providers
   * are registered, which outside `build()` are the API no-ops.
   */
  static noop(serviceName: string): ServiceTelemetry {
    return Object.freeze({
      serviceName,
      logger: getLogger([ROOT_CATEGORY, serviceName]),
      meter: metrics.getMeter(serviceName),
      tracer: trace.getTracer(serviceName),
    })
  }
}
