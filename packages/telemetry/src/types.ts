/**
 * @switchyard/telemetry: Shared type definitions
 */

import type { Logger } from '@logtape/logtape'
import type { Meter, Tracer } from '@opentelemetry/api'
import type { LogLevel } from './constants.js'

/**
 * Immutable telemetry context bag injected into service constructors.
 *
 * Produced by `TelemetryBuilder.build()` or `TelemetryBuilder.noop()`.
 */
export interface ServiceTelemetry {
  /** Scopes the logger category, meter name and tracer name. */
  readonly serviceName: string
  /** LogTape logger under the `switchyard` root category. */
  readonly logger: Logger
  readonly meter: Meter
  readonly tracer: Tracer
}

/** Options for `.withLogger()`. */
export interface LoggerBuilderOpts {
  /** Log level threshold. Defaults to LOG_LEVEL env var or 'info'. */
  level?: LogLevel
  /** Category below the root. Defaults to [serviceName]. */
  category?: string[]
}

/** Options for `.withMetrics()`. */
export interface MetricsBuilderOpts {
  /** Metric export interval in milliseconds. Defaults to 60_000. */
  exportIntervalMs?: number
}

/** Options for `.withTracing()`. */
export interface TracingBuilderOpts {
  /** Trace sampling ratio (0.0 to 1.0). */
  samplingRatio?: number
}
