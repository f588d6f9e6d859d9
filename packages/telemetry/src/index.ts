import { configureLogger, shutdownLogger, resetLogger, getLogger } from './logger.js'
import type { LoggerConfig } from './logger.js'
import { configureMetrics, shutdownMetrics, getMeter } from './metrics.js'
import type { MetricsConfig } from './metrics.js'
import { initTracer, getTracer, shutdownTracer } from './tracer.js'
import type { TracerConfig } from './tracer.js'
import type { Environment, LogLevel } from './constants.js'

export { configureLogger, shutdownLogger, getLogger }
/** @internal Reset all logger state. For test teardown only. */
export { resetLogger }
export type { LoggerConfig }
export { configureMetrics, shutdownMetrics, getMeter }
export type { MetricsConfig }
export { initTracer, getTracer, shutdownTracer }
export type { TracerConfig }
export { createJsonSink, createPrettySink, formatMessage } from './logger.js'
export { validateLogLevel, validateEnvironment, ROOT_CATEGORY } from './constants.js'
export type { Environment, LogLevel }

export { TelemetryBuilder } from './builder.js'
export type { ServiceTelemetry } from './types.js'

export interface TelemetryInitOptions {
  serviceName: string
  serviceVersion?: string
  environment?: Environment
  otlpEndpoint?: string
  logLevel?: LogLevel
  metricsExportIntervalMs?: number
  samplingRatio?: number
}

/**
 * Initialize traces, logs and metrics. A failure part way shuts down the
 * signals already started before rethrowing.
 */
export async function initTelemetry(opts: TelemetryInitOptions): Promise<void> {
  try {
    initTracer({
      serviceName: opts.serviceName,
      serviceVersion: opts.serviceVersion,
      environment: opts.environment,
      otlpEndpoint: opts.otlpEndpoint,
      samplingRatio: opts.samplingRatio,
    })

    await configureLogger({
      serviceName: opts.serviceName,
      serviceVersion: opts.serviceVersion,
      environment: opts.environment,
      otlpEndpoint: opts.otlpEndpoint,
      level: opts.logLevel,
    })

    configureMetrics({
      serviceName: opts.serviceName,
      serviceVersion: opts.serviceVersion,
      environment: opts.environment,
      otlpEndpoint: opts.otlpEndpoint,
      exportIntervalMs: opts.metricsExportIntervalMs,
    })
  } catch (err) {
    await Promise.allSettled([shutdownTracer(), shutdownLogger(), shutdownMetrics()])
    throw err
  }
}

const SHUTDOWN_TIMEOUT_MS = 10_000

/** Shut every signal down in parallel, bounded by a 10s deadline. */
export async function shutdownTelemetry(): Promise<void> {
  let timeoutId: ReturnType<typeof setTimeout> | undefined
  const deadline = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(
      () => reject(new Error('telemetry shutdown timed out')),
      SHUTDOWN_TIMEOUT_MS
    )
  })

  let results: PromiseSettledResult<void>[] = []
  try {
    results = await Promise.race([
      Promise.allSettled([resetLogger(), shutdownMetrics(), shutdownTracer()]),
      deadline,
    ])
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err)
    console.error('[telemetry] shutdown timed out:', message)
  } finally {
    clearTimeout(timeoutId)
  }
  for (const result of results) {
    if (result.status === 'rejected') {
      console.error('[telemetry] shutdown failed:', result.reason)
    }
  }
}
