import { metrics, type Meter } from '@opentelemetry/api'
import { MeterProvider, PeriodicExportingMetricReader } from '@opentelemetry/sdk-metrics'
import { OTLPMetricExporter } from '@opentelemetry/exporter-metrics-otlp-grpc'
import { buildResource } from './resource.js'
import { DEFAULT_SERVICE_NAME, EXPORT_TIMEOUT_MS, validateEnvironment } from './constants.js'

export interface MetricsConfig {
  serviceName?: string
  serviceVersion?: string
  environment?: string
  otlpEndpoint?: string
  exportIntervalMs?: number // default 60_000
}

let meterProvider: MeterProvider | null = null

/**
 * Create a MeterProvider with an OTLP exporter and register it globally.
 *
 * No-op if already configured or if no OTLP endpoint is available.
 */
export function configureMetrics(config?: MetricsConfig): void {
  if (meterProvider) return

  const otlpEndpoint = config?.otlpEndpoint ?? process.env.OTEL_EXPORTER_OTLP_ENDPOINT
  if (!otlpEndpoint) return

  const resource = buildResource({
    serviceName: config?.serviceName ?? process.env.OTEL_SERVICE_NAME ?? DEFAULT_SERVICE_NAME,
    serviceVersion: config?.serviceVersion ?? process.env.OTEL_SERVICE_VERSION,
    environment: config?.environment ?? validateEnvironment(process.env.NODE_ENV),
  })

  const reader = new PeriodicExportingMetricReader({
    exporter: new OTLPMetricExporter({ url: otlpEndpoint, timeoutMillis: EXPORT_TIMEOUT_MS }),
    exportIntervalMillis: config?.exportIntervalMs ?? 60_000,
    exportTimeoutMillis: EXPORT_TIMEOUT_MS,
  })

  meterProvider = new MeterProvider({ resource, readers: [reader] })
  metrics.setGlobalMeterProvider(meterProvider)
}

/** Flush pending metric exports and shut down the meter provider. */
export async function shutdownMetrics(): Promise<void> {
  if (!meterProvider) return
  const provider = meterProvider
  meterProvider = null
  try {
    await provider.shutdown()
  } finally {
    metrics.disable()
  }
}

/** A named meter from the global provider; a no-op meter when none is registered. */
export function getMeter(name: string): Meter {
  return metrics.getMeter(name)
}
