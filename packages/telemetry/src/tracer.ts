import { diag, DiagConsoleLogger, DiagLogLevel, trace, type Tracer } from '@opentelemetry/api'
import {
  BatchSpanProcessor,
  NodeTracerProvider,
  ParentBasedSampler,
  TraceIdRatioBasedSampler,
  type Sampler,
} from '@opentelemetry/sdk-trace-node'
import { OTLPTraceExporter } from '@opentelemetry/exporter-trace-otlp-grpc'
import { EXPORT_TIMEOUT_MS } from './constants.js'
import { buildResource } from './resource.js'

let tracerProvider: NodeTracerProvider | null = null

const MAX_QUEUE_SIZE = 2048
const MAX_EXPORT_BATCH_SIZE = 512
const SCHEDULED_DELAY_MS = 5_000

export interface TracerConfig {
  serviceName: string
  serviceVersion?: string
  environment?: string
  otlpEndpoint?: string
  samplingRatio?: number
}

/**
 * Sampler for the given ratio, clamped to [0, 1]. Without a ratio production
 * samples 1% of root spans and every other environment uses the SDK default.
 */
export function createSampler(
  ratio: number | undefined,
  environment: string | undefined
): Sampler | undefined {
  if (typeof ratio === 'number' && Number.isFinite(ratio)) {
    const clamped = Math.min(Math.max(ratio, 0), 1)
    return new ParentBasedSampler({ root: new TraceIdRatioBasedSampler(clamped) })
  }
  if (environment === 'production') {
    return new ParentBasedSampler({ root: new TraceIdRatioBasedSampler(0.01) })
  }
  return undefined
}

/**
 * Register a tracer provider with OTLP export.
 * No-op if already initialized or if no OTLP endpoint is available.
 */
export function initTracer(config: TracerConfig): void {
  if (tracerProvider) return

  const otlpEndpoint = config.otlpEndpoint ?? process.env.OTEL_EXPORTER_OTLP_ENDPOINT
  if (!otlpEndpoint) return

  diag.setLogger(new DiagConsoleLogger(), DiagLogLevel.WARN)

  const envRatio = process.env.OTEL_TRACES_SAMPLER_ARG
  const samplingRatio = config.samplingRatio ?? (envRatio ? Number(envRatio) : undefined)
  const environment = config.environment ?? process.env.NODE_ENV

  const exporter = new OTLPTraceExporter({ url: otlpEndpoint, timeoutMillis: EXPORT_TIMEOUT_MS })

  tracerProvider = new NodeTracerProvider({
    resource: buildResource(config),
    sampler: createSampler(samplingRatio, environment),
    spanProcessors: [
      new BatchSpanProcessor(exporter, {
        maxQueueSize: MAX_QUEUE_SIZE,
        maxExportBatchSize: MAX_EXPORT_BATCH_SIZE,
        scheduledDelayMillis: SCHEDULED_DELAY_MS,
        exportTimeoutMillis: EXPORT_TIMEOUT_MS,
      }),
    ],
  })
  tracerProvider.register()
}

export function getTracer(name: string): Tracer {
  return trace.getTracer(name)
}

/** Flush pending spans and shut the tracer provider down. */
export async function shutdownTracer(): Promise<void> {
  if (!tracerProvider) return
  const provider = tracerProvider
  tracerProvider = null
  await provider.shutdown()
}
