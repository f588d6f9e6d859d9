import { configure, getLogger, reset } from '@logtape/logtape'
import type { LogRecord, Sink } from '@logtape/logtape'
import { trace, context } from '@opentelemetry/api'
import { SeverityNumber, logs } from '@opentelemetry/api-logs'
import { LoggerProvider, BatchLogRecordProcessor } from '@opentelemetry/sdk-logs'
import { OTLPLogExporter } from '@opentelemetry/exporter-logs-otlp-grpc'
import { buildResource } from './resource.js'
import {
  DEFAULT_SERVICE_NAME,
  EXPORT_TIMEOUT_MS,
  ROOT_CATEGORY,
  validateLogLevel,
  validateEnvironment,
} from './constants.js'
import type { Environment, LogLevel } from './constants.js'

export interface LoggerConfig {
  level?: LogLevel
  environment?: Environment
  serviceName?: string
  serviceVersion?: string
  otlpEndpoint?: string
}

let configPromise: Promise<void> | null = null
let configured = false
let loggerProvider: LoggerProvider | null = null

// ---------------------------------------------------------------------------
// Record helpers
// ---------------------------------------------------------------------------

function safeStringify(value: unknown): string {
  try {
    return JSON.stringify(value)
  } catch {
    const seen = new WeakSet<object>()
    return JSON.stringify(value, (_key, val: unknown) => {
      if (typeof val === 'object' && val !== null) {
        if (seen.has(val)) return '[Circular]'
        seen.add(val)
      }
      return val
    })
  }
}

export function formatMessage(record: LogRecord): string {
  return record.message
    .map((part) => {
      if (typeof part === 'string') return part
      if (part instanceof Error) return part.message
      return typeof part === 'object' && part !== null ? safeStringify(part) : String(part)
    })
    .join('')
}

function flattenProperties(
  props: Record<string, unknown>
): Record<string, string | number | boolean> {
  const flat: Record<string, string | number | boolean> = {}
  for (const [key, value] of Object.entries(props)) {
    flat[key] =
      typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean'
        ? value
        : safeStringify(value)
  }
  return flat
}

function activeTraceIds(): { traceId?: string; spanId?: string } {
  const span = trace.getSpan(context.active())
  if (!span) return {}
  const { traceId, spanId } = span.spanContext()
  return { traceId, spanId }
}

const SEVERITY: Record<string, SeverityNumber> = {
  trace: SeverityNumber.TRACE,
  debug: SeverityNumber.DEBUG,
  info: SeverityNumber.INFO,
  warning: SeverityNumber.WARN,
  error: SeverityNumber.ERROR,
  fatal: SeverityNumber.FATAL,
}

const LEVEL_COLORS: Record<string, string> = {
  debug: '\x1b[2m',
  info: '\x1b[36m',
  warning: '\x1b[33m',
  error: '\x1b[31m',
  fatal: '\x1b[35m',
}

// ---------------------------------------------------------------------------
// Sinks
// ---------------------------------------------------------------------------

export function createPrettySink(write: (line: string) => void = console.log): Sink {
  return (record: LogRecord) => {
    const time = new Date(record.timestamp).toISOString().slice(11, 23)
    const level = record.level.toUpperCase().padEnd(7)
    const color = LEVEL_COLORS[record.level] ?? ''
    const props = Object.keys(record.properties).length
      ? ` ${safeStringify(record.properties)}`
      : ''
    write(
      `\x1b[2m${time}\x1b[0m ${color}${level}\x1b[0m \x1b[34m${record.category.join('.')}\x1b[0m: ${formatMessage(record)}${props}`
    )
  }
}

/** One JSON object per line, carrying the active trace ids when a span is open. */
export function createJsonSink(
  write: (line: string) => void = (line) => process.stdout.write(line)
): Sink {
  return (record: LogRecord) => {
    const { traceId, spanId } = activeTraceIds()
    const line = safeStringify({
      timestamp: record.timestamp,
      level: record.level,
      category: record.category.join('.'),
      message: formatMessage(record),
      ...(Object.keys(record.properties).length ? { properties: record.properties } : {}),
      ...(traceId ? { trace_id: traceId, span_id: spanId } : {}),
    })
    write(line + '\n')
  }
}

function createOtlpSink(
  endpoint: string,
  serviceName: string,
  serviceVersion: string | undefined,
  environment: string
): Sink {
  const resource = buildResource({ serviceName, serviceVersion, environment })
  const exporter = new OTLPLogExporter({ url: endpoint, timeoutMillis: EXPORT_TIMEOUT_MS })
  loggerProvider = new LoggerProvider({
    resource,
    processors: [
      new BatchLogRecordProcessor(exporter, {
        maxQueueSize: 2048,
        maxExportBatchSize: 512,
        scheduledDelayMillis: 5_000,
        exportTimeoutMillis: EXPORT_TIMEOUT_MS,
      }),
    ],
  })
  logs.setGlobalLoggerProvider(loggerProvider)

  const otelLogger = loggerProvider.getLogger(serviceName)

  return (record: LogRecord) => {
    const { traceId, spanId } = activeTraceIds()
    otelLogger.emit({
      severityNumber: SEVERITY[record.level] ?? SeverityNumber.INFO,
      severityText: record.level.toUpperCase(),
      body: formatMessage(record),
      attributes: {
        ...flattenProperties(record.properties),
        'log.category': record.category.join('.'),
        ...(traceId ? { trace_id: traceId, span_id: spanId } : {}),
      },
    })
  }
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Configure LogTape once per process.
 *
 * Production writes JSON lines, every other environment the pretty console
 * format. An OTLP sink is added when an endpoint is configured outside tests.
 * Later calls are no-ops once configuration succeeded.
 */
export async function configureLogger(config?: LoggerConfig): Promise<void> {
  if (configured) return
  if (configPromise) return configPromise

  configPromise = doConfigureLogger(config)
    .then(() => {
      configured = true
    })
    .catch((err: unknown) => {
      configPromise = null
      throw err
    })
  return configPromise
}

async function doConfigureLogger(config?: LoggerConfig): Promise<void> {
  const level = config?.level ?? validateLogLevel(process.env.LOG_LEVEL) ?? 'info'
  const environment =
    config?.environment ?? validateEnvironment(process.env.NODE_ENV) ?? 'development'
  const serviceName = config?.serviceName ?? process.env.OTEL_SERVICE_NAME ?? DEFAULT_SERVICE_NAME
  const otlpEndpoint = config?.otlpEndpoint ?? process.env.OTEL_EXPORTER_OTLP_ENDPOINT

  const sinks: Record<string, Sink> =
    environment === 'production' ? { json: createJsonSink() } : { pretty: createPrettySink() }

  if (otlpEndpoint && environment !== 'test') {
    sinks.otlp = createOtlpSink(otlpEndpoint, serviceName, config?.serviceVersion, environment)
  }

  const sinkNames = Object.keys(sinks)
  await configure({
    sinks,
    loggers: [
      { category: ['logtape', 'meta'], lowestLevel: 'warning', sinks: sinkNames },
      { category: [ROOT_CATEGORY], lowestLevel: level, sinks: sinkNames },
    ],
  })
}

/** Flush pending OTLP log records. No-op without an OTLP sink. */
export async function shutdownLogger(): Promise<void> {
  if (loggerProvider) {
    await loggerProvider.shutdown()
    loggerProvider = null
  }
}

/**
 * @internal
 * Reset LogTape and the module state so `configureLogger` can run again.
 */
export async function resetLogger(): Promise<void> {
  await shutdownLogger()
  await reset()
  configPromise = null
  configured = false
}

export { getLogger }
