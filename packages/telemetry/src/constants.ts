/**
 * @switchyard/telemetry: Shared constants
 */

/** Timeout for OTLP exporters (logs, traces, metrics) in milliseconds. */
export const EXPORT_TIMEOUT_MS = 10_000

/** Fallback service name when none is provided via config or env. */
export const DEFAULT_SERVICE_NAME = 'switchyard'

/** Root logger category. Every service logger lives underneath it. */
export const ROOT_CATEGORY = 'switchyard'

export const VALID_LOG_LEVELS = ['debug', 'info', 'warning', 'error', 'fatal'] as const
export type LogLevel = (typeof VALID_LOG_LEVELS)[number]

export const VALID_ENVIRONMENTS = ['development', 'production', 'test'] as const
export type Environment = (typeof VALID_ENVIRONMENTS)[number]

function isOneOf<T extends string>(values: readonly T[], value: string): value is T {
  return values.some((v) => v === value)
}

export function validateLogLevel(value: string | undefined): LogLevel | undefined {
  if (!value) return undefined
  if (isOneOf(VALID_LOG_LEVELS, value)) return value
  console.warn(`[telemetry] invalid LOG_LEVEL "${value}", defaulting to "info"`)
  return undefined
}

export function validateEnvironment(value: string | undefined): Environment | undefined {
  if (!value) return undefined
  if (isOneOf(VALID_ENVIRONMENTS, value)) return value
  console.warn(`[telemetry] invalid NODE_ENV "${value}", defaulting to "development"`)
  return undefined
}
