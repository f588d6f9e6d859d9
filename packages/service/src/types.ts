import type { SwitchyardConfig } from '@switchyard/config'
import type { ServiceTelemetry } from '@switchyard/telemetry'
import type { Hono } from 'hono'

/** Lifecycle state for a SwitchyardService. */
export type ServiceState = 'created' | 'initializing' | 'ready' | 'shutting_down' | 'stopped'

export interface SwitchyardServiceOptions {
  readonly config: SwitchyardConfig
  /**
   * Pre-built telemetry. When given the base class skips
   * TelemetryBuilder.build() and leaves its shutdown to the caller.
   */
  readonly telemetry?: ServiceTelemetry
}

export interface ServiceInfo {
  readonly name: string
  readonly version: string
}

/** What the HTTP server wrapper needs from a service. */
export interface ManagedService {
  readonly info: ServiceInfo
  shutdown(): Promise<void>
}

/** The public contract of a SwitchyardService for composition consumers. */
export interface ISwitchyardService extends ManagedService {
  /** Hono route group containing all service routes. */
  readonly handler: Hono
  readonly config: SwitchyardConfig
  readonly telemetry: ServiceTelemetry
  readonly state: ServiceState
  initialize(): Promise<void>
}
