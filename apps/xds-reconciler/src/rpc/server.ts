import { z } from 'zod'
import { Hono } from 'hono'
import { RpcTarget, newHttpBatchRpcResponse } from 'capnweb'
import { TelemetryBuilder } from '@switchyard/telemetry'
import type { ServiceTelemetry } from '@switchyard/telemetry'
import type { AppliedConfig, ProxyConfigManager } from '../config-manager.js'
import { isReconcileError } from '../errors.js'
import type { ReconcileErrorCode } from '../errors.js'

/** A scope segment must not contain `/`, the separator of qualified names. */
const ScopeSegmentSchema = z
  .string()
  .min(1)
  .regex(/^[^/]+$/, 'must not contain "/"')

export const ConfigScopeSchema = z.object({
  namespace: ScopeSegmentSchema,
  name: ScopeSegmentSchema,
})

export const ApplyConfigRequestSchema = ConfigScopeSchema.extend({
  resources: z.array(z.record(z.string(), z.unknown())),
})

export type ApplyConfigRequest = z.infer<typeof ApplyConfigRequestSchema>

export type RpcErrorCode = ReconcileErrorCode | 'INVALID_REQUEST' | 'NOT_FOUND' | 'INTERNAL'

export type ConfigResult =
  | { success: true }
  | { success: false; error: string; code: RpcErrorCode }

export interface ConfigRpcServerOptions {
  manager: ProxyConfigManager
  telemetry?: ServiceTelemetry
}

/**
 * Config RPC server.
 *
 * Receives resource batches from the orchestrator, validates the envelope
 * and hands them to the config manager. Reconciliation errors come back as
 * result values carrying their code.
 */
export class ConfigRpcServer extends RpcTarget {
  private readonly manager: ProxyConfigManager
  private readonly logger: ServiceTelemetry['logger']

  constructor(options: ConfigRpcServerOptions) {
    super()
    this.manager = options.manager
    const telemetry = options.telemetry ?? TelemetryBuilder.noop('xds-reconciler')
    this.logger = telemetry.logger.getChild('rpc')
  }

  /** Install or replace the batch of one scope. */
  async applyConfig(request: unknown): Promise<ConfigResult> {
    const parsed = ApplyConfigRequestSchema.safeParse(request)
    if (!parsed.success) {
      this.logger.error`Malformed applyConfig request received`
      return { success: false, error: parsed.error.message, code: 'INVALID_REQUEST' }
    }

    const { namespace, name, resources } = parsed.data
    this.logger.info`applyConfig ${namespace}/${name}: ${resources.length} resource(s)`
    try {
      await this.manager.apply({ namespace, name }, resources)
      return { success: true }
    } catch (err) {
      return this.failure('applyConfig', err)
    }
  }

  async deleteConfig(request: unknown): Promise<ConfigResult> {
    const parsed = ConfigScopeSchema.safeParse(request)
    if (!parsed.success) {
      this.logger.error`Malformed deleteConfig request received`
      return { success: false, error: parsed.error.message, code: 'INVALID_REQUEST' }
    }

    const { namespace, name } = parsed.data
    try {
      const removed = await this.manager.remove({ namespace, name })
      if (!removed) {
        return { success: false, error: `No config applied for ${namespace}/${name}`, code: 'NOT_FOUND' }
      }
      return { success: true }
    } catch (err) {
      return this.failure('deleteConfig', err)
    }
  }

  async listConfigs(): Promise<AppliedConfig[]> {
    return this.manager.list()
  }

  private failure(operation: string, err: unknown): ConfigResult {
    if (isReconcileError(err)) {
      this.logger.warn`${operation} failed (${err.code}): ${err.message}`
      return { success: false, error: err.message, code: err.code }
    }
    const message = err instanceof Error ? err.message : String(err)
    this.logger.error`${operation} failed unexpectedly: ${message}`
    return { success: false, error: message, code: 'INTERNAL' }
  }
}

/**
 * Create a Hono app serving the RPC target over HTTP batch requests.
 */
export function createRpcHandler(rpcServer: ConfigRpcServer): Hono {
  const app = new Hono()
  app.post('/', (c) => newHttpBatchRpcResponse(c.req.raw, rpcServer))
  return app
}
