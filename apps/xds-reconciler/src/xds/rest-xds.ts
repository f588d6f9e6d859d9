import { Hono } from 'hono'
import { z } from 'zod'
import { TelemetryBuilder } from '@switchyard/telemetry'
import type { ServiceTelemetry } from '@switchyard/telemetry'
import { resourceKey } from '../resources/schema.js'
import { TYPE_URLS } from '../resources/types.js'
import type { ResourceKind } from '../resources/types.js'
import type { XdsResourceCache } from './resource-cache.js'

const DISCOVERY_PATH = /^\/v3\/discovery:(\w+)$/

const PATH_KINDS = new Map<string, ResourceKind>([
  ['listeners', 'listener'],
  ['routes', 'route'],
  ['clusters', 'cluster'],
  ['endpoints', 'endpoint'],
  ['secrets', 'secret'],
])

/** Envoy's DiscoveryRequest in its JSON rendering. */
export const DiscoveryRequestSchema = z
  .object({
    version_info: z.string().optional(),
    node: z.object({ id: z.string().optional() }).passthrough().optional(),
    resource_names: z.array(z.string()).default([]),
    type_url: z.string().optional(),
    response_nonce: z.string().optional(),
    error_detail: z
      .object({ code: z.number().optional(), message: z.string().optional() })
      .passthrough()
      .optional(),
  })
  .passthrough()

export type DiscoveryRequest = z.infer<typeof DiscoveryRequestSchema>

export interface DiscoveryResponse {
  version_info: string
  resources: Record<string, unknown>[]
  type_url: string
  nonce: string
}

export interface RestXdsOptions {
  cache: XdsResourceCache
  telemetry?: ServiceTelemetry
}

/** Build the response for `kind`, restricted to `names` when any are given. */
export function buildDiscoveryResponse(
  cache: XdsResourceCache,
  kind: ResourceKind,
  names: readonly string[]
): DiscoveryResponse {
  const version = String(cache.version(kind))
  const wanted = new Set(names)
  const resources = cache
    .list(kind)
    .filter((resource) => wanted.size === 0 || wanted.has(resourceKey(kind, resource)))
    .map((resource) => ({ '@type': TYPE_URLS[kind], ...resource }))
  return { version_info: version, resources, type_url: TYPE_URLS[kind], nonce: version }
}

/**
 * Serve the cache over Envoy's REST-JSON xDS (`POST /v3/discovery:<kind>`).
 *
 * The nonce of every response is the kind's version, so the nonce a request
 * echoes back identifies the version it acknowledges. A request carrying
 * `error_detail` rejects that version instead.
 */
export function createRestXdsHandler(options: RestXdsOptions): Hono {
  const { cache } = options
  const logger = (options.telemetry ?? TelemetryBuilder.noop('xds-reconciler')).logger.getChild(
    'rest-xds'
  )
  const app = new Hono()

  app.post('/v3/*', async (c) => {
    const match = DISCOVERY_PATH.exec(c.req.path)
    const kind = match ? PATH_KINDS.get(match[1] ?? '') : undefined
    if (!kind) {
      return c.json({ error: `Unknown discovery path ${c.req.path}` }, 404)
    }

    const body: unknown = await c.req.json().catch(() => undefined)
    const parsed = DiscoveryRequestSchema.safeParse(body)
    if (!parsed.success) {
      logger.warn`Malformed ${kind} discovery request: ${parsed.error.message}`
      return c.json({ error: 'Malformed discovery request' }, 400)
    }
    const request = parsed.data

    const nonce = request.response_nonce ? Number(request.response_nonce) : Number.NaN
    if (Number.isInteger(nonce)) {
      if (request.error_detail) {
        const detail = request.error_detail.message ?? 'rejected by data plane'
        logger.warn`${kind} version ${nonce} rejected by ${request.node?.id ?? 'unknown node'}: ${detail}`
        cache.nack(kind, nonce, detail)
      } else {
        logger.debug`${kind} version ${nonce} acknowledged`
        cache.ack(kind, nonce)
      }
    }

    const current = String(cache.version(kind))
    if (request.version_info === current && !request.error_detail) {
      return c.body(null, 304)
    }
    return c.json(buildDiscoveryResponse(cache, kind, request.resource_names))
  })

  return app
}
