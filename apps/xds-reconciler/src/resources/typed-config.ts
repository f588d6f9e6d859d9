import type { z } from 'zod'
import { TypeMismatchError } from '../errors.js'
import {
  DownstreamTlsContextSchema,
  HttpConnectionManagerSchema,
  TcpProxySchema,
  UpstreamTlsContextSchema,
} from './schema.js'
import type {
  DownstreamTlsContext,
  HttpConnectionManager,
  NamedFilter,
  RouteAction,
  TcpProxy,
  TransportSocket,
  TypedConfig,
  UpstreamTlsContext,
} from './schema.js'
import {
  DOWNSTREAM_TLS_TYPE_URL,
  HCM_TYPE_URL,
  TCP_PROXY_TYPE_URL,
  UPSTREAM_TLS_TYPE_URL,
} from './types.js'

// Typed sub-configurations are closed variants. `other` covers every
// alternative reconciliation does not look into; such configs are left as is.

export type NetworkFilterConfig =
  | { kind: 'http-connection-manager'; config: HttpConnectionManager }
  | { kind: 'tcp-proxy'; config: TcpProxy }
  | { kind: 'other' }

export type TransportSocketConfig =
  | { kind: 'downstream-tls'; context: DownstreamTlsContext }
  | { kind: 'upstream-tls'; context: UpstreamTlsContext }
  | { kind: 'other' }

export type ClusterSpecifier =
  | { kind: 'cluster'; cluster: string }
  | { kind: 'weighted-clusters'; clusters: { name: string }[] }
  | { kind: 'other' }

function parseTypedConfig<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  config: TypedConfig
): T {
  const result = schema.safeParse(config)
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ')
    throw new TypeMismatchError(config['@type'], issues)
  }
  return result.data
}

/** True for the filters that terminate a network filter chain. */
export function isTerminalNetworkFilter(filter: NamedFilter): boolean {
  const typeUrl = filter.typed_config?.['@type']
  return typeUrl === HCM_TYPE_URL || typeUrl === TCP_PROXY_TYPE_URL
}

/**
 * Decode a network filter's typed config. The returned config is a copy;
 * write it back to `filter.typed_config` after changing it.
 */
export function classifyNetworkFilter(filter: NamedFilter): NetworkFilterConfig {
  const typedConfig = filter.typed_config
  if (!typedConfig) return { kind: 'other' }
  switch (typedConfig['@type']) {
    case HCM_TYPE_URL:
      return {
        kind: 'http-connection-manager',
        config: parseTypedConfig(HttpConnectionManagerSchema, typedConfig),
      }
    case TCP_PROXY_TYPE_URL:
      return { kind: 'tcp-proxy', config: parseTypedConfig(TcpProxySchema, typedConfig) }
    default:
      return { kind: 'other' }
  }
}

/** Decode a transport socket's TLS context, if it carries one. */
export function classifyTransportSocket(socket: TransportSocket): TransportSocketConfig {
  const typedConfig = socket.typed_config
  if (!typedConfig) return { kind: 'other' }
  switch (typedConfig['@type']) {
    case DOWNSTREAM_TLS_TYPE_URL:
      return {
        kind: 'downstream-tls',
        context: parseTypedConfig(DownstreamTlsContextSchema, typedConfig),
      }
    case UPSTREAM_TLS_TYPE_URL:
      return {
        kind: 'upstream-tls',
        context: parseTypedConfig(UpstreamTlsContextSchema, typedConfig),
      }
    default:
      return { kind: 'other' }
  }
}

/**
 * Cluster specifier of a route action or TCP proxy. Cluster headers,
 * specifier plugins and other dynamic forms are `other`.
 */
export function classifyClusterSpecifier(
  target: Pick<RouteAction, 'cluster' | 'weighted_clusters'>
): ClusterSpecifier {
  if (target.cluster) return { kind: 'cluster', cluster: target.cluster }
  if (target.weighted_clusters) {
    return { kind: 'weighted-clusters', clusters: target.weighted_clusters.clusters }
  }
  return { kind: 'other' }
}
