import { z } from 'zod'
import {
  DOWNSTREAM_TLS_TYPE_URL,
  HCM_TYPE_URL,
  TCP_PROXY_TYPE_URL,
  UPSTREAM_TLS_TYPE_URL,
} from './types.js'
import type { ResourceKind } from './types.js'

// Resources are modelled only as deep as reconciliation needs to look into
// them. Every object passes unknown fields through untouched.

export const TypedConfigSchema = z.object({ '@type': z.string() }).passthrough()
export type TypedConfig = z.infer<typeof TypedConfigSchema>

export const SocketAddressSchema = z
  .object({
    address: z.string().optional(),
    port_value: z.number().int().min(0).max(65535).optional(),
  })
  .passthrough()

export const AddressSchema = z.object({ socket_address: SocketAddressSchema.optional() }).passthrough()
export type Address = z.infer<typeof AddressSchema>

export const AdditionalAddressSchema = z.object({ address: AddressSchema }).passthrough()
export type AdditionalAddress = z.infer<typeof AdditionalAddressSchema>

/** Opaque to reconciliation; only ever filled in when absent. */
export const ConfigSourceSchema = z.object({}).passthrough()
export type ConfigSource = z.infer<typeof ConfigSourceSchema>

export const NamedFilterSchema = z
  .object({
    name: z.string(),
    typed_config: TypedConfigSchema.optional(),
  })
  .passthrough()
export type NamedFilter = z.infer<typeof NamedFilterSchema>

// ---------------------------------------------------------------------------
// TLS
// ---------------------------------------------------------------------------

export const SdsSecretConfigSchema = z
  .object({
    name: z.string().optional(),
    sds_config: ConfigSourceSchema.optional(),
  })
  .passthrough()
export type SdsSecretConfig = z.infer<typeof SdsSecretConfigSchema>

export const CommonTlsContextSchema = z
  .object({
    tls_certificate_sds_secret_configs: z.array(SdsSecretConfigSchema).optional(),
    validation_context_sds_secret_config: SdsSecretConfigSchema.optional(),
  })
  .passthrough()
export type CommonTlsContext = z.infer<typeof CommonTlsContextSchema>

export const DownstreamTlsContextSchema = z
  .object({
    '@type': z.literal(DOWNSTREAM_TLS_TYPE_URL),
    common_tls_context: CommonTlsContextSchema.optional(),
  })
  .passthrough()
export type DownstreamTlsContext = z.infer<typeof DownstreamTlsContextSchema>

export const UpstreamTlsContextSchema = z
  .object({
    '@type': z.literal(UPSTREAM_TLS_TYPE_URL),
    common_tls_context: CommonTlsContextSchema.optional(),
  })
  .passthrough()
export type UpstreamTlsContext = z.infer<typeof UpstreamTlsContextSchema>

export const TransportSocketSchema = z
  .object({
    name: z.string().optional(),
    typed_config: TypedConfigSchema.optional(),
  })
  .passthrough()
export type TransportSocket = z.infer<typeof TransportSocketSchema>

// ---------------------------------------------------------------------------
// Routes
// ---------------------------------------------------------------------------

export const WeightedClustersSchema = z
  .object({ clusters: z.array(z.object({ name: z.string() }).passthrough()) })
  .passthrough()

export const RouteActionSchema = z
  .object({
    cluster: z.string().optional(),
    weighted_clusters: WeightedClustersSchema.optional(),
    request_mirror_policies: z
      .array(z.object({ cluster: z.string().optional() }).passthrough())
      .optional(),
  })
  .passthrough()
export type RouteAction = z.infer<typeof RouteActionSchema>

export const VirtualHostSchema = z
  .object({
    name: z.string().optional(),
    domains: z.array(z.string()).optional(),
    routes: z.array(z.object({ route: RouteActionSchema.optional() }).passthrough()).optional(),
  })
  .passthrough()
export type VirtualHost = z.infer<typeof VirtualHostSchema>

export const RouteConfigurationSchema = z
  .object({
    name: z.string().optional(),
    virtual_hosts: z.array(VirtualHostSchema).optional(),
  })
  .passthrough()
export type RouteConfiguration = z.infer<typeof RouteConfigurationSchema>

// ---------------------------------------------------------------------------
// Network filters
// ---------------------------------------------------------------------------

export const HttpConnectionManagerSchema = z
  .object({
    '@type': z.literal(HCM_TYPE_URL),
    rds: z
      .object({
        route_config_name: z.string().optional(),
        config_source: ConfigSourceSchema.optional(),
      })
      .passthrough()
      .optional(),
    route_config: RouteConfigurationSchema.optional(),
    http_filters: z.array(NamedFilterSchema).optional(),
  })
  .passthrough()
export type HttpConnectionManager = z.infer<typeof HttpConnectionManagerSchema>

export const TcpProxySchema = z
  .object({
    '@type': z.literal(TCP_PROXY_TYPE_URL),
    cluster: z.string().optional(),
    weighted_clusters: WeightedClustersSchema.optional(),
  })
  .passthrough()
export type TcpProxy = z.infer<typeof TcpProxySchema>

// ---------------------------------------------------------------------------
// Top-level resources
// ---------------------------------------------------------------------------

export const FilterChainSchema = z
  .object({
    filters: z.array(NamedFilterSchema).optional(),
    transport_socket: TransportSocketSchema.optional(),
  })
  .passthrough()
export type FilterChain = z.infer<typeof FilterChainSchema>

export const ListenerSchema = z
  .object({
    name: z.string().optional(),
    address: AddressSchema.optional(),
    additional_addresses: z.array(AdditionalAddressSchema).optional(),
    filter_chains: z.array(FilterChainSchema).optional(),
    listener_filters: z.array(NamedFilterSchema).optional(),
    internal_listener: z.object({}).passthrough().optional(),
    enable_reuse_port: z.boolean().optional(),
  })
  .passthrough()
export type Listener = z.infer<typeof ListenerSchema>

export const ClusterSchema = z
  .object({
    name: z.string().optional(),
    type: z.string().optional(),
    eds_cluster_config: z
      .object({ eds_config: ConfigSourceSchema.optional() })
      .passthrough()
      .optional(),
    load_assignment: z.object({ cluster_name: z.string().optional() }).passthrough().optional(),
    transport_socket: TransportSocketSchema.optional(),
  })
  .passthrough()
export type Cluster = z.infer<typeof ClusterSchema>

export const ClusterLoadAssignmentSchema = z
  .object({
    cluster_name: z.string().optional(),
    endpoints: z.array(z.object({}).passthrough()).optional(),
  })
  .passthrough()
export type ClusterLoadAssignment = z.infer<typeof ClusterLoadAssignmentSchema>

export const SecretSchema = z.object({ name: z.string().optional() }).passthrough()
export type Secret = z.infer<typeof SecretSchema>

export interface ResourceByKind {
  listener: Listener
  route: RouteConfiguration
  cluster: Cluster
  endpoint: ClusterLoadAssignment
  secret: Secret
}

export const RESOURCE_SCHEMAS: {
  [K in ResourceKind]: z.ZodType<ResourceByKind[K], z.ZodTypeDef, unknown>
} = {
  listener: ListenerSchema,
  route: RouteConfigurationSchema,
  cluster: ClusterSchema,
  endpoint: ClusterLoadAssignmentSchema,
  secret: SecretSchema,
}

const KEY_OF: { [K in ResourceKind]: (resource: ResourceByKind[K]) => string } = {
  listener: (r) => r.name ?? '',
  route: (r) => r.name ?? '',
  cluster: (r) => r.name ?? '',
  endpoint: (r) => r.cluster_name ?? '',
  secret: (r) => r.name ?? '',
}

/** Name a resource is keyed by: `cluster_name` for endpoints, `name` otherwise. */
export function resourceKey<K extends ResourceKind>(kind: K, resource: ResourceByKind[K]): string {
  return KEY_OF[kind](resource)
}
