import type { FilterNames } from '@switchyard/config'
import { DuplicateNameError, TypeMismatchError, UnsupportedTypeError } from '../errors.js'
import knownFields from './known-fields.json' with { type: 'json' }
import { hasNamed, insertBefore } from './filter-chain.js'
import { qualifyName, qualifyNameForced } from './qualified-name.js'
import type { ConfigScope } from './qualified-name.js'
import { ResourceSet } from './resource-set.js'
import { RESOURCE_SCHEMAS, resourceKey } from './schema.js'
import type {
  Cluster,
  ClusterLoadAssignment,
  CommonTlsContext,
  ConfigSource,
  FilterChain,
  HttpConnectionManager,
  Listener,
  NamedFilter,
  ResourceByKind,
  RouteAction,
  RouteConfiguration,
  Secret,
  TcpProxy,
  TransportSocket,
} from './schema.js'
import {
  classifyClusterSpecifier,
  classifyNetworkFilter,
  classifyTransportSocket,
  isTerminalNetworkFilter,
} from './typed-config.js'
import { kindForTypeUrl, ROUTER_FILTER_NAME } from './types.js'
import type { ResourceKind } from './types.js'
import { validateResource } from './validator.js'
import type { ResourceValidator } from './validator.js'

export const BPF_METADATA_TYPE_URL = 'type.googleapis.com/switchyard.BpfMetadata'
export const NETWORK_FILTER_TYPE_URL = 'type.googleapis.com/switchyard.NetworkFilter'
export const L7_POLICY_TYPE_URL = 'type.googleapis.com/switchyard.L7Policy'

export interface NormalizerOptions {
  scope: ConfigScope
  filterNames: FilterNames
  enableBpfTproxy: boolean
  useOriginalSourceAddress: boolean
  l7LoadBalancer: boolean
  /** Cluster through which the proxy reaches this control plane. */
  xdsClusterName: string
  validator?: ResourceValidator
}

const KNOWN_FIELDS: Record<ResourceKind, ReadonlySet<string>> = {
  listener: new Set(knownFields.listener),
  route: new Set(knownFields.route),
  cluster: new Set(knownFields.cluster),
  endpoint: new Set(knownFields.endpoint),
  secret: new Set(knownFields.secret),
}

/**
 * Config source pointing the proxy back at this control plane over REST
 * xDS. Filled in wherever a resource leaves its config source unset.
 */
export function controlPlaneConfigSource(xdsClusterName: string): ConfigSource {
  return {
    resource_api_version: 'V3',
    api_config_source: {
      api_type: 'REST',
      transport_api_version: 'V3',
      cluster_names: [xdsClusterName],
      refresh_delay: '1s',
    },
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function decodeAs<K extends ResourceKind>(
  kind: K,
  typeUrl: string,
  body: Record<string, unknown>
): ResourceByKind[K] {
  const unknown = Object.keys(body).filter((field) => !KNOWN_FIELDS[kind].has(field))
  if (unknown.length > 0) {
    throw new TypeMismatchError(typeUrl, `unknown field(s) ${unknown.join(', ')}`)
  }
  const result = RESOURCE_SCHEMAS[kind].safeParse(body)
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ')
    throw new TypeMismatchError(typeUrl, issues)
  }
  return result.data
}

/**
 * Turns raw tagged resources into a canonical {@link ResourceSet}.
 *
 * Names and cross-references are qualified with the batch scope, config
 * sources pointing at this control plane are filled in, and the reserved
 * filters are injected into listeners this node addresses. Running it on
 * its own output (`ResourceSet.toRaw()`) yields equal resources.
 */
export class ResourceNormalizer {
  constructor(private readonly options: NormalizerOptions) {}

  normalize(raw: readonly unknown[]): ResourceSet {
    const set = new ResourceSet()
    const seen: Record<ResourceKind, Set<string>> = {
      listener: new Set(),
      route: new Set(),
      cluster: new Set(),
      endpoint: new Set(),
      secret: new Set(),
    }

    const accept = <K extends ResourceKind>(
      kind: K,
      resource: ResourceByKind[K],
      normalize: (resource: ResourceByKind[K]) => void
    ): void => {
      const name = resourceKey(kind, resource)
      // ResourceSet.add reports a missing name; duplicates are reported by
      // their name as written, before qualification.
      if (name && seen[kind].has(name)) throw new DuplicateNameError(kind, name)
      seen[kind].add(name)
      if (name) normalize(resource)
      if (name && this.options.validator) {
        validateResource(this.options.validator, kind, resource)
      }
      set.add(kind, resource)
    }

    for (const entry of structuredClone(raw)) {
      if (!isRecord(entry)) {
        throw new TypeMismatchError('(untyped)', 'resource must be a JSON object')
      }
      const typeUrl = entry['@type']
      // An empty tag is what a failed upstream decode leaves behind.
      if (typeUrl === undefined || typeUrl === '') continue
      if (typeof typeUrl !== 'string') {
        throw new TypeMismatchError('(untyped)', '@type must be a string')
      }
      const kind = kindForTypeUrl(typeUrl)
      if (!kind) throw new UnsupportedTypeError(typeUrl)

      const body = { ...entry }
      delete body['@type']

      switch (kind) {
        case 'listener':
          accept(kind, decodeAs(kind, typeUrl, body), (l) => this.normalizeListener(l))
          break
        case 'route':
          accept(kind, decodeAs(kind, typeUrl, body), (r) => this.normalizeRoute(r))
          break
        case 'cluster':
          accept(kind, decodeAs(kind, typeUrl, body), (c) => this.normalizeCluster(c))
          break
        case 'endpoint':
          accept(kind, decodeAs(kind, typeUrl, body), (e) => this.normalizeEndpoint(e))
          break
        case 'secret':
          accept(kind, decodeAs(kind, typeUrl, body), (s) => this.normalizeSecret(s))
          break
      }
    }
    return set
  }

  // ---------------------------------------------------------------------------
  // Listeners
  // ---------------------------------------------------------------------------

  private normalizeListener(listener: Listener): void {
    const { filterNames, enableBpfTproxy } = this.options
    if (enableBpfTproxy) {
      // Transparent proxying is incompatible with SO_REUSEPORT.
      listener.enable_reuse_port = false
    }

    const isInternal = listener.internal_listener !== undefined
    // Filters are injected only where this node assigns the address.
    const injectFilters = listener.address === undefined && !isInternal

    if (!isInternal && !hasNamed(listener.listener_filters, filterNames.listener)) {
      listener.listener_filters = [...(listener.listener_filters ?? []), this.listenerFilter()]
    }

    for (const chain of listener.filter_chains ?? []) {
      if (chain.transport_socket) this.fillInTransportSocket(chain.transport_socket)
      this.normalizeFilterChain(chain, injectFilters)
    }

    listener.name = qualifyNameForced(this.options.scope, listener.name ?? '').name
  }

  private listenerFilter(): NamedFilter {
    return {
      name: this.options.filterNames.listener,
      typed_config: {
        '@type': BPF_METADATA_TYPE_URL,
        is_ingress: false,
        use_original_source_address: this.options.useOriginalSourceAddress,
        is_l7lb: this.options.l7LoadBalancer,
      },
    }
  }

  /**
   * A well-formed chain has at most one terminal filter (HTTP connection
   * manager or TCP proxy); only the first one is looked into.
   */
  private normalizeFilterChain(chain: FilterChain, injectFilters: boolean): void {
    const filters = chain.filters ?? []
    const terminal = filters.find(isTerminalNetworkFilter)
    if (!terminal) return

    const config = classifyNetworkFilter(terminal)
    switch (config.kind) {
      case 'http-connection-manager':
        this.normalizeHttpConnectionManager(config.config, injectFilters)
        terminal.typed_config = config.config
        break
      case 'tcp-proxy':
        this.qualifyTcpProxy(config.config)
        terminal.typed_config = config.config
        break
      case 'other':
        return
    }

    const networkFilterName = this.options.filterNames.network
    if (injectFilters && !hasNamed(filters, networkFilterName)) {
      const networkFilter: NamedFilter = {
        name: networkFilterName,
        typed_config: { '@type': NETWORK_FILTER_TYPE_URL },
      }
      chain.filters = insertBefore(filters, networkFilter, (f) => f === terminal) ?? filters
    }
  }

  private normalizeHttpConnectionManager(hcm: HttpConnectionManager, injectFilters: boolean) {
    const { scope, xdsClusterName, filterNames } = this.options
    if (hcm.rds) {
      if (hcm.rds.route_config_name) {
        hcm.rds.route_config_name = qualifyNameForced(scope, hcm.rds.route_config_name).name
      }
      hcm.rds.config_source ??= controlPlaneConfigSource(xdsClusterName)
    }
    if (hcm.route_config) this.qualifyRouteConfiguration(hcm.route_config)

    if (injectFilters && !hasNamed(hcm.http_filters, filterNames.http)) {
      const policyFilter: NamedFilter = {
        name: filterNames.http,
        typed_config: { '@type': L7_POLICY_TYPE_URL },
      }
      const filters = hcm.http_filters ?? []
      const injected = insertBefore(filters, policyFilter, (f) => f.name === ROUTER_FILTER_NAME)
      if (injected) hcm.http_filters = injected
    }
  }

  private qualifyTcpProxy(tcpProxy: TcpProxy): void {
    const { scope } = this.options
    const specifier = classifyClusterSpecifier(tcpProxy)
    switch (specifier.kind) {
      case 'cluster':
        tcpProxy.cluster = qualifyName(scope, specifier.cluster).name
        break
      case 'weighted-clusters':
        for (const weighted of specifier.clusters) {
          weighted.name = qualifyName(scope, weighted.name).name
        }
        break
      case 'other':
        break
    }
  }

  // ---------------------------------------------------------------------------
  // Routes
  // ---------------------------------------------------------------------------

  private normalizeRoute(route: RouteConfiguration): void {
    this.qualifyRouteConfiguration(route)
  }

  /** Own name and virtual host names are forced into scope; cluster references are not. */
  private qualifyRouteConfiguration(route: RouteConfiguration): void {
    const { scope } = this.options
    if (route.name !== undefined) route.name = qualifyNameForced(scope, route.name).name
    for (const vhost of route.virtual_hosts ?? []) {
      if (vhost.name !== undefined) vhost.name = qualifyNameForced(scope, vhost.name).name
      for (const entry of vhost.routes ?? []) {
        if (entry.route) this.qualifyRouteAction(entry.route)
      }
    }
  }

  private qualifyRouteAction(action: RouteAction): void {
    const { scope } = this.options
    const specifier = classifyClusterSpecifier(action)
    switch (specifier.kind) {
      case 'cluster':
        action.cluster = qualifyName(scope, specifier.cluster).name
        break
      case 'weighted-clusters':
        for (const weighted of specifier.clusters) {
          weighted.name = qualifyName(scope, weighted.name).name
        }
        break
      case 'other':
        break
    }
    for (const mirror of action.request_mirror_policies ?? []) {
      if (mirror.cluster) mirror.cluster = qualifyName(scope, mirror.cluster).name
    }
  }

  // ---------------------------------------------------------------------------
  // Clusters, endpoints, secrets
  // ---------------------------------------------------------------------------

  private normalizeCluster(cluster: Cluster): void {
    const { scope, xdsClusterName } = this.options
    if (cluster.transport_socket) this.fillInTransportSocket(cluster.transport_socket)

    if (cluster.type === 'EDS') {
      cluster.eds_cluster_config ??= {}
      cluster.eds_cluster_config.eds_config ??= controlPlaneConfigSource(xdsClusterName)
    }
    const assignment = cluster.load_assignment
    if (assignment && assignment.cluster_name !== undefined) {
      assignment.cluster_name = qualifyName(scope, assignment.cluster_name).name
    }
    cluster.name = qualifyName(scope, cluster.name ?? '').name
  }

  private normalizeEndpoint(endpoint: ClusterLoadAssignment): void {
    endpoint.cluster_name = qualifyName(this.options.scope, endpoint.cluster_name ?? '').name
  }

  private normalizeSecret(secret: Secret): void {
    secret.name = qualifyName(this.options.scope, secret.name ?? '').name
  }

  // ---------------------------------------------------------------------------
  // TLS
  // ---------------------------------------------------------------------------

  private fillInTransportSocket(socket: TransportSocket): void {
    const config = classifyTransportSocket(socket)
    switch (config.kind) {
      case 'downstream-tls':
      case 'upstream-tls':
        if (config.context.common_tls_context) {
          this.fillInTlsContext(config.context.common_tls_context)
        }
        socket.typed_config = config.context
        break
      case 'other':
        break
    }
  }

  /** SDS secret references are qualified and pointed at this control plane. */
  private fillInTlsContext(tls: CommonTlsContext): void {
    const { scope, xdsClusterName } = this.options
    const sdsConfigs = [
      ...(tls.tls_certificate_sds_secret_configs ?? []),
      ...(tls.validation_context_sds_secret_config ? [tls.validation_context_sds_secret_config] : []),
    ]
    for (const sds of sdsConfigs) {
      sds.sds_config ??= controlPlaneConfigSource(xdsClusterName)
      if (sds.name !== undefined) sds.name = qualifyName(scope, sds.name).name
    }
  }
}
