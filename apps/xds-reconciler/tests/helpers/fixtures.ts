import { ProxyConfigSchema } from '@switchyard/config'
import type { ProxyConfig } from '@switchyard/config'
import type { NormalizerOptions } from '../../src/resources/normalizer.js'
import type { ConfigScope } from '../../src/resources/qualified-name.js'
import { HCM_TYPE_URL, ROUTER_FILTER_NAME, TCP_PROXY_TYPE_URL, TYPE_URLS } from '../../src/resources/types.js'
import type { RawResource } from '../../src/resources/types.js'

export const SCOPE: ConfigScope = { namespace: 'default', name: 'web' }

export const ROUTER_TYPE_URL = 'type.googleapis.com/envoy.extensions.filters.http.router.v3.Router'

export function testProxyConfig(overrides: Record<string, unknown> = {}): ProxyConfig {
  return ProxyConfigSchema.parse({ portRange: [[20000, 20009]], ackTimeoutMs: 1000, ...overrides })
}

export function normalizerOptions(overrides: Partial<NormalizerOptions> = {}): NormalizerOptions {
  const proxy = testProxyConfig()
  return {
    scope: SCOPE,
    filterNames: proxy.filterNames,
    enableBpfTproxy: false,
    useOriginalSourceAddress: true,
    l7LoadBalancer: false,
    xdsClusterName: proxy.xdsClusterName,
    ...overrides,
  }
}

/** Listener with one HTTP connection manager chain reading routes over RDS. */
export function httpListener(name: string, extra: Record<string, unknown> = {}): RawResource {
  return {
    '@type': TYPE_URLS.listener,
    name,
    filter_chains: [
      {
        filters: [
          {
            name: 'envoy.filters.network.http_connection_manager',
            typed_config: {
              '@type': HCM_TYPE_URL,
              stat_prefix: name,
              rds: { route_config_name: `${name}-routes` },
              http_filters: [{ name: ROUTER_FILTER_NAME, typed_config: { '@type': ROUTER_TYPE_URL } }],
            },
          },
        ],
      },
    ],
    ...extra,
  }
}

/** Listener forwarding raw TCP to `cluster`. */
export function tcpListener(name: string, cluster: string, extra: Record<string, unknown> = {}): RawResource {
  return {
    '@type': TYPE_URLS.listener,
    name,
    filter_chains: [
      {
        filters: [
          {
            name: 'envoy.filters.network.tcp_proxy',
            typed_config: { '@type': TCP_PROXY_TYPE_URL, stat_prefix: name, cluster },
          },
        ],
      },
    ],
    ...extra,
  }
}

export function routeConfig(name: string, cluster: string): RawResource {
  return {
    '@type': TYPE_URLS.route,
    name,
    virtual_hosts: [
      {
        name: 'all',
        domains: ['*'],
        routes: [{ match: { prefix: '/' }, route: { cluster } }],
      },
    ],
  }
}

export function staticCluster(name: string, extra: Record<string, unknown> = {}): RawResource {
  return {
    '@type': TYPE_URLS.cluster,
    name,
    connect_timeout: '0.25s',
    type: 'STATIC',
    ...extra,
  }
}

export function endpoints(clusterName: string): RawResource {
  return {
    '@type': TYPE_URLS.endpoint,
    cluster_name: clusterName,
    endpoints: [
      {
        lb_endpoints: [
          { endpoint: { address: { socket_address: { address: '10.0.0.1', port_value: 8080 } } } },
        ],
      },
    ],
  }
}

export function secret(name: string): RawResource {
  return {
    '@type': TYPE_URLS.secret,
    name,
    tls_certificate: { certificate_chain: { inline_string: 'test-certificate' } },
  }
}

export function address(port: number, host = '0.0.0.0'): Record<string, unknown> {
  return { socket_address: { address: host, port_value: port } }
}
