import { describe, it, expect } from 'vitest'
import { TypeMismatchError } from '../src/errors.js'
import { hasNamed, insertBefore } from '../src/resources/filter-chain.js'
import {
  classifyClusterSpecifier,
  classifyNetworkFilter,
  classifyTransportSocket,
  isTerminalNetworkFilter,
} from '../src/resources/typed-config.js'
import {
  DOWNSTREAM_TLS_TYPE_URL,
  HCM_TYPE_URL,
  TCP_PROXY_TYPE_URL,
  UPSTREAM_TLS_TYPE_URL,
} from '../src/resources/types.js'

describe('insertBefore', () => {
  it('inserts before the first matching element', () => {
    expect(insertBefore(['a', 'b', 'c', 'b'], 'x', (e) => e === 'b')).toEqual([
      'a',
      'x',
      'b',
      'c',
      'b',
    ])
  })

  it('inserts at the front when the first element matches', () => {
    expect(insertBefore(['a'], 'x', (e) => e === 'a')).toEqual(['x', 'a'])
  })

  it('returns undefined without a match', () => {
    expect(insertBefore(['a'], 'x', (e) => e === 'z')).toBeUndefined()
  })

  it('leaves the input unchanged', () => {
    const items = ['a', 'b']
    insertBefore(items, 'x', (e) => e === 'b')
    expect(items).toEqual(['a', 'b'])
  })
})

describe('hasNamed', () => {
  it('matches by name', () => {
    expect(hasNamed([{ name: 'a' }], 'a')).toBe(true)
    expect(hasNamed([{ name: 'a' }], 'b')).toBe(false)
    expect(hasNamed(undefined, 'a')).toBe(false)
  })
})

describe('classifyNetworkFilter', () => {
  it('recognizes the connection manager', () => {
    const filter = { name: 'hcm', typed_config: { '@type': HCM_TYPE_URL, stat_prefix: 'in' } }
    expect(isTerminalNetworkFilter(filter)).toBe(true)
    expect(classifyNetworkFilter(filter)).toEqual({
      kind: 'http-connection-manager',
      config: { '@type': HCM_TYPE_URL, stat_prefix: 'in' },
    })
  })

  it('recognizes the TCP proxy', () => {
    const filter = { name: 'tcp', typed_config: { '@type': TCP_PROXY_TYPE_URL, cluster: 'c' } }
    expect(classifyNetworkFilter(filter)).toEqual({
      kind: 'tcp-proxy',
      config: { '@type': TCP_PROXY_TYPE_URL, cluster: 'c' },
    })
  })

  it('treats any other filter as other', () => {
    const filter = { name: 'rbac', typed_config: { '@type': 'type.googleapis.com/example.Rbac' } }
    expect(isTerminalNetworkFilter(filter)).toBe(false)
    expect(classifyNetworkFilter(filter)).toEqual({ kind: 'other' })
    expect(classifyNetworkFilter({ name: 'bare' })).toEqual({ kind: 'other' })
  })

  it('rejects a config that does not match its type tag', () => {
    const filter = { name: 'tcp', typed_config: { '@type': TCP_PROXY_TYPE_URL, cluster: 7 } }
    expect(() => classifyNetworkFilter(filter)).toThrow(TypeMismatchError)
  })
})

describe('classifyTransportSocket', () => {
  it('recognizes downstream and upstream TLS', () => {
    expect(
      classifyTransportSocket({ typed_config: { '@type': DOWNSTREAM_TLS_TYPE_URL } }).kind
    ).toBe('downstream-tls')
    expect(classifyTransportSocket({ typed_config: { '@type': UPSTREAM_TLS_TYPE_URL } }).kind).toBe(
      'upstream-tls'
    )
  })

  it('treats raw buffer and missing configs as other', () => {
    expect(
      classifyTransportSocket({
        typed_config: {
          '@type': 'type.googleapis.com/envoy.extensions.transport_sockets.raw_buffer.v3.RawBuffer',
        },
      })
    ).toEqual({ kind: 'other' })
    expect(classifyTransportSocket({ name: 'tls' })).toEqual({ kind: 'other' })
  })
})

describe('classifyClusterSpecifier', () => {
  it('prefers a single cluster', () => {
    expect(classifyClusterSpecifier({ cluster: 'c' })).toEqual({ kind: 'cluster', cluster: 'c' })
  })

  it('returns weighted clusters', () => {
    expect(
      classifyClusterSpecifier({ weighted_clusters: { clusters: [{ name: 'a' }, { name: 'b' }] } })
    ).toEqual({ kind: 'weighted-clusters', clusters: [{ name: 'a' }, { name: 'b' }] })
  })

  it('treats header-based routing as other', () => {
    expect(classifyClusterSpecifier({})).toEqual({ kind: 'other' })
  })
})
