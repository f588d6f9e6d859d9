import { describe, it, expect, vi } from 'vitest'
import { ProxyConfigManager } from '../src/config-manager.js'
import { XdsReconciler } from '../src/engine/reconciler.js'
import { createPortAllocator } from '../src/ports/allocator.js'
import { ConfigRpcServer } from '../src/rpc/server.js'
import { FakeDataPlane } from './helpers/fake-data-plane.js'
import type { Reply, RecordedCall } from './helpers/fake-data-plane.js'
import { httpListener, staticCluster, testProxyConfig } from './helpers/fixtures.js'

function serverFor(policy?: (call: RecordedCall) => Reply) {
  const proxy = testProxyConfig()
  const plane = new FakeDataPlane(policy)
  const manager = new ProxyConfigManager({
    reconciler: new XdsReconciler({ channel: plane, ackTimeoutMs: proxy.ackTimeoutMs }),
    allocator: createPortAllocator(proxy.portRange),
    proxy,
  })
  return { server: new ConfigRpcServer({ manager }), manager, plane }
}

const request = {
  namespace: 'default',
  name: 'web',
  resources: [httpListener('http'), staticCluster('backend')],
}

describe('ConfigRpcServer', () => {
  it('applies a batch and lists it', async () => {
    const { server } = serverFor()

    await expect(server.applyConfig(request)).resolves.toEqual({ success: true })
    await expect(server.listConfigs()).resolves.toEqual([
      {
        namespace: 'default',
        name: 'web',
        counts: { listener: 1, route: 0, cluster: 1, endpoint: 0, secret: 0 },
      },
    ])
  })

  it('rejects a malformed envelope', async () => {
    const { server, plane } = serverFor()

    const result = await server.applyConfig({ namespace: 'default/x', name: 'web', resources: [] })
    expect(result).toMatchObject({ success: false, code: 'INVALID_REQUEST' })
    expect(plane.calls).toEqual([])
  })

  it('rejects resources that are not objects', async () => {
    const { server } = serverFor()
    const result = await server.applyConfig({ namespace: 'default', name: 'web', resources: ['x'] })
    expect(result).toMatchObject({ success: false, code: 'INVALID_REQUEST' })
  })

  it('returns reconciliation errors with their code', async () => {
    const { server } = serverFor()

    const result = await server.applyConfig({
      namespace: 'default',
      name: 'web',
      resources: [staticCluster('backend'), staticCluster('backend')],
    })
    expect(result).toEqual({
      success: false,
      error: 'Duplicate cluster name "backend"',
      code: 'DUPLICATE_NAME',
    })
  })

  it('reports a rejected push', async () => {
    const { server } = serverFor((call) => (call.kind === 'listener' ? 'nack' : 'ack'))

    const result = await server.applyConfig(request)
    expect(result).toMatchObject({ success: false, code: 'PUSH_REJECTED' })
    await expect(server.listConfigs()).resolves.toEqual([])
  })

  it('maps unexpected failures to INTERNAL', async () => {
    const { server, manager } = serverFor()
    vi.spyOn(manager, 'apply').mockRejectedValue(new Error('queue stopped'))

    await expect(server.applyConfig(request)).resolves.toEqual({
      success: false,
      error: 'queue stopped',
      code: 'INTERNAL',
    })
  })

  it('deletes an applied scope', async () => {
    const { server, plane } = serverFor()
    await server.applyConfig(request)

    await expect(server.deleteConfig({ namespace: 'default', name: 'web' })).resolves.toEqual({
      success: true,
    })
    expect(plane.state.size).toBe(0)
  })

  it('reports a scope that was never applied', async () => {
    const { server } = serverFor()

    await expect(server.deleteConfig({ namespace: 'default', name: 'web' })).resolves.toEqual({
      success: false,
      error: 'No config applied for default/web',
      code: 'NOT_FOUND',
    })
  })

  it('rejects a delete without a scope', async () => {
    const { server } = serverFor()
    const result = await server.deleteConfig({ namespace: 'default' })
    expect(result).toMatchObject({ success: false, code: 'INVALID_REQUEST' })
  })
})
