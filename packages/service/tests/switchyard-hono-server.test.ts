import { describe, it, expect } from 'vitest'
import { Hono } from 'hono'
import { SwitchyardHonoServer, switchyardHonoServer } from '../src/switchyard-hono-server.js'
import type { ManagedService } from '../src/types.js'

describe('SwitchyardHonoServer', () => {
  it('responds to /health', async () => {
    const server = new SwitchyardHonoServer(new Hono())

    const res = await server.app.request('/health')
    expect(res.status).toBe(200)
    expect(await res.json()).toEqual({ status: 'ok', services: [] })
  })

  it('mounts the provided handler', async () => {
    const handler = new Hono()
    handler.get('/ping', (c) => c.text('pong'))
    const server = new SwitchyardHonoServer(handler)

    const res = await server.app.request('/ping')
    expect(res.status).toBe(200)
    expect(await res.text()).toBe('pong')
  })

  it('includes service names in /health response', async () => {
    const service: ManagedService = {
      info: { name: 'xds-reconciler', version: '1.0.0' },
      shutdown: async () => {},
    }
    const server = new SwitchyardHonoServer(new Hono(), { services: [service] })

    const res = await server.app.request('/health')
    expect(await res.json()).toEqual({ status: 'ok', services: ['xds-reconciler'] })
  })

  it('throws when the port is read before start()', () => {
    const server = new SwitchyardHonoServer(new Hono())
    expect(() => server.port).toThrow('Server is not running')
  })

  it('stop() without start() still shuts services down', async () => {
    let stopped = 0
    const service: ManagedService = {
      info: { name: 'svc', version: '0.0.0' },
      shutdown: async () => {
        stopped++
      },
    }
    const server = switchyardHonoServer(new Hono(), { services: [service] })
    await server.stop()
    expect(stopped).toBe(1)
    expect(server).toBeInstanceOf(SwitchyardHonoServer)
  })
})
