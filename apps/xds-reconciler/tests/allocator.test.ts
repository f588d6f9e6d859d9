import { describe, it, expect } from 'vitest'
import { expandPortRange, createPortAllocator } from '../src/ports/allocator.js'

describe('expandPortRange', () => {
  it('expands single ports', () => {
    expect(expandPortRange([8000])).toEqual([8000])
  })

  it('expands mixed single ports and ranges', () => {
    expect(expandPortRange([8000, [9000, 9002], 10000])).toEqual([8000, 9000, 9001, 9002, 10000])
  })

  it('handles a range whose start equals its end', () => {
    expect(expandPortRange([[5000, 5000]])).toEqual([5000])
  })

  it('returns empty array for empty input', () => {
    expect(expandPortRange([])).toEqual([])
  })
})

describe('createPortAllocator', () => {
  describe('allocation', () => {
    it('allocates sequential ports for different listeners', () => {
      const allocator = createPortAllocator([8000, 8001, 8002])
      expect(allocator.allocate('default/web/a', false, true)).toEqual({ success: true, port: 8000 })
      expect(allocator.allocate('default/web/b', false, true)).toEqual({ success: true, port: 8001 })
      expect(allocator.availableCount()).toBe(1)
    })

    it('is idempotent per name', () => {
      const allocator = createPortAllocator([8000, 8001])
      allocator.allocate('default/web/a', false, true)
      expect(allocator.allocate('default/web/a', false, true)).toEqual({ success: true, port: 8000 })
      expect(allocator.availableCount()).toBe(1)
    })

    it('returns an error when the pool is exhausted', () => {
      const allocator = createPortAllocator([8000])
      allocator.allocate('default/web/a', false, true)
      expect(allocator.allocate('default/web/b', false, true)).toEqual({
        success: false,
        error: 'No ports available',
      })
    })

    it('records the lease request', () => {
      const allocator = createPortAllocator([8000])
      allocator.allocate('default/web/a', true, false)
      expect(allocator.getLease('default/web/a')).toEqual({
        name: 'default/web/a',
        port: 8000,
        ingress: true,
        localOnly: false,
        state: 'allocated',
      })
    })
  })

  describe('ack', () => {
    it('commits a lease', async () => {
      const allocator = createPortAllocator([8000])
      allocator.allocate('default/web/a', false, true)
      await allocator.ack('default/web/a')
      expect(allocator.getLease('default/web/a')?.state).toBe('committed')
    })

    it('is a no-op for unknown names', async () => {
      const allocator = createPortAllocator([8000])
      await expect(allocator.ack('missing')).resolves.toBeUndefined()
    })

    it('fails when its signal is aborted', async () => {
      const allocator = createPortAllocator([8000])
      allocator.allocate('default/web/a', false, true)
      await expect(allocator.ack('default/web/a', AbortSignal.abort())).rejects.toThrow()
      expect(allocator.getLease('default/web/a')?.state).toBe('allocated')
    })
  })

  describe('release', () => {
    it('returns the port to the pool', async () => {
      const allocator = createPortAllocator([8000])
      allocator.allocate('default/web/a', false, true)
      await allocator.release('default/web/a')
      expect(allocator.getPort('default/web/a')).toBeUndefined()
      expect(allocator.allocate('default/web/b', false, true)).toEqual({ success: true, port: 8000 })
    })

    it('is idempotent', async () => {
      const allocator = createPortAllocator([8000, 8001])
      allocator.allocate('default/web/a', false, true)
      await allocator.release('default/web/a')
      await allocator.release('default/web/a')
      expect(allocator.availableCount()).toBe(2)
    })
  })

  describe('restart recovery', () => {
    it('reserves re-hydrated ports as committed leases', () => {
      const existing = new Map([['default/web/a', 8001]])
      const allocator = createPortAllocator([8000, 8001, 8002], existing)
      expect(allocator.getPort('default/web/a')).toBe(8001)
      expect(allocator.getLease('default/web/a')?.state).toBe('committed')
      expect(allocator.availableCount()).toBe(2)
      expect(allocator.allocate('default/web/b', false, true)).toEqual({ success: true, port: 8000 })
    })

    it('drops re-hydrated ports outside the pool', () => {
      const existing = new Map([
        ['default/web/a', 8000],
        ['default/web/rogue', 9999],
      ])
      const allocator = createPortAllocator([8000, 8001], existing)
      expect(allocator.getAllocations()).toEqual(new Map([['default/web/a', 8000]]))
      expect(allocator.availableCount()).toBe(1)
    })
  })
})
