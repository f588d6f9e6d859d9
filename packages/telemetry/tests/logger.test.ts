import { afterEach, describe, expect, it } from 'vitest'
import type { LogRecord } from '@logtape/logtape'
import {
  configureLogger,
  createJsonSink,
  createPrettySink,
  formatMessage,
  resetLogger,
} from '../src/logger.js'

function record(overrides: Partial<LogRecord> = {}): LogRecord {
  return {
    category: ['switchyard', 'ports'],
    level: 'info',
    message: ['port ', 10000, ' leased'],
    rawMessage: 'port {port} leased',
    timestamp: 0,
    properties: {},
    ...overrides,
  }
}

describe('formatMessage', () => {
  it('joins interpolated values', () => {
    expect(formatMessage(record())).toBe('port 10000 leased')
  })

  it('renders errors by message and objects as JSON', () => {
    const msg = formatMessage(
      record({ message: ['failed: ', new Error('boom'), ' ', { port: 1 }, ''] })
    )
    expect(msg).toBe('failed: boom {"port":1}')
  })
})

describe('createJsonSink', () => {
  it('writes one JSON line per record', () => {
    const lines: string[] = []
    createJsonSink((line) => lines.push(line))(record())
    expect(lines).toEqual([
      '{"timestamp":0,"level":"info","category":"switchyard.ports","message":"port 10000 leased"}\n',
    ])
  })

  it('includes properties when present', () => {
    const lines: string[] = []
    createJsonSink((line) => lines.push(line))(record({ properties: { listener: 'l1' } }))
    expect(JSON.parse(lines[0])).toMatchObject({ properties: { listener: 'l1' } })
  })
})

describe('createPrettySink', () => {
  it('writes the level, category and message', () => {
    const lines: string[] = []
    createPrettySink((line) => lines.push(line))(record({ level: 'warning' }))
    expect(lines).toHaveLength(1)
    expect(lines[0]).toContain('WARNING')
    expect(lines[0]).toContain('switchyard.ports')
    expect(lines[0].endsWith(': port 10000 leased')).toBe(true)
  })
})

describe('configureLogger', () => {
  afterEach(async () => {
    await resetLogger()
  })

  it('is idempotent', async () => {
    await configureLogger({ environment: 'test', level: 'error' })
    await expect(configureLogger({ environment: 'test' })).resolves.toBeUndefined()
  })

  it('can be configured again after reset', async () => {
    await configureLogger({ environment: 'test' })
    await resetLogger()
    await expect(configureLogger({ environment: 'test' })).resolves.toBeUndefined()
  })
})
