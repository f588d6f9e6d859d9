/**
 * TelemetryBuilder unit tests. Only `noop()` is exercised here, so no global
 * OTel provider is ever registered.
 */

import { describe, it, expect } from 'vitest'
import { TelemetryBuilder } from '../src/builder.js'

describe('TelemetryBuilder construction', () => {
  it('accepts a non-empty service name', () => {
    expect(new TelemetryBuilder('xds-reconciler')).toBeInstanceOf(TelemetryBuilder)
  })

  it('throws on empty string', () => {
    expect(() => new TelemetryBuilder('')).toThrow('serviceName must be a non-empty string')
  })

  it('throws on whitespace-only string', () => {
    expect(() => new TelemetryBuilder('  ')).toThrow()
  })
})

describe('TelemetryBuilder chainable API', () => {
  it('all .with*() methods return the same builder instance', () => {
    const builder = new TelemetryBuilder('svc')
    expect(builder.withLogger()).toBe(builder)
    expect(builder.withMetrics()).toBe(builder)
    expect(builder.withTracing({ samplingRatio: 0.5 })).toBe(builder)
  })
})

describe('TelemetryBuilder.noop()', () => {
  it('returns a ServiceTelemetry with the given serviceName', () => {
    expect(TelemetryBuilder.noop('test-svc').serviceName).toBe('test-svc')
  })

  it('scopes the logger under the root category', () => {
    const telemetry = TelemetryBuilder.noop('reconciler')
    expect(telemetry.logger.category).toEqual(['switchyard', 'reconciler'])
  })

  it('noop meter accepts counter and histogram recording', () => {
    const telemetry = TelemetryBuilder.noop('test')
    expect(() => {
      telemetry.meter.createCounter('test.counter').add(5, { key: 'value' })
      telemetry.meter.createHistogram('test.histogram').record(1.5)
    }).not.toThrow()
  })

  it('noop tracer accepts span creation and ending', () => {
    const telemetry = TelemetryBuilder.noop('test')
    expect(() => {
      telemetry.tracer.startActiveSpan('test-span', (span) => {
        span.setAttribute('key', 'value')
        span.end()
      })
    }).not.toThrow()
  })

  it('result is frozen', () => {
    expect(Object.isFrozen(TelemetryBuilder.noop('test'))).toBe(true)
  })
})
