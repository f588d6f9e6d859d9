import { describe, expect, it } from 'vitest'
import { validateEnvironment, validateLogLevel } from '../src/constants.js'
import { createSampler } from '../src/tracer.js'

describe('validateLogLevel', () => {
  it('accepts known levels', () => {
    expect(validateLogLevel('debug')).toBe('debug')
    expect(validateLogLevel('warning')).toBe('warning')
  })

  it('returns undefined for missing or unknown levels', () => {
    expect(validateLogLevel(undefined)).toBeUndefined()
    expect(validateLogLevel('verbose')).toBeUndefined()
  })
})

describe('validateEnvironment', () => {
  it('accepts known environments', () => {
    expect(validateEnvironment('production')).toBe('production')
  })

  it('returns undefined for unknown environments', () => {
    expect(validateEnvironment('staging')).toBeUndefined()
  })
})

describe('createSampler', () => {
  it('uses the SDK default outside production without a ratio', () => {
    expect(createSampler(undefined, 'development')).toBeUndefined()
  })

  it('builds a parent-based ratio sampler for an explicit ratio', () => {
    expect(createSampler(0.25, undefined)?.toString()).toContain('TraceIdRatioBased{0.25}')
  })

  it('clamps the ratio into [0, 1]', () => {
    expect(createSampler(7, undefined)?.toString()).toContain('TraceIdRatioBased{1}')
  })

  it('samples 1% in production by default', () => {
    expect(createSampler(undefined, 'production')?.toString()).toContain('TraceIdRatioBased{0.01}')
  })
})
