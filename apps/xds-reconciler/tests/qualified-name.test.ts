import { describe, it, expect } from 'vitest'
import { qualifyName, qualifyNameForced, scopeKey } from '../src/resources/qualified-name.js'

const scope = { namespace: 'default', name: 'web' }

describe('qualifyName', () => {
  it('prefixes an unscoped name with namespace and name', () => {
    expect(qualifyName(scope, 'backend')).toEqual({ name: 'default/web/backend', updated: true })
  })

  it('leaves a name containing a slash untouched', () => {
    expect(qualifyName(scope, 'other/app/backend')).toEqual({
      name: 'other/app/backend',
      updated: false,
    })
  })

  it('leaves an empty name untouched', () => {
    expect(qualifyName(scope, '')).toEqual({ name: '', updated: false })
  })

  it('is idempotent', () => {
    const once = qualifyName(scope, 'backend').name
    expect(qualifyName(scope, once)).toEqual({ name: once, updated: false })
  })

  it('qualifies a reference the same way as its definition', () => {
    expect(qualifyName(scope, 'backend').name).toBe(qualifyName(scope, 'backend').name)
  })
})

describe('qualifyNameForced', () => {
  it('prefixes an unscoped name', () => {
    expect(qualifyNameForced(scope, 'listener')).toEqual({
      name: 'default/web/listener',
      updated: true,
    })
  })

  it('keeps a name already scoped by the same namespace', () => {
    expect(qualifyNameForced(scope, 'default/web/listener').updated).toBe(false)
    expect(qualifyNameForced(scope, 'default/other/listener').updated).toBe(false)
  })

  it('prefixes a name scoped by another namespace', () => {
    expect(qualifyNameForced(scope, 'kube-system/app/listener').name).toBe(
      'default/web/kube-system/app/listener'
    )
  })

  it('prefixes a name whose first segment only starts with the namespace', () => {
    expect(qualifyNameForced(scope, 'defaults/app/listener').name).toBe(
      'default/web/defaults/app/listener'
    )
  })

  it('leaves an empty name untouched', () => {
    expect(qualifyNameForced(scope, '')).toEqual({ name: '', updated: false })
  })

  it('is idempotent', () => {
    const once = qualifyNameForced(scope, 'kube-system/app/listener').name
    expect(qualifyNameForced(scope, once)).toEqual({ name: once, updated: false })
  })
})

describe('scopeKey', () => {
  it('joins namespace and name', () => {
    expect(scopeKey(scope)).toBe('default/web')
  })
})
