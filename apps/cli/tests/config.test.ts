import { describe, it, expect } from 'vitest'
import { join } from 'node:path'
import { defaultDatabasePath, resolveConfig } from '../src/config.js'

describe('resolveConfig', () => {
  it('falls back to the per-user default path', () => {
    const config = resolveConfig({ env: {}, homeDir: '/home/kb' })
    expect(config.ok).toBe(true)
    if (config.ok) {
      expect(config.value.databasePath).toBe(join('/home/kb', '.local', 'share', 'offline-kb', 'knowledge.db'))
      expect(config.value.hashIterations).toBeUndefined()
    }
  })

  it('prefers OFFLINE_KB_DATABASE over the default', () => {
    const config = resolveConfig({ env: { OFFLINE_KB_DATABASE: '/data/kb.db' }, homeDir: '/home/kb' })
    if (config.ok) expect(config.value.databasePath).toBe('/data/kb.db')
  })

  it('prefers --database over the environment', () => {
    const config = resolveConfig({ databaseFlag: './local.db', env: { OFFLINE_KB_DATABASE: '/data/kb.db' } })
    if (config.ok) expect(config.value.databasePath).toBe('./local.db')
  })

  it('rejects an empty --database', () => {
    const config = resolveConfig({ databaseFlag: '  ', env: {} })
    expect(config.ok).toBe(false)
    if (!config.ok) expect(config.error.message).toBe('--database needs a path')
  })

  it('reads the hash iteration override', () => {
    const config = resolveConfig({ env: { OFFLINE_KB_HASH_ITERATIONS: '5000' } })
    if (config.ok) expect(config.value.hashIterations).toBe(5000)
  })

  it('rejects a non-numeric iteration count', () => {
    const config = resolveConfig({ env: { OFFLINE_KB_HASH_ITERATIONS: 'many' } })
    expect(config.ok).toBe(false)
    if (!config.ok) expect(config.error.code).toBe('VALIDATION_ERROR')
  })

  it('rejects an iteration count PBKDF2 would refuse', () => {
    const config = resolveConfig({ env: { OFFLINE_KB_HASH_ITERATIONS: '99999999999' } })
    expect(config.ok).toBe(false)
    if (!config.ok) expect(config.error.code).toBe('VALIDATION_ERROR')
  })

  it('builds the default path under the given home', () => {
    expect(defaultDatabasePath('/root')).toBe(join('/root', '.local', 'share', 'offline-kb', 'knowledge.db'))
  })
})
