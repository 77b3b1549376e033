import { describe, it, expect, beforeEach } from 'vitest'
import { openDatabase } from '../../src/storage/index.js'
import { AccountService } from '../../src/accounts/index.js'
import { AdminEventRepository } from '../../src/audit/index.js'
import type Database from 'better-sqlite3'

let db: Database.Database
let accounts: AccountService
let events: AdminEventRepository

function register(username: string, options: { isAdmin?: boolean; actor?: string } = {}) {
  const result = accounts.register({ username, password: `${username}-pw`, ...options })
  if (!result.ok) throw new Error(`setup failed: ${result.error.message}`)
  return result.value
}

function eventCount(): number {
  return (db.prepare('SELECT COUNT(*) AS count FROM admin_events').get() as { count: number }).count
}

beforeEach(() => {
  db = openDatabase(':memory:')
  accounts = new AccountService(db, { hashIterations: 1000 })
  events = new AdminEventRepository(db)
})

describe('AccountService', () => {
  describe('register', () => {
    it('creates an active member by default', () => {
      const result = accounts.register({ username: 'sam', password: 'test-secret' })
      expect(result.ok).toBe(true)
      if (result.ok) {
        expect(result.value.username).toBe('sam')
        expect(result.value.isAdmin).toBe(false)
        expect(result.value.isActive).toBe(true)
        expect(result.value).not.toHaveProperty('passwordHash')
      }
    })

    it('stores a salted hash, never the raw password', () => {
      register('sam')
      const row = db.prepare('SELECT password_hash FROM users WHERE username = ?').get('sam') as { password_hash: string }
      expect(row.password_hash).not.toContain('sam-pw')
      expect(row.password_hash.startsWith('pbkdf2_sha256$1000$')).toBe(true)
    })

    it('rejects a taken username with CONFLICT', () => {
      register('sam')
      const result = accounts.register({ username: 'sam', password: 'other' })
      expect(result.ok).toBe(false)
      if (!result.ok) {
        expect(result.error.code).toBe('CONFLICT')
        expect(result.error.message).toBe('Username already taken: sam')
      }
    })

    it('rejects empty credentials', () => {
      const result = accounts.register({ username: ' ', password: '' })
      expect(result.ok).toBe(false)
      if (!result.ok) expect(result.error.code).toBe('VALIDATION_ERROR')
    })

    it('lets the first account bootstrap itself as admin and logs it', () => {
      const root = register('root', { isAdmin: true })
      expect(root.isAdmin).toBe(true)

      const logged = events.list()
      if (!logged.ok) throw new Error('list failed')
      expect(logged.value).toHaveLength(1)
      expect(logged.value[0]).toMatchObject({ actorUsername: 'root', action: 'create_admin', targetUsername: 'root' })
    })

    it('requires an admin actor for later admin accounts', () => {
      register('root', { isAdmin: true })
      register('sam')

      const denied = accounts.register({ username: 'eve', password: 'pw', isAdmin: true, actor: 'sam' })
      expect(denied.ok).toBe(false)
      if (!denied.ok) expect(denied.error.code).toBe('PERMISSION_DENIED')
      expect(accounts.get('eve').ok).toBe(false)

      const allowed = accounts.register({ username: 'ops', password: 'pw', isAdmin: true, actor: 'root' })
      expect(allowed.ok).toBe(true)
      expect(eventCount()).toBe(2)
    })
  })

  describe('authenticate', () => {
    it('accepts the right password', () => {
      register('sam')
      const result = accounts.authenticate('sam', 'sam-pw')
      expect(result.ok).toBe(true)
      if (result.ok) expect(result.value.username).toBe('sam')
    })

    it('fails with AUTH_FAILED on a wrong password or unknown user', () => {
      register('sam')
      for (const [user, pw] of [['sam', 'nope'], ['ghost', 'sam-pw']]) {
        const result = accounts.authenticate(user, pw)
        expect(result.ok).toBe(false)
        if (!result.ok) expect(result.error.code).toBe('AUTH_FAILED')
      }
    })

    it('fails for a deactivated user', () => {
      register('root', { isAdmin: true })
      register('sam')
      expect(accounts.deactivate('sam', 'root').ok).toBe(true)

      const result = accounts.authenticate('sam', 'sam-pw')
      expect(result.ok).toBe(false)
      if (!result.ok) expect(result.error.code).toBe('AUTH_FAILED')
    })
  })

  describe('privileged transitions', () => {
    beforeEach(() => {
      register('root', { isAdmin: true })
      register('sam')
    })

    it('promote succeeds for an active admin and appends exactly one event', () => {
      const before = eventCount()
      const result = accounts.promote('sam', 'root')
      expect(result.ok).toBe(true)
      if (result.ok) expect(result.value.isAdmin).toBe(true)

      expect(eventCount()).toBe(before + 1)
      const latest = events.list({ limit: 1 })
      if (!latest.ok) throw new Error('list failed')
      expect(latest.value[0]).toMatchObject({ actorUsername: 'root', action: 'promote', targetUsername: 'sam' })
    })

    it('promote fails with PERMISSION_DENIED for a non-admin actor and logs nothing', () => {
      register('eve')
      const before = eventCount()
      const result = accounts.promote('eve', 'sam')
      expect(result.ok).toBe(false)
      if (!result.ok) expect(result.error.code).toBe('PERMISSION_DENIED')
      expect(eventCount()).toBe(before)
      const eve = accounts.get('eve')
      if (eve.ok) expect(eve.value.isAdmin).toBe(false)
    })

    it('rejects an unknown or inactive admin actor', () => {
      register('ops', { isAdmin: true, actor: 'root' })
      expect(accounts.deactivate('ops', 'root').ok).toBe(true)

      for (const actor of ['ghost', 'ops', '']) {
        const result = accounts.promote('sam', actor)
        expect(result.ok).toBe(false)
        if (!result.ok) expect(result.error.code).toBe('PERMISSION_DENIED')
      }
    })

    it('returns NOT_FOUND for an unknown target', () => {
      const result = accounts.promote('ghost', 'root')
      expect(result.ok).toBe(false)
      if (!result.ok) expect(result.error.code).toBe('NOT_FOUND')
    })

    it('refuses a transition to the current state without logging', () => {
      const before = eventCount()
      const result = accounts.demote('sam', 'root')
      expect(result.ok).toBe(false)
      if (!result.ok) {
        expect(result.error.code).toBe('VALIDATION_ERROR')
        expect(result.error.message).toBe('User sam is not an administrator')
      }
      expect(eventCount()).toBe(before)
    })

    it('demote, deactivate and activate each log one event', () => {
      expect(accounts.promote('sam', 'root').ok).toBe(true)
      expect(accounts.demote('sam', 'root').ok).toBe(true)
      expect(accounts.deactivate('sam', 'root').ok).toBe(true)
      const activated = accounts.activate('sam', 'root')
      expect(activated.ok).toBe(true)
      if (activated.ok) expect(activated.value).toMatchObject({ isAdmin: false, isActive: true })

      const logged = events.list({ targetUsername: 'sam' })
      if (!logged.ok) throw new Error('list failed')
      expect(logged.value.map((e) => e.action)).toEqual(['activate', 'deactivate', 'demote', 'promote'])
    })

    it('keeps at least one active admin', () => {
      const demoted = accounts.demote('root', 'root')
      expect(demoted.ok).toBe(false)
      if (!demoted.ok) expect(demoted.error.code).toBe('CONFLICT')

      const deactivated = accounts.deactivate('root', 'root')
      expect(deactivated.ok).toBe(false)
      if (!deactivated.ok) expect(deactivated.error.code).toBe('CONFLICT')
    })

    it('rolls back the mutation when the audit write fails', () => {
      db.exec('DROP TABLE admin_events')

      const result = accounts.promote('sam', 'root')
      expect(result.ok).toBe(false)
      if (!result.ok) expect(result.error.code).toBe('DB_ERROR')

      const sam = accounts.get('sam')
      if (!sam.ok) throw new Error('get failed')
      expect(sam.value.isAdmin).toBe(false)
    })
  })

  describe('passwords', () => {
    beforeEach(() => {
      register('root', { isAdmin: true })
      register('sam')
    })

    it('resetPassword is admin-gated and logged', () => {
      const denied = accounts.resetPassword('root', 'hijack', 'sam')
      expect(denied.ok).toBe(false)
      if (!denied.ok) expect(denied.error.code).toBe('PERMISSION_DENIED')

      const reset = accounts.resetPassword('sam', 'fresh-secret', 'root')
      expect(reset.ok).toBe(true)
      expect(accounts.authenticate('sam', 'fresh-secret').ok).toBe(true)
      expect(accounts.authenticate('sam', 'sam-pw').ok).toBe(false)

      const latest = events.list({ limit: 1 })
      if (!latest.ok) throw new Error('list failed')
      expect(latest.value[0]).toMatchObject({ action: 'reset_password', targetUsername: 'sam' })
    })

    it('changePassword requires the current password', () => {
      const wrong = accounts.changePassword('sam', 'wrong', 'new-secret')
      expect(wrong.ok).toBe(false)
      if (!wrong.ok) expect(wrong.error.code).toBe('AUTH_FAILED')
      expect(accounts.authenticate('sam', 'sam-pw').ok).toBe(true)

      const before = eventCount()
      expect(accounts.changePassword('sam', 'sam-pw', 'new-secret').ok).toBe(true)
      expect(accounts.authenticate('sam', 'new-secret').ok).toBe(true)
      expect(eventCount()).toBe(before)
    })
  })

  it('lists users in registration order', () => {
    register('root', { isAdmin: true })
    register('sam')
    const result = accounts.list()
    if (!result.ok) throw new Error('list failed')
    expect(result.value.map((u) => u.username)).toEqual(['root', 'sam'])
  })
})
