import { describe, it, expect, beforeEach, vi } from 'vitest'
import { openDatabase } from '../../src/storage/index.js'
import { createServices } from '../../src/services/index.js'
import type { Services } from '../../src/services/index.js'
import { parseExportDocument } from '../../src/transfer/index.js'
import type { ExportDocument } from '../../src/transfer/index.js'

function fresh(): Services {
  return createServices(openDatabase(':memory:'), { hashIterations: 1000 })
}

function populate(services: Services): void {
  services.knowledge.create({ title: 'Annealing', question: 'Furnace too hot?', answer: 'Lower the setpoint', tags: ['heat'] })
  services.knowledge.create({ title: 'Spindle', question: 'Vibration high?' })

  const first = services.decisions.create({ title: 'Valve swap', steps: 'swap it', tags: ['valve'] })
  const second = services.decisions.create({ title: 'Tool change' })
  if (!first.ok || !second.ok) throw new Error('setup failed')
  services.comments.create({ decisionRecordId: first.value.id, author: 'lead', body: 'Worked', rating: 5 })
  services.comments.create({ decisionRecordId: second.value.id, body: 'Slow', rating: 2 })
  services.comments.create({ decisionRecordId: second.value.id, body: 'Better', rating: 4 })

  services.accounts.register({ username: 'root', password: 'root-secret', isAdmin: true })
  services.accounts.register({ username: 'sam', password: 'sam-secret' })
}

function exported(services: Services, includePasswordHashes = true): ExportDocument {
  const doc = services.exportData({ includePasswordHashes })
  if (!doc.ok) throw new Error(`export failed: ${doc.error.message}`)
  return doc.value
}

beforeEach(() => {
  vi.spyOn(console, 'error').mockImplementation(() => {})
})

describe('exportData', () => {
  it('writes every collection in ascending order', () => {
    const source = fresh()
    populate(source)
    const doc = exported(source)

    expect(doc.format).toBe('offline-kb')
    expect(doc.version).toBe(1)
    expect(doc.knowledge.map((k) => k.title)).toEqual(['Annealing', 'Spindle'])
    expect(doc.decisions.map((d) => d.title)).toEqual(['Valve swap', 'Tool change'])
    expect(doc.decisions[1]?.comments.map((c) => c.body)).toEqual(['Slow', 'Better'])
    expect(doc.users.map((u) => u.username)).toEqual(['root', 'sam'])
    expect(doc.adminEvents).toHaveLength(1)
    expect(doc.adminEvents[0]?.action).toBe('create_admin')
  })

  it('includes password hashes unless told not to', () => {
    const source = fresh()
    populate(source)

    expect(exported(source).users[0]?.passwordHash).toMatch(/^pbkdf2_sha256\$/)
    expect(exported(source, false).users[0]).not.toHaveProperty('passwordHash')
  })

  it('produces a document the parser accepts after a JSON round trip', () => {
    const source = fresh()
    populate(source)
    const raw: unknown = JSON.parse(JSON.stringify(exported(source)))
    expect(parseExportDocument(raw).ok).toBe(true)
  })
})

describe('importData', () => {
  it('restores an export into an empty store', () => {
    const source = fresh()
    populate(source)
    const doc = exported(source)

    const target = fresh()
    const report = target.importData(doc, { mode: 'replace' })
    expect(report.ok).toBe(true)
    if (report.ok) {
      expect(report.value).toEqual({
        mode: 'replace',
        knowledge: 2,
        decisions: 2,
        comments: 3,
        users: 2,
        skippedUsers: [],
        usersNeedingReset: [],
      })
    }

    const knowledge = target.knowledge.list()
    if (!knowledge.ok) throw new Error('list failed')
    expect(knowledge.value.map(({ title, question, answer, tags, createdAt }) => ({ title, question, answer, tags, createdAt }))).toEqual(
      doc.knowledge.map(({ title, question, answer, tags, createdAt }) => ({ title, question, answer, tags, createdAt })),
    )

    expect(target.accounts.authenticate('root', 'root-secret').ok).toBe(true)
    expect(target.accounts.authenticate('sam', 'sam-secret').ok).toBe(true)
  })

  it('records imported admins instead of copying the document trail', () => {
    const source = fresh()
    populate(source)
    const target = fresh()
    target.importData(exported(source), { mode: 'replace' })

    const events = target.adminEvents.list()
    if (!events.ok) throw new Error('list failed')
    expect(events.value.map(({ actorUsername, action, targetUsername, details }) => ({ actorUsername, action, targetUsername, details }))).toEqual([
      { actorUsername: 'root', action: 'create_admin', targetUsername: 'root', details: 'import' },
    ])
  })

  it('reattaches comments to the new record ids', () => {
    const source = fresh()
    populate(source)
    const doc = exported(source)

    const target = fresh()
    target.decisions.create({ title: 'Already here' })
    target.decisions.create({ title: 'Also here' })
    const report = target.importData(doc, { mode: 'merge' })
    expect(report.ok).toBe(true)

    const list = target.decisions.list()
    if (!list.ok) throw new Error('list failed')
    const byTitle = new Map(list.value.map((item) => [item.title, item]))
    expect(byTitle.get('Already here')?.comments).toEqual({ count: 0, averageRating: null })
    expect(byTitle.get('Valve swap')?.comments).toEqual({ count: 1, averageRating: 5 })
    expect(byTitle.get('Tool change')?.comments).toEqual({ count: 2, averageRating: 3 })

    const toolChange = byTitle.get('Tool change')
    if (!toolChange) throw new Error('missing record')
    expect(toolChange.id).not.toBe(doc.decisions[1]?.id)
  })

  it('merge keeps local users and reports the skipped usernames', () => {
    const source = fresh()
    populate(source)
    const doc = exported(source)

    const target = fresh()
    target.accounts.register({ username: 'root', password: 'local-secret', isAdmin: true })
    target.knowledge.create({ title: 'Local', question: 'Mine?' })

    const report = target.importData(doc, { mode: 'merge', actor: 'root' })
    if (!report.ok) throw new Error(report.error.message)
    expect(report.value.skippedUsers).toEqual(['root'])
    expect(report.value.users).toBe(1)

    expect(target.accounts.authenticate('root', 'local-secret').ok).toBe(true)
    expect(target.accounts.authenticate('root', 'root-secret').ok).toBe(false)

    const knowledge = target.knowledge.list()
    if (knowledge.ok) expect(knowledge.value).toHaveLength(3)
  })

  it('replace wipes existing content first', () => {
    const source = fresh()
    populate(source)
    const doc = exported(source)

    const target = fresh()
    target.knowledge.create({ title: 'Local', question: 'Mine?' })
    target.accounts.register({ username: 'root', password: 'local-secret', isAdmin: true })

    const report = target.importData(doc, { mode: 'replace', actor: 'root' })
    if (!report.ok) throw new Error(report.error.message)
    expect(report.value.skippedUsers).toEqual([])

    const knowledge = target.knowledge.list()
    if (knowledge.ok) expect(knowledge.value.map((k) => k.title)).toEqual(['Annealing', 'Spindle'])
    expect(target.accounts.authenticate('root', 'root-secret').ok).toBe(true)
  })

  it('imports users without a hash as inactive and flags them for reset', () => {
    const source = fresh()
    populate(source)
    const doc = exported(source, false)

    const target = fresh()
    target.accounts.register({ username: 'boss', password: 'boss-secret', isAdmin: true })
    const report = target.importData(doc, { mode: 'merge', actor: 'boss' })
    if (!report.ok) throw new Error(report.error.message)
    expect(report.value.usersNeedingReset).toEqual(['root', 'sam'])

    const sam = target.accounts.get('sam')
    if (sam.ok) expect(sam.value.isActive).toBe(false)
    expect(target.accounts.authenticate('sam', 'sam-secret').ok).toBe(false)
  })

  it('treats the unusable hash marker like a missing hash', () => {
    const source = fresh()
    populate(source)
    const doc = exported(source)
    const users = doc.users.map((user) => (user.username === 'sam' ? { ...user, passwordHash: '!' } : user))

    const report = fresh().importData({ ...doc, users }, { mode: 'merge' })
    if (!report.ok) throw new Error(report.error.message)
    expect(report.value.usersNeedingReset).toEqual(['sam'])
  })

  it('refuses a replace that would leave no active administrator', () => {
    const source = fresh()
    populate(source)
    const doc = exported(source, false)

    const target = fresh()
    target.accounts.register({ username: 'root', password: 'local-secret', isAdmin: true })
    target.knowledge.create({ title: 'Local', question: 'Mine?' })

    const result = target.importData(doc, { mode: 'replace', actor: 'root' })
    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error.code).toBe('CONFLICT')
      expect(result.error.message).toBe('Import would leave no active administrator')
    }

    expect(target.accounts.authenticate('root', 'local-secret').ok).toBe(true)
    const knowledge = target.knowledge.list()
    if (knowledge.ok) expect(knowledge.value.map((k) => k.title)).toEqual(['Local'])
  })

  it('fails with IMPORT_ERROR on a malformed document', () => {
    const target = fresh()
    const result = target.importData({ format: 'offline-kb', version: 1, knowledge: 'nope' }, { mode: 'merge' })
    expect(result.ok).toBe(false)
    if (!result.ok) expect(result.error.code).toBe('IMPORT_ERROR')
  })

  it('fails with IMPORT_ERROR on an unsupported version', () => {
    const source = fresh()
    const doc = { ...exported(source), version: 2 }

    const result = fresh().importData(doc, { mode: 'merge' })
    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error.code).toBe('IMPORT_ERROR')
      expect(result.error.message).toBe('Unsupported export version: 2')
    }
  })

  it('writes nothing when the document repeats a username', () => {
    const source = fresh()
    populate(source)
    const doc = exported(source)
    const sam = doc.users[1]
    if (!sam) throw new Error('missing user')
    const broken = { ...doc, users: [...doc.users, sam] }

    const target = fresh()
    const result = target.importData(broken, { mode: 'merge' })
    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error.code).toBe('IMPORT_ERROR')
      expect(result.error.message).toBe('Duplicate username in document: sam')
    }

    const summary = target.summary()
    if (summary.ok) {
      expect(summary.value.knowledgeEntries).toBe(0)
      expect(summary.value.users).toBe(0)
    }
  })
})

describe('importData permissions', () => {
  function guarded(): Services {
    const services = fresh()
    services.accounts.register({ username: 'root', password: 'root-secret', isAdmin: true })
    services.accounts.register({ username: 'bob', password: 'bob-secret' })
    return services
  }

  function userDoc(users: ExportDocument['users']): ExportDocument {
    const doc = exported(fresh())
    return { ...doc, users }
  }

  const eve = {
    username: 'eve',
    passwordHash: 'pbkdf2_sha256$1000$00ff$00ff',
    isAdmin: true,
    isActive: true,
    createdAt: '2024-03-01T08:00:00.000Z',
  }

  it.each(['merge', 'replace'] as const)('%s needs an actor once the store has users', (mode) => {
    const target = guarded()
    const result = target.importData(userDoc([eve]), { mode })
    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error.code).toBe('PERMISSION_DENIED')
      expect(result.error.message).toBe('An administrator must perform this operation')
    }
    expect(target.accounts.get('eve').ok).toBe(false)
  })

  it.each(['merge', 'replace'] as const)('%s refuses a member as actor', (mode) => {
    const target = guarded()
    const bobAdmin = { ...eve, username: 'bob' }
    const result = target.importData(userDoc([bobAdmin]), { mode, actor: 'bob' })
    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error.code).toBe('PERMISSION_DENIED')
      expect(result.error.message).toBe('User bob is not an active administrator')
    }

    const bob = target.accounts.get('bob')
    if (bob.ok) expect(bob.value.isAdmin).toBe(false)
  })

  it('records a create_admin event for each admin an admin imports', () => {
    const target = guarded()
    const member = { ...eve, username: 'mia', isAdmin: false }
    const report = target.importData(userDoc([eve, member]), { mode: 'merge', actor: 'root' })
    if (!report.ok) throw new Error(report.error.message)
    expect(report.value.users).toBe(2)

    const events = target.adminEvents.list({ targetUsername: 'eve' })
    if (!events.ok) throw new Error('list failed')
    expect(events.value).toHaveLength(1)
    expect(events.value[0]).toMatchObject({ actorUsername: 'root', action: 'create_admin', details: 'import' })

    const mia = target.adminEvents.list({ targetUsername: 'mia' })
    if (mia.ok) expect(mia.value).toEqual([])
  })

  it('keeps the actor on the event when a replace removes the actor', () => {
    const target = guarded()
    const report = target.importData(userDoc([eve]), { mode: 'replace', actor: 'root' })
    if (!report.ok) throw new Error(report.error.message)

    expect(target.accounts.get('root').ok).toBe(false)
    const events = target.adminEvents.list({ targetUsername: 'eve' })
    if (events.ok) expect(events.value[0]?.actorUsername).toBe('root')
  })
})

describe('importData validation', () => {
  function withKnowledge(patch: Record<string, unknown>): Record<string, unknown> {
    const doc = exported(fresh())
    const entry = { id: 1, title: 'Annealing', question: 'Too hot?', answer: '', tags: [], createdAt: '2024-03-01T08:00:00.000Z' }
    return { ...doc, knowledge: [{ ...entry, ...patch }] }
  }

  it('rejects a blank title', () => {
    const result = fresh().importData(withKnowledge({ title: '   ' }), { mode: 'merge' })
    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error.code).toBe('IMPORT_ERROR')
      expect(result.error.message).toBe('knowledge.0.title: Title is required')
    }
  })

  it('rejects a blank question', () => {
    const result = fresh().importData(withKnowledge({ question: '' }), { mode: 'merge' })
    expect(result.ok).toBe(false)
    if (!result.ok) expect(result.error.message).toBe('knowledge.0.question: Question is required')
  })

  it('rejects a blank comment body', () => {
    const doc = exported(fresh())
    const decision = {
      id: 1,
      title: 'Valve swap',
      background: '',
      steps: '',
      result: '',
      tags: [],
      createdAt: '2024-03-01T08:00:00.000Z',
      comments: [{ id: 1, author: '', body: ' ', rating: 3, createdAt: '2024-03-01T08:00:00.000Z' }],
    }
    const result = fresh().importData({ ...doc, decisions: [decision] }, { mode: 'merge' })
    expect(result.ok).toBe(false)
    if (!result.ok) expect(result.error.message).toBe('decisions.0.comments.0.body: Comment body is required')
  })

  it('trims usernames the way registration does', () => {
    const source = fresh()
    populate(source)
    const doc = exported(source)
    const users = doc.users.map((user) => (user.username === 'root' ? { ...user, username: '  root  ' } : user))

    const target = fresh()
    const report = target.importData({ ...doc, users }, { mode: 'replace' })
    if (!report.ok) throw new Error(report.error.message)
    expect(target.accounts.authenticate('root', 'root-secret').ok).toBe(true)
  })

  it('rejects a password hash it could not verify', () => {
    const doc = exported(fresh())
    const user = {
      username: 'root',
      passwordHash: 'pbkdf2_sha256$99999999999$00$00',
      isAdmin: true,
      isActive: true,
      createdAt: '2024-03-01T08:00:00.000Z',
    }
    const target = fresh()
    const result = target.importData({ ...doc, users: [user] }, { mode: 'merge' })
    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error.code).toBe('IMPORT_ERROR')
      expect(result.error.message).toBe('users.0.passwordHash: Unrecognised password hash format')
    }
    expect(target.accounts.get('root').ok).toBe(false)
  })
})
