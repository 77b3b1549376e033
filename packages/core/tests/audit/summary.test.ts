import { describe, it, expect } from 'vitest'
import { openDatabase } from '../../src/storage/index.js'
import { createServices } from '../../src/services/index.js'

describe('buildSummary', () => {
  it('reports zeros for an empty store', () => {
    const services = createServices(openDatabase(':memory:'))
    const summary = services.summary()
    expect(summary.ok).toBe(true)
    if (summary.ok) {
      expect(summary.value).toEqual({
        knowledgeEntries: 0,
        decisionRecords: 0,
        comments: 0,
        users: 0,
        admins: 0,
        activeUsers: 0,
      })
    }
  })

  it('counts every table', () => {
    const services = createServices(openDatabase(':memory:'), { hashIterations: 1000 })
    services.knowledge.create({ title: 'K', question: 'Q?' })
    const record = services.decisions.create({ title: 'D' })
    if (!record.ok) throw new Error('setup failed')
    services.comments.create({ decisionRecordId: record.value.id, body: 'ok', rating: 4 })
    services.comments.create({ decisionRecordId: record.value.id, body: 'meh', rating: 2 })
    services.accounts.register({ username: 'root', password: 'test-secret', isAdmin: true })
    services.accounts.register({ username: 'sam', password: 'test-secret' })
    services.accounts.deactivate('sam', 'root')

    const summary = services.summary()
    if (!summary.ok) throw new Error('summary failed')
    expect(summary.value).toEqual({
      knowledgeEntries: 1,
      decisionRecords: 1,
      comments: 2,
      users: 2,
      admins: 1,
      activeUsers: 1,
    })
  })
})
