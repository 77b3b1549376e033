import { Err, KnowledgeBaseError, seedDemoData } from '@offline-kb/core'
import { eventLine, summaryLines } from '../format.js'
import { done, integerOption, stringOption } from './types.js'
import type { Command } from './types.js'

export const adminCommands: Command[] = [
  {
    name: 'admin-log',
    usage: 'admin-log [--limit <n>] [--user <username>]',
    summary: 'Show recent administrator actions, newest first',
    options: { limit: { type: 'string' }, user: { type: 'string' } },
    run(ctx) {
      const limit = integerOption(ctx.values, 'limit')
      if (!limit.ok) return limit
      const user = stringOption(ctx.values, 'user')

      const events = ctx.services.adminEvents.list({
        ...(limit.value !== undefined ? { limit: limit.value } : {}),
        ...(user !== undefined ? { targetUsername: user } : {}),
      })
      if (!events.ok) return events
      if (events.value.length === 0) ctx.out('No administrator actions recorded.')
      for (const event of events.value) ctx.out(eventLine(event))
      return done()
    },
  },
  {
    name: 'admin-summary',
    usage: 'admin-summary',
    summary: 'Count the rows in every table',
    run(ctx) {
      const summary = ctx.services.summary()
      if (!summary.ok) return summary
      summaryLines(summary.value).forEach((line) => ctx.out(line))
      return done()
    },
  },
  {
    name: 'seed',
    usage: 'seed --admin-password <pw> [--admin-username <name>]',
    summary: 'Install a first administrator and demo decision records into an empty store',
    options: { 'admin-username': { type: 'string' }, 'admin-password': { type: 'string' } },
    run(ctx) {
      const password = stringOption(ctx.values, 'admin-password')
      if (password === undefined) return Err(KnowledgeBaseError.validation('Missing --admin-password'))

      const report = seedDemoData(ctx.services, {
        adminUsername: stringOption(ctx.values, 'admin-username') ?? 'admin',
        adminPassword: password,
      })
      if (!report.ok) return report
      ctx.out(
        `Seeded: admin ${report.value.adminCreated ? 'created' : 'kept'}, ` +
          `${report.value.decisionsCreated} decisions, ${report.value.commentsCreated} comments`,
      )
      return done()
    },
  },
]
