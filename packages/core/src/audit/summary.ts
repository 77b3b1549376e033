/**
 * Row counts for the admin overview.
 */

import type Database from 'better-sqlite3'
import { Ok, Err, KnowledgeBaseError } from '../common/index.js'
import type { Result } from '../common/index.js'

export interface StoreSummary {
  knowledgeEntries: number
  decisionRecords: number
  comments: number
  users: number
  admins: number
  activeUsers: number
}

export function buildSummary(db: Database.Database): Result<StoreSummary, KnowledgeBaseError> {
  try {
    const row = db
      .prepare(
        `SELECT
          (SELECT COUNT(*) FROM knowledge_entries) AS knowledge_entries,
          (SELECT COUNT(*) FROM decision_records) AS decision_records,
          (SELECT COUNT(*) FROM comments) AS comments,
          (SELECT COUNT(*) FROM users) AS users,
          (SELECT COUNT(*) FROM users WHERE is_admin = 1) AS admins,
          (SELECT COUNT(*) FROM users WHERE is_active = 1) AS active_users`,
      )
      .get() as {
      knowledge_entries: number
      decision_records: number
      comments: number
      users: number
      admins: number
      active_users: number
    }

    return Ok({
      knowledgeEntries: row.knowledge_entries,
      decisionRecords: row.decision_records,
      comments: row.comments,
      users: row.users,
      admins: row.admins,
      activeUsers: row.active_users,
    })
  } catch (e) {
    return Err(KnowledgeBaseError.fromUnknown(e))
  }
}
