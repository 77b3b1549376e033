/**
 * Full snapshot of the store as one JSON-serializable document.
 */

import type Database from 'better-sqlite3'
import { Ok, Err, KnowledgeBaseError } from '../common/index.js'
import type { Result } from '../common/index.js'
import { KnowledgeRepository } from '../knowledge/repository.js'
import { DecisionRecordRepository } from '../history/repository.js'
import { CommentRepository } from '../history/comment-repository.js'
import { UserRepository } from '../accounts/repository.js'
import { AdminEventRepository } from '../audit/repository.js'
import { EXPORT_FORMAT, EXPORT_VERSION } from './schemas.js'
import type { ExportDocument } from './schemas.js'

export interface ExportOptions {
  /** Defaults to true so an import restores working logins. */
  includePasswordHashes?: boolean
}

export function exportData(db: Database.Database, options: ExportOptions = {}): Result<ExportDocument, KnowledgeBaseError> {
  const includePasswordHashes = options.includePasswordHashes ?? true

  try {
    // Read inside one transaction so the snapshot is consistent.
    return db.transaction((): Result<ExportDocument, KnowledgeBaseError> => {
      const knowledge = new KnowledgeRepository(db).list()
      if (!knowledge.ok) return knowledge

      const records = new DecisionRecordRepository(db).listRecords()
      if (!records.ok) return records

      const commentRepo = new CommentRepository(db)
      const decisions: ExportDocument['decisions'] = []
      for (const record of records.value) {
        const comments = commentRepo.listByDecision(record.id)
        if (!comments.ok) return comments
        decisions.push({
          ...record,
          comments: comments.value.map(({ id, author, body, rating, createdAt }) => ({
            id,
            author,
            body,
            rating,
            createdAt,
          })),
        })
      }

      const users = new UserRepository(db).list().map((row) => ({
        username: row.username,
        ...(includePasswordHashes ? { passwordHash: row.password_hash } : {}),
        isAdmin: row.is_admin === 1,
        isActive: row.is_active === 1,
        createdAt: row.created_at,
      }))

      const events = new AdminEventRepository(db).listAll()
      if (!events.ok) return events

      return Ok({
        format: EXPORT_FORMAT,
        version: EXPORT_VERSION,
        exportedAt: new Date().toISOString(),
        knowledge: knowledge.value,
        decisions,
        users,
        adminEvents: events.value.map(({ actorUsername, action, targetUsername, details, createdAt }) => ({
          actorUsername,
          action,
          targetUsername,
          details,
          createdAt,
        })),
      })
    })()
  } catch (e) {
    return Err(KnowledgeBaseError.fromUnknown(e))
  }
}
