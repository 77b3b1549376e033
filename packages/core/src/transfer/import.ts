/**
 * Restores an export document.
 *
 * `replace` wipes knowledge, decision records, comments and users first.
 * `merge` keeps what is there: knowledge and decision records are appended,
 * users whose username already exists are skipped. Admin events in the
 * document are never written; the local trail is append-only.
 *
 * Ids are reassigned by the store; comments follow their record's new id.
 *
 * Importing into a store that already has users needs an active admin as
 * `actor`. Each imported admin gets a `create_admin` event, and an import
 * that would leave no active admin is refused.
 */

import type Database from 'better-sqlite3'
import { Ok, Err, KnowledgeBaseError, serializeTags } from '../common/index.js'
import type { Result } from '../common/index.js'
import { UserRepository } from '../accounts/repository.js'
import { UNUSABLE_PASSWORD_HASH } from '../accounts/password.js'
import { requireActiveAdmin } from '../accounts/service.js'
import { AdminEventRepository } from '../audit/repository.js'
import { ExportDocumentSchema, ImportModeSchema, EXPORT_FORMAT, EXPORT_VERSION } from './schemas.js'
import type { ExportDocument, ImportMode, ImportReport } from './schemas.js'

export interface ImportOptions {
  mode: ImportMode
  /** Admin performing the import; not needed while the store has no users. */
  actor?: string
}

/** Validates an untrusted value as an export document. */
export function parseExportDocument(input: unknown): Result<ExportDocument, KnowledgeBaseError> {
  if (typeof input === 'object' && input !== null && 'format' in input && 'version' in input) {
    if (input.format === EXPORT_FORMAT && input.version !== EXPORT_VERSION) {
      return Err(KnowledgeBaseError.importFailed(`Unsupported export version: ${String(input.version)}`))
    }
  }

  const parsed = ExportDocumentSchema.safeParse(input)
  if (!parsed.success) {
    return Err(KnowledgeBaseError.fromZod(parsed.error, 'IMPORT_ERROR'))
  }
  return Ok(parsed.data)
}

export function importData(
  db: Database.Database,
  input: unknown,
  options: ImportOptions,
): Result<ImportReport, KnowledgeBaseError> {
  const mode = ImportModeSchema.safeParse(options.mode)
  if (!mode.success) {
    return Err(KnowledgeBaseError.validation(`Import mode must be "merge" or "replace"`))
  }

  const document = parseExportDocument(input)
  if (!document.ok) return document
  const doc = document.value

  const report: ImportReport = {
    mode: mode.data,
    knowledge: 0,
    decisions: 0,
    comments: 0,
    users: 0,
    skippedUsers: [],
    usersNeedingReset: [],
  }

  try {
    db.transaction(() => {
      const users = new UserRepository(db)
      const events = new AdminEventRepository(db)
      const actorUsername = users.count() > 0 ? requireActiveAdmin(users, options.actor).username : undefined

      if (mode.data === 'replace') {
        db.prepare('DELETE FROM comments').run()
        db.prepare('DELETE FROM decision_records').run()
        db.prepare('DELETE FROM knowledge_entries').run()
        db.prepare('DELETE FROM users').run()
      }

      const insertKnowledge = db.prepare(
        'INSERT INTO knowledge_entries (title, question, answer, tags, created_at) VALUES (?, ?, ?, ?, ?)',
      )
      for (const entry of doc.knowledge) {
        insertKnowledge.run(entry.title, entry.question, entry.answer, serializeTags(entry.tags), entry.createdAt)
        report.knowledge++
      }

      const insertDecision = db.prepare(
        'INSERT INTO decision_records (title, background, steps, result, tags, created_at) VALUES (?, ?, ?, ?, ?, ?)',
      )
      const insertComment = db.prepare(
        'INSERT INTO comments (decision_record_id, author, body, rating, created_at) VALUES (?, ?, ?, ?, ?)',
      )
      for (const record of doc.decisions) {
        const info = insertDecision.run(
          record.title,
          record.background,
          record.steps,
          record.result,
          serializeTags(record.tags),
          record.createdAt,
        )
        const newId = Number(info.lastInsertRowid)
        report.decisions++

        for (const comment of record.comments) {
          insertComment.run(newId, comment.author, comment.body, comment.rating, comment.createdAt)
          report.comments++
        }
      }

      const seen = new Set<string>()
      for (const user of doc.users) {
        if (seen.has(user.username)) {
          throw KnowledgeBaseError.importFailed(`Duplicate username in document: ${user.username}`)
        }
        seen.add(user.username)

        if (users.findByUsername(user.username)) {
          report.skippedUsers.push(user.username)
          continue
        }

        const passwordHash = user.passwordHash ?? UNUSABLE_PASSWORD_HASH
        const needsReset = passwordHash === UNUSABLE_PASSWORD_HASH
        users.insert({
          username: user.username,
          passwordHash,
          isAdmin: user.isAdmin,
          isActive: needsReset ? false : user.isActive,
          createdAt: user.createdAt,
        })
        if (user.isAdmin) {
          events.append({
            actorUsername: actorUsername ?? user.username,
            action: 'create_admin',
            targetUsername: user.username,
            details: 'import',
          })
        }
        if (needsReset) report.usersNeedingReset.push(user.username)
        report.users++
      }

      if (users.count() > 0 && users.countActiveAdmins() === 0) {
        throw KnowledgeBaseError.conflict('Import would leave no active administrator')
      }
    })()
  } catch (e) {
    return Err(KnowledgeBaseError.fromUnknown(e))
  }

  console.error(
    `[transfer] ${report.mode} import: ${report.knowledge} knowledge, ${report.decisions} decisions, ` +
      `${report.comments} comments, ${report.users} users (${report.skippedUsers.length} skipped)`,
  )
  return Ok(report)
}
