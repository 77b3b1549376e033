/**
 * Admin event repository: append-only trail of privileged account changes.
 *
 * `append` throws instead of returning a Result: it is meant to run inside
 * the caller's transaction so a failed write rolls back the mutation it
 * describes.
 */

import type Database from 'better-sqlite3'
import { Ok, Err, KnowledgeBaseError } from '../common/index.js'
import type { Result } from '../common/index.js'
import { AdminActionSchema, AppendAdminEventInputSchema } from './schemas.js'
import type { AdminEvent, AppendAdminEventInput } from './schemas.js'

interface AdminEventRow {
  id: number
  actor_username: string
  action: string
  target_username: string
  details: string | null
  created_at: string
}

function rowToEvent(row: AdminEventRow): AdminEvent {
  return {
    id: row.id,
    actorUsername: row.actor_username,
    action: AdminActionSchema.parse(row.action),
    targetUsername: row.target_username,
    details: row.details,
    createdAt: row.created_at,
  }
}

export interface ListAdminEventsOptions {
  limit?: number
  targetUsername?: string
}

export class AdminEventRepository {
  constructor(private db: Database.Database) {}

  append(input: AppendAdminEventInput): AdminEvent {
    const data = AppendAdminEventInputSchema.parse(input)
    const now = new Date().toISOString()

    const info = this.db
      .prepare(
        'INSERT INTO admin_events (actor_username, action, target_username, details, created_at) VALUES (?, ?, ?, ?, ?)',
      )
      .run(data.actorUsername, data.action, data.targetUsername, data.details, now)

    return {
      id: Number(info.lastInsertRowid),
      actorUsername: data.actorUsername,
      action: data.action,
      targetUsername: data.targetUsername,
      details: data.details,
      createdAt: now,
    }
  }

  /** Newest first. */
  list(options: ListAdminEventsOptions = {}): Result<AdminEvent[], KnowledgeBaseError> {
    const limit = options.limit ?? 20

    try {
      const rows = options.targetUsername
        ? (this.db
            .prepare(
              'SELECT * FROM admin_events WHERE target_username = ? ORDER BY created_at DESC, id DESC LIMIT ?',
            )
            .all(options.targetUsername, limit) as AdminEventRow[])
        : (this.db
            .prepare('SELECT * FROM admin_events ORDER BY created_at DESC, id DESC LIMIT ?')
            .all(limit) as AdminEventRow[])
      return Ok(rows.map(rowToEvent))
    } catch (e) {
      return Err(KnowledgeBaseError.fromUnknown(e))
    }
  }

  /** Oldest first, unbounded. Used by export. */
  listAll(): Result<AdminEvent[], KnowledgeBaseError> {
    try {
      const rows = this.db
        .prepare('SELECT * FROM admin_events ORDER BY created_at ASC, id ASC')
        .all() as AdminEventRow[]
      return Ok(rows.map(rowToEvent))
    } catch (e) {
      return Err(KnowledgeBaseError.fromUnknown(e))
    }
  }
}
