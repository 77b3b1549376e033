/**
 * Comment repository: rated remarks attached to a decision record.
 * Aggregates are computed on read; nothing is recalculated at write time.
 */

import type Database from 'better-sqlite3'
import { Ok, Err, KnowledgeBaseError } from '../common/index.js'
import type { Result } from '../common/index.js'
import { CreateCommentInputSchema } from './schemas.js'
import type { Comment, CommentSummary, CreateCommentInput } from './schemas.js'

export interface CommentRow {
  id: number
  decision_record_id: number
  author: string
  body: string
  rating: number
  created_at: string
}

export const COMMENT_COLUMNS = 'id, decision_record_id, author, body, rating, created_at'

export function rowToComment(row: CommentRow): Comment {
  return {
    id: row.id,
    decisionRecordId: row.decision_record_id,
    author: row.author,
    body: row.body,
    rating: row.rating,
    createdAt: row.created_at,
  }
}

export class CommentRepository {
  constructor(private db: Database.Database) {}

  create(input: CreateCommentInput): Result<Comment, KnowledgeBaseError> {
    const parsed = CreateCommentInputSchema.safeParse(input)
    if (!parsed.success) {
      return Err(KnowledgeBaseError.fromZod(parsed.error))
    }

    const now = new Date().toISOString()

    try {
      const parent = this.db
        .prepare('SELECT id FROM decision_records WHERE id = ?')
        .get(parsed.data.decisionRecordId) as { id: number } | undefined
      if (!parent) return Err(KnowledgeBaseError.notFound('Decision record', parsed.data.decisionRecordId))

      const info = this.db
        .prepare('INSERT INTO comments (decision_record_id, author, body, rating, created_at) VALUES (?, ?, ?, ?, ?)')
        .run(parsed.data.decisionRecordId, parsed.data.author, parsed.data.body, parsed.data.rating, now)

      return Ok({
        id: Number(info.lastInsertRowid),
        decisionRecordId: parsed.data.decisionRecordId,
        author: parsed.data.author,
        body: parsed.data.body,
        rating: parsed.data.rating,
        createdAt: now,
      })
    } catch (e) {
      return Err(KnowledgeBaseError.fromUnknown(e))
    }
  }

  listByDecision(decisionRecordId: number): Result<Comment[], KnowledgeBaseError> {
    try {
      const rows = this.db
        .prepare(`SELECT ${COMMENT_COLUMNS} FROM comments WHERE decision_record_id = ? ORDER BY created_at ASC, id ASC`)
        .all(decisionRecordId) as CommentRow[]
      return Ok(rows.map(rowToComment))
    } catch (e) {
      return Err(KnowledgeBaseError.fromUnknown(e))
    }
  }

  /** Count and mean rating per decision record that has comments. */
  summarize(): Result<Map<number, CommentSummary>, KnowledgeBaseError> {
    try {
      const rows = this.db
        .prepare(
          'SELECT decision_record_id, COUNT(*) AS count, AVG(rating) AS average FROM comments GROUP BY decision_record_id',
        )
        .all() as Array<{ decision_record_id: number; count: number; average: number | null }>

      const summaries = new Map<number, CommentSummary>()
      for (const row of rows) {
        summaries.set(row.decision_record_id, { count: row.count, averageRating: row.average })
      }
      return Ok(summaries)
    } catch (e) {
      return Err(KnowledgeBaseError.fromUnknown(e))
    }
  }

  delete(id: number): Result<void, KnowledgeBaseError> {
    try {
      const info = this.db.prepare('DELETE FROM comments WHERE id = ?').run(id)
      if (info.changes === 0) return Err(KnowledgeBaseError.notFound('Comment', id))
      return Ok(undefined)
    } catch (e) {
      return Err(KnowledgeBaseError.fromUnknown(e))
    }
  }
}
