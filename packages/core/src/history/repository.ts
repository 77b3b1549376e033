/**
 * Decision record repository: background, steps and result of a decision,
 * with comments owned by the record.
 */

import type Database from 'better-sqlite3'
import { Ok, Err, KnowledgeBaseError, parseTags, serializeTags } from '../common/index.js'
import type { Result } from '../common/index.js'
import { CommentRepository } from './comment-repository.js'
import { CreateDecisionRecordInputSchema, DecisionRecordPatchSchema } from './schemas.js'
import type {
  DecisionRecord,
  DecisionRecordDetail,
  DecisionRecordListItem,
  DecisionRecordPatch,
  DecisionSearchHit,
  CreateDecisionRecordInput,
} from './schemas.js'
import { matchFields } from './search.js'

interface DecisionRecordRow {
  id: number
  title: string
  background: string
  steps: string
  result: string
  tags: string
  created_at: string
}

const DECISION_COLUMNS = 'id, title, background, steps, result, tags, created_at'

function rowToRecord(row: DecisionRecordRow): DecisionRecord {
  return {
    id: row.id,
    title: row.title,
    background: row.background,
    steps: row.steps,
    result: row.result,
    tags: parseTags(row.tags, `decision record ${row.id}`),
    createdAt: row.created_at,
  }
}

function newestFirst(a: DecisionRecord, b: DecisionRecord): number {
  if (a.createdAt !== b.createdAt) return a.createdAt < b.createdAt ? 1 : -1
  return b.id - a.id
}

export interface SearchOptions {
  limit?: number
}

export class DecisionRecordRepository {
  private comments: CommentRepository

  constructor(private db: Database.Database) {
    this.comments = new CommentRepository(db)
  }

  create(input: CreateDecisionRecordInput): Result<DecisionRecord, KnowledgeBaseError> {
    const parsed = CreateDecisionRecordInputSchema.safeParse(input)
    if (!parsed.success) {
      return Err(KnowledgeBaseError.fromZod(parsed.error))
    }

    const now = new Date().toISOString()

    try {
      const info = this.db
        .prepare(
          'INSERT INTO decision_records (title, background, steps, result, tags, created_at) VALUES (?, ?, ?, ?, ?, ?)',
        )
        .run(
          parsed.data.title,
          parsed.data.background,
          parsed.data.steps,
          parsed.data.result,
          serializeTags(parsed.data.tags),
          now,
        )

      return Ok({
        id: Number(info.lastInsertRowid),
        title: parsed.data.title,
        background: parsed.data.background,
        steps: parsed.data.steps,
        result: parsed.data.result,
        tags: parsed.data.tags,
        createdAt: now,
      })
    } catch (e) {
      return Err(KnowledgeBaseError.fromUnknown(e))
    }
  }

  /** The record alone, without comments. */
  getRecord(id: number): Result<DecisionRecord, KnowledgeBaseError> {
    try {
      const row = this.db
        .prepare(`SELECT ${DECISION_COLUMNS} FROM decision_records WHERE id = ?`)
        .get(id) as DecisionRecordRow | undefined

      if (!row) return Err(KnowledgeBaseError.notFound('Decision record', id))
      return Ok(rowToRecord(row))
    } catch (e) {
      return Err(KnowledgeBaseError.fromUnknown(e))
    }
  }

  getById(id: number): Result<DecisionRecordDetail, KnowledgeBaseError> {
    const record = this.getRecord(id)
    if (!record.ok) return record

    const comments = this.comments.listByDecision(id)
    if (!comments.ok) return comments

    return Ok({ ...record.value, comments: comments.value })
  }

  listRecords(): Result<DecisionRecord[], KnowledgeBaseError> {
    try {
      const rows = this.db
        .prepare(`SELECT ${DECISION_COLUMNS} FROM decision_records ORDER BY created_at ASC, id ASC`)
        .all() as DecisionRecordRow[]
      return Ok(rows.map(rowToRecord))
    } catch (e) {
      return Err(KnowledgeBaseError.fromUnknown(e))
    }
  }

  list(): Result<DecisionRecordListItem[], KnowledgeBaseError> {
    const records = this.listRecords()
    if (!records.ok) return records

    const summaries = this.comments.summarize()
    if (!summaries.ok) return summaries

    return Ok(
      records.value.map((record) => ({
        ...record,
        comments: summaries.value.get(record.id) ?? { count: 0, averageRating: null },
      })),
    )
  }

  update(id: number, patch: DecisionRecordPatch): Result<DecisionRecord, KnowledgeBaseError> {
    const parsed = DecisionRecordPatchSchema.safeParse(patch)
    if (!parsed.success) {
      return Err(KnowledgeBaseError.fromZod(parsed.error))
    }

    const existing = this.getRecord(id)
    if (!existing.ok) return existing

    const updated: DecisionRecord = { ...existing.value }
    if (parsed.data.title !== undefined) updated.title = parsed.data.title
    if (parsed.data.background !== undefined) updated.background = parsed.data.background
    if (parsed.data.steps !== undefined) updated.steps = parsed.data.steps
    if (parsed.data.result !== undefined) updated.result = parsed.data.result
    if (parsed.data.tags !== undefined) updated.tags = parsed.data.tags

    try {
      this.db
        .prepare('UPDATE decision_records SET title = ?, background = ?, steps = ?, result = ?, tags = ? WHERE id = ?')
        .run(updated.title, updated.background, updated.steps, updated.result, serializeTags(updated.tags), id)

      return Ok(updated)
    } catch (e) {
      return Err(KnowledgeBaseError.fromUnknown(e))
    }
  }

  /** Removes the record and every comment on it in one transaction. */
  delete(id: number): Result<{ deletedComments: number }, KnowledgeBaseError> {
    const existing = this.getRecord(id)
    if (!existing.ok) return existing

    try {
      const deletedComments = this.db.transaction(() => {
        const removed = this.db.prepare('DELETE FROM comments WHERE decision_record_id = ?').run(id)
        this.db.prepare('DELETE FROM decision_records WHERE id = ?').run(id)
        return removed.changes
      })()

      return Ok({ deletedComments })
    } catch (e) {
      return Err(KnowledgeBaseError.fromUnknown(e))
    }
  }

  /**
   * Case-insensitive substring search across title, background, steps,
   * result and tags. Ranked by matching field count, then newest first.
   * A blank keyword returns every record, newest first.
   */
  search(keyword: string, options: SearchOptions = {}): Result<DecisionSearchHit[], KnowledgeBaseError> {
    const records = this.listRecords()
    if (!records.ok) return records

    const needle = keyword.trim().toLowerCase()
    let hits: DecisionSearchHit[]

    if (!needle) {
      hits = records.value.map((record) => ({ record, score: 0, matchedFields: [] }))
    } else {
      hits = []
      for (const record of records.value) {
        const matchedFields = matchFields(record, needle)
        if (matchedFields.length > 0) {
          hits.push({ record, score: matchedFields.length, matchedFields })
        }
      }
    }

    hits.sort((a, b) => b.score - a.score || newestFirst(a.record, b.record))
    return Ok(options.limit !== undefined ? hits.slice(0, Math.max(0, options.limit)) : hits)
  }
}
